import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  parseRulesYaml,
  loadRules,
  rulesFileHash,
  intervalToCron,
  scheduleToCron,
  exampleRulesPath,
  writeExampleRules,
} from '../loader.js';
import { RulesError } from '../../shared/errors.js';
import { sha256 } from '../../shared/utils.js';

describe('parseRulesYaml', () => {
  it('fills defaults for an empty document', () => {
    const rules = parseRulesYaml('');
    expect(rules.sources).toEqual([]);
    expect(rules.global.memory_retention_days).toBe(30);
    expect(rules.global.max_items_per_scan).toBe(5);
    expect(rules.global.filter.min_text_length).toBe(220);
    expect(rules.global.filter.min_score).toBe(2);
    expect(rules.visual.default_ratio).toBe('16:9');
  });

  it('applies source defaults', () => {
    const rules = parseRulesYaml(`
sources:
  - id: blog
    url: https://example.com/feed.xml
`);
    expect(rules.sources[0]).toEqual({
      id: 'blog',
      type: 'rss',
      url: 'https://example.com/feed.xml',
      fetch_interval: '30m',
      weight: 1,
      enabled: true,
    });
  });

  it('rejects duplicate source ids', () => {
    const yaml = `
sources:
  - { id: a, url: "https://example.com/1" }
  - { id: a, url: "https://example.com/2" }
`;
    expect(() => parseRulesYaml(yaml)).toThrow(RulesError);
  });

  it('rejects unsupported url schemes', () => {
    expect(() => parseRulesYaml('sources:\n  - { id: a, url: "ftp://example.com" }\n')).toThrow(
      RulesError,
    );
  });

  it('rejects a malformed platform schedule', () => {
    expect(() => parseRulesYaml('platforms:\n  twitter: { schedule: "25:00" }\n')).toThrow(RulesError);
  });

  it('reports invalid YAML as a rules error', () => {
    expect(() => parseRulesYaml('sources: [')).toThrow(RulesError);
  });

  it('parses the bundled example', () => {
    const rules = parseRulesYaml(fs.readFileSync(exampleRulesPath(), 'utf-8'));
    expect(rules.sources.map((s) => s.id)).toEqual(['example_blog']);
    expect(rules.platforms['wechat_blog']?.format).toBe('longform');
    expect(rules.platforms['wechat_blog']?.schedule).toBe('09:00');
  });
});

describe('loadRules', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pressline-rules-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns rules with the file hash', () => {
    const file = path.join(dir, 'rules.yaml');
    const content = 'sources:\n  - { id: a, url: "file:///tmp/feed.xml" }\n';
    fs.writeFileSync(file, content);

    const loaded = loadRules(file);
    expect(loaded.rules.sources[0]?.id).toBe('a');
    expect(loaded.hash).toBe(sha256(content));
    expect(rulesFileHash(file)).toBe(loaded.hash);
  });

  it('throws for a missing file', () => {
    expect(() => loadRules(path.join(dir, 'missing.yaml'))).toThrow(RulesError);
    expect(rulesFileHash(path.join(dir, 'missing.yaml'))).toBeNull();
  });

  it('writes the example only when no file exists', () => {
    const file = path.join(dir, 'nested', 'rules.yaml');
    expect(writeExampleRules(file)).toBe(true);
    expect(writeExampleRules(file)).toBe(false);
    expect(loadRules(file).rules.sources).toHaveLength(1);
  });
});

describe('intervalToCron', () => {
  it('converts minute and hour intervals', () => {
    expect(intervalToCron('30m')).toBe('*/30 * * * *');
    expect(intervalToCron(' 2h ')).toBe('0 */2 * * *');
  });

  it('passes through valid cron expressions', () => {
    expect(intervalToCron('0 8 * * 1')).toBe('0 8 * * 1');
  });

  it('rejects out-of-range and unknown intervals', () => {
    expect(() => intervalToCron('0m')).toThrow(RulesError);
    expect(() => intervalToCron('90m')).toThrow(RulesError);
    expect(() => intervalToCron('soon')).toThrow(RulesError);
  });
});

describe('scheduleToCron', () => {
  it('converts HH:MM to a daily cron', () => {
    expect(scheduleToCron('09:05')).toBe('5 9 * * *');
    expect(scheduleToCron('23:30')).toBe('30 23 * * *');
  });

  it('rejects invalid times', () => {
    expect(() => scheduleToCron('9am')).toThrow(RulesError);
  });
});
