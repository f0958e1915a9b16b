import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import {
  compactText,
  dayLabel,
  extractTokens,
  generateId,
  getPackageRoot,
  nowISO,
  resolvePath,
  sha256,
} from '../utils.js';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    expect(resolvePath('~')).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('sha256', () => {
  it('produces the 64-char hex digest', () => {
    expect(sha256('hello')).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('hashes buffers like strings', () => {
    expect(sha256(Buffer.from('hello'))).toBe(sha256('hello'));
  });
});

describe('generateId', () => {
  it('generates url-safe ids of the requested length', () => {
    expect(generateId()).toHaveLength(21);
    expect(generateId(16)).toMatch(/^[A-Za-z0-9_-]{16}$/);
    expect(generateId()).not.toBe(generateId());
  });
});

describe('timestamps', () => {
  it('nowISO keeps milliseconds', () => {
    expect(nowISO(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)))).toBe('2026-01-02T03:04:05.006Z');
  });

  it('dayLabel uses the local calendar day', () => {
    expect(dayLabel(new Date(2026, 0, 5, 12))).toBe('2026-01-05');
  });
});

describe('compactText', () => {
  it('collapses whitespace and truncates', () => {
    expect(compactText('  a\n\n b\tc  ', 4)).toBe('a b ');
    expect(compactText('short', 100)).toBe('short');
  });
});

describe('extractTokens', () => {
  it('keeps latin words of three chars and CJK runs of two', () => {
    expect(extractTokens('Agent agent Toolkit 发布了新模型 ai')).toEqual(['agent', 'toolkit', '发布了新模型']);
  });

  it('stops at the limit', () => {
    expect(extractTokens('alpha beta gamma', 2)).toEqual(['alpha', 'beta']);
  });
});

describe('getPackageRoot', () => {
  it('returns the directory holding package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});
