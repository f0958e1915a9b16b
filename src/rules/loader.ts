import fs from 'node:fs';
import path from 'node:path';
import cron from 'node-cron';
import { parse as yamlParse } from 'yaml';
import { RulesSchema, SCHEDULE_RE, type Rules } from './schema.js';
import { RulesError } from '../shared/errors.js';
import { getPackageRoot, resolvePath, sha256 } from '../shared/utils.js';

export interface LoadedRules {
  rules: Rules;
  /** sha256 of the file bytes; hot-reload compares this. */
  hash: string;
  path: string;
}

export function parseRulesYaml(content: string): Rules {
  let raw: unknown;
  try {
    raw = yamlParse(content);
  } catch (err) {
    throw new RulesError('Rules file is not valid YAML', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const result = RulesSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new RulesError('Invalid rules', {
      errors: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

export function rulesFileHash(rulesPath: string): string | null {
  const resolved = resolvePath(rulesPath);
  if (!fs.existsSync(resolved)) return null;
  return sha256(fs.readFileSync(resolved));
}

export function loadRules(rulesPath: string): LoadedRules {
  const resolved = resolvePath(rulesPath);
  if (!fs.existsSync(resolved)) {
    throw new RulesError(`Rules file not found: ${resolved}`, { path: resolved });
  }
  const content = fs.readFileSync(resolved);
  return {
    rules: parseRulesYaml(content.toString('utf-8')),
    hash: sha256(content),
    path: resolved,
  };
}

export function exampleRulesPath(): string {
  return path.join(getPackageRoot(), 'config', 'rules.example.yaml');
}

/** Copy the bundled example rules to `rulesPath` unless a file is already there. */
export function writeExampleRules(rulesPath: string): boolean {
  const resolved = resolvePath(rulesPath);
  if (fs.existsSync(resolved)) return false;
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.copyFileSync(exampleRulesPath(), resolved);
  return true;
}

// "30m" fires every 30 minutes, "2h" on the hour every two hours. Anything else
// must already be a cron expression.
export function intervalToCron(interval: string): string {
  const trimmed = interval.trim();
  const match = /^(\d+)([mh])$/.exec(trimmed);
  if (match) {
    const amount = Number(match[1]);
    const unit = match[2];
    if (unit === 'm' && amount >= 1 && amount <= 59) return `*/${amount} * * * *`;
    if (unit === 'h' && amount >= 1 && amount <= 23) return `0 */${amount} * * *`;
    throw new RulesError(`Interval out of range: ${interval}`, { interval });
  }
  if (cron.validate(trimmed)) return trimmed;
  throw new RulesError(`Invalid fetch interval: ${interval}`, { interval });
}

/** `HH:MM` → daily cron expression. */
export function scheduleToCron(schedule: string): string {
  const match = SCHEDULE_RE.exec(schedule.trim());
  if (!match) {
    throw new RulesError(`Invalid schedule: ${schedule}`, { schedule });
  }
  return `${Number(match[2])} ${Number(match[1])} * * *`;
}
