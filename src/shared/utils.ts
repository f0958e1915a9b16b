import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function sha256(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * UTC timestamp with millisecond precision. Lexicographic order matches time order,
 * which the SQLite range queries rely on.
 */
export function nowISO(date: Date = new Date()): string {
  return date.toISOString();
}

/** Local calendar day, `YYYY-MM-DD`. */
export function dayLabel(date: Date = new Date()): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function compactText(text: string, limit: number): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, limit);
}

/**
 * Lowercased, de-duplicated word tokens: latin runs of at least `minLatin` chars
 * and CJK runs of at least two chars.
 */
export function extractTokens(text: string, limit = 10, minLatin = 3): string[] {
  const pattern = new RegExp(`[a-z0-9]{${minLatin},}|[\\u4e00-\\u9fff]{2,}`, 'g');
  const result: string[] = [];
  const seen = new Set<string>();
  for (const token of text.toLowerCase().match(pattern) ?? []) {
    if (seen.has(token)) continue;
    seen.add(token);
    result.push(token);
    if (result.length >= limit) break;
  }
  return result;
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory containing package.json.
  // Works for both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getPresslineDir(): string {
  return resolvePath('~/.pressline');
}
