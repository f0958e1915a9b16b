import type Database from 'better-sqlite3';
import { ValidationError } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { compactText, nowISO } from '../shared/utils.js';

const log = componentLogger('memory');

const DAY_MS = 24 * 60 * 60 * 1000;
const CANDIDATE_POOL = 200;

export interface ContextEntryInput {
  fingerprint: string;
  sourceId: string;
  title: string;
  url: string;
  summary: string;
  keywords: string[];
  archiveUrl?: string;
  imageUrl?: string;
}

export interface ContextEntry {
  id: number;
  fingerprint: string;
  source_id: string;
  title: string;
  url: string;
  summary: string;
  keywords: string[];
  archive_url: string;
  image_url: string;
  created_at: string;
}

interface ContextRow extends Omit<ContextEntry, 'keywords'> {
  keywords_json: string;
}

export interface RetrievedContext {
  context: string;
  matchedCount: number;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function parseKeywords(json: string): string[] {
  try {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}

function normalizeKeywords(keywords: string[]): string[] {
  const seen = new Set<string>();
  for (const kw of keywords) {
    const cleaned = kw.trim().toLowerCase();
    if (cleaned) seen.add(cleaned);
  }
  return [...seen];
}

/**
 * Append-only index of archived topic summaries, read back as "what we already
 * covered" context for generation.
 */
export class ContextIndex {
  constructor(private readonly db: Database.Database) {}

  append(entry: ContextEntryInput, now: Date = new Date()): number {
    const result = this.db
      .prepare(
        `INSERT INTO context_entries
           (fingerprint, source_id, title, url, summary, keywords_json, archive_url, image_url, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.fingerprint,
        entry.sourceId,
        entry.title,
        entry.url,
        entry.summary,
        JSON.stringify(normalizeKeywords(entry.keywords)),
        entry.archiveUrl ?? '',
        entry.imageUrl ?? '',
        nowISO(now),
      );
    return Number(result.lastInsertRowid);
  }

  /**
   * Entries sharing at least one keyword, ranked by the number of shared keywords
   * and then by recency.
   */
  search(keywords: string[], limit = 3): ContextEntry[] {
    const wanted = normalizeKeywords(keywords);
    if (wanted.length === 0 || limit <= 0) return [];

    const clauses: string[] = [];
    const params: Array<string | number> = [];
    for (const kw of wanted) {
      const pattern = `%${escapeLike(kw)}%`;
      clauses.push("(keywords_json LIKE ? ESCAPE '\\' OR lower(title) LIKE ? ESCAPE '\\')");
      params.push(pattern, pattern);
    }
    params.push(CANDIDATE_POOL);

    const rows = this.db
      .prepare(
        `SELECT id, fingerprint, source_id, title, url, summary, keywords_json, archive_url, image_url, created_at
         FROM context_entries WHERE ${clauses.join(' OR ')}
         ORDER BY created_at DESC, id DESC LIMIT ?`,
      )
      .all(...params) as ContextRow[];

    const scored = rows.map(({ keywords_json, ...row }) => {
      const entry: ContextEntry = { ...row, keywords: parseKeywords(keywords_json) };
      const own = new Set(entry.keywords);
      const title = entry.title.toLowerCase();
      const overlap = wanted.filter((kw) => own.has(kw) || title.includes(kw)).length;
      return { entry, overlap };
    });

    // Array.prototype.sort is stable, so equal overlaps keep the newest-first order.
    return scored
      .filter((s) => s.overlap > 0)
      .sort((a, b) => b.overlap - a.overlap)
      .slice(0, limit)
      .map((s) => s.entry);
  }

  retrieve(keywords: string[], limit = 3): RetrievedContext {
    const entries = this.search(keywords, limit);
    const context = entries
      .map((e) => `- ${e.title} (${e.created_at}): ${compactText(e.summary, 240)}`)
      .join('\n');
    return { context, matchedCount: entries.length };
  }

  prune(retentionDays: number, now: Date = new Date()): number {
    if (!Number.isFinite(retentionDays) || retentionDays < 0) {
      throw new ValidationError('retention_days must be a non-negative number', { retentionDays });
    }
    const cutoff = nowISO(new Date(now.getTime() - retentionDays * DAY_MS));
    const result = this.db.prepare('DELETE FROM context_entries WHERE created_at <= ?').run(cutoff);
    log.info({ retention_days: retentionDays, removed: result.changes }, 'Context prune done');
    return result.changes;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM context_entries').get() as { n: number };
    return row.n;
  }
}
