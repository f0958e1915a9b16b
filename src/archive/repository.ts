import type Database from 'better-sqlite3';
import { ContentPackageSchema, type ArchiveReceipt, type ContentPackage, type RecordType } from './types.js';
import { compactText, nowISO } from '../shared/utils.js';

export interface PackageRow {
  id: number;
  record_type: RecordType;
  trace_id: string;
  platform: string;
  source_id: string;
  title: string;
  summary: string;
  status: string;
  channels: string;
  doc_url: string;
  backend: string;
  created_at: string;
}

export interface PackageRecord extends PackageRow {
  payload: ContentPackage | null;
}

export interface PackageQuery {
  recordType?: RecordType;
  traceId?: string;
  limit?: number;
}

function parsePayload(json: string): ContentPackage | null {
  try {
    const parsed = ContentPackageSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** The tabular record of everything archived: the dashboard's data. */
export class PackageRepository {
  constructor(private readonly db: Database.Database) {}

  record(pkg: ContentPackage, receipt: ArchiveReceipt, now: Date = new Date()): number {
    const result = this.db
      .prepare(
        `INSERT INTO content_packages
           (record_type, trace_id, platform, source_id, title, summary, status, channels, doc_url, backend, payload_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        pkg.record_type,
        pkg.trace_id,
        pkg.platform ?? '',
        pkg.source_id,
        pkg.title,
        pkg.summary,
        pkg.status,
        pkg.channels.join(', '),
        receipt.doc_url,
        receipt.backend,
        JSON.stringify({ ...pkg, doc_url: receipt.doc_url, archive_status: receipt.status }),
        nowISO(now),
      );
    return Number(result.lastInsertRowid);
  }

  hasTrace(traceId: string, recordType?: RecordType): boolean {
    const row = recordType
      ? this.db
          .prepare('SELECT 1 AS hit FROM content_packages WHERE trace_id = ? AND record_type = ? LIMIT 1')
          .get(traceId, recordType)
      : this.db.prepare('SELECT 1 AS hit FROM content_packages WHERE trace_id = ? LIMIT 1').get(traceId);
    return row !== undefined;
  }

  list(query: PackageQuery = {}): PackageRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (query.recordType) {
      clauses.push('record_type = ?');
      params.push(query.recordType);
    }
    if (query.traceId) {
      clauses.push("(trace_id = ? OR trace_id LIKE ? ESCAPE '\\')");
      params.push(query.traceId, `${escapeLike(query.traceId)}-%`);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(Math.max(1, Math.min(query.limit ?? 20, 200)));

    const rows = this.db
      .prepare(
        `SELECT id, record_type, trace_id, platform, source_id, title, summary, status, channels,
                doc_url, backend, created_at, payload_json
         FROM content_packages ${where} ORDER BY id DESC LIMIT ?`,
      )
      .all(...params) as Array<PackageRow & { payload_json: string }>;

    return rows.map(({ payload_json, ...row }) => ({ ...row, payload: parsePayload(payload_json) }));
  }

  /**
   * Bullet lines from recent drafts that share `tokens` with a new title. A draft
   * for the same platform scores +2.
   */
  recentDraftSnippets(tokens: string[], platform: string, limit = 5, scanWindow = 100): string[] {
    if (tokens.length === 0) return [];

    const rows = this.db
      .prepare(
        `SELECT title, platform, payload_json FROM content_packages
         WHERE record_type = 'draft' ORDER BY id DESC LIMIT ?`,
      )
      .all(scanWindow) as Array<{ title: string; platform: string; payload_json: string }>;

    const platformKey = platform.trim().toLowerCase();
    const snippets: string[] = [];
    for (const row of rows) {
      if (snippets.length >= limit) break;
      const payload = parsePayload(row.payload_json);
      const body = payload?.article_markdown || payload?.twitter_draft || '';
      const haystack = `${row.title}\n${body}`.toLowerCase();

      let score = tokens.filter((t) => haystack.includes(t)).length;
      if (platformKey && row.platform.toLowerCase() === platformKey) score += 2;
      if (score <= 0) continue;

      snippets.push(`- ${row.title}: ${compactText(body, 220)}`);
    }
    return snippets;
  }
}
