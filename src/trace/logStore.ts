import type Database from 'better-sqlite3';
import pino from 'pino';
import { normalizeId } from './context.js';

/**
 * pino destination that appends every record to `service_logs`, giving one query
 * surface over all components.
 */
export class LogStore implements pino.DestinationStream {
  private readonly insert: Database.Statement;

  constructor(db: Database.Database) {
    this.insert = db.prepare(`
      INSERT INTO service_logs (created_at, component, level, message, trace_id, request_id, extra_json)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
  }

  write(msg: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(msg);
    } catch (err) {
      process.stderr.write(`log store: unparseable record (${String(err)})\n`);
      return;
    }
    const record = asObject(parsed);

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
      if (!RESERVED_KEYS.has(key)) extra[key] = value;
    }

    try {
      this.insert.run(
        typeof record['time'] === 'number' ? new Date(record['time']).toISOString() : new Date().toISOString(),
        asText(record['component']),
        levelLabel(record['level']),
        asText(record['msg']),
        asText(record['trace_id']),
        asText(record['request_id']),
        JSON.stringify(extra),
      );
    } catch (err) {
      process.stderr.write(`log store: insert failed (${String(err)})\n`);
    }
  }
}

const RESERVED_KEYS = new Set(['time', 'level', 'msg', 'component', 'trace_id', 'request_id', 'pid', 'hostname']);

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function levelLabel(level: unknown): string {
  if (typeof level === 'number') {
    return (pino.levels.labels[level] ?? String(level)).toUpperCase();
  }
  return String(level ?? '').toUpperCase();
}

export interface LogQuery {
  /** Matches the trace id, or the request id of nested scopes (a cycle's items). */
  traceId?: string;
  requestId?: string;
  component?: string;
  level?: string;
  keyword?: string;
  limit?: number;
  /** Also match draft ids derived from `traceId` (`<traceId>-<platform>`). Default true. */
  includeDerived?: boolean;
}

export interface LogRecord {
  id: number;
  created_at: string;
  component: string;
  level: string;
  message: string;
  trace_id: string;
  request_id: string;
  extra: Record<string, unknown>;
}

interface LogRow extends Omit<LogRecord, 'extra'> {
  extra_json: string;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function clampLimit(limit: number | undefined, max: number): number {
  const wanted = limit !== undefined && Number.isFinite(limit) ? Math.trunc(limit) : 200;
  return Math.max(1, Math.min(wanted || 200, max));
}

export function queryLogs(db: Database.Database, query: LogQuery, maxLimit = 1000): LogRecord[] {
  const clauses: string[] = [];
  const params: Array<string | number> = [];

  const traceId = normalizeId(query.traceId);
  if (traceId) {
    if (query.includeDerived ?? true) {
      clauses.push("(trace_id = ? OR trace_id LIKE ? ESCAPE '\\' OR request_id = ?)");
      params.push(traceId, `${escapeLike(traceId)}-%`, traceId);
    } else {
      clauses.push('(trace_id = ? OR request_id = ?)');
      params.push(traceId, traceId);
    }
  }
  const requestId = normalizeId(query.requestId);
  if (requestId) {
    clauses.push('request_id = ?');
    params.push(requestId);
  }
  if (query.component?.trim()) {
    clauses.push('component = ?');
    params.push(query.component.trim());
  }
  if (query.level?.trim()) {
    clauses.push('level = ?');
    params.push(query.level.trim().toUpperCase());
  }
  if (query.keyword?.trim()) {
    clauses.push("message LIKE ? ESCAPE '\\'");
    params.push(`%${escapeLike(query.keyword.trim())}%`);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  params.push(clampLimit(query.limit, maxLimit));

  const rows = db
    .prepare(
      `SELECT id, created_at, component, level, message, trace_id, request_id, extra_json
       FROM service_logs ${where} ORDER BY id DESC LIMIT ?`,
    )
    .all(...params) as LogRow[];

  return rows.map(({ extra_json, ...row }) => ({ ...row, extra: parseExtra(extra_json) }));
}

function asObject(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function parseExtra(json: string): Record<string, unknown> {
  try {
    return asObject(JSON.parse(json));
  } catch {
    return {};
  }
}
