import type Database from 'better-sqlite3';
import { ValidationError } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';

const log = componentLogger('memory');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FingerprintRecord {
  fingerprint: string;
  source_id: string;
  first_seen_at: string;
}

/**
 * Dedup ledger. A stored fingerprint means the item was archived; absence means
 * it is eligible.
 *
 * `claim` closes the check-then-act window for callers inside this process: a
 * fingerprint can be claimed by one cycle at a time, and stays claimed until it
 * is either remembered or released. Across processes the ledger is best-effort,
 * but `INSERT OR IGNORE` keeps it free of duplicate rows.
 */
export class FingerprintStore {
  private readonly inFlight = new Set<string>();

  constructor(private readonly db: Database.Database) {}

  isDuplicate(fingerprint: string): boolean {
    const row = this.db
      .prepare('SELECT 1 AS hit FROM fingerprints WHERE fingerprint = ? LIMIT 1')
      .get(fingerprint);
    return row !== undefined;
  }

  /** True when this caller now owns the fingerprint for processing. */
  claim(fingerprint: string): boolean {
    if (this.inFlight.has(fingerprint) || this.isDuplicate(fingerprint)) return false;
    this.inFlight.add(fingerprint);
    return true;
  }

  release(fingerprint: string): void {
    this.inFlight.delete(fingerprint);
  }

  isClaimed(fingerprint: string): boolean {
    return this.inFlight.has(fingerprint);
  }

  /**
   * Insert-if-absent. Returns whether a row was written; a repeat call is a no-op.
   */
  remember(fingerprint: string, sourceId: string, now: Date = new Date()): boolean {
    try {
      const result = this.db
        .prepare(
          'INSERT OR IGNORE INTO fingerprints (fingerprint, source_id, first_seen_at) VALUES (?, ?, ?)',
        )
        .run(fingerprint, sourceId, nowISO(now));
      return result.changes > 0;
    } finally {
      this.inFlight.delete(fingerprint);
    }
  }

  get(fingerprint: string): FingerprintRecord | undefined {
    return this.db
      .prepare('SELECT fingerprint, source_id, first_seen_at FROM fingerprints WHERE fingerprint = ?')
      .get(fingerprint) as FingerprintRecord | undefined;
  }

  /**
   * Remove records first seen at or before `now - retentionDays`. The cutoff is
   * fixed before the delete runs, so rows written during the sweep survive it.
   */
  sweep(retentionDays: number, now: Date = new Date()): number {
    if (!Number.isFinite(retentionDays) || retentionDays < 0) {
      throw new ValidationError('retention_days must be a non-negative number', { retentionDays });
    }
    const cutoff = nowISO(new Date(now.getTime() - retentionDays * DAY_MS));
    const result = this.db.prepare('DELETE FROM fingerprints WHERE first_seen_at <= ?').run(cutoff);
    log.info({ retention_days: retentionDays, cutoff, removed: result.changes }, 'Fingerprint sweep done');
    return result.changes;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM fingerprints').get() as { n: number };
    return row.n;
  }
}
