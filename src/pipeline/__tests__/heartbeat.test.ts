import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { FingerprintStore } from '../../memory/fingerprintStore.js';
import { ContextIndex } from '../../memory/contextIndex.js';
import { RulesSchema, type SourceRule } from '../../rules/schema.js';
import { runSourceCycle, type CycleDeps, type CycleState } from '../heartbeat.js';
import type { NormalizedItem } from '../../source/adapter.js';
import type { ArchiveReceipt, ContentPackage } from '../../archive/types.js';
import { currentTrace, runWithTrace } from '../../trace/context.js';
import { LogStore, queryLogs } from '../../trace/logStore.js';
import { attachLogSink, detachLogSink } from '../../shared/logger.js';

const RULES = RulesSchema.parse({
  global: { filter: { min_text_length: 10, min_score: 2, hints: ['agent'] } },
  sources: [{ id: 'blog', url: 'https://example.com/feed.xml' }],
  platforms: { twitter: {}, zhihu: { enabled: false } },
});
const SOURCE: SourceRule = RULES.sources[0] ?? { id: 'blog', type: 'rss', url: '', fetch_interval: '30m', weight: 1, enabled: true };

function item(fingerprint: string, overrides: Partial<NormalizedItem> = {}): NormalizedItem {
  return {
    source_id: 'blog',
    fingerprint,
    title: `Title ${fingerprint}`,
    url: `https://example.com/${fingerprint}`,
    summary: 'summary',
    raw_text: 'long text about agents',
    images: [],
    keywords: ['agents'],
    published_at: null,
    ...overrides,
  };
}

function lowValue(fingerprint: string): NormalizedItem {
  return item(fingerprint, { title: 'Plain', raw_text: 'short' });
}

function receipt(pkg: ContentPackage): ArchiveReceipt {
  return { doc_url: `file:///${pkg.trace_id}.md`, status: 'archived_local', backend: 'local', attempts: [] };
}

let db: Database.Database;
let fingerprints: FingerprintStore;
let context: ContextIndex;

function deps(items: NormalizedItem[] | Error, archive = vi.fn(async (pkg: ContentPackage) => receipt(pkg))) {
  const scan = vi.fn(async (_source: SourceRule, _max: number) => {
    if (items instanceof Error) throw items;
    return items;
  });
  const value: CycleDeps = { feed: { kind: 'fake', scan }, fingerprints, context, archiver: { archive } };
  return { value, scan, archive };
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  fingerprints = new FingerprintStore(db);
  context = new ContextIndex(db);
});

afterEach(() => {
  detachLogSink();
  db.close();
});

describe('runSourceCycle', () => {
  it('archives new high-value items and remembers them', async () => {
    fingerprints.remember('dup0000000', 'blog');
    const { value, archive } = deps([item('abcdef0123'), item('dup0000000'), lowValue('low0000000')]);

    const result = await runSourceCycle(value, SOURCE, RULES);

    expect(result).toMatchObject({
      source_id: 'blog',
      outcome: 'completed',
      scanned: 3,
      processed: 1,
      duplicated: 1,
      filtered: 1,
      failed: 0,
    });
    expect(archive).toHaveBeenCalledTimes(1);
    expect(archive.mock.calls[0]?.[0]).toMatchObject({
      record_type: 'topic',
      trace_id: 'abcdef01',
      channels: ['twitter'],
      status: '待确认',
      source_info: 'blog',
    });
    expect(fingerprints.isDuplicate('abcdef0123')).toBe(true);
    expect(fingerprints.isDuplicate('low0000000')).toBe(false);
    expect(fingerprints.isClaimed('low0000000')).toBe(false);
    expect(context.count()).toBe(1);
  });

  it('walks the cycle states in order', async () => {
    const states: CycleState[] = [];
    await runSourceCycle(deps([item('abcdef0123')]).value, SOURCE, RULES, (s) => states.push(s));
    expect(states).toEqual(['scanning', 'deduping', 'filtering', 'archiving', 'remembering', 'idle']);
  });

  it('does not remember an item whose archive failed, so the next cycle retries it', async () => {
    const archive = vi
      .fn(async (pkg: ContentPackage) => receipt(pkg))
      .mockRejectedValueOnce(new Error('archive down'));
    const { value } = deps([item('abcdef0123'), item('fedcba9876')], archive);

    const first = await runSourceCycle(value, SOURCE, RULES);
    expect(first).toMatchObject({ outcome: 'completed', processed: 1, failed: 1 });
    expect(fingerprints.isDuplicate('abcdef0123')).toBe(false);
    expect(fingerprints.isClaimed('abcdef0123')).toBe(false);

    const second = await runSourceCycle(value, SOURCE, RULES);
    expect(second).toMatchObject({ processed: 1, duplicated: 1, failed: 0 });
    expect(fingerprints.isDuplicate('abcdef0123')).toBe(true);
  });

  it('fails the whole cycle when the feed is down', async () => {
    const states: CycleState[] = [];
    const result = await runSourceCycle(deps(new Error('feed down')).value, SOURCE, RULES, (s) => states.push(s));

    expect(result).toMatchObject({ outcome: 'failed', error: 'feed down', scanned: 0, failed: 1 });
    expect(states).toEqual(['scanning', 'idle']);
  });

  it('caps the scan at the source limit', async () => {
    const source: SourceRule = { ...SOURCE, max_items: 1 };
    const { value, scan } = deps([item('abcdef0123'), item('fedcba9876')]);

    const result = await runSourceCycle(value, source, RULES);

    expect(scan).toHaveBeenCalledWith(source, 1);
    expect(result.scanned).toBe(1);
  });

  it('counts a repeated fingerprint within one scan as a duplicate', async () => {
    const result = await runSourceCycle(deps([item('abcdef0123'), item('abcdef0123')]).value, SOURCE, RULES);
    expect(result).toMatchObject({ processed: 1, duplicated: 1 });
  });

  it('archives under the topic trace id inside the cycle request', async () => {
    let seen: { traceId: string; requestId: string } | undefined;
    const archive = vi.fn(async (pkg: ContentPackage) => {
      seen = currentTrace();
      return receipt(pkg);
    });

    const result = await runSourceCycle(deps([item('abcdef0123')], archive).value, SOURCE, RULES);

    expect(seen).toEqual({ traceId: 'abcdef01', requestId: result.trace_id });
    expect(result.trace_id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('starts its own request scope inside an outer request', async () => {
    let seen: { traceId: string; requestId: string } | undefined;
    const archive = vi.fn(async (pkg: ContentPackage) => {
      seen = currentTrace();
      return receipt(pkg);
    });

    const result = await runWithTrace({ traceId: 'outer', requestId: 'api-req' }, () =>
      runSourceCycle(deps([item('abcdef0123')], archive).value, SOURCE, RULES),
    );

    expect(seen).toEqual({ traceId: 'abcdef01', requestId: result.trace_id });
  });

  it('finds item failures by the cycle trace id', async () => {
    attachLogSink(new LogStore(db));
    const archive = vi.fn(async (pkg: ContentPackage) => receipt(pkg)).mockRejectedValueOnce(new Error('archive down'));

    const result = await runSourceCycle(deps([item('abcdef0123')], archive).value, SOURCE, RULES);

    const logs = queryLogs(db, { traceId: result.trace_id, component: 'heartbeat' });
    expect(logs.map((l) => l.message)).toEqual(['Heartbeat done', 'Item processing failed', 'Heartbeat start']);
    expect(logs[1]).toMatchObject({ trace_id: 'abcdef01', request_id: result.trace_id, level: 'ERROR' });
  });

  it('attaches related prior coverage to the topic', async () => {
    context.append({
      fingerprint: 'old',
      sourceId: 'blog',
      title: 'Earlier agents story',
      url: '',
      summary: 'old coverage',
      keywords: ['agents'],
    });
    const { value, archive } = deps([item('abcdef0123')]);

    await runSourceCycle(value, SOURCE, RULES);

    expect(archive.mock.calls[0]?.[0].related_context).toMatch(/^- Earlier agents story \(.+\): old coverage$/);
  });
});
