import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { PackageRepository } from '../../archive/repository.js';
import { ArchiveService } from '../../archive/service.js';
import type { ArchiveBackend, ContentPackage } from '../../archive/types.js';
import { ContextIndex } from '../../memory/contextIndex.js';
import { RulesSchema, type Rules } from '../../rules/schema.js';
import type { GenerationResult, ThinkRequest } from '../../llm/types.js';
import { currentTraceId, runWithTrace } from '../../trace/context.js';
import { ANTI_REPEAT_HEADER, DraftExpander } from '../draftExpander.js';

type ThinkFn = (req: ThinkRequest) => Promise<GenerationResult>;
type PaintFn = (prompt: string, ratio: string) => Promise<string>;
type StoreFn = (pkg: ContentPackage) => Promise<string>;

const OUTPUT: GenerationResult = {
  twitter_draft: 'short copy',
  article_markdown: '# article',
  image_prompt: 'robot',
  ai_summary: 'ai sum',
  engine: 'template',
};

function event(fields: Record<string, unknown>) {
  return { event: { record: { fields } } };
}

const CONFIRMED = event({
  状态: '确认',
  原始标题: 'Agent toolkit released',
  摘要: 'what happened',
  来源链接: 'https://example.com/p',
  来源: 'blog',
  'Trace ID': 't1',
  发布平台: 'twitter, 知乎',
});

let db: Database.Database;
let packages: PackageRepository;
let think: Mock<ThinkFn>;
let paint: Mock<PaintFn>;
let store: Mock<StoreFn>;
let rules: Rules;
let expander: DraftExpander;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  packages = new PackageRepository(db);
  think = vi.fn<ThinkFn>(async () => OUTPUT);
  paint = vi.fn<PaintFn>(async (prompt, ratio) => `https://img.local/${ratio}/${encodeURIComponent(prompt)}`);
  store = vi.fn<StoreFn>(async (pkg) => `file:///${pkg.trace_id}.md`);
  const backend: ArchiveBackend = { name: 'local', store };
  rules = RulesSchema.parse({});
  expander = new DraftExpander({
    generator: { kind: 'fake', think },
    images: { kind: 'fake', paint },
    archiver: new ArchiveService([backend], packages),
    packages,
    context: new ContextIndex(db),
    rules: () => rules,
  });
});

afterEach(() => {
  db.close();
});

describe('DraftExpander.onConfirmationEvent', () => {
  it('echoes the verification challenge without side effects', async () => {
    const result = await expander.onConfirmationEvent({ type: 'url_verification', challenge: 'test-challenge' });

    expect(result).toEqual({ status: 'challenge', challenge: 'test-challenge' });
    expect(think).not.toHaveBeenCalled();
    expect(store).not.toHaveBeenCalled();
  });

  it('ignores events without fields', async () => {
    expect(await expander.onConfirmationEvent({ event: {} })).toEqual({
      status: 'ignored',
      reason: 'fields_not_found',
    });
  });

  it('ignores a status outside the trigger vocabulary', async () => {
    const result = await expander.onConfirmationEvent(event({ 状态: '待确认', 原始标题: 'T', 发布平台: 'twitter' }));

    expect(result).toEqual({ status: 'ignored', reason: 'status_not_confirmed' });
    expect(think).not.toHaveBeenCalled();
    expect(store).not.toHaveBeenCalled();
  });

  it('rejects a confirmed topic without title or channels', async () => {
    expect(await expander.onConfirmationEvent(event({ Status: 'approved', 发布平台: 'twitter' }))).toEqual({
      status: 'rejected',
      reason: 'missing_title',
    });
    expect(await expander.onConfirmationEvent(event({ Status: 'approved', Title: 'T' }))).toEqual({
      status: 'rejected',
      reason: 'missing_channels',
    });
    expect(think).not.toHaveBeenCalled();
  });

  it('generates one draft per platform under derived trace ids', async () => {
    const result = await expander.onConfirmationEvent(CONFIRMED);

    expect(result).toMatchObject({ status: 'ok', trace_id: 't1', generated: 2, failed: 0, skipped: 0 });
    if (result.status !== 'ok') return;
    expect(result.results).toEqual([
      {
        platform: 'twitter',
        trace_id: 't1-twitter',
        outcome: 'generated',
        archive_status: 'archived_local',
        doc_url: 'file:///t1-twitter.md',
        backend: 'local',
        engine: 'template',
        image_count: 1,
      },
      {
        platform: 'zhihu',
        trace_id: 't1-zhihu',
        outcome: 'generated',
        archive_status: 'archived_local',
        doc_url: 'file:///t1-zhihu.md',
        backend: 'local',
        engine: 'template',
        image_count: 3,
      },
    ]);
    expect(packages.list({ traceId: 't1', recordType: 'draft' }).map((r) => r.trace_id).sort()).toEqual([
      't1-twitter',
      't1-zhihu',
    ]);
  });

  it('accepts a flat event with normalized field names', async () => {
    const result = await expander.onConfirmationEvent({
      status: 'confirmed',
      title: 'X Released',
      channels: ['A', 'B'],
      trace_id: 't1',
    });

    expect(result).toMatchObject({ status: 'ok', trace_id: 't1', generated: 2, failed: 0, skipped: 0 });
    if (result.status !== 'ok') return;
    expect(result.results.map((r) => r.trace_id)).toEqual(['t1-a', 't1-b']);
  });

  it('keeps platforms in other scripts apart', async () => {
    const result = await expander.onConfirmationEvent(
      event({ 状态: '确认', 原始标题: 'Launch', 'Trace ID': 't1', 发布平台: '微博, 抖音' }),
    );

    expect(result).toMatchObject({ status: 'ok', generated: 2, skipped: 0 });
    if (result.status !== 'ok') return;
    expect(result.results.map((r) => r.trace_id)).toEqual(['t1-微博', 't1-抖音']);
    expect(packages.hasTrace('t1-微博', 'draft')).toBe(true);
    expect(packages.hasTrace('t1-抖音', 'draft')).toBe(true);

    await expander.onConfirmationEvent(event({ 状态: '确认', 原始标题: 'Other', 'Trace ID': 't2', 发布平台: '微博' }));
    const next = await expander.onConfirmationEvent(
      event({ 状态: '确认', 原始标题: 'Other', 'Trace ID': 't2', 发布平台: '抖音' }),
    );
    expect(next).toMatchObject({ status: 'ok', generated: 1, skipped: 0 });
  });

  it('marks only the platform failed when the draft lookup throws', async () => {
    const hasTrace = packages.hasTrace.bind(packages);
    vi.spyOn(packages, 'hasTrace').mockImplementation((traceId, recordType) => {
      if (traceId === 't1-zhihu') throw new Error('database is locked');
      return hasTrace(traceId, recordType);
    });

    const result = await expander.onConfirmationEvent(CONFIRMED);

    expect(result).toMatchObject({ status: 'ok', generated: 1, failed: 1 });
    if (result.status !== 'ok') return;
    expect(result.results[1]).toEqual({
      platform: 'zhihu',
      trace_id: 't1-zhihu',
      outcome: 'failed',
      error: 'database is locked',
    });
  });

  it('illustrates short-form wide and long-form tall', async () => {
    await expander.onConfirmationEvent(CONFIRMED);

    const calls = paint.mock.calls.map(([prompt, ratio]) => `${ratio} ${prompt}`).sort();
    expect(calls).toEqual(['16:9 robot', '3:4 robot', '3:4 robot. variation 2', '3:4 robot. variation 3']);
  });

  it('assembles the draft package', async () => {
    await expander.onConfirmationEvent(event({ Status: 'ready', Title: 'Launch', 'Trace ID': 't9', Channels: 'x' }));

    expect(store.mock.calls[0]?.[0]).toEqual({
      record_type: 'draft',
      trace_id: 't9-twitter',
      parent_trace_id: 't9',
      title: 'Launch',
      summary: 'ai sum',
      source_id: 'confirmation_callback',
      source_info: 'confirmation_callback',
      source_url: '',
      channels: ['twitter'],
      status: '草稿完成',
      platform: 'twitter',
      twitter_draft: 'short copy',
      article_markdown: '# article',
      image_prompt: 'robot',
      image_urls: ['https://img.local/16:9/robot'],
      style: 'casual_log_style',
      engine: 'template',
    });
  });

  it('isolates a failing platform', async () => {
    think.mockImplementation(async (req) => {
      if ('zhihu' in req.platform_strategy) throw new Error('model down');
      return OUTPUT;
    });

    const result = await expander.onConfirmationEvent(CONFIRMED);

    expect(result).toMatchObject({ status: 'ok', generated: 1, failed: 1 });
    if (result.status !== 'ok') return;
    expect(result.results[1]).toEqual({
      platform: 'zhihu',
      trace_id: 't1-zhihu',
      outcome: 'failed',
      error: 'model down',
    });
    expect(packages.list({ recordType: 'draft' }).map((r) => r.trace_id)).toEqual(['t1-twitter']);
  });

  it('records an image failure against its platform only', async () => {
    paint.mockImplementation(async (_prompt, ratio) => {
      if (ratio === '3:4') throw new Error('painter down');
      return 'https://img.local/ok.png';
    });

    const result = await expander.onConfirmationEvent(CONFIRMED);

    expect(result).toMatchObject({ status: 'ok', generated: 1, failed: 1 });
  });

  it('skips platforms already generated unless forced', async () => {
    await expander.onConfirmationEvent(CONFIRMED);
    const repeat = await expander.onConfirmationEvent(CONFIRMED);

    expect(repeat).toMatchObject({ status: 'ok', generated: 0, skipped: 2 });
    if (repeat.status !== 'ok') return;
    expect(repeat.results.map((r) => r.reason)).toEqual(['already_generated', 'already_generated']);
    expect(think).toHaveBeenCalledTimes(2);

    const forced = await expander.onConfirmationEvent(CONFIRMED, { force: true });
    expect(forced).toMatchObject({ status: 'ok', generated: 2 });
    expect(think).toHaveBeenCalledTimes(4);
  });

  it('skips platforms already being generated by a concurrent delivery', async () => {
    const first = expander.onConfirmationEvent(CONFIRMED);
    const second = await expander.onConfirmationEvent(CONFIRMED);

    expect(second).toMatchObject({ status: 'ok', generated: 0, skipped: 2 });
    if (second.status === 'ok') {
      expect(second.results.map((r) => r.reason)).toEqual(['in_progress', 'in_progress']);
    }
    expect(await first).toMatchObject({ generated: 2 });
  });

  it('skips platforms disabled in the rules', async () => {
    rules = RulesSchema.parse({ platforms: { zhihu: { enabled: false } } });

    const result = await expander.onConfirmationEvent(CONFIRMED);

    expect(result).toMatchObject({ generated: 1, skipped: 1 });
  });

  it('generates under the draft trace id', async () => {
    const seen: string[] = [];
    think.mockImplementation(async () => {
      seen.push(currentTraceId());
      return OUTPUT;
    });

    await expander.onConfirmationEvent(CONFIRMED);

    expect(seen.sort()).toEqual(['t1-twitter', 't1-zhihu']);
  });

  it('uses the request trace id when the topic carries none', async () => {
    const result = await runWithTrace({ traceId: 'req123' }, () =>
      expander.onConfirmationEvent(event({ Status: 'confirmed', Title: 'Launch', Channels: 'twitter' })),
    );

    expect(result).toMatchObject({ status: 'ok', trace_id: 'req123' });
    expect(packages.hasTrace('req123-twitter', 'draft')).toBe(true);
  });

  it('passes prior drafts as anti-repetition context', async () => {
    packages.record(
      {
        record_type: 'draft',
        trace_id: 'old-twitter',
        title: 'Agent toolkit recap',
        summary: '',
        source_id: 'confirmation_callback',
        source_info: 'blog',
        source_url: '',
        channels: ['twitter'],
        status: '草稿完成',
        platform: 'twitter',
        article_markdown: 'old body',
      },
      { doc_url: 'file:///old.md', status: 'archived_local', backend: 'local', attempts: [] },
    );

    await expander.onConfirmationEvent(
      event({ Status: 'confirmed', Title: 'Agent toolkit released', Channels: 'twitter', 'Trace ID': 't2' }),
    );

    const req = think.mock.calls[0]?.[0];
    expect(req?.history_context).toBe(`${ANTI_REPEAT_HEADER}- Agent toolkit recap: old body`);
    expect(req?.raw_text).toBe(
      'Agent toolkit released\n写作要求：记录、日志、感慨、口语化交流。必须基于事实，不要杜撰来源；结尾给出明确观点或行动建议。',
    );
    expect(req?.platform_strategy).toEqual({
      twitter: { style_prompt: 'casual_log_style', content_format: 'shortform', tone: '记录、日志、感慨、口语化交流' },
    });
  });
});
