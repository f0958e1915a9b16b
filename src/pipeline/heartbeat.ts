import type { FeedWorker, NormalizedItem } from '../source/adapter.js';
import type { Archiver } from '../archive/types.js';
import type { FingerprintStore } from '../memory/fingerprintStore.js';
import type { ContextIndex } from '../memory/contextIndex.js';
import type { Rules, SourceRule } from '../rules/schema.js';
import { scoreSignal } from './filter.js';
import { buildTopicPackage, enabledChannels, topicTraceId } from './topic.js';
import { currentTraceId, newTraceId, runWithTrace } from '../trace/context.js';
import { componentLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';

const log = componentLogger('heartbeat');

export type CycleState = 'idle' | 'scanning' | 'deduping' | 'filtering' | 'archiving' | 'remembering';

export type CycleOutcome = 'completed' | 'failed' | 'skipped';

export interface CycleResult {
  source_id: string;
  outcome: CycleOutcome;
  reason?: string;
  trace_id: string;
  scanned: number;
  processed: number;
  duplicated: number;
  filtered: number;
  failed: number;
  error?: string;
  started_at: string;
  ended_at: string;
}

export interface CycleDeps {
  feed: FeedWorker;
  fingerprints: FingerprintStore;
  context: ContextIndex;
  archiver: Archiver;
}

export function skippedCycle(sourceId: string, reason: string): CycleResult {
  const at = nowISO();
  return {
    source_id: sourceId,
    outcome: 'skipped',
    reason,
    trace_id: '',
    scanned: 0,
    processed: 0,
    duplicated: 0,
    filtered: 0,
    failed: 0,
    started_at: at,
    ended_at: at,
  };
}

/**
 * One heartbeat for one source: scan, drop remembered fingerprints, score, then
 * archive and remember each survivor.
 *
 * A fingerprint is remembered only after its topic is archived, so an archive
 * failure leaves the item eligible for the next cycle. A feed failure fails the
 * whole cycle; any other failure is scoped to its item.
 */
export function runSourceCycle(
  deps: CycleDeps,
  source: SourceRule,
  rules: Rules,
  onState: (state: CycleState) => void = () => {},
): Promise<CycleResult> {
  // The cycle id is also the request id of every item scope beneath it, so the
  // whole cycle is found by one id even when an API request triggered it.
  const cycleId = newTraceId();
  return runWithTrace({ traceId: cycleId, requestId: cycleId }, () => cycle(deps, source, rules, onState));
}

async function cycle(
  deps: CycleDeps,
  source: SourceRule,
  rules: Rules,
  onState: (state: CycleState) => void,
): Promise<CycleResult> {
  const result: CycleResult = {
    source_id: source.id,
    outcome: 'completed',
    trace_id: currentTraceId(),
    scanned: 0,
    processed: 0,
    duplicated: 0,
    filtered: 0,
    failed: 0,
    started_at: nowISO(),
    ended_at: '',
  };
  const claimed = new Set<string>();
  const maxItems = source.max_items ?? rules.global.max_items_per_scan;

  log.info({ source_id: source.id, max_items: maxItems }, 'Heartbeat start');

  try {
    onState('scanning');
    let items: NormalizedItem[];
    try {
      items = (await deps.feed.scan(source, maxItems)).slice(0, maxItems);
    } catch (err) {
      result.outcome = 'failed';
      result.failed += 1;
      result.error = errorMessage(err);
      log.error({ source_id: source.id, error: result.error }, 'Source scan failed');
      return result;
    }
    result.scanned = items.length;

    onState('deduping');
    const fresh: NormalizedItem[] = [];
    for (const item of items) {
      if (claimed.has(item.fingerprint) || !deps.fingerprints.claim(item.fingerprint)) {
        result.duplicated += 1;
        log.debug({ fingerprint: item.fingerprint }, 'Duplicate item skipped');
        continue;
      }
      claimed.add(item.fingerprint);
      fresh.push(item);
    }

    onState('filtering');
    const survivors: NormalizedItem[] = [];
    for (const item of fresh) {
      const signal = scoreSignal(item, rules.global.filter);
      if (signal.score < rules.global.filter.min_score) {
        result.filtered += 1;
        deps.fingerprints.release(item.fingerprint);
        claimed.delete(item.fingerprint);
        log.debug({ fingerprint: item.fingerprint, ...signal }, 'Low-value item filtered');
        continue;
      }
      survivors.push(item);
    }

    const channels = enabledChannels(rules);
    for (const item of survivors) {
      await runWithTrace({ traceId: topicTraceId(item) }, async () => {
        try {
          onState('archiving');
          const related = deps.context.retrieve(item.keywords);
          const topic = buildTopicPackage(item, channels, related.context);
          const receipt = await deps.archiver.archive(topic);

          onState('remembering');
          deps.fingerprints.remember(item.fingerprint, source.id);
          claimed.delete(item.fingerprint);
          deps.context.append({
            fingerprint: item.fingerprint,
            sourceId: source.id,
            title: item.title,
            url: item.url,
            summary: topic.summary,
            keywords: item.keywords,
            archiveUrl: receipt.doc_url,
            imageUrl: item.images[0] ?? '',
          });
          result.processed += 1;
          log.info(
            { fingerprint: item.fingerprint, doc_url: receipt.doc_url, related: related.matchedCount },
            'Topic archived',
          );
        } catch (err) {
          result.failed += 1;
          log.error({ fingerprint: item.fingerprint, error: errorMessage(err) }, 'Item processing failed');
        }
      });
    }
    return result;
  } finally {
    for (const fingerprint of claimed) {
      deps.fingerprints.release(fingerprint);
    }
    result.ended_at = nowISO();
    onState('idle');
    log.info(
      {
        source_id: source.id,
        outcome: result.outcome,
        scanned: result.scanned,
        processed: result.processed,
        duplicated: result.duplicated,
        filtered: result.filtered,
        failed: result.failed,
      },
      'Heartbeat done',
    );
  }
}
