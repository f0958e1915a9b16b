import type { NormalizedItem } from '../source/adapter.js';
import type { ContentPackage } from '../archive/types.js';
import type { Rules } from '../rules/schema.js';

export const TOPIC_STATUS = '待确认';
export const DEFAULT_CHANNELS = ['twitter', 'wechat_blog'];

/**
 * Human-facing label for a source id: `twitter_openai_live` → `twitter-openai`,
 * `wechat_ai_daily` → `wechat-ai_daily`, `xhs_tech` → `xiaohongshu-xhs_tech`.
 */
export function sourceInfoFromSourceId(sourceId: string): string {
  const raw = sourceId.trim().toLowerCase();
  if (!raw) return 'unknown-unknown';

  if (raw.startsWith('twitter_')) {
    return `twitter-${raw.slice('twitter_'.length).replace('_live', '')}`;
  }
  if (raw.startsWith('wechat_')) {
    return `wechat-${raw.slice('wechat_'.length).replace('_live', '')}`;
  }
  if (raw.startsWith('xhs_') || raw.includes('xiaohongshu')) {
    return `xiaohongshu-${raw.replace('_live', '')}`;
  }
  return raw;
}

/** Enabled platform names, in rules order. */
export function enabledChannels(rules: Rules): string[] {
  const names = Object.entries(rules.platforms)
    .filter(([, policy]) => policy.enabled)
    .map(([name]) => name);
  return names.length > 0 ? names : [...DEFAULT_CHANNELS];
}

/** Topic trace id: the first eight characters of the fingerprint. */
export function topicTraceId(item: NormalizedItem): string {
  return item.fingerprint.slice(0, 8) || item.source_id;
}

export function buildTopicPackage(
  item: NormalizedItem,
  channels: string[],
  relatedContext = '',
): ContentPackage {
  return {
    record_type: 'topic',
    trace_id: topicTraceId(item),
    title: item.title,
    summary: (item.summary || item.raw_text).slice(0, 240),
    source_id: item.source_id,
    source_info: sourceInfoFromSourceId(item.source_id),
    source_url: item.url,
    channels,
    status: TOPIC_STATUS,
    keywords: item.keywords,
    images: item.images.slice(0, 3),
    ...(relatedContext ? { related_context: relatedContext } : {}),
  };
}
