/**
 * Tolerant reading of confirmation events. Table integrations disagree on where
 * the record's fields live and on what the columns are called, so each logical
 * field is an ordered list of accepted column names, resolved by first match.
 */

export const FIELD_ALIASES = {
  status: ['状态', '🚦 状态', 'Status', 'status'],
  title: ['原始标题', '📌 原始标题', 'Title', '选题标题', 'title'],
  summary: ['摘要', 'Summary', 'AI 摘要', 'AI摘要', '🤖 AI 摘要', 'AI Summary', '选题摘要', 'summary'],
  sourceUrl: ['来源链接', 'Source URL', '原文链接', '链接', 'source_url'],
  sourceInfo: ['来源', '来源信息', 'Source', 'source_info'],
  traceId: ['Trace ID', 'trace_id', '追踪ID', '追踪 Id'],
  channels: ['发布平台', '发布渠道', '📢 发布渠道', 'Channels', '平台', 'channels'],
} as const satisfies Record<string, readonly string[]>;

export type LogicalField = keyof typeof FIELD_ALIASES;

export const TRIGGER_VOCABULARY: ReadonlySet<string> = new Set([
  '确认',
  '已确认',
  '通过',
  'confirm',
  'confirmed',
  'approved',
  'ready',
  'ready_to_generate',
]);

export const PLATFORM_ALIASES: Readonly<Record<string, string>> = {
  twitter: 'twitter',
  x: 'twitter',
  推特: 'twitter',
  zhihu: 'zhihu',
  知乎: 'zhihu',
  juejin: 'juejin',
  掘金: 'juejin',
  wechat: 'wechat_blog',
  wechat_blog: 'wechat_blog',
  公众号: 'wechat_blog',
  weixin: 'wechat_blog',
  xiaohongshu: 'xiaohongshu',
  xhs: 'xiaohongshu',
  小红书: 'xiaohongshu',
};

const RICH_TEXT_KEYS = ['text', 'name', 'value', 'link', 'url'];

// Containers that may hold `fields`, relative to the event, in lookup order.
const FIELD_PATHS: readonly (readonly string[])[] = [
  [],
  ['record'],
  ['data'],
  ['data', 'record'],
  ['after'],
  ['after', 'record'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Flatten a table cell (string, number, list, rich-text object) to plain text. */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return value
      .map(toText)
      .filter((part) => part !== '')
      .join(', ');
  }
  if (isRecord(value)) {
    for (const key of RICH_TEXT_KEYS) {
      if (key in value) {
        const text = toText(value[key]);
        if (text) return text;
      }
    }
  }
  return '';
}

// An event already in normalized shape carries these keys at its root.
const FLAT_EVENT_KEYS = ['status', 'title'];

/**
 * The `fields` object of the event, or the event itself when it is already flat
 * (`{status, title, channels, ...}`); null when neither is found.
 */
export function extractCallbackFields(payload: unknown): Record<string, unknown> | null {
  if (!isRecord(payload)) return null;
  const nested = payload['event'];
  const event = isRecord(nested) ? nested : payload;

  for (const path of FIELD_PATHS) {
    let node: unknown = event;
    for (const key of path) {
      node = isRecord(node) ? node[key] : undefined;
    }
    const fields = isRecord(node) ? node['fields'] : undefined;
    if (isRecord(fields)) return fields;
  }
  return FLAT_EVENT_KEYS.some((key) => key in event) ? event : null;
}

export function fieldByAliases(fields: Record<string, unknown>, field: LogicalField): unknown {
  for (const alias of FIELD_ALIASES[field]) {
    if (alias in fields) return fields[alias];
  }
  return undefined;
}

export function isTriggerStatus(value: unknown): boolean {
  return TRIGGER_VOCABULARY.has(toText(value).toLowerCase());
}

export function normalizePlatform(value: string): string {
  const raw = value.trim().toLowerCase();
  return PLATFORM_ALIASES[raw] ?? raw;
}

/**
 * Requested platforms in order, aliases resolved and duplicates dropped. A text
 * cell is split on `, ， / \ |`; option objects contribute their name.
 */
export function normalizePlatforms(value: unknown): string[] {
  let rawItems: unknown[];
  if (Array.isArray(value)) {
    rawItems = value;
  } else if (typeof value === 'string') {
    rawItems = value.split(/[,，/\\|]/);
  } else if (isRecord(value)) {
    rawItems = Object.values(value);
  } else {
    rawItems = [];
  }

  const platforms: string[] = [];
  for (const item of rawItems) {
    const platform = normalizePlatform(toText(item));
    if (platform && !platforms.includes(platform)) platforms.push(platform);
  }
  return platforms;
}

/** `[#abc123]` tag carried in a topic title. */
export function traceTagFromTitle(title: string): string {
  return /\[#([\p{L}\p{N}_-]+)\]/u.exec(title)?.[1] ?? '';
}

export interface ConfirmationFields {
  status: string;
  title: string;
  summary: string;
  sourceUrl: string;
  sourceInfo: string;
  traceId: string;
  platforms: string[];
}

export function readConfirmationFields(fields: Record<string, unknown>): ConfirmationFields {
  const title = toText(fieldByAliases(fields, 'title'));
  return {
    status: toText(fieldByAliases(fields, 'status')),
    title,
    summary: toText(fieldByAliases(fields, 'summary')),
    sourceUrl: toText(fieldByAliases(fields, 'sourceUrl')),
    sourceInfo: toText(fieldByAliases(fields, 'sourceInfo')),
    traceId: toText(fieldByAliases(fields, 'traceId')) || traceTagFromTitle(title),
    platforms: normalizePlatforms(fieldByAliases(fields, 'channels')),
  };
}
