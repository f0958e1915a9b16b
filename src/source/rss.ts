import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import Parser from 'rss-parser';
import type { FeedWorker, NormalizedItem } from './adapter.js';
import { itemFingerprint } from './dedup.js';
import type { SourceRule } from '../rules/schema.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { getText, type HttpOptions } from '../shared/http.js';
import { componentLogger } from '../shared/logger.js';
import { extractTokens } from '../shared/utils.js';

const log = componentLogger('feed');

const AD_WORDS = ['广告', '招聘', '欢迎关注', '点击原文', '推广', '商务合作'];
const URL_ONLY = /^https?:\/\/\S+$/;
const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

const MAX_TITLE = 300;
const MAX_SUMMARY = 180;
const MAX_RAW_TEXT = 12000;
const MAX_IMAGES = 6;
const MAX_KEYWORDS = 8;

interface FeedEntryExtras {
  contentEncoded?: string;
  summary?: string;
}

const parser: Parser<Record<string, unknown>, FeedEntryExtras> = new Parser({
  customFields: {
    item: [['content:encoded', 'contentEncoded'], 'summary'],
  },
});

export function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

/**
 * HTML fragment to plain text, one line per block element.
 */
export function cleanText(raw: string): string {
  const text = decodeEntities(raw).trim();
  if (!text || URL_ONLY.test(text)) return text;
  if (!text.includes('<') && !text.includes('>')) return text;

  const stripped = text
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6]|blockquote|section|tr)>/gi, '\n')
    .replace(/<[^>]+>/g, ' ');

  return decodeEntities(stripped)
    .split('\n')
    .map((line) => line.replace(/[ \t\r\f\v]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

export function extractImages(html: string): string[] {
  const result: string[] = [];
  for (const match of html.matchAll(/<img\b[^>]*\bsrc\s*=\s*["']([^"']+)["']/gi)) {
    const src = match[1]?.trim();
    if (src) result.push(src);
  }
  return result;
}

/** Empty, link-only and promotional entries carry nothing worth a topic. */
export function isNoise(title: string, text: string): boolean {
  const plain = text.replace(/\n/g, ' ').trim();
  if (!plain) return true;
  if (URL_ONLY.test(plain) || URL_ONLY.test(title.trim())) return true;
  if (AD_WORDS.some((word) => plain.includes(word))) return true;
  const lower = plain.toLowerCase();
  return lower.startsWith('http://') || lower.startsWith('https://');
}

/**
 * In-process feed collaborator: fetches an RSS or Atom document over http(s) or
 * from a `file://` path and turns its entries into normalized items.
 */
export class LocalFeedWorker implements FeedWorker {
  readonly kind = 'local';

  constructor(private readonly http: HttpOptions) {}

  async scan(source: SourceRule, maxItems: number): Promise<NormalizedItem[]> {
    const xml = await this.fetchFeed(source);

    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(xml);
    } catch (err) {
      throw new SourceError(`Feed from ${source.id} is not valid RSS or Atom`, {
        source_id: source.id,
        cause: errorMessage(err),
      });
    }

    const items: NormalizedItem[] = [];
    for (const entry of feed.items) {
      if (items.length >= maxItems) break;

      const title = (entry.title ?? '').replace(/\s+/g, ' ').trim().slice(0, MAX_TITLE);
      if (!title) continue;
      const link = (entry.link ?? '').trim();

      const bodyHtml = entry.contentEncoded ?? '';
      const teaserHtml = entry.content ?? entry.summary ?? '';
      const rawText = cleanText(bodyHtml) || cleanText(teaserHtml) || title;
      if (isNoise(title, rawText)) continue;

      const images = extractImages(bodyHtml);
      if (images.length === 0) images.push(...extractImages(teaserHtml));
      if (images.length === 0 && entry.enclosure?.type?.startsWith('image/')) {
        images.push(entry.enclosure.url);
      }

      const publishedAt = entry.isoDate ?? entry.pubDate ?? null;
      items.push({
        source_id: source.id,
        fingerprint: itemFingerprint(link, title, publishedAt),
        title,
        url: link,
        summary: (rawText.split('\n')[0] ?? '').slice(0, MAX_SUMMARY),
        raw_text: rawText.slice(0, MAX_RAW_TEXT),
        images: images.slice(0, MAX_IMAGES),
        keywords: extractTokens(`${title} ${rawText}`, MAX_KEYWORDS),
        published_at: publishedAt,
      });
    }

    log.debug({ source_id: source.id, count: items.length }, 'Feed scanned');
    return items;
  }

  private async fetchFeed(source: SourceRule): Promise<string> {
    try {
      if (source.url.startsWith('file://')) {
        return await fs.readFile(fileURLToPath(source.url), 'utf-8');
      }
      return await getText(source.url, this.http, FEED_ACCEPT);
    } catch (err) {
      throw new SourceError(`Feed fetch failed for ${source.id}: ${errorMessage(err)}`, {
        source_id: source.id,
        url: source.url,
      });
    }
  }
}
