import fs from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ArchiveBackend, ContentPackage } from './types.js';
import { dayLabel } from '../shared/utils.js';

export function safeFilePart(value: string, maxLen = 32): string {
  const cleaned = value
    .trim()
    .replace(/[^\p{L}\p{N}_-]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  return cleaned ? Array.from(cleaned).slice(0, maxLen).join('') : 'item';
}

/** Path of the package's document relative to the archive root. */
export function archiveRelativePath(pkg: ContentPackage, now: Date): string {
  const day = dayLabel(now);
  const bucket = pkg.record_type === 'topic' ? 'topic_pool' : 'draft_pool';
  const trace = safeFilePart(pkg.trace_id, 64);
  const title = safeFilePart(pkg.title || 'untitled', 42);
  const name =
    pkg.record_type === 'topic'
      ? `${day}-${trace}-${title}.md`
      : `${day}-${trace}-${safeFilePart(pkg.platform ?? 'general', 24)}-${title}.md`;
  return path.posix.join(day, bucket, name);
}

export function renderMarkdown(pkg: ContentPackage, now: Date): string {
  const header = [`# ${pkg.title || 'Untitled'}`, '', `- Archived At: ${now.toISOString()}`, `- Trace ID: ${pkg.trace_id}`];

  if (pkg.record_type === 'topic') {
    const lines = [
      ...header,
      `- Source: ${pkg.source_info}`,
      `- Source URL: ${pkg.source_url}`,
      `- Suggested Platforms: ${pkg.channels.join(', ')}`,
      '',
      '## 摘要',
      pkg.summary,
      '',
    ];
    if (pkg.related_context) {
      lines.push('## 相关历史', pkg.related_context, '');
    }
    return lines.join('\n');
  }

  const images = (pkg.image_urls ?? []).filter(Boolean);
  const lines = [
    ...header,
    `- Platform: ${pkg.platform ?? 'general'}`,
    `- Source URL: ${pkg.source_url}`,
    '',
    '## AI Summary',
    pkg.summary,
    '',
  ];
  if (pkg.twitter_draft) {
    lines.push('## Twitter Draft', pkg.twitter_draft, '');
  }
  lines.push('## Article', pkg.article_markdown ?? '', '', '## Images');
  lines.push(...(images.length > 0 ? images.map((img) => `- ${img}`) : ['- (none)']));
  lines.push('');
  return lines.join('\n');
}

/**
 * Last-resort backend: one markdown file per package under the archive directory.
 * With a public base URL the document is addressed over HTTP, otherwise by
 * `file://` URL.
 */
export class LocalMarkdownBackend implements ArchiveBackend {
  readonly name = 'local';

  constructor(
    private readonly rootDir: string,
    private readonly publicBaseUrl = '',
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async store(pkg: ContentPackage): Promise<string> {
    const now = this.clock();
    const relative = archiveRelativePath(pkg, now);
    const target = path.join(this.rootDir, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, renderMarkdown(pkg, now), 'utf-8');

    if (this.publicBaseUrl) {
      const encoded = relative.split('/').map(encodeURIComponent).join('/');
      return `${this.publicBaseUrl.replace(/\/+$/, '')}/local-archive/${encoded}`;
    }
    return pathToFileURL(target).href;
  }
}
