import { z } from 'zod';
import type { SourceRule } from '../rules/schema.js';

/**
 * One cleaned feed entry. Produced per scan and consumed once; only its
 * fingerprint and derived summary outlive the cycle.
 */
export interface NormalizedItem {
  source_id: string;
  /** sha256 of the canonical URL */
  fingerprint: string;
  title: string;
  url: string;
  summary: string;
  raw_text: string;
  images: string[];
  keywords: string[];
  published_at: string | null;
}

/**
 * Wire shape of an item returned by a remote feed worker. Remote workers name the
 * fingerprint `url_hash`.
 */
export const WireItemSchema = z
  .object({
    source_id: z.string(),
    url_hash: z.string().min(1),
    title: z.string(),
    url: z.string(),
    summary: z.string().default(''),
    raw_text: z.string().default(''),
    published_at: z.string().nullish(),
    images: z.array(z.string()).default([]),
    keywords: z.array(z.string()).default([]),
  })
  .transform(
    ({ url_hash, published_at, ...rest }): NormalizedItem => ({
      ...rest,
      fingerprint: url_hash,
      published_at: published_at ?? null,
    }),
  );

/**
 * Feed collaborator: given a source descriptor, return at most `maxItems`
 * normalized items. A failure here fails the whole cycle for that source.
 */
export interface FeedWorker {
  readonly kind: string;
  scan(source: SourceRule, maxItems: number): Promise<NormalizedItem[]>;
}
