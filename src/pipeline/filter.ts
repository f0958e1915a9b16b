import type { NormalizedItem } from '../source/adapter.js';
import type { FilterRule } from '../rules/schema.js';

export interface SignalScore {
  score: number;
  long_enough: boolean;
  has_images: boolean;
  hint: string | null;
}

/**
 * One point each for enough body text, at least one image and a hint word in the
 * title or text. No model call happens here.
 */
export function scoreSignal(item: NormalizedItem, filter: FilterRule): SignalScore {
  const text = item.raw_text || item.summary;
  const longEnough = text.trim().length >= filter.min_text_length;
  const hasImages = item.images.length > 0;

  const haystack = `${item.title}\n${text}`.toLowerCase();
  const hint = filter.hints.find((h) => h.trim() && haystack.includes(h.trim().toLowerCase())) ?? null;

  return {
    score: Number(longEnough) + Number(hasImages) + Number(hint !== null),
    long_enough: longEnough,
    has_images: hasImages,
    hint,
  };
}

export function isHighValue(item: NormalizedItem, filter: FilterRule): boolean {
  return scoreSignal(item, filter).score >= filter.min_score;
}
