import { z } from 'zod';

export interface PlatformStrategyEntry {
  style_prompt: string;
  content_format: 'shortform' | 'longform';
  tone: string;
  user_style_prompt?: string;
  min_word_count?: number;
}

export interface ThinkRequest {
  title: string;
  raw_text: string;
  history_context: string;
  platform_strategy: Record<string, PlatformStrategyEntry>;
}

function text(max?: number) {
  return z.preprocess(
    (value) => (value === null || value === undefined ? '' : String(value)),
    z.string().transform((s) => (max === undefined ? s : s.slice(0, max))),
  );
}

/** Generated fields; limits match what downstream channels accept. */
export const ThinkOutputSchema = z
  .object({
    twitter_draft: text(280),
    article_markdown: text(),
    image_prompt: text(500),
    ai_summary: text(240),
  })
  .refine((out) => out.twitter_draft.trim() !== '' || out.article_markdown.trim() !== '', {
    message: 'twitter_draft and article_markdown are both empty',
  });

export type ThinkOutput = z.infer<typeof ThinkOutputSchema>;

export interface GenerationResult extends ThinkOutput {
  /** Which path produced the text: the model, the built-in template, or a remote worker. */
  engine: 'llm' | 'template' | 'remote';
}

/**
 * Text-generation collaborator. A remote worker failure surfaces as an error; the
 * in-process worker falls back to a deterministic template instead.
 */
export interface GenerationWorker {
  readonly kind: string;
  think(req: ThinkRequest): Promise<GenerationResult>;
}
