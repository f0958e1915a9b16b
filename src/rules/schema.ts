import { z } from 'zod';

export const SCHEDULE_RE = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const FilterSchema = z.object({
  min_text_length: z.number().int().min(0).default(220),
  min_score: z.number().int().min(0).max(3).default(2),
  hints: z
    .array(z.string())
    .default(['发布', '开源', '上线', 'agent', 'benchmark', 'paper', '模型', '融资', 'sota']),
});

export const SourceRuleSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]+$/, 'source id may only contain letters, digits, _ and -'),
  type: z.literal('rss').default('rss'),
  url: z
    .string()
    .refine((u) => /^(https?|file):\/\//.test(u), 'url must be http(s):// or file://'),
  // "<n>m", "<n>h" or a five-field cron expression
  fetch_interval: z.string().default('30m'),
  weight: z.number().default(1),
  max_items: z.number().int().positive().optional(),
  enabled: z.boolean().default(true),
});

export const PlatformRuleSchema = z.object({
  enabled: z.boolean().default(true),
  style_prompt: z.string().default(''),
  format: z.enum(['shortform', 'longform']).optional(),
  schedule: z.string().regex(SCHEDULE_RE, 'schedule must be HH:MM').optional(),
  max_posts_per_day: z.number().int().positive().optional(),
  min_word_count: z.number().int().min(0).optional(),
});

export const RulesSchema = z
  .object({
    global: z
      .object({
        timezone: z.string().default('Asia/Shanghai'),
        memory_retention_days: z.number().int().min(0).default(30),
        max_items_per_scan: z.number().int().positive().default(5),
        filter: FilterSchema.default({}),
      })
      .default({}),
    sources: z.array(SourceRuleSchema).default([]),
    platforms: z.record(PlatformRuleSchema).default({}),
    visual: z
      .object({
        default_style: z.string().default('editorial illustration'),
        default_ratio: z.string().default('16:9'),
      })
      .default({}),
  })
  .superRefine((rules, ctx) => {
    const seen = new Set<string>();
    rules.sources.forEach((source, i) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', i, 'id'],
          message: `duplicate source id "${source.id}"`,
        });
      }
      seen.add(source.id);
    });
  });

export type Rules = z.infer<typeof RulesSchema>;
export type SourceRule = z.infer<typeof SourceRuleSchema>;
export type PlatformRule = z.infer<typeof PlatformRuleSchema>;
export type FilterRule = z.infer<typeof FilterSchema>;
