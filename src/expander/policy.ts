import type { PlatformRule } from '../rules/schema.js';
import type { PlatformStrategyEntry } from '../llm/types.js';

export const LONGFORM_PLATFORMS: ReadonlySet<string> = new Set(['wechat_blog', 'zhihu', 'juejin']);

export interface DraftPolicy {
  format: 'shortform' | 'longform';
  style: string;
  tone: string;
  ratio: string;
  imageCount: number;
}

const POLICIES: Record<DraftPolicy['format'], DraftPolicy> = {
  longform: {
    format: 'longform',
    style: 'longform_deep_analysis',
    tone: '技术解读、影响分析、科普解释，结构化长文',
    ratio: '3:4',
    imageCount: 3,
  },
  shortform: {
    format: 'shortform',
    style: 'casual_log_style',
    tone: '记录、日志、感慨、口语化交流',
    ratio: '16:9',
    imageCount: 1,
  },
};

/**
 * How a platform's draft is written and illustrated. A `format` in the platform
 * rule wins over the built-in long-form list.
 */
export function draftPolicy(platform: string, rule?: PlatformRule): DraftPolicy {
  const format = rule?.format ?? (LONGFORM_PLATFORMS.has(platform) ? 'longform' : 'shortform');
  return POLICIES[format];
}

export function strategyEntry(policy: DraftPolicy, rule?: PlatformRule): PlatformStrategyEntry {
  return {
    style_prompt: policy.style,
    content_format: policy.format,
    tone: policy.tone,
    ...(rule?.style_prompt ? { user_style_prompt: rule.style_prompt } : {}),
    ...(rule?.min_word_count !== undefined ? { min_word_count: rule.min_word_count } : {}),
  };
}

/** Prompts for each image of a draft; the second and later ask for a variation. */
export function imagePrompts(basePrompt: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => (i === 0 ? basePrompt : `${basePrompt}. variation ${i + 1}`));
}

export function draftSeed(title: string, summary: string, tone: string): string {
  return `${summary || title}\n写作要求：${tone}。必须基于事实，不要杜撰来源；结尾给出明确观点或行动建议。`;
}
