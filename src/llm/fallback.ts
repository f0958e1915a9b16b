import type { ThinkOutput } from './types.js';
import { compactText } from '../shared/utils.js';

const FALLBACK_IMAGE_PROMPT =
  'Tech editorial illustration, AI model operations center, layered data dashboards, ' +
  'isometric composition, cinematic volumetric lighting, blue and cyan palette, ' +
  'clean modern design, ultra detailed, 4k, no text, no watermark';

/**
 * Deterministic draft used when no model is configured or the model call fails.
 * Same input, same output.
 */
export function templateThink(
  title: string,
  rawText: string,
  historyContext: string,
  strategy = 'default',
): ThinkOutput {
  const body = compactText(rawText, 1800);
  const context = compactText(historyContext, 300);
  const summary = compactText(rawText, 160);

  const twitterDraft = `${title}\n关键信息：${summary.slice(0, 120)}\n观点：结合过往讨论，重点看技术落地与成本。`.slice(
    0,
    280,
  );

  const articleMarkdown = [
    `# ${title}`,
    '',
    `## 开场 (${strategy})`,
    summary || '这是一个值得跟进的技术动态，先看结论再看细节。',
    '',
    '## 关键事实拆解',
    body || '暂无正文，建议补充官方信息、性能数据和限制条件。',
    '',
    '[配图: 未来感数据控制台与模型推理流程，可视化图层叠加]',
    '',
    '## 历史关联',
    context || '暂无历史上下文，可对比最近两周同类发布和成本变化。',
    '',
    '## 影响评估',
    '1. 对产品落地：看接入成本、迭代速度和稳定性。',
    '2. 对技术路线：关注模型能力边界和工程复杂度。',
    '3. 对团队协同：明确哪些环节可以自动化、哪些需要人工审核。',
    '',
    '## 可执行建议',
    '1. 跟踪官方文档和 benchmark 更新。',
    '2. 用小范围场景做 A/B 验证，再决定是否全量接入。',
    '3. 记录关键事实与结论，避免重复试错。',
  ].join('\n');

  return {
    twitter_draft: twitterDraft,
    article_markdown: articleMarkdown,
    image_prompt: FALLBACK_IMAGE_PROMPT,
    ai_summary: summary,
  };
}
