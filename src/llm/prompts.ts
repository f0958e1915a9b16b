import type { LlmMessage } from './client.js';
import type { ThinkRequest } from './types.js';

export const GENERATION_KEYS = ['twitter_draft', 'article_markdown', 'image_prompt', 'ai_summary'] as const;

const SYSTEM_PROMPT = `你是资深科技内容主编，擅长把 AI/大模型/Agent 复杂信息写成高可读、高信息密度内容。
输出必须真实、具体、可执行，禁止空话套话。
你只返回严格 JSON，不要 markdown 代码块，不要额外解释。
Return strict JSON only with keys: ${GENERATION_KEYS.join(', ')}.`;

const BANNED_PHRASES = ['值得注意的是', '让我们来看一下', '不可否认的是', '随着', '综上所述', '总而言之', '本文旨在'];

const IMAGE_RULES = [
  'image_prompt 必须是英文单行，不超过 420 字符。',
  'image_prompt 结构必须包含: subject, scene, composition, lighting, color palette, style, quality tags。',
  '默认生成科技插画风格，强调 clean composition, high detail, cinematic lighting, professional editorial cover。',
  '如果是技术主题，加入 blueprint/data dashboard/futuristic UI 等可视元素。',
  '禁止在图中出现可读文字、logo、水印，禁止 lowres, blurry, distorted faces。',
];

function isLongform(req: ThinkRequest): boolean {
  return Object.values(req.platform_strategy).some(
    (p) => p.content_format === 'longform' || p.style_prompt === 'longform_deep_analysis',
  );
}

function isCasual(req: ThinkRequest): boolean {
  return Object.values(req.platform_strategy).some((p) => p.style_prompt === 'casual_log_style');
}

export function strategyName(req: ThinkRequest): string {
  const names = Object.keys(req.platform_strategy);
  return names.length > 0 ? names.join(', ') : 'default';
}

export function buildThinkMessages(req: ThinkRequest): LlmMessage[] {
  const writingRules = [
    '写作必须像真人表达，避免机械模板语。',
    '观点要明确，给出判断依据，不只复述事实。',
    '优先保留可核验事实：主体、动作、时间、影响、限制条件。',
    `禁用表达: ${BANNED_PHRASES.join('、')}`,
  ];

  const longform = isLongform(req);
  if (longform) {
    writingRules.push(
      'article_markdown 采用长文结构：开场钩子 -> 事实拆解 -> 技术原理 -> 影响评估 -> 可执行建议。',
      '至少使用 4 个二级标题，段落短小，手机阅读友好。',
      '在适合配图的段落插入 [配图: 描述]，数量 2-4 个，描述具体场景。',
    );
  } else if (isCasual(req)) {
    writingRules.push('article_markdown 采用日志感/口语化风格，可带第一人称观察。', '保持短句和节奏感，不要学术论文腔。');
  }

  const strategyDetail = JSON.stringify(req.platform_strategy).slice(0, 2200);

  const user = `请基于输入生成严格 JSON，键必须且只能是: ${GENERATION_KEYS.join(', ')}。
约束:
- twitter_draft <= 280 字。
- ai_summary <= 240 字。
- article_markdown 需可直接发布，不要解释你在做什么。
- image_prompt 仅英文。

写作规则:
${writingRules.map((r) => `- ${r}`).join('\n')}

生图规则:
${IMAGE_RULES.map((r) => `- ${r}`).join('\n')}

标题: ${req.title}
历史上下文: ${req.history_context || '无'}
平台策略: ${strategyName(req)}
平台策略详情(JSON): ${strategyDetail}
正文: ${req.raw_text.slice(0, 9000)}`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

export function buildRepairPrompt(error: string, rawOutput: string): string {
  return `上一次输出无法解析为要求的 JSON：${error}

原始输出：
${rawOutput.slice(0, 3000)}

请只返回修正后的 JSON，键为: ${GENERATION_KEYS.join(', ')}。`;
}
