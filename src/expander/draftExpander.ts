import type { Archiver, ContentPackage } from '../archive/types.js';
import type { PackageRepository } from '../archive/repository.js';
import type { ContextIndex } from '../memory/contextIndex.js';
import type { GenerationWorker } from '../llm/types.js';
import type { ImageWorker } from '../image/painter.js';
import type { Rules } from '../rules/schema.js';
import { extractCallbackFields, isTriggerStatus, readConfirmationFields, type ConfirmationFields } from './fields.js';
import { draftPolicy, draftSeed, imagePrompts, strategyEntry } from './policy.js';
import { currentTraceId, deriveTraceId, newTraceId, normalizeId, runWithTrace } from '../trace/context.js';
import { componentLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { extractTokens } from '../shared/utils.js';

const log = componentLogger('expander');

export const DRAFT_STATUS = '草稿完成';
export const ANTI_REPEAT_HEADER = '以下是历史草稿片段，请避免重复视角和重复句式：\n';
const RELATED_HEADER = '已覆盖的相关选题：\n';
const CALLBACK_SOURCE_ID = 'confirmation_callback';

export interface ExpanderDeps {
  generator: GenerationWorker;
  images: ImageWorker;
  archiver: Archiver;
  packages: PackageRepository;
  context: ContextIndex;
  /** Current rules; read per event so a reload takes effect immediately. */
  rules: () => Rules;
}

export interface ExpandOptions {
  /** Regenerate platforms whose draft already exists. */
  force?: boolean;
}

export type PlatformOutcome = 'generated' | 'skipped' | 'failed';

export interface PlatformResult {
  platform: string;
  trace_id: string;
  outcome: PlatformOutcome;
  archive_status?: string;
  doc_url?: string;
  backend?: string;
  engine?: string;
  image_count?: number;
  reason?: string;
  error?: string;
}

export type ConfirmationResult =
  | { status: 'challenge'; challenge: string }
  | { status: 'ignored'; reason: 'fields_not_found' | 'status_not_confirmed' }
  | { status: 'rejected'; reason: 'missing_title' | 'missing_channels' }
  | {
      status: 'ok';
      trace_id: string;
      generated: number;
      failed: number;
      skipped: number;
      results: PlatformResult[];
    };

function handshakeChallenge(payload: unknown): string | null {
  if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) return null;
  if (!('type' in payload) || payload.type !== 'url_verification') return null;
  return 'challenge' in payload && typeof payload.challenge === 'string' ? payload.challenge : '';
}

/**
 * Turns a confirmed topic into one draft per requested platform.
 *
 * Platforms run concurrently and fail independently: a platform's generation,
 * image or archive failure is recorded in its own result entry and the call
 * still succeeds. A draft is addressed by `<topic trace id>-<platform>`; a
 * platform whose draft already exists, or is being generated right now, is
 * skipped unless `force` is set.
 */
export class DraftExpander {
  private readonly inFlight = new Set<string>();

  constructor(private readonly deps: ExpanderDeps) {}

  async onConfirmationEvent(payload: unknown, options: ExpandOptions = {}): Promise<ConfirmationResult> {
    const challenge = handshakeChallenge(payload);
    if (challenge !== null) {
      log.info('Verification handshake answered');
      return { status: 'challenge', challenge };
    }

    const raw = extractCallbackFields(payload);
    if (!raw) {
      log.debug('Callback without fields ignored');
      return { status: 'ignored', reason: 'fields_not_found' };
    }

    const fields = readConfirmationFields(raw);
    if (!isTriggerStatus(fields.status)) {
      log.debug({ status: fields.status }, 'Callback status is not a trigger');
      return { status: 'ignored', reason: 'status_not_confirmed' };
    }
    if (!fields.title) {
      log.warn('Confirmed topic has no title');
      return { status: 'rejected', reason: 'missing_title' };
    }
    if (fields.platforms.length === 0) {
      log.warn({ title: fields.title }, 'Confirmed topic has no channels');
      return { status: 'rejected', reason: 'missing_channels' };
    }

    const topicTraceId = normalizeId(fields.traceId) || currentTraceId() || newTraceId();
    return runWithTrace({ traceId: topicTraceId }, async (): Promise<ConfirmationResult> => {
      log.info({ platforms: fields.platforms, force: options.force ?? false }, 'Expanding confirmed topic');
      const results = await Promise.all(
        fields.platforms.map((platform) => this.expandPlatform(fields, topicTraceId, platform, options)),
      );
      const count = (outcome: PlatformOutcome) => results.filter((r) => r.outcome === outcome).length;
      const summary = {
        generated: count('generated'),
        failed: count('failed'),
        skipped: count('skipped'),
      };
      log.info(summary, 'Expansion done');
      return { status: 'ok', trace_id: topicTraceId, ...summary, results };
    });
  }

  private async expandPlatform(
    fields: ConfirmationFields,
    topicTraceId: string,
    platform: string,
    options: ExpandOptions,
  ): Promise<PlatformResult> {
    const traceId = deriveTraceId(topicTraceId, platform);
    const base = { platform, trace_id: traceId };
    if (this.inFlight.has(traceId)) {
      return { ...base, outcome: 'skipped', reason: 'in_progress' };
    }

    this.inFlight.add(traceId);
    try {
      return await runWithTrace({ traceId }, async (): Promise<PlatformResult> => {
        try {
          const rule = this.deps.rules().platforms[platform];
          if (rule && !rule.enabled) {
            return { ...base, outcome: 'skipped', reason: 'platform_disabled' };
          }
          if (!options.force && this.deps.packages.hasTrace(traceId, 'draft')) {
            log.info({ draft_trace_id: traceId }, 'Draft already generated, skipping');
            return { ...base, outcome: 'skipped', reason: 'already_generated' };
          }
          return { ...base, ...(await this.generateDraft(fields, topicTraceId, traceId, platform)) };
        } catch (err) {
          log.error({ platform, error: errorMessage(err) }, 'Draft generation failed');
          return { ...base, outcome: 'failed', error: errorMessage(err).slice(0, 200) };
        }
      });
    } finally {
      this.inFlight.delete(traceId);
    }
  }

  private async generateDraft(
    fields: ConfirmationFields,
    topicTraceId: string,
    traceId: string,
    platform: string,
  ): Promise<Omit<PlatformResult, 'platform' | 'trace_id'>> {
    const rules = this.deps.rules();
    const rule = rules.platforms[platform];
    const policy = draftPolicy(platform, rule);

    const generated = await this.deps.generator.think({
      title: fields.title,
      raw_text: draftSeed(fields.title, fields.summary, policy.tone),
      history_context: this.historyContext(fields, platform),
      platform_strategy: { [platform]: strategyEntry(policy, rule) },
    });

    const basePrompt = generated.image_prompt || `${fields.title}, ${rules.visual.default_style}`;
    const imageUrls: string[] = [];
    for (const prompt of imagePrompts(basePrompt, policy.imageCount)) {
      const url = await this.deps.images.paint(prompt, policy.ratio);
      if (url.trim()) imageUrls.push(url.trim());
    }

    const draft: ContentPackage = {
      record_type: 'draft',
      trace_id: traceId,
      parent_trace_id: topicTraceId,
      title: fields.title,
      summary: generated.ai_summary || fields.summary,
      source_id: CALLBACK_SOURCE_ID,
      source_info: fields.sourceInfo || CALLBACK_SOURCE_ID,
      source_url: fields.sourceUrl,
      channels: [platform],
      status: DRAFT_STATUS,
      platform,
      twitter_draft: generated.twitter_draft,
      article_markdown: generated.article_markdown,
      image_prompt: basePrompt,
      image_urls: imageUrls,
      style: policy.style,
      engine: generated.engine,
    };

    const receipt = await this.deps.archiver.archive(draft);
    log.info({ platform, engine: generated.engine, images: imageUrls.length, doc_url: receipt.doc_url }, 'Draft archived');
    return {
      outcome: 'generated',
      archive_status: receipt.status,
      doc_url: receipt.doc_url,
      backend: receipt.backend,
      engine: generated.engine,
      image_count: imageUrls.length,
    };
  }

  /** Prior topics on the same subject plus recent drafts to steer away from. */
  private historyContext(fields: ConfirmationFields, platform: string): string {
    const tokens = extractTokens(`${fields.title} ${fields.summary}`, 8);
    const related = this.deps.context.retrieve(tokens);
    const snippets = this.deps.packages.recentDraftSnippets(tokens, platform);

    const sections: string[] = [];
    if (related.context) sections.push(`${RELATED_HEADER}${related.context}`);
    if (snippets.length > 0) sections.push(`${ANTI_REPEAT_HEADER}${snippets.join('\n')}`);
    return sections.join('\n\n');
  }
}
