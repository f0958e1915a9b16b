import { ThinkOutputSchema, type GenerationResult, type GenerationWorker, type ThinkRequest } from './types.js';
import type { LlmClient } from './client.js';
import { buildThinkMessages, strategyName } from './prompts.js';
import { parseWithRepair } from './parse.js';
import { templateThink } from './fallback.js';
import { componentLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { postJson, joinUrl, type HttpOptions } from '../shared/http.js';

const log = componentLogger('generation');

/**
 * In-process generation: an OpenAI-compatible model when one is configured, the
 * deterministic template otherwise or when the model call fails.
 */
export class LocalGenerationWorker implements GenerationWorker {
  readonly kind = 'local';

  constructor(private readonly client: LlmClient | null) {}

  async think(req: ThinkRequest): Promise<GenerationResult> {
    if (this.client?.isConfigured()) {
      const messages = buildThinkMessages(req);
      try {
        const response = await this.client.chat(messages);
        const output = await parseWithRepair(
          ThinkOutputSchema,
          response.content,
          this.client,
          messages[0]?.content ?? '',
        );
        return { ...output, engine: 'llm' };
      } catch (err) {
        log.warn({ error: errorMessage(err), title: req.title.slice(0, 80) }, 'Model generation failed, using template');
      }
    }

    const output = templateThink(req.title, req.raw_text, req.history_context, strategyName(req));
    return { ...output, engine: 'template' };
  }
}

/** Generation worker deployed separately, reached at `POST <base>/think`. */
export class HttpGenerationWorker implements GenerationWorker {
  readonly kind = 'remote';

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpOptions,
  ) {}

  async think(req: ThinkRequest): Promise<GenerationResult> {
    const output = await postJson(joinUrl(this.baseUrl, '/think'), req, ThinkOutputSchema, this.http);
    return { ...output, engine: 'remote' };
  }
}
