import { z } from 'zod';
import { componentLogger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Config } from '../shared/config.js';
import { postJson, joinUrl, type HttpOptions } from '../shared/http.js';

const log = componentLogger('llm');

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions response (partial)
const ChatCompletionSchema = z.object({
  model: z.string().default(''),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().default(null) }) }))
    .default([]),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

export class LlmClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly http: HttpOptions;

  constructor(config: Config['llm'], http: HttpOptions) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.http = { ...http, timeoutMs: config.timeout_ms };
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    const url = joinUrl(this.baseUrl, '/chat/completions');

    let data: z.infer<typeof ChatCompletionSchema>;
    try {
      data = await postJson(
        url,
        {
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        ChatCompletionSchema,
        { ...this.http, headers: { Authorization: `Bearer ${this.apiKey}` } },
      );
    } catch (err) {
      throw new LlmError(`LLM request failed: ${errorMessage(err)}`, { url, model: this.model });
    }

    const content = data.choices[0]?.message.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { model: data.model || this.model });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    log.debug({ model: data.model, tokens: tokenCount }, 'LLM call completed');

    return { content, model: data.model || this.model, token_count: tokenCount };
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }
}
