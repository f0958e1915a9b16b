import type { z } from 'zod';
import { componentLogger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { LlmClient } from './client.js';
import { buildRepairPrompt } from './prompts.js';

const log = componentLogger('llm');

/**
 * Strip markdown code fences from LLM output.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Parse JSON from model output. Falls back to the outermost `{...}` span when the
 * model wrapped the object in prose.
 */
export function extractJson(raw: string): unknown {
  const cleaned = stripCodeFences(raw);
  try {
    return JSON.parse(cleaned);
  } catch (err) {
    const match = /\{[\s\S]*\}/.exec(cleaned);
    if (!match) throw err;
    return JSON.parse(match[0]);
  }
}

/** Parsed data, or an error message. */
export function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | string {
  let json: unknown;
  try {
    json = extractJson(raw);
  } catch (err) {
    return errorMessage(err);
  }
  const result = schema.safeParse(json);
  if (result.success) return result.data;
  return result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Parse LLM JSON output with one repair-retry on parse or validation failure.
 */
export async function parseWithRepair<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: LlmClient,
  systemMessage: string,
): Promise<T> {
  const first = tryParse(schema, rawOutput);
  if (typeof first !== 'string') return first;

  log.warn({ error: first, raw: rawOutput.slice(0, 200) }, 'LLM output invalid, attempting repair');

  const repair = await client.chat([
    { role: 'system', content: systemMessage },
    { role: 'user', content: buildRepairPrompt(first, rawOutput) },
  ]);

  const repaired = tryParse(schema, repair.content);
  if (typeof repaired !== 'string') return repaired;

  throw new LlmError('LLM output invalid after repair attempt', {
    original_error: first,
    repair_error: repaired,
    raw: repair.content.slice(0, 500),
  });
}
