import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export const TRACE_HEADER = 'x-trace-id';
export const REQUEST_HEADER = 'x-request-id';

/**
 * Correlation identity of one unit of work (a scan cycle, an item inside it,
 * a callback, a draft). Read-only once bound.
 */
export interface TraceContext {
  readonly traceId: string;
  readonly requestId: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

/**
 * Keep letters and digits of any script plus `_` and `-`, cap at 64 code points;
 * empty input yields `fallback`. Platform names such as 微博 survive, so every
 * (topic, platform) pair keeps a distinct draft id.
 */
export function normalizeId(value: unknown, fallback = ''): string {
  const cleaned = String(value ?? '').replace(/[^\p{L}\p{N}_-]/gu, '');
  return Array.from(cleaned).slice(0, 64).join('') || fallback;
}

/** Header values are ASCII only; ids travel percent-encoded. */
export function encodeHeaderId(id: string): string {
  return encodeURIComponent(id);
}

export function decodeHeaderId(value: string | undefined): string {
  if (!value) return '';
  try {
    return normalizeId(decodeURIComponent(value));
  } catch {
    return normalizeId(value);
  }
}

export function newTraceId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}

/** Sub-identifier of a draft derived from its topic. */
export function deriveTraceId(parentTraceId: string, suffix: string): string {
  return normalizeId(`${parentTraceId}-${suffix}`);
}

export function currentTrace(): TraceContext | undefined {
  return storage.getStore();
}

export function currentTraceId(): string {
  return storage.getStore()?.traceId ?? '';
}

/**
 * Run `fn` inside a correlation context. Omitted ids inherit from the enclosing
 * context, so a nested item scope keeps the cycle's request id.
 */
export function runWithTrace<T>(ids: Partial<TraceContext>, fn: () => T): T {
  const parent = storage.getStore();
  const traceId = normalizeId(ids.traceId) || parent?.traceId || newTraceId();
  const requestId = normalizeId(ids.requestId) || parent?.requestId || traceId;
  return storage.run({ traceId, requestId }, fn);
}

export function outboundTraceHeaders(): Record<string, string> {
  const ctx = storage.getStore();
  if (!ctx) return {};
  return {
    [TRACE_HEADER]: encodeHeaderId(ctx.traceId),
    [REQUEST_HEADER]: encodeHeaderId(ctx.requestId),
  };
}
