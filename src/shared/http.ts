import pRetry, { AbortError } from 'p-retry';
import type { z } from 'zod';
import type { Config } from './config.js';
import { WorkerError, errorMessage } from './errors.js';
import { componentLogger } from './logger.js';
import { outboundTraceHeaders } from '../trace/context.js';

const log = componentLogger('http');

export interface HttpOptions {
  timeoutMs: number;
  retries: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
  headers?: Record<string, string>;
}

export function httpOptionsFromConfig(http: Config['http']): HttpOptions {
  return {
    timeoutMs: http.timeout_ms,
    retries: http.retries,
    minTimeoutMs: http.min_timeout_ms,
    maxTimeoutMs: http.max_timeout_ms,
  };
}

export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

async function send<R>(
  method: 'GET' | 'POST',
  url: string,
  opts: HttpOptions,
  body: unknown,
  accept: string,
  read: (response: Response) => Promise<R>,
): Promise<R> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Accept: accept,
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
          ...outboundTraceHeaders(),
          ...opts.headers,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
        redirect: 'follow',
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new WorkerError(`Request timed out after ${opts.timeoutMs}ms: ${url}`, true, { url });
      }
      throw new WorkerError(`Request failed: ${errorMessage(err)}`, true, { url });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new WorkerError(
        `${method} ${url} returned ${response.status}`,
        isTransientStatus(response.status),
        { url, status: response.status, body: text.slice(0, 300) },
      );
    }

    try {
      return await read(response);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new WorkerError(`Response timed out after ${opts.timeoutMs}ms: ${url}`, true, { url });
      }
      throw new WorkerError(`Response from ${url} could not be read: ${errorMessage(err)}`, false, { url });
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Retry `fn` with exponential backoff while it fails with a transient
 * WorkerError. Permanent failures (4xx, bad payloads) are raised on the first
 * attempt.
 */
export function withRetry<T>(url: string, opts: HttpOptions, fn: () => Promise<T>): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (err) {
        if (err instanceof WorkerError && !err.transient) {
          throw new AbortError(err);
        }
        throw err;
      }
    },
    {
      retries: opts.retries,
      factor: 2,
      minTimeout: opts.minTimeoutMs,
      maxTimeout: opts.maxTimeoutMs,
      onFailedAttempt: (error) => {
        log.warn(
          { url, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error: error.message },
          'Request attempt failed',
        );
      },
    },
  );
}

/** JSON request with a bounded timeout, trace headers, retries and a validated body. */
export function requestJson<T>(
  method: 'GET' | 'POST',
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: HttpOptions,
  body?: unknown,
): Promise<T> {
  return withRetry(url, opts, async () => {
    const data: unknown = await send(method, url, opts, body, 'application/json', (res) => res.json());
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new WorkerError(`Response from ${url} has an unexpected shape`, false, {
        url,
        errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  });
}

export function getText(url: string, opts: HttpOptions, accept = '*/*'): Promise<string> {
  return withRetry(url, opts, () => send('GET', url, opts, undefined, accept, (res) => res.text()));
}

export function postJson<T>(
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: HttpOptions,
): Promise<T> {
  return requestJson('POST', url, schema, opts, body);
}

export function getJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: HttpOptions,
): Promise<T> {
  return requestJson('GET', url, schema, opts);
}

export function joinUrl(base: string, pathname: string): string {
  return `${base.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}
