import type { MiddlewareHandler } from 'hono';
import {
  REQUEST_HEADER,
  TRACE_HEADER,
  decodeHeaderId,
  encodeHeaderId,
  newTraceId,
  normalizeId,
  runWithTrace,
} from '../trace/context.js';
import { componentLogger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';

const log = componentLogger('api');

/**
 * Binds a correlation context for the request. The trace id comes from the
 * `x-trace-id` header or `?trace_id`, the request id from `x-request-id`; either
 * is generated when absent (request ids by nanoid). Both are echoed on the response.
 */
export function traceContext(): MiddlewareHandler {
  return async (c, next) => {
    const traceId = decodeHeaderId(c.req.header(TRACE_HEADER)) || normalizeId(c.req.query('trace_id')) || newTraceId();
    const requestId = decodeHeaderId(c.req.header(REQUEST_HEADER)) || generateId(16);
    const started = Date.now();

    await runWithTrace({ traceId, requestId }, async () => {
      log.info({ method: c.req.method, path: c.req.path }, 'Request started');
      await next();
      c.header(TRACE_HEADER, encodeHeaderId(traceId));
      c.header(REQUEST_HEADER, encodeHeaderId(requestId));
      log.info(
        { method: c.req.method, path: c.req.path, status: c.res.status, latency_ms: Date.now() - started },
        'Request done',
      );
    });
  };
}
