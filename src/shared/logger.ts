import pino from 'pino';
import pretty from 'pino-pretty';
import { currentTrace } from '../trace/context.js';

const LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function resolveLevel(raw: string | undefined): pino.Level {
  const wanted = raw?.trim().toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? 'info';
}

/**
 * Second log destination. Forwards to the aggregation store once one is attached;
 * until then records reach the console only.
 */
class ForwardingSink implements pino.DestinationStream {
  private target: pino.DestinationStream | null = null;

  attach(target: pino.DestinationStream): void {
    this.target = target;
  }

  detach(): void {
    this.target = null;
  }

  write(msg: string): void {
    this.target?.write(msg);
  }
}

/** pino-pretty on an interactive console; plain JSON lines in production and tests. */
export function usePrettyConsole(nodeEnv: string | undefined): boolean {
  return nodeEnv !== 'production' && nodeEnv !== 'test';
}

const level = resolveLevel(process.env['LOG_LEVEL']);
const sink = new ForwardingSink();

const consoleStream: pino.DestinationStream =
  usePrettyConsole(process.env['NODE_ENV'])
    ? pretty({ colorize: true, sync: true })
    : pino.destination({ fd: 1, sync: true });

export const logger = pino(
  {
    level,
    mixin() {
      const ctx = currentTrace();
      return ctx ? { trace_id: ctx.traceId, request_id: ctx.requestId } : {};
    },
    redact: {
      paths: ['api_key', 'apiKey', 'password', 'secret', 'token', '*.api_key', '*.password'],
      censor: '***REDACTED***',
    },
  },
  pino.multistream([
    { level, stream: consoleStream },
    { level, stream: sink },
  ]),
);

export type Logger = pino.Logger;

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export function attachLogSink(target: pino.DestinationStream): void {
  sink.attach(target);
}

export function detachLogSink(): void {
  sink.detach();
}
