import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface used across the runtime. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Adapt pino's `(obj, msg)` call order to our `(msg, context)` one. */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a structured pino logger instance.
 * Logs go to stderr; stdout belongs to the chat output.
 */
export function createLogger(options?: { level?: LogLevel; name?: string }): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'turnloop',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'warn',
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'password',
        'secret',
        '*.apiKey',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  if (process.env['NODE_ENV'] === 'development') {
    return wrap(
      pino({
        ...pinoOptions,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      }),
    );
  }

  return wrap(pino(pinoOptions, pino.destination(2)));
}
