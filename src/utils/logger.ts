import pino from 'pino';
import { env } from '../config/environment';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger contract injected into every service.
 * Extra arguments are attached to the log line; an Error is logged with its stack.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

function toBindings(meta: unknown[]): Record<string, unknown> | undefined {
  if (meta.length === 0) return undefined;

  const bindings: Record<string, unknown> = {};
  const extra: unknown[] = [];
  for (const item of meta) {
    if (item instanceof Error) {
      bindings.err = item;
    } else {
      extra.push(item);
    }
  }
  if (extra.length === 1) {
    bindings.meta = extra[0];
  } else if (extra.length > 1) {
    bindings.meta = extra;
  }
  return bindings;
}

export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: { name?: string; level?: LogLevel; pretty?: boolean } = {}) {
    const transport = options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
          }
        }
      : undefined;

    this.pinoLogger = pino({
      name: options.name ?? 'chat-scheduling-assistant',
      level: options.level ?? 'info',
      ...(transport && { transport })
    });
  }

  debug(message: string, ...meta: unknown[]): void {
    const bindings = toBindings(meta);
    if (bindings) this.pinoLogger.debug(bindings, message);
    else this.pinoLogger.debug(message);
  }

  info(message: string, ...meta: unknown[]): void {
    const bindings = toBindings(meta);
    if (bindings) this.pinoLogger.info(bindings, message);
    else this.pinoLogger.info(message);
  }

  warn(message: string, ...meta: unknown[]): void {
    const bindings = toBindings(meta);
    if (bindings) this.pinoLogger.warn(bindings, message);
    else this.pinoLogger.warn(message);
  }

  error(message: string, ...meta: unknown[]): void {
    const bindings = toBindings(meta);
    if (bindings) this.pinoLogger.error(bindings, message);
    else this.pinoLogger.error(message);
  }
}

export const logger: Logger = new PinoLogger({
  level: env.LOG_LEVEL,
  pretty: env.ENVIRONMENT === 'DEBUG'
});

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
