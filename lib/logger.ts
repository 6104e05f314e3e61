import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';

export interface SyncLogger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn?(...args: unknown[]): void;
  debug?(...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const silentLogger: SyncLogger = {
  log: () => {},
  error: () => {},
};

function formatArgs(args: unknown[]): { message: string; err?: Error } {
  const parts: string[] = [];
  let err: Error | undefined;
  for (const arg of args) {
    if (arg instanceof Error) {
      err = err ?? arg;
      parts.push(arg.message);
    } else if (typeof arg === 'string') {
      parts.push(arg);
    } else {
      parts.push(JSON.stringify(arg));
    }
  }
  return { message: parts.join(' '), err };
}

/**
 * Adapts a pino logger to the variadic logger the coordinator expects from its host.
 */
export function fromPino(logger: PinoLogger): SyncLogger {
  const write = (level: 'debug' | 'info' | 'warn' | 'error', args: unknown[]) => {
    const { message, err } = formatArgs(args);
    if (err) logger[level]({ err }, message);
    else logger[level](message);
  };
  return {
    log: (...args) => write('info', args),
    warn: (...args) => write('warn', args),
    error: (...args) => write('error', args),
    debug: (...args) => write('debug', args),
  };
}

/**
 * Drops calls below `level`. Errors always pass.
 */
export function withLevel(logger: SyncLogger, level: LogLevel): SyncLogger {
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];
  const drop = () => {};
  return {
    log: enabled('info') ? (...args) => logger.log(...args) : drop,
    warn: enabled('warn')
      ? (...args) => {
        if (logger.warn) logger.warn(...args);
        else logger.log(...args);
      }
      : drop,
    error: (...args) => logger.error(...args),
    debug: enabled('debug') ? (...args) => logger.debug?.(...args) : drop,
  };
}

export function createPinoLogger(options: { level?: LogLevel; name?: string } = {}): SyncLogger {
  return fromPino(pino({ name: options.name ?? 'climate-sync', level: options.level ?? 'info' }));
}

/**
 * Tagged wrapper so every line carries the component it came from.
 * Falls back to `log` when the target has no warn/debug.
 */
export class TaggedLogger {
  constructor(private readonly target: () => SyncLogger, private readonly tag: string) {}

  info(message: string, ...rest: unknown[]) {
    this.target().log(`[${this.tag}] ${message}`, ...rest);
  }

  warn(message: string, ...rest: unknown[]) {
    const logger = this.target();
    if (logger.warn) {
      logger.warn(`[${this.tag}] ${message}`, ...rest);
      return;
    }
    logger.log(`[${this.tag}] ${message}`, ...rest);
  }

  error(message: string, ...rest: unknown[]) {
    this.target().error(`[${this.tag}] ${message}`, ...rest);
  }

  debug(message: string, ...rest: unknown[]) {
    this.target().debug?.(`[${this.tag}] ${message}`, ...rest);
  }
}
