import pino from 'pino';

export interface LoggerConfig {
  serviceName: string;
  level?: string;
  prettyPrint?: boolean;
}

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

const defaultPrettyPrint = (): boolean =>
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export class Logger {
  private logger: pino.Logger;

  constructor(config: LoggerConfig, instance?: pino.Logger) {
    this.logger =
      instance ??
      pino({
        level: config.level || defaultLevel(),
        transport: (config.prettyPrint ?? defaultPrettyPrint())
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
        base: {
          service: config.serviceName,
        },
      });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.logger.info(context || {}, msg);
  }

  error(msg: string, error?: unknown, context?: Record<string, unknown>): void {
    this.logger.error(
      {
        ...(context || {}),
        error: serializeError(error),
      },
      msg
    );
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.logger.warn(context || {}, msg);
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.logger.debug(context || {}, msg);
  }

  /** Shares the parent's pino instance (and transport); only the bindings differ. */
  child(bindings: Record<string, unknown>): Logger {
    const service = this.logger.bindings().service;
    return new Logger(
      { serviceName: typeof service === 'string' ? service : 'unknown' },
      this.logger.child(bindings)
    );
  }
}

function serializeError(error: unknown): Record<string, unknown> | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, name: error.name };
  }
  return { message: String(error) };
}

export const createLogger = (config: LoggerConfig): Logger => new Logger(config);
