import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * The subset of the pino logger the engine writes to.
 *
 * Accepting this narrow shape (instead of `pino.Logger`) lets callers pass a
 * child logger of their own application, or a test double.
 */
export type EngineLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogFormat = 'json' | 'text';

export type LoggerConfig = {
  level: LogLevel;

  /**
   * `json` writes newline-delimited JSON to stdout.
   * `text` routes through `pino-pretty` for human-readable output.
   *
   * @default 'json'
   */
  format?: LogFormat;

  /**
   * Logger name attached to every record.
   *
   * @default 'values-form-engine'
   */
  name?: string;
};

/**
 * Creates the structured logger used by the editor service and the
 * descriptor loader.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name ?? 'values-form-engine',
    level: config.level
  };

  if (config.format === 'text') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' }
    };
  }

  return pino(options);
}

/**
 * Logger used when the caller does not provide one.
 * Discards every record.
 */
export const silentLogger: EngineLogger = pino({ level: 'silent' });
