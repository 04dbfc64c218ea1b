/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /**
   * File descriptor to write to. The stdio MCP transport owns stdout,
   * so logs must go to stderr (2) there.
   */
  destination?: 1 | 2;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'inegi-mcp-server',
  pretty: process.env['NODE_ENV'] !== 'production',
  destination: 1,
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };
  const destination = finalConfig.destination ?? 1;

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    redact: {
      paths: ['token', '*.token'],
      censor: '[redacted]',
    },
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty != null && finalConfig.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(destination));
};

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

/**
 * Logger that drops everything; used by tests and as a default for adapters.
 */
export const createSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export { type Logger } from 'pino';
