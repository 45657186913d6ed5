/**
 * Loggers for the pipeline stages and the preview server.
 *
 * Each entry point names its logger after its stage (`process-data`,
 * `fetch-documents`, ...). Adapters get a child bound to their component.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'reactor-fleet-dashboard',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Root logger for one stage. Pretty output is skipped at the silent level so tests
 * start no transport worker.
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

/**
 * Child logger whose records carry `component`.
 */
export const createChildLogger = (
  parent: Logger,
  component: string,
  context: Record<string, unknown> = {}
): Logger => parent.child({ ...context, component });

export { type Logger } from 'pino';
