/**
 * @fileoverview Structured logger built on pino.
 * Logs are written to stderr so that stdout remains free for the MCP stdio transport.
 * @module src/utils/internal/logger
 */
import pino, { type Logger as PinoLogger } from 'pino';

import { config, type LogLevel } from '@/config/index.js';

/**
 * Arbitrary structured data attached to a log line. Usually a spread
 * {@link RequestContext} plus operation-specific fields.
 */
export type LogContext = Record<string, unknown>;

type PinoLevel = 'debug' | 'info' | 'notice' | 'warn' | 'error' | 'crit';

const LEVEL_MAP: Record<LogLevel, PinoLevel | 'silent'> = {
  debug: 'debug',
  info: 'info',
  notice: 'notice',
  warning: 'warn',
  error: 'error',
  crit: 'crit',
  silent: 'silent',
};

/**
 * Singleton logger with syslog-style severities.
 */
export class Logger {
  private static instance: Logger | undefined;
  private readonly pinoLogger: PinoLogger<'notice' | 'crit'>;

  private constructor(level: LogLevel) {
    this.pinoLogger = pino(
      {
        level: LEVEL_MAP[level],
        customLevels: { notice: 35, crit: 55 },
        base: { service: config.mcpServerName },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }

  static getInstance(): Logger {
    Logger.instance ??= new Logger(config.logLevel);
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = LEVEL_MAP[level];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  notice(message: string, context?: LogContext): void {
    this.write('notice', message, context);
  }

  warning(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  crit(message: string, context?: LogContext): void {
    this.write('crit', message, context);
  }

  private write(level: PinoLevel, message: string, context?: LogContext): void {
    this.pinoLogger[level](context ?? {}, message);
  }
}

export const logger = Logger.getInstance();
