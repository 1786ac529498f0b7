/**
 * @fileoverview Pino-backed logger speaking MCP log levels.
 * Output goes to stderr as JSON lines; stdout belongs to the stdio transport.
 * @module src/utils/internal/logger
 */
import {
  destination,
  pino,
  type Level,
  type Logger as PinoLogger,
} from 'pino';

import { config, type McpLogLevel } from '../../config/index.js';

export type LogContext = Record<string, unknown>;

const pinoLevelFor: Record<McpLogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
  alert: 'fatal',
  emerg: 'fatal',
};

export class Logger {
  private static instance: Logger | undefined;

  private readonly pinoLogger: PinoLogger;
  private currentLevel: McpLogLevel;

  private constructor(level: McpLogLevel) {
    this.currentLevel = level;
    this.pinoLogger = pino(
      {
        name: config.mcpServerName,
        level: pinoLevelFor[level],
        base: { env: config.environment },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      destination({ dest: 2, sync: true }),
    );
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config.logLevel);
    }
    return Logger.instance;
  }

  public get level(): McpLogLevel {
    return this.currentLevel;
  }

  public setLevel(level: McpLogLevel): void {
    this.currentLevel = level;
    this.pinoLogger.level = pinoLevelFor[level];
  }

  public debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  public info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  public notice(msg: string, context?: LogContext): void {
    this.write('notice', msg, context);
  }

  public warning(msg: string, context?: LogContext): void {
    this.write('warning', msg, context);
  }

  public error(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.writeWithError('error', msg, errorOrContext, context);
  }

  public crit(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.writeWithError('crit', msg, errorOrContext, context);
  }

  public alert(msg: string, context?: LogContext): void {
    this.write('alert', msg, context);
  }

  public emerg(msg: string, context?: LogContext): void {
    this.write('emerg', msg, context);
  }

  private writeWithError(
    level: McpLogLevel,
    msg: string,
    errorOrContext: Error | LogContext | undefined,
    context: LogContext | undefined,
  ): void {
    if (errorOrContext instanceof Error) {
      this.write(level, msg, { ...context, err: errorOrContext });
    } else {
      this.write(level, msg, { ...errorOrContext, ...context });
    }
  }

  private write(level: McpLogLevel, msg: string, context?: LogContext): void {
    const fields = { ...context, mcpLevel: level };
    this.pinoLogger[pinoLevelFor[level]](fields, msg);
  }
}

export const logger = Logger.getInstance();
