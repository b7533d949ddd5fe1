/**
 * @fileoverview Structured application logger backed by pino.
 * Exposes RFC 5424 style severity methods that take a message and an
 * optional context object, which is merged into the emitted record.
 * @module src/utils/internal/logger
 */
import pino, { type Logger as PinoLogger } from 'pino';

import { config, type LogLevel } from '../../config/index.js';

export type LogContext = Record<string, unknown>;

type ExtraLevel = 'notice' | 'crit' | 'alert' | 'emerg';

/** Severities pino lacks, slotted between its built-in level values. */
const customLevels: Record<ExtraLevel, number> = {
  notice: 35,
  crit: 55,
  alert: 57,
  emerg: 59,
};

const pinoLevelFor: Record<LogLevel, string> = {
  debug: 'debug',
  info: 'info',
  notice: 'notice',
  warning: 'warn',
  error: 'error',
  crit: 'crit',
  alert: 'alert',
  emerg: 'emerg',
};

type PinoMethod = 'debug' | 'info' | 'warn' | 'error' | ExtraLevel;

export class Logger {
  private readonly instance: PinoLogger<ExtraLevel>;

  constructor(level: LogLevel, name = 'ctgov-trial-search') {
    this.instance = pino<ExtraLevel>({
      name,
      level: pinoLevelFor[level],
      customLevels,
      serializers: { error: pino.stdSerializers.err },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
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

  alert(message: string, context?: LogContext): void {
    this.write('alert', message, context);
  }

  emerg(message: string, context?: LogContext): void {
    this.write('emerg', message, context);
  }

  private write(method: PinoMethod, message: string, context?: LogContext) {
    this.instance[method](context ?? {}, message);
  }
}

export const logger = new Logger(config.logLevel);
