/**
 * Logger interfaces and implementations
 *
 * Why: Structured, level-based logging on stderr. Stdout is reserved for
 * the raw requests the CLI prints.
 *
 * Security: Authorization headers and the configured bearer token are
 * redacted from log context.
 */

import { REDACTED } from './constants.js';
import { isRecord } from './validation-utils.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogLevelName = keyof typeof LogLevel;

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'];

/**
 * Parse a level name (case-insensitive); unknown names yield undefined
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  const upper = name?.trim().toUpperCase();
  const match = LOG_LEVEL_NAMES.find(level => level === upper);
  return match === undefined ? undefined : LogLevel[match];
}

function resolveLevel(level: LogLevel | undefined): LogLevel {
  if (level !== undefined) return level;
  return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
}

/**
 * Replace secrets and Authorization header values anywhere in a context tree
 *
 * Headers appear either as records (`{ Authorization: '...' }`) or as
 * HeaderField lists (`[{ name: 'Authorization', value: '...' }]`).
 */
export function redactSensitive(value: unknown, secrets: readonly string[]): unknown {
  if (typeof value === 'string') {
    return secrets.reduce(
      (text, secret) => (secret ? text.split(secret).join(REDACTED) : text),
      value
    );
  }

  if (Array.isArray(value)) {
    return value.map(item => redactSensitive(item, secrets));
  }

  if (isRecord(value)) {
    const isAuthField = typeof value.name === 'string'
      && value.name.toLowerCase() === 'authorization'
      && 'value' in value;

    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (key.toLowerCase() === 'authorization' || (isAuthField && key === 'value')) {
        redacted[key] = REDACTED;
      } else {
        redacted[key] = redactSensitive(entry, secrets);
      }
    }
    return redacted;
  }

  return value;
}

abstract class BaseLogger implements Logger {
  protected readonly level: LogLevel;
  protected readonly secrets: readonly string[];

  constructor(level?: LogLevel, secrets: readonly string[] = []) {
    this.level = resolveLevel(level);
    this.secrets = secrets.filter(secret => secret.length > 0);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('error', message, errorContext);
    }
  }

  protected redact(context: Record<string, unknown>): Record<string, unknown> {
    const redacted = redactSensitive(context, this.secrets);
    return isRecord(redacted) ? redacted : {};
  }

  protected redactMessage(message: string): string {
    const redacted = redactSensitive(message, this.secrets);
    return typeof redacted === 'string' ? redacted : message;
  }

  protected abstract write(level: string, message: string, context?: Record<string, unknown>): void;
}

/**
 * Default logger - human-readable lines on stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${JSON.stringify(this.redact(context))}` : '';
    console.error(`[${timestamp}] ${level.toUpperCase()}: ${this.redactMessage(message)}${ctx}`);
  }
}

/**
 * Structured JSON logger
 *
 * Why: Machine-readable logs when the CLI runs inside scripts or CI.
 */
export class JsonLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactMessage(message),
      ...(context ? this.redact(context) : {}),
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Logger used by library components when the host passes none
 */
export function silentLogger(): Logger {
  return new ConsoleLogger(LogLevel.SILENT);
}
