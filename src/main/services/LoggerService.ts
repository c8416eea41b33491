/**
 * @file LoggerService - Unified logging service
 * @description Centralized logging with module context, optional file output, and timers.
 * @supports Engine library, CLI, and tests (console level drops to warn under NODE_ENV=test)
 * @security Automatically redacts sensitive data (API keys, tokens, passwords, emails)
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import log from 'electron-log/node';

// ====== Types ======

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  time(label: string): void;
  timeEnd(label: string): void;
}

// ====== Sensitive Data Redaction ======

/**
 * Sensitive field name patterns (case-insensitive).
 * Fields matching these patterns will have their values redacted.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /^api[_-]?key$/i,
  /^apikey$/i,
  /^secret[_-]?key$/i,
  /^password$/i,
  /^passwd$/i,
  /^token$/i,
  /^access[_-]?token$/i,
  /^refresh[_-]?token$/i,
  /^auth[_-]?token$/i,
  /^bearer$/i,
  /^credential/i,
  /^private[_-]?key$/i,
  /^secret$/i,
  /^authorization$/i,
  /^cookie[s]?$/i,
];

/**
 * Sensitive value patterns for string content detection.
 */
const SENSITIVE_VALUE_PATTERNS = [
  // OpenAI / Anthropic keys (sk-..., sk-ant-...)
  { pattern: /(sk-[a-zA-Z0-9]{2,})[a-zA-Z0-9-_]{10,}/g, replacement: '$1***REDACTED***' },
  // Generic Bearer tokens
  { pattern: /(Bearer\s+)[a-zA-Z0-9._-]{20,}/gi, replacement: '$1***REDACTED***' },
  // Long hex strings (likely keys, 32+ chars)
  { pattern: /([a-f0-9]{8})[a-f0-9]{24,}/gi, replacement: '$1***REDACTED***' },
  // JWT tokens
  {
    pattern: /(eyJ[a-zA-Z0-9_-]{10,})\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g,
    replacement: '$1.***REDACTED***',
  },
  // Email addresses (partial)
  {
    pattern: /([a-zA-Z0-9._%+-]{1,3})[a-zA-Z0-9._%+-]*@([a-zA-Z0-9.-]+)/g,
    replacement: '$1***@$2',
  },
];

function isSensitiveFieldName(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(fieldName));
}

export function redactStringValue(value: string): string {
  let result = value;
  for (const { pattern, replacement } of SENSITIVE_VALUE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Recursively redact sensitive information from data.
 * @param depth - Current recursion depth (stops circular structures)
 */
export function redactSensitiveData(data: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return redactStringValue(data);
  }

  if (data instanceof Error) {
    return { name: data.name, message: redactStringValue(data.message) };
  }

  if (typeof data !== 'object') {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => redactSensitiveData(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveFieldName(key)) {
      if (typeof value === 'string' && value.length > 0) {
        // Keep first 3 chars for debugging
        const prefix = value.substring(0, Math.min(3, value.length));
        result[key] = `${prefix}***REDACTED***`;
      } else {
        result[key] = '***REDACTED***';
      }
    } else {
      result[key] = redactSensitiveData(value, depth + 1);
    }
  }

  return result;
}

// ====== Logger Implementation ======

class LoggerServiceImpl {
  private static instance: LoggerServiceImpl;
  private timers: Map<string, number> = new Map();
  private logsDir = '';

  private constructor() {
    this.initializeTransports();
  }

  public static getInstance(): LoggerServiceImpl {
    if (!LoggerServiceImpl.instance) {
      LoggerServiceImpl.instance = new LoggerServiceImpl();
    }
    return LoggerServiceImpl.instance;
  }

  private initializeTransports(): void {
    // File logging only when a directory is injected
    this.logsDir = process.env.DOCENT_LOGS_DIR || '';

    if (this.logsDir) {
      try {
        mkdirSync(this.logsDir, { recursive: true });
        log.transports.file.level = 'info';
        log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB
        log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
        log.transports.file.resolvePathFn = (variables) =>
          path.join(this.logsDir, variables.fileName || 'main.log');
      } catch (e) {
        console.error('Failed to create logs dir:', e);
        this.logsDir = '';
        log.transports.file.level = false;
      }
    } else {
      log.transports.file.level = false;
    }

    switch (process.env.NODE_ENV) {
      case 'development':
        log.transports.console.level = 'debug';
        break;
      case 'test':
        log.transports.console.level = 'warn';
        break;
      default:
        log.transports.console.level = 'info';
    }

    log.debug('[LoggerService] Initialized');
  }

  /**
   * Create a logger with module context
   */
  public withContext(moduleName: string): Logger {
    return {
      debug: (message: string, data?: unknown) => this.log('debug', moduleName, message, data),
      info: (message: string, data?: unknown) => this.log('info', moduleName, message, data),
      warn: (message: string, data?: unknown) => this.log('warn', moduleName, message, data),
      error: (message: string, data?: unknown) => this.log('error', moduleName, message, data),
      time: (label: string) => this.time(`${moduleName}:${label}`),
      timeEnd: (label: string) => this.timeEnd(`${moduleName}:${label}`),
    };
  }

  private log(level: LogLevel, module: string, message: string, data?: unknown): void {
    const redactedMessage = redactStringValue(message);
    const redactedData = data !== undefined ? redactSensitiveData(data) : undefined;

    // Callers may already prefix with [Module]
    const formattedMessage = redactedMessage.startsWith(`[${module}]`)
      ? redactedMessage
      : `[${module}] ${redactedMessage}`;

    const logData =
      redactedData !== undefined ? [formattedMessage, redactedData] : [formattedMessage];

    switch (level) {
      case 'debug':
        log.debug(...logData);
        break;
      case 'info':
        log.info(...logData);
        break;
      case 'warn':
        log.warn(...logData);
        break;
      case 'error':
        log.error(...logData);
        break;
    }
  }

  public time(label: string): void {
    this.timers.set(label, performance.now());
  }

  /**
   * End a timer and log the duration at debug level
   */
  public timeEnd(label: string): void {
    const start = this.timers.get(label);
    if (start !== undefined) {
      const duration = performance.now() - start;
      this.log('debug', 'Performance', `${label}: ${duration.toFixed(2)}ms`);
      this.timers.delete(label);
    }
  }
}

// ====== Exports ======

export const LoggerService = LoggerServiceImpl.getInstance();

export type ILoggerService = LoggerServiceImpl;

/** Create a logger instance with module context */
export function createLogger(moduleName: string): Logger {
  return LoggerService.withContext(moduleName);
}
