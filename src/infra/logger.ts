/**
 * Debug Logging System with File Output
 * Supports log levels, session files, and sensitive data sanitization
 */

import { createWriteStream, type WriteStream } from 'fs';
import { mkdir, readdir, stat, unlink } from 'fs/promises';
import { join } from 'path';

// ---------------------------------------------------------------------------
// Logger Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level: LogLevel;
  logDir?: string;
  cleanupPeriodDays?: number;
  sessionId?: string;
  enabled?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_PATTERNS = [
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  /token[=:]\s*["']?[a-zA-Z0-9._-]+["']?/gi,
  /authorization[=:]\s*["']?[^"'\s]+["']?/gi,
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization'];

// ---------------------------------------------------------------------------
// Logger Class
// ---------------------------------------------------------------------------

export class Logger {
  private level: number;
  private logDir: string | null;
  private cleanupPeriodDays: number;
  private sessionId: string;
  private enabled: boolean;
  private logFile: string | null = null;
  private stream: WriteStream | null = null;
  private fileError: Error | null = null;
  private initialized = false;

  constructor(config: LoggerConfig) {
    this.level = LOG_LEVELS[config.level];
    this.logDir = config.logDir ?? null;
    this.cleanupPeriodDays = config.cleanupPeriodDays ?? 7;
    this.sessionId = config.sessionId ?? this.generateSessionId();
    this.enabled = config.enabled ?? true;
  }

  private generateSessionId(): string {
    const now = new Date();
    const timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const random = Math.random().toString(36).slice(2, 8);
    return `${timestamp}-${random}`;
  }

  async initialize(): Promise<void> {
    if (this.initialized || !this.enabled || !this.logDir) return;

    await mkdir(this.logDir, { recursive: true });

    this.logFile = join(this.logDir, `session-${this.sessionId}.log`);
    const stream = createWriteStream(this.logFile, { flags: 'a' });
    // File output stops at the first write error
    stream.on('error', (err) => {
      if (this.stream === stream) this.stream = null;
      this.fileError = err;
    });
    this.stream = stream;

    await this.cleanupOldLogs();

    this.initialized = true;
  }

  private async cleanupOldLogs(): Promise<void> {
    if (!this.logDir) return;
    const cutoffMs = Date.now() - this.cleanupPeriodDays * 24 * 60 * 60 * 1000;

    let files: string[];
    try {
      files = await readdir(this.logDir);
    } catch {
      return;
    }

    for (const file of files) {
      if (!file.startsWith('session-') || !file.endsWith('.log')) continue;

      const filePath = join(this.logDir, file);
      try {
        const info = await stat(filePath);
        if (info.mtime.getTime() < cutoffMs) {
          await unlink(filePath);
        }
      } catch {
        continue; // vanished or unreadable
      }
    }
  }

  private sanitize(data: unknown): unknown {
    if (typeof data === 'string') {
      let sanitized = data;
      for (const pattern of SENSITIVE_PATTERNS) {
        sanitized = sanitized.replace(pattern, '[REDACTED]');
      }
      return sanitized;
    }

    if (Array.isArray(data)) {
      return data.map(item => this.sanitize(item));
    }

    if (data !== null && typeof data === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(data)) {
        const lowerKey = key.toLowerCase();
        result[key] = SENSITIVE_KEYS.some(k => lowerKey.includes(k))
          ? '[REDACTED]'
          : this.sanitize(value);
      }
      return result;
    }

    return data;
  }

  formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let output = `[${timestamp}] ${levelStr} ${message}`;

    if (data) {
      output += ` ${JSON.stringify(this.sanitize(data))}`;
    }

    return output;
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled || LOG_LEVELS[level] < this.level) return;

    this.stream?.write(this.formatMessage(level, message, data) + '\n');
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  child(prefix: string): ChildLogger {
    return new ChildLogger(this, prefix);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    if (stream.destroyed) return;

    const done = new Promise<void>((resolve) => {
      stream.once('finish', resolve);
      stream.once('close', resolve);
    });
    stream.end();
    await done;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  /** The error that stopped file output, if any */
  getFileError(): Error | null {
    return this.fileError;
  }

  getSessionId(): string {
    return this.sessionId;
  }
}

// ---------------------------------------------------------------------------
// Child Logger (with prefix)
// ---------------------------------------------------------------------------

export class ChildLogger {
  constructor(private readonly parent: Logger, private readonly prefix: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.parent.debug(`[${this.prefix}] ${message}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.parent.info(`[${this.prefix}] ${message}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.parent.warn(`[${this.prefix}] ${message}`, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.parent.error(`[${this.prefix}] ${message}`, data);
  }

  child(subPrefix: string): ChildLogger {
    return new ChildLogger(this.parent, `${this.prefix}:${subPrefix}`);
  }
}

// ---------------------------------------------------------------------------
// Global Logger Instance
// ---------------------------------------------------------------------------

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: 'info', enabled: false });
  }
  return globalLogger;
}

export function setLogger(logger: Logger | null): void {
  globalLogger = logger;
}

export interface InitLoggerOptions {
  level?: LogLevel;
  logDir: string;
  sessionId?: string;
}

export async function initLogger(options: InitLoggerOptions): Promise<Logger> {
  const logger = new Logger({
    level: options.level ?? 'info',
    logDir: options.logDir,
    sessionId: options.sessionId,
    enabled: true,
  });

  await logger.initialize();
  globalLogger = logger;
  return logger;
}
