import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import pino from 'pino';
import { ResultAsync } from 'neverthrow';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SESSION_PREFIX = 'hcpstat-session-';
const SESSION_SUFFIX = '.log';

interface LoggerConfig {
  sessionId: string;
  keepSessions?: number; // Number of old sessions to keep (default: 5)
  level?: LogLevel;
}

class Logger {
  private pinoLogger: pino.Logger;
  private sessionId: string;
  private logFilePath: string;
  private keepSessions: number;

  constructor(config: LoggerConfig) {
    this.sessionId = config.sessionId;
    this.keepSessions = config.keepSessions ?? 5;
    this.logFilePath = Logger.getSessionFilePath(this.sessionId);

    this.pinoLogger = pino({
      level: config.level ?? 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    }, pino.destination({
      dest: this.logFilePath,
      sync: false,
    }));
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  // Clean up old session files, keeping only the most recent N sessions
  cleanupOldSessions(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(fs.readdir(tmpdir()), () => ({
      message: 'Failed to read temp directory'
    }))
      .andThen(files => {
        const staleFiles = Logger.sessionIdsIn(files)
          .slice(this.keepSessions)
          .filter(id => id !== this.sessionId);

        const deletions = staleFiles.map(id =>
          ResultAsync.fromPromise(
            fs.unlink(Logger.getSessionFilePath(id)),
            () => ({ message: `Failed to delete old log file for session ${id}` })
          )
        );

        return ResultAsync.combine(deletions).map(() => undefined);
      });
  }

  // Session ids found in a directory listing, newest first
  static sessionIdsIn(files: string[]): string[] {
    return files
      .filter(f => f.startsWith(SESSION_PREFIX) && f.endsWith(SESSION_SUFFIX))
      .map(f => f.slice(SESSION_PREFIX.length, -SESSION_SUFFIX.length))
      .sort((a, b) => b.localeCompare(a));
  }

  static getSessionFilePath(sessionId: string): string {
    return join(tmpdir(), `${SESSION_PREFIX}${sessionId}${SESSION_SUFFIX}`);
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({ message: error instanceof Error ? error.message : 'Failed to flush logger' })
    );
  }
}

let globalLogger: Logger | null = null;

export function sessionIdFor(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-').replace('T', '-').split('Z')[0];
}

// Initialize the global logger with a session ID based on current timestamp
export function initializeLogger(options: { sessionId?: string; keepSessions?: number } = {}): Logger {
  globalLogger = new Logger({
    sessionId: options.sessionId ?? sessionIdFor(new Date()),
    keepSessions: options.keepSessions,
  });
  return globalLogger;
}

export function getLogger(): Logger | null {
  return globalLogger;
}

// Convenience functions for logging; no-ops until initializeLogger() runs
export const log = {
  debug: (message: string, context?: string, data?: unknown) => globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) => globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) => globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) => globalLogger?.error(message, context, data),
};

export { Logger };
