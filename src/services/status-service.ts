import { log } from "./logger";

/**
 * Progress reporting used by long-running steps
 */
export interface StatusLogger {
  info(message: string, context?: string): void;
  warn(message: string, context?: string): void;
  error(message: string, context?: string): void;
  debug(message: string, context?: string): void;
}

/**
 * Receives user-facing progress lines (debug messages are only logged)
 */
export type ProgressHandler = (message: string) => void;

/**
 * Sends progress to a handler and mirrors every message to the session log
 */
export class StatusService implements StatusLogger {
  constructor(private readonly progressHandler?: ProgressHandler) {}

  info(message: string, context?: string): void {
    this.progressHandler?.(message);
    log.info(message, context || "status");
  }

  warn(message: string, context?: string): void {
    this.progressHandler?.(message);
    log.warn(message, context || "status");
  }

  error(message: string, context?: string): void {
    log.error(message, context || "status");
  }

  debug(message: string, context?: string): void {
    log.debug(message, context || "status");
  }
}

export function createStatusService(handler: ProgressHandler): StatusService {
  return new StatusService(handler);
}

/**
 * Status service that only logs, for tests and non-interactive use
 */
export function createNoOpStatusService(): StatusService {
  return new StatusService();
}
