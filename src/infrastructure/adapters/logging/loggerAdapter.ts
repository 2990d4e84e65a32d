import { LoggerPort } from '../../../domain/ports/logger';
import { log, logVerbose, logPerformance, logStateTransition, logError } from './logger';

/**
 * LoggerPort bound to one module tag, backed by the shared console logger
 */
export class LoggerAdapter implements LoggerPort {
  constructor(private readonly module: string) {}

  info(message: string, ...args: unknown[]): void {
    log(this.module, message, ...args);
  }

  verbose(message: string, data?: Record<string, unknown>): void {
    logVerbose(this.module, message, data);
  }

  performance(operation: string, durationMs: number, metadata?: Record<string, unknown>): void {
    logPerformance(`${this.module}:${operation}`, durationMs, metadata);
  }

  stateTransition(from: string, to: string, context?: Record<string, unknown>): void {
    logStateTransition(from, to, { module: this.module, ...context });
  }

  error(message: string, error?: unknown): void {
    logError(this.module, message, error);
  }
}
