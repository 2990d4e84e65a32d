// Port: Logger
// Diagnostics for one component; the adapter decides the module tag and output

export interface LoggerPort {
  info(message: string, ...args: unknown[]): void;
  verbose(message: string, data?: Record<string, unknown>): void;
  performance(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
  stateTransition(from: string, to: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}
