// Logging Session - owns one tail-to-file pipeline from start to teardown
// Lines are written strictly in arrival order; every failure ends the session

import { LogSourcePort } from '../../domain/ports/logSource';
import { LogSinkPort } from '../../domain/ports/logSink';
import { LoggerPort } from '../../domain/ports/logger';
import { LogLine, SessionConfig, SessionStatus, WriterConfig } from '../../domain/types/types';
import { assertProjectId } from '../../domain/validation/projectId';
import { LoggerAdapter } from '../../infrastructure/adapters/logging/loggerAdapter';

export interface SessionObserver {
  onStatus?(status: SessionStatus): void;
  onLine?(line: LogLine): void;
  onError?(error: Error): void;
}

export interface SessionOutcome {
  status: 'STOPPED' | 'FAILED';
  linesWritten: number;
  error?: Error;
}

export type SinkFactory = (config: WriterConfig) => LogSinkPort;

export interface LoggingSessionDeps {
  source: LogSourcePort;
  createSink: SinkFactory;
  logger?: LoggerPort;
  observer?: SessionObserver;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class LoggingSession {
  private readonly source: LogSourcePort;
  private readonly createSink: SinkFactory;
  private readonly logger: LoggerPort;
  private readonly observer: SessionObserver;

  private status: SessionStatus = 'IDLE';
  private sink?: LogSinkPort;
  private running?: Promise<SessionOutcome>;
  private stopRequested = false;

  constructor(deps: LoggingSessionDeps) {
    this.source = deps.source;
    this.createSink = deps.createSink;
    this.logger = deps.logger ?? new LoggerAdapter('LoggingSession');
    this.observer = deps.observer ?? {};
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  currentFile(): string | undefined {
    return this.sink?.currentFile();
  }

  /**
   * Launch the source and pipe its lines into a fresh sink.
   * Resolves once the session has stopped or failed and all resources are released.
   */
  start(config: SessionConfig): Promise<SessionOutcome> {
    if (this.running) {
      throw new Error('Logging session is already running');
    }
    assertProjectId(config.projectId);

    const sink = this.createSink(config.writer);
    this.sink = sink;
    this.stopRequested = false;

    const run = this.execute(config, sink);
    this.running = run;
    return run.finally(() => {
      this.running = undefined;
    });
  }

  /**
   * Stop the source, drain it into the sink and close the sink.
   * Safe to call repeatedly or when no session is running.
   */
  async stop(): Promise<void> {
    const run = this.running;
    if (!run) return;

    if (!this.stopRequested) {
      this.stopRequested = true;
      this.transition('STOPPING');
      await this.source.stop();
    }
    await run;
  }

  private async execute(config: SessionConfig, sink: LogSinkPort): Promise<SessionOutcome> {
    const startTime = Date.now();
    let linesWritten = 0;
    let failure: Error | undefined;

    this.transition('STARTING', {
      project_id: config.projectId,
      mode: config.writer.mode,
      base_directory: config.writer.baseDirectory,
    });

    try {
      const lines = this.source.start(config.projectId);
      this.transition('RUNNING');

      for await (const line of lines) {
        await sink.write(line);
        linesWritten++;
        this.observer.onLine?.(line);
      }
    } catch (error) {
      failure = toError(error);
      this.logger.error('Session failed', failure);
    }

    try {
      await this.source.stop();
    } catch (error) {
      this.logger.error('Failed to stop log source', error);
      failure = failure ?? toError(error);
    }

    try {
      await sink.close();
    } catch (error) {
      this.logger.error('Failed to close log file', error);
      failure = failure ?? toError(error);
    }

    this.logger.performance('session', Date.now() - startTime, {
      project_id: config.projectId,
      lines_written: linesWritten,
    });

    if (failure) {
      this.transition('FAILED', { reason: failure.message, lines_written: linesWritten });
      this.observer.onError?.(failure);
      return { status: 'FAILED', linesWritten, error: failure };
    }

    this.transition('STOPPED', { lines_written: linesWritten });
    return { status: 'STOPPED', linesWritten };
  }

  private transition(to: SessionStatus, context?: Record<string, unknown>): void {
    const from = this.status;
    this.status = to;
    this.logger.stateTransition(from, to, context);
    this.observer.onStatus?.(to);
  }
}
