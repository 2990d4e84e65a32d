// gcloud Log Source - streams `gcloud app logs tail` output line by line
// One child process per session; stdout and stderr are merged

import { ChildProcess, execFile, spawn } from 'child_process';
import * as readline from 'readline';
import { Readable } from 'stream';
import { LogSourcePort } from '../../../domain/ports/logSource';
import { LoggerPort } from '../../../domain/ports/logger';
import { LogLine } from '../../../domain/types/types';
import { EndOfStreamError, SourceUnavailableError } from '../../../domain/errors/tailerError';
import {
  CommandContext,
  DEFAULT_GCLOUD_PATH,
  buildTailCommand,
  buildVersionCommand,
  isMissingCommand,
  launchFailure,
} from './gcloudCommand';
import { DEFAULT_HIGH_WATER_MARK, LineQueue } from './lineQueue';
import { LoggerAdapter } from '../../adapters/logging/loggerAdapter';

const DEFAULT_STOP_TIMEOUT_MS = 5000;
const VERSION_TIMEOUT_MS = 30000;

export interface GcloudLogSourceOptions {
  gcloudPath?: string;
  platform?: NodeJS.Platform;
  stopTimeoutMs?: number;
  /** Unread lines buffered before the process output is paused */
  highWaterMark?: number;
  logger?: LoggerPort;
}

/**
 * One launched tail process. Events of a process that is no longer
 * the current one only touch its own record.
 */
interface TailProcess {
  child: ChildProcess;
  queue: LineQueue<LogLine>;
  exited: Promise<void>;
  finished: boolean;
  stopRequested: boolean;
  stopping?: Promise<void>;
}

export class GcloudLogSource implements LogSourcePort {
  private readonly context: CommandContext;
  private readonly stopTimeoutMs: number;
  private readonly highWaterMark: number;
  private readonly logger: LoggerPort;
  private current?: TailProcess;

  constructor(options: GcloudLogSourceOptions = {}) {
    this.context = {
      gcloudPath: options.gcloudPath || DEFAULT_GCLOUD_PATH,
      platform: options.platform ?? process.platform,
    };
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.logger = options.logger ?? new LoggerAdapter('GcloudLogSource');
  }

  get running(): boolean {
    return this.current !== undefined;
  }

  /**
   * Run `gcloud --version` and return its output
   */
  version(): Promise<string> {
    const { command, args } = buildVersionCommand(this.context);
    this.logger.verbose('Checking gcloud version', { command, args });

    return new Promise<string>((resolve, reject) => {
      execFile(command, args, { timeout: VERSION_TIMEOUT_MS, windowsHide: true }, (error, stdout, stderr) => {
        if (error) {
          reject(
            isMissingCommand(error)
              ? launchFailure(error, command)
              : new Error(`gcloud --version failed: ${stderr.trim() || error.message}`)
          );
          return;
        }
        resolve(stdout.trim());
      });
    });
  }

  start(projectId: string): AsyncIterable<LogLine> {
    if (this.current) {
      throw new SourceUnavailableError('Log source is already running');
    }
    const { command, args } = buildTailCommand(projectId, this.context);

    this.logger.info(`Starting log tail for project: ${projectId}`);
    this.logger.verbose('Spawning tail process', { command, args });

    const readers: readline.Interface[] = [];
    const queue = new LineQueue<LogLine>({
      highWaterMark: this.highWaterMark,
      onPause: () => {
        this.logger.verbose('Output consumer is behind, pausing reads', { buffered: this.highWaterMark });
        readers.forEach(reader => reader.pause());
      },
      onResume: () => readers.forEach(reader => reader.resume()),
    });

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      throw launchFailure(error, command);
    }

    let markExited: () => void = () => undefined;
    const exited = new Promise<void>(resolve => {
      markExited = resolve;
    });
    const tail: TailProcess = { child, queue, exited, finished: false, stopRequested: false };
    this.current = tail;

    const finish = (): void => {
      tail.finished = true;
      if (this.current === tail) {
        this.current = undefined;
      }
      markExited();
    };

    let spawned = false;
    let launchFailed = false;

    child.once('spawn', () => {
      spawned = true;
      this.logger.info(`Log tail process started, PID: ${child.pid}`);
    });

    child.on('error', (error: Error) => {
      if (spawned || tail.finished) {
        this.logger.error('Log tail process error', error);
        return;
      }
      launchFailed = true;
      this.logger.error('Could not launch log tail', error);
      queue.end(launchFailure(error, command));
      finish();
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      // Node still closes the pipes of a process that never started
      if (launchFailed) return;

      if (tail.stopRequested) {
        this.logger.info(`Log tail process exited after stop (code: ${code}, signal: ${signal})`);
        queue.end();
      } else {
        this.logger.info(`Log tail process exited unexpectedly (code: ${code}, signal: ${signal})`);
        queue.end(new EndOfStreamError(code, signal));
      }
      finish();
    });

    this.pipeLines(child.stdout, queue, readers);
    this.pipeLines(child.stderr, queue, readers);

    return this.iterate(tail);
  }

  /**
   * Terminate the tail process and wait for it to exit.
   * Escalates to SIGKILL when SIGTERM is ignored.
   */
  stop(): Promise<void> {
    const tail = this.current;
    return tail ? this.stopProcess(tail) : Promise.resolve();
  }

  private stopProcess(tail: TailProcess): Promise<void> {
    if (tail.finished) {
      return Promise.resolve();
    }
    if (!tail.stopping) {
      tail.stopping = this.terminate(tail);
    }
    return tail.stopping;
  }

  private async terminate(tail: TailProcess): Promise<void> {
    const { child } = tail;
    tail.stopRequested = true;
    this.logger.info(`Stopping log tail process, PID: ${child.pid}`);
    child.kill('SIGTERM');

    const timer = setTimeout(() => {
      this.logger.info(`Log tail process ignored SIGTERM after ${this.stopTimeoutMs}ms, sending SIGKILL`);
      child.kill('SIGKILL');
    }, this.stopTimeoutMs);

    try {
      await tail.exited;
    } finally {
      clearTimeout(timer);
    }
  }

  private pipeLines(stream: Readable | null, queue: LineQueue<LogLine>, readers: readline.Interface[]): void {
    if (!stream) return;
    const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
    reader.on('line', (text: string) => {
      queue.push({ text, receivedAt: new Date() });
    });
    readers.push(reader);
  }

  private async *iterate(tail: TailProcess): AsyncGenerator<LogLine> {
    try {
      for await (const line of tail.queue) {
        yield line;
      }
    } finally {
      await this.stopProcess(tail);
    }
  }
}
