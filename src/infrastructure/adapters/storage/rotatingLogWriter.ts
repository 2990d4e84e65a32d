// Rotating Log Writer - append-only files with size or daily rotation
// Exactly one file handle is open at a time; files are only ever appended to

import * as fs from 'fs/promises';
import * as path from 'path';
import { LogSinkPort } from '../../../domain/ports/logSink';
import { LogLine, WriterConfig } from '../../../domain/types/types';
import { InvalidConfigurationError, WriteFailureError, describeError } from '../../../domain/errors/tailerError';
import {
  dailyRelativePath,
  formatDateKey,
  indicesToPrune,
  needsDailyRotation,
  needsSizeRotation,
  parseSizeFileIndex,
  sizeFileName,
} from '../../../domain/rotation/rotationPolicy';
import { LoggerPort } from '../../../domain/ports/logger';
import { LoggerAdapter } from '../logging/loggerAdapter';

const LINE_TERMINATOR = '\n';

interface OpenFile {
  handle: fs.FileHandle;
  filePath: string;
  size: number;
  dateKey?: string; // daily mode
  index?: number; // size mode
}

export type Clock = () => Date;

export function validateWriterConfig(config: WriterConfig): void {
  if (!config.baseDirectory.trim()) {
    throw new InvalidConfigurationError('Log directory must not be empty');
  }
  if (config.mode === 'size') {
    if (!Number.isInteger(config.sizeThresholdBytes) || config.sizeThresholdBytes <= 0) {
      throw new InvalidConfigurationError(`Size threshold must be a positive integer, got ${config.sizeThresholdBytes}`);
    }
    if (!config.fileBaseName || /[\\/]/.test(config.fileBaseName)) {
      throw new InvalidConfigurationError(`Invalid log file base name: '${config.fileBaseName}'`);
    }
  }
  if (!Number.isInteger(config.maxFiles) || config.maxFiles < 0) {
    throw new InvalidConfigurationError(`maxFiles must be a non-negative integer, got ${config.maxFiles}`);
  }
}

/**
 * Run a filesystem operation, reporting any failure as a WriteFailureError
 */
async function attempt<T>(action: string, filePath: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new WriteFailureError(`Failed to ${action} ${filePath}: ${describeError(error)}`, filePath, error);
  }
}

export class RotatingLogWriter implements LogSinkPort {
  private current?: OpenFile;
  private failure?: WriteFailureError;
  private closed = false;
  private linesWritten = 0;

  constructor(
    private readonly config: WriterConfig,
    private readonly clock: Clock = () => new Date(),
    private readonly logger: LoggerPort = new LoggerAdapter('RotatingLogWriter')
  ) {
    validateWriterConfig(config);
  }

  currentFile(): string | undefined {
    return this.current?.filePath;
  }

  async write(line: LogLine): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      throw new WriteFailureError('Writer is closed', this.config.baseDirectory);
    }

    const data = Buffer.from(line.text + LINE_TERMINATOR, 'utf8');
    try {
      const target = await this.prepareTarget(data.length);
      await attempt('append to', target.filePath, () => target.handle.appendFile(data));
      target.size += data.length;
      this.linesWritten++;
    } catch (error) {
      this.failure =
        error instanceof WriteFailureError
          ? error
          : new WriteFailureError(describeError(error), this.current?.filePath ?? this.config.baseDirectory, error);
      this.logger.error('Write failed', this.failure);
      throw this.failure;
    }
  }

  /**
   * Flush and close the open file. Further writes are rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.closeCurrent();
    this.logger.verbose('Writer closed', { lines_written: this.linesWritten });
  }

  private async prepareTarget(lineBytes: number): Promise<OpenFile> {
    if (this.config.mode === 'daily') {
      return this.prepareDailyTarget();
    }
    return this.prepareSizeTarget(lineBytes);
  }

  private async prepareDailyTarget(): Promise<OpenFile> {
    const now = this.clock();
    if (this.current?.dateKey !== undefined && !needsDailyRotation(this.current.dateKey, now)) {
      return this.current;
    }

    const previous = this.current?.filePath;
    await this.closeCurrent();

    const dateKey = formatDateKey(now);
    const filePath = path.join(this.config.baseDirectory, dailyRelativePath(dateKey));
    const monthDirectory = path.dirname(filePath);
    await attempt('create directory', monthDirectory, () => fs.mkdir(monthDirectory, { recursive: true }));

    const opened = await this.openFile(filePath);
    opened.dateKey = dateKey;
    this.current = opened;

    if (previous) {
      this.logger.info(`Rotated daily log: ${previous} -> ${filePath}`);
    }
    return opened;
  }

  private async prepareSizeTarget(lineBytes: number): Promise<OpenFile> {
    if (!this.current) {
      this.current = await this.openLatestSizeFile();
    }

    const current = this.current;
    if (!needsSizeRotation(current.size, lineBytes, this.config.sizeThresholdBytes)) {
      return current;
    }

    const nextIndex = (current.index ?? 0) + 1;
    await this.closeCurrent();
    const opened = await this.openSizeFile(nextIndex);
    this.current = opened;
    this.logger.info(`Rotated size log: ${current.filePath} (${current.size} bytes) -> ${opened.filePath}`);

    await this.pruneOldFiles(nextIndex);
    return opened;
  }

  /**
   * Resume the highest existing index so a restart appends rather than truncates
   */
  private async openLatestSizeFile(): Promise<OpenFile> {
    const directory = this.config.baseDirectory;
    await attempt('create directory', directory, () => fs.mkdir(directory, { recursive: true }));
    const indices = await this.listSizeIndices();
    const latest = indices.length > 0 ? Math.max(...indices) : 1;
    this.logger.verbose('Resuming size-mode log', { directory, index: latest, existing_files: indices.length });
    return this.openSizeFile(latest);
  }

  private async openSizeFile(index: number): Promise<OpenFile> {
    const filePath = path.join(this.config.baseDirectory, sizeFileName(this.config.fileBaseName, index));
    const opened = await this.openFile(filePath);
    opened.index = index;
    return opened;
  }

  private async listSizeIndices(): Promise<number[]> {
    const directory = this.config.baseDirectory;
    const entries = await attempt('list', directory, () => fs.readdir(directory));
    const indices: number[] = [];
    for (const entry of entries) {
      const index = parseSizeFileIndex(this.config.fileBaseName, entry);
      if (index !== undefined) indices.push(index);
    }
    return indices;
  }

  private async pruneOldFiles(newestIndex: number): Promise<void> {
    if (this.config.maxFiles <= 0) return;

    const stale = indicesToPrune(await this.listSizeIndices(), newestIndex, this.config.maxFiles);
    for (const index of stale) {
      const filePath = path.join(this.config.baseDirectory, sizeFileName(this.config.fileBaseName, index));
      await attempt('remove', filePath, () => fs.unlink(filePath));
      this.logger.info(`Removed rotated log beyond retention: ${filePath}`);
    }
  }

  private async openFile(filePath: string): Promise<OpenFile> {
    const handle = await attempt('open', filePath, () => fs.open(filePath, 'a'));
    try {
      const stats = await attempt('stat', filePath, () => handle.stat());
      this.logger.verbose('Opened log file', { file: filePath, size: stats.size });
      return { handle, filePath, size: stats.size };
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  private async closeCurrent(): Promise<void> {
    const current = this.current;
    if (!current) return;
    this.current = undefined;

    await attempt('flush', current.filePath, async () => {
      try {
        await current.handle.sync();
      } finally {
        await current.handle.close();
      }
    });
  }
}
