// Log Archive - copies the current log file out, or zips the whole log directory
// Works on the files the rotating writer leaves behind; never touches a running session

import * as fs from 'fs/promises';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { WriterConfig } from '../../../domain/types/types';
import { ExportFailureError, describeError } from '../../../domain/errors/tailerError';
import { LoggerPort } from '../../../domain/ports/logger';
import {
  formatDateKey,
  isMonthDirectoryName,
  parseDailyFileName,
  parseSizeFileIndex,
  sizeFileName,
} from '../../../domain/rotation/rotationPolicy';
import { Clock } from './rotatingLogWriter';
import { LoggerAdapter } from '../logging/loggerAdapter';

export const ARCHIVE_PREFIX = 'gcloud_logs_';

export interface ArchiveResult {
  archivePath: string;
  entries: string[];
}

export interface LogArchiveOptions {
  clock?: Clock;
  logger?: LoggerPort;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function listNames(directory: string): Promise<string[]> {
  try {
    return await fs.readdir(directory);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw new ExportFailureError(`Failed to list ${directory}: ${describeError(error)}`, directory, error);
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new ExportFailureError(`Failed to inspect ${target}: ${describeError(error)}`, target, error);
  }
}

/**
 * A destination naming an existing directory receives the file under its own name
 */
async function resolveDestination(destination: string | undefined, fileName: string): Promise<string> {
  if (!destination) {
    return path.resolve(fileName);
  }
  const target = path.resolve(destination);
  return (await isDirectory(target)) ? path.join(target, fileName) : target;
}

export class LogArchive {
  private readonly clock: Clock;
  private readonly logger: LoggerPort;

  constructor(options: LogArchiveOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new LoggerAdapter('LogArchive');
  }

  /**
   * The file the writer appends to next: the highest size index,
   * or the latest dated file in daily mode
   */
  async findCurrentLogFile(config: WriterConfig): Promise<string | undefined> {
    const base = config.baseDirectory;

    if (config.mode === 'size') {
      const indices: number[] = [];
      for (const name of await listNames(base)) {
        const index = parseSizeFileIndex(config.fileBaseName, name);
        if (index !== undefined) indices.push(index);
      }
      return indices.length > 0 ? path.join(base, sizeFileName(config.fileBaseName, Math.max(...indices))) : undefined;
    }

    const months = (await listNames(base)).filter(isMonthDirectoryName).sort().reverse();
    for (const month of months) {
      const days = (await listNames(path.join(base, month)))
        .filter(name => parseDailyFileName(name)?.startsWith(`${month}-`))
        .sort();
      const latest = days.pop();
      if (latest) {
        return path.join(base, month, latest);
      }
    }
    return undefined;
  }

  /**
   * Copy the current log file to destination (a file path or an existing directory)
   */
  async exportCurrent(config: WriterConfig, destination?: string): Promise<string> {
    const source = await this.findCurrentLogFile(config);
    if (!source) {
      throw new ExportFailureError(`No log files found in ${config.baseDirectory}`, config.baseDirectory);
    }

    const target = await resolveDestination(destination, path.basename(source));
    if (target === source) {
      throw new ExportFailureError(`Export destination is the log file itself: ${target}`, target);
    }

    try {
      await fs.copyFile(source, target);
    } catch (error) {
      throw new ExportFailureError(`Failed to copy ${source} to ${target}: ${describeError(error)}`, target, error);
    }

    this.logger.info(`Logs exported to ${target}`);
    return target;
  }

  /**
   * Zip every file under baseDirectory, stored under its path relative to it
   */
  async archiveAll(baseDirectory: string, destination?: string): Promise<ArchiveResult> {
    const root = path.resolve(baseDirectory);
    if (!(await isDirectory(root))) {
      throw new ExportFailureError(`No logs folder at ${root}`, root);
    }

    const archivePath = await resolveDestination(destination, `${ARCHIVE_PREFIX}${formatDateKey(this.clock())}.zip`);
    this.logger.info(`Exporting logs to ${archivePath}`);

    const files = (await this.collectFiles(root)).filter(file => file !== archivePath);
    const zip = new AdmZip();
    const entries: string[] = [];

    for (const file of files) {
      const entry = path.relative(root, file).split(path.sep).join('/');
      try {
        zip.addFile(entry, await fs.readFile(file));
      } catch (error) {
        throw new ExportFailureError(`Failed to read ${file}: ${describeError(error)}`, file, error);
      }
      entries.push(entry);
      this.logger.verbose('Added to archive', { entry });
    }

    try {
      await fs.writeFile(archivePath, zip.toBuffer());
    } catch (error) {
      throw new ExportFailureError(`Failed to write ${archivePath}: ${describeError(error)}`, archivePath, error);
    }

    this.logger.info(`All logs exported to ${archivePath} (${entries.length} files)`);
    return { archivePath, entries };
  }

  private async collectFiles(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      throw new ExportFailureError(`Failed to list ${directory}: ${describeError(error)}`, directory, error);
    });

    const files: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.collectFiles(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files;
  }
}
