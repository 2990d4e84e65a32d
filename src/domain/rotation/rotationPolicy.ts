// Rotation Policy - pure decisions for the rotating writer
// Size mode numbers files sequentially, daily mode keys files by local date

import * as path from 'path';

export const SIZE_INDEX_WIDTH = 6;
export const LOG_EXTENSION = '.log';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Local wall-clock date as YYYY-MM-DD
 */
export function formatDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

/**
 * Relative path of the daily file for a date key: YYYY-MM/YYYY-MM-DD.log
 */
export function dailyRelativePath(dateKey: string): string {
  return path.join(dateKey.slice(0, 7), `${dateKey}${LOG_EXTENSION}`);
}

export function sizeFileName(fileBaseName: string, index: number): string {
  return `${fileBaseName}.${pad(index, SIZE_INDEX_WIDTH)}${LOG_EXTENSION}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Extract the rotation index from a size-mode file name.
 * Returns undefined for files that do not belong to this base name.
 */
export function parseSizeFileIndex(fileBaseName: string, fileName: string): number | undefined {
  const pattern = new RegExp(`^${escapeRegExp(fileBaseName)}\\.(\\d{${SIZE_INDEX_WIDTH},})${escapeRegExp(LOG_EXTENSION)}$`);
  const match = fileName.match(pattern);
  if (!match) return undefined;
  return parseInt(match[1], 10);
}

const MONTH_DIRECTORY_PATTERN = /^\d{4}-\d{2}$/;
const DAILY_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.log$/;

export function isMonthDirectoryName(name: string): boolean {
  return MONTH_DIRECTORY_PATTERN.test(name);
}

/**
 * Date key of a daily file name (YYYY-MM-DD.log), undefined for anything else
 */
export function parseDailyFileName(fileName: string): string | undefined {
  const match = fileName.match(DAILY_FILE_PATTERN);
  return match ? match[1] : undefined;
}

/**
 * Size mode rotates once the open file has grown past the threshold,
 * or before a line that on its own exceeds the threshold so it lands in a file of its own.
 * An empty file never rotates.
 */
export function needsSizeRotation(currentSize: number, lineBytes: number, thresholdBytes: number): boolean {
  if (currentSize === 0) return false;
  return currentSize > thresholdBytes || lineBytes > thresholdBytes;
}

export function needsDailyRotation(openDateKey: string, now: Date): boolean {
  return openDateKey !== formatDateKey(now);
}

/**
 * Indices that fall outside the retention window once newestIndex is open.
 * maxFiles of 0 keeps everything.
 */
export function indicesToPrune(existing: number[], newestIndex: number, maxFiles: number): number[] {
  if (maxFiles <= 0) return [];
  const oldestKept = newestIndex - maxFiles + 1;
  return existing.filter(index => index < oldestKept).sort((a, b) => a - b);
}
