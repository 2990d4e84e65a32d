// Configuration loader for the tailer
// CLI flags override environment variables, which override defaults

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { AppConfig, WriterConfig } from '../domain/types/types';
import { InvalidConfigurationError } from '../domain/errors/tailerError';
import { isValidProjectId } from '../domain/validation/projectId';
import { parseSize } from '../domain/rotation/parseSize';
import { DEFAULT_GCLOUD_PATH } from '../infrastructure/connectors/gcloud/gcloudCommand';

export const APP_DIR_NAME = 'CloudLogTailer';
export const DEFAULT_MAX_SIZE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_FILE_BASE_NAME = 'appengine';

export interface ConfigOverrides {
  project?: string;
  logDir?: string;
  mode?: string;
  maxSize?: string;
  maxFiles?: string;
  fileName?: string;
  gcloudPath?: string;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * %APPDATA%/CloudLogTailer/logs on Windows, ~/.config/CloudLogTailer/logs elsewhere
 */
export function defaultLogDirectory(platform: NodeJS.Platform = process.platform, env: NodeJS.ProcessEnv = process.env): string {
  const base = platform === 'win32' ? env.APPDATA || os.homedir() : path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR_NAME, 'logs');
}

const writerSchema = z.object({
  logDir: z.string().trim().min(1, 'Log directory must not be empty'),
  mode: z.enum(['size', 'daily']),
  maxSize: z.union([z.string(), z.number()]).transform((value, ctx) => {
    const bytes = parseSize(value);
    if (bytes === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid size: '${value}' (expected e.g. 5MB, 512KB or a byte count)` });
      return z.NEVER;
    }
    return bytes;
  }),
  maxFiles: z.coerce.number().int().min(0),
  fileName: z.string().trim().regex(/^[^\\/]+$/, 'File name must not be empty or contain path separators'),
});

const configSchema = writerSchema.extend({
  projectId: z
    .string()
    .trim()
    .min(1, 'Project ID is required (--project, CLOUD_TAIL_PROJECT or GCLOUD_PROJECT)')
    .refine(isValidProjectId, value => ({ message: `Invalid project ID: '${value}'` })),
  gcloudPath: z.string().trim().min(1),
  echo: z.boolean(),
  verbose: z.boolean(),
});

type WriterSettings = z.infer<typeof writerSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function writerInput(overrides: ConfigOverrides, env: NodeJS.ProcessEnv): Record<keyof WriterSettings, unknown> {
  return {
    logDir: overrides.logDir ?? env.CLOUD_TAIL_LOG_DIR ?? defaultLogDirectory(process.platform, env),
    mode: overrides.mode ?? env.CLOUD_TAIL_MODE ?? 'size',
    maxSize: overrides.maxSize ?? env.CLOUD_TAIL_MAX_SIZE ?? DEFAULT_MAX_SIZE_BYTES,
    maxFiles: overrides.maxFiles ?? env.CLOUD_TAIL_MAX_FILES ?? 0,
    fileName: overrides.fileName ?? env.CLOUD_TAIL_FILE_NAME ?? DEFAULT_FILE_BASE_NAME,
  };
}

function toWriterConfig(settings: WriterSettings): WriterConfig {
  return {
    mode: settings.mode,
    baseDirectory: path.resolve(settings.logDir),
    sizeThresholdBytes: settings.maxSize,
    fileBaseName: settings.fileName,
    maxFiles: settings.maxFiles,
  };
}

/**
 * Project from flags or environment, undefined when none is set
 */
export function resolveProjectId(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const projectId = (overrides.project ?? env.CLOUD_TAIL_PROJECT ?? env.GCLOUD_PROJECT ?? '').trim();
  return projectId || undefined;
}

export function resolveGcloudPath(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): string {
  return overrides.gcloudPath ?? env.CLOUD_TAIL_GCLOUD_PATH ?? DEFAULT_GCLOUD_PATH;
}

/**
 * Writer settings alone, for commands that read existing log files
 */
export function loadWriterConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): WriterConfig {
  const parsed = writerSchema.safeParse(writerInput(overrides, env));
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }
  return toWriterConfig(parsed.data);
}

export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    ...writerInput(overrides, env),
    projectId: resolveProjectId(overrides, env) ?? '',
    gcloudPath: resolveGcloudPath(overrides, env),
    echo: !(overrides.quiet ?? false),
    verbose: overrides.verbose ?? env.CLOUD_TAIL_VERBOSE === 'true',
  });

  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }

  const config = parsed.data;
  return {
    projectId: config.projectId,
    gcloudPath: config.gcloudPath,
    echo: config.echo,
    verbose: config.verbose,
    writer: toWriterConfig(config),
  };
}
