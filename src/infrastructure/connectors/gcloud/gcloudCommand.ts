// gcloud command construction
// On Windows gcloud is invoked through PowerShell (pwsh)

import { GcloudCommand } from '../../../domain/types/types';
import { SourceUnavailableError, describeError } from '../../../domain/errors/tailerError';
import { assertProjectId } from '../../../domain/validation/projectId';

export const DEFAULT_GCLOUD_PATH = 'gcloud';
export const POWERSHELL = 'pwsh';

const POWERSHELL_ARGS = ['-NoLogo', '-NoProfile', '-NonInteractive', '-Command'];

export interface CommandContext {
  gcloudPath: string;
  platform: NodeJS.Platform;
}

function powershellInvocation(gcloudPath: string, args: string[]): string {
  const executable = /\s/.test(gcloudPath) ? `& '${gcloudPath.replace(/'/g, "''")}'` : gcloudPath;
  return [executable, ...args].join(' ');
}

function build(context: CommandContext, args: string[]): GcloudCommand {
  if (context.platform === 'win32') {
    return {
      command: POWERSHELL,
      args: [...POWERSHELL_ARGS, powershellInvocation(context.gcloudPath, args)],
    };
  }
  return { command: context.gcloudPath, args };
}

export function buildVersionCommand(context: CommandContext): GcloudCommand {
  return build(context, ['--version']);
}

export function buildTailCommand(projectId: string, context: CommandContext): GcloudCommand {
  assertProjectId(projectId);
  return build(context, ['app', 'logs', 'tail', `--project=${projectId}`]);
}

export function buildAuthLoginCommand(context: CommandContext): GcloudCommand {
  return build(context, ['auth', 'login', '--brief']);
}

export function buildSetProjectCommand(projectId: string, context: CommandContext): GcloudCommand {
  assertProjectId(projectId);
  return build(context, ['config', 'set', 'project', projectId]);
}

/**
 * Operator hint for an executable that could not be found
 */
export function missingCommandMessage(command: string): string {
  if (command === POWERSHELL) {
    return `Could not find '${POWERSHELL}'. Install PowerShell 7 and ensure 'pwsh' is on your PATH to run gcloud on Windows.`;
  }
  return `Could not find the gcloud CLI ('${command}'). Install the Google Cloud SDK and ensure 'gcloud' is on your PATH.`;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isMissingCommand(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Map a spawn error for `command` to SourceUnavailableError
 */
export function launchFailure(error: unknown, command: string): SourceUnavailableError {
  const code = errorCode(error);
  if (code === 'ENOENT') {
    return new SourceUnavailableError(missingCommandMessage(command), error);
  }
  if (code === 'EACCES') {
    return new SourceUnavailableError(`'${command}' is not executable: ${describeError(error)}`, error);
  }
  return new SourceUnavailableError(`Error launching '${command}': ${describeError(error)}`, error);
}
