// gcloud Auth - interactive `gcloud auth login`, then `gcloud config set project`
// Output of both commands is streamed line by line to the caller

import { ChildProcess, spawn } from 'child_process';
import * as readline from 'readline';
import { LoggerPort } from '../../../domain/ports/logger';
import { GcloudCommand } from '../../../domain/types/types';
import {
  CommandContext,
  DEFAULT_GCLOUD_PATH,
  buildAuthLoginCommand,
  buildSetProjectCommand,
  launchFailure,
} from './gcloudCommand';
import { LoggerAdapter } from '../../adapters/logging/loggerAdapter';

export type OutputListener = (line: string) => void;

export interface GcloudAuthOptions {
  gcloudPath?: string;
  platform?: NodeJS.Platform;
  logger?: LoggerPort;
}

export interface LoginOutcome {
  /** Project made active after login, undefined when none was given */
  projectId?: string;
}

export class GcloudAuth {
  private readonly context: CommandContext;
  private readonly logger: LoggerPort;

  constructor(options: GcloudAuthOptions = {}) {
    this.context = {
      gcloudPath: options.gcloudPath || DEFAULT_GCLOUD_PATH,
      platform: options.platform ?? process.platform,
    };
    this.logger = options.logger ?? new LoggerAdapter('GcloudAuth');
  }

  /**
   * Authenticate, then set the active project when one is given.
   * A non-zero exit of either step rejects; the project step only runs after a successful login.
   */
  async login(projectId: string | undefined, onOutput: OutputListener): Promise<LoginOutcome> {
    // An invalid project ID fails before the login step starts
    const setProject = projectId ? buildSetProjectCommand(projectId, this.context) : undefined;

    this.logger.info('Starting gcloud authentication');
    const authCode = await this.run(buildAuthLoginCommand(this.context), onOutput);
    if (authCode !== 0) {
      throw new Error(`gcloud auth login exited with code ${authCode ?? 'none'}`);
    }
    this.logger.info('Authentication succeeded');

    if (!setProject) {
      this.logger.info('No project ID provided; skipping gcloud config set project');
      return {};
    }

    this.logger.info(`Setting project: ${projectId}`);
    const configCode = await this.run(setProject, onOutput);
    if (configCode !== 0) {
      throw new Error(`gcloud config set project exited with code ${configCode ?? 'none'}`);
    }
    this.logger.info(`Project set to ${projectId}`);
    return { projectId };
  }

  /**
   * Spawn a command with stdin inherited for prompts, resolving with its exit code
   */
  private run({ command, args }: GcloudCommand, onOutput: OutputListener): Promise<number | null> {
    this.logger.verbose('Running gcloud command', { command, args });

    return new Promise<number | null>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          env: process.env,
          stdio: ['inherit', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (error) {
        reject(launchFailure(error, command));
        return;
      }

      let spawned = false;
      let settled = false;

      child.once('spawn', () => {
        spawned = true;
      });

      child.on('error', (error: Error) => {
        if (spawned || settled) {
          this.logger.error(`'${command}' reported an error`, error);
          return;
        }
        settled = true;
        reject(launchFailure(error, command));
      });

      child.once('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        resolve(code);
      });

      for (const stream of [child.stdout, child.stderr]) {
        if (!stream) continue;
        readline.createInterface({ input: stream, crlfDelay: Infinity }).on('line', onOutput);
      }
    });
  }
}
