#!/usr/bin/env node
// Operator CLI Entrypoint
// Tails App Engine logs into rotating files until interrupted

import { Command } from 'commander';
import dotenv from 'dotenv';
import { ConfigOverrides, loadConfig, loadWriterConfig, resolveGcloudPath, resolveProjectId } from './config/appConfig';
import { AppConfig, LogLine } from './domain/types/types';
import { LogSourcePort } from './domain/ports/logSource';
import { SourceUnavailableError, describeError } from './domain/errors/tailerError';
import { LoggingSession, SessionOutcome } from './application/services/loggingSession';
import { GcloudLogSource } from './infrastructure/connectors/gcloud/gcloudLogSource';
import { GcloudAuth } from './infrastructure/connectors/gcloud/gcloudAuth';
import { RotatingLogWriter } from './infrastructure/adapters/storage/rotatingLogWriter';
import { LogArchive } from './infrastructure/adapters/storage/logArchive';
import { log as logShared, logError, logVerbose, setVerbose } from './infrastructure/adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('CLI', message, ...args);
}

/**
 * A log source that can also report the installed gcloud version
 */
export type TailSource = LogSourcePort & Pick<GcloudLogSource, 'version'>;

function echoLine(line: LogLine): void {
  process.stdout.write(line.text + '\n');
}

/**
 * Print the gcloud version. A missing SDK ends the command, any other
 * failure is only a warning.
 */
async function reportVersion(source: TailSource): Promise<void> {
  try {
    const version = await source.version();
    console.log(`gcloud version:\n${version}`);
  } catch (error) {
    if (error instanceof SourceUnavailableError) {
      throw error;
    }
    log(`Warning: could not get gcloud version (${describeError(error)})`);
  }
}

/**
 * Run one logging session. Resolves when the session stops (SIGINT/SIGTERM) or fails.
 */
async function tail(config: AppConfig, source: TailSource = new GcloudLogSource({ gcloudPath: config.gcloudPath })): Promise<SessionOutcome> {
  setVerbose(config.verbose);
  logVerbose('CLI:Tail', 'Configuration loaded', {
    project_id: config.projectId,
    mode: config.writer.mode,
    base_directory: config.writer.baseDirectory,
    size_threshold_bytes: config.writer.sizeThresholdBytes,
    max_files: config.writer.maxFiles,
  });

  await reportVersion(source);

  const session = new LoggingSession({
    source,
    createSink: writerConfig => new RotatingLogWriter(writerConfig),
    observer: {
      onLine: config.echo ? echoLine : undefined,
      onError: error => logError('CLI', 'Logging stopped', error),
    },
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    log(`Received ${signal}, stopping logging`);
    session.stop().catch((error: unknown) => logError('CLI', 'Failed to stop logging session', error));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    log(`Started logging for project: ${config.projectId} -> ${config.writer.baseDirectory} (${config.writer.mode} mode)`);
    console.log('Waiting for new log entries...');
    const outcome = await session.start(config);
    log(`-- Logging stopped -- (${outcome.linesWritten} lines written)`);
    return outcome;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

// Command handlers: each reports failures on stderr and sets a non-zero exit code

async function runTail(
  options: ConfigOverrides,
  createSource: (config: AppConfig) => TailSource = config => new GcloudLogSource({ gcloudPath: config.gcloudPath })
): Promise<void> {
  try {
    const config = loadConfig(options);
    const outcome = await tail(config, createSource(config));
    if (outcome.status === 'FAILED') {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Failed to tail logs:', describeError(error));
    process.exitCode = 1;
  }
}

async function runExport(destination: string | undefined, options: ConfigOverrides, archive: LogArchive = new LogArchive()): Promise<void> {
  try {
    const target = await archive.exportCurrent(loadWriterConfig(options), destination);
    console.log(`Logs exported to ${target}`);
  } catch (error) {
    console.error('Export logs failed:', describeError(error));
    process.exitCode = 1;
  }
}

async function runExportAll(destination: string | undefined, options: ConfigOverrides, archive: LogArchive = new LogArchive()): Promise<void> {
  try {
    const { archivePath, entries } = await archive.archiveAll(loadWriterConfig(options).baseDirectory, destination);
    for (const entry of entries) {
      console.log(`  added ${entry}`);
    }
    console.log(`All logs exported to ${archivePath}`);
  } catch (error) {
    console.error('Batch export failed:', describeError(error));
    process.exitCode = 1;
  }
}

async function runLogin(options: ConfigOverrides, auth: GcloudAuth = new GcloudAuth({ gcloudPath: resolveGcloudPath(options) })): Promise<void> {
  const projectId = resolveProjectId(options);
  try {
    const outcome = await auth.login(projectId, line => console.log(line));
    console.log('gcloud auth login completed successfully.');
    if (outcome.projectId) {
      console.log(`gcloud config set project ${outcome.projectId} completed.`);
    } else {
      console.log('No project ID provided; skipped `gcloud config set project`.');
    }
  } catch (error) {
    console.error('Authentication failed:', describeError(error));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('cloud-log-tailer')
  .description('Tail Google App Engine logs into rotating local files');

// Command: tail
program
  .command('tail')
  .description('Stream `gcloud app logs tail` output into rotating log files')
  .option('-p, --project <id>', 'GCP project ID (default: CLOUD_TAIL_PROJECT or GCLOUD_PROJECT)')
  .option('-d, --log-dir <path>', 'Directory that receives the log files')
  .option('-m, --mode <mode>', 'Rotation mode: size or daily')
  .option('--max-size <size>', 'Size-mode rotation threshold (e.g. 5MB, 512KB, 1048576)')
  .option('--max-files <count>', 'Size-mode files to keep, 0 keeps all')
  .option('--file-name <name>', 'Size-mode file name prefix')
  .option('--gcloud-path <path>', 'Path to the gcloud executable')
  .option('-q, --quiet', 'Do not echo log lines to the terminal')
  .option('-v, --verbose', 'Verbose diagnostics')
  .action((options: ConfigOverrides) => runTail(options));

// Command: export
program
  .command('export [destination]')
  .description('Copy the current log file to a file or directory (default: current directory)')
  .option('-d, --log-dir <path>', 'Directory that holds the log files')
  .option('-m, --mode <mode>', 'Rotation mode the files were written with: size or daily')
  .option('--file-name <name>', 'Size-mode file name prefix')
  .action((destination: string | undefined, options: ConfigOverrides) => runExport(destination, options));

// Command: export-all
program
  .command('export-all [destination]')
  .description('Zip the whole log directory (default: ./gcloud_logs_YYYY-MM-DD.zip)')
  .option('-d, --log-dir <path>', 'Directory that holds the log files')
  .action((destination: string | undefined, options: ConfigOverrides) => runExportAll(destination, options));

// Command: login
program
  .command('login')
  .description('Run `gcloud auth login`, then make the project active')
  .option('-p, --project <id>', 'GCP project ID to set after login (default: CLOUD_TAIL_PROJECT or GCLOUD_PROJECT)')
  .option('--gcloud-path <path>', 'Path to the gcloud executable')
  .action((options: ConfigOverrides) => runLogin(options));

// Command: version
program
  .command('version')
  .description('Print the installed gcloud version')
  .option('--gcloud-path <path>', 'Path to the gcloud executable')
  .action(async (options: ConfigOverrides) => {
    const source = new GcloudLogSource({ gcloudPath: resolveGcloudPath(options) });
    try {
      console.log(await source.version());
    } catch (error) {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  });

// Parse arguments and execute
// Only parse if this file is being run directly (not imported)
if (require.main === module) {
  dotenv.config();
  program.parseAsync().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}

export { program, tail, runTail, runExport, runExportAll, runLogin };
