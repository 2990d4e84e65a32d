// cloud-log-tailer - Main Entry Point
// Exports all public APIs

// Session
export { LoggingSession } from './src/application/services/loggingSession';
export type { SessionObserver, SessionOutcome, SinkFactory, LoggingSessionDeps } from './src/application/services/loggingSession';

// Log Source
export { GcloudLogSource } from './src/infrastructure/connectors/gcloud/gcloudLogSource';
export type { GcloudLogSourceOptions } from './src/infrastructure/connectors/gcloud/gcloudLogSource';
export {
  buildTailCommand,
  buildVersionCommand,
  buildAuthLoginCommand,
  buildSetProjectCommand,
  missingCommandMessage,
} from './src/infrastructure/connectors/gcloud/gcloudCommand';

// Authentication
export { GcloudAuth } from './src/infrastructure/connectors/gcloud/gcloudAuth';
export type { GcloudAuthOptions, LoginOutcome } from './src/infrastructure/connectors/gcloud/gcloudAuth';

// Rotating Writer
export { RotatingLogWriter, validateWriterConfig } from './src/infrastructure/adapters/storage/rotatingLogWriter';
export { formatDateKey, dailyRelativePath, sizeFileName } from './src/domain/rotation/rotationPolicy';
export { parseSize } from './src/domain/rotation/parseSize';

// Export
export { LogArchive } from './src/infrastructure/adapters/storage/logArchive';
export type { ArchiveResult, LogArchiveOptions } from './src/infrastructure/adapters/storage/logArchive';

// Configuration
export { loadConfig, loadWriterConfig, defaultLogDirectory } from './src/config/appConfig';

// Errors
export {
  ErrorCategory,
  TailerError,
  SourceUnavailableError,
  EndOfStreamError,
  WriteFailureError,
  InvalidConfigurationError,
  ExportFailureError,
} from './src/domain/errors/tailerError';

// Ports & Types
export type { LogSourcePort } from './src/domain/ports/logSource';
export type { LogSinkPort } from './src/domain/ports/logSink';
export type { LoggerPort } from './src/domain/ports/logger';
export type {
  LogLine,
  RotationMode,
  SessionStatus,
  WriterConfig,
  SessionConfig,
  AppConfig,
} from './src/domain/types/types';
