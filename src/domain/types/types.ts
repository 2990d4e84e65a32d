// Type definitions for the tailing pipeline and its configuration

export type RotationMode = 'size' | 'daily';

export type SessionStatus = 'IDLE' | 'STARTING' | 'RUNNING' | 'STOPPING' | 'STOPPED' | 'FAILED';

/**
 * One line of source output, without its terminator.
 * receivedAt is stamped by the reader when the line arrives.
 */
export interface LogLine {
  text: string;
  receivedAt: Date;
}

export interface WriterConfig {
  mode: RotationMode;
  baseDirectory: string;
  sizeThresholdBytes: number; // Only read in size mode
  fileBaseName: string; // Size mode file prefix
  maxFiles: number; // Size mode retention, 0 keeps every file
}

export interface SessionConfig {
  projectId: string;
  writer: WriterConfig;
}

export interface AppConfig extends SessionConfig {
  gcloudPath: string;
  echo: boolean;
  verbose: boolean;
}

export interface GcloudCommand {
  command: string;
  args: string[];
}
