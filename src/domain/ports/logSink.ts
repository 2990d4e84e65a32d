// Port: Log Sink
// Write-only destination for log lines

import { LogLine } from '../types/types';

export interface LogSinkPort {
  write(line: LogLine): Promise<void>;
  close(): Promise<void>;
  currentFile(): string | undefined;
}
