// Port: Log Source
// Produces the sequential stream of lines consumed by a logging session

import { LogLine } from '../types/types';

export interface LogSourcePort {
  /**
   * Launch the source for a project and iterate its lines.
   * Launch failures surface as SourceUnavailableError on the first read,
   * an unexpected exit as EndOfStreamError after the buffered lines.
   */
  start(projectId: string): AsyncIterable<LogLine>;

  /**
   * Terminate the source. Safe to call repeatedly or before start.
   */
  stop(): Promise<void>;
}
