import { LoggingSession, SessionObserver } from '../../../src/application/services/loggingSession';
import {
  EndOfStreamError,
  InvalidConfigurationError,
  SourceUnavailableError,
  WriteFailureError,
} from '../../../src/domain/errors/tailerError';
import { SessionConfig, SessionStatus, WriterConfig } from '../../../src/domain/types/types';
import { LogSourceMock } from '@mocks/infrastructure/source/log-source.mock';
import { MemorySinkMock } from '@mocks/infrastructure/sink/memory-sink.mock';
import { LoggerMock } from '@mocks/adapters/logger.mock';

describe('LoggingSession', () => {
  let source: LogSourceMock;
  let sink: MemorySinkMock;
  let logger: LoggerMock;
  let statuses: SessionStatus[];
  let lines: string[];
  let errors: Error[];
  let createSink: jest.Mock<MemorySinkMock, [WriterConfig]>;
  let session: LoggingSession;

  const config: SessionConfig = {
    projectId: 'my-project',
    writer: {
      mode: 'size',
      baseDirectory: '/tmp/gae-logs',
      sizeThresholdBytes: 100,
      fileBaseName: 'appengine',
      maxFiles: 0,
    },
  };

  beforeEach(() => {
    source = new LogSourceMock();
    sink = new MemorySinkMock();
    logger = new LoggerMock();
    statuses = [];
    lines = [];
    errors = [];
    createSink = jest.fn((_writerConfig: WriterConfig) => sink);
    const observer: SessionObserver = {
      onStatus: status => statuses.push(status),
      onLine: line => lines.push(line.text),
      onError: error => errors.push(error),
    };
    session = new LoggingSession({ source, createSink, logger, observer });
  });

  it('should pipe every line into the sink in order and stop cleanly', async () => {
    const outcome = session.start(config);
    source.emit('first', 'second', 'third');

    await session.stop();

    await expect(outcome).resolves.toEqual({ status: 'STOPPED', linesWritten: 3 });
    expect(sink.lines).toEqual(['first', 'second', 'third']);
    expect(lines).toEqual(['first', 'second', 'third']);
    expect(sink.closed).toBe(true);
    expect(statuses).toEqual(['STARTING', 'RUNNING', 'STOPPING', 'STOPPED']);
    expect(session.getStatus()).toBe('STOPPED');
    expect(errors).toEqual([]);
  });

  it('should hand the writer configuration to the sink factory and start the source for the project', async () => {
    const outcome = session.start(config);
    await session.stop();
    await outcome;

    expect(createSink).toHaveBeenCalledWith(config.writer);
    expect(source.startCalls).toEqual(['my-project']);
  });

  it('should log each state transition', async () => {
    const outcome = session.start(config);
    await session.stop();
    await outcome;

    expect(logger.transitions()).toEqual([
      'IDLE -> STARTING',
      'STARTING -> RUNNING',
      'RUNNING -> STOPPING',
      'STOPPING -> STOPPED',
    ]);
  });

  it('should treat a second stop as a no-op', async () => {
    const outcome = session.start(config);
    source.emit('only');

    await session.stop();
    await session.stop();

    await expect(outcome).resolves.toEqual({ status: 'STOPPED', linesWritten: 1 });
    expect(sink.lines).toEqual(['only']);
    expect(sink.closeCalls).toBe(1);
  });

  it('should resolve stop when nothing is running', async () => {
    await expect(session.stop()).resolves.toBeUndefined();
    expect(source.stopCalls).toBe(0);
  });

  it('should fail with EndOfStream when the source exits on its own', async () => {
    const outcome = session.start(config);
    source.emit('last words');
    source.exit(new EndOfStreamError(1, null));

    const result = await outcome;

    expect(result.status).toBe('FAILED');
    expect(result.linesWritten).toBe(1);
    expect(result.error).toBeInstanceOf(EndOfStreamError);
    expect(errors).toHaveLength(1);
    expect(sink.closed).toBe(true);
    expect(statuses[statuses.length - 1]).toBe('FAILED');
  });

  it('should fail with SourceUnavailable when the source cannot launch', async () => {
    source.failOnLaunch(new SourceUnavailableError('gcloud not found'));

    const result = await session.start(config);

    expect(result).toEqual({ status: 'FAILED', linesWritten: 0, error: expect.any(SourceUnavailableError) });
    expect(sink.closed).toBe(true);
    expect(logger.error).toHaveBeenCalledWith('Session failed', expect.any(SourceUnavailableError));
  });

  it('should stop the source and end the session on a write failure', async () => {
    sink.failFromWrite(2);
    const outcome = session.start(config);
    source.emit('kept', 'rejected', 'never written');

    const result = await outcome;

    expect(result.status).toBe('FAILED');
    expect(result.error).toBeInstanceOf(WriteFailureError);
    expect(result.linesWritten).toBe(1);
    expect(sink.lines).toEqual(['kept']);
    expect(source.stopCalls).toBeGreaterThanOrEqual(1);
    expect(errors[0]).toBe(result.error);
  });

  it('should reject an invalid project ID before touching the source', () => {
    expect(() => session.start({ ...config, projectId: '' })).toThrow(InvalidConfigurationError);
    expect(source.startCalls).toEqual([]);
    expect(createSink).not.toHaveBeenCalled();
  });

  it('should refuse to start twice while running', async () => {
    const outcome = session.start(config);

    expect(() => session.start(config)).toThrow('Logging session is already running');

    await session.stop();
    await outcome;
  });

  it('should allow a new session after the previous one stopped', async () => {
    const first = session.start(config);
    await session.stop();
    await first;

    const second = session.start(config);
    source.emit('again');
    await session.stop();

    await expect(second).resolves.toEqual({ status: 'STOPPED', linesWritten: 1 });
    expect(source.startCalls).toEqual(['my-project', 'my-project']);
  });

  it('should expose the file currently written by the sink', async () => {
    const outcome = session.start(config);

    expect(session.currentFile()).toBe('memory.log');

    await session.stop();
    await outcome;
    expect(session.currentFile()).toBeUndefined();
  });
});
