import * as fs from 'fs/promises';
import * as path from 'path';
import { RotatingLogWriter } from '../../../src/infrastructure/adapters/storage/rotatingLogWriter';
import { InvalidConfigurationError, WriteFailureError } from '../../../src/domain/errors/tailerError';
import { LogLine, WriterConfig } from '../../../src/domain/types/types';
import { createTempDir, listFiles, readLines, removeTempDir } from '@helpers/temp-dir';
import { LoggerMock } from '@mocks/adapters/logger.mock';

function line(text: string): LogLine {
  return { text, receivedAt: new Date() };
}

describe('RotatingLogWriter', () => {
  let baseDirectory: string;

  beforeEach(async () => {
    baseDirectory = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(baseDirectory);
  });

  const sizeConfig = (overrides: Partial<WriterConfig> = {}): WriterConfig => ({
    mode: 'size',
    baseDirectory,
    sizeThresholdBytes: 100,
    fileBaseName: 'appengine',
    maxFiles: 0,
    ...overrides,
  });

  const dailyConfig = (): WriterConfig => ({
    mode: 'daily',
    baseDirectory,
    sizeThresholdBytes: 100,
    fileBaseName: 'appengine',
    maxFiles: 0,
  });

  describe('size mode', () => {
    it('should rotate after the file grows past the threshold (4 + 1 lines of 30 bytes)', async () => {
      const writer = new RotatingLogWriter(sizeConfig());
      const lines = ['a', 'b', 'c', 'd', 'e'].map(letter => letter.repeat(29));

      for (const text of lines) {
        await writer.write(line(text));
      }
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual(['appengine.000001.log', 'appengine.000002.log']);
      expect(await readLines(path.join(baseDirectory, 'appengine.000001.log'))).toEqual(lines.slice(0, 4));
      expect(await readLines(path.join(baseDirectory, 'appengine.000002.log'))).toEqual(lines.slice(4));
    });

    it('should give a line larger than the threshold a file of its own', async () => {
      const writer = new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 50 }));

      await writer.write(line('a'.repeat(10)));
      await writer.write(line('b'.repeat(80)));
      await writer.write(line('c'.repeat(10)));
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual([
        'appengine.000001.log',
        'appengine.000002.log',
        'appengine.000003.log',
      ]);
      expect(await readLines(path.join(baseDirectory, 'appengine.000002.log'))).toEqual(['b'.repeat(80)]);
    });

    it('should keep every line exactly once and in order across rotations', async () => {
      const writer = new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 64 }));
      const lines = Array.from({ length: 40 }, (_, i) => `request ${i} ${'.'.repeat(i % 17)}`);

      for (const text of lines) {
        await writer.write(line(text));
      }
      await writer.close();

      const files = await listFiles(baseDirectory);
      const written: string[] = [];
      for (const file of files) {
        const content = await readLines(path.join(baseDirectory, file));
        written.push(...content);
        const size = (await fs.stat(path.join(baseDirectory, file))).size;
        const lastLineBytes = Buffer.byteLength(content[content.length - 1] + '\n');
        expect(size - lastLineBytes).toBeLessThanOrEqual(64);
      }
      expect(files.length).toBeGreaterThan(1);
      expect(written).toEqual(lines);
    });

    it('should count bytes, not characters', async () => {
      const writer = new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 10 }));

      await writer.write(line('ééééé')); // 10 bytes + terminator
      await writer.write(line('x'));
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual(['appengine.000001.log', 'appengine.000002.log']);
    });

    it('should append to the highest existing index on restart', async () => {
      await fs.writeFile(path.join(baseDirectory, 'appengine.000002.log'), 'older\n');
      await fs.writeFile(path.join(baseDirectory, 'appengine.000003.log'), 'previous session\n');

      const writer = new RotatingLogWriter(sizeConfig());
      await writer.write(line('new session'));
      await writer.close();

      expect(await readLines(path.join(baseDirectory, 'appengine.000003.log'))).toEqual([
        'previous session',
        'new session',
      ]);
    });

    it('should move past a resumed file that is already over the threshold', async () => {
      await fs.writeFile(path.join(baseDirectory, 'appengine.000001.log'), 'x'.repeat(150) + '\n');

      const writer = new RotatingLogWriter(sizeConfig());
      await writer.write(line('fresh'));
      await writer.close();

      expect(await readLines(path.join(baseDirectory, 'appengine.000002.log'))).toEqual(['fresh']);
    });

    it('should ignore unrelated files in the directory', async () => {
      await fs.writeFile(path.join(baseDirectory, 'notes.txt'), 'keep me\n');

      const writer = new RotatingLogWriter(sizeConfig());
      await writer.write(line('first'));
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual(['appengine.000001.log', 'notes.txt']);
    });

    it('should delete the oldest files beyond maxFiles', async () => {
      const writer = new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 10, maxFiles: 2 }));

      for (const text of ['1111111111', '2222222222', '3333333333', '4444444444']) {
        await writer.write(line(text));
      }
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual(['appengine.000003.log', 'appengine.000004.log']);
      expect(await readLines(path.join(baseDirectory, 'appengine.000004.log'))).toEqual(['4444444444']);
    });

    it('should report rotations and pruning through its logger', async () => {
      const logger = new LoggerMock();
      const writer = new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 10, maxFiles: 1 }), () => new Date(), logger);

      await writer.write(line('1111111111'));
      await writer.write(line('2222222222'));
      await writer.close();

      expect(logger.messages()).toEqual([
        `Rotated size log: ${path.join(baseDirectory, 'appengine.000001.log')} (11 bytes) -> ${path.join(baseDirectory, 'appengine.000002.log')}`,
        `Removed rotated log beyond retention: ${path.join(baseDirectory, 'appengine.000001.log')}`,
      ]);
      expect(logger.verbose).toHaveBeenCalledWith('Writer closed', { lines_written: 2 });
    });

    it('should create the base directory when missing', async () => {
      const nested = path.join(baseDirectory, 'logs', 'gae');
      const writer = new RotatingLogWriter(sizeConfig({ baseDirectory: nested }));

      await writer.write(line('hello'));

      expect(writer.currentFile()).toBe(path.join(nested, 'appengine.000001.log'));
      await writer.close();
      expect(writer.currentFile()).toBeUndefined();
    });
  });

  describe('daily mode', () => {
    it('should switch files when the date changes', async () => {
      let now = new Date(2024, 0, 1, 23, 58);
      const writer = new RotatingLogWriter(dailyConfig(), () => now);

      await writer.write(line('late on new year'));
      await writer.write(line('still new year'));
      now = new Date(2024, 0, 2, 0, 1);
      await writer.write(line('the next day'));
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual([
        path.join('2024-01', '2024-01-01.log'),
        path.join('2024-01', '2024-01-02.log'),
      ]);
      expect(await readLines(path.join(baseDirectory, '2024-01', '2024-01-01.log'))).toEqual([
        'late on new year',
        'still new year',
      ]);
      expect(await readLines(path.join(baseDirectory, '2024-01', '2024-01-02.log'))).toEqual(['the next day']);
    });

    it('should create a new month directory at month end', async () => {
      let now = new Date(2024, 0, 31, 12, 0);
      const writer = new RotatingLogWriter(dailyConfig(), () => now);

      await writer.write(line('january'));
      now = new Date(2024, 1, 1, 12, 0);
      await writer.write(line('february'));
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual([
        path.join('2024-01', '2024-01-31.log'),
        path.join('2024-02', '2024-02-01.log'),
      ]);
    });

    it('should append to an existing file for the same date', async () => {
      await fs.mkdir(path.join(baseDirectory, '2024-03'), { recursive: true });
      await fs.writeFile(path.join(baseDirectory, '2024-03', '2024-03-15.log'), 'earlier run\n');

      const writer = new RotatingLogWriter(dailyConfig(), () => new Date(2024, 2, 15, 9, 30));
      await writer.write(line('later run'));
      await writer.close();

      expect(await readLines(path.join(baseDirectory, '2024-03', '2024-03-15.log'))).toEqual([
        'earlier run',
        'later run',
      ]);
    });

    it('should ignore the size threshold', async () => {
      const writer = new RotatingLogWriter(dailyConfig(), () => new Date(2024, 5, 1, 8, 0));

      for (let i = 0; i < 10; i++) {
        await writer.write(line('x'.repeat(40)));
      }
      await writer.close();

      expect(await listFiles(baseDirectory)).toEqual([path.join('2024-06', '2024-06-01.log')]);
    });
  });

  describe('failures', () => {
    it('should reject invalid configuration up front', () => {
      expect(() => new RotatingLogWriter(sizeConfig({ sizeThresholdBytes: 0 }))).toThrow(InvalidConfigurationError);
      expect(() => new RotatingLogWriter(sizeConfig({ fileBaseName: 'a/b' }))).toThrow(InvalidConfigurationError);
      expect(() => new RotatingLogWriter(sizeConfig({ maxFiles: -1 }))).toThrow(InvalidConfigurationError);
      expect(() => new RotatingLogWriter(sizeConfig({ baseDirectory: ' ' }))).toThrow(InvalidConfigurationError);
    });

    it('should report WriteFailure when the directory cannot be created and stay failed', async () => {
      const blocker = path.join(baseDirectory, 'not-a-directory');
      await fs.writeFile(blocker, 'plain file\n');
      const logger = new LoggerMock();
      const writer = new RotatingLogWriter(sizeConfig({ baseDirectory: blocker }), () => new Date(), logger);

      const first = writer.write(line('lost'));
      await expect(first).rejects.toBeInstanceOf(WriteFailureError);
      expect(logger.error).toHaveBeenCalledWith('Write failed', expect.any(WriteFailureError));
      await expect(writer.write(line('also lost'))).rejects.toBeInstanceOf(WriteFailureError);
      await writer.close();

      expect(await fs.readFile(blocker, 'utf8')).toBe('plain file\n');
    });

    it('should reject writes after close and tolerate a second close', async () => {
      const writer = new RotatingLogWriter(sizeConfig());
      await writer.write(line('only line'));
      await writer.close();
      await writer.close();

      await expect(writer.write(line('too late'))).rejects.toThrow('Writer is closed');
      expect(await readLines(path.join(baseDirectory, 'appengine.000001.log'))).toEqual(['only line']);
    });
  });
});
