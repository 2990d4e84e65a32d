import { parseSize } from '../../../src/domain/rotation/parseSize';

describe('parseSize', () => {
  it('should accept plain byte counts', () => {
    expect(parseSize('1048576')).toBe(1048576);
    expect(parseSize(100)).toBe(100);
  });

  it('should apply binary unit multipliers case-insensitively', () => {
    expect(parseSize('512KB')).toBe(524288);
    expect(parseSize('5mb')).toBe(5242880);
    expect(parseSize('1 GB')).toBe(1073741824);
    expect(parseSize('1.5KB')).toBe(1536);
  });

  it('should reject zero, negative and malformed sizes', () => {
    expect(parseSize('0')).toBeUndefined();
    expect(parseSize(0)).toBeUndefined();
    expect(parseSize(-5)).toBeUndefined();
    expect(parseSize(2.5)).toBeUndefined();
    expect(parseSize('-5MB')).toBeUndefined();
    expect(parseSize('five megabytes')).toBeUndefined();
  });
});
