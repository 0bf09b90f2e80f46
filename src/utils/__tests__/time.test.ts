import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from '../errors';
import { annotationNumber, nextAnnotationNumber, normalizeAnnotationId } from '../id-generator';
import { formatSeconds, msToSec, toMs } from '../time';

describe('time', () => {
  it('converts milliseconds to seconds', () => {
    expect(msToSec(1500)).toBe(1.5);
  });

  it.each([
    [100, 100],
    [99.6, 100],
    ['250', 250],
    [' 42 ', 42],
  ])('reads %j as %d ms', (value, expected) => {
    expect(toMs(value)).toBe(expected);
  });

  it.each(['1.5', 'abc', '', NaN, Infinity])('rejects %j', (value) => {
    expect(() => toMs(value, 'start')).toThrow(InvalidArgumentError);
  });

  it('formats seconds with six decimals', () => {
    expect(formatSeconds(2750)).toBe('2.750000');
  });
});

describe('annotation ids', () => {
  it('parses the numeric suffix', () => {
    expect(annotationNumber('a12')).toBe(12);
    expect(annotationNumber('ann12')).toBeNull();
  });

  it('normalizes numeric ids', () => {
    expect(normalizeAnnotationId(3)).toBe('a3');
    expect(normalizeAnnotationId('a3')).toBe('a3');
  });

  it('continues after the highest id', () => {
    expect(nextAnnotationNumber(['a2', 'a10', 'x'])).toBe(11);
    expect(nextAnnotationNumber([])).toBe(1);
  });
});
