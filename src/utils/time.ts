import { InvalidArgumentError } from './errors';

/** Convert milliseconds to seconds */
export function msToSec(ms: number): number {
  return ms / 1000;
}

/**
 * Normalise a time given as a number or an integer string to whole milliseconds.
 * Fractional numbers are rounded; strings must be plain integers.
 */
export function toMs(value: number | string, label = 'time'): number {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!/^[-+]?\d+$/.test(trimmed)) {
      throw new InvalidArgumentError(`${label} "${value}" is not an integer`);
    }
    return parseInt(trimmed, 10);
  }
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${label} ${value} is not a finite number`);
  }
  return Math.round(value);
}

/** Seconds with six decimals, as RTTM expects */
export function formatSeconds(ms: number): string {
  return msToSec(ms).toFixed(6);
}
