import { isValid, milliseconds, parseISO, type Duration } from 'date-fns';
import { TypeKindError, ValidationError } from './errors.js';
import { isDuration } from './time-domain.js';

const UNITS: Record<string, keyof Duration> = {
  w: 'weeks',
  d: 'days',
  h: 'hours',
  m: 'minutes',
  min: 'minutes',
  s: 'seconds',
};

const TOKEN = /(\d+(?:\.\d+)?)(min|w|d|h|m|s)/g;

/** Compact duration text such as `6h`, `1d12h` or `+90m` (m is minutes). */
export function parseDuration(text: string): Duration {
  const body = text.trim().replace(/^\+/, '');
  const duration: Duration = {};
  let consumed = 0;
  for (const match of body.matchAll(TOKEN)) {
    if (match.index !== consumed) break;
    const unit = UNITS[match[2]];
    duration[unit] = (duration[unit] ?? 0) + Number(match[1]);
    consumed += match[0].length;
  }
  if (!body.length || consumed !== body.length) {
    throw new ValidationError(`cannot read "${text}" as a duration (expected e.g. 6h, 2d, 1d12h, 30m)`);
  }
  return duration;
}

const OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** ISO-8601 timestamp; one without an offset is read as UTC. */
export function parseTimestamp(text: string): Date | undefined {
  const trimmed = text.trim();
  const [, time] = trimmed.split(/[T ]/);
  const utc = time === undefined ? `${trimmed}T00:00:00Z` : OFFSET.test(time) ? trimmed : `${trimmed}Z`;
  const date = parseISO(utc);
  return isValid(date) ? date : undefined;
}

/** Timestamp string, duration string or Duration object. */
export function parseTimeIncrement(value: unknown): Date | Duration {
  if (value instanceof Date) return value;
  if (isDuration(value)) return value;
  if (typeof value === 'string') return parseTimestamp(value) ?? parseDuration(value);
  throw new TypeKindError(`cannot read ${JSON.stringify(value)} as a timestamp or a duration`);
}

export function formatDuration(duration: Duration): string {
  return `${milliseconds(duration)}ms`;
}
