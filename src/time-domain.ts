import { addMilliseconds, differenceInMilliseconds, isValid, milliseconds, type Duration } from 'date-fns';
import { TypeKindError, ValidationError } from './errors.js';

export type Order = 'before' | 'equal' | 'after';

export const DAY_MS = 86_400_000;

/**
 * What a waypoint marker means and how it moves forward.
 *
 * M is the marker, I what `append` accepts as an increment and S the argument
 * list of the resampling entry points. The ledger and the resampler only talk
 * to this interface.
 */
export interface TimeDomain<M, I, S extends readonly unknown[]> {
  readonly kind: 'continuous' | 'frames';
  readonly speedUnit: string;
  checkOrigin(t0: unknown): M;
  advance(previous: M, increment: I): M;
  compareOrder(a: M, b: M): Order;
  /** Independent copy of a marker, for values handed out of the ledger. */
  cloneMarker(marker: M): M;
  toNumeric(marker: M, reference: M): number;
  fromNumeric(value: number, reference: M): M;
  /** Numeric resampling step, in `toNumeric` units. */
  resolveStep(args: S): number;
  /** Scale from per-step distance to the canonical speed unit. */
  unitScale(step: number): number;
}

const DURATION_KEYS = new Set(['years', 'months', 'weeks', 'days', 'hours', 'minutes', 'seconds']);

export function isDuration(value: unknown): value is Duration {
  if (value === null || typeof value !== 'object' || value instanceof Date || Array.isArray(value)) return false;
  const entries = Object.entries(value);
  return entries.length > 0 && entries.every(([k, v]) => DURATION_KEYS.has(k) && typeof v === 'number' && Number.isFinite(v));
}

function describe(value: unknown) {
  if (value instanceof Date) return 'Date';
  if (Array.isArray(value)) return 'array';
  return value === null ? 'null' : typeof value;
}

function order(a: number, b: number): Order {
  return a < b ? 'before' : a > b ? 'after' : 'equal';
}

/** Absolute timestamps; increments are a new timestamp or a duration to add. */
export class ContinuousTimeDomain implements TimeDomain<Date, Date | Duration, [step: Duration]> {
  readonly kind = 'continuous';
  readonly speedUnit = 'degrees/day';

  checkOrigin(t0: unknown): Date {
    if (!(t0 instanceof Date)) throw new TypeKindError(`t0 should be a Date, not ${describe(t0)}`);
    if (!isValid(t0)) throw new ValidationError('t0 is an invalid Date');
    return new Date(t0.getTime());
  }

  advance(previous: Date, increment: unknown): Date {
    if (increment instanceof Date) {
      if (!isValid(increment)) throw new ValidationError('timestamp is an invalid Date');
      return new Date(increment.getTime());
    }
    if (isDuration(increment)) return addMilliseconds(previous, milliseconds(increment));
    throw new TypeKindError(`time should be a Date or a Duration, not ${describe(increment)}`);
  }

  compareOrder(a: Date, b: Date): Order {
    return order(a.getTime(), b.getTime());
  }

  cloneMarker(marker: Date): Date {
    return new Date(marker.getTime());
  }

  toNumeric(marker: Date, reference: Date): number {
    return differenceInMilliseconds(marker, reference);
  }

  fromNumeric(value: number, reference: Date): Date {
    return addMilliseconds(reference, value);
  }

  resolveStep(args: readonly unknown[]): number {
    const [step] = args;
    if (!isDuration(step)) throw new TypeKindError(`dt should be a Duration, not ${describe(step)}`);
    const ms = milliseconds(step);
    if (!(ms > 0)) throw new ValidationError(`dt must be a positive duration, got ${ms}ms`);
    return ms;
  }

  unitScale(step: number): number {
    return DAY_MS / step;
  }
}

/** Frame indices; increments are a number of frames to wait (>= 1). */
export class FrameCountDomain implements TimeDomain<number, number, []> {
  readonly kind = 'frames';
  readonly speedUnit = 'degrees/frame';

  checkOrigin(t0: unknown): number {
    if (typeof t0 !== 'number' || !Number.isInteger(t0)) throw new TypeKindError(`t0 should be an integer frame, not ${describe(t0)}`);
    if (t0 < 0) throw new ValidationError(`t0 should be a frame >= 0, got ${t0}`);
    return t0;
  }

  advance(previous: number, increment: unknown): number {
    if (typeof increment !== 'number' || !Number.isInteger(increment)) {
      throw new TypeKindError(`time should be an integer frame count, not ${describe(increment)}`);
    }
    if (increment < 1) throw new ValidationError(`time should be an integer >= 1, got ${increment}`);
    return previous + increment;
  }

  compareOrder(a: number, b: number): Order {
    return order(a, b);
  }

  cloneMarker(marker: number): number {
    return marker;
  }

  toNumeric(marker: number, reference: number): number {
    return marker - reference;
  }

  fromNumeric(value: number, reference: number): number {
    return reference + Math.round(value);
  }

  resolveStep(args: readonly unknown[]): number {
    if (args.length > 0) throw new ValidationError('frame paths are sampled every frame and take no dt');
    return 1;
  }

  unitScale(): number {
    return 1;
  }
}
