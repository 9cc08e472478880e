import { DomainError, ValidationError } from './errors.js';
import { monotonicTangents } from './tangents.js';
import type { Channel, ChannelSeries } from './types/shared.js';

/**
 * Piecewise cubic Hermite interpolant over strictly increasing knots.
 * Value and first derivative are continuous at every knot.
 */
export class HermiteSpline {
  private readonly knots: readonly number[];
  private readonly values: readonly number[];
  private readonly tangents: readonly number[];

  constructor(knots: readonly number[], values: readonly number[], tangents: readonly number[]) {
    if (knots.length < 2) throw new ValidationError(`Hermite spline needs at least 2 knots, got ${knots.length}`);
    if (values.length !== knots.length || tangents.length !== knots.length) {
      throw new ValidationError('knots, values and tangents must have the same length');
    }
    for (let i = 1; i < knots.length; i++) {
      if (!(knots[i] > knots[i - 1])) {
        throw new ValidationError(`knots must be strictly increasing (knot ${i}: ${knots[i - 1]} -> ${knots[i]})`);
      }
    }
    this.knots = [...knots];
    this.values = [...values];
    this.tangents = [...tangents];
  }

  get start() {
    return this.knots[0];
  }

  get end() {
    return this.knots[this.knots.length - 1];
  }

  evaluate(at: number): number {
    if (!(at >= this.start && at <= this.end)) {
      throw new DomainError(`sample ${at} lies outside the knot span [${this.start}, ${this.end}]`);
    }
    const i = this.intervalOf(at);
    const x0 = this.knots[i];
    const h = this.knots[i + 1] - x0;
    const t = (at - x0) / h;
    const t2 = t * t;
    const t3 = t2 * t;
    const h00 = 2 * t3 - 3 * t2 + 1;
    const h10 = t3 - 2 * t2 + t;
    const h01 = -2 * t3 + 3 * t2;
    const h11 = t3 - t2;
    return (
      h00 * this.values[i] +
      h10 * h * this.tangents[i] +
      h01 * this.values[i + 1] +
      h11 * h * this.tangents[i + 1]
    );
  }

  evaluateAll(at: readonly number[]): number[] {
    return at.map((a) => this.evaluate(a));
  }

  // index i of the interval [knots[i], knots[i+1]] holding `at`; the last knot
  // belongs to the last interval
  private intervalOf(at: number) {
    let lo = 0,
      hi = this.knots.length - 2;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.knots[mid] <= at) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }
}

/** Uniform abscissae over the half-open span [start, stop). */
export function uniformSamples(start: number, stop: number, step: number): number[] {
  if (!Number.isFinite(step) || step <= 0) throw new ValidationError(`step must be positive, got ${step}`);
  const count = Math.max(0, Math.ceil((stop - start) / step));
  const out: number[] = [];
  for (let k = 0; k < count; k++) out.push(start + k * step);
  return out;
}

/**
 * Resample the four camera channels against shared knots. Each channel gets
 * its own monotone tangents and spline.
 */
export function resampleChannels(
  knots: readonly number[],
  channels: Readonly<Record<Channel, readonly number[]>>,
  targets: readonly number[],
): ChannelSeries {
  const resample = (values: readonly number[]) =>
    new HermiteSpline(knots, values, monotonicTangents(knots, values)).evaluateAll(targets);
  return {
    x: resample(channels.x),
    y: resample(channels.y),
    halfWidth: resample(channels.halfWidth),
    halfHeight: resample(channels.halfHeight),
  };
}
