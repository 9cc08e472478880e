import { ValidationError } from './errors.js';

/**
 * Derivative estimates for a cubic Hermite interpolant that never overshoots
 * a local extremum.
 *
 * Endpoints are flat. An interior knot gets the plain mean of the slopes on
 * either side when both have strictly the same sign, and 0 otherwise (peak,
 * trough or a flat neighbour). The mean is not weighted by
 * interval width.
 */
export function monotonicTangents(u: readonly number[], v: readonly number[]): number[] {
  const n = u.length;
  if (n < 2) throw new ValidationError(`tangent estimation needs at least 2 knots, got ${n}`);
  if (v.length !== n) throw new ValidationError(`expected ${n} values, got ${v.length}`);

  const m = new Array<number>(n).fill(0);
  for (let i = 1; i < n - 1; i++) {
    const slopeBefore = (v[i] - v[i - 1]) / (u[i] - u[i - 1]);
    const slopeAfter = (v[i + 1] - v[i]) / (u[i + 1] - u[i]);
    m[i] = slopeBefore * slopeAfter > 0 ? (slopeBefore + slopeAfter) / 2 : 0;
  }
  return m;
}
