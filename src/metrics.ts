import type { CartopyExtent, ChannelSeries } from './types/shared.js';

export function cartopyExtents(s: ChannelSeries): CartopyExtent[] {
  return s.x.map((x, i) => [x - s.halfWidth[i], x + s.halfWidth[i], s.y[i] - s.halfHeight[i], s.y[i] + s.halfHeight[i]] as const);
}

/** Displacement of the view center between consecutive samples; 0 for the first. */
export function stepLengths(x: readonly number[], y: readonly number[]): number[] {
  const length: number[] = [];
  for (let i = 0; i < x.length; i++) {
    length.push(i === 0 ? 0 : Math.hypot(x[i] - x[i - 1], y[i] - y[i - 1]));
  }
  return length;
}

// unitScale turns "degrees per step" into the domain's canonical rate
export function cameraSpeed(x: readonly number[], y: readonly number[], unitScale: number): number[] {
  return stepLengths(x, y).map((l) => l * unitScale);
}
