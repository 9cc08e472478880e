import type { CameraPath } from './camera-path.js';
import type { Channel, ChannelSeries } from './types/shared.js';

export interface SeriesPair<M> extends ChannelSeries {
  markers: M[];
}

/** Knot series next to resampled series, one pair per channel, ready for a plotting tool. */
export interface DiagnosticTable<M> {
  derivative: boolean;
  unit: string;
  original: SeriesPair<M>;
  resampled: SeriesPair<M>;
}

export interface DiagnosticOptions {
  derivative?: boolean;
}

// piecewise-linear lookup, NaN outside [xs[0], xs[last]]
function interpLinear(xs: readonly number[], ys: readonly number[], at: number) {
  if (!xs.length || at < xs[0] || at > xs[xs.length - 1]) return NaN;
  let i = 0;
  while (i < xs.length - 2 && xs[i + 1] < at) i++;
  if (xs.length === 1) return ys[0];
  const w = (at - xs[i]) / (xs[i + 1] - xs[i]);
  return ys[i] + w * (ys[i + 1] - ys[i]);
}

function mapChannels(fn: (channel: Channel) => number[]): ChannelSeries {
  return { x: fn('x'), y: fn('y'), halfWidth: fn('halfWidth'), halfHeight: fn('halfHeight') };
}

/**
 * Build the original-vs-resampled table for a path. With `derivative` the
 * resampled series become rates of change (per day or per frame), and the
 * knot series become those rates read back at the knots.
 */
export function diagnosticTable<M, I, S extends readonly unknown[]>(
  path: CameraPath<M, I, S>,
  options: DiagnosticOptions,
  ...step: S
): DiagnosticTable<M> {
  const knots = path.knots();
  const table = path.resample(...step);
  const derivative = options.derivative ?? false;

  if (!derivative) {
    return {
      derivative,
      unit: 'degrees',
      original: { markers: knots.markers, ...mapChannels((c) => knots[c]) },
      resampled: { markers: table.markers, ...mapChannels((c) => table[c]) },
    };
  }

  const scale = path.domain.unitScale(table.step);
  const rateAbscissae = table.abscissae.slice(1);
  const rates = mapChannels((c) => table[c].slice(1).map((v, i) => (v - table[c][i]) * scale));
  const original = mapChannels((c) => knots.abscissae.map((a) => interpLinear(rateAbscissae, rates[c], a)));
  return {
    derivative,
    unit: path.domain.speedUnit,
    original: { markers: knots.markers, ...original },
    resampled: { markers: table.markers.slice(1), ...rates },
  };
}
