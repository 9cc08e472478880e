import type { Duration } from 'date-fns';
import { OrderingError, ValidationError } from './errors.js';
import { resampleChannels, uniformSamples } from './hermite.js';
import { cameraSpeed, cartopyExtents } from './metrics.js';
import { ContinuousTimeDomain, FrameCountDomain, type TimeDomain } from './time-domain.js';
import type { ComputedPath, Coords, SampleTable, Waypoint, WaypointChange } from './types/shared.js';

export interface PathOptions<M> {
  coords?: Coords; // view center at t0, default (180, 0)
  halfWidth?: number; // default 180
  halfHeight?: number; // default 90
  t0?: M;
}

function checkCoords(coords: unknown): Coords {
  if (!Array.isArray(coords) || coords.length !== 2) {
    throw new ValidationError(`coords should be undefined or a tuple [x, y], not ${JSON.stringify(coords)}`);
  }
  const [x, y]: unknown[] = coords;
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new ValidationError(`coords should hold two finite numbers, not ${JSON.stringify(coords)}`);
  }
  return [x, y];
}

function formatMarker(marker: unknown) {
  return marker instanceof Date ? marker.toISOString() : String(marker);
}

function checkPositive(name: string, value: number) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} should be a positive number, got ${value}`);
  }
  return value;
}

/**
 * Camera path for an animation: an append-only ledger of waypoints and the
 * time domain that gives their markers a meaning.
 *
 * The camera shows [x - halfWidth, x + halfWidth, y - halfHeight, y + halfHeight].
 * Resampling is recomputed from the ledger on every call.
 */
export class CameraPath<M, I, S extends readonly unknown[]> {
  private readonly ledger: Waypoint<M>[];

  constructor(
    readonly domain: TimeDomain<M, I, S>,
    t0: M,
    { coords = [180, 0], halfWidth = 180, halfHeight = 90 }: Omit<PathOptions<M>, 't0'> = {},
  ) {
    const [x, y] = checkCoords(coords);
    this.ledger = [
      {
        marker: domain.checkOrigin(t0),
        x,
        y,
        halfWidth: checkPositive('halfWidth', halfWidth),
        halfHeight: checkPositive('halfHeight', halfHeight),
      },
    ];
  }

  get waypoints(): readonly Readonly<Waypoint<M>>[] {
    return this.ledger.map((w) => this.copy(w));
  }

  get last(): Readonly<Waypoint<M>> {
    return this.copy(this.ledger[this.ledger.length - 1]);
  }

  /**
   * Record the next waypoint. Fields left out keep the previous waypoint's
   * value, so a single call can pan, zoom, or both.
   */
  append(increment: I, change: WaypointChange = {}): Readonly<Waypoint<M>> {
    const prev = this.ledger[this.ledger.length - 1];
    const coords = change.coords === undefined ? undefined : checkCoords(change.coords);
    const halfWidth = change.halfWidth === undefined ? prev.halfWidth : checkPositive('halfWidth', change.halfWidth);
    const halfHeight = change.halfHeight === undefined ? prev.halfHeight : checkPositive('halfHeight', change.halfHeight);
    const marker = this.domain.advance(prev.marker, increment);
    if (this.domain.compareOrder(marker, prev.marker) !== 'after') {
      throw new OrderingError(
        `time specified makes the marker ${formatMarker(marker)} not after the last marker ${formatMarker(prev.marker)}`,
      );
    }
    const next: Waypoint<M> = {
      marker,
      x: coords ? coords[0] : prev.x,
      y: coords ? coords[1] : prev.y,
      halfWidth,
      halfHeight,
    };
    this.ledger.push(next);
    return this.copy(next);
  }

  private copy(w: Waypoint<M>): Waypoint<M> {
    return { ...w, marker: this.domain.cloneMarker(w.marker) };
  }

  move(increment: I, coords?: Coords) {
    return this.append(increment, { coords });
  }

  /** Divide the current half-extents by `zoomFactor` (2 shows half the width and height). */
  zoomTo(increment: I, zoomFactor: number, coords?: Coords) {
    const { halfWidth, halfHeight } = this.ledger[this.ledger.length - 1];
    checkPositive('zoomFactor', zoomFactor);
    return this.append(increment, { coords, halfWidth: halfWidth / zoomFactor, halfHeight: halfHeight / zoomFactor });
  }

  focus(increment: I, halfWidth?: number, halfHeight?: number, coords?: Coords) {
    return this.append(increment, { coords, halfWidth, halfHeight });
  }

  /** Knot abscissae and channel values of the ledger, projected against t0. */
  knots() {
    const t0 = this.ledger[0].marker;
    return {
      markers: this.ledger.map((w) => this.domain.cloneMarker(w.marker)),
      abscissae: this.ledger.map((w) => this.domain.toNumeric(w.marker, t0)),
      x: this.ledger.map((w) => w.x),
      y: this.ledger.map((w) => w.y),
      halfWidth: this.ledger.map((w) => w.halfWidth),
      halfHeight: this.ledger.map((w) => w.halfHeight),
    };
  }

  /** Dense samples every step over [first marker, last marker). */
  resample(...step: S): SampleTable<M> {
    const numericStep = this.domain.resolveStep(step);
    const knots = this.knots();
    const t0 = knots.markers[0];
    const abscissae = uniformSamples(knots.abscissae[0], knots.abscissae[knots.abscissae.length - 1], numericStep);
    const channels =
      knots.abscissae.length < 2
        ? { x: [], y: [], halfWidth: [], halfHeight: [] }
        : resampleChannels(knots.abscissae, knots, abscissae);
    return {
      markers: abscissae.map((a) => this.domain.fromNumeric(a, t0)),
      abscissae,
      step: numericStep,
      ...channels,
    };
  }

  /**
   * Viewport rectangle and camera speed for every sample. Speed is in degrees
   * per day for continuous paths and degrees per frame for frame paths.
   */
  computePath(...step: S): ComputedPath<M> {
    const table = this.resample(...step);
    return {
      markers: table.markers,
      extents: cartopyExtents(table),
      speed: cameraSpeed(table.x, table.y, this.domain.unitScale(table.step)),
    };
  }
}

export type FramePath = CameraPath<number, number, []>;
export type TimePath = CameraPath<Date, Date | Duration, [step: Duration]>;

export function framePath(options: PathOptions<number> = {}): FramePath {
  const { t0 = 0, ...rest } = options;
  return new CameraPath<number, number, []>(new FrameCountDomain(), t0, rest);
}

export function timePath(options: PathOptions<Date> & { t0: Date }): TimePath {
  const { t0, ...rest } = options;
  return new CameraPath<Date, Date | Duration, [step: Duration]>(new ContinuousTimeDomain(), t0, rest);
}

/** The type of t0 picks the domain: a frame index, or a Date. */
export function createPath(options?: PathOptions<number>): FramePath;
export function createPath(options: PathOptions<Date> & { t0: Date }): TimePath;
export function createPath(options: PathOptions<number> | PathOptions<Date> = {}): FramePath | TimePath {
  const { t0 } = options;
  if (t0 instanceof Date) return timePath({ ...options, t0 });
  return framePath({ ...options, t0 });
}

export { ContinuousTimeDomain, FrameCountDomain } from './time-domain.js';
export * from './errors.js';
export type * from './types/shared.js';
