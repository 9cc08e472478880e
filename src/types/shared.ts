// Shared types used by the ledger, the resampler and the pipeline
export type Coords = readonly [x: number, y: number];

export interface Waypoint<M> {
  marker: M;
  x: number;
  y: number;
  halfWidth: number;
  halfHeight: number;
}

export interface WaypointChange {
  coords?: Coords;
  halfWidth?: number;
  halfHeight?: number;
}

/** (left, right, bottom, top), the order `ax.set_extent` style consumers expect. */
export type CartopyExtent = readonly [left: number, right: number, bottom: number, top: number];

export type Channel = 'x' | 'y' | 'halfWidth' | 'halfHeight';
export type ChannelSeries = Record<Channel, number[]>;

export interface SampleTable<M> extends ChannelSeries {
  markers: M[];
  abscissae: number[]; // projected markers, relative to the first waypoint
  step: number; // numeric step between abscissae
}

export interface ComputedPath<M> {
  markers: M[];
  extents: CartopyExtent[];
  speed: number[];
}
