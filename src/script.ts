import type { Duration } from 'date-fns';
import fs from 'node:fs';
import YAML from 'yaml';
import { createPath, type CameraPath, type FramePath, type TimePath } from './camera-path.js';
import { TypeKindError, ValidationError } from './errors.js';
import { parseDuration, parseTimeIncrement, parseTimestamp } from './time-units.js';
import type { Coords } from './types/shared.js';

// `at` is a frame offset for frame paths, a timestamp or duration for timed ones
export type TimeInput = number | string | Duration;

export type MoveStep =
  | { action: 'move'; at: TimeInput; coords?: Coords }
  | { action: 'zoom'; at: TimeInput; zoom: number; coords?: Coords }
  | { action: 'focus'; at: TimeInput; halfWidth?: number; halfHeight?: number; coords?: Coords };

export type PathScript = {
  name?: string;
  start?: {
    t0?: number | string;
    coords?: Coords;
    halfWidth?: number;
    halfHeight?: number;
  };
  step?: string | Duration; // timed paths only
  moves: MoveStep[];
};

export type BuiltPath =
  | { domain: 'frames'; name: string; path: FramePath }
  | { domain: 'continuous'; name: string; path: TimePath; step: Duration };

export interface BuildOptions {
  step?: string | Duration; // overrides the script's step
  debug?: boolean;
}

const ACTIONS = new Set(['move', 'zoom', 'focus']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkStep(raw: unknown, index: number): MoveStep {
  if (!isRecord(raw) || typeof raw.action !== 'string' || !ACTIONS.has(raw.action)) {
    throw new ValidationError(`move ${index}: action must be one of move, zoom, focus`);
  }
  if (raw.at === undefined) throw new ValidationError(`move ${index}: missing "at"`);
  if (raw.action === 'zoom' && typeof raw.zoom !== 'number') {
    throw new ValidationError(`move ${index}: zoom step needs a numeric "zoom"`);
  }
  return raw as MoveStep;
}

export function parsePathScript(source: string): PathScript {
  const data: unknown = YAML.parse(source);
  const moves: unknown = isRecord(data) ? data.moves : undefined;
  if (!isRecord(data) || !Array.isArray(moves)) {
    throw new ValidationError('Path script must have a moves array');
  }
  if (data.start !== undefined && !isRecord(data.start)) {
    throw new ValidationError('Path script start must be a mapping');
  }
  return { ...data, moves: moves.map(checkStep) } as PathScript;
}

export function loadPathScript(file: string): PathScript {
  const content = fs.readFileSync(file, 'utf8');
  return parsePathScript(content);
}

function toFrames(at: TimeInput, index: number): number {
  if (typeof at !== 'number') throw new TypeKindError(`move ${index}: frame paths take an integer "at", not ${JSON.stringify(at)}`);
  return at;
}

function toStep(step: string | Duration | undefined): Duration {
  if (step === undefined) return { days: 1 };
  return typeof step === 'string' ? parseDuration(step) : step;
}

/** Replay a script's moves onto a fresh path. */
export function buildPath(script: PathScript, opts: BuildOptions = {}): BuiltPath {
  const { t0 = 0, coords, halfWidth, halfHeight } = script.start ?? {};
  const name = script.name ?? 'path';

  if (typeof t0 === 'string') {
    const origin = parseTimestamp(t0);
    if (!origin) throw new ValidationError(`start.t0 "${t0}" is not an ISO-8601 timestamp`);
    const path = createPath({ t0: origin, coords, halfWidth, halfHeight });
    script.moves.forEach((m, i) => {
      const at = parseTimeIncrement(m.at);
      if (opts.debug) console.log('[script]', name, i, m.action, m.at);
      applyMove(path, m, at);
    });
    return { domain: 'continuous', name, path, step: toStep(opts.step ?? script.step) };
  }

  if (script.step !== undefined || opts.step !== undefined) {
    throw new ValidationError('frame paths are sampled every frame and take no step');
  }
  const path = createPath({ t0, coords, halfWidth, halfHeight });
  script.moves.forEach((m, i) => {
    if (opts.debug) console.log('[script]', name, i, m.action, m.at);
    applyMove(path, m, toFrames(m.at, i));
  });
  return { domain: 'frames', name, path };
}

function applyMove<M, I, S extends readonly unknown[]>(path: CameraPath<M, I, S>, m: MoveStep, at: I) {
  switch (m.action) {
    case 'move':
      path.move(at, m.coords);
      break;
    case 'zoom':
      path.zoomTo(at, m.zoom, m.coords);
      break;
    case 'focus':
      path.focus(at, m.halfWidth, m.halfHeight, m.coords);
      break;
  }
}
