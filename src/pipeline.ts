import type { Duration } from 'date-fns';
import fs from 'node:fs';
import path from 'node:path';
import { diagnosticTable, type DiagnosticTable } from './diagnostics.js';
import { buildPath, loadPathScript, type BuiltPath } from './script.js';
import { formatDuration } from './time-units.js';
import type { CartopyExtent, ComputedPath } from './types/shared.js';

export interface PipelineOptions {
  scriptPath: string;      // YAML path script
  outDir: string;          // output directory for artifacts
  step?: string | Duration; // resampling step override (timed paths only)
  diagnostics?: boolean;   // also write diagnostics.json
  derivative?: boolean;    // diagnostics as rates of change
  debug?: boolean;
}

export interface PipelineResult {
  pathFile: string;
  diagnosticsFile?: string;
  frameCount: number;
}

export interface FrameRecord {
  index: number;
  marker: number | string;
  extent: CartopyExtent;
  speed: number;
}

export interface PathDocument {
  name: string;
  domain: BuiltPath['domain'];
  speedUnit: string;
  frames: FrameRecord[];
}

function marker(m: number | Date) {
  return m instanceof Date ? m.toISOString() : m;
}

function computeDocument(built: BuiltPath): PathDocument {
  const { markers, extents, speed }: ComputedPath<number | Date> =
    built.domain === 'frames' ? built.path.computePath() : built.path.computePath(built.step);
  return {
    name: built.name,
    domain: built.domain,
    speedUnit: built.path.domain.speedUnit,
    frames: markers.map((m, index) => ({ index, marker: marker(m), extent: extents[index], speed: speed[index] })),
  };
}

function computeDiagnostics(built: BuiltPath, derivative: boolean): DiagnosticTable<number | Date> {
  return built.domain === 'frames'
    ? diagnosticTable(built.path, { derivative })
    : diagnosticTable(built.path, { derivative }, built.step);
}

export function runPathPipeline(options: PipelineOptions): PipelineResult {
  const debug = !!options.debug;
  fs.mkdirSync(options.outDir, { recursive: true });

  const script = loadPathScript(options.scriptPath);
  const built = buildPath(script, { step: options.step, debug });
  if (debug) {
    console.log('[pipeline] script loaded', {
      name: built.name,
      domain: built.domain,
      waypoints: built.path.waypoints.length,
      step: built.domain === 'continuous' ? formatDuration(built.step) : '1 frame',
    });
  }

  const doc = computeDocument(built);
  const pathFile = path.resolve(options.outDir, 'path.json');
  fs.writeFileSync(pathFile, JSON.stringify(doc, null, 2));
  if (debug) console.log('[pipeline] wrote', doc.frames.length, 'frames to', pathFile);

  let diagnosticsFile: string | undefined;
  if (options.diagnostics) {
    diagnosticsFile = path.resolve(options.outDir, 'diagnostics.json');
    // NaN (rates read outside the sampled span) serialises as null
    fs.writeFileSync(diagnosticsFile, JSON.stringify(computeDiagnostics(built, !!options.derivative), null, 2));
    if (debug) console.log('[pipeline] wrote diagnostics to', diagnosticsFile);
  }
  return { pathFile, diagnosticsFile, frameCount: doc.frames.length };
}
