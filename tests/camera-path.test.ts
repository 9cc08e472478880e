import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createPath, framePath, timePath } from '../src/camera-path.js';
import { OrderingError, TypeKindError, ValidationError } from '../src/errors.js';

const close = (a: number, b: number, eps = 1e-9) => assert.ok(Math.abs(a - b) <= eps, `${a} !~ ${b}`);
const t0 = new Date('2024-01-01T00:00:00Z');

test('frame path pans smoothly from 0 to 100 without overshoot', () => {
  const path = framePath({ coords: [0, 0], halfWidth: 10, halfHeight: 5 });
  path.move(10, [100, 0]);
  const { markers, extents, speed } = path.computePath();

  assert.deepEqual(markers, [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  const x = extents.map(([left, right]) => (left + right) / 2);
  assert.equal(x[0], 0);
  for (let i = 1; i < x.length; i++) assert.ok(x[i] > x[i - 1], `x not increasing at ${i}`);
  assert.ok(x.every((v) => v >= 0 && v <= 100));
  close(x[9], 97.2);
  assert.deepEqual(extents[0], [-10, 10, -5, 5]);

  assert.equal(speed[0], 0);
  close(speed[1], 2.8);
  // flat tangents at both ends: slowest at the edges, fastest mid-way
  assert.ok(speed[5] > speed[1] && speed[5] > speed[9]);
});

test('a peak between two knots is never overshot', () => {
  const path = framePath({ coords: [0, 0] });
  path.move(5, [10, 0]);
  path.move(5, [0, 0]);
  const table = path.resample();
  assert.equal(table.x.length, 10);
  assert.equal(table.x[5], 10);
  assert.ok(table.x.every((v) => v <= 10));
});

test('zoomTo halves the half-extents and keeps the position', () => {
  const path = framePath();
  const w = path.zoomTo(5, 2);
  assert.deepEqual(w, { marker: 5, x: 180, y: 0, halfWidth: 90, halfHeight: 45 });
});

test('unspecified fields inherit from the previous waypoint', () => {
  const path = framePath();
  path.move(5, [10, 20]);
  const w = path.focus(5, 30);
  assert.deepEqual(w, { marker: 10, x: 10, y: 20, halfWidth: 30, halfHeight: 90 });
  assert.equal(path.waypoints.length, 3);
});

test('duration increments work before any absolute timestamp', () => {
  const path = timePath({ t0 });
  const w = path.append({ days: 2 });
  assert.equal(w.marker.toISOString(), '2024-01-03T00:00:00.000Z');
  path.append(new Date('2024-01-05T00:00:00Z'));
  path.append({ hours: 12 });
  assert.deepEqual(
    path.waypoints.map((p) => p.marker.toISOString()),
    ['2024-01-01T00:00:00.000Z', '2024-01-03T00:00:00.000Z', '2024-01-05T00:00:00.000Z', '2024-01-05T12:00:00.000Z'],
  );
});

test('appends that do not advance are rejected and leave the ledger alone', () => {
  const path = timePath({ t0 });
  path.append({ days: 1 });
  const before = path.waypoints;
  assert.throws(() => path.append(new Date('2023-12-31T00:00:00Z')), OrderingError);
  assert.throws(() => path.append(new Date('2024-01-02T00:00:00Z')), OrderingError);
  assert.throws(() => path.append({ hours: 0 }), OrderingError);
  assert.throws(() => path.append({ hours: -1 }), OrderingError);
  assert.deepEqual(path.waypoints, before);

  const frames = framePath();
  assert.throws(() => frames.move(0), ValidationError);
  assert.equal(frames.waypoints.length, 1);
});

test('markers handed out are copies of the ledger', () => {
  const path = timePath({ t0 });
  const appended = path.append({ days: 1 });
  path.waypoints[1].marker.setTime(0);
  appended.marker.setTime(1);
  path.last.marker.setTime(2);
  path.knots().markers[1].setTime(3);
  assert.deepEqual(
    path.waypoints.map((w) => w.marker.toISOString()),
    ['2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z'],
  );
  assert.equal(path.computePath({ hours: 6 }).markers.length, 4);
});

test('malformed coords, extents and zoom factors are rejected', () => {
  const path = framePath();
  assert.throws(() => path.append(1, JSON.parse('{"coords":[1,2,3]}')), ValidationError);
  assert.throws(() => path.append(1, JSON.parse('{"coords":["a","b"]}')), ValidationError);
  assert.throws(() => path.focus(1, -5), ValidationError);
  assert.throws(() => path.zoomTo(1, 0), ValidationError);
  assert.throws(() => framePath({ halfHeight: 0 }), ValidationError);
  assert.equal(path.waypoints.length, 1);
});

test('timed path speed is in degrees per day', () => {
  const path = timePath({ t0, coords: [0, 0], halfWidth: 10, halfHeight: 5 });
  path.append({ days: 1 }, { coords: [10, 0] });
  const { markers, extents, speed } = path.computePath({ hours: 6 });

  assert.deepEqual(
    markers.map((m) => m.toISOString()),
    ['2024-01-01T00:00:00.000Z', '2024-01-01T06:00:00.000Z', '2024-01-01T12:00:00.000Z', '2024-01-01T18:00:00.000Z'],
  );
  const x = extents.map(([left, right]) => (left + right) / 2);
  [0, 1.5625, 5, 8.4375].forEach((v, i) => close(x[i], v));
  [0, 6.25, 13.75, 13.75].forEach((v, i) => close(speed[i], v));
});

test('timed path step must be a positive duration', () => {
  const path = timePath({ t0 });
  path.append({ days: 1 });
  assert.throws(() => path.computePath(JSON.parse('"2024-01-01"')), TypeKindError);
  assert.throws(() => path.computePath({ hours: 0 }), ValidationError);
});

test('a single waypoint yields no samples', () => {
  assert.deepEqual(framePath().computePath(), { markers: [], extents: [], speed: [] });
});

test('recomputing is idempotent', () => {
  const path = framePath({ coords: [0, 0] });
  path.move(4, [8, 3]);
  path.zoomTo(6, 3, [2, 9]);
  assert.deepEqual(path.computePath(), path.computePath());
});

test('t0 picks the time domain', () => {
  assert.equal(createPath().domain.kind, 'frames');
  assert.equal(createPath({ t0: 3 }).waypoints[0].marker, 3);
  assert.equal(createPath({ t0 }).domain.kind, 'continuous');
  assert.throws(() => createPath(JSON.parse('{"t0":"2024-01-01"}')), TypeKindError);
});
