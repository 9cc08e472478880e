import assert from 'node:assert/strict';
import { test } from 'node:test';
import { cameraSpeed, cartopyExtents, stepLengths } from '../src/metrics.js';

test('extents are (left, right, bottom, top)', () => {
  const extents = cartopyExtents({ x: [10, 0], y: [0, -5], halfWidth: [4, 1], halfHeight: [2, 3] });
  assert.deepEqual(extents, [
    [6, 14, -2, 2],
    [-1, 1, -8, -2],
  ]);
});

test('first step length is zero, then euclidean displacement', () => {
  assert.deepEqual(stepLengths([0, 3, 3], [0, 4, 4]), [0, 5, 0]);
  assert.deepEqual(stepLengths([], []), []);
});

test('speed scales step length and is never negative', () => {
  const speed = cameraSpeed([0, 3, 0], [0, 4, 0], 2);
  assert.deepEqual(speed, [0, 10, 10]);
  assert.ok(speed.every((s) => s >= 0));
});
