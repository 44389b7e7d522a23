import test from 'node:test';
import assert from 'node:assert/strict';
import { formatElapsed } from '../../core/elapsed';

test('formatElapsed: hours, minutes, seconds and milliseconds', () => {
  assert.equal(formatElapsed(3_661_234), '01:01:01.234');
  assert.equal(formatElapsed(770_000), '00:12:50.000');
  assert.equal(formatElapsed(0), '00:00:00.000');
  assert.equal(formatElapsed(59_999), '00:00:59.999');
});

test('formatElapsed: hours wrap at 24', () => {
  assert.equal(formatElapsed(86_400_000), '00:00:00.000');
  assert.equal(formatElapsed(90_061_001), '01:01:01.001');
});

test('formatElapsed: fractional and negative input', () => {
  assert.equal(formatElapsed(1234.9), '00:00:01.234');
  assert.equal(formatElapsed(-5), '00:00:00.000');
});
