import test from 'node:test';
import assert from 'node:assert/strict';
import { ProgressEstimator } from '../../core/ProgressEstimator';
import { ManualScheduler } from '../helpers/fakes';

function create(opts?: { totalDurationMs?: number; tickIntervalMs?: number }) {
  const scheduler = new ManualScheduler();
  const values: number[] = [];
  let completions = 0;
  const estimator = new ProgressEstimator({
    scheduler,
    ...opts,
    onProgress: (p) => values.push(p),
    onComplete: () => {
      completions += 1;
    }
  });
  return { scheduler, estimator, values, completions: () => completions };
}

test('ProgressEstimator: defaults are 77 steps of 100/77', () => {
  const { estimator } = create();
  assert.equal(estimator.stepPercent, 100 / 77);
  assert.equal(estimator.percent, 0);
});

test('ProgressEstimator: reaches exactly 100 after 77 ticks and stops for good', async () => {
  const { scheduler, estimator, values, completions } = create();
  estimator.start();

  await scheduler.advance(10_000);
  assert.equal(estimator.percent, 100 / 77);

  await scheduler.advance(760_000);
  assert.equal(values.length, 77);
  assert.equal(estimator.percent, 100);
  assert.equal(values[76], 100);
  assert.equal(completions(), 1);
  assert.equal(estimator.isFinished, true);
  assert.equal(estimator.isRunning, false);
  assert.equal(scheduler.pendingTimers, 0);

  // 第 78 次 tick 无效
  estimator.tick();
  await scheduler.advance(100_000);
  assert.equal(values.length, 77);
  assert.equal(estimator.percent, 100);
  assert.equal(completions(), 1);
});

test('ProgressEstimator: values never decrease and stay within range', async () => {
  const { scheduler, estimator, values } = create();
  estimator.start();
  await scheduler.advance(1_000_000);
  for (let i = 0; i < values.length; i++) {
    assert.ok(values[i] > 0 && values[i] <= 100);
    if (i > 0) assert.ok(values[i] > values[i - 1]);
  }
});

test('ProgressEstimator: does nothing until started', async () => {
  const { scheduler, estimator, values } = create();
  await scheduler.advance(100_000);
  assert.equal(values.length, 0);
  assert.equal(estimator.percent, 0);
});

test('ProgressEstimator: start twice keeps a single timer', async () => {
  const { scheduler, estimator, values } = create({ totalDurationMs: 40_000, tickIntervalMs: 10_000 });
  estimator.start();
  estimator.start();
  await scheduler.advance(20_000);
  assert.deepEqual(values, [25, 50]);
});

test('ProgressEstimator: complete() jumps to 100 without reporting a timer completion', async () => {
  const { scheduler, estimator, values, completions } = create({ totalDurationMs: 40_000, tickIntervalMs: 10_000 });
  estimator.start();
  await scheduler.advance(10_000);
  estimator.complete();
  estimator.complete();
  await scheduler.advance(100_000);

  assert.deepEqual(values, [25, 100]);
  assert.equal(completions(), 0);
  assert.equal(estimator.isFinished, true);
});

test('ProgressEstimator: stop() freezes the value', async () => {
  const { scheduler, estimator, values } = create({ totalDurationMs: 40_000, tickIntervalMs: 10_000 });
  estimator.start();
  await scheduler.advance(20_000);
  estimator.stop();
  await scheduler.advance(100_000);
  assert.deepEqual(values, [25, 50]);
  assert.equal(estimator.percent, 50);
});
