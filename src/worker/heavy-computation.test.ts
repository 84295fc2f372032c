import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { WorkloadContext } from './execute.js';
import {
  SIMULATED_FAILURE_ERROR,
  computeResult,
  createHeavyComputation,
  payloadHash,
  stableStringify
} from './heavy-computation.js';

function contextFor(progress: number[], signal = new AbortController().signal): WorkloadContext {
  return {
    taskId: 'task-1',
    attempt: 1,
    signal,
    reportProgress: (percent) => progress.push(percent)
  };
}

const fast = { minDurationMs: 20, maxDurationMs: 20, stepMs: 5, failureRate: 0 };

describe('stableStringify', () => {
  it('sorts keys at every depth', () => {
    assert.equal(stableStringify({ b: { d: 1, c: [2, { f: 1, e: 0 }] }, a: 'x' }), '{"a":"x","b":{"c":[2,{"e":0,"f":1}],"d":1}}');
  });
});

describe('payloadHash', () => {
  it('hashes the key-sorted JSON into 0..999', () => {
    assert.equal(payloadHash({ x: 1 }), 181);
    assert.equal(payloadHash({ b: { c: [1, 2] }, a: 1 }), 171);
  });
});

describe('computeResult', () => {
  it('sums 0..999999 when there is no input', () => {
    assert.equal(computeResult(null), 499_999_500_000);
    assert.equal(computeResult({}), 499_999_500_000);
  });

  it('folds the input hash into the sum', () => {
    assert.equal(computeResult({ x: 1 }), 499_999_500_181);
  });
});

describe('createHeavyComputation', () => {
  it('reports progress after each step and returns the result', async () => {
    const progress: number[] = [];
    const workload = createHeavyComputation(fast);

    const result = await workload({ x: 1 }, contextFor(progress));

    assert.equal(result, 499_999_500_181);
    assert.deepEqual(progress, [25, 50, 75, 100]);
  });

  it('picks the duration from the configured range', async () => {
    const progress: number[] = [];
    const workload = createHeavyComputation({ minDurationMs: 10, maxDurationMs: 30, stepMs: 10, failureRate: 0, random: () => 0.5 });

    await workload(null, contextFor(progress));

    assert.deepEqual(progress, [50, 100]);
  });

  it('throws a simulated failure at the configured rate', async () => {
    const workload = createHeavyComputation({ ...fast, failureRate: 0.5, random: () => 0.1 });

    await assert.rejects(workload(null, contextFor([])), new RegExp(SIMULATED_FAILURE_ERROR));
  });

  it('stops when the attempt is aborted', async () => {
    const controller = new AbortController();
    const progress: number[] = [];
    const workload = createHeavyComputation({ minDurationMs: 1000, maxDurationMs: 1000, stepMs: 100, failureRate: 0 });

    const run = workload(null, contextFor(progress, controller.signal));
    controller.abort();

    await assert.rejects(run, /Execution aborted/);
    assert.deepEqual(progress, []);
  });
});
