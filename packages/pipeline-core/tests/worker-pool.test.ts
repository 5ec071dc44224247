import { describe, it, expect } from 'vitest';
import { runPool } from '../src/scheduler/worker-pool.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('runPool', () => {
  it('never runs more than `concurrency` workers at once', async () => {
    let active = 0;
    let peak = 0;
    const result = await runPool([1, 2, 3, 4, 5, 6, 7], 3, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n * 10;
    });

    expect(peak).toBe(3);
    expect(result.peakInFlight).toBe(3);
    expect(result.results).toEqual([10, 20, 30, 40, 50, 60, 70]);
    expect(result.notStarted).toEqual([]);
  });

  it('keeps results in input order when completion order differs', async () => {
    const gates = [deferred<void>(), deferred<void>()];
    const running = runPool(['slow', 'fast'], 2, async (label, index) => {
      await gates[index]?.promise;
      return label.toUpperCase();
    });
    gates[1]?.resolve();
    await tick();
    gates[0]?.resolve();
    expect((await running).results).toEqual(['SLOW', 'FAST']);
  });

  it('stops taking items once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: number[] = [];
    const result = await runPool(
      [0, 1, 2, 3, 4],
      1,
      async (n) => {
        seen.push(n);
        if (n === 1) controller.abort();
        return n;
      },
      { signal: controller.signal },
    );

    expect(seen).toEqual([0, 1]);
    expect(result.results).toEqual([0, 1, undefined, undefined, undefined]);
    expect(result.notStarted).toEqual([2, 3, 4]);
  });

  it('lets the other workers finish before rethrowing a crash', async () => {
    const finished: number[] = [];
    const running = runPool([0, 1, 2, 3], 2, async (n) => {
      if (n === 0) throw new Error('worker crashed');
      await tick();
      finished.push(n);
      return n;
    });

    await expect(running).rejects.toThrow('worker crashed');
    expect(finished).toEqual([1, 2, 3]);
  });

  it('handles an empty input', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual({ results: [], notStarted: [], peakInFlight: 0 });
  });

  it('rejects a non-positive concurrency', async () => {
    await expect(runPool([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});
