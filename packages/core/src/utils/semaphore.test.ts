import { describe, it, expect } from 'vitest';
import { Semaphore, mapWithConcurrency } from './semaphore.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should never exceed the configured concurrency', async () => {
    const semaphore = new Semaphore(2);
    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.run(async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise((r) => setTimeout(r, 5));
          inFlight--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it('should queue waiters until a slot is released', async () => {
    const semaphore = new Semaphore(1);
    const gate = deferred();
    const order: string[] = [];

    const first = semaphore.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = semaphore.run(async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(semaphore.pending).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should release the slot when the task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');

    expect(semaphore.available).toBe(1);
  });

  it('should treat a repeated release as a no-op', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();

    release();
    release();

    expect(semaphore.available).toBe(1);
  });

  it('should clamp the limit to at least one', () => {
    expect(new Semaphore(0).available).toBe(1);
  });
});

describe('mapWithConcurrency', () => {
  it('should keep output order aligned with input order', async () => {
    const result = await mapWithConcurrency([30, 10, 20], 2, async (delay, index) => {
      await new Promise((r) => setTimeout(r, delay));
      return `${index}:${delay}`;
    });

    expect(result).toEqual(['0:30', '1:10', '2:20']);
  });
});
