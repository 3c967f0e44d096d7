import { describe, it, expect } from 'vitest';
import { Semaphore } from '../../../src/shared/concurrency/semaphore';
import { flushPromises } from '../helpers/mock-factories';

describe('Semaphore', () => {
  it('should reject fewer than one permit', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore needs at least one permit, got 0');
  });

  it('should grant permits up to the limit, then queue', async () => {
    const semaphore = new Semaphore(2);

    await semaphore.acquire();
    await semaphore.acquire();
    let thirdGranted = false;
    void semaphore.acquire().then(() => {
      thirdGranted = true;
    });
    await flushPromises();

    expect(semaphore.inUse).toBe(2);
    expect(semaphore.waiting).toBe(1);
    expect(thirdGranted).toBe(false);
  });

  it('should serve waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const release = await semaphore.acquire();
    const first = semaphore.runExclusive(async () => {
      order.push('first');
    });
    const second = semaphore.runExclusive(async () => {
      order.push('second');
    });

    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.inUse).toBe(0);
  });

  it('should ignore a second release', async () => {
    const semaphore = new Semaphore(1);

    const release = await semaphore.acquire();
    release();
    release();

    expect(semaphore.inUse).toBe(0);
    await semaphore.acquire();
    expect(semaphore.inUse).toBe(1);
  });

  it('should release the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.runExclusive(async () => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');
    expect(semaphore.inUse).toBe(0);
  });

  it('should never run more tasks than permits', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.runExclusive(async () => {
          running++;
          peak = Math.max(peak, running);
          await flushPromises();
          running--;
        }),
      ),
    );

    expect(peak).toBe(2);
  });
});
