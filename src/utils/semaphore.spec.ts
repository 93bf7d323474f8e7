import { Semaphore } from './semaphore';

describe('Semaphore', () => {
  it('rejects a limit below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('queues acquirers beyond the limit and releases them in order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];

    const first = await semaphore.acquire();
    const second = semaphore.acquire().then((release) => {
      order.push(2);
      return release;
    });
    const third = semaphore.acquire().then((release) => {
      order.push(3);
      return release;
    });

    expect(semaphore.active).toBe(1);
    expect(semaphore.pending).toBe(2);

    first();
    (await second)();
    (await third)();

    expect(order).toEqual([2, 3]);
    expect(semaphore.active).toBe(0);
  });

  it('ignores a second call to the same release function', async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();
    await semaphore.acquire();

    release();
    release();

    expect(semaphore.active).toBe(1);
  });

  it('releases the permit when run() rejects', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error('failed');
      }),
    ).rejects.toThrow('failed');
    expect(semaphore.active).toBe(0);
  });
});
