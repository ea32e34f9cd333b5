import { describe, it, expect } from 'vitest';
import { BoundedQueue } from './queue';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

async function drain<T>(queue: BoundedQueue<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of queue) {
    out.push(item);
  }
  return out;
}

describe('BoundedQueue', () => {
  it('delivers items in order and finishes on close', async () => {
    const queue = new BoundedQueue<number>(4);
    await queue.push(1);
    await queue.push(2);
    queue.close();
    expect(await drain(queue)).toEqual([1, 2]);
  });

  it('suspends the producer while full', async () => {
    const queue = new BoundedQueue<number>(2);
    let pushed = 0;
    const producer = (async () => {
      for (let i = 0; i < 5; i++) {
        await queue.push(i);
        pushed++;
      }
      queue.close();
    })();

    await tick();
    expect(pushed).toBe(2);
    expect(queue.size).toBe(2);

    const items = await drain(queue);
    await producer;
    expect(items).toEqual([0, 1, 2, 3, 4]);
    expect(pushed).toBe(5);
  });

  it('wakes a waiting reader when an item arrives', async () => {
    const queue = new BoundedQueue<string>(1);
    const reading = drain(queue);
    await tick();
    await queue.push('late');
    queue.close();
    expect(await reading).toEqual(['late']);
  });

  it('throws to readers after draining when failed', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(7);
    queue.fail(new Error('upstream broke'));

    const seen: number[] = [];
    await expect(
      (async () => {
        for await (const item of queue) seen.push(item);
      })(),
    ).rejects.toThrow('upstream broke');
    expect(seen).toEqual([7]);
  });

  it('rejects pushes once closed, including blocked ones', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);
    queue.close();
    await expect(blocked).rejects.toThrow('Cannot push to a closed queue');
    await expect(queue.push(3)).rejects.toThrow('Cannot push to a closed queue');
  });

  it('requires a positive capacity', () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});
