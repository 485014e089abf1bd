import { GenerationQueue, TaskOutcome } from '../src/infrastructure/queue/GenerationQueue.js';
import { deferred } from './helpers/waitFor.js';

describe('GenerationQueue', () => {
  test('rejects a non-positive concurrency limit', () => {
    expect(() => new GenerationQueue(0)).toThrow('maxConcurrent must be a positive integer, got 0');
  });

  test('runs at most maxConcurrent tasks at once, in FIFO order', async () => {
    const queue = new GenerationQueue<string>(2);
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()];
    const started: string[] = [];

    gates.forEach((gate, i) => {
      queue.enqueue({
        id: `t${i}`,
        run: () => {
          started.push(`t${i}`);
          return gate.promise;
        },
      });
    });

    expect(started).toEqual(['t0', 't1']);
    expect(queue.getStatistics()).toEqual(
      expect.objectContaining({ pending: 1, running: 2, maxConcurrent: 2 })
    );

    gates[1].resolve('second');
    await new Promise((resolve) => setImmediate(resolve));
    expect(started).toEqual(['t0', 't1', 't2']);

    gates[0].resolve('first');
    gates[2].resolve('third');
    await queue.whenIdle();
    expect(queue.isIdle()).toBe(true);
  });

  test('delivers outcomes in completion order', async () => {
    const queue = new GenerationQueue<number>(3);
    const outcomes: TaskOutcome<number>[] = [];
    queue.onTaskSettled((outcome) => outcomes.push(outcome));

    const slow = deferred<number>();
    const fast = deferred<number>();
    const failing = deferred<number>();
    queue.enqueue({ id: 'slow', run: () => slow.promise });
    queue.enqueue({ id: 'fast', run: () => fast.promise });
    queue.enqueue({ id: 'failing', run: () => failing.promise });

    fast.resolve(2);
    await new Promise((resolve) => setImmediate(resolve));
    failing.reject(new Error('boom'));
    await new Promise((resolve) => setImmediate(resolve));
    slow.resolve(1);
    await queue.whenIdle();

    expect(outcomes.map((o) => `${o.id}:${o.status}`)).toEqual([
      'fast:fulfilled',
      'failing:rejected',
      'slow:fulfilled',
    ]);
    expect(queue.getStatistics()).toEqual(
      expect.objectContaining({ fulfilled: 2, rejected: 1, cancelled: 0 })
    );
  });

  test('cancels tasks that have not started', async () => {
    const queue = new GenerationQueue<string>(1);
    const outcomes: TaskOutcome<string>[] = [];
    queue.onTaskSettled((outcome) => outcomes.push(outcome));

    const gate = deferred<string>();
    const neverRun = jest.fn().mockResolvedValue('unused');
    queue.enqueue({ id: 'running', run: () => gate.promise });
    queue.enqueue({ id: 'a', run: neverRun });
    queue.enqueue({ id: 'b', run: neverRun });

    expect(queue.cancel('running')).toBe(false);
    expect(queue.cancel('a')).toBe(true);
    expect(queue.cancelPending()).toBe(1);

    gate.resolve('done');
    await queue.whenIdle();

    expect(neverRun).not.toHaveBeenCalled();
    expect(outcomes.map((o) => `${o.id}:${o.status}`)).toEqual([
      'a:cancelled',
      'b:cancelled',
      'running:fulfilled',
    ]);
  });

  test('whenIdle resolves immediately on an empty queue', async () => {
    await expect(new GenerationQueue(1).whenIdle()).resolves.toBeUndefined();
  });

  test('keeps running when a listener throws', async () => {
    const queue = new GenerationQueue<string>(1);
    queue.onTaskSettled(() => {
      throw new Error('listener failure');
    });
    queue.enqueue({ id: 'a', run: () => Promise.resolve('a') });
    queue.enqueue({ id: 'b', run: () => Promise.resolve('b') });

    await queue.whenIdle();
    expect(queue.getStatistics()).toEqual(expect.objectContaining({ fulfilled: 2 }));
  });
});
