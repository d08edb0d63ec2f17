import { describe, it, expect } from 'vitest';
import { BoundedScheduler, SerialWriter } from '../../../src/engine/scheduler.js';
import type { DecisionRecord } from '../../../src/engine/types.js';
import type { ActionSink } from '../../../src/sink/action-sink.js';
import { ConfigError } from '../../../src/core/errors.js';

const tick = (ms = 0): Promise<void> => new Promise(r => setTimeout(r, ms));

function record(subjectId: string): DecisionRecord {
  return { subjectId, actions: [] };
}

describe('BoundedScheduler', () => {
  it('should reject fewer than one lane', () => {
    expect(() => new BoundedScheduler(0)).toThrow(ConfigError);
    expect(() => new BoundedScheduler(1.5)).toThrow('Scheduler needs at least 1 lane, got 1.5');
  });

  it('should never run more items than its capacity', async () => {
    const scheduler = new BoundedScheduler(2);
    let running = 0;
    let peak = 0;
    const done: number[] = [];

    await scheduler.each([0, 1, 2, 3, 4, 5], async i => {
      running++;
      peak = Math.max(peak, running);
      await tick(5 + (i % 3));
      running--;
      done.push(i);
    });

    expect(peak).toBe(2);
    expect(done.sort()).toEqual([0, 1, 2, 3, 4, 5]);
    expect(scheduler.active).toBe(0);
    expect(scheduler.capacity).toBe(2);
  });

  it('should start items in list order', async () => {
    const scheduler = new BoundedScheduler(1);
    const started: string[] = [];
    await scheduler.each(['a', 'b', 'c', 'd'], async id => {
      started.push(id);
      await tick();
    });
    expect(started).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should report items in flight and still waiting', async () => {
    const scheduler = new BoundedScheduler(1);
    let releaseFirst = (): void => {};
    const run = scheduler.each(['first', 'second'], id =>
      id === 'first' ? new Promise<void>(resolve => { releaseFirst = resolve; }) : Promise.resolve());

    await tick();
    expect(scheduler.active).toBe(1);
    expect(scheduler.pending).toBe(1);

    releaseFirst();
    await run;
    expect(scheduler.active).toBe(0);
    expect(scheduler.pending).toBe(0);
  });

  it('should finish the other items and rethrow the first failure', async () => {
    const scheduler = new BoundedScheduler(1);
    const done: number[] = [];
    const run = scheduler.each([1, 2, 3], async n => {
      if (n !== 3) throw new Error(`boom ${n}`);
      done.push(n);
    });

    await expect(run).rejects.toThrow('boom 1');
    expect(done).toEqual([3]);
    expect(scheduler.active).toBe(0);
  });

  it('should resolve at once for an empty list', async () => {
    await expect(new BoundedScheduler(3).each([], async () => {})).resolves.toBeUndefined();
  });
});

describe('SerialWriter', () => {
  it('should never let writes overlap', async () => {
    let inside = 0;
    let overlapped = false;
    const written: string[] = [];
    const sink: ActionSink = {
      async write(r) {
        inside++;
        if (inside > 1) overlapped = true;
        await tick(2);
        written.push(r.subjectId);
        inside--;
      },
    };

    const writer = new SerialWriter(sink);
    const results = await Promise.all(['a', 'b', 'c'].map(id => writer.write(record(id))));

    expect(results).toEqual([true, true, true]);
    expect(overlapped).toBe(false);
    expect(written).toEqual(['a', 'b', 'c']);
    expect(writer.count).toBe(3);
    expect(writer.isLocked).toBe(false);
  });

  it('should skip writes that obtain the lock after the signal aborted', async () => {
    const controller = new AbortController();
    const written: string[] = [];
    const sink: ActionSink = {
      async write(r) {
        written.push(r.subjectId);
        controller.abort();
        await tick();
      },
    };

    const writer = new SerialWriter(sink);
    const results = await Promise.all(['a', 'b'].map(id => writer.write(record(id), controller.signal)));

    expect(results).toEqual([true, false]);
    expect(written).toEqual(['a']);
  });

  it('should release the lock when the sink throws', async () => {
    let fail = true;
    const sink: ActionSink = {
      write() {
        if (fail) {
          fail = false;
          throw new Error('sink down');
        }
      },
    };
    const writer = new SerialWriter(sink);
    await expect(writer.write(record('a'))).rejects.toThrow('sink down');
    await expect(writer.write(record('b'))).resolves.toBe(true);
    expect(writer.isLocked).toBe(false);
  });
});
