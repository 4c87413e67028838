/**
 * Tests for keyed async critical sections.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LaneLock } from './lane-lock.js';
import { deferred } from '../testing/helpers.js';

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('LaneLock', () => {
  let lock: LaneLock;

  beforeEach(() => {
    lock = new LaneLock();
  });

  it('executes a single task and returns its result', async () => {
    await expect(lock.run('lane-a', async () => 42)).resolves.toBe(42);
  });

  it('serializes tasks in the same lane', async () => {
    const order: string[] = [];

    const p1 = lock.run('lane-a', async () => {
      order.push('start 1');
      await sleep(20);
      order.push('end 1');
    });
    const p2 = lock.run('lane-a', async () => {
      order.push('start 2');
    });

    await Promise.all([p1, p2]);
    expect(order).toEqual(['start 1', 'end 1', 'start 2']);
  });

  it('runs tasks in different lanes concurrently', async () => {
    const gate = deferred();
    const order: string[] = [];

    const p1 = lock.run('lane-a', async () => {
      order.push('a started');
      await gate.promise;
      order.push('a finished');
    });
    const p2 = lock.run('lane-b', async () => {
      order.push('b ran');
    });

    await p2;
    gate.resolve();
    await p1;
    expect(order).toEqual(['a started', 'b ran', 'a finished']);
  });

  it('propagates task errors, including synchronous throws', async () => {
    await expect(
      lock.run('lane-a', async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    await expect(
      lock.run('lane-a', () => {
        throw new Error('thrown early');
      })
    ).rejects.toThrow('thrown early');
  });

  it('continues draining after a failed task', async () => {
    const p1 = lock
      .run('lane-a', async () => {
        throw new Error('first fails');
      })
      .catch(() => 'caught');
    const p2 = lock.run('lane-a', async () => 'second ok');

    await expect(Promise.all([p1, p2])).resolves.toEqual(['caught', 'second ok']);
  });

  it('warns when a task waited too long', async () => {
    const warnings: string[] = [];
    const slowLock = new LaneLock({ warnAfterMs: 5, onWarn: (message) => warnings.push(message) });
    const gate = deferred();

    const p1 = slowLock.run('lane-a', () => gate.promise);
    const p2 = slowLock.run('lane-a', async () => 'done');
    await sleep(20);
    gate.resolve();
    await Promise.all([p1, p2]);

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Task waited \d+ms in lane "lane-a" \(warn threshold: 5ms\)$/);
  });
});
