import { describe, it, expect, beforeEach } from 'vitest';
import { AgentPool } from './pool.js';
import { AgentFactory } from './factory.js';
import { ConfigResolver } from '../config/resolver.js';
import { ManifoldError, PoolConstructionError } from '../errors.js';
import { BASE_CONFIG, FakeWorker, fakeRegistry, makeConfiguration, silentLogger } from '../testing/helpers.js';

const configuration = makeConfiguration({
  ...BASE_CONFIG,
  agents: {
    a: { model: 'model-a' },
    b: { model: 'model-b' },
    c: { model: 'model-c' },
    d: { model: 'model-d' },
    e: { model: 'model-e' },
  },
});

describe('AgentPool', () => {
  let built: FakeWorker[];
  let resolver: ConfigResolver;

  function createPool(maxSize: number): AgentPool {
    const factory = new AgentFactory({
      logger: silentLogger,
      registry: fakeRegistry(() => {
        const worker = new FakeWorker();
        built.push(worker);
        return worker;
      }),
    });
    return new AgentPool({ factory, resolver, maxSize, logger: silentLogger });
  }

  beforeEach(() => {
    built = [];
    resolver = new ConfigResolver({ logger: silentLogger, env: {} });
  });

  it('returns the released instance for the same fingerprint', async () => {
    const pool = createPool(4);

    const first = await pool.acquire('agent_1', configuration);
    await pool.release(first.agent, first.fingerprint);
    // Same resolved behavior under a different agent id
    const second = await pool.acquire('agent_2', configuration);

    expect(second.agent).toBe(first.agent);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(built).toHaveLength(1);
    expect(pool.getStats()).toEqual({ hits: 1, misses: 1, evictions: 0, discards: 0, idle: 0, maxSize: 4 });
  });

  it('constructs a new instance for a different fingerprint', async () => {
    const pool = createPool(4);

    const first = await pool.acquire('a', configuration);
    await pool.release(first.agent, first.fingerprint);
    const second = await pool.acquire('b', configuration);

    expect(second.agent).not.toBe(first.agent);
    expect(pool.idleCount(first.fingerprint)).toBe(1);
    expect(pool.getStats().misses).toBe(2);
  });

  it('hands concurrent acquirers distinct instances', async () => {
    const pool = createPool(4);
    const [x, y] = await Promise.all([pool.acquire('agent_1', configuration), pool.acquire('agent_2', configuration)]);
    expect(x.agent).not.toBe(y.agent);
    expect(x.fingerprint).toBe(y.fingerprint);
  });

  it('evicts the least recently released entry when full', async () => {
    const pool = createPool(2);
    const a = await pool.acquire('a', configuration);
    const b = await pool.acquire('b', configuration);
    const c = await pool.acquire('c', configuration);

    // Release order, not acquisition order, drives recency
    await pool.release(b.agent, b.fingerprint);
    await pool.release(a.agent, a.fingerprint);
    await pool.release(c.agent, c.fingerprint);

    expect(pool.idleCount()).toBe(2);
    expect(pool.idleCount(b.fingerprint)).toBe(0);
    expect(pool.idleCount(a.fingerprint)).toBe(1);
    expect(pool.idleCount(c.fingerprint)).toBe(1);
    expect(pool.getStats().evictions).toBe(1);
    // Cleaned once on release and once on eviction
    expect(built[1].cleanups).toBe(2);

    const again = await pool.acquire('b', configuration);
    expect(again.agent).not.toBe(b.agent);
  });

  it('never holds more idle entries than its maximum', async () => {
    const pool = createPool(3);
    for (const id of ['a', 'b', 'c', 'd', 'e']) {
      const acquired = await pool.acquire(id, configuration);
      await pool.release(acquired.agent, acquired.fingerprint);
      expect(pool.idleCount()).toBeLessThanOrEqual(3);
    }
    expect(pool.idleCount()).toBe(3);
    expect(pool.getStats().evictions).toBe(2);
  });

  it('discards a worker whose cleanup fails', async () => {
    const pool = createPool(2);
    const acquired = await pool.acquire('a', configuration);
    built[0].failCleanup = true;

    await expect(pool.release(acquired.agent, acquired.fingerprint)).resolves.toBeUndefined();

    expect(pool.idleCount()).toBe(0);
    expect(pool.getStats().discards).toBe(1);
    const next = await pool.acquire('a', configuration);
    expect(next.agent).not.toBe(acquired.agent);
  });

  it('ignores a second release of an idle worker', async () => {
    const pool = createPool(2);
    const acquired = await pool.acquire('a', configuration);
    await pool.release(acquired.agent, acquired.fingerprint);
    await pool.release(acquired.agent, acquired.fingerprint);
    expect(pool.idleCount()).toBe(1);
    expect(built[0].cleanups).toBe(1);
  });

  it('keeps one entry for concurrent releases of the same worker', async () => {
    const pool = createPool(2);
    const a = await pool.acquire('a', configuration);
    const b = await pool.acquire('b', configuration);
    await pool.release(b.agent, b.fingerprint);

    await Promise.all([pool.release(a.agent, a.fingerprint), pool.release(a.agent, a.fingerprint)]);

    expect(pool.idleCount()).toBe(2);
    expect(pool.idleCount(a.fingerprint)).toBe(1);
    expect(pool.idleCount(b.fingerprint)).toBe(1);
    expect(pool.getStats().evictions).toBe(0);
  });

  it('propagates construction failures', async () => {
    const factory = new AgentFactory({
      logger: silentLogger,
      registry: fakeRegistry(() => {
        throw new Error('no credentials');
      }),
    });
    const pool = new AgentPool({ factory, resolver, maxSize: 2, logger: silentLogger });

    await expect(pool.acquire('a', configuration)).rejects.toBeInstanceOf(PoolConstructionError);
  });

  it('cleans up idle workers on shutdown and discards later releases', async () => {
    const pool = createPool(2);
    const a = await pool.acquire('a', configuration);
    const b = await pool.acquire('b', configuration);
    await pool.release(a.agent, a.fingerprint);

    await pool.shutdown();

    expect(built[0].cleanups).toBe(2);
    expect(pool.idleCount()).toBe(0);

    await pool.release(b.agent, b.fingerprint);
    expect(pool.idleCount()).toBe(0);
    expect(pool.getStats().discards).toBe(1);
    await expect(pool.acquire('a', configuration)).rejects.toThrow(ManifoldError);
  });

  it('rejects a non-positive size', () => {
    const factory = new AgentFactory({ logger: silentLogger, registry: fakeRegistry(() => new FakeWorker()) });
    expect(() => new AgentPool({ factory, resolver, maxSize: 0, logger: silentLogger })).toThrow(
      'Pool size must be a positive integer (got 0)'
    );
  });
});
