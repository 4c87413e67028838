/**
 * AgentPool - bounded LRU cache of idle workers keyed by fingerprint.
 *
 * Idle entries live in one Map whose insertion order is release order, so the
 * first key is always the least recently released. A second index maps each
 * fingerprint to its idle entries for O(1) hits. Every check-then-mutate step
 * is synchronous; awaits happen only around factory and cleanup calls.
 */

import type { Logger } from 'pino';
import type { AgentConfig, Configuration } from '../config/config.js';
import { ManifoldError } from '../errors.js';
import { errorMessage } from '../utils/guards.js';
import type { AgentFactory } from './factory.js';
import { fingerprint, type AgentFingerprint } from './fingerprint.js';
import type { WorkerAgent } from './types.js';

export interface PooledAgent {
  agent: WorkerAgent;
  fingerprint: AgentFingerprint;
  releasedAt: number;
}

export interface AcquiredAgent {
  agent: WorkerAgent;
  fingerprint: AgentFingerprint;
}

export interface PoolStats {
  hits: number;
  misses: number;
  evictions: number;
  discards: number;
  idle: number;
  maxSize: number;
}

/** Source of resolved agent views (normally a ConfigResolver) */
export interface AgentConfigSource {
  resolve(configuration: Configuration, agentId: string): AgentConfig;
}

export interface AgentPoolOptions {
  factory: AgentFactory;
  resolver: AgentConfigSource;
  maxSize: number;
  logger: Logger;
}

export class AgentPool {
  private idle: Map<string, PooledAgent> = new Map();
  private byFingerprint: Map<AgentFingerprint, Map<string, PooledAgent>> = new Map();
  private counters = { hits: 0, misses: 0, evictions: 0, discards: 0 };
  private closed = false;
  private factory: AgentFactory;
  private resolver: AgentConfigSource;
  private maxSize: number;
  private logger: Logger;

  constructor(options: AgentPoolOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new ManifoldError(`Pool size must be a positive integer (got ${options.maxSize})`);
    }
    this.factory = options.factory;
    this.resolver = options.resolver;
    this.maxSize = options.maxSize;
    this.logger = options.logger.child({ module: 'agent-pool' });
  }

  /**
   * Take an idle worker matching the resolved configuration of `agentId`,
   * or construct one. The caller owns the worker until it is released.
   *
   * @throws PoolConstructionError when a new worker cannot be built
   */
  async acquire(agentId: string, configuration: Configuration): Promise<AcquiredAgent> {
    if (this.closed) {
      throw new ManifoldError('Agent pool has been shut down');
    }

    const config = this.resolver.resolve(configuration, agentId);
    const key = fingerprint(config);

    const entry = this.takeIdle(key);
    if (entry) {
      this.counters.hits++;
      this.logger.debug({ agentId, workerId: entry.agent.id }, 'Pool hit');
      return { agent: entry.agent, fingerprint: key };
    }

    this.counters.misses++;
    this.logger.debug({ agentId, provider: config.provider, model: config.model }, 'Pool miss');
    const agent = await this.factory.create(config);
    return { agent, fingerprint: key };
  }

  /**
   * Clean `agent` up and keep it as the most recently used idle entry,
   * evicting the least recently used one when the pool is full.
   * A worker whose cleanup fails is discarded.
   */
  async release(agent: WorkerAgent, key: AgentFingerprint): Promise<void> {
    if (this.idle.has(agent.id)) {
      this.logger.warn({ workerId: agent.id }, 'Worker released twice; ignoring');
      return;
    }

    try {
      await agent.cleanup?.();
    } catch (error) {
      this.counters.discards++;
      this.logger.warn({ workerId: agent.id, error: errorMessage(error) }, 'Worker cleanup failed; discarding');
      return;
    }

    if (this.closed) {
      this.counters.discards++;
      this.logger.debug({ workerId: agent.id }, 'Pool shut down; discarding released worker');
      return;
    }
    // A concurrent release of the same worker may have finished its cleanup first
    if (this.idle.has(agent.id)) {
      this.logger.warn({ workerId: agent.id }, 'Worker released twice; ignoring');
      return;
    }

    const evicted = this.idle.size >= this.maxSize ? this.evictOldest() : undefined;
    this.insert({ agent, fingerprint: key, releasedAt: Date.now() });

    if (evicted) {
      this.logger.debug({ workerId: evicted.agent.id }, 'Evicted least recently used worker');
      await this.dispose(evicted);
    }
  }

  getStats(): PoolStats {
    return { ...this.counters, idle: this.idle.size, maxSize: this.maxSize };
  }

  /**
   * Number of idle workers, optionally only those with fingerprint `key`.
   */
  idleCount(key?: AgentFingerprint): number {
    return key === undefined ? this.idle.size : (this.byFingerprint.get(key)?.size ?? 0);
  }

  /**
   * Drop and clean up every idle worker. Later releases discard their worker.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    const entries = [...this.idle.values()];
    this.idle.clear();
    this.byFingerprint.clear();
    await Promise.all(entries.map((entry) => this.dispose(entry)));
    this.logger.info({ disposed: entries.length, ...this.counters }, 'Agent pool shut down');
  }

  private takeIdle(key: AgentFingerprint): PooledAgent | undefined {
    const bucket = this.byFingerprint.get(key);
    const next = bucket?.values().next();
    if (!bucket || !next || next.done) {
      return undefined;
    }
    this.remove(next.value);
    return next.value;
  }

  private evictOldest(): PooledAgent | undefined {
    const oldest = this.idle.values().next();
    if (oldest.done) {
      return undefined;
    }
    this.remove(oldest.value);
    this.counters.evictions++;
    return oldest.value;
  }

  private insert(entry: PooledAgent): void {
    this.idle.set(entry.agent.id, entry);
    let bucket = this.byFingerprint.get(entry.fingerprint);
    if (!bucket) {
      bucket = new Map();
      this.byFingerprint.set(entry.fingerprint, bucket);
    }
    bucket.set(entry.agent.id, entry);
  }

  private remove(entry: PooledAgent): void {
    this.idle.delete(entry.agent.id);
    const bucket = this.byFingerprint.get(entry.fingerprint);
    if (bucket) {
      bucket.delete(entry.agent.id);
      if (bucket.size === 0) {
        this.byFingerprint.delete(entry.fingerprint);
      }
    }
  }

  private async dispose(entry: PooledAgent): Promise<void> {
    try {
      await entry.agent.cleanup?.();
    } catch (error) {
      this.logger.warn({ workerId: entry.agent.id, error: errorMessage(error) }, 'Cleanup of evicted worker failed');
    }
  }
}
