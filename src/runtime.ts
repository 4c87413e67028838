/**
 * Wires configuration, worker pool and orchestrator together for one process.
 */

import type { Logger } from 'pino';
import type { ConfigSource, Configuration } from './config/config.js';
import { ConfigResolver } from './config/resolver.js';
import { AgentFactory } from './agent/factory.js';
import { AgentPool } from './agent/pool.js';
import type { WorkerConstructor } from './agent/types.js';
import { Orchestrator } from './orchestrator/orchestrator.js';
import type { ProgressCallback } from './orchestrator/types.js';

export interface RuntimeOptions {
  source: ConfigSource | string;
  logger: Logger;
  env?: Record<string, string | undefined>;
  registry?: Record<string, WorkerConstructor>;
  onProgress?: ProgressCallback;
}

export interface Runtime {
  configuration: Configuration;
  resolver: ConfigResolver;
  pool: AgentPool;
  orchestrator: Orchestrator;
  shutdown(): Promise<void>;
}

/**
 * Load and validate the configuration, then build the pool and orchestrator on it.
 *
 * @throws ConfigError when the configuration is invalid or names an unregistered provider
 */
export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { logger } = options;
  const resolver = new ConfigResolver({ logger, ...(options.env && { env: options.env }) });
  const configuration = await resolver.load(options.source);

  const factory = new AgentFactory({ logger, ...(options.registry && { registry: options.registry }) });
  factory.assertSupports(configuration);

  const pool = new AgentPool({
    factory,
    resolver,
    maxSize: configuration.data.pool.max_size,
    logger,
  });
  const orchestrator = new Orchestrator({
    configuration,
    pool,
    logger,
    ...(options.onProgress && { onProgress: options.onProgress }),
  });

  return {
    configuration,
    resolver,
    pool,
    orchestrator,
    shutdown: async () => {
      orchestrator.cancel('Shutting down');
      await pool.shutdown();
    },
  };
}

/**
 * Cancel the run on SIGINT/SIGTERM; a second signal exits immediately.
 */
export function setupGracefulShutdown(runtime: Runtime, logger: Logger): void {
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      logger.warn({ signal }, 'Second signal received; exiting');
      process.exit(130);
    }
    stopping = true;
    logger.info({ signal }, 'Received shutdown signal');
    runtime.orchestrator.cancel(`Interrupted by ${signal}`);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
