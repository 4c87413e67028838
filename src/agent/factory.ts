import type { Logger } from 'pino';
import type { AgentConfig, Configuration } from '../config/config.js';
import { PROVIDER_IDS, type ProviderId } from '../config/defaults.js';
import { ConfigError, ManifoldError, PoolConstructionError, type ConfigViolation } from '../errors.js';
import { createProvider } from '../providers/index.js';
import type { WorkerAgent, WorkerConstructor } from './types.js';
import { ClaudeCodeWorker } from './claude-code.js';
import { LLMWorkerAgent } from './worker.js';

const buildLLMWorker: WorkerConstructor = (config, { logger }) =>
  new LLMWorkerAgent({ config, provider: createProvider(config), logger });

export const DEFAULT_WORKER_REGISTRY: Record<ProviderId, WorkerConstructor> = {
  openrouter: buildLLMWorker,
  openai: buildLLMWorker,
  anthropic: buildLLMWorker,
  claude_code: (config, { logger }) => new ClaudeCodeWorker({ config, logger }),
};

export interface AgentFactoryOptions {
  logger: Logger;
  /** Provider id to constructor. Defaults to {@link DEFAULT_WORKER_REGISTRY}. */
  registry?: Record<string, WorkerConstructor>;
}

function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

/**
 * Builds workers from resolved agent configurations through a static registry.
 */
export class AgentFactory {
  private registry: Map<ProviderId, WorkerConstructor> = new Map();
  private logger: Logger;

  /**
   * @throws ManifoldError when a registry key is not a known provider id
   */
  constructor(options: AgentFactoryOptions) {
    this.logger = options.logger.child({ module: 'agent-factory' });
    for (const [key, construct] of Object.entries(options.registry ?? DEFAULT_WORKER_REGISTRY)) {
      if (!isProviderId(key)) {
        throw new ManifoldError(`Worker registry names unknown provider '${key}' (expected one of ${PROVIDER_IDS.join(', ')})`);
      }
      this.registry.set(key, construct);
    }
  }

  supports(provider: ProviderId): boolean {
    return this.registry.has(provider);
  }

  /**
   * Check that every provider `configuration` refers to has a constructor.
   *
   * @throws ConfigError listing each unsupported reference
   */
  assertSupports(configuration: Configuration): void {
    const { data } = configuration;
    const references: Array<{ path: string; provider: ProviderId }> = [{ path: 'provider', provider: data.provider }];
    if (data.orchestrator.provider) {
      references.push({ path: 'orchestrator.provider', provider: data.orchestrator.provider });
    }
    for (const [agentId, override] of Object.entries(data.agents)) {
      if (override.provider) {
        references.push({ path: `agents.${agentId}.provider`, provider: override.provider });
      }
    }

    const violations: ConfigViolation[] = references
      .filter((reference) => !this.supports(reference.provider))
      .map((reference) => ({
        path: reference.path,
        message: `No worker constructor registered for provider '${reference.provider}'`,
        value: reference.provider,
      }));
    if (violations.length > 0) {
      throw new ConfigError(configuration.source, violations);
    }
  }

  /**
   * @throws PoolConstructionError when no constructor is registered or construction fails
   */
  async create(config: AgentConfig): Promise<WorkerAgent> {
    const construct = this.registry.get(config.provider);
    if (!construct) {
      throw new PoolConstructionError(config.agentId, config.provider, {
        cause: new Error(`No worker constructor registered for provider '${config.provider}'`),
      });
    }

    try {
      const agent = await construct(config, { logger: this.logger });
      this.logger.debug({ agentId: config.agentId, workerId: agent.id, provider: config.provider }, 'Worker constructed');
      return agent;
    } catch (error) {
      throw new PoolConstructionError(config.agentId, config.provider, { cause: error });
    }
  }
}
