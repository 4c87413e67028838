/**
 * ConfigResolver owns the configuration cache.
 *
 * - At most one parse per source per generation: a cache check outside the
 *   source's lane, then a re-check inside it before parsing.
 * - `invalidate` bumps the generation and drops the snapshot together with
 *   every per-agent view derived from it, in one synchronous step.
 * - `resolve` merges agent > provider > global > built-in and hands out copies.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import type { ZodIssue } from 'zod';
import { ConfigError, type ConfigViolation } from '../errors.js';
import { LaneLock } from '../utils/lane-lock.js';
import { errorMessage, isRecord } from '../utils/guards.js';
import { configSchema } from './config.js';
import type {
  AgentConfig,
  AgentOverride,
  ConfigData,
  ConfigSource,
  Configuration,
  DeepReadonly,
  ProviderSection,
} from './config.js';
import {
  BUILTIN_AGENT_DEFAULTS,
  DEFAULT_BASE_URLS,
  DEFAULT_MODELS,
  ORCHESTRATOR_AGENT_ID,
  PROVIDER_IDS,
  type ProviderId,
} from './defaults.js';
import { isSensitiveKey, redactSecrets, REDACTED } from './sanitize.js';

export interface ConfigResolverOptions {
  logger: Logger;
  /** Variables available to `${NAME}` references. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export interface SanitizedConfiguration {
  source: string;
  generation: number;
  data: Record<string, unknown>;
}

interface SourceState {
  generation: number;
  snapshot?: Configuration;
  agents: Map<string, AgentConfig>;
}

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Providers that cannot be called without a credential */
const CREDENTIALED_PROVIDERS: ReadonlySet<ProviderId> = new Set(['openrouter', 'openai', 'anthropic']);

export function fileConfigSource(filePath: string): ConfigSource {
  const resolved = path.resolve(filePath);
  return {
    id: resolved,
    read: () => readFile(resolved, 'utf8'),
  };
}

function toSource(source: ConfigSource | string): ConfigSource {
  return typeof source === 'string' ? fileConfigSource(source) : source;
}

export class ConfigResolver {
  private states: Map<string, SourceState> = new Map();
  private lock: LaneLock;
  private logger: Logger;
  private env: Record<string, string | undefined>;

  constructor(options: ConfigResolverOptions) {
    this.logger = options.logger.child({ module: 'config-resolver' });
    this.env = options.env ?? process.env;
    this.lock = new LaneLock({ onWarn: (message) => this.logger.warn(message) });
  }

  /**
   * Return the cached snapshot for `source`, reading and validating it on a miss.
   *
   * @throws ConfigError listing every violation found
   */
  async load(source: ConfigSource | string): Promise<Configuration> {
    const configSource = toSource(source);
    const cached = this.states.get(configSource.id)?.snapshot;
    if (cached) {
      return cached;
    }

    return this.lock.run(configSource.id, async () => {
      const state = this.stateFor(configSource.id);
      if (state.snapshot) {
        return state.snapshot;
      }

      const generation = state.generation;
      const snapshot = await this.parse(configSource, generation);

      if (state.generation === generation) {
        state.snapshot = snapshot;
        this.logger.info({ source: configSource.id, generation }, 'Configuration loaded');
        this.logger.debug({ source: configSource.id, config: redactSecrets(snapshot.data) }, 'Configuration contents');
      } else {
        this.logger.debug(
          { source: configSource.id, generation, current: state.generation },
          'Configuration invalidated while loading; snapshot not cached'
        );
      }
      return snapshot;
    });
  }

  /**
   * Resolved view of one agent. The returned object is the caller's own copy.
   */
  resolve(configuration: Configuration, agentId: string): AgentConfig {
    const state = this.states.get(configuration.source);
    const memoizable = state !== undefined && state.snapshot === configuration;

    if (memoizable) {
      const memoized = state.agents.get(agentId);
      if (memoized) {
        return { ...memoized };
      }
    }

    const resolved = resolveAgentConfig(configuration.data, agentId);
    if (memoizable) {
      state.agents.set(agentId, resolved);
    }
    return { ...resolved };
  }

  /**
   * Drop the cached snapshot and every per-agent view derived from it.
   * The next `load` parses the source again under a new generation.
   */
  invalidate(source: ConfigSource | string): void {
    const id = toSource(source).id;
    const state = this.stateFor(id);
    state.generation++;
    state.snapshot = undefined;
    state.agents = new Map();
    this.logger.info({ source: id, generation: state.generation }, 'Configuration invalidated');
  }

  getGeneration(source: ConfigSource | string): number {
    return this.states.get(toSource(source).id)?.generation ?? 0;
  }

  /**
   * Copy of `configuration` with credentials replaced by a redaction marker.
   */
  sanitize(configuration: Configuration): SanitizedConfiguration {
    const data = redactSecrets(configuration.data);
    return {
      source: configuration.source,
      generation: configuration.generation,
      data: isRecord(data) ? data : {},
    };
  }

  private stateFor(id: string): SourceState {
    let state = this.states.get(id);
    if (!state) {
      state = { generation: 0, agents: new Map() };
      this.states.set(id, state);
    }
    return state;
  }

  private async parse(source: ConfigSource, generation: number): Promise<Configuration> {
    let text: string;
    try {
      text = await source.read();
    } catch (error) {
      throw new ConfigError(source.id, [{ path: '', message: `Unable to read configuration: ${errorMessage(error)}` }], {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(text);
    } catch (error) {
      throw new ConfigError(source.id, [{ path: '', message: `Invalid YAML: ${errorMessage(error)}` }], { cause: error });
    }

    const violations: ConfigViolation[] = [];
    const raw = expandEnvReferences(parsed ?? {}, this.env, [], violations);
    const result = configSchema.safeParse(raw);

    if (!result.success) {
      violations.push(...result.error.issues.map((issue) => issueToViolation(issue, raw)));
    }
    violations.push(...crossReferenceViolations(raw));

    if (!result.success || violations.length > 0) {
      this.logger.warn({ source: source.id, violations: violations.length }, 'Configuration rejected');
      throw new ConfigError(source.id, violations);
    }

    return deepFreeze({ source: source.id, generation, data: result.data });
  }
}

/**
 * Merge the inheritance layers for `agentId`:
 * agent-specific > provider section > global settings > built-in constants.
 */
export function resolveAgentConfig(data: DeepReadonly<ConfigData>, agentId: string): AgentConfig {
  const agentLayer: DeepReadonly<AgentOverride> =
    agentId === ORCHESTRATOR_AGENT_ID
      ? data.orchestrator
      : Object.hasOwn(data.agents, agentId)
        ? data.agents[agentId]
        : {};
  const provider: ProviderId = agentLayer.provider ?? data.provider;
  const providerLayer: DeepReadonly<ProviderSection> = data[provider] ?? {};
  const globalLayer = data.agent;

  return {
    agentId,
    provider,
    model: agentLayer.model ?? providerLayer.model ?? DEFAULT_MODELS[provider],
    baseUrl: agentLayer.base_url ?? providerLayer.base_url ?? DEFAULT_BASE_URLS[provider],
    systemPrompt: agentLayer.system_prompt ?? providerLayer.system_prompt ?? data.system_prompt,
    maxIterations:
      agentLayer.max_iterations ??
      providerLayer.max_iterations ??
      globalLayer.max_iterations ??
      BUILTIN_AGENT_DEFAULTS.maxIterations,
    maxTurns: agentLayer.max_turns ?? providerLayer.max_turns ?? globalLayer.max_turns ?? BUILTIN_AGENT_DEFAULTS.maxTurns,
    timeoutSeconds:
      agentLayer.timeout ?? providerLayer.timeout ?? globalLayer.timeout ?? BUILTIN_AGENT_DEFAULTS.timeoutSeconds,
    maxTokens:
      agentLayer.max_tokens ?? providerLayer.max_tokens ?? globalLayer.max_tokens ?? BUILTIN_AGENT_DEFAULTS.maxTokens,
    temperature: agentLayer.temperature ?? providerLayer.temperature ?? globalLayer.temperature,
    apiKey: agentLayer.api_key ?? providerLayer.api_key,
    cliPath: agentLayer.cli_path ?? providerLayer.cli_path,
  };
}

function expandEnvReferences(
  value: unknown,
  env: Record<string, string | undefined>,
  pathParts: string[],
  violations: ConfigViolation[]
): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (reference: string, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        violations.push({ path: pathParts.join('.'), message: `Environment variable ${name} is not set` });
        return reference;
      }
      return replacement;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => expandEnvReferences(item, env, [...pathParts, String(index)], violations));
  }
  if (isRecord(value)) {
    const expanded: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      expanded[key] = expandEnvReferences(child, env, [...pathParts, key], violations);
    }
    return expanded;
  }
  return value;
}

function valueAt(root: unknown, pathParts: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const part of pathParts) {
    if (Array.isArray(current) && typeof part === 'number') {
      current = current[part];
    } else if (isRecord(current) && Object.hasOwn(current, String(part))) {
      current = current[String(part)];
    } else {
      return undefined;
    }
  }
  return current;
}

function issueToViolation(issue: ZodIssue, raw: unknown): ConfigViolation {
  const lastKey = issue.path[issue.path.length - 1];
  const value = valueAt(raw, issue.path);
  const hidden = typeof lastKey === 'string' && isSensitiveKey(lastKey);
  return {
    path: issue.path.join('.'),
    message: issue.message,
    ...(value !== undefined && { value: hidden ? REDACTED : value }),
  };
}

function isProviderId(value: unknown): value is ProviderId {
  return typeof value === 'string' && PROVIDER_IDS.some((id) => id === value);
}

function nonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Checks spanning sections: referenced providers exist and credentials resolve.
 * Runs on the raw mapping so its findings are reported alongside schema violations.
 */
function crossReferenceViolations(raw: unknown): ConfigViolation[] {
  if (!isRecord(raw) || !isProviderId(raw.provider)) {
    return [];
  }
  const violations: ConfigViolation[] = [];
  const globalProvider = raw.provider;

  const sectionFor = (provider: ProviderId): Record<string, unknown> | undefined => {
    const section = raw[provider];
    return isRecord(section) ? section : undefined;
  };

  const checkLayer = (layerPath: string, layer: Record<string, unknown>): void => {
    const override = layer.provider;
    let provider: ProviderId = globalProvider;
    if (override !== undefined) {
      if (!isProviderId(override)) {
        return; // reported by the schema
      }
      if (!sectionFor(override)) {
        violations.push({
          path: `${layerPath}.provider`,
          message: `References unknown provider '${override}' (no '${override}' section)`,
          value: override,
        });
        return;
      }
      provider = override;
    }
    if (nonEmptyString(layer.api_key) || provider === globalProvider) {
      return; // own credential, or the global chain which is checked once below
    }
    if (CREDENTIALED_PROVIDERS.has(provider) && !nonEmptyString(sectionFor(provider)?.api_key)) {
      violations.push({
        path: `${layerPath}.api_key`,
        message: `Provider '${provider}' requires an api_key`,
      });
    }
  };

  const globalSection = sectionFor(globalProvider);
  if (!globalSection) {
    violations.push({
      path: globalProvider,
      message: `Provider '${globalProvider}' configuration not found`,
    });
  } else if (CREDENTIALED_PROVIDERS.has(globalProvider) && !nonEmptyString(globalSection.api_key)) {
    violations.push({ path: `${globalProvider}.api_key`, message: `Provider '${globalProvider}' requires an api_key` });
  }

  if (isRecord(raw.agents)) {
    for (const [agentId, layer] of Object.entries(raw.agents)) {
      if (isRecord(layer)) {
        checkLayer(`agents.${agentId}`, layer);
      }
    }
  }
  if (isRecord(raw.orchestrator)) {
    checkLayer('orchestrator', raw.orchestrator);
  }

  return violations;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
