import { z } from 'zod';
import {
  BOUNDS,
  DEFAULT_PARALLEL_AGENTS,
  DEFAULT_POOL_SIZE,
  DEFAULT_QUESTION_PROMPT,
  DEFAULT_SYNTHESIS_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TASK_TIMEOUT_SECONDS,
  PROVIDER_IDS,
  type ProviderId,
} from './defaults.js';

const bounded = (range: { min: number; max: number }, label: string) =>
  z
    .number()
    .int(`${label} must be an integer`)
    .min(range.min, `${label} must be between ${range.min} and ${range.max}`)
    .max(range.max, `${label} must be between ${range.min} and ${range.max}`);

const iterationCount = bounded(BOUNDS.iterations, 'Iteration count');
const timeoutSeconds = bounded(BOUNDS.timeoutSeconds, 'Timeout (seconds)');
const parallelism = bounded(BOUNDS.parallelism, 'Parallelism');

const providerIdSchema = z.enum(PROVIDER_IDS);

// Numeric knobs shared by every inheritance layer
const knobsShape = {
  max_iterations: iterationCount.optional(),
  max_turns: iterationCount.optional(),
  timeout: timeoutSeconds.optional(),
  max_tokens: bounded(BOUNDS.maxTokens, 'Max tokens').optional(),
  temperature: z
    .number()
    .min(BOUNDS.temperature.min, `Temperature must be between ${BOUNDS.temperature.min} and ${BOUNDS.temperature.max}`)
    .max(BOUNDS.temperature.max, `Temperature must be between ${BOUNDS.temperature.min} and ${BOUNDS.temperature.max}`)
    .optional(),
};

// Settings any layer above the global one may set
const layerShape = {
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  model: z.string().min(1, 'Model must not be empty').optional(),
  system_prompt: z.string().optional(),
  /** Executable for the `claude_code` provider */
  cli_path: z.string().min(1, 'CLI path must not be empty').optional(),
  ...knobsShape,
};

const providerSectionSchema = z.object(layerShape);

const agentOverrideSchema = z.object({
  provider: providerIdSchema.optional(),
  ...layerShape,
});

const orchestratorSchema = z.object({
  parallel_agents: parallelism.default(DEFAULT_PARALLEL_AGENTS),
  task_timeout: timeoutSeconds.default(DEFAULT_TASK_TIMEOUT_SECONDS),
  max_concurrency: parallelism.optional(),
  question_generation_prompt: z.string().min(1).default(DEFAULT_QUESTION_PROMPT),
  synthesis_prompt: z.string().min(1).default(DEFAULT_SYNTHESIS_PROMPT),
  // Planner/synthesizer overrides
  provider: providerIdSchema.optional(),
  ...layerShape,
});

const poolSchema = z.object({
  max_size: bounded(BOUNDS.poolSize, 'Pool size').default(DEFAULT_POOL_SIZE),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export const configSchema = z.object({
  provider: providerIdSchema,
  openrouter: providerSectionSchema.optional(),
  openai: providerSectionSchema.optional(),
  anthropic: providerSectionSchema.optional(),
  claude_code: providerSectionSchema.optional(),
  system_prompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  agent: z.object(knobsShape).default({}),
  agents: z.record(z.string(), agentOverrideSchema).default({}),
  orchestrator: orchestratorSchema.default({}),
  pool: poolSchema.default({}),
  logging: loggingSchema.default({}),
});

export type ConfigData = z.infer<typeof configSchema>;
export type ProviderSection = z.infer<typeof providerSectionSchema>;
export type AgentOverride = z.infer<typeof agentOverrideSchema>;
export type OrchestratorSettings = z.infer<typeof orchestratorSchema>;
export type LoggingSettings = z.infer<typeof loggingSchema>;

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Immutable configuration snapshot for one generation of one source.
 */
export interface Configuration {
  readonly source: string;
  readonly generation: number;
  readonly data: DeepReadonly<ConfigData>;
}

/**
 * Resolved per-agent view. Callers receive their own copy.
 */
export interface AgentConfig {
  agentId: string;
  provider: ProviderId;
  model: string;
  baseUrl?: string;
  systemPrompt: string;
  maxIterations: number;
  maxTurns: number;
  timeoutSeconds: number;
  maxTokens: number;
  temperature?: number;
  apiKey?: string;
  cliPath?: string;
}

/**
 * Where a configuration comes from. `id` identifies the source in caches and errors.
 */
export interface ConfigSource {
  id: string;
  read(): Promise<string>;
}
