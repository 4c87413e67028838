/**
 * Built-in constants: the lowest layer of agent configuration inheritance.
 */

export const PROVIDER_IDS = ['openrouter', 'openai', 'anthropic', 'claude_code'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

/** Providers reached over HTTP through an SDK; `claude_code` runs a local CLI instead */
export type HttpProviderId = Exclude<ProviderId, 'claude_code'>;

/** Executable started by the `claude_code` provider when no `cli_path` is set */
export const DEFAULT_CLI_PATH = 'claude';

/** Agent id whose overrides live in the `orchestrator` section (planner and synthesizer) */
export const ORCHESTRATOR_AGENT_ID = 'orchestrator';

export const BOUNDS = {
  iterations: { min: 1, max: 100 },
  parallelism: { min: 1, max: 10 },
  timeoutSeconds: { min: 1, max: 3600 },
  poolSize: { min: 1, max: 100 },
  maxTokens: { min: 1, max: 200_000 },
  temperature: { min: 0, max: 2 },
} as const;

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  openrouter: 'anthropic/claude-3.5-sonnet',
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
  claude_code: 'claude-sonnet-4-20250514',
};

export const DEFAULT_BASE_URLS: Partial<Record<ProviderId, string>> = {
  openrouter: 'https://openrouter.ai/api/v1',
};

export const BUILTIN_AGENT_DEFAULTS = {
  maxIterations: 10,
  maxTurns: 10,
  timeoutSeconds: 120,
  maxTokens: 4096,
} as const;

export const DEFAULT_PARALLEL_AGENTS = 4;
export const DEFAULT_TASK_TIMEOUT_SECONDS = 300;
export const DEFAULT_POOL_SIZE = 8;

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful research assistant. Use the tools available to you to gather \
relevant information and provide a comprehensive answer.

When you have fully satisfied the request and provided a complete answer, call the \
mark_task_complete tool with a summary of what was accomplished and a final message for the user.`;

export const DEFAULT_QUESTION_PROMPT = `You are an orchestrator that needs to create {num_agents} different questions \
to thoroughly analyze this topic from multiple angles.

Original user query: {user_input}

Generate exactly {num_agents} different, specific questions that will help gather comprehensive information \
about this topic. Each question should approach the topic from a different angle (research, analysis, \
verification, alternatives, etc.).

Return your response as a JSON array of strings, like this:
["question 1", "question 2", "question 3", "question 4"]

Only return the JSON array, nothing else.`;

export const DEFAULT_SYNTHESIS_PROMPT = `You have {num_responses} different AI agents that analyzed the same query \
from different perspectives. Your job is to synthesize their responses into ONE comprehensive final answer.

Original user query: {user_input}

Here are all the agent responses:

{agent_responses}

Combine the best information from all agents into one final answer. Do not call any tools. Do not mention \
that you are synthesizing multiple responses. Provide the final answer directly.`;
