export * from './types.js';
export { AgentFactory, DEFAULT_WORKER_REGISTRY, type AgentFactoryOptions } from './factory.js';
export { AgentPool, type AcquiredAgent, type AgentConfigSource, type AgentPoolOptions, type PoolStats, type PooledAgent } from './pool.js';
export { fingerprint, canonicalJson, type AgentFingerprint } from './fingerprint.js';
export { ClaudeCodeWorker, type ClaudeCodeWorkerOptions } from './claude-code.js';
export { LLMWorkerAgent, COMPLETION_TOOL, COMPLETION_TOOL_NAME, type LLMWorkerAgentOptions } from './worker.js';
