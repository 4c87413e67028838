// Manifold - parallel multi-agent task orchestration
// Main entry point for library usage

export * from './config/index.js';
export * from './providers/index.js';
export * from './agent/index.js';
export * from './orchestrator/index.js';
export * from './errors.js';
export { createRuntime, setupGracefulShutdown, type Runtime, type RuntimeOptions } from './runtime.js';
export * from './utils/index.js';
