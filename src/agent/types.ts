/**
 * Worker agent contract shared by the pool, the factory and the orchestrator
 */

import type { Logger } from 'pino';
import type { AgentConfig } from '../config/config.js';

export interface WorkerRunOptions {
  /** Aborted on timeout or run cancellation. Cooperative: the worker may ignore it. */
  signal?: AbortSignal;
  /** Hide the completion tool so the model answers in plain text (used for synthesis) */
  suppressCompletionSignal?: boolean;
  /** Receives the assistant text produced so far, after every iteration */
  onPartial?: (text: string) => void;
}

export interface CompletionMarker {
  summary: string;
  finalMessage: string;
}

export interface WorkerResult {
  /** `incomplete` when the iteration budget ran out before the completion signal */
  status: 'completed' | 'incomplete';
  text: string;
  completionMarker?: CompletionMarker;
  iterationsUsed: number;
}

export interface WorkerCapabilities {
  /** Whether the worker can call tools (required for AI synthesis) */
  tools: boolean;
}

export interface WorkerAgent {
  readonly id: string;
  readonly capabilities: WorkerCapabilities;
  run(query: string, options?: WorkerRunOptions): Promise<WorkerResult>;
  /** Reset per-use state before the instance goes back to the pool */
  cleanup?(): void | Promise<void>;
}

export interface WorkerConstructorContext {
  logger: Logger;
}

export type WorkerConstructor = (
  config: AgentConfig,
  context: WorkerConstructorContext
) => WorkerAgent | Promise<WorkerAgent>;
