/**
 * Orchestrator types
 */

import type { ErrorDiagnostic } from '../errors.js';

export type OrchestratorState = 'idle' | 'planning' | 'executing' | 'synthesizing' | 'done' | 'degraded' | 'failed';

export type AgentProgressStatus = 'queued' | 'initializing' | 'processing' | 'completed' | 'failed' | 'timed_out';

export type ProgressCallback = (agentId: string, status: AgentProgressStatus) => void;

interface SubtaskBase {
  /** Zero-based submission slot */
  index: number;
  agentId: string;
  question: string;
  durationMs: number;
}

export interface CompletedSubtask extends SubtaskBase {
  status: 'completed';
  text: string;
  /** The worker ran out of iterations before signalling completion but produced output */
  incomplete: boolean;
}

export interface FailedSubtask extends SubtaskBase {
  status: 'failed';
  error: ErrorDiagnostic;
}

export interface TimedOutSubtask extends SubtaskBase {
  status: 'timed_out';
  error: ErrorDiagnostic;
  timeoutMs: number;
  elapsedMs: number;
  /** Output the worker reported before it was abandoned */
  partialText?: string;
}

export type SubtaskResult = CompletedSubtask | FailedSubtask | TimedOutSubtask;

export interface SuccessfulAnswer {
  ok: true;
  text: string;
  successCount: number;
  /** `simple` is the deterministic concatenation used without a synthesizer */
  mode: 'synthesized' | 'simple';
  /** Fewer than all subtasks completed */
  degraded: boolean;
}

export interface FailedAnswer {
  ok: false;
  text: string;
  successCount: 0;
  /** Every slot, each carrying its diagnostic */
  failures: Array<FailedSubtask | TimedOutSubtask>;
}

export type FinalAnswer = SuccessfulAnswer | FailedAnswer;

export interface RunOptions {
  /** Aborting it cancels the run, like `cancel()` */
  signal?: AbortSignal;
  /** Overrides `orchestrator.parallel_agents` */
  numAgents?: number;
}

export function isCompleted(result: SubtaskResult): result is CompletedSubtask {
  return result.status === 'completed';
}
