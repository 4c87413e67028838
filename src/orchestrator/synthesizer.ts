import type { CompletedSubtask, FailedSubtask, TimedOutSubtask } from './types.js';

/**
 * Successful outputs under numbered headings, numbered by submission slot.
 */
export function formatAgentResponses(results: ReadonlyArray<CompletedSubtask>): string {
  return results.map((result) => `=== Agent ${result.index + 1} Response ===\n${result.text.trim()}`).join('\n\n');
}

/** Deterministic merge used when no synthesizer is available */
export function simpleSynthesis(results: ReadonlyArray<CompletedSubtask>): string {
  return formatAgentResponses(results);
}

export function failureSummary(failures: ReadonlyArray<FailedSubtask | TimedOutSubtask>): string {
  const lines = failures.map((failure) => `- ${failure.agentId} (${failure.status}): ${failure.error.message}`);
  return [`All ${failures.length} subtasks failed; no answer could be produced.`, ...lines].join('\n');
}
