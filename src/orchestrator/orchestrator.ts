/**
 * Orchestrator - plans a task into N questions, runs them on pooled workers in
 * parallel and merges the answers.
 *
 * Per-subtask failures are recorded on the slot and never abort the batch.
 * Timeouts are enforced here by racing each call against a timer; the worker
 * only receives an abort signal it may or may not honor.
 */

import type { Logger } from 'pino';
import type { Configuration } from '../config/config.js';
import { BOUNDS, ORCHESTRATOR_AGENT_ID } from '../config/defaults.js';
import type { AgentPool, AcquiredAgent } from '../agent/pool.js';
import {
  ConfigError,
  ManifoldError,
  PlanningError,
  RunCancelledError,
  SubtaskFailure,
  SubtaskTimeout,
  SynthesisFailure,
  describeError,
} from '../errors.js';
import { errorMessage } from '../utils/guards.js';
import { runBounded, settleWithin } from './executor.js';
import { fallbackQuestions, fillTemplate, fitQuestions, parseQuestions } from './planner.js';
import { failureSummary, formatAgentResponses, simpleSynthesis } from './synthesizer.js';
import {
  isCompleted,
  type AgentProgressStatus,
  type FailedSubtask,
  type FinalAnswer,
  type OrchestratorState,
  type ProgressCallback,
  type RunOptions,
  type SubtaskResult,
  type TimedOutSubtask,
} from './types.js';

export interface OrchestratorOptions {
  configuration: Configuration;
  pool: AgentPool;
  logger: Logger;
  onProgress?: ProgressCallback;
}

export class Orchestrator {
  private configuration: Configuration;
  private pool: AgentPool;
  private logger: Logger;
  private onProgress: ProgressCallback | undefined;
  private state: OrchestratorState = 'idle';
  private progress: Map<string, AgentProgressStatus> = new Map();
  private controller: AbortController | undefined;

  constructor(options: OrchestratorOptions) {
    this.configuration = options.configuration;
    this.pool = options.pool;
    this.logger = options.logger.child({ module: 'orchestrator' });
    this.onProgress = options.onProgress;
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getProgress(): Record<string, AgentProgressStatus> {
    return Object.fromEntries(this.progress);
  }

  /**
   * Abort the current run. Pending subtasks are recorded as failed and `run` rejects.
   */
  cancel(reason = 'Run cancelled'): void {
    if (this.controller && !this.controller.signal.aborted) {
      this.logger.info({ reason }, 'Cancelling run');
      this.controller.abort(new RunCancelledError(reason));
    }
  }

  /**
   * Plan, execute and synthesize one task.
   *
   * @throws ConfigError when the agent count is out of bounds
   * @throws RunCancelledError when the run is cancelled
   */
  async run(task: string, options: RunOptions = {}): Promise<FinalAnswer> {
    if (this.controller) {
      throw new ManifoldError('A run is already in progress');
    }
    const settings = this.configuration.data.orchestrator;
    const n = options.numAgents ?? settings.parallel_agents;
    this.assertAgentCount(n);

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(new RunCancelledError());
    if (options.signal?.aborted) {
      onExternalAbort();
    }
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    this.controller = controller;
    this.progress = new Map();

    const started = Date.now();
    try {
      this.throwIfCancelled();
      this.transition('planning');
      const questions = await this.plan(task, n);
      this.throwIfCancelled();

      this.transition('executing');
      const results = await this.executeParallel(questions);
      this.throwIfCancelled();

      this.transition('synthesizing');
      const answer = await this.synthesize(results, task);
      this.throwIfCancelled();

      this.transition(answer.ok ? (answer.degraded ? 'degraded' : 'done') : 'failed');
      this.logger.info(
        { ok: answer.ok, successCount: answer.successCount, total: n, durationMs: Date.now() - started },
        'Run finished'
      );
      return answer;
    } catch (error) {
      this.transition('failed');
      throw error;
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.controller = undefined;
    }
  }

  /**
   * Ask the planner for exactly `n` questions. Falls back to templated
   * questions on any planner problem; only cancellation escapes.
   */
  async plan(task: string, n: number): Promise<string[]> {
    const prompt = fillTemplate(this.configuration.data.orchestrator.question_generation_prompt, {
      user_input: task,
      num_agents: n,
    });

    try {
      const raw = await this.callOrchestratorAgent(prompt, false);
      const questions = fitQuestions(parseQuestions(raw), task, n);
      this.logger.info({ count: questions.length }, 'Plan created');
      return questions;
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      this.logger.warn(
        { error: errorMessage(error), rawOutput: error instanceof PlanningError ? error.rawOutput : undefined },
        'Planning failed; using fallback questions'
      );
      return fallbackQuestions(task, n);
    }
  }

  /**
   * Run one pooled worker per question. Returns one result per question in submission order.
   */
  async executeParallel(questions: string[]): Promise<SubtaskResult[]> {
    const settings = this.configuration.data.orchestrator;
    const limit = settings.max_concurrency ?? questions.length;
    const timeoutMs = settings.task_timeout * 1000;
    const signal = this.runSignal();

    questions.forEach((_, index) => this.setProgress(`agent_${index + 1}`, 'queued'));

    const results = await runBounded(
      questions.map((question, index) => () => this.runSubtask(index, question, timeoutMs, signal)),
      limit
    );

    const completed = results.filter(isCompleted).length;
    this.logger.info({ completed, total: results.length }, 'Subtasks finished');
    return results;
  }

  /**
   * Merge successful results. Falls back to {@link simpleSynthesis} whenever
   * an AI merge is unavailable or unusable.
   */
  async synthesize(results: SubtaskResult[], task: string): Promise<FinalAnswer> {
    const successes = results.filter(isCompleted);
    if (successes.length === 0) {
      const failures = results.filter((result): result is FailedSubtask | TimedOutSubtask => !isCompleted(result));
      this.logger.error({ total: results.length }, 'Every subtask failed');
      return { ok: false, text: failureSummary(failures), successCount: 0, failures };
    }

    const degraded = successes.length < results.length;
    const prompt = fillTemplate(this.configuration.data.orchestrator.synthesis_prompt, {
      num_responses: successes.length,
      user_input: task,
      agent_responses: formatAgentResponses(successes),
    });

    try {
      const text = await this.callOrchestratorAgent(prompt, true);
      if (!text.trim()) {
        throw new SynthesisFailure('Synthesizer returned no output');
      }
      return { ok: true, text: text.trim(), successCount: successes.length, mode: 'synthesized', degraded };
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      this.logger.warn({ error: errorMessage(error) }, 'AI synthesis unavailable; concatenating results');
      return { ok: true, text: simpleSynthesis(successes), successCount: successes.length, mode: 'simple', degraded };
    }
  }

  private async runSubtask(index: number, question: string, timeoutMs: number, runSignal: AbortSignal): Promise<SubtaskResult> {
    const agentId = `agent_${index + 1}`;
    const started = Date.now();
    const base = () => ({ index, agentId, question, durationMs: Date.now() - started });

    if (runSignal.aborted) {
      this.setProgress(agentId, 'failed');
      return { ...base(), status: 'failed', error: describeError(new RunCancelledError()) };
    }

    this.setProgress(agentId, 'initializing');
    let acquired: AcquiredAgent;
    try {
      acquired = await this.pool.acquire(agentId, this.configuration);
    } catch (error) {
      this.logger.error({ agentId, error: errorMessage(error) }, 'Could not obtain worker');
      this.setProgress(agentId, 'failed');
      return { ...base(), status: 'failed', error: describeError(error) };
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(runSignal.reason);
    runSignal.addEventListener('abort', forwardAbort, { once: true });

    let partialText = '';
    this.setProgress(agentId, 'processing');
    // Deferred so a worker that throws before returning a promise lands in the error branch
    const call = Promise.resolve().then(() =>
      acquired.agent.run(question, {
        signal: controller.signal,
        onPartial: (text) => {
          partialText = text;
        },
      })
    );
    const outcome = await settleWithin(call, timeoutMs, runSignal);
    runSignal.removeEventListener('abort', forwardAbort);

    switch (outcome.kind) {
      case 'value': {
        await this.releaseWorker(acquired);
        if (!outcome.value.text.trim()) {
          this.setProgress(agentId, 'failed');
          const failure = new SubtaskFailure(agentId, `Worker finished (${outcome.value.status}) without output`);
          return { ...base(), status: 'failed', error: describeError(failure) };
        }
        this.setProgress(agentId, 'completed');
        return {
          ...base(),
          status: 'completed',
          text: outcome.value.text,
          incomplete: outcome.value.status === 'incomplete',
        };
      }
      case 'error': {
        await this.releaseWorker(acquired);
        this.logger.warn({ agentId, error: errorMessage(outcome.error) }, 'Subtask failed');
        this.setProgress(agentId, 'failed');
        return { ...base(), status: 'failed', error: describeError(outcome.error) };
      }
      case 'timeout': {
        const elapsedMs = Date.now() - started;
        const timeout = new SubtaskTimeout(agentId, timeoutMs, elapsedMs);
        controller.abort(timeout);
        this.releaseWhenSettled(acquired, call);
        this.logger.warn({ agentId, timeoutMs, elapsedMs }, 'Subtask timed out');
        this.setProgress(agentId, 'timed_out');
        return {
          ...base(),
          status: 'timed_out',
          error: describeError(timeout),
          timeoutMs,
          elapsedMs,
          ...(partialText && { partialText }),
        };
      }
      case 'cancelled': {
        controller.abort(runSignal.reason);
        this.releaseWhenSettled(acquired, call);
        this.setProgress(agentId, 'failed');
        return { ...base(), status: 'failed', error: describeError(new RunCancelledError()) };
      }
    }
  }

  /**
   * One call to the planner/synthesizer agent, bounded by the task timeout.
   *
   * @param synthesis hide the completion tool; requires a tool-capable worker
   */
  private async callOrchestratorAgent(prompt: string, synthesis: boolean): Promise<string> {
    const signal = this.runSignal();
    const acquired = await this.pool.acquire(ORCHESTRATOR_AGENT_ID, this.configuration);

    if (synthesis && !acquired.agent.capabilities.tools) {
      await this.releaseWorker(acquired);
      throw new SynthesisFailure('Synthesizer worker has no tool capability');
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', forwardAbort, { once: true });

    const timeoutMs = this.configuration.data.orchestrator.task_timeout * 1000;
    const call = Promise.resolve().then(() =>
      acquired.agent.run(prompt, {
        signal: controller.signal,
        ...(synthesis && { suppressCompletionSignal: true }),
      })
    );
    const outcome = await settleWithin(call, timeoutMs, signal);
    signal.removeEventListener('abort', forwardAbort);

    switch (outcome.kind) {
      case 'value':
        await this.releaseWorker(acquired);
        return outcome.value.text;
      case 'error':
        await this.releaseWorker(acquired);
        throw outcome.error;
      case 'timeout': {
        const timeout = new SubtaskTimeout(ORCHESTRATOR_AGENT_ID, timeoutMs, timeoutMs);
        controller.abort(timeout);
        this.releaseWhenSettled(acquired, call);
        throw timeout;
      }
      case 'cancelled':
        controller.abort(signal.reason);
        this.releaseWhenSettled(acquired, call);
        throw new RunCancelledError();
    }
  }

  private async releaseWorker(acquired: AcquiredAgent): Promise<void> {
    try {
      await this.pool.release(acquired.agent, acquired.fingerprint);
    } catch (error) {
      this.logger.warn({ workerId: acquired.agent.id, error: errorMessage(error) }, 'Worker release failed');
    }
  }

  /** An abandoned worker goes back to the pool only once its call settles */
  private releaseWhenSettled(acquired: AcquiredAgent, call: Promise<unknown>): void {
    call
      .catch((error: unknown) =>
        this.logger.debug({ workerId: acquired.agent.id, error: errorMessage(error) }, 'Abandoned call rejected')
      )
      .then(() => this.releaseWorker(acquired))
      .catch((error: unknown) => this.logger.warn({ error: errorMessage(error) }, 'Deferred release failed'));
  }

  private runSignal(): AbortSignal {
    return (this.controller ?? new AbortController()).signal;
  }

  private throwIfCancelled(): void {
    if (this.controller?.signal.aborted) {
      throw new RunCancelledError();
    }
  }

  private assertAgentCount(n: number): void {
    const { min, max } = BOUNDS.parallelism;
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new ConfigError(this.configuration.source, [
        { path: 'orchestrator.parallel_agents', message: `Parallelism must be between ${min} and ${max}`, value: n },
      ]);
    }
  }

  private transition(next: OrchestratorState): void {
    this.logger.debug({ from: this.state, to: next }, 'State change');
    this.state = next;
  }

  private setProgress(agentId: string, status: AgentProgressStatus): void {
    this.progress.set(agentId, status);
    this.onProgress?.(agentId, status);
  }
}
