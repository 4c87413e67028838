/**
 * In-process fakes shared by the test suites.
 */

import pino from 'pino';
import type { AgentConfig, ConfigSource, Configuration } from '../config/config.js';
import { configSchema } from '../config/config.js';
import type { ProviderId } from '../config/defaults.js';
import type { WorkerAgent, WorkerConstructor, WorkerResult, WorkerRunOptions } from '../agent/types.js';
import type { CompletionRequest, CompletionResponse, ContentBlock, LLMProvider } from '../providers/types.js';

export const silentLogger = pino({ level: 'silent' });

export const BASE_CONFIG = {
  provider: 'openai',
  openai: { api_key: 'test-key', model: 'gpt-4o' },
};

export function makeConfiguration(raw: Record<string, unknown> = BASE_CONFIG, source = 'memory://test'): Configuration {
  return { source, generation: 0, data: configSchema.parse(raw) };
}

export function makeAgentConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    agentId: 'agent_1',
    provider: 'openai',
    model: 'gpt-4o',
    systemPrompt: 'You are a test worker.',
    maxIterations: 10,
    maxTurns: 10,
    timeoutSeconds: 120,
    maxTokens: 4096,
    apiKey: 'test-key',
    ...overrides,
  };
}

/**
 * Config source backed by a mutable string; counts reads.
 */
export class MemorySource implements ConfigSource {
  public reads = 0;
  /** Resolves pending reads; set to hold reads open until the test releases them */
  public gate: Promise<void> | undefined;

  constructor(
    public readonly id: string,
    public text: string
  ) {}

  async read(): Promise<string> {
    this.reads++;
    const snapshot = this.text;
    if (this.gate) {
      await this.gate;
    }
    return snapshot;
  }
}

export type FakeResponder = (query: string, options: WorkerRunOptions) => Promise<WorkerResult> | WorkerResult;

let fakeIds = 0;

export class FakeWorker implements WorkerAgent {
  public readonly id: string;
  public readonly capabilities: { tools: boolean };
  public readonly queries: string[] = [];
  public readonly runOptions: WorkerRunOptions[] = [];
  public cleanups = 0;
  public failCleanup = false;

  constructor(
    private respond: FakeResponder = (query) => ({ status: 'completed', text: `answer to ${query}`, iterationsUsed: 1 }),
    options: { id?: string; tools?: boolean } = {}
  ) {
    this.id = options.id ?? `fake-${++fakeIds}`;
    this.capabilities = { tools: options.tools ?? true };
  }

  async run(query: string, options: WorkerRunOptions = {}): Promise<WorkerResult> {
    this.queries.push(query);
    this.runOptions.push(options);
    return this.respond(query, options);
  }

  async cleanup(): Promise<void> {
    this.cleanups++;
    if (this.failCleanup) {
      throw new Error('cleanup exploded');
    }
  }
}

/**
 * Registry that hands every provider to `build`.
 */
export function fakeRegistry(build: WorkerConstructor): Record<ProviderId, WorkerConstructor> {
  return { openrouter: build, openai: build, anthropic: build, claude_code: build };
}

/**
 * Promise settled from outside, for holding async work open in tests.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Provider that replays scripted responses and records each request.
 */
export class ScriptedProvider implements LLMProvider {
  public readonly name = 'scripted';
  public readonly model = 'scripted-model';
  public readonly requests: CompletionRequest[] = [];

  constructor(private script: (request: CompletionRequest, call: number) => CompletionResponse | Promise<CompletionResponse>) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    // Snapshot: the caller keeps appending to its message list
    this.requests.push({ ...request, messages: [...request.messages] });
    return this.script(request, this.requests.length - 1);
  }

  isAvailable(): boolean {
    return true;
  }
}

export function reply(content: ContentBlock[], stopReason: CompletionResponse['stopReason'] = 'end_turn'): CompletionResponse {
  return { content, stopReason, usage: { inputTokens: 1, outputTokens: 1 }, model: 'scripted-model' };
}
