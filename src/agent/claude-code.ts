/**
 * ClaudeCodeWorker - runs one query through the Claude Code CLI in print mode.
 *
 * The CLI drives its own tool loop; this worker only starts the process,
 * reads its stream-json output line by line and maps the final `result`
 * message onto a WorkerResult. Aborting the signal terminates the process.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { AgentConfig } from '../config/config.js';
import { DEFAULT_CLI_PATH } from '../config/defaults.js';
import type { WorkerAgent, WorkerResult, WorkerRunOptions } from './types.js';

/** Keep at most this much stderr for error messages */
const MAX_STDERR = 4000;

const contentBlockSchema = z.object({ type: z.string(), text: z.string().optional() }).passthrough();

const streamMessageSchema = z
  .object({
    type: z.string(),
    subtype: z.string().optional(),
    message: z.object({ content: z.array(contentBlockSchema).default([]) }).passthrough().optional(),
    result: z.string().optional(),
    is_error: z.boolean().optional(),
    num_turns: z.number().optional(),
    total_cost_usd: z.number().optional(),
  })
  .passthrough();

type StreamMessage = z.infer<typeof streamMessageSchema>;

interface StreamState {
  texts: string[];
  turns: number;
  result?: StreamMessage;
}

type ProcessExit = { kind: 'exit'; code: number | null } | { kind: 'error'; error: NodeJS.ErrnoException };

export interface ClaudeCodeWorkerOptions {
  config: AgentConfig;
  logger: Logger;
  id?: string;
}

export class ClaudeCodeWorker implements WorkerAgent {
  public readonly id: string;
  public readonly capabilities = { tools: true };

  private config: AgentConfig;
  private cliPath: string;
  private logger: Logger;

  constructor(options: ClaudeCodeWorkerOptions) {
    this.id = options.id ?? `${options.config.agentId}-${nanoid(8)}`;
    this.config = options.config;
    this.cliPath = options.config.cliPath ?? DEFAULT_CLI_PATH;
    this.logger = options.logger.child({ module: 'claude-code', workerId: this.id });
  }

  /**
   * Command-line arguments for one query. Synthesis gets a single turn so the
   * CLI answers directly instead of using tools.
   */
  buildArgs(query: string, suppressCompletionSignal = false): string[] {
    return [
      '-p',
      query,
      '--output-format',
      'stream-json',
      '--verbose',
      '--model',
      this.config.model,
      '--system-prompt',
      this.config.systemPrompt,
      '--max-turns',
      String(suppressCompletionSignal ? 1 : this.config.maxTurns),
    ];
  }

  async run(query: string, options: WorkerRunOptions = {}): Promise<WorkerResult> {
    const { signal, onPartial } = options;
    signal?.throwIfAborted();

    const child = spawn(this.cliPath, this.buildArgs(query, options.suppressCompletionSignal), {
      env: { ...process.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once('error', (error) => resolve({ kind: 'error', error }));
      child.once('close', (code) => resolve({ kind: 'exit', code }));
    });

    let stderr = '';
    child.stderr.on('data', (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-MAX_STDERR);
    });

    const onAbort = () => child.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    const state: StreamState = { texts: [], turns: 0 };
    try {
      for await (const line of createInterface({ input: child.stdout, crlfDelay: Infinity })) {
        this.handleLine(line, state, onPartial);
      }
      const exit = await exited;
      signal?.throwIfAborted();
      return this.toResult(exit, state, stderr);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private handleLine(line: string, state: StreamState, onPartial: ((text: string) => void) | undefined): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      this.logger.debug({ line: trimmed.slice(0, 80) }, 'Skipping non-JSON output line');
      return;
    }
    const parsed = streamMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.debug({ line: trimmed.slice(0, 80) }, 'Skipping unrecognized stream message');
      return;
    }
    const message = parsed.data;

    switch (message.type) {
      case 'system':
        if (message.subtype === 'init') {
          this.logger.debug({ model: message.model, cwd: message.cwd }, 'CLI session started');
        }
        break;
      case 'assistant': {
        state.turns++;
        const text = (message.message?.content ?? [])
          .flatMap((block) => (block.type === 'text' && block.text?.trim() ? [block.text.trim()] : []))
          .join('\n');
        if (text) {
          state.texts.push(text);
          onPartial?.(state.texts.join('\n\n'));
        }
        break;
      }
      case 'result':
        state.result = message;
        if (message.total_cost_usd !== undefined) {
          this.logger.debug({ costUsd: message.total_cost_usd }, 'CLI run cost');
        }
        break;
    }
  }

  private toResult(exit: ProcessExit, state: StreamState, stderr: string): WorkerResult {
    if (exit.kind === 'error') {
      if (exit.error.code === 'ENOENT') {
        throw new Error(`Claude CLI not found at '${this.cliPath}'`, { cause: exit.error });
      }
      throw exit.error;
    }

    const { result } = state;
    const iterationsUsed = result?.num_turns ?? state.turns;
    const finalText = result?.subtype === 'success' ? result.result?.trim() : undefined;
    if (finalText && !state.texts.includes(finalText)) {
      state.texts.push(finalText);
    }
    const text = state.texts.join('\n\n');

    if (result?.subtype === 'success' && !result.is_error) {
      return { status: 'completed', text, iterationsUsed };
    }
    if (result?.subtype === 'error_max_turns') {
      this.logger.warn({ turns: iterationsUsed }, 'CLI reached its turn limit');
      return { status: 'incomplete', text, iterationsUsed };
    }
    if (result) {
      throw new Error(`Claude CLI reported ${result.subtype ?? 'an error'}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
    }
    if (exit.code !== 0) {
      throw new Error(`Claude CLI exited with code ${exit.code}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
    }
    return { status: 'completed', text, iterationsUsed };
  }
}
