/**
 * LLMWorkerAgent - iteration loop around one provider.
 *
 * The only tool is `mark_task_complete`; calling it ends the run. A reply with
 * no tool calls also ends it. Every other tool name gets an error result so
 * the model can recover.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { AgentConfig } from '../config/config.js';
import type { ContentBlock, LLMProvider, Message, ToolDefinition, ToolUseContent } from '../providers/types.js';
import type { CompletionMarker, WorkerAgent, WorkerResult, WorkerRunOptions } from './types.js';

export const COMPLETION_TOOL_NAME = 'mark_task_complete';

export const COMPLETION_TOOL: ToolDefinition = {
  name: COMPLETION_TOOL_NAME,
  description:
    'Call this when the request is fully answered. Provide a short summary of what was done and the final message for the user.',
  input_schema: {
    type: 'object',
    properties: {
      task_summary: { type: 'string', description: 'Brief summary of what was accomplished' },
      completion_message: { type: 'string', description: 'Final message for the user' },
    },
    required: ['task_summary', 'completion_message'],
  },
};

export interface LLMWorkerAgentOptions {
  config: AgentConfig;
  provider: LLMProvider;
  logger: Logger;
  id?: string;
}

function toMarker(input: Record<string, unknown>): CompletionMarker {
  return {
    summary: typeof input.task_summary === 'string' ? input.task_summary : '',
    finalMessage: typeof input.completion_message === 'string' ? input.completion_message : '',
  };
}

export class LLMWorkerAgent implements WorkerAgent {
  public readonly id: string;
  public readonly capabilities = { tools: true };

  private config: AgentConfig;
  private provider: LLMProvider;
  private logger: Logger;

  constructor(options: LLMWorkerAgentOptions) {
    this.id = options.id ?? `${options.config.agentId}-${nanoid(8)}`;
    this.config = options.config;
    this.provider = options.provider;
    this.logger = options.logger.child({ module: 'worker', workerId: this.id });
  }

  async run(query: string, options: WorkerRunOptions = {}): Promise<WorkerResult> {
    const { signal, suppressCompletionSignal = false, onPartial } = options;
    const messages: Message[] = [{ role: 'user', content: query }];
    const texts: string[] = [];
    const collected = () => texts.join('\n\n');
    let toolRounds = 0;
    let iteration = 0;

    while (iteration < this.config.maxIterations) {
      signal?.throwIfAborted();
      iteration++;

      const response = await this.provider.complete({
        messages,
        system: this.config.systemPrompt,
        maxTokens: this.config.maxTokens,
        ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
        ...(!suppressCompletionSignal && { tools: [COMPLETION_TOOL] }),
        ...(signal && { signal }),
      });

      this.logger.debug(
        { iteration, stopReason: response.stopReason, usage: response.usage },
        'Iteration finished'
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' && block.text.trim() ? [block.text.trim()] : []))
        .join('\n');
      if (text) {
        texts.push(text);
        onPartial?.(collected());
      }

      const toolUses = response.content.filter((block): block is ToolUseContent => block.type === 'tool_use');
      if (toolUses.length === 0) {
        return { status: 'completed', text: collected(), iterationsUsed: iteration };
      }

      let marker: CompletionMarker | undefined;
      const results: ContentBlock[] = [];
      for (const use of toolUses) {
        if (use.name === COMPLETION_TOOL_NAME && !suppressCompletionSignal) {
          marker = toMarker(use.input);
          results.push({ type: 'tool_result', tool_use_id: use.id, content: 'Task marked complete.' });
        } else {
          results.push({ type: 'tool_result', tool_use_id: use.id, content: `Unknown tool: ${use.name}`, is_error: true });
        }
      }

      if (marker) {
        return {
          status: 'completed',
          text: collected() || marker.finalMessage,
          completionMarker: marker,
          iterationsUsed: iteration,
        };
      }

      toolRounds++;
      if (toolRounds >= this.config.maxTurns) {
        this.logger.warn({ toolRounds }, 'Tool round limit reached');
        break;
      }
      messages.push({ role: 'assistant', content: response.content });
      messages.push({ role: 'user', content: results });
    }

    this.logger.warn({ iterations: iteration }, 'Worker stopped before signalling completion');
    return { status: 'incomplete', text: collected(), iterationsUsed: iteration };
  }
}
