import OpenAI from 'openai';
import type {
  LLMProvider,
  ProviderOptions,
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
} from './types.js';
import { DEFAULT_MAX_RETRIES, executeWithRetry, isRetryableStatus } from './constants.js';
import { isRecord } from '../utils/guards.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_MAX_TOKENS = 4096;

export interface OpenAIProviderOptions extends ProviderOptions {
  /** Reported provider name; OpenAI-compatible gateways such as OpenRouter reuse this client */
  name?: string;
  defaultHeaders?: Record<string, string>;
}

/**
 * Chat Completions provider for OpenAI and OpenAI-compatible endpoints.
 */
export class OpenAIProvider implements LLMProvider {
  public readonly name: string;
  public readonly model: string;

  private client: OpenAI;
  private apiKey: string;
  private maxRetries: number;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai';
    this.apiKey = options.apiKey;
    this.model = options.model || DEFAULT_MODEL;
    this.maxRetries = options.maxRetries || DEFAULT_MAX_RETRIES;

    this.client = new OpenAI({
      apiKey: this.apiKey,
      // Retries are handled here so they stop once the caller aborts
      maxRetries: 0,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
      ...(options.timeout && { timeout: options.timeout }),
      ...(options.defaultHeaders && { defaultHeaders: options.defaultHeaders }),
    });
  }

  isAvailable(): boolean {
    return !!this.apiKey && this.apiKey.length > 0;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: this.formatMessages(request),
      max_tokens: request.maxTokens || DEFAULT_MAX_TOKENS,
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      ...(request.stopSequences && { stop: request.stopSequences }),
      ...(request.tools && request.tools.length > 0 && { tools: this.formatTools(request.tools) }),
    };

    const response = await executeWithRetry(
      () => this.client.chat.completions.create(params, { signal: request.signal }),
      {
        maxRetries: this.maxRetries,
        shouldRetry: (error) => error instanceof OpenAI.APIError && isRetryableStatus(error.status),
        signal: request.signal,
      }
    );

    return this.formatResponse(response);
  }

  private formatMessages(request: CompletionRequest): OpenAI.ChatCompletionMessageParam[] {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];

    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }

    for (const msg of request.messages) {
      if (typeof msg.content === 'string') {
        messages.push(
          msg.role === 'assistant' ? { role: 'assistant', content: msg.content } : { role: 'user', content: msg.content }
        );
        continue;
      }

      const toolResults = msg.content.filter((c) => c.type === 'tool_result');
      if (toolResults.length > 0 && msg.role === 'user') {
        for (const result of toolResults) {
          if (result.type === 'tool_result') {
            messages.push({ role: 'tool', tool_call_id: result.tool_use_id, content: result.content });
          }
        }
        continue;
      }

      const textContent = msg.content
        .flatMap((c) => (c.type === 'text' ? [c.text] : []))
        .join('\n');

      const toolCalls = msg.content.flatMap((c) =>
        c.type === 'tool_use'
          ? [
              {
                id: c.id,
                type: 'function' as const,
                function: { name: c.name, arguments: JSON.stringify(c.input) },
              },
            ]
          : []
      );

      if (msg.role === 'assistant') {
        messages.push({
          role: 'assistant',
          content: textContent || null,
          ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
        });
      } else {
        messages.push({ role: 'user', content: textContent });
      }
    }

    return messages;
  }

  private formatTools(tools: NonNullable<CompletionRequest['tools']>): OpenAI.ChatCompletionTool[] {
    return tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.input_schema,
      },
    }));
  }

  private formatResponse(response: OpenAI.ChatCompletion): CompletionResponse {
    const choice = response.choices[0];
    const content: ContentBlock[] = [];

    if (!choice) {
      return {
        content,
        stopReason: 'end_turn',
        usage: { inputTokens: response.usage?.prompt_tokens || 0, outputTokens: response.usage?.completion_tokens || 0 },
        model: response.model,
      };
    }

    if (choice.message.content) {
      content.push({ type: 'text', text: choice.message.content });
    }

    for (const toolCall of choice.message.tool_calls ?? []) {
      if ('function' in toolCall && toolCall.function) {
        let parsedInput: Record<string, unknown> = {};
        try {
          const parsed: unknown = JSON.parse(toolCall.function.arguments);
          if (isRecord(parsed)) parsedInput = parsed;
        } catch {
          // API returned malformed/truncated JSON - use empty input
        }
        content.push({
          type: 'tool_use',
          id: toolCall.id,
          name: toolCall.function.name,
          input: parsedInput,
        });
      }
    }

    return {
      content,
      stopReason: this.mapStopReason(choice.finish_reason),
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
      },
      model: response.model,
    };
  }

  private mapStopReason(reason: OpenAI.ChatCompletion.Choice['finish_reason']): CompletionResponse['stopReason'] {
    switch (reason) {
      case 'stop':
        return 'end_turn';
      case 'tool_calls':
        return 'tool_use';
      case 'length':
        return 'max_tokens';
      default:
        return 'end_turn';
    }
  }
}
