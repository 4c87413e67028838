import Anthropic from '@anthropic-ai/sdk';
import type {
  LLMProvider,
  ProviderOptions,
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
  Message,
} from './types.js';
import { DEFAULT_MAX_RETRIES, executeWithRetry, isRetryableStatus } from './constants.js';
import { isRecord } from '../utils/guards.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;

type AnthropicBlockParam = Exclude<Anthropic.MessageParam['content'], string>[number];

export class AnthropicProvider implements LLMProvider {
  public readonly name = 'anthropic';
  public readonly model: string;

  private client: Anthropic;
  private apiKey: string;
  private maxRetries: number;

  constructor(options: ProviderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model || DEFAULT_MODEL;
    this.maxRetries = options.maxRetries || DEFAULT_MAX_RETRIES;

    this.client = new Anthropic({
      apiKey: this.apiKey,
      maxRetries: 0,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
      ...(options.timeout && { timeout: options.timeout }),
    });
  }

  isAvailable(): boolean {
    return !!this.apiKey && this.apiKey.length > 0;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens || DEFAULT_MAX_TOKENS,
      messages: this.formatMessages(request.messages),
      ...(request.system && { system: request.system }),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      ...(request.stopSequences && { stop_sequences: request.stopSequences }),
      ...(request.tools && request.tools.length > 0 && { tools: this.formatTools(request.tools) }),
    };

    const response = await executeWithRetry(
      () => this.client.messages.create(params, { signal: request.signal }),
      {
        maxRetries: this.maxRetries,
        shouldRetry: (error) => error instanceof Anthropic.APIError && isRetryableStatus(error.status),
        signal: request.signal,
      }
    );

    return this.formatResponse(response);
  }

  private formatMessages(messages: Message[]): Anthropic.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: typeof msg.content === 'string' ? msg.content : msg.content.map((block) => this.formatBlock(block)),
    }));
  }

  private formatBlock(block: ContentBlock): AnthropicBlockParam {
    switch (block.type) {
      case 'text':
        return { type: 'text', text: block.text };
      case 'tool_use':
        return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
      case 'tool_result':
        return {
          type: 'tool_result',
          tool_use_id: block.tool_use_id,
          content: block.content,
          ...(block.is_error !== undefined && { is_error: block.is_error }),
        };
    }
  }

  private formatTools(tools: NonNullable<CompletionRequest['tools']>): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.input_schema,
    }));
  }

  private formatResponse(response: Anthropic.Message): CompletionResponse {
    const content: ContentBlock[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        content.push({ type: 'text', text: block.text });
      } else if (block.type === 'tool_use') {
        content.push({
          type: 'tool_use',
          id: block.id,
          name: block.name,
          input: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return {
      content,
      stopReason: this.mapStopReason(response.stop_reason),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: response.model,
    };
  }

  private mapStopReason(reason: Anthropic.Message['stop_reason']): CompletionResponse['stopReason'] {
    switch (reason) {
      case 'tool_use':
        return 'tool_use';
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }
}
