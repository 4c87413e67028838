/**
 * LLM Provider Types
 * Standardized request/response shapes shared by every provider
 */

// Content block types for messages
export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ContentBlock = TextContent | ToolUseContent | ToolResultContent;

// Message types
export interface Message {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

// Tool definition
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

// Completion request
export interface CompletionRequest {
  messages: Message[];
  system?: string;
  tools?: ToolDefinition[];
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
  /** Aborts the in-flight HTTP request */
  signal?: AbortSignal;
}

// Token usage tracking
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

// Completion response
export interface CompletionResponse {
  content: ContentBlock[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';
  usage: TokenUsage;
  model: string;
}

// Provider interface
export interface LLMProvider {
  name: string;
  model: string;

  /**
   * Create a completion (non-streaming)
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if the provider is available (has valid API key, etc.)
   */
  isAvailable(): boolean;
}

// Provider configuration
export interface ProviderOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxRetries?: number;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}
