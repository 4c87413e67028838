import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createProvider } from './index.js';
import { ManifoldError } from '../errors.js';
import { makeAgentConfig } from '../testing/helpers.js';

const { openAIOptions, anthropicOptions } = vi.hoisted(() => ({
  openAIOptions: vi.fn(),
  anthropicOptions: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: vi.fn() } };
    constructor(options: unknown) {
      openAIOptions(options);
    }
  },
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: vi.fn() };
    constructor(options: unknown) {
      anthropicOptions(options);
    }
  },
}));

describe('createProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('points OpenRouter at its Chat Completions endpoint', () => {
    const provider = createProvider(makeAgentConfig({ provider: 'openrouter', model: 'anthropic/claude-3.5-sonnet' }));

    expect(provider.name).toBe('openrouter');
    expect(provider.model).toBe('anthropic/claude-3.5-sonnet');
    expect(openAIOptions).toHaveBeenCalledWith({
      apiKey: 'test-key',
      maxRetries: 0,
      baseURL: 'https://openrouter.ai/api/v1',
      timeout: 120_000,
    });
  });

  it('honours a configured base URL', () => {
    createProvider(makeAgentConfig({ provider: 'openai', baseUrl: 'https://proxy.example.test/v1', timeoutSeconds: 30 }));
    expect(openAIOptions).toHaveBeenCalledWith({
      apiKey: 'test-key',
      maxRetries: 0,
      baseURL: 'https://proxy.example.test/v1',
      timeout: 30_000,
    });
  });

  it('builds an Anthropic client for anthropic', () => {
    const provider = createProvider(makeAgentConfig({ provider: 'anthropic', model: 'claude-sonnet-4-20250514' }));

    expect(provider.name).toBe('anthropic');
    expect(anthropicOptions).toHaveBeenCalledWith({ apiKey: 'test-key', maxRetries: 0, timeout: 120_000 });
    expect(openAIOptions).not.toHaveBeenCalled();
  });

  it('refuses the CLI-backed provider', () => {
    expect(() => createProvider(makeAgentConfig({ provider: 'claude_code' }))).toThrow(
      new ManifoldError("Provider 'claude_code' runs through its CLI and has no HTTP client")
    );
  });
});
