import { describe, it, expect } from 'vitest';
import { AgentFactory } from './factory.js';
import { ClaudeCodeWorker } from './claude-code.js';
import { LLMWorkerAgent } from './worker.js';
import { ConfigError, ManifoldError, PoolConstructionError } from '../errors.js';
import { FakeWorker, makeAgentConfig, makeConfiguration, silentLogger } from '../testing/helpers.js';

describe('AgentFactory', () => {
  it('rejects registry keys that are not provider ids', () => {
    const build = () => new FakeWorker();
    expect(() => new AgentFactory({ logger: silentLogger, registry: { openai: build, groq: build } })).toThrow(
      new ManifoldError("Worker registry names unknown provider 'groq' (expected one of openrouter, openai, anthropic, claude_code)")
    );
  });

  it('builds LLM workers with the default registry', async () => {
    const factory = new AgentFactory({ logger: silentLogger });
    const agent = await factory.create(makeAgentConfig({ agentId: 'agent_3' }));

    expect(agent).toBeInstanceOf(LLMWorkerAgent);
    expect(agent.id.startsWith('agent_3-')).toBe(true);
    expect(agent.capabilities.tools).toBe(true);
  });

  it('builds CLI workers for claude_code without starting the CLI', async () => {
    const factory = new AgentFactory({ logger: silentLogger });
    const agent = await factory.create(makeAgentConfig({ agentId: 'agent_2', provider: 'claude_code', apiKey: undefined }));

    expect(agent).toBeInstanceOf(ClaudeCodeWorker);
    expect(agent.id.startsWith('agent_2-')).toBe(true);
  });

  it('passes the resolved config to the constructor', async () => {
    const seen: string[] = [];
    const factory = new AgentFactory({
      logger: silentLogger,
      registry: {
        openai: (config) => {
          seen.push(`${config.agentId}:${config.model}`);
          return new FakeWorker();
        },
      },
    });

    await factory.create(makeAgentConfig({ model: 'gpt-4o-mini' }));

    expect(seen).toEqual(['agent_1:gpt-4o-mini']);
  });

  it('wraps construction failures', async () => {
    const factory = new AgentFactory({
      logger: silentLogger,
      registry: {
        openai: () => {
          throw new Error('boom');
        },
      },
    });

    const failure = factory.create(makeAgentConfig());
    await expect(failure).rejects.toBeInstanceOf(PoolConstructionError);
    await expect(failure).rejects.toThrow('Failed to construct openai worker for agent_1: boom');
  });

  it('wraps a missing constructor', async () => {
    const factory = new AgentFactory({ logger: silentLogger, registry: { openai: () => new FakeWorker() } });
    await expect(factory.create(makeAgentConfig({ provider: 'anthropic' }))).rejects.toThrow(
      "Failed to construct anthropic worker for agent_1: No worker constructor registered for provider 'anthropic'"
    );
  });

  describe('assertSupports', () => {
    const configuration = makeConfiguration({
      provider: 'openai',
      openai: { api_key: 'test-key' },
      anthropic: { api_key: 'test-key' },
      agents: { agent_2: { provider: 'anthropic' } },
      orchestrator: { provider: 'anthropic' },
    });

    it('accepts a configuration whose providers are all registered', () => {
      expect(() => new AgentFactory({ logger: silentLogger }).assertSupports(configuration)).not.toThrow();
    });

    it('lists every unsupported provider reference', () => {
      const factory = new AgentFactory({ logger: silentLogger, registry: { openai: () => new FakeWorker() } });

      let caught: unknown;
      try {
        factory.assertSupports(configuration);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.violations.map((v) => v.path)).toEqual(['orchestrator.provider', 'agents.agent_2.provider']);
      }
    });
  });
});
