import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { canonicalJson, fingerprint } from './fingerprint.js';
import { makeAgentConfig } from '../testing/helpers.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: undefined }, e: [3, { g: 1, f: 'x' }] })).toBe(
      '{"a":{"d":2},"b":1,"e":[3,{"f":"x","g":1}]}'
    );
  });
});

describe('fingerprint', () => {
  it('is a stable digest of the canonical behavior fields', () => {
    const config = makeAgentConfig({ apiKey: undefined });
    const expected = createHash('sha256')
      .update(
        '{"maxIterations":10,"maxTokens":4096,"maxTurns":10,"model":"gpt-4o",' +
          '"provider":"openai","systemPrompt":"You are a test worker.","timeoutSeconds":120}'
      )
      .digest('hex');

    expect(fingerprint(config)).toBe(expected);
  });

  it('includes only a digest of the credential', () => {
    const config = makeAgentConfig({ apiKey: 'test-key' });
    const keyDigest = createHash('sha256').update('test-key').digest('hex');
    const expected = createHash('sha256')
      .update(
        `{"credential":"${keyDigest}","maxIterations":10,"maxTokens":4096,"maxTurns":10,"model":"gpt-4o",` +
          '"provider":"openai","systemPrompt":"You are a test worker.","timeoutSeconds":120}'
      )
      .digest('hex');

    expect(fingerprint(config)).toBe(expected);
  });

  it('is identical for behaviorally equivalent configs regardless of agent id', () => {
    const a = makeAgentConfig({ agentId: 'agent_1' });
    const b = makeAgentConfig({ agentId: 'agent_7' });
    expect(fingerprint(a)).toBe(fingerprint(b));
    expect(fingerprint(a)).toBe(fingerprint({ ...a }));
  });

  it.each([
    ['model', { model: 'gpt-4o-mini' }],
    ['provider', { provider: 'anthropic' as const }],
    ['system prompt', { systemPrompt: 'Different.' }],
    ['iteration limit', { maxIterations: 11 }],
    ['turn limit', { maxTurns: 3 }],
    ['timeout', { timeoutSeconds: 60 }],
    ['token limit', { maxTokens: 1024 }],
    ['temperature', { temperature: 0.2 }],
    ['base url', { baseUrl: 'https://proxy.example.test/v1' }],
    ['credential', { apiKey: 'other-test-key' }],
  ])('changes when the %s changes', (_label, override) => {
    expect(fingerprint(makeAgentConfig(override))).not.toBe(fingerprint(makeAgentConfig()));
  });
});
