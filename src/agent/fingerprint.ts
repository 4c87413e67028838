import { createHash } from 'crypto';
import type { AgentConfig } from '../config/config.js';

/** SHA-256 hex digest identifying workers that behave identically */
export type AgentFingerprint = string;

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * JSON with object keys sorted at every depth; `undefined` members are dropped.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item ?? null)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value)
      .filter(([, child]) => child !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, child]) => `${JSON.stringify(key)}:${canonicalJson(child)}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Digest of the behavior-affecting fields of `config`.
 *
 * The agent id is excluded so equivalent agents share pooled instances.
 * The credential enters only as its own digest.
 */
export function fingerprint(config: AgentConfig): AgentFingerprint {
  return sha256(
    canonicalJson({
      provider: config.provider,
      model: config.model,
      baseUrl: config.baseUrl,
      systemPrompt: config.systemPrompt,
      maxIterations: config.maxIterations,
      maxTurns: config.maxTurns,
      timeoutSeconds: config.timeoutSeconds,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      cliPath: config.cliPath,
      credential: config.apiKey === undefined ? undefined : sha256(config.apiKey),
    })
  );
}
