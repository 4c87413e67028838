export const REDACTED = '[REDACTED]';

// Matched against the last word of a key, or its last two words joined
const SENSITIVE_WORDS = new Set(['token', 'secret', 'password', 'passwd', 'authorization', 'credential', 'credentials']);
const SENSITIVE_PAIRS = new Set(['apikey', 'privatekey']);

/** `maxTokens`, `max_tokens` and `MAX-TOKENS` all become `['max', 'tokens']` */
function keyWords(key: string): string[] {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[_\-\s.]+/)
    .filter(Boolean);
}

export function isSensitiveKey(key: string): boolean {
  const words = keyWords(key);
  const last = words[words.length - 1];
  if (last === undefined) {
    return false;
  }
  return SENSITIVE_WORDS.has(last) || SENSITIVE_PAIRS.has(words.slice(-2).join(''));
}

/**
 * Deep copy of `value` with every property under a sensitive key replaced by {@link REDACTED}.
 */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }
  if (value !== null && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      copy[key] = isSensitiveKey(key) && child !== undefined && child !== '' ? REDACTED : redactSecrets(child);
    }
    return copy;
  }
  return value;
}
