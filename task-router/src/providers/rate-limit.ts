import type { RateLimitStrategy } from '../config/schema.js';
import type { ProviderError } from './types.js';

export const DEFAULT_RATE_LIMIT_PATTERNS = [
  'rate limit',
  'too many requests',
  'quota exceeded',
  '429',
  'overloaded',
];

// 529 is Anthropic's "overloaded" status
const PROVIDER_STATUS_CODES = new Set([408, 429, 503, 529]);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

// The local tool could not be started
const SPAWN_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EMFILE', 'EAGAIN']);

/**
 * Case-insensitive substring match against the error message and any
 * captured output.
 */
export function matchesRateLimitPattern(
  text: string,
  patterns: readonly string[] = DEFAULT_RATE_LIMIT_PATTERNS
): boolean {
  const haystack = text.toLowerCase();
  return patterns.some((pattern) => haystack.includes(pattern.toLowerCase()));
}

function isProviderStatus(statusCode: number): boolean {
  return PROVIDER_STATUS_CODES.has(statusCode) || statusCode >= 500;
}

function isUnreachable(error: ProviderError): boolean {
  return error.timedOut || (error.code !== undefined && CONNECTION_ERROR_CODES.has(error.code));
}

/**
 * Classify a failed run.
 *
 * - `status_code`: HTTP 408/429/503/529 and any 5xx, connection errors and timeouts
 * - `text_pattern`: the message or captured output contains a known pattern,
 *   or the tool timed out, could not be reached or could not be started
 * - `none`: never a provider failure
 */
export function detectRateLimit(
  strategy: RateLimitStrategy,
  error: ProviderError,
  patterns: readonly string[] = DEFAULT_RATE_LIMIT_PATTERNS
): boolean {
  switch (strategy) {
    case 'status_code':
      if (error.timedOut) return true;
      if (error.statusCode !== undefined) return isProviderStatus(error.statusCode);
      return isUnreachable(error);

    case 'text_pattern':
      if (isUnreachable(error)) return true;
      if (error.code !== undefined && SPAWN_ERROR_CODES.has(error.code)) return true;
      return matchesRateLimitPattern(`${error.message}\n${error.output ?? ''}`, patterns);

    case 'none':
      return false;
  }
}
