import { PlatformError } from './types.js';
import type { PlatformErrorKind } from './types.js';

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? '');
}

/**
 * Classify an error thrown across the platform port. Adapters throw
 * `PlatformError`; anything else is classified from its message text.
 */
export function classifyPlatformError(err: unknown): PlatformErrorKind {
  if (err instanceof PlatformError) return err.kind;

  const msg = errorMessage(err).toLowerCase();
  if (!msg) return 'other';
  if (msg.includes('missing permissions') || msg.includes('missing access')) return 'forbidden';
  if (msg.includes('unknown channel') || msg.includes('unknown thread')) return 'not_found';
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('socket hang up') || msg.includes('fetch failed')) {
    return 'transport';
  }
  return 'other';
}
