import type { SendResult } from './index.js';

/** Provider error code (`messaging/unavailable`, 21211, ...) when one is attached. */
export function errorCode(err: unknown): string | number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    if (typeof code === 'string' || typeof code === 'number') return code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Result for a send whose caller aborted before the provider was called. */
export function abortedResult(): SendResult {
  return { status: 'transient_error', error: 'Send aborted' };
}
