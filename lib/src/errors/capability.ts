/**
 * Timed capability calls returning a Result instead of throwing.
 */

import { type Capability, TransientProviderError } from './types.js';

export type CapabilityResult<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: TransientProviderError; durationMs: number };

export interface CapabilityCallOptions {
  capability: Capability;
  /** Upper bound for the call; the underlying request is not aborted */
  timeoutMs: number;
}

/**
 * Run `operation` with a timeout. Rejections and timeouts resolve to
 * `{ ok: false }`; a late settlement after a timeout is ignored.
 */
export function callCapability<T>(
  operation: () => Promise<T>,
  options: CapabilityCallOptions
): Promise<CapabilityResult<T>> {
  const startedAt = Date.now();
  const elapsed = (): number => Date.now() - startedAt;

  return new Promise<CapabilityResult<T>>((resolve) => {
    const timer = setTimeout(() => {
      resolve({
        ok: false,
        error: new TransientProviderError(
          `${options.capability} call timed out after ${options.timeoutMs}ms`,
          options.capability,
          { timedOut: true }
        ),
        durationMs: elapsed(),
      });
    }, options.timeoutMs);

    void Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve({ ok: true, value, durationMs: elapsed() });
        },
        (error: unknown) => {
          clearTimeout(timer);
          resolve({
            ok: false,
            error: TransientProviderError.fromCapabilityError(error, options.capability),
            durationMs: elapsed(),
          });
        }
      );
  });
}
