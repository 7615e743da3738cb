/**
 * Bounded generation calls.
 *
 * Wraps a single generate() call with a deadline and the caller's cancel
 * signal. Either one aborts the signal handed to the generator and rejects
 * immediately, whether or not the generator honours the signal.
 */

import {
  GenerationAbortedError,
  GenerationTimeoutError,
  type TextGenerator,
} from "./types.js";

export interface BoundedGenerateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export function generateWithTimeout(
  generator: TextGenerator,
  prompt: string,
  options: BoundedGenerateOptions
): Promise<string> {
  const { timeoutMs, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new GenerationAbortedError());
  }

  const controller = new AbortController();

  return new Promise<string>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    const fail = (err: Error): void => {
      cleanup();
      controller.abort(err);
      reject(err);
    };

    const timer = setTimeout(() => fail(new GenerationTimeoutError(timeoutMs)), timeoutMs);
    const onAbort = (): void => fail(new GenerationAbortedError());
    signal?.addEventListener("abort", onAbort, { once: true });

    void generator.generate(prompt, { signal: controller.signal }).then(
      (text) => {
        cleanup();
        resolve(text);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}
