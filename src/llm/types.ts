/**
 * Text generation contract.
 *
 * The pipeline only ever sends one prompt and reads back one string. The
 * output is treated as untrusted: callers parse and validate it.
 */

export interface GenerateOptions {
  /** Aborted when the attempt times out or the caller cancels */
  signal?: AbortSignal;
}

export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export class GenerationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Text generation timed out after ${timeoutMs} ms`);
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationAbortedError extends Error {
  constructor() {
    super("Text generation was cancelled");
    this.name = "GenerationAbortedError";
  }
}

export class EmptyCompletionError extends Error {
  constructor(public readonly model: string) {
    super(`Model ${model} returned an empty completion`);
    this.name = "EmptyCompletionError";
  }
}
