/**
 * Text generation: the contract, a bounded call helper, and the
 * OpenAI-compatible implementation.
 */

export {
  GenerationTimeoutError,
  GenerationAbortedError,
  EmptyCompletionError,
  type GenerateOptions,
  type TextGenerator,
} from "./types.js";
export { generateWithTimeout, type BoundedGenerateOptions } from "./timeout.js";
export {
  OpenAITextGenerator,
  type ChatCompletionClient,
  type ChatCompletionReply,
  type ChatCompletionRequest,
  type ChatRequestOptions,
  type OpenAIGeneratorOptions,
} from "./openai.js";
