/**
 * OpenAI-compatible text generator.
 *
 * Works against api.openai.com or any server speaking the chat
 * completions protocol (set baseUrl). SDK-level retries are disabled:
 * the extractor owns the retry budget.
 */

import OpenAI from "openai";
import { EmptyCompletionError, type GenerateOptions, type TextGenerator } from "./types.js";

export type ChatCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export interface ChatRequestOptions {
  signal?: AbortSignal;
  maxRetries?: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the SDK client this generator calls. An OpenAI instance fits. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options: ChatRequestOptions): Promise<ChatCompletionReply>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  /** Sampling temperature (default: 0) */
  temperature?: number;
  /** System message sent with every prompt */
  system?: string;
  /** Used instead of building a client from apiKey and baseUrl */
  client?: ChatCompletionClient;
}

const DEFAULT_SYSTEM =
  "You are a careful assistant for students writing term papers. Follow the output format exactly.";

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: ChatCompletionClient;
  readonly model: string;
  private readonly temperature: number;
  private readonly system: string;

  constructor(options: OpenAIGeneratorOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
      });
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.system = options.system ?? DEFAULT_SYSTEM;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: this.system },
          { role: "user", content: prompt },
        ],
        temperature: this.temperature,
      },
      { signal: options.signal, maxRetries: 0 }
    );

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined || content.trim() === "") {
      throw new EmptyCompletionError(this.model);
    }
    return content;
  }
}
