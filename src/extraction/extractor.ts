/**
 * Topic extractor.
 *
 * Asks the text generator for the topics of a term paper and keeps asking,
 * up to a fixed number of attempts, until the answer parses and passes
 * validateTopicStructure(). Every kind of failure (transport error,
 * timeout, unparseable text, wrong shape) costs one attempt.
 *
 * When the attempts run out, extraction degrades to a single empty
 * placeholder topic rather than failing, so later stages always have
 * something to iterate over.
 */

import type { CategoryPolicy } from "../config/index.js";
import { generateWithTimeout, GenerationAbortedError, type TextGenerator } from "../llm/index.js";
import { createSilentLogger, errorContext, type Logger } from "../logging/index.js";
import { buildExtractionContext, renderPrompt, type ParsedTemplate } from "../prompts/index.js";
import {
  describeTopicIssues,
  emptyTopic,
  restrictToVocabulary,
  validateTopicStructure,
  type ExtractedTopic,
} from "../topics/index.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_TIMEOUT_MS = 60_000;

/** Logged issues per rejected attempt are capped at this many. */
const MAX_LOGGED_ISSUES = 5;

export class TopicParseError extends Error {
  constructor(
    public readonly raw: string,
    message: string
  ) {
    super(message);
    this.name = "TopicParseError";
  }
}

export interface TopicExtractorOptions {
  generator: TextGenerator;
  /** Parsed topic-extraction template */
  template: ParsedTemplate;
  logger?: Logger;
  /** Total attempts, including the first (default: 3) */
  maxRetries?: number;
  /** Deadline per attempt (default: 60 000 ms) */
  timeoutMs?: number;
  /** "restrict" drops categories outside the vocabulary (default: "permissive") */
  categoryPolicy?: CategoryPolicy;
}

export interface ExtractOptions {
  /** Abandons the retry loop; the placeholder is returned */
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const FENCED_BLOCK_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * The contents of the first Markdown code block, or the whole text when
 * there is none. Prose around the block is dropped.
 */
export function stripCodeFences(raw: string): string {
  const block = FENCED_BLOCK_RE.exec(raw)?.[1];
  return (block ?? raw).trim();
}

/**
 * Turn raw model output into an untyped payload.
 *
 * Accepts a bare JSON array, or an object carrying the array under
 * "topics" (what JSON-mode endpoints tend to produce).
 *
 * @throws TopicParseError if the text is not JSON
 */
export function parseTopicPayload(raw: string): unknown {
  const text = stripCodeFences(raw);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TopicParseError(raw, `Model output is not JSON: ${reason}`);
  }

  if (isRecord(data) && Array.isArray(data["topics"])) {
    return data["topics"];
  }
  return data;
}

export class TopicExtractor {
  private readonly generator: TextGenerator;
  private readonly template: ParsedTemplate;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly categoryPolicy: CategoryPolicy;

  constructor(options: TopicExtractorOptions) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got: ${maxRetries}`);
    }

    this.generator = options.generator;
    this.template = options.template;
    this.logger = (options.logger ?? createSilentLogger()).child({ scope: "extractor" });
    this.maxRetries = maxRetries;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.categoryPolicy = options.categoryPolicy ?? "permissive";
  }

  /**
   * Extract topics from a term paper.
   *
   * Never rejects: returns [emptyTopic()] when every attempt failed, the
   * prompt could not be rendered, or the caller cancelled.
   */
  async extract(
    text: string,
    allowedCategories: readonly string[],
    options: ExtractOptions = {}
  ): Promise<ExtractedTopic[]> {
    let prompt: string;
    try {
      prompt = renderPrompt(this.template, buildExtractionContext(text, allowedCategories));
    } catch (err) {
      this.logger.error("Cannot render extraction prompt", errorContext(err));
      return [emptyTopic()];
    }

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (options.signal?.aborted) {
        this.logger.warn("Extraction cancelled", { attempt });
        break;
      }

      try {
        const raw = await generateWithTimeout(this.generator, prompt, {
          timeoutMs: this.timeoutMs,
          signal: options.signal,
        });
        const payload = parseTopicPayload(raw);

        if (validateTopicStructure(payload)) {
          const topics = this.finish(payload, allowedCategories);
          this.logger.info("Topics extracted", { attempt, count: topics.length });
          return topics;
        }

        this.logger.warn("Model output rejected", {
          attempt,
          issues: describeTopicIssues(payload).slice(0, MAX_LOGGED_ISSUES),
        });
      } catch (err) {
        if (err instanceof GenerationAbortedError) {
          this.logger.warn("Extraction cancelled", { attempt });
          break;
        }
        this.logger.warn("Extraction attempt failed", { attempt, ...errorContext(err) });
      }
    }

    this.logger.error("Extraction gave up, using placeholder topic", {
      maxRetries: this.maxRetries,
    });
    return [emptyTopic()];
  }

  /**
   * Copy validated topics into clean records and apply the category policy.
   * An empty list becomes the placeholder.
   */
  private finish(
    topics: readonly ExtractedTopic[],
    allowedCategories: readonly string[]
  ): ExtractedTopic[] {
    if (topics.length === 0) {
      return [emptyTopic()];
    }

    const copies = topics.map((topic) => ({
      topic: topic.topic,
      explanation: topic.explanation,
      related_categories: [...topic.related_categories],
    }));

    return this.categoryPolicy === "restrict"
      ? restrictToVocabulary(copies, allowedCategories)
      : copies;
  }
}
