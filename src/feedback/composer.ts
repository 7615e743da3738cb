/**
 * Feedback note.
 *
 * After recommendation, the model can be asked for a short reply to the
 * student that cites the matched references. This is a single best-effort
 * call: any failure is logged and yields null.
 */

import { generateWithTimeout, type TextGenerator } from "../llm/index.js";
import { createSilentLogger, errorContext, type Logger } from "../logging/index.js";
import { buildFeedbackContext, renderPrompt, type ParsedTemplate } from "../prompts/index.js";
import type { EnrichedTopic } from "../topics/index.js";

export interface FeedbackComposerOptions {
  generator: TextGenerator;
  /** Parsed feedback template */
  template: ParsedTemplate;
  /** Reply language (default: "English") */
  language?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ComposeOptions {
  signal?: AbortSignal;
}

export class FeedbackComposer {
  private readonly generator: TextGenerator;
  private readonly template: ParsedTemplate;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: FeedbackComposerOptions) {
    this.generator = options.generator;
    this.template = options.template;
    this.language = options.language ?? "English";
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.logger = (options.logger ?? createSilentLogger()).child({ scope: "feedback" });
  }

  /**
   * Compose the note, or return null when there is nothing to cite or the
   * call fails.
   */
  async compose(
    paperText: string,
    topics: readonly EnrichedTopic[],
    options: ComposeOptions = {}
  ): Promise<string | null> {
    const hasReferences = topics.some(
      (topic) => (topic.recommended_references ?? []).length > 0
    );
    if (!hasReferences) {
      this.logger.info("No references to cite, skipping feedback note");
      return null;
    }

    try {
      const prompt = renderPrompt(
        this.template,
        buildFeedbackContext(paperText, topics, this.language)
      );
      const note = await generateWithTimeout(this.generator, prompt, {
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      });
      const trimmed = note.trim();
      return trimmed === "" ? null : trimmed;
    } catch (err) {
      this.logger.warn("Feedback note failed", errorContext(err));
      return null;
    }
  }
}
