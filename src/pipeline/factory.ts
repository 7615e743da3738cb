/**
 * Pipeline assembly from configuration.
 *
 * Wires the file-backed corpus, the prompt templates and a text generator
 * into a RecommendationPipeline. The generator is passed in so callers
 * choose the transport (OpenAI in the CLI, a fake in tests).
 */

import { isCategoryPolicy, type AppConfig } from "../config/index.js";
import { CorpusStore } from "../corpus/index.js";
import { TopicExtractor } from "../extraction/index.js";
import { FeedbackComposer } from "../feedback/index.js";
import type { TextGenerator } from "../llm/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  PromptTemplateLoader,
  TOPIC_EXTRACTION_TEMPLATE,
  FEEDBACK_TEMPLATE,
} from "../prompts/index.js";
import { RecommendationPipeline } from "./orchestrator.js";

export interface CreatePipelineOptions {
  generator: TextGenerator;
  logger?: Logger;
  /** Compose a feedback note after the report */
  withFeedback?: boolean;
}

/**
 * @throws TemplateLoadError  if the prompts directory or a template is missing
 * @throws TemplateParseError if a template uses an unknown variable
 */
export function createPipeline(
  config: AppConfig,
  options: CreatePipelineOptions
): RecommendationPipeline {
  const logger = options.logger ?? createSilentLogger();
  const templates = new PromptTemplateLoader(config.promptsDir);
  const policy = config.extraction.categoryPolicy;

  const extractor = new TopicExtractor({
    generator: options.generator,
    template: templates.load(TOPIC_EXTRACTION_TEMPLATE),
    logger,
    maxRetries: config.extraction.maxRetries,
    timeoutMs: config.llm.timeoutMs,
    categoryPolicy: isCategoryPolicy(policy) ? policy : "permissive",
  });

  const feedback = options.withFeedback
    ? new FeedbackComposer({
        generator: options.generator,
        template: templates.load(FEEDBACK_TEMPLATE),
        language: config.feedbackLanguage,
        timeoutMs: config.llm.timeoutMs,
        logger,
      })
    : undefined;

  return new RecommendationPipeline({
    corpus: new CorpusStore({
      categoriesPath: config.corpus.categoriesPath,
      referencesPath: config.corpus.referencesPath,
      logger,
    }),
    extractor,
    modelName: config.llm.model,
    topN: config.recommendation.topN,
    feedback,
    logger,
  });
}
