/**
 * Recommendation pipeline.
 *
 *   corpus ─► extract topics ─► assemble recommendations ─► format report
 *                                                          └► feedback note (optional)
 *
 * Each stage's outcome is recorded for the chain-of-thought narrative,
 * whether it succeeded or not. A failing stage is replaced by its empty
 * equivalent and the run continues. run() never rejects: anything
 * unexpected turns into the fallback report plus the narrative so far.
 */

import type { CorpusSource, ConceptReferenceEntry } from "../corpus/index.js";
import type { ExtractOptions } from "../extraction/index.js";
import { generateRunId, createSilentLogger, errorContext, type Logger } from "../logging/index.js";
import { assembleRecommendations, DEFAULT_TOP_N, type ReferenceScorer } from "../recommend/index.js";
import { buildNarrative, formatReport, type NarrativeStages } from "../report/index.js";
import { emptyTopic, type EnrichedTopic, type ExtractedTopic } from "../topics/index.js";

export const FALLBACK_REPORT = "No references found";

/** What the pipeline needs from a topic extractor. */
export interface TopicSource {
  extract(
    text: string,
    allowedCategories: readonly string[],
    options?: ExtractOptions
  ): Promise<ExtractedTopic[]>;
}

/** What the pipeline needs from a feedback composer. */
export interface FeedbackSource {
  compose(
    paperText: string,
    topics: readonly EnrichedTopic[],
    options?: { signal?: AbortSignal }
  ): Promise<string | null>;
}

export interface RecommendationPipelineOptions {
  corpus: CorpusSource;
  extractor: TopicSource;
  /** Shown in the narrative */
  modelName: string;
  /** References kept per topic (default: 2) */
  topN?: number;
  scorer?: ReferenceScorer;
  /** When set, a feedback note is composed after the report */
  feedback?: FeedbackSource;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PipelineResult {
  runId: string;
  report: string;
  narrative: string;
  topics: EnrichedTopic[];
  feedback: string | null;
  /** True when the fallback report was returned */
  degraded: boolean;
}

export class RecommendationPipeline {
  private readonly corpus: CorpusSource;
  private readonly extractor: TopicSource;
  private readonly modelName: string;
  private readonly topN: number;
  private readonly scorer: ReferenceScorer | undefined;
  private readonly feedback: FeedbackSource | undefined;
  private readonly logger: Logger;

  constructor(options: RecommendationPipelineOptions) {
    this.corpus = options.corpus;
    this.extractor = options.extractor;
    this.modelName = options.modelName;
    this.topN = options.topN ?? DEFAULT_TOP_N;
    this.scorer = options.scorer;
    this.feedback = options.feedback;
    this.logger = (options.logger ?? createSilentLogger()).child({ scope: "pipeline" });
  }

  async run(text: string, options: RunOptions = {}): Promise<PipelineResult> {
    const runId = generateRunId();
    const logger = this.logger.child({ runId });
    const stages: NarrativeStages = { paperText: text, modelName: this.modelName };

    try {
      logger.info("Run started", { chars: text.length });

      const categories = this.corpus.loadCategories();
      const map = this.corpus.loadConceptReferenceMap();
      if (categories.length === 0 && map.length === 0) {
        logger.error("Corpus unavailable, returning fallback report");
        return this.fallback(runId, stages);
      }

      const topics = await this.extractTopics(text, categories, stages, logger, options);
      const enriched = this.assemble(topics, map, stages, logger);
      const report = formatReport(enriched);

      const feedback = this.feedback
        ? await this.feedback.compose(text, enriched, { signal: options.signal })
        : null;

      logger.info("Run finished", {
        topics: enriched.length,
        references: enriched.reduce(
          (sum, topic) => sum + (topic.recommended_references?.length ?? 0),
          0
        ),
      });

      return {
        runId,
        report,
        narrative: buildNarrative(stages),
        topics: enriched,
        feedback,
        degraded: false,
      };
    } catch (err) {
      logger.error("Run failed, returning fallback report", errorContext(err));
      return this.fallback(runId, stages);
    }
  }

  private async extractTopics(
    text: string,
    categories: readonly string[],
    stages: NarrativeStages,
    logger: Logger,
    options: RunOptions
  ): Promise<ExtractedTopic[]> {
    try {
      const topics = await this.extractor.extract(text, categories, { signal: options.signal });
      stages.topics = { ok: true, value: topics };
      return topics;
    } catch (err) {
      logger.warn("Topic extraction failed", errorContext(err));
      stages.topics = { ok: false, error: err };
      return [emptyTopic()];
    }
  }

  private assemble(
    topics: readonly ExtractedTopic[],
    map: readonly ConceptReferenceEntry[],
    stages: NarrativeStages,
    logger: Logger
  ): EnrichedTopic[] {
    try {
      const enriched = assembleRecommendations(topics, map, {
        topN: this.topN,
        scorer: this.scorer,
        logger,
      });
      stages.references = { ok: true, value: enriched };
      return enriched;
    } catch (err) {
      logger.warn("Recommendation assembly failed", errorContext(err));
      stages.references = { ok: false, error: err };
      return topics.map((topic) => ({
        ...topic,
        related_categories: [...topic.related_categories],
      }));
    }
  }

  private fallback(runId: string, stages: NarrativeStages): PipelineResult {
    return {
      runId,
      report: FALLBACK_REPORT,
      narrative: buildNarrative(stages),
      topics: [],
      feedback: null,
      degraded: true,
    };
  }
}
