export {
  RecommendationPipeline,
  FALLBACK_REPORT,
  type RecommendationPipelineOptions,
  type PipelineResult,
  type RunOptions,
  type TopicSource,
  type FeedbackSource,
} from "./orchestrator.js";
export { createPipeline, type CreatePipelineOptions } from "./factory.js";
