/**
 * Topic module.
 *
 * Topics flow through the system as follows:
 *
 * 1. EXTRACTION: the model returns a JSON payload which is checked with
 *    validateTopicStructure(). Invalid payloads are retried by the
 *    extractor; they never reach the rest of the pipeline.
 *
 * 2. VOCABULARY (optional): restrictToVocabulary() drops categories the
 *    model invented. Off by default.
 *
 * 3. ENRICHMENT: the recommender copies each topic into an EnrichedTopic
 *    carrying its top references.
 */

export {
  ExtractedTopicSchema,
  ExtractedTopicListSchema,
  emptyTopic,
  isEmptyTopic,
  hasOnlyEmptyTopics,
  type ExtractedTopic,
  type EnrichedTopic,
} from "./schema.js";

export {
  validateTopicStructure,
  describeTopicIssues,
  restrictToVocabulary,
  type TopicIssue,
} from "./validator.js";
