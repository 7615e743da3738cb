export {
  TopicExtractor,
  TopicParseError,
  parseTopicPayload,
  stripCodeFences,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
  type TopicExtractorOptions,
  type ExtractOptions,
} from "./extractor.js";
