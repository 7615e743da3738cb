export {
  formatReport,
  formatReferences,
  topicLabel,
  buildNarrative,
  RECOMMENDATION_ENGINE,
  NO_TOPICS_FOUND,
  NO_REFERENCES_FOUND,
  type NarrativeStages,
  type StageOutcome,
} from "./formatter.js";
