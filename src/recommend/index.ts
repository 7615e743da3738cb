export {
  scoreReferences,
  overlapCount,
  type ReferenceScorer,
  type ScoredReferences,
} from "./scorer.js";
export {
  assembleRecommendations,
  DEFAULT_TOP_N,
  type AssembleOptions,
} from "./assembler.js";
