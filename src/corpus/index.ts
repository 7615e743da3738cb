/**
 * Reference corpus: dataset schemas and the file-backed store.
 */

export {
  CategoryCorpusSchema,
  ConceptReferenceMapSchema,
  parseConceptList,
  toReferenceSource,
  type CategoryCorpus,
  type ConceptReferenceMap,
  type RawReference,
  type ReferenceSource,
  type ScoredReference,
  type ConceptReferenceEntry,
} from "./schema.js";

export {
  CorpusStore,
  CorpusUnavailableError,
  type CorpusIssue,
  type CorpusSource,
  type CorpusStoreOptions,
} from "./store.js";
