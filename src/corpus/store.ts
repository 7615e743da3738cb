/**
 * Corpus store.
 *
 * Reads the category vocabulary and the concept-reference map from their
 * JSON files. Paths are given at construction; each call re-reads the
 * file, so a store holds no state beyond its configuration.
 *
 * Two flavours of every read:
 *   - readX()  throws CorpusUnavailableError when the dataset is missing
 *              or malformed
 *   - loadX()  logs the failure and returns an empty list, which is what
 *              the pipeline uses so a broken corpus degrades to "nothing
 *              matched" instead of aborting the run
 */

import { readFileSync } from "node:fs";
import type { ZodType } from "zod";
import {
  CategoryCorpusSchema,
  ConceptReferenceMapSchema,
  parseConceptList,
  toReferenceSource,
  type ConceptReferenceEntry,
} from "./schema.js";
import { createSilentLogger, errorContext, type Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface CorpusIssue {
  path: string;
  message: string;
}

export class CorpusUnavailableError extends Error {
  constructor(
    public readonly datasetPath: string,
    message: string,
    public readonly issues: CorpusIssue[] = []
  ) {
    super(message);
    this.name = "CorpusUnavailableError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface CorpusStoreOptions {
  /** Path to the category corpus JSON */
  categoriesPath: string;
  /** Path to the concept-reference map JSON */
  referencesPath: string;
  logger?: Logger;
}

/**
 * What the pipeline needs from a corpus. CorpusStore is the file-backed
 * implementation.
 */
export interface CorpusSource {
  loadCategories(): string[];
  loadConceptReferenceMap(): ConceptReferenceEntry[];
}

export class CorpusStore implements CorpusSource {
  private readonly categoriesPath: string;
  private readonly referencesPath: string;
  private readonly logger: Logger;

  constructor(options: CorpusStoreOptions) {
    this.categoriesPath = options.categoriesPath;
    this.referencesPath = options.referencesPath;
    this.logger = (options.logger ?? createSilentLogger()).child({ scope: "corpus" });
  }

  /**
   * Flatten every record's category list, in file order.
   *
   * @throws CorpusUnavailableError
   */
  readCategories(): string[] {
    const records = readDataset(this.categoriesPath, CategoryCorpusSchema);
    return records.flatMap((record) => record.category);
  }

  /**
   * @throws CorpusUnavailableError
   */
  readConceptReferenceMap(): ConceptReferenceEntry[] {
    const records = readDataset(this.referencesPath, ConceptReferenceMapSchema);
    return records.map((record) => ({
      concepts: parseConceptList(record.concepts),
      references: record.references.map(toReferenceSource),
    }));
  }

  loadCategories(): string[] {
    return this.loadOrEmpty("category corpus", () => this.readCategories());
  }

  loadConceptReferenceMap(): ConceptReferenceEntry[] {
    return this.loadOrEmpty("concept-reference map", () => this.readConceptReferenceMap());
  }

  private loadOrEmpty<T>(label: string, read: () => T[]): T[] {
    try {
      const items = read();
      this.logger.debug(`Loaded ${label}`, { count: items.length });
      return items;
    } catch (err) {
      if (err instanceof CorpusUnavailableError) {
        this.logger.warn(`${label} unavailable, continuing with an empty list`, {
          path: err.datasetPath,
          reason: err.message,
          issues: err.issues.length,
        });
        return [];
      }
      this.logger.error(`Unexpected failure loading ${label}`, errorContext(err));
      throw err;
    }
  }
}

/**
 * Read and validate one JSON dataset.
 */
function readDataset<T>(path: string, schema: ZodType<T>): T {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorpusUnavailableError(path, `Cannot read dataset ${path}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorpusUnavailableError(path, `Dataset ${path} is not valid JSON: ${reason}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new CorpusUnavailableError(
      path,
      `Dataset ${path} failed validation: ${issues.length} error(s)`,
      issues
    );
  }

  return result.data;
}
