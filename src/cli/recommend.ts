#!/usr/bin/env node
/**
 * CLI: recommend readings for a term-paper draft.
 *
 * Reads the draft, extracts its topics with the configured model, matches
 * them against the reference corpus and prints the recommendation report
 * followed by the chain-of-thought narrative.
 *
 * Usage:
 *   npm run recommend -- --input draft.txt
 *   cat draft.txt | npm run recommend
 *
 * Options:
 *   --input <path>        Term-paper text file (default: stdin)
 *   --categories <path>   Category corpus JSON (default: CATEGORY_CORPUS_PATH)
 *   --references <path>   Concept-reference map JSON (default: CONCEPT_REFERENCES_PATH)
 *   --prompts <dir>       Prompt template directory (default: PROMPTS_DIR)
 *   --model <name>        Model name (default: LLM_MODEL)
 *   --top-n <n>           References per topic (default: RECOMMENDATION_TOP_N)
 *   --max-retries <n>     Extraction attempts (default: EXTRACTION_MAX_RETRIES)
 *   --feedback            Also compose a feedback note for the student
 *   --language <name>     Language of the feedback note (default: FEEDBACK_LANGUAGE)
 *   --json                Print the whole result as JSON
 *   --no-narrative        Omit the chain-of-thought narrative
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Report printed (including the fallback report)
 *   1 - Configuration or input error
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  loadConfig,
  validateConfig,
  requireApiKey,
  isLogLevel,
  ConfigError,
  type AppConfig,
} from "../config/index.js";
import { OpenAITextGenerator } from "../llm/index.js";
import { initRunId, createLogger } from "../logging/index.js";
import { createPipeline, type PipelineResult } from "../pipeline/index.js";
import { TemplateLoadError, TemplateParseError } from "../prompts/index.js";

// ============================================================
// Types
// ============================================================

export interface CliArgs {
  help: boolean;
  input?: string;
  categories?: string;
  references?: string;
  prompts?: string;
  model?: string;
  topN?: number;
  maxRetries?: number;
  feedback: boolean;
  language?: string;
  json: boolean;
  narrative: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

export const HELP_TEXT = `
Usage: term-paper-advisor [options]

  npm run recommend -- --input <draft.txt>
  cat draft.txt | npm run recommend

Options:
  --input <path>        Term-paper text file (default: stdin)
  --categories <path>   Category corpus JSON (default: data/itemCorpus.json)
  --references <path>   Concept-reference map JSON (default: data/conceptRefs.json)
  --prompts <dir>       Prompt template directory (default: prompts)
  --model <name>        Model name (default: gpt-4o)
  --top-n <n>           References per topic (default: 2)
  --max-retries <n>     Extraction attempts (default: 3)
  --feedback            Also compose a feedback note for the student
  --language <name>     Language of the feedback note (default: English)
  --json                Print the whole result as JSON
  --no-narrative        Omit the chain-of-thought narrative
  -h, --help            Show this help message

Environment:
  OPENAI_API_KEY is required. See .env.example for the other settings.
`;

function parseCount(flag: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new CliUsageError(`${flag} must be an integer >= ${min}, got: ${value}`);
  }
  return parsed;
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        input: { type: "string" },
        categories: { type: "string" },
        references: { type: "string" },
        prompts: { type: "string" },
        model: { type: "string" },
        "top-n": { type: "string" },
        "max-retries": { type: "string" },
        feedback: { type: "boolean" },
        language: { type: "string" },
        json: { type: "boolean" },
        "no-narrative": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws CliUsageError on unknown options or bad values
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = parseRawArgs(argv);

  return {
    help: values.help === true,
    input: values.input,
    categories: values.categories,
    references: values.references,
    prompts: values.prompts,
    model: values.model,
    topN: parseCount("--top-n", values["top-n"], 0),
    maxRetries: parseCount("--max-retries", values["max-retries"], 1),
    feedback: values.feedback === true,
    language: values.language,
    json: values.json === true,
    narrative: values["no-narrative"] !== true,
  };
}

/**
 * Layer command-line overrides on top of the environment configuration.
 */
export function applyOverrides(config: AppConfig, args: CliArgs): AppConfig {
  return {
    ...config,
    llm: { ...config.llm, model: args.model ?? config.llm.model },
    extraction: {
      ...config.extraction,
      maxRetries: args.maxRetries ?? config.extraction.maxRetries,
    },
    recommendation: { topN: args.topN ?? config.recommendation.topN },
    corpus: {
      categoriesPath: args.categories ?? config.corpus.categoriesPath,
      referencesPath: args.references ?? config.corpus.referencesPath,
    },
    promptsDir: args.prompts ?? config.promptsDir,
    feedbackLanguage: args.language ?? config.feedbackLanguage,
  };
}

// ============================================================
// Output Formatting
// ============================================================

export interface OutputOptions {
  json: boolean;
  narrative: boolean;
}

export function renderOutput(result: PipelineResult, options: OutputOptions): string {
  if (options.json) {
    return JSON.stringify(result, null, 2);
  }

  const parts = [`Recommendations:\n${result.report}`];
  if (result.feedback !== null) {
    parts.push(`Feedback:\n\n${result.feedback}\n`);
  }
  if (options.narrative) {
    parts.push(result.narrative);
  }
  return parts.join("\n");
}

// ============================================================
// Input
// ============================================================

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function readPaper(args: CliArgs): Promise<string> {
  if (args.input !== undefined) {
    try {
      return readFileSync(args.input, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CliUsageError(`Cannot read input file ${args.input}: ${reason}`);
    }
  }
  if (process.stdin.isTTY) {
    throw new CliUsageError("No input: pass --input <path> or pipe the text on stdin");
  }
  return readStdin();
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  initRunId();

  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const config = applyOverrides(loadConfig(), args);
  validateConfig(config);

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: config.logDir,
    file: config.logToFile,
    stderr: true,
  });
  logger.info("Configuration loaded", {
    app: config.appName,
    env: config.env,
    model: config.llm.model,
    topN: config.recommendation.topN,
    maxRetries: config.extraction.maxRetries,
  });

  const generator = new OpenAITextGenerator({
    apiKey: requireApiKey(),
    model: config.llm.model,
    baseUrl: config.llm.baseUrl,
  });
  const pipeline = createPipeline(config, {
    generator,
    logger,
    withFeedback: args.feedback,
  });

  const text = (await readPaper(args)).trim();
  if (text === "") {
    throw new CliUsageError("Input text is empty");
  }

  const result = await pipeline.run(text);
  console.log(renderOutput(result, { json: args.json, narrative: args.narrative }));
  return 0;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  (process.argv[1].endsWith("recommend.ts") ||
   process.argv[1].endsWith("recommend.js") ||
   process.argv[1].endsWith("term-paper-advisor"));

if (isDirectExecution) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      const known =
        err instanceof ConfigError ||
        err instanceof CliUsageError ||
        err instanceof TemplateLoadError ||
        err instanceof TemplateParseError;
      const message = err instanceof Error ? err.message : String(err);
      console.error(known ? `Error: ${message}` : err);
      process.exitCode = 1;
    }
  );
}
