/**
 * Reads prompt templates from the prompts directory.
 *
 *   const templates = new PromptTemplateLoader(config.promptsDir);
 *   const extraction = templates.load(TOPIC_EXTRACTION_TEMPLATE);
 *
 * Each file is read and parsed on first use; later calls return the same
 * ParsedTemplate, so one loader per process is enough.
 */

import { readFileSync, statSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateLoadError";
  }
}

export const TOPIC_EXTRACTION_TEMPLATE = "topic-extraction.md";
export const FEEDBACK_TEMPLATE = "feedback.md";

const TEMPLATE_EXTENSIONS: readonly string[] = [".md", ".txt"];

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export class PromptTemplateLoader {
  readonly directory: string;
  private readonly parsed = new Map<string, ParsedTemplate>();

  /**
   * @throws TemplateLoadError if the directory does not exist
   */
  constructor(directory: string) {
    this.directory = resolve(directory);
    if (!isDirectory(this.directory)) {
      throw new TemplateLoadError(
        this.directory,
        `Prompt directory not found: ${this.directory}`
      );
    }
  }

  /**
   * @param filename - file inside the prompt directory, e.g. "feedback.md"
   * @throws TemplateLoadError  for an unreadable file or a non-template extension
   * @throws TemplateParseError when the file uses an unknown variable
   */
  load(filename: string): ParsedTemplate {
    const known = this.parsed.get(filename);
    if (known !== undefined) return known;

    const path = join(this.directory, filename);
    const extension = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.includes(extension)) {
      throw new TemplateLoadError(
        path,
        `Not a prompt template: ${filename} (expected ${TEMPLATE_EXTENSIONS.join(" or ")})`
      );
    }

    let source: string;
    try {
      source = readFileSync(path, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TemplateLoadError(path, `Cannot read prompt template ${path}: ${reason}`);
    }

    const template = parseTemplate(source, basename(filename, extension));
    this.parsed.set(filename, template);
    return template;
  }

  /** Forget parsed templates so the next load() re-reads the file. */
  clearCache(): void {
    this.parsed.clear();
  }
}
