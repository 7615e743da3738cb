/**
 * Environment readers.
 *
 * Each reader takes the environment as its first argument (normally
 * `process.env`, which dotenv has filled from `.env`), so configuration
 * can be built from a plain object in tests. Unset and empty are the same.
 */

import "dotenv/config";

export type Env = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

function readWith<T>(env: Env, key: string, fallback: T, convert: (raw: string) => T): T {
  const raw = read(env, key);
  return raw === undefined ? fallback : convert(raw);
}

/**
 * @throws ConfigError when the variable is unset
 */
export function requireEnv(env: Env, key: string): string {
  const value = read(env, key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(env: Env, key: string, fallback: string): string {
  return read(env, key) ?? fallback;
}

/**
 * Whole numbers only: "2.5" and "3abc" are errors.
 */
export function optionalEnvInt(env: Env, key: string, fallback: number): number {
  return readWith(env, key, fallback, (raw) => {
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
      throw new ConfigError(`${key} must be a whole number, got: ${raw}`);
    }
    return parsed;
  });
}

const TRUE_WORDS = ["true", "1", "yes"];
const FALSE_WORDS = ["false", "0", "no"];

/**
 * Accepts true/false, 1/0 and yes/no in any case.
 */
export function optionalEnvBool(env: Env, key: string, fallback: boolean): boolean {
  return readWith(env, key, fallback, (raw) => {
    const word = raw.toLowerCase();
    if (TRUE_WORDS.includes(word)) return true;
    if (FALSE_WORDS.includes(word)) return false;
    throw new ConfigError(`${key} must be true/false, 1/0 or yes/no, got: ${raw}`);
  });
}
