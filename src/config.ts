/**
 * Runtime configuration
 *
 * Values come from the environment (`.env` is loaded by the logger module),
 * optionally overridden by an env-format config file. The first of these
 * that is set wins:
 *   1) the --config path
 *   2) the PULSE_SYNC_CONFIG environment variable
 *   3) ~/.pulse-sync.env, when it exists
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import dotenv from "dotenv";

import { ConfigError, errorMessage } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const AppConfigSchema = Type.Object({
  feed: Type.Object({
    baseUrl: Type.String({ pattern: "^https?://" }),
    apiKey: Type.String(),
    pageSize: Type.Integer({ minimum: 1, maximum: 100 }),
    rateLimitMs: Type.Integer({ minimum: 0 }),
    timeoutMs: Type.Integer({ minimum: 1 }),
    proxyUrl: Type.Optional(Type.String({ pattern: "^https?://" })),
  }),
  store: Type.Object({
    environment: Type.Union([
      Type.Literal("production"),
      Type.Literal("development"),
    ]),
    databaseUrl: Type.String({ pattern: "^postgres(ql)?://" }),
    source: Type.String({ minLength: 1 }),
  }),
  vocabularyPath: Type.String({ minLength: 1 }),
});

export type AppConfig = Static<typeof AppConfigSchema>;

export const DEFAULT_FEED_URL = "https://otx.alienvault.com/api/v1";
export const DEFAULT_DATABASE_URL = "postgresql://localhost:5432/intel";
export const DEFAULT_SOURCE = "AlienVault OTX";

// Resolves to <root>/config from both src and dist
export const DEFAULT_VOCABULARY_PATH = fileURLToPath(
  new URL("../config/vocabulary.json", import.meta.url)
);

export interface LoadConfigOptions {
  configPath?: string;
  /** Use the development store */
  dev?: boolean;
  /** Overrides VOCABULARY_FILE */
  vocabularyPath?: string;
  /** Require feed credentials; database-only commands turn this off */
  requireFeed?: boolean;
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Loading
// ============================================================================

function resolveConfigFile(
  options: LoadConfigOptions,
  env: Env
): string | undefined {
  if (options.configPath !== undefined) {
    return options.configPath;
  }
  const fromEnv = env.PULSE_SYNC_CONFIG;
  if (fromEnv !== undefined && fromEnv !== "") {
    return fromEnv;
  }
  const homeFile = join(homedir(), ".pulse-sync.env");
  return existsSync(homeFile) ? homeFile : undefined;
}

function readConfigFile(path: string): Env {
  try {
    return dotenv.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, [
      errorMessage(error),
    ]);
  }
}

function toInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Assemble and validate the configuration
 * @param env - defaults to process.env
 */
export function loadConfig(
  options: LoadConfigOptions = {},
  env: Env = process.env
): AppConfig {
  const file = resolveConfigFile(options, env);
  const merged: Env = file !== undefined ? { ...env, ...readConfigFile(file) } : env;

  const dev = options.dev === true;
  const databaseUrl = dev
    ? nonEmpty(merged.DEV_DATABASE_URL)
    : (nonEmpty(merged.DATABASE_URL) ?? DEFAULT_DATABASE_URL);

  if (databaseUrl === undefined) {
    throw new ConfigError("DEV_DATABASE_URL must be set to use --dev");
  }

  const proxyUrl = nonEmpty(merged.FEED_PROXY_URL);

  const candidate = {
    feed: {
      baseUrl: (nonEmpty(merged.FEED_URL) ?? DEFAULT_FEED_URL).replace(/\/+$/, ""),
      apiKey: nonEmpty(merged.FEED_API_KEY) ?? "",
      pageSize: toInteger(merged.FEED_PAGE_SIZE, 10),
      rateLimitMs: toInteger(merged.FEED_RATE_LIMIT_MS, 250),
      timeoutMs: toInteger(merged.FEED_TIMEOUT_MS, 30_000),
      ...(proxyUrl !== undefined ? { proxyUrl } : {}),
    },
    store: {
      environment: dev ? "development" : "production",
      databaseUrl,
      source: nonEmpty(merged.STORE_SOURCE) ?? DEFAULT_SOURCE,
    },
    vocabularyPath:
      options.vocabularyPath ??
      nonEmpty(merged.VOCABULARY_FILE) ??
      DEFAULT_VOCABULARY_PATH,
  };

  if (!Value.Check(AppConfigSchema, candidate)) {
    const details = [...Value.Errors(AppConfigSchema, candidate)].map(
      (e) => `${e.path}: ${e.message}`
    );
    throw new ConfigError("Invalid configuration", details);
  }

  if (options.requireFeed !== false && candidate.feed.apiKey === "") {
    throw new ConfigError("FEED_API_KEY must be set");
  }

  return candidate;
}
