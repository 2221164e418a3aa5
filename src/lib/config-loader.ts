/**
 * Configuration Loader
 *
 * Resolves the credibility config from (in order) built-in defaults, an
 * optional JSON config file and CR_* environment variable overrides.
 * Every override is validated against the schema before it is accepted.
 *
 * @module config-loader
 * @version 1.0.0
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  CredibilityConfigSchema,
  DEFAULT_CREDIBILITY_CONFIG,
  validateConfig,
  type CredibilityConfig,
} from "./config-schemas";

export type { CredibilityConfig } from "./config-schemas";
export { DEFAULT_CREDIBILITY_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export type Env = Record<string, string | undefined>;

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean;
}

export interface ResolvedConfig {
  config: CredibilityConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  /** Config file that was applied, null when defaults were used */
  configFile: string | null;
}

/** Credentials read from the environment; never stored in config files */
export interface CredibilitySecrets {
  openPageRankKey: string | null;
  semanticScholarKey: string | null;
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvMapping = { fieldPath: string; parser: (v: string) => string | number | boolean };

const parseBool = (v: string) => v === "true";
const parseIntValue = (v: string) => parseInt(v, 10);

const ENV_MAP: Record<string, EnvMapping> = {
  CR_MONGODB_URI: { fieldPath: "cache.uri", parser: (v) => v.trim() },
  CR_MONGODB_DATABASE: { fieldPath: "cache.database", parser: (v) => v },
  CR_CACHE_TTL_DAYS: { fieldPath: "cache.ttlDays", parser: parseIntValue },
  CR_POPULARITY_ENABLED: { fieldPath: "popularityIndex.enabled", parser: parseBool },
  CR_POPULARITY_TIMEOUT_MS: { fieldPath: "popularityIndex.timeoutMs", parser: parseIntValue },
  CR_LLM_ENABLED: { fieldPath: "inference.enabled", parser: parseBool },
  CR_LLM_PROVIDER: { fieldPath: "inference.provider", parser: (v) => v.toLowerCase().trim() },
  CR_LLM_MODEL: { fieldPath: "inference.model", parser: (v) => v },
  CR_LLM_TIMEOUT_MS: { fieldPath: "inference.timeoutMs", parser: parseIntValue },
  CR_BIBLIOMETRICS_ENABLED: { fieldPath: "bibliometrics.enabled", parser: parseBool },
  CR_BIBLIOMETRICS_TIMEOUT_MS: { fieldPath: "bibliometrics.timeoutMs", parser: parseIntValue },
  CR_EMBEDDING_MODEL: { fieldPath: "embeddings.model", parser: (v) => v },
  CR_CLAIM_SIMILARITY_THRESHOLD: { fieldPath: "embeddings.similarityThreshold", parser: parseFloat },
  CR_WEIGHTED_VOTE_THRESHOLD: { fieldPath: "conflict.weightedVoteThreshold", parser: parseFloat },
  CR_HIGH_TRUST_THRESHOLD: { fieldPath: "conflict.highTrustThreshold", parser: parseFloat },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function cloneConfig(config: CredibilityConfig): CredibilityConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

export function applyEnvOverrides(
  base: CredibilityConfig,
  env: Env = process.env,
): { result: CredibilityConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];
  const result = cloneConfig(base);

  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const tentative = cloneConfig(result);
    setNestedValue(tentative, mapping.fieldPath, parsed);

    const validation = CredibilityConfigSchema.safeParse(tentative);
    if (!validation.success) {
      console.warn(
        `[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ` +
          validation.error.issues.map((i) => i.message).join(", "),
      );
      skippedOverrides.push(`${envVar} (invalid: ${validation.error.issues[0]?.message})`);
      continue;
    }

    setNestedValue(result, mapping.fieldPath, parsed);
    overrides.push({ envVar, fieldPath: mapping.fieldPath, appliedValue: parsed });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// FILE LOADING
// ============================================================================

export const DEFAULT_CONFIG_FILE = path.join("configs", "credibility.default.json");

function loadConfigFile(filePath: string): CredibilityConfig | null {
  if (!fs.existsSync(filePath)) return null;

  const content = fs.readFileSync(filePath, "utf-8");
  const validation = validateConfig(content);
  if (!validation.valid) {
    console.warn(`[Config-Loader] Ignoring invalid config file ${filePath}: ${validation.errors.join("; ")}`);
    return null;
  }
  return CredibilityConfigSchema.parse(JSON.parse(content));
}

/**
 * Load the effective credibility config.
 *
 * A missing or invalid config file falls back to the built-in defaults.
 */
export function loadCredibilityConfig(
  options: { configFile?: string; env?: Env } = {},
): ResolvedConfig {
  const env = options.env ?? process.env;
  const filePath = path.resolve(options.configFile ?? env.CR_CONFIG_FILE ?? DEFAULT_CONFIG_FILE);

  const fromFile = loadConfigFile(filePath);
  const base = fromFile ?? DEFAULT_CREDIBILITY_CONFIG;
  const { result, overrides, skippedOverrides } = applyEnvOverrides(base, env);

  return {
    config: result,
    overrides,
    skippedOverrides,
    configFile: fromFile ? filePath : null,
  };
}

function readSecret(value: string | undefined): string | null {
  if (!value || value.startsWith("PASTE_")) return null;
  return value;
}

export function getCredibilitySecrets(env: Env = process.env): CredibilitySecrets {
  return {
    openPageRankKey: readSecret(env.CR_OPEN_PAGERANK_KEY),
    semanticScholarKey: readSecret(env.CR_SEMANTIC_SCHOLAR_KEY),
  };
}
