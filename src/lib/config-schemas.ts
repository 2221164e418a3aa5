/**
 * Configuration Schemas
 *
 * Zod schemas for validating credibility scoring configuration.
 * Secrets (API keys) are never part of a config file; they come from the
 * environment only.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// CREDIBILITY CONFIG SCHEMA
// ============================================================================

export const CredibilityConfigSchema = z.object({
  // === Domain trust cache ===
  cache: z.object({
    uri: z.string().regex(/^mongodb(\+srv)?:\/\//, "must be a mongodb:// or mongodb+srv:// URI"),
    database: z.string().min(1),
    collection: z.string().min(1).describe("Collection holding one document per registrable domain"),
    ttlDays: z.number().int().min(1).max(3650).describe("Days before a cached domain score is re-resolved"),
  }),

  // === Tier 2: popularity index ===
  popularityIndex: z.object({
    enabled: z.boolean().describe("Query the popularity index for uncached domains"),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().min(500).max(9000).describe("Per-request timeout"),
  }),

  // === Tier 3 / author credentials: generative inference ===
  inference: z.object({
    enabled: z.boolean().describe("Allow LLM calls for domain rating, author assessment and claim extraction"),
    provider: z.enum(["openai", "anthropic"]),
    model: z.string().min(1),
    timeoutMs: z.number().int().min(500).max(60000),
  }),

  // === Bibliometric lookup (research papers) ===
  bibliometrics: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().min(500).max(9000),
  }),

  // === Claim embeddings ===
  embeddings: z.object({
    model: z.string().min(1),
    similarityThreshold: z.number().min(0).max(1).describe("Cosine similarity for joining a claim to a cluster seed"),
  }),

  // === Conflict resolution ===
  conflict: z.object({
    weightedVoteThreshold: z.number().min(0).max(1).describe("Minimum credibility spread for a weighted-vote resolution"),
    highTrustThreshold: z.number().min(0).max(1).describe("Credibility at which a source counts as high-trust in majority vote"),
  }),
});

export type CredibilityConfig = z.infer<typeof CredibilityConfigSchema>;

export const DEFAULT_CREDIBILITY_CONFIG: CredibilityConfig = {
  cache: {
    uri: "mongodb://localhost:27017",
    database: "crossread",
    collection: "domain_trust",
    ttlDays: 90,
  },
  popularityIndex: {
    enabled: true,
    baseUrl: "https://openpagerank.com/api/v1.0/getPageRank",
    timeoutMs: 8000,
  },
  inference: {
    enabled: true,
    provider: "openai",
    model: "gpt-4o-mini",
    timeoutMs: 15000,
  },
  bibliometrics: {
    enabled: true,
    baseUrl: "https://api.semanticscholar.org/graph/v1",
    timeoutMs: 9000,
  },
  embeddings: {
    model: "text-embedding-3-small",
    similarityThreshold: 0.82,
  },
  conflict: {
    weightedVoteThreshold: 0.15,
    highTrustThreshold: 0.75,
  },
};

// ============================================================================
// SECRET DETECTION
// ============================================================================

const DENYLIST_PATTERNS = [
  /api[_-]?key/i,
  /secret[_-]?key/i,
  /access[_-]?token/i,
  /bearer[_-]?token/i,
  /password/i,
  /credential/i,
];

function getAllKeys(obj: object, prefix = ""): string[] {
  const keys: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    keys.push(fullKey);
    if (value && typeof value === "object" && !Array.isArray(value)) {
      keys.push(...getAllKeys(value, fullKey));
    }
  }
  return keys;
}

export function validateNoSecrets(content: object): ValidationResult {
  const errors: string[] = [];

  for (const key of getAllKeys(content)) {
    if (DENYLIST_PATTERNS.some((p) => p.test(key))) {
      errors.push(`Field '${key}' appears to be a secret - set it through the environment instead`);
    }
  }

  return { valid: errors.length === 0, errors, warnings: [] };
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate JSON config file content
 */
export function validateConfig(content: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    errors.push(`Failed to parse content: ${err instanceof Error ? err.message : String(err)}`);
    return { valid: false, errors, warnings };
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    errors.push("Config must be a JSON object");
    return { valid: false, errors, warnings };
  }

  const secretCheck = validateNoSecrets(parsed);
  errors.push(...secretCheck.errors);

  const result = CredibilityConfigSchema.safeParse(parsed);
  if (!result.success) {
    errors.push(...result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  return { valid: errors.length === 0, errors, warnings };
}
