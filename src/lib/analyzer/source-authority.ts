/**
 * Source Authority Resolver
 *
 * Maps a source URL to a trust score in [0, 1] through a tiered cascade:
 *
 *   0. curated override table (substring match, table order)
 *   1. top-level-domain rules (.gov, .int, .edu, ...)
 *   -- registrable domain + cache lookup --
 *   2. popularity index rank (OpenPageRank), normalized
 *   3. LLM rating against a fixed rubric
 *   4. neutral-low default
 *
 * Tiers 2-4 write their result through to the domain trust cache with the
 * method that produced it. Tier failures are misses, never exceptions, so
 * `resolve` does not reject.
 *
 * @module analyzer/source-authority
 */

import { z } from "zod";
import overridesFile from "../../../configs/domain-trust-overrides.json";
import type { DomainTrustStore } from "../domain-trust-cache";
import type { PopularityIndexClient } from "../popularity-index";
import { debugLog } from "./debug";
import { parseUnitScore } from "./json";
import type { InferenceClient } from "./llm";
import { describeMiss, miss, hit, type LookupOutcome } from "./lookup-outcome";
import type { TrustMethod } from "./types";

// ============================================================================
// CONSTANTS
// ============================================================================

export const NO_URL_SCORE = 0.5;
export const DEFAULT_AUTHORITY_SCORE = 0.45;

const OverridesFileSchema = z.object({
  domains: z.record(z.number().min(0).max(1)),
  biasCorrections: z.record(z.number().min(0).max(1)),
});

/**
 * Tier 0 table. Bias corrections replace same-key entries in place and
 * append new ones, so table order stays stable.
 */
function loadStaticOverrides(): ReadonlyMap<string, number> {
  const parsed = OverridesFileSchema.parse(overridesFile);
  const table = new Map<string, number>(Object.entries(parsed.domains));
  for (const [domain, score] of Object.entries(parsed.biasCorrections)) {
    table.set(domain, score);
  }
  return table;
}

export const STATIC_OVERRIDES: ReadonlyMap<string, number> = loadStaticOverrides();

export const TLD_RULES: ReadonlyArray<{ pattern: RegExp; score: number }> = [
  { pattern: /\.gov(\/|$|\.)/, score: 0.93 },
  { pattern: /\.gov\.[a-z]{2}(\/|$)/, score: 0.92 },
  { pattern: /\.int(\/|$|\.)/, score: 0.94 },
  { pattern: /\.un\.org/, score: 0.97 },
  { pattern: /\.edu(\/|$|\.)/, score: 0.88 },
  { pattern: /\.edu\.[a-z]{2}(\/|$)/, score: 0.87 },
  { pattern: /\.ac\.[a-z]{2}(\/|$)/, score: 0.87 },
];

/** Second-level labels that sit under a country code (bbc.co.uk, ox.ac.uk) */
const COUNTRY_SECOND_LEVEL = new Set(["gov", "ac", "co", "edu", "org", "net"]);

const DOMAIN_RATING_SYSTEM = `You rate the institutional trustworthiness of web domains for a fact-checking system.
Return ONLY a JSON object: {"score": <0.0-1.0>, "type": "<category>", "reasoning": "<one short sentence>"}

Rubric:
- International organizations (UN agencies, WHO, OECD): 0.90-0.97
- Government agencies: 0.88-0.96
- Top academic journals and universities: 0.85-0.97
- Wire services: 0.88-0.94
- Quality national news outlets: 0.75-0.88
- Smaller or regional news outlets: 0.60-0.75
- Advocacy groups and think tanks: 0.40-0.65
- Personal blogs and self-published sites: 0.30-0.55
- Conspiracy or state propaganda outlets: 0.05-0.30`;

// ============================================================================
// DOMAIN NORMALIZATION
// ============================================================================

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    // Bare domains ("example.com/page") do not parse as URLs
    return url.split("/")[0] ?? url;
  }
}

/**
 * Reduce a URL to the domain used as the cache key.
 *
 * @example
 * getRegistrableDomain("https://www.bbc.co.uk/news/x") // "bbc.co.uk"
 * getRegistrableDomain("https://blog.example.com/")   // "example.com"
 */
export function getRegistrableDomain(url: string): string {
  let host = hostOf(url.trim()).toLowerCase();
  host = host.replace(/\.+$/, "");
  if (host.startsWith("www.")) host = host.slice(4);

  const labels = host.split(".").filter(Boolean);
  if (labels.length <= 2) return labels.join(".");

  const secondToLast = labels[labels.length - 2];
  const keep = COUNTRY_SECOND_LEVEL.has(secondToLast) ? 3 : 2;
  return labels.slice(-keep).join(".");
}

/**
 * OpenPageRank's 0-10 decimal rank to a trust score in [0.20, 0.90).
 */
export function normalizePageRank(raw: number): number {
  return round4(0.2 + 0.7 * (1 - Math.exp(-0.35 * raw)));
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function matchStaticOverride(url: string): number | null {
  for (const [domain, score] of STATIC_OVERRIDES) {
    if (url.includes(domain)) return score;
  }
  return null;
}

export function matchTldRule(url: string): number | null {
  for (const rule of TLD_RULES) {
    if (rule.pattern.test(url)) return rule.score;
  }
  return null;
}

// ============================================================================
// RESOLVER
// ============================================================================

export interface AuthorityResolution {
  score: number;
  method: TrustMethod;
  /** Registrable domain, null when resolved before normalization */
  domain: string | null;
}

export class SourceAuthorityResolver {
  constructor(
    private readonly store: DomainTrustStore,
    private readonly popularity: PopularityIndexClient | null,
    private readonly inference: InferenceClient,
  ) {}

  async resolve(url: string | null | undefined): Promise<number> {
    return (await this.resolveDetailed(url)).score;
  }

  async resolveDetailed(url: string | null | undefined): Promise<AuthorityResolution> {
    const raw = (url ?? "").trim();
    if (!raw) return { score: NO_URL_SCORE, method: "default", domain: null };

    const lowered = raw.toLowerCase();

    const staticScore = matchStaticOverride(lowered);
    if (staticScore !== null) return { score: staticScore, method: "static", domain: null };

    const tldScore = matchTldRule(lowered);
    if (tldScore !== null) return { score: tldScore, method: "tld_pattern", domain: null };

    const domain = getRegistrableDomain(lowered);

    const cached = await this.readCache(domain);
    if (cached) {
      debugLog(`[SA] Cache hit ${domain}`, cached);
      return { score: cached.score, method: cached.method, domain };
    }

    const fromIndex = await this.queryPopularityIndex(domain);
    if (fromIndex.kind === "hit") {
      return this.remember(domain, fromIndex.value, "openpagerank");
    }

    const fromLlm = await this.queryInference(domain);
    if (fromLlm.kind === "hit") {
      return this.remember(domain, fromLlm.value, "llm");
    }

    console.log(`[SA] ${domain}: no tier produced a score, using default ${DEFAULT_AUTHORITY_SCORE}`);
    return this.remember(domain, DEFAULT_AUTHORITY_SCORE, "default");
  }

  private async queryPopularityIndex(domain: string): Promise<LookupOutcome<number>> {
    if (!this.popularity) return miss("not_configured");
    const outcome = await this.popularity.lookupRank(domain);
    if (outcome.kind === "miss") {
      debugLog(`[SA] Popularity index miss for ${domain}`, describeMiss(outcome));
      return outcome;
    }
    return hit(normalizePageRank(outcome.value));
  }

  private async queryInference(domain: string): Promise<LookupOutcome<number>> {
    const outcome = await this.inference.complete({
      task: "domain_authority",
      system: DOMAIN_RATING_SYSTEM,
      prompt: `Domain: ${domain}`,
      maxOutputTokens: 120,
    });
    if (outcome.kind === "miss") {
      debugLog(`[SA] LLM miss for ${domain}`, describeMiss(outcome));
      return outcome;
    }

    const score = parseUnitScore(outcome.value);
    if (score === null) {
      debugLog(`[SA] Unparsable LLM rating for ${domain}`, outcome.value.substring(0, 200));
      return miss("invalid_response", "score missing or outside [0, 1]");
    }
    return hit(round4(score));
  }

  private async readCache(domain: string) {
    try {
      return await this.store.get(domain);
    } catch (error) {
      console.warn(`[SA] Cache read failed for ${domain}, continuing uncached:`, error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  private async remember(domain: string, score: number, method: TrustMethod): Promise<AuthorityResolution> {
    try {
      await this.store.set(domain, score, method);
    } catch (error) {
      console.warn(`[SA] Cache write failed for ${domain} (${method}):`, error instanceof Error ? error.message : String(error));
    }
    debugLog(`[SA] Resolved ${domain}`, { score, method });
    return { score, method, domain };
  }
}
