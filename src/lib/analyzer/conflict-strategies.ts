/**
 * Conflict Resolution Strategies
 *
 * Each strategy turns one disputed claim cluster (claims from at least two
 * documents) plus the per-document credibility map into a Conflict. The
 * engine sets the topic afterwards.
 *
 * @module analyzer/conflict-strategies
 */

import type { Claim, Conflict, DocumentType } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export const STRATEGY_NAMES = [
  "weighted_vote",
  "majority_vote",
  "highest_credibility_wins",
  "conservative",
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** Document id -> overall credibility */
export type CredibilityMap = ReadonlyMap<string, number>;

export interface StrategyOptions {
  /** Minimum credibility spread for weighted_vote to pick a winner */
  weightedVoteThreshold: number;
  /** Credibility at which a source counts as high-trust for majority_vote */
  highTrustThreshold: number;
}

export type ConflictStrategy = (
  claims: readonly Claim[],
  credibility: CredibilityMap,
  options: StrategyOptions,
) => Conflict;

export const DEFAULT_STRATEGY_OPTIONS: StrategyOptions = {
  weightedVoteThreshold: 0.15,
  highTrustThreshold: 0.75,
};

/** Fixed agreement confidence when two high-trust sources concur */
export const MAJORITY_CONFIDENCE = 0.85;

function credibilityOf(map: CredibilityMap, claim: Claim, fallback: number): number {
  return map.get(claim.sourceDocId) ?? fallback;
}

function emptyConflict(): Conflict {
  return { claims: [], topic: "", resolution: null, status: "unresolved", confidence: 0 };
}

// ============================================================================
// STRATEGIES
// ============================================================================

/**
 * Highest-credibility claim wins, unless every source sits within
 * `weightedVoteThreshold` of the others.
 */
export const weightedVote: ConflictStrategy = (claims, credibility, options) => {
  if (claims.length === 0) return emptyConflict();

  const ranked = claims
    .map((claim) => ({ claim, score: credibilityOf(credibility, claim, 0.5) }))
    .sort((a, b) => b.score - a.score);

  const best = ranked[0];
  const spread = best.score - ranked[ranked.length - 1].score;

  if (spread < options.weightedVoteThreshold) {
    return { claims: [...claims], topic: "", resolution: null, status: "unresolved", confidence: best.score };
  }
  return { claims: [...claims], topic: "", resolution: best.claim.text, status: "resolved", confidence: best.score };
};

/**
 * Two or more high-trust sources settle the cluster on the first of them;
 * otherwise weighted vote decides.
 */
export const majorityVote: ConflictStrategy = (claims, credibility, options) => {
  const highTrust = claims.filter((c) => credibilityOf(credibility, c, 0) >= options.highTrustThreshold);
  if (highTrust.length >= 2) {
    return {
      claims: [...claims],
      topic: "",
      resolution: highTrust[0].text,
      status: "resolved",
      confidence: MAJORITY_CONFIDENCE,
    };
  }
  return weightedVote(claims, credibility, options);
};

export const highestCredibilityWins: ConflictStrategy = (claims, credibility) => {
  if (claims.length === 0) return emptyConflict();

  let best = claims[0];
  for (const claim of claims) {
    if (credibilityOf(credibility, claim, 0) > credibilityOf(credibility, best, 0)) {
      best = claim;
    }
  }
  return {
    claims: [...claims],
    topic: "",
    resolution: best.text,
    status: "resolved",
    confidence: credibilityOf(credibility, best, 0.5),
  };
};

export const conservative: ConflictStrategy = (claims) => ({
  claims: [...claims],
  topic: "",
  resolution: null,
  status: "unresolved",
  confidence: 0,
});

// ============================================================================
// REGISTRY
// ============================================================================

export const STRATEGIES: Readonly<Record<StrategyName, ConflictStrategy>> = {
  weighted_vote: weightedVote,
  majority_vote: majorityVote,
  highest_credibility_wins: highestCredibilityWins,
  conservative,
};

export const DEFAULT_STRATEGY_BY_TYPE: Readonly<Record<DocumentType, StrategyName>> = {
  research_paper: "weighted_vote",
  news_article: "majority_vote",
  blog_post: "weighted_vote",
  legal_document: "highest_credibility_wins",
  unknown: "conservative",
};

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

/**
 * Validate a caller-supplied strategy name. Unrecognized names fall back to
 * weighted_vote.
 */
export function resolveStrategyName(override: string): StrategyName {
  if (isStrategyName(override)) return override;
  console.warn(`[Conflict] Unknown strategy "${override}", using weighted_vote`);
  return "weighted_vote";
}
