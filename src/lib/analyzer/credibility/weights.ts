/**
 * Credibility weight tables and lookup tables.
 *
 * Every weight table sums to 1.0; `overall` is the weighted sum of the
 * breakdown under exactly one table.
 *
 * @module analyzer/credibility/weights
 */

// ============================================================================
// WEIGHTS
// ============================================================================

export const RESEARCH_WEIGHTS = {
  academic_blend: {
    source_authority: 0.3,
    venue_tier: 0.25,
    citation_count: 0.2,
    recency: 0.15,
    author_hindex: 0.1,
  },
  authority_only: {
    source_authority: 0.65,
    recency: 0.35,
  },
  unknown: {
    source_authority: 0.65,
    recency: 0.35,
  },
} as const;

export type ResearchScoringMethod = keyof typeof RESEARCH_WEIGHTS;

export const NEWS_WEIGHTS = {
  source_trust: 0.4,
  recency: 0.2,
  primary_citations: 0.15,
  corroboration: 0.15,
  byline: 0.1,
} as const;

export const BLOG_WEIGHTS = {
  domain_authority: 0.3,
  author_credentials: 0.25,
  external_references: 0.25,
  recency: 0.2,
} as const;

export const LEGAL_WEIGHTS = {
  official_source: 0.35,
  jurisdiction_authority: 0.3,
  statute_citations: 0.2,
  recency: 0.15,
} as const;

// ============================================================================
// LOOKUP TABLES (substring keys, checked in order)
// ============================================================================

export const VENUE_TIERS: ReadonlyArray<readonly [string, number]> = [
  ["nature", 1.0],
  ["science", 1.0],
  ["cell", 0.98],
  ["lancet", 0.97],
  ["nejm", 0.97],
  ["jama", 0.96],
  ["ieee", 0.85],
  ["acm", 0.82],
  ["plos", 0.75],
  ["arxiv", 0.5],
  ["biorxiv", 0.45],
  ["preprint", 0.35],
];

export const BLOG_PLATFORMS: ReadonlyArray<readonly [string, number]> = [
  ["medium.com", 0.72],
  ["substack.com", 0.65],
  ["wordpress.com", 0.55],
  ["towardsdatascience.com", 0.82],
  ["hackernoon.com", 0.75],
  ["techcrunch.com", 0.88],
  ["wired.com", 0.87],
  ["ycombinator.com", 0.9],
];

export const JURISDICTION_TIERS: ReadonlyArray<readonly [string, number]> = [
  ["supreme court", 1.0],
  ["court of appeals", 0.88],
  ["district court", 0.8],
  ["federal", 0.85],
  ["state", 0.7],
  ["municipal", 0.55],
  ["us", 0.85],
  ["eu", 0.82],
  ["uk", 0.8],
];

export const OFFICIAL_LEGAL_DOMAINS = [".gov", ".gov.uk", ".europa.eu", ".un.org", ".court"] as const;
