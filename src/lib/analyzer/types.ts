/**
 * Analyzer - Type Definitions
 *
 * Documents, claims, credibility scores and conflicts shared by the
 * source-authority resolver, the credibility scorers and the conflict engine.
 *
 * @module analyzer/types
 */

// ============================================================================
// DOCUMENTS
// ============================================================================

export const DOCUMENT_TYPES = [
  "research_paper",
  "news_article",
  "blog_post",
  "legal_document",
  "unknown",
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((t) => t === value);
}

/** Raw value recorded in `CredibilityScore.signals` and document metadata. */
export type SignalValue = string | number | boolean | null;

/**
 * Free-form document metadata.
 *
 * Known keys read by the scorers: `published_date` (ISO string),
 * `publisher`, `corroboration_score` (0-1). Scorers write back
 * derived fields such as `source_authority` or bibliometric data.
 */
export type DocumentMetadata = Record<string, SignalValue | undefined>;

export interface Document {
  id: string;
  type: DocumentType;
  title?: string | null;
  sourceUrl: string | null;
  rawText: string;
  metadata: DocumentMetadata;
  credibility?: CredibilityScore;
  claims: Claim[];
}

// ============================================================================
// CREDIBILITY
// ============================================================================

export interface CredibilityScore {
  /** Weighted sum of `breakdown`, 0-1, rounded to 4 places */
  overall: number;
  breakdown: Record<string, number>;
  explanations: Record<string, string>;
  signals: Record<string, SignalValue>;
}

// ============================================================================
// CLAIMS & CONFLICTS
// ============================================================================

export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly sourceDocId: string;
  readonly confidence: number;
}

export type ConflictStatus = "resolved" | "unresolved";

export interface Conflict {
  readonly claims: readonly Claim[];
  readonly topic: string;
  /** Winning claim text, null when unresolved */
  readonly resolution: string | null;
  readonly status: ConflictStatus;
  readonly confidence: number;
}

// ============================================================================
// DOMAIN TRUST
// ============================================================================

export type TrustMethod = "static" | "tld_pattern" | "openpagerank" | "llm" | "default";

export interface DomainTrustEntry {
  domain: string;
  score: number;
  method: TrustMethod;
  updatedAt: string;
}
