import type { BibliometricClient } from "../../bibliometrics";
import type { InferenceClient } from "../llm";
import type { SourceAuthorityResolver } from "../source-authority";
import type { CredibilityScore, Document, DocumentMetadata, SignalValue } from "../types";
import { round4 } from "./signals";

export type AuthoritySource = Pick<SourceAuthorityResolver, "resolve" | "resolveDetailed">;

export interface ScorerDeps {
  authority: AuthoritySource;
  inference: InferenceClient;
  /** null when bibliometric lookup is disabled */
  bibliometrics: BibliometricClient | null;
  now?: () => Date;
}

export interface ScorerResult {
  credibility: CredibilityScore;
  /** Entries to merge into the document's metadata */
  metadata: DocumentMetadata;
}

export interface CredibilityScorer {
  score(doc: Document): Promise<ScorerResult>;
}

export function percent(value: number): number {
  return Math.round(value * 100);
}

/**
 * Round every sub-score and derive `overall` from the rounded breakdown
 * under the given weight table.
 */
export function buildScore<K extends string>(
  breakdown: Record<K, number>,
  weights: Readonly<Record<K, number>>,
  explanations: Record<K, string>,
  signals: Record<string, SignalValue>,
): CredibilityScore {
  const rounded: Record<string, number> = {};
  let overall = 0;
  for (const key in weights) {
    const value = round4(breakdown[key]);
    rounded[key] = value;
    overall += weights[key] * value;
  }

  return {
    overall: round4(overall),
    breakdown: rounded,
    explanations: { ...explanations },
    signals: { ...signals },
  };
}
