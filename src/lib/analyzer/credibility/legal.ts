/**
 * Legal document credibility: official publishing domain, jurisdiction
 * language, formal statute citations and recency.
 */

import type { Document } from "../types";
import { halfLifeDecay, metadataString, parseDate, saturatingCount } from "./signals";
import { buildScore, percent, type CredibilityScorer, type ScorerDeps, type ScorerResult } from "./scorer";
import { JURISDICTION_TIERS, LEGAL_WEIGHTS, OFFICIAL_LEGAL_DOMAINS } from "./weights";

const STATUTE_PATTERNS: readonly RegExp[] = [
  /\b\d+\s+U\.?S\.?C\.?\s+§\s*\d+/, // US Code
  /\bPub\.?\s*L\.?\s+\d+-\d+/, // Public Law
  /\b\d+\s+C\.?F\.?R\.?\s+§\s*\d+/, // CFR
  /\bArticle\s+\d+\b/,
  /(?:\bSection|§)\s+\d+/,
];

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;
const RECENCY_HALF_LIFE_YEARS = 15;
const RECENCY_FLOOR = 0.2;

export function officialSourceScore(url: string | null): number {
  if (!url) return 0.4;
  const lowered = url.toLowerCase();
  return OFFICIAL_LEGAL_DOMAINS.some((d) => lowered.includes(d)) ? 1.0 : 0.45;
}

/**
 * Highest-authority jurisdiction keyword in the text, 0.5 when none.
 * Keywords match anywhere, so "federally" counts as federal.
 */
export function jurisdictionScore(text: string): number {
  const lowered = text.toLowerCase();
  let best = 0.5;
  for (const [keyword, score] of JURISDICTION_TIERS) {
    if (lowered.includes(keyword)) {
      best = Math.max(best, score);
    }
  }
  return best;
}

/** 0.2 per distinct statute citation form present, 0.25 when none */
export function statuteScore(text: string): number {
  const found = STATUTE_PATTERNS.filter((p) => p.test(text)).length;
  return saturatingCount(found, 0.2, 0.25);
}

/**
 * Recency from the published date, or from the first year mentioned in the
 * text when the document carries no date.
 */
export function legalRecency(text: string, publishedDate: string | null, now: Date): number {
  const yearsSince = (year: number) => Math.max(now.getUTCFullYear() - year, 0);

  if (!publishedDate) {
    const match = YEAR_PATTERN.exec(text);
    if (!match) return 0.5;
    return halfLifeDecay(yearsSince(Number(match[0])), RECENCY_HALF_LIFE_YEARS, RECENCY_FLOOR);
  }

  const date = parseDate(publishedDate);
  if (!date) return 0.5;
  const ageYears = (now.getTime() - date.getTime()) / (365 * 24 * 60 * 60 * 1000);
  return halfLifeDecay(ageYears, RECENCY_HALF_LIFE_YEARS, RECENCY_FLOOR);
}

export class LegalDocumentScorer implements CredibilityScorer {
  constructor(private readonly deps: Pick<ScorerDeps, "now">) {}

  async score(doc: Document): Promise<ScorerResult> {
    const now = this.deps.now?.() ?? new Date();
    const publishedDate = metadataString(doc.metadata, "published_date");

    const official = officialSourceScore(doc.sourceUrl);
    const jurisdiction = jurisdictionScore(doc.rawText);
    const statutes = statuteScore(doc.rawText);
    const recency = legalRecency(doc.rawText, publishedDate, now);

    const credibility = buildScore(
      {
        official_source: official,
        jurisdiction_authority: jurisdiction,
        statute_citations: statutes,
        recency,
      },
      LEGAL_WEIGHTS,
      {
        official_source:
          official >= 0.9
            ? "Official government or court domain detected (.gov, .gov.uk, ...) - high authority"
            : `No official government domain found (URL: ${doc.sourceUrl ?? "none"}) - may be a secondary or unofficial source`,
        jurisdiction_authority:
          jurisdiction >= 0.75
            ? `High-authority jurisdiction language detected (e.g. Supreme Court, Federal) - score: ${percent(jurisdiction)}%`
            : `Standard or unspecified jurisdiction - score: ${percent(jurisdiction)}%`,
        statute_citations:
          statutes >= 0.4
            ? `Statute/code references found (U.S.C., C.F.R., Article, Section) - score: ${percent(statutes)}%`
            : "Few or no formal statute citations detected - may reduce legal authority",
        recency:
          recency >= 0.7
            ? `Document appears recent - score: ${percent(recency)}% (15-year half-life for legal documents)`
            : `Document may be older - score: ${percent(recency)}% (laws may have been amended since publication)`,
      },
      {
        source_url: doc.sourceUrl,
        published_date: publishedDate,
        scoring_method: "legal",
      },
    );

    return { credibility, metadata: {} };
  }
}
