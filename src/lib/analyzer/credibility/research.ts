/**
 * Research paper credibility.
 *
 * Three modes, chosen by data availability:
 * - `academic_blend`: bibliometric record found; authority, venue, citations,
 *   recency and lead-author h-index all contribute.
 * - `authority_only`: no bibliometric record, but a source URL; the source
 *   domain carries most of the weight.
 * - `unknown`: neither; authority is a fixed neutral-low constant.
 *
 * @module analyzer/credibility/research
 */

import type { PaperMetadata } from "../../bibliometrics";
import { debugLog } from "../debug";
import { describeMiss } from "../lookup-outcome";
import type { Document } from "../types";
import { band, citationCountScore, halfLifeDecay, lookupTier } from "./signals";
import { buildScore, percent, type CredibilityScorer, type ScorerDeps, type ScorerResult } from "./scorer";
import { RESEARCH_WEIGHTS, VENUE_TIERS, type ResearchScoringMethod } from "./weights";

const UNKNOWN_MODE_AUTHORITY = 0.4;
const RECENCY_HALF_LIFE_YEARS = 5;
const H_INDEX_SATURATION = 60;

export function paperRecency(year: number | null, now: Date): number {
  if (!year) return 0.5;
  return halfLifeDecay(now.getUTCFullYear() - year, RECENCY_HALF_LIFE_YEARS);
}

export function venueScore(venue: string): number {
  return lookupTier(venue, VENUE_TIERS, 0, 0.55);
}

export function hIndexScore(hIndices: readonly number[]): number {
  if (hIndices.length === 0) return 0;
  return Math.min(Math.max(...hIndices) / H_INDEX_SATURATION, 1);
}

export function isPeerReviewed(paper: PaperMetadata | null): boolean {
  if (!paper) return false;
  return (
    paper.publicationTypes.some((t) => t === "JournalArticle" || t === "Conference") ||
    paper.venue.toLowerCase().includes("journal")
  );
}

export class ResearchPaperScorer implements CredibilityScorer {
  constructor(private readonly deps: ScorerDeps) {}

  async score(doc: Document): Promise<ScorerResult> {
    const now = this.deps.now?.() ?? new Date();
    const title = doc.title?.trim() || doc.rawText.substring(0, 200);

    const paper = await this.lookupPaper(title);
    const year = paper?.year ?? null;
    const venue = paper?.venue ?? "";
    const citations = paper?.citationCount ?? null;
    const peerReviewed = isPeerReviewed(paper);
    const recency = paperRecency(year, now);

    const method: ResearchScoringMethod = paper ? "academic_blend" : doc.sourceUrl ? "authority_only" : "unknown";

    let authority: number | null = null;
    let authorityMethod: string | null = null;
    if (method !== "unknown") {
      const resolution = await this.deps.authority.resolveDetailed(doc.sourceUrl);
      authority = resolution.score;
      authorityMethod = resolution.method;
    }

    const signals = {
      citation_count_raw: citations,
      publication_year: year,
      venue,
      peer_reviewed: peerReviewed,
      source_url: doc.sourceUrl,
      scoring_method: method,
      authority_method: authorityMethod,
    };

    const metadata = {
      citations,
      year,
      venue,
      peer_reviewed: peerReviewed,
      source_authority: authority,
    };

    if (paper && authority !== null) {
      const venueS = venueScore(venue);
      const citationS = citationCountScore(citations);
      const hIndexS = hIndexScore(paper.authorHIndices);
      const leadHIndex = paper.authorHIndices.length > 0 ? Math.max(...paper.authorHIndices) : 0;

      const credibility = buildScore(
        {
          source_authority: authority,
          venue_tier: venueS,
          citation_count: citationS,
          recency,
          author_hindex: hIndexS,
        },
        RESEARCH_WEIGHTS.academic_blend,
        {
          source_authority: `Domain authority score: ${percent(authority)}% - ${authority >= 0.7 ? "known trustworthy source" : "unverified or lower-trust domain"}`,
          venue_tier: `Published in '${venue || "unknown venue"}' - ${band(venueS, [[0.85, "top-tier peer-reviewed venue"], [0.5, "mid-tier or preprint venue"]], "unknown or low-tier venue")}`,
          citation_count: `${citations ?? "unknown"} citation${citations === 1 ? "" : "s"} - ${band(citationS, [[0.7, "highly cited"], [0.3, "moderately cited"]], "few or no citations found")}`,
          recency: `Published in ${year ?? "unknown year"} - ${band(recency, [[0.85, "very recent"], [0.6, "fairly recent"]], "older work")} (5-year half-life decay applied)`,
          author_hindex: `Lead author h-index: ${leadHIndex} - ${band(hIndexS, [[0.6, "highly prolific researcher"], [0.3, "established researcher"]], "limited publication history found")}`,
        },
        signals,
      );
      return { credibility, metadata };
    }

    const recencyText = `Estimated publication year: ${year ?? "unknown"} - ${recency >= 0.7 ? "recent" : "older content"}`;

    if (authority !== null) {
      const credibility = buildScore(
        { source_authority: authority, recency },
        RESEARCH_WEIGHTS.authority_only,
        {
          source_authority: `Domain authority score: ${percent(authority)}% - no academic metadata found; relying on source domain trust`,
          recency: recencyText,
        },
        signals,
      );
      return { credibility, metadata };
    }

    const credibility = buildScore(
      { source_authority: UNKNOWN_MODE_AUTHORITY, recency },
      RESEARCH_WEIGHTS.unknown,
      {
        source_authority: `Unknown domain and no academic metadata - defaulting to neutral-low authority (${UNKNOWN_MODE_AUTHORITY})`,
        recency: recencyText,
      },
      signals,
    );
    return { credibility, metadata };
  }

  private async lookupPaper(title: string): Promise<PaperMetadata | null> {
    if (!this.deps.bibliometrics) return null;
    const outcome = await this.deps.bibliometrics.lookupPaper(title);
    if (outcome.kind === "miss") {
      debugLog(`[Cred] No bibliometric record for "${title.substring(0, 60)}"`, describeMiss(outcome));
      return null;
    }
    return outcome.value;
  }
}
