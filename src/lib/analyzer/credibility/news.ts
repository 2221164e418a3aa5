/**
 * News article credibility: outlet trust, recency, quoted and named
 * sources, cross-source corroboration and author byline.
 */

import { STATIC_OVERRIDES } from "../source-authority";
import type { Document } from "../types";
import {
  band,
  clamp01,
  countMatches,
  metadataNumber,
  metadataString,
  recencyFromDate,
} from "./signals";
import { buildScore, percent, type CredibilityScorer, type ScorerDeps, type ScorerResult } from "./scorer";
import { NEWS_WEIGHTS } from "./weights";

const BYLINE_PATTERN = /\bBy\s+[A-Z][a-z]+\s+[A-Z][a-z]+|\bReported\s+by\b|\bStaff\s+Writer\b/;
const QUOTE_PATTERN = /"[^"]{20,}"/g;
const NAMED_SOURCE_PATTERN = /(?:said|told|according\s+to|stated|confirmed)\s+[A-Z]/g;

const UNKNOWN_SOURCE_TRUST = 0.5;

export function bylineScore(text: string): number {
  return BYLINE_PATTERN.test(text) ? 0.9 : 0.3;
}

export function primaryCitationScore(text: string): number {
  const quoted = countMatches(text, QUOTE_PATTERN);
  const named = countMatches(text, NAMED_SOURCE_PATTERN);
  return Math.max(Math.min(quoted * 0.1 + named * 0.08, 1), 0.2);
}

/**
 * Match a publisher name against the override table when there is no URL.
 * "BBC News" matches bbc.com, "The Guardian" matches theguardian.com: the
 * leading words, joined, must equal the domain's first label.
 */
export function publisherTrust(publisher: string): number | null {
  const words = publisher.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const prefixes = new Set<string>();
  for (let i = 1; i <= Math.min(words.length, 3); i++) {
    prefixes.add(words.slice(0, i).join(""));
  }

  for (const [domain, score] of STATIC_OVERRIDES) {
    const label = domain.split(".")[0];
    if (prefixes.has(label)) return score;
  }
  return null;
}

export class NewsArticleScorer implements CredibilityScorer {
  constructor(private readonly deps: ScorerDeps) {}

  async score(doc: Document): Promise<ScorerResult> {
    const now = this.deps.now?.() ?? new Date();
    const publisher = metadataString(doc.metadata, "publisher");
    const publishedDate = metadataString(doc.metadata, "published_date");

    const { trust, method } = await this.sourceTrust(doc.sourceUrl, publisher);
    const recency = recencyFromDate(publishedDate, { halfLifeDays: 365, floor: 0.1, unknownScore: 0.5, now });
    const citations = primaryCitationScore(doc.rawText);
    const corroboration = clamp01(metadataNumber(doc.metadata, "corroboration_score") ?? 0.5);
    const byline = bylineScore(doc.rawText);

    const credibility = buildScore(
      {
        source_trust: trust,
        recency,
        primary_citations: citations,
        corroboration,
        byline,
      },
      NEWS_WEIGHTS,
      {
        source_trust: `${band(trust, [[0.85, "High-trust outlet"], [0.6, "Moderate-trust outlet"]], "Low-trust or unverified outlet")} - domain trust score: ${percent(trust)}%`,
        recency: `${band(recency, [[0.8, "Very recent"], [0.5, "Fairly recent"]], "Older article")} - score: ${percent(recency)}% (1-year half-life applied)`,
        primary_citations: `${band(citations, [[0.5, "Good number of"], [0.3, "Some"]], "Few")} named sources and direct quotes detected - score: ${percent(citations)}%`,
        corroboration: `Cross-source corroboration score: ${percent(corroboration)}%`,
        byline:
          byline >= 0.8
            ? "Named author byline detected - increases accountability"
            : "No clear author byline found - reduces accountability signal",
      },
      {
        source_url: doc.sourceUrl,
        publisher,
        published_date: publishedDate,
        scoring_method: "news",
        authority_method: method,
      },
    );

    return {
      credibility,
      metadata: { source_trust_score: trust },
    };
  }

  private async sourceTrust(url: string | null, publisher: string | null): Promise<{ trust: number; method: string }> {
    if (url) {
      const resolution = await this.deps.authority.resolveDetailed(url);
      return { trust: resolution.score, method: resolution.method };
    }
    if (publisher) {
      const fromPublisher = publisherTrust(publisher);
      if (fromPublisher !== null) return { trust: fromPublisher, method: "publisher" };
    }
    return { trust: UNKNOWN_SOURCE_TRUST, method: "default" };
  }
}
