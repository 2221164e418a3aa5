/**
 * Blog post credibility: hosting domain, LLM-assessed author credentials,
 * outbound references and recency.
 */

import { debugLog } from "../debug";
import { parseUnitScore } from "../json";
import { describeMiss } from "../lookup-outcome";
import type { Document } from "../types";
import { band, countMatches, findTier, metadataString, recencyFromDate, saturatingCount } from "./signals";
import { buildScore, percent, type CredibilityScorer, type ScorerDeps, type ScorerResult } from "./scorer";
import { BLOG_PLATFORMS, BLOG_WEIGHTS } from "./weights";

const LINK_PATTERN = /https?:\/\/[^\s)>"]+/g;
const NEUTRAL_AUTHOR_SCORE = 0.5;
const AUTHOR_SAMPLE_CHARS = 2000;

const AUTHOR_CREDENTIALS_SYSTEM =
  "Based on any author bio, introduction or writing style in the text, rate the author's apparent " +
  "expertise and credentials on a scale of 0.0 to 1.0. " +
  'Return ONLY a JSON object: {"score": <float>}';

export function countLinks(text: string): number {
  return countMatches(text, LINK_PATTERN);
}

export function referencesScore(linkCount: number): number {
  return saturatingCount(linkCount, 0.08, 0.2);
}

export class BlogPostScorer implements CredibilityScorer {
  constructor(private readonly deps: ScorerDeps) {}

  async score(doc: Document): Promise<ScorerResult> {
    const now = this.deps.now?.() ?? new Date();
    const publishedDate = metadataString(doc.metadata, "published_date");

    const [domain, author] = await Promise.all([this.domainScore(doc.sourceUrl), this.authorCredentials(doc.rawText)]);
    const links = countLinks(doc.rawText);
    const references = referencesScore(links);
    const recency = recencyFromDate(publishedDate, { halfLifeDays: 730, floor: 0.1, unknownScore: 0.4, now });

    const credibility = buildScore(
      {
        domain_authority: domain,
        author_credentials: author,
        external_references: references,
        recency,
      },
      BLOG_WEIGHTS,
      {
        domain_authority:
          `${band(domain, [[0.8, "High-authority domain"], [0.55, "Moderate-authority domain"]], "Low or unknown domain authority")} - score: ${percent(domain)}%` +
          (doc.sourceUrl ? ` (source: ${doc.sourceUrl})` : " (no URL provided)"),
        author_credentials: `${band(author, [[0.75, "Strong author credentials detected"], [0.45, "Some author credentials detected"]], "Limited or no author credentials found")} via LLM assessment - score: ${percent(author)}%`,
        external_references: `${links} external link${links === 1 ? "" : "s"} found in document - ${band(references, [[0.5, "well-referenced"], [0.25, "moderately referenced"]], "few or no external sources cited")}`,
        recency: `${band(recency, [[0.7, "Recent"], [0.4, "Somewhat dated"]], "Older")} post - score: ${percent(recency)}% (2-year half-life for blog content)`,
      },
      {
        source_url: doc.sourceUrl,
        published_date: publishedDate,
        external_link_count: links,
        scoring_method: "blog",
      },
    );

    return { credibility, metadata: {} };
  }

  private async domainScore(url: string | null): Promise<number> {
    if (!url) return 0.4;
    return findTier(url, BLOG_PLATFORMS) ?? this.deps.authority.resolve(url);
  }

  private async authorCredentials(text: string): Promise<number> {
    const outcome = await this.deps.inference.complete({
      task: "author_credentials",
      system: AUTHOR_CREDENTIALS_SYSTEM,
      prompt: text.substring(0, AUTHOR_SAMPLE_CHARS),
      maxOutputTokens: 60,
    });
    if (outcome.kind === "miss") {
      debugLog("[Cred] Author credential assessment missed", describeMiss(outcome));
      return NEUTRAL_AUTHOR_SCORE;
    }
    return parseUnitScore(outcome.value) ?? NEUTRAL_AUTHOR_SCORE;
  }
}
