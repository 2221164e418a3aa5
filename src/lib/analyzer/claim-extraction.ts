/**
 * Claim Extraction Module
 *
 * Extracts atomic factual claims from a document with the inference client.
 * When inference is unavailable or the reply does not parse, claims are
 * taken from the leading sentences of the text instead.
 *
 * @module analyzer/claim-extraction
 */

import { z } from "zod";
import { createClaim } from "./claims";
import { debugLog } from "./debug";
import { parseJsonObject } from "./json";
import type { InferenceClient } from "./llm";
import { describeMiss } from "./lookup-outcome";
import type { Claim, Document, DocumentType } from "./types";

interface ExtractionProfile {
  system: string;
  /** Characters of raw text sent to the model */
  maxInputChars: number;
  /** Sentences considered by the fallback */
  fallbackSentences: number;
  sentenceBoundary: RegExp;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const CLAUSE_BOUNDARY = /(?<=[.;])\s+/;
const MIN_FALLBACK_CLAIM_CHARS = 40;

const JSON_INSTRUCTION = 'Return a JSON object with key "claims" containing an array of strings.';

const NEWS_PROFILE: ExtractionProfile = {
  system: `Extract 5-8 key factual claims from this news article. Each claim must be a single assertive sentence. ${JSON_INSTRUCTION}`,
  maxInputChars: 4000,
  fallbackSentences: 8,
  sentenceBoundary: SENTENCE_BOUNDARY,
};

export const EXTRACTION_PROFILES: Readonly<Record<DocumentType, ExtractionProfile>> = {
  research_paper: {
    system:
      "You are a scientific research assistant. Extract 8-12 key factual claims from the paper, covering " +
      `the problem, methodology, results and conclusions. Each claim must be a single precise sentence. ${JSON_INSTRUCTION}`,
    maxInputChars: 4000,
    fallbackSentences: 10,
    sentenceBoundary: SENTENCE_BOUNDARY,
  },
  news_article: NEWS_PROFILE,
  blog_post: {
    system: `Extract 4-6 key factual claims from this blog post. ${JSON_INSTRUCTION}`,
    maxInputChars: 3000,
    fallbackSentences: 6,
    sentenceBoundary: SENTENCE_BOUNDARY,
  },
  legal_document: {
    system: `Extract 5-8 key legal provisions or findings, one sentence each. ${JSON_INSTRUCTION}`,
    maxInputChars: 4000,
    fallbackSentences: 8,
    sentenceBoundary: CLAUSE_BOUNDARY,
  },
  unknown: NEWS_PROFILE,
};

const ClaimsReplySchema = z.object({
  claims: z.array(z.unknown()),
});

/**
 * Claim texts from a model reply, or null when the reply has no usable
 * `claims` array. Non-string entries are dropped.
 */
export function parseClaimsReply(text: string): string[] | null {
  const parsed = ClaimsReplySchema.safeParse(parseJsonObject(text));
  if (!parsed.success) return null;

  const claims = parsed.data.claims
    .filter((c): c is string => typeof c === "string")
    .map((c) => c.trim())
    .filter(Boolean);
  return claims.length > 0 ? claims : null;
}

/**
 * Leading sentences longer than 40 characters.
 */
export function sentenceClaims(doc: Document, profile: ExtractionProfile = EXTRACTION_PROFILES[doc.type]): Claim[] {
  return doc.rawText
    .split(profile.sentenceBoundary)
    .slice(0, profile.fallbackSentences)
    .map((s) => s.trim())
    .filter((s) => s.length > MIN_FALLBACK_CLAIM_CHARS)
    .map((s) => createClaim(s, doc.id));
}

export class ClaimExtractor {
  constructor(private readonly inference: InferenceClient) {}

  async extract(doc: Document): Promise<Claim[]> {
    const profile = EXTRACTION_PROFILES[doc.type];
    const outcome = await this.inference.complete({
      task: "claim_extraction",
      system: profile.system,
      prompt: doc.rawText.substring(0, profile.maxInputChars),
      maxOutputTokens: 800,
    });

    if (outcome.kind === "miss") {
      debugLog(`[Claims] ${doc.id}: extraction missed, using sentence fallback`, describeMiss(outcome));
      return sentenceClaims(doc, profile);
    }

    const texts = parseClaimsReply(outcome.value);
    if (!texts) {
      debugLog(`[Claims] ${doc.id}: unparsable extraction reply, using sentence fallback`, outcome.value.substring(0, 300));
      return sentenceClaims(doc, profile);
    }

    console.log(`[Claims] ${doc.id}: extracted ${texts.length} claims`);
    return texts.map((t) => createClaim(t, doc.id));
  }
}
