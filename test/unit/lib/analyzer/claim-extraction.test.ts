import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ClaimExtractor, EXTRACTION_PROFILES, parseClaimsReply, sentenceClaims } from "@/lib/analyzer/claim-extraction";
import type { InferenceRequest } from "@/lib/analyzer/llm";
import { hit, miss, type LookupOutcome } from "@/lib/analyzer/lookup-outcome";
import type { Document, DocumentType } from "@/lib/analyzer/types";

function makeDoc(type: DocumentType, rawText: string): Document {
  return { id: "doc-1", type, sourceUrl: null, rawText, metadata: {}, claims: [] };
}

function fakeInference(outcome: LookupOutcome<string>) {
  return { complete: vi.fn(async (_request: InferenceRequest) => outcome) };
}

const LONG_SENTENCE = "The city council approved the new transit budget on Tuesday.";

describe("parseClaimsReply", () => {
  it("keeps trimmed non-empty strings", () => {
    expect(parseClaimsReply('Here you go: {"claims": [" First claim. ", 42, "", "Second claim"]}')).toEqual([
      "First claim.",
      "Second claim",
    ]);
  });

  it.each(['{"claims": []}', '{"claims": [1, null]}', '{"items": ["x"]}', "no json at all"])("returns null for %j", (reply) => {
    expect(parseClaimsReply(reply)).toBeNull();
  });
});

describe("sentenceClaims", () => {
  it("takes leading sentences longer than 40 characters", () => {
    const claims = sentenceClaims(makeDoc("news_article", `Breaking. ${LONG_SENTENCE} Too short here!`));
    expect(claims.map((c) => c.text)).toEqual([LONG_SENTENCE]);
    expect(claims[0]).toMatchObject({ sourceDocId: "doc-1", confidence: 1 });
  });

  it("limits the number of sentences per document type", () => {
    const text = Array.from({ length: 12 }, (_, i) => `Sentence number ${i} describes a measurable fact about the project.`).join(" ");
    expect(sentenceClaims(makeDoc("news_article", text))).toHaveLength(8);
    expect(sentenceClaims(makeDoc("blog_post", text))).toHaveLength(6);
    expect(sentenceClaims(makeDoc("research_paper", text))).toHaveLength(10);
  });

  it("splits legal text on semicolons", () => {
    const text = "The tenant shall pay rent on the first day of each month; the landlord shall maintain the building in good repair.";
    expect(sentenceClaims(makeDoc("legal_document", text)).map((c) => c.text)).toEqual([
      "The tenant shall pay rent on the first day of each month;",
      "the landlord shall maintain the building in good repair.",
    ]);
  });
});

describe("ClaimExtractor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("turns the model reply into claims for the document", async () => {
    const inference = fakeInference(hit('{"claims": ["Rents rose 5% in 2025", "Vacancy fell to 3%"]}'));
    const doc = makeDoc("news_article", LONG_SENTENCE);

    const claims = await new ClaimExtractor(inference).extract(doc);

    expect(claims.map((c) => c.text)).toEqual(["Rents rose 5% in 2025", "Vacancy fell to 3%"]);
    expect(claims.every((c) => c.sourceDocId === "doc-1" && c.confidence === 1)).toBe(true);
    expect(new Set(claims.map((c) => c.id)).size).toBe(2);
    expect(inference.complete).toHaveBeenCalledWith({
      task: "claim_extraction",
      system: EXTRACTION_PROFILES.news_article.system,
      prompt: LONG_SENTENCE,
      maxOutputTokens: 800,
    });
  });

  it("truncates the prompt to the profile's input limit", async () => {
    const inference = fakeInference(hit('{"claims": ["x"]}'));
    await new ClaimExtractor(inference).extract(makeDoc("blog_post", "a".repeat(5000)));

    expect(inference.complete.mock.calls[0][0].prompt).toHaveLength(3000);
  });

  it("uses the news profile for unknown documents", async () => {
    const inference = fakeInference(hit('{"claims": ["x"]}'));
    await new ClaimExtractor(inference).extract(makeDoc("unknown", "text"));

    expect(inference.complete.mock.calls[0][0].system).toBe(EXTRACTION_PROFILES.news_article.system);
  });

  it("falls back to sentences when inference misses", async () => {
    const claims = await new ClaimExtractor(fakeInference(miss<string>("timeout"))).extract(makeDoc("news_article", LONG_SENTENCE));
    expect(claims.map((c) => c.text)).toEqual([LONG_SENTENCE]);
  });

  it("falls back to sentences when the reply does not parse", async () => {
    const claims = await new ClaimExtractor(fakeInference(hit("I could not find any claims."))).extract(
      makeDoc("news_article", LONG_SENTENCE),
    );
    expect(claims.map((c) => c.text)).toEqual([LONG_SENTENCE]);
  });
});
