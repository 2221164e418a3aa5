/**
 * Credibility Pipeline Tests
 *
 * End-to-end runs over fake inference and embeddings with an in-memory
 * trust store; no network.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CREDIBILITY_CONFIG } from "@/lib/config-loader";
import { InMemoryDomainTrustCache } from "@/lib/domain-trust-cache";
import { PersistenceError } from "@/lib/error-classification";
import { createCredibilityServices, type CredibilityServices } from "@/lib/services";
import type { InferenceRequest } from "@/lib/analyzer/llm";
import { hit, type LookupOutcome } from "@/lib/analyzer/lookup-outcome";
import { runCredibilityPipeline, type JobStatusUpdate } from "@/lib/analyzer/pipeline";
import type { Document } from "@/lib/analyzer/types";

const NOW = new Date("2026-06-01T00:00:00.000Z");

const REPLIES: Record<string, string> = {
  wire: '{"claims": ["The trial enrolled 30,000 participants"]}',
  tabloid: '{"claims": ["The trial enrolled only 300 participants"]}',
};

function fakeInference() {
  return {
    complete: vi.fn(async (request: InferenceRequest): Promise<LookupOutcome<string>> => {
      const key = request.prompt.startsWith("Wire") ? "wire" : "tabloid";
      return hit(REPLIES[key]);
    }),
  };
}

/** Every text maps to the same vector, so all claims share one cluster */
function constantEmbedder() {
  return { embed: vi.fn(async (texts: readonly string[]) => texts.map(() => [1, 0])) };
}

function newsDoc(id: string, sourceUrl: string, rawText: string): Document {
  return { id, type: "news_article", sourceUrl, rawText, metadata: {}, claims: [] };
}

const wire = newsDoc("doc-wire", "https://www.reuters.com/health/trial", "Wire report on the trial results.");
const tabloid = newsDoc("doc-tabloid", "https://www.infowars.com/posts/trial", "Tabloid take on the trial results.");

describe("runCredibilityPipeline", () => {
  let services: CredibilityServices;
  let statuses: JobStatusUpdate[];

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    statuses = [];
    services = await createCredibilityServices(DEFAULT_CREDIBILITY_CONFIG, {
      store: new InMemoryDomainTrustCache(90, () => NOW),
      popularity: null,
      inference: fakeInference(),
      bibliometrics: null,
      embedder: constantEmbedder(),
      now: () => NOW,
      env: {},
    });
  });

  afterEach(async () => {
    await services.close();
    vi.restoreAllMocks();
  });

  it("scores, extracts and reconciles a document set", async () => {
    const report = await services.run([wire, tabloid], { onStatus: (u) => void statuses.push(u) });

    expect(statuses).toEqual([{ status: "running" }, { status: "done" }]);
    expect(report.status).toBe("done");
    expect(report.strategy).toBe("majority_vote");

    expect(report.documents.map((d) => d.id)).toEqual(["doc-wire", "doc-tabloid"]);
    expect(report.documents[0].credibility?.breakdown.source_trust).toBe(0.94);
    expect(report.documents[1].credibility?.breakdown.source_trust).toBe(0.1);
    expect(report.documents[0].claims.map((c) => c.text)).toEqual(["The trial enrolled 30,000 participants"]);
    expect(report.documents[1].claims[0].sourceDocId).toBe("doc-tabloid");

    expect(report.conflicts).toHaveLength(1);
    expect(report.conflicts[0].status).toBe("resolved");
    expect(report.conflicts[0].resolution).toBe("The trial enrolled 30,000 participants");
    expect(report.resolvedClaims).toHaveLength(1);
    expect(report.resolvedClaims[0]).toMatchObject({
      text: "The trial enrolled 30,000 participants",
      sourceDocId: "doc-wire",
      confidence: report.documents[0].credibility?.overall,
    });
  });

  it("leaves input documents unchanged", async () => {
    await services.run([wire, tabloid]);
    expect(wire.claims).toEqual([]);
    expect(wire.credibility).toBeUndefined();
  });

  it("skips conflict resolution for a single document", async () => {
    const report = await services.run([wire]);

    expect(report.strategy).toBeNull();
    expect(report.conflicts).toEqual([]);
    expect(report.resolvedClaims).toEqual(report.documents[0].claims);
    expect(services.embedder.embed).not.toHaveBeenCalled();
  });

  it("treats an 'auto' override as the per-type default and honors explicit ones", async () => {
    expect((await services.run([wire, tabloid], { strategyOverride: "auto" })).strategy).toBe("majority_vote");

    const conservative = await services.run([wire, tabloid], { strategyOverride: "conservative" });
    expect(conservative.strategy).toBe("conservative");
    expect(conservative.conflicts[0].status).toBe("unresolved");
    expect(conservative.resolvedClaims[0]).toMatchObject({ sourceDocId: "doc-wire", confidence: 0.4 });
  });

  it("returns an empty report for no documents", async () => {
    const report = await services.run([], { onStatus: (u) => void statuses.push(u) });
    expect(report).toEqual({ documents: [], resolvedClaims: [], conflicts: [], strategy: null, status: "done" });
    expect(statuses).toEqual([{ status: "running" }, { status: "done" }]);
  });

  it("reports failure through onStatus and rethrows", async () => {
    const failure = new PersistenceError("db down");
    const run = runCredibilityPipeline(
      [wire],
      {
        scorers: services.scorers,
        extractor: { extract: vi.fn(async () => Promise.reject(failure)) },
        embedder: services.embedder,
        similarityThreshold: 0.82,
        strategyOptions: { weightedVoteThreshold: 0.15, highTrustThreshold: 0.75 },
      },
      { onStatus: (u) => void statuses.push(u) },
    );

    await expect(run).rejects.toBe(failure);
    expect(statuses).toEqual([{ status: "running" }, { status: "failed", error: "db down" }]);
  });
});
