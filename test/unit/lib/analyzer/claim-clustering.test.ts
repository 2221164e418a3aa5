import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clusterClaims } from "@/lib/analyzer/claim-clustering";
import { createClaim } from "@/lib/analyzer/claims";

function embedderFrom(vectors: Record<string, number[]>) {
  return { embed: vi.fn(async (texts: readonly string[]) => texts.map((t) => vectors[t] ?? [0, 0])) };
}

describe("clusterClaims", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const a = createClaim("Unemployment fell to 4 percent in May", "doc-a");
  const b = createClaim("Joblessness dropped to 4% last May", "doc-b");
  const c = createClaim("The central bank held rates steady", "doc-b");

  const embedder = embedderFrom({
    [a.text]: [1, 0],
    [b.text]: [0.9, 0.436],
    [c.text]: [0.6, 0.8],
  });

  it("groups claims within the threshold of the seed, in input order", async () => {
    const clusters = await clusterClaims([a, b, c], embedder, 0.82);
    expect(clusters).toEqual([[a, b], [c]]);
    expect(clusters[0][0]).toBe(a);
  });

  it("compares members against the seed only", async () => {
    // c is close to b (0.89) but not to the seed a (0.6)
    const clusters = await clusterClaims([a, b, c], embedder, 0.85);
    expect(clusters).toEqual([[a, b], [c]]);
  });

  it("keeps every claim separate under a strict threshold", async () => {
    const clusters = await clusterClaims([a, b, c], embedder, 0.99);
    expect(clusters).toEqual([[a], [b], [c]]);
  });

  it("does not call the embedder for no claims", async () => {
    const empty = embedderFrom({});
    expect(await clusterClaims([], empty)).toEqual([]);
    expect(empty.embed).not.toHaveBeenCalled();
  });

  it("leaves claims unclustered when embedding fails", async () => {
    const failing = {
      embed: vi.fn(async (_texts: readonly string[]): Promise<number[][]> => {
        throw new Error("embedding service unavailable");
      }),
    };
    expect(await clusterClaims([a, b], failing)).toEqual([[a], [b]]);
  });

  it("leaves claims unclustered when the vector count is wrong", async () => {
    const short = { embed: vi.fn(async (_texts: readonly string[]) => [[1, 0]]) };
    expect(await clusterClaims([a, b], short)).toEqual([[a], [b]]);
  });
});
