/**
 * Claim Clustering Module
 *
 * Groups semantically equivalent claims with greedy seed single-linkage:
 * claims are visited in input order, each unassigned claim seeds a new
 * cluster and pulls in every later unassigned claim whose embedding is
 * within the similarity threshold of the seed. Members are compared to the
 * seed only, never to each other.
 *
 * @module analyzer/claim-clustering
 */

import { cosineSimilarity } from "ai";
import type { TextEmbedder } from "./llm";
import type { Claim } from "./types";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.82;

/**
 * Partition claims into clusters. Every claim lands in exactly one cluster;
 * clusters and their members keep input order.
 *
 * When the embedder fails every claim becomes its own cluster.
 */
export async function clusterClaims(
  claims: readonly Claim[],
  embedder: TextEmbedder,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): Promise<Claim[][]> {
  if (claims.length === 0) return [];

  const vectors = await embedClaims(claims, embedder);
  if (!vectors) {
    return claims.map((c) => [c]);
  }

  const assigned = new Array<boolean>(claims.length).fill(false);
  const clusters: Claim[][] = [];

  for (let i = 0; i < claims.length; i++) {
    if (assigned[i]) continue;
    assigned[i] = true;
    const cluster = [claims[i]];

    for (let j = i + 1; j < claims.length; j++) {
      if (assigned[j]) continue;
      if (cosineSimilarity(vectors[i], vectors[j]) >= threshold) {
        assigned[j] = true;
        cluster.push(claims[j]);
      }
    }

    clusters.push(cluster);
  }

  console.log(`[Conflict] Clustered ${claims.length} claims into ${clusters.length} groups (threshold=${threshold})`);
  return clusters;
}

async function embedClaims(claims: readonly Claim[], embedder: TextEmbedder): Promise<number[][] | null> {
  try {
    const vectors = await embedder.embed(claims.map((c) => c.text));
    if (vectors.length !== claims.length) {
      console.warn(`[Conflict] Embedder returned ${vectors.length} vectors for ${claims.length} claims; leaving claims unclustered`);
      return null;
    }
    return vectors;
  } catch (error) {
    console.warn("[Conflict] Claim embedding failed; leaving claims unclustered:", error instanceof Error ? error.message : String(error));
    return null;
  }
}
