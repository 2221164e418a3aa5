/**
 * Conflict Resolution Engine
 *
 * Clusters the claims of a scored document set and reconciles every cluster
 * that spans more than one document with the selected strategy.
 *
 * @module analyzer/conflict-resolution
 */

import { createClaim } from "./claims";
import { clusterClaims, DEFAULT_SIMILARITY_THRESHOLD } from "./claim-clustering";
import {
  DEFAULT_STRATEGY_BY_TYPE,
  DEFAULT_STRATEGY_OPTIONS,
  resolveStrategyName,
  STRATEGIES,
  type CredibilityMap,
  type StrategyName,
  type StrategyOptions,
} from "./conflict-strategies";
import type { TextEmbedder } from "./llm";
import type { Claim, Conflict, Document, DocumentType } from "./types";

const UNSCORED_CREDIBILITY = 0.5;
/** Confidence of the best-effort representative of an unresolved cluster */
export const UNRESOLVED_CONFIDENCE = 0.4;
const TOPIC_LENGTH = 80;

export interface ConflictResolutionOptions {
  strategyOverride?: string | null;
  similarityThreshold?: number;
  strategyOptions?: Partial<StrategyOptions>;
}

export interface ConflictResolutionResult {
  resolvedClaims: Claim[];
  conflicts: Conflict[];
  /** Strategy applied to multi-document clusters, null when none ran */
  strategy: StrategyName | null;
}

export function buildCredibilityMap(documents: readonly Document[]): CredibilityMap {
  return new Map(documents.map((d) => [d.id, d.credibility?.overall ?? UNSCORED_CREDIBILITY]));
}

/**
 * Most frequent document type; ties go to the type seen first.
 */
export function dominantDocumentType(documents: readonly Document[]): DocumentType {
  const counts = new Map<DocumentType, number>();
  for (const doc of documents) {
    counts.set(doc.type, (counts.get(doc.type) ?? 0) + 1);
  }

  let dominant: DocumentType = "unknown";
  let best = 0;
  for (const [type, count] of counts) {
    if (count > best) {
      dominant = type;
      best = count;
    }
  }
  return dominant;
}

export function selectStrategy(documents: readonly Document[], override?: string | null): StrategyName {
  if (override) return resolveStrategyName(override);
  return DEFAULT_STRATEGY_BY_TYPE[dominantDocumentType(documents)];
}

export function topicFor(claim: Claim): string {
  return `${claim.text.substring(0, TOPIC_LENGTH)}…`;
}

export async function resolveConflicts(
  documents: readonly Document[],
  embedder: TextEmbedder,
  options: ConflictResolutionOptions = {},
): Promise<ConflictResolutionResult> {
  if (documents.length === 1) {
    return { resolvedClaims: [...documents[0].claims], conflicts: [], strategy: null };
  }

  const credibility = buildCredibilityMap(documents);
  const strategyName = selectStrategy(documents, options.strategyOverride);
  const strategy = STRATEGIES[strategyName];
  const strategyOptions: StrategyOptions = { ...DEFAULT_STRATEGY_OPTIONS, ...options.strategyOptions };

  const allClaims = documents.flatMap((d) => d.claims);
  if (allClaims.length === 0) {
    return { resolvedClaims: [], conflicts: [], strategy: strategyName };
  }

  const clusters = await clusterClaims(allClaims, embedder, options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD);

  const resolvedClaims: Claim[] = [];
  const conflicts: Conflict[] = [];

  for (const cluster of clusters) {
    const first = cluster[0];

    // Single claim, or the same document repeating itself
    if (cluster.length === 1 || cluster.every((c) => c.sourceDocId === first.sourceDocId)) {
      resolvedClaims.push(first);
      continue;
    }

    const conflict: Conflict = { ...strategy(cluster, credibility, strategyOptions), topic: topicFor(first) };
    conflicts.push(conflict);

    if (conflict.status === "resolved" && conflict.resolution) {
      resolvedClaims.push(createClaim(conflict.resolution, first.sourceDocId, conflict.confidence));
    } else {
      const representative = mostCredible(cluster, credibility);
      resolvedClaims.push(createClaim(representative.text, representative.sourceDocId, UNRESOLVED_CONFIDENCE));
    }
  }

  console.log(
    `[Conflict] ${strategyName}: ${clusters.length} clusters, ${conflicts.length} conflicts ` +
      `(${conflicts.filter((c) => c.status === "unresolved").length} unresolved)`,
  );
  return { resolvedClaims, conflicts, strategy: strategyName };
}

function mostCredible(cluster: readonly Claim[], credibility: CredibilityMap): Claim {
  let best = cluster[0];
  for (const claim of cluster) {
    if ((credibility.get(claim.sourceDocId) ?? 0) > (credibility.get(best.sourceDocId) ?? 0)) {
      best = claim;
    }
  }
  return best;
}
