/**
 * Credibility Pipeline
 *
 * Runs one job over a document set: score and extract claims for every
 * document concurrently, then reconcile claims across documents. Single
 * document jobs skip conflict resolution.
 *
 * The job owner observes status through `onStatus`; a failure is reported
 * as `failed` with the error message and then rethrown.
 *
 * @module analyzer/pipeline
 */

import { classifyError } from "../error-classification";
import type { ClaimExtractor } from "./claim-extraction";
import { resolveConflicts } from "./conflict-resolution";
import type { StrategyName, StrategyOptions } from "./conflict-strategies";
import { scoreDocument, type ScorerRegistry } from "./credibility";
import { debugLog } from "./debug";
import type { TextEmbedder } from "./llm";
import type { Claim, Conflict, Document } from "./types";

export type JobStatus = "running" | "done" | "failed";

export interface JobStatusUpdate {
  status: JobStatus;
  /** Set when status is "failed" */
  error?: string;
}

export interface PipelineServices {
  scorers: ScorerRegistry;
  extractor: Pick<ClaimExtractor, "extract">;
  embedder: TextEmbedder;
  similarityThreshold: number;
  strategyOptions: StrategyOptions;
}

export interface PipelineOptions {
  /** Strategy name, or "auto" / null for the per-type default */
  strategyOverride?: string | null;
  onStatus?: (update: JobStatusUpdate) => void | Promise<void>;
}

export interface PipelineReport {
  documents: Document[];
  resolvedClaims: Claim[];
  conflicts: Conflict[];
  strategy: StrategyName | null;
  status: "done";
}

async function processDocument(doc: Document, services: PipelineServices): Promise<Document> {
  const scored = await scoreDocument(services.scorers, doc);
  const claims = await services.extractor.extract(scored);
  return { ...scored, claims };
}

export async function runCredibilityPipeline(
  documents: readonly Document[],
  services: PipelineServices,
  options: PipelineOptions = {},
): Promise<PipelineReport> {
  const notify = async (update: JobStatusUpdate) => {
    debugLog(`[Pipeline] status=${update.status}`, update.error);
    await options.onStatus?.(update);
  };

  await notify({ status: "running" });

  try {
    const processed = await Promise.all(documents.map((doc) => processDocument(doc, services)));

    let resolvedClaims: Claim[] = [];
    let conflicts: Conflict[] = [];
    let strategy: StrategyName | null = null;

    if (processed.length === 1) {
      resolvedClaims = [...processed[0].claims];
    } else if (processed.length > 1) {
      const override = options.strategyOverride === "auto" ? null : options.strategyOverride;
      const result = await resolveConflicts(processed, services.embedder, {
        strategyOverride: override,
        similarityThreshold: services.similarityThreshold,
        strategyOptions: services.strategyOptions,
      });
      resolvedClaims = result.resolvedClaims;
      conflicts = result.conflicts;
      strategy = result.strategy;
    }

    await notify({ status: "done" });
    return { documents: processed, resolvedClaims, conflicts, strategy, status: "done" };
  } catch (error) {
    const classified = classifyError(error);
    console.error(`[Pipeline] Job failed (${classified.category}): ${classified.message}`);
    await notify({ status: "failed", error: classified.message });
    throw error;
  }
}
