/**
 * Credibility Services
 *
 * Builds every collaborator of the credibility pipeline once from a resolved
 * config: the domain trust cache, external clients, the source authority
 * resolver, the scorer registry and the claim extractor. The owner closes
 * the services when done.
 *
 * @module services
 */

import { SemanticScholarClient, type BibliometricClient } from "./bibliometrics";
import { getCredibilitySecrets, type Env } from "./config-loader";
import type { CredibilityConfig } from "./config-schemas";
import { MongoDomainTrustCache, type DomainTrustStore } from "./domain-trust-cache";
import { OpenPageRankClient, type PopularityIndexClient } from "./popularity-index";
import { ClaimExtractor } from "./analyzer/claim-extraction";
import { createScorerRegistry, type ScorerRegistry } from "./analyzer/credibility";
import { AiSdkInferenceClient, AiSdkTextEmbedder, type InferenceClient, type TextEmbedder } from "./analyzer/llm";
import { runCredibilityPipeline, type PipelineOptions, type PipelineReport } from "./analyzer/pipeline";
import { SourceAuthorityResolver } from "./analyzer/source-authority";
import type { Document } from "./analyzer/types";

export interface CredibilityServices {
  config: CredibilityConfig;
  store: DomainTrustStore;
  resolver: SourceAuthorityResolver;
  scorers: ScorerRegistry;
  extractor: ClaimExtractor;
  embedder: TextEmbedder;
  run(documents: readonly Document[], options?: PipelineOptions): Promise<PipelineReport>;
  close(): Promise<void>;
}

/** Collaborators that tests (or embedding applications) may supply */
export interface ServiceOverrides {
  store?: DomainTrustStore;
  popularity?: PopularityIndexClient | null;
  inference?: InferenceClient;
  bibliometrics?: BibliometricClient | null;
  embedder?: TextEmbedder;
  now?: () => Date;
  env?: Env;
}

function buildPopularityClient(config: CredibilityConfig, env: Env): PopularityIndexClient | null {
  const { openPageRankKey } = getCredibilitySecrets(env);
  if (!config.popularityIndex.enabled || !openPageRankKey) {
    console.warn(`[SA] Popularity index disabled (enabled=${config.popularityIndex.enabled}, key=${!!openPageRankKey})`);
    return null;
  }
  return new OpenPageRankClient({
    baseUrl: config.popularityIndex.baseUrl,
    apiKey: openPageRankKey,
    timeoutMs: config.popularityIndex.timeoutMs,
  });
}

function buildBibliometricClient(config: CredibilityConfig, env: Env): BibliometricClient | null {
  if (!config.bibliometrics.enabled) return null;
  return new SemanticScholarClient({
    baseUrl: config.bibliometrics.baseUrl,
    apiKey: getCredibilitySecrets(env).semanticScholarKey,
    timeoutMs: config.bibliometrics.timeoutMs,
  });
}

export async function createCredibilityServices(
  config: CredibilityConfig,
  overrides: ServiceOverrides = {},
): Promise<CredibilityServices> {
  const env = overrides.env ?? process.env;

  const store = overrides.store ?? (await MongoDomainTrustCache.connect(config.cache));
  const popularity = overrides.popularity !== undefined ? overrides.popularity : buildPopularityClient(config, env);
  const bibliometrics = overrides.bibliometrics !== undefined ? overrides.bibliometrics : buildBibliometricClient(config, env);
  const inference = overrides.inference ?? AiSdkInferenceClient.fromConfig(config.inference, env);
  const embedder = overrides.embedder ?? new AiSdkTextEmbedder(config.embeddings.model);

  const resolver = new SourceAuthorityResolver(store, popularity, inference);
  const scorers = createScorerRegistry({ authority: resolver, inference, bibliometrics, now: overrides.now });
  const extractor = new ClaimExtractor(inference);

  const pipelineServices = {
    scorers,
    extractor,
    embedder,
    similarityThreshold: config.embeddings.similarityThreshold,
    strategyOptions: {
      weightedVoteThreshold: config.conflict.weightedVoteThreshold,
      highTrustThreshold: config.conflict.highTrustThreshold,
    },
  };

  return {
    config,
    store,
    resolver,
    scorers,
    extractor,
    embedder,
    run: (documents, options) => runCredibilityPipeline(documents, pipelineServices, options),
    close: () => store.close(),
  };
}
