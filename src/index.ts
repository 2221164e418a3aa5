export { createCredibilityServices } from "./lib/services";
export type { CredibilityServices, ServiceOverrides } from "./lib/services";
export { loadCredibilityConfig, getCredibilitySecrets, applyEnvOverrides } from "./lib/config-loader";
export type { ResolvedConfig, OverrideRecord } from "./lib/config-loader";
export { CredibilityConfigSchema, DEFAULT_CREDIBILITY_CONFIG, validateConfig } from "./lib/config-schemas";
export type { CredibilityConfig } from "./lib/config-schemas";
export { MongoDomainTrustCache, InMemoryDomainTrustCache } from "./lib/domain-trust-cache";
export { fromMongoCollection } from "./lib/domain-trust-cache";
export type { DomainTrustStore, DomainTrustCacheStats, DomainTrustCollection, DomainTrustDocument } from "./lib/domain-trust-cache";
export { classifyError, ExternalServiceError, PersistenceError } from "./lib/error-classification";
export { SourceAuthorityResolver, getRegistrableDomain } from "./lib/analyzer/source-authority";
export { createScorerRegistry, scoreDocument } from "./lib/analyzer/credibility";
export { clusterClaims } from "./lib/analyzer/claim-clustering";
export { resolveConflicts } from "./lib/analyzer/conflict-resolution";
export { STRATEGIES, DEFAULT_STRATEGY_BY_TYPE } from "./lib/analyzer/conflict-strategies";
export type { StrategyName } from "./lib/analyzer/conflict-strategies";
export { ClaimExtractor } from "./lib/analyzer/claim-extraction";
export { runCredibilityPipeline } from "./lib/analyzer/pipeline";
export type { PipelineReport, JobStatusUpdate } from "./lib/analyzer/pipeline";
export { createClaim } from "./lib/analyzer/claims";
export { DOCUMENT_TYPES } from "./lib/analyzer/types";
export type { Claim, Conflict, CredibilityScore, Document, DocumentType } from "./lib/analyzer/types";
