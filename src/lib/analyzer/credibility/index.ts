/**
 * Credibility scorer registry.
 *
 * One scorer per document type. Documents the classifier could not place
 * (`unknown`) are scored as news articles.
 *
 * @module analyzer/credibility
 */

import type { Document, DocumentType } from "../types";
import { BlogPostScorer } from "./blog";
import { LegalDocumentScorer } from "./legal";
import { NewsArticleScorer } from "./news";
import { ResearchPaperScorer } from "./research";
import type { CredibilityScorer, ScorerDeps, ScorerResult } from "./scorer";

export type { AuthoritySource, CredibilityScorer, ScorerDeps, ScorerResult } from "./scorer";

export type ScorerRegistry = Readonly<Record<DocumentType, CredibilityScorer>>;

export function createScorerRegistry(deps: ScorerDeps): ScorerRegistry {
  const news = new NewsArticleScorer(deps);
  return {
    research_paper: new ResearchPaperScorer(deps),
    news_article: news,
    blog_post: new BlogPostScorer(deps),
    legal_document: new LegalDocumentScorer(deps),
    unknown: news,
  };
}

/**
 * Score a document and return a copy carrying the credibility score and the
 * scorer's metadata write-back.
 */
export async function scoreDocument(registry: ScorerRegistry, doc: Document): Promise<Document> {
  const result: ScorerResult = await registry[doc.type].score(doc);
  console.log(`[Cred] ${doc.id} (${doc.type}): overall=${result.credibility.overall}`);
  return {
    ...doc,
    credibility: result.credibility,
    metadata: { ...doc.metadata, ...result.metadata },
  };
}
