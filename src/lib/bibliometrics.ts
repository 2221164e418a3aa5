/**
 * Bibliometric Lookup Provider (Semantic Scholar Graph API)
 *
 * https://api.semanticscholar.org/api-docs/graph
 *
 * Looks up the best-matching paper for a title and returns citation count,
 * publication year, venue, author h-indices and publication types.
 */

import { z } from "zod";
import { ExternalServiceError } from "./error-classification";
import { hit, miss, missFromError, type LookupOutcome } from "./analyzer/lookup-outcome";

export interface PaperMetadata {
  citationCount: number | null;
  year: number | null;
  venue: string;
  authorHIndices: number[];
  publicationTypes: string[];
}

export interface BibliometricClient {
  lookupPaper(title: string): Promise<LookupOutcome<PaperMetadata>>;
}

const PAPER_FIELDS = "citationCount,year,venue,authors.hIndex,isOpenAccess,publicationTypes";

const PaperSchema = z.object({
  citationCount: z.number().int().min(0).nullable().optional(),
  year: z.number().int().nullable().optional(),
  venue: z.string().nullable().optional(),
  authors: z.array(z.object({ hIndex: z.number().nullable().optional() })).nullable().optional(),
  publicationTypes: z.array(z.string()).nullable().optional(),
});

const PaperSearchResponseSchema = z.object({
  data: z.array(PaperSchema).optional(),
});

export function toPaperMetadata(paper: z.infer<typeof PaperSchema>): PaperMetadata {
  return {
    citationCount: paper.citationCount ?? null,
    year: paper.year ?? null,
    venue: paper.venue ?? "",
    authorHIndices: (paper.authors ?? [])
      .map((a) => a.hIndex)
      .filter((h): h is number => typeof h === "number"),
    publicationTypes: paper.publicationTypes ?? [],
  };
}

export interface SemanticScholarOptions {
  baseUrl: string;
  apiKey: string | null;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class SemanticScholarClient implements BibliometricClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SemanticScholarOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async lookupPaper(title: string): Promise<LookupOutcome<PaperMetadata>> {
    const query = title.trim();
    if (!query) return miss("input_error", "empty title");

    const params = new URLSearchParams({ query, limit: "1", fields: PAPER_FIELDS });
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) {
      headers["x-api-key"] = this.options.apiKey;
    }

    try {
      const res = await this.fetchImpl(`${this.options.baseUrl}/paper/search?${params.toString()}`, {
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!res.ok) {
        throw new ExternalServiceError("bibliometrics", res.status, `Semantic Scholar HTTP ${res.status}: ${res.statusText}`);
      }

      const parsed = PaperSearchResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return miss("invalid_response", parsed.error.issues[0]?.message);
      }

      const paper = parsed.data.data?.[0];
      if (!paper) return miss("no_data");

      console.log(`[Bibliometrics] Match for "${query.substring(0, 50)}": citations=${paper.citationCount ?? "?"}, year=${paper.year ?? "?"}`);
      return hit(toPaperMetadata(paper));
    } catch (error) {
      return missFromError(error, "bibliometrics");
    }
  }
}
