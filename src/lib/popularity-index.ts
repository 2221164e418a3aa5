/**
 * Popularity Index Provider (OpenPageRank)
 *
 * https://www.domcop.com/openpagerank/
 *
 * Returns the raw 0-10 domain rank. Normalization to a trust score happens in
 * the source authority resolver.
 */

import { z } from "zod";
import { ExternalServiceError } from "./error-classification";
import { hit, miss, missFromError, type LookupOutcome } from "./analyzer/lookup-outcome";

export interface PopularityIndexClient {
  lookupRank(domain: string): Promise<LookupOutcome<number>>;
}

const OpenPageRankResponseSchema = z.object({
  response: z
    .array(
      z.object({
        // OPR reports unknown domains as "" or null; numbers may arrive as strings
        page_rank_decimal: z.preprocess(
          (v) => (v === undefined || v === null || v === "" ? null : typeof v === "string" ? Number(v) : v),
          z.number().min(0).max(10).nullable(),
        ),
      }),
    )
    .optional(),
});

export interface OpenPageRankOptions {
  baseUrl: string;
  apiKey: string | null;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class OpenPageRankClient implements PopularityIndexClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenPageRankOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async lookupRank(domain: string): Promise<LookupOutcome<number>> {
    const params = new URLSearchParams();
    params.append("domains[]", domain);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) {
      headers["API-OPR"] = this.options.apiKey;
    }

    try {
      const startTime = Date.now();
      const res = await this.fetchImpl(`${this.options.baseUrl}?${params.toString()}`, {
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      console.log(`[PopularityIndex] ${domain}: HTTP ${res.status} in ${Date.now() - startTime}ms`);

      if (!res.ok) {
        throw new ExternalServiceError("popularity_index", res.status, `OpenPageRank HTTP ${res.status}: ${res.statusText}`);
      }

      const parsed = OpenPageRankResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return miss("invalid_response", parsed.error.issues[0]?.message);
      }

      const rank = parsed.data.response?.[0]?.page_rank_decimal;
      if (rank === undefined || rank === null) {
        return miss("no_data");
      }
      return hit(rank);
    } catch (error) {
      return missFromError(error, "popularity_index");
    }
  }
}
