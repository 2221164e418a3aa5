/**
 * Error Classification Tests
 *
 * Tests that collaborator failures are categorized as provider outages,
 * rate limits, timeouts, input errors or persistence failures.
 */

import { describe, it, expect } from "vitest";
import { classifyError, ExternalServiceError, PersistenceError } from "@/lib/error-classification";

describe("error-classification", () => {
  describe("ExternalServiceError", () => {
    it("classifies 429 as a retriable rate_limit", () => {
      const result = classifyError(new ExternalServiceError("popularity_index", 429, "Too Many Requests"));
      expect(result.category).toBe("rate_limit");
      expect(result.service).toBe("popularity_index");
      expect(result.retriable).toBe(true);
    });

    it("classifies 403 as a non-retriable provider_outage", () => {
      const result = classifyError(new ExternalServiceError("bibliometrics", 403, "Forbidden"));
      expect(result.category).toBe("provider_outage");
      expect(result.retriable).toBe(false);
    });

    it("classifies 500 as a retriable provider_outage", () => {
      const result = classifyError(new ExternalServiceError("bibliometrics", 500, "Internal Server Error"));
      expect(result.category).toBe("provider_outage");
      expect(result.retriable).toBe(true);
    });

    it("classifies 404 as input_error", () => {
      const result = classifyError(new ExternalServiceError("popularity_index", 404, "Not Found"));
      expect(result.category).toBe("input_error");
      expect(result.retriable).toBe(false);
    });

    it("keeps the service carried by the error over the caller's", () => {
      const result = classifyError(new ExternalServiceError("bibliometrics", 429, "slow down"), "llm");
      expect(result.service).toBe("bibliometrics");
    });
  });

  describe("PersistenceError", () => {
    it("classifies as persistence and keeps the cause", () => {
      const cause = new Error("SQLITE_BUSY");
      const err = new PersistenceError("Domain trust cache write failed", cause);
      const result = classifyError(err);
      expect(result.category).toBe("persistence");
      expect(result.message).toBe("Domain trust cache write failed");
      expect(err.cause).toBe(cause);
    });
  });

  describe("plain errors", () => {
    it("classifies TimeoutError by name", () => {
      const err = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
      expect(classifyError(err, "popularity_index").category).toBe("timeout");
    });

    it("classifies timeout messages", () => {
      expect(classifyError(new Error("Request timed out after 8000ms")).category).toBe("timeout");
    });

    it("classifies API key problems as provider_outage", () => {
      const result = classifyError(new Error("Invalid API key provided"), "llm");
      expect(result.category).toBe("provider_outage");
      expect(result.service).toBe("llm");
      expect(result.retriable).toBe(false);
    });

    it("classifies rate limit messages", () => {
      expect(classifyError(new Error("Too many requests")).category).toBe("rate_limit");
    });

    it("falls back to the status field on the error object", () => {
      const err = Object.assign(new Error("Bad request"), { status: 400 });
      expect(classifyError(err).category).toBe("input_error");
    });

    it("classifies anything else as unknown", () => {
      const result = classifyError("something odd");
      expect(result.category).toBe("unknown");
      expect(result.message).toBe("something odd");
      expect(result.service).toBeNull();
    });
  });
});
