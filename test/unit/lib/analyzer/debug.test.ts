import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { findPackageRoot, formatLogLine } from "@/lib/analyzer/debug";

describe("analyzer/debug", () => {
  it("findPackageRoot resolves to the package root from nested dirs (cwd-independent)", () => {
    const repoRoot = fileURLToPath(new URL("../../../..", import.meta.url)).replace(/[\\/]$/, "");

    expect(findPackageRoot(repoRoot)).toBe(repoRoot);
    expect(findPackageRoot(path.join(repoRoot, "src", "lib", "analyzer"))).toBe(repoRoot);
  });

  describe("formatLogLine", () => {
    const ts = "2026-01-01T00:00:00.000Z";

    it("renders message only", () => {
      expect(formatLogLine("[SA] Resolved example.com", undefined, ts)).toBe(`[${ts}] [SA] Resolved example.com`);
    });

    it("appends string payloads verbatim", () => {
      expect(formatLogLine("msg", "no_data", ts)).toBe(`[${ts}] msg | no_data`);
    });

    it("pretty-prints object payloads", () => {
      expect(formatLogLine("msg", { score: 0.5 }, ts)).toBe(`[${ts}] msg | {\n  "score": 0.5\n}`);
    });

    it("marks payloads that cannot be serialized", () => {
      const circular: { self?: unknown } = {};
      circular.self = circular;
      expect(formatLogLine("msg", circular, ts)).toBe(`[${ts}] msg | [unserializable]`);
    });

    it("truncates long payloads", () => {
      const line = formatLogLine("msg", "x".repeat(9000), ts);
      expect(line).toBe(`[${ts}] msg | ${"x".repeat(8000)}…[truncated]`);
    });
  });
});
