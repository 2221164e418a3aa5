/**
 * Shared credibility signals.
 *
 * Small pure helpers reused by every document-type scorer: time decay,
 * tiered table lookups, saturating counts and weighted aggregation.
 *
 * @module analyzer/credibility/signals
 */

import type { DocumentMetadata } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Exponential decay that halves every `halfLifeDays`, never below `floor`.
 * Future dates count as age 0.
 */
export function halfLifeDecay(ageDays: number, halfLifeDays: number, floor = 0): number {
  const age = Math.max(0, ageDays);
  return Math.max(floor, Math.exp((-Math.LN2 * age) / halfLifeDays));
}

/**
 * Parse a date-ish metadata value. Accepts ISO strings, "YYYY" and epoch
 * milliseconds; anything else is null.
 */
export function parseDate(value: unknown): Date | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value);
  }
  if (typeof value !== "string" || !value.trim()) return null;

  const trimmed = value.trim();
  const date = /^\d{4}$/.test(trimmed) ? new Date(Date.UTC(Number(trimmed), 0, 1)) : new Date(trimmed);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Recency of a date relative to `now`; `unknownScore` when the value does
 * not parse.
 */
export function recencyFromDate(
  value: unknown,
  options: { halfLifeDays: number; floor?: number; unknownScore: number; now: Date },
): number {
  const date = parseDate(value);
  if (!date) return options.unknownScore;
  const ageDays = (options.now.getTime() - date.getTime()) / DAY_MS;
  return halfLifeDecay(ageDays, options.halfLifeDays, options.floor ?? 0);
}

/**
 * Log-scaled citation count, saturating at `cap`. Unknown counts score 0.
 */
export function citationCountScore(count: number | null | undefined, cap = 5000): number {
  if (count === null || count === undefined || count < 0) return 0;
  return Math.min(1, Math.log1p(count) / Math.log1p(cap));
}

/**
 * Substring lookup of a free-text value (venue, platform, ...) in an ordered
 * table of keys. Empty values score `unknownScore`, values matching no key
 * score `unmatchedScore`.
 */
export function lookupTier(
  value: string | null | undefined,
  table: ReadonlyArray<readonly [string, number]>,
  unknownScore: number,
  unmatchedScore: number,
): number {
  if (!(value ?? "").trim()) return unknownScore;
  return findTier(value, table) ?? unmatchedScore;
}

export function findTier(value: string | null | undefined, table: ReadonlyArray<readonly [string, number]>): number | null {
  const needle = (value ?? "").trim().toLowerCase();
  if (!needle) return null;
  for (const [key, score] of table) {
    if (needle.includes(key)) return score;
  }
  return null;
}

/**
 * `count * perMatch` capped at 1; zero matches score `floor`.
 */
export function saturatingCount(count: number, perMatch: number, floor: number): number {
  if (count <= 0) return floor;
  return Math.min(1, count * perMatch);
}

export function countMatches(text: string, pattern: RegExp): number {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return Array.from(text.matchAll(new RegExp(pattern.source, flags))).length;
}

/**
 * Pick the explanation for the first threshold the value reaches.
 * Bands are checked in descending order.
 */
export function band(value: number, bands: ReadonlyArray<readonly [number, string]>, fallback: string): string {
  for (const [threshold, text] of bands) {
    if (value >= threshold) return text;
  }
  return fallback;
}

export function metadataNumber(metadata: DocumentMetadata, key: string): number | null {
  const value = metadata[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) return Number(value);
  return null;
}

export function metadataString(metadata: DocumentMetadata, key: string): string | null {
  const value = metadata[key];
  return typeof value === "string" && value.trim() ? value : null;
}
