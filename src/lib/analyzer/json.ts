/**
 * Recovery of JSON payloads from model replies.
 *
 * Models wrap their answer in prose or code fences; only the first
 * top-level object is considered.
 */

import { z } from "zod";

const ScoreReplySchema = z.object({ score: z.number().finite() }).passthrough();

const BARE_NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Return the first balanced `{...}` span in `text`, or null when none closes.
 * Braces inside JSON strings do not count toward nesting.
 */
export function findJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let quoted = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === "\\") i++;
      else if (ch === '"') quoted = false;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}" && --depth === 0) {
      return text.slice(start, i + 1);
    }
  }

  return null;
}

/** Parse the first JSON object in a reply; null when absent or malformed */
export function parseJsonObject(text: string): unknown {
  const span = findJsonObject(text);
  if (span === null) return null;
  try {
    return JSON.parse(span);
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

/**
 * Read a 0-1 score from a reply that is either a bare number or an object
 * with a numeric `score`. Values outside [0, 1] give null.
 */
export function parseUnitScore(text: string): number | null {
  const reply = text.trim();
  let score: number;

  if (BARE_NUMBER.test(reply)) {
    score = Number(reply);
  } else {
    const parsed = ScoreReplySchema.safeParse(parseJsonObject(reply));
    if (!parsed.success) return null;
    score = parsed.data.score;
  }

  return score >= 0 && score <= 1 ? score : null;
}
