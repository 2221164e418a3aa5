import { randomUUID } from "node:crypto";
import type { Claim } from "./types";

/**
 * Create a claim. Claims are never mutated after creation; the conflict
 * engine builds a new claim when it needs a different confidence.
 */
export function createClaim(
  text: string,
  sourceDocId: string,
  confidence = 1.0,
  id: string = randomUUID(),
): Claim {
  return Object.freeze({ id, text, sourceDocId, confidence });
}
