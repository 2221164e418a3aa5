/**
 * Domain Trust Cache Tests
 *
 * Runs the same contract against the MongoDB store (over an in-process
 * collection) and the Map-backed store.
 *
 * @module domain-trust-cache.test
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InMemoryDomainTrustCache,
  MongoDomainTrustCache,
  type DomainTrustCollection,
  type DomainTrustDocument,
  type DomainTrustStore,
} from "@/lib/domain-trust-cache";
import { PersistenceError } from "@/lib/error-classification";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Map-backed collection answering the filters the cache issues */
class FakeTrustCollection implements DomainTrustCollection {
  readonly docs = new Map<string, DomainTrustDocument>();

  async findOne(filter: { domain: string; expiresAt: { $gt: Date } }): Promise<DomainTrustDocument | null> {
    const doc = this.docs.get(filter.domain);
    if (!doc || doc.expiresAt.getTime() <= filter.expiresAt.$gt.getTime()) return null;
    return { ...doc };
  }

  async updateOne(filter: { domain: string }, update: { $set: DomainTrustDocument }, options: { upsert: boolean }) {
    const existing = this.docs.get(filter.domain);
    if (!existing && !options.upsert) return { matchedCount: 0 };
    this.docs.set(filter.domain, { ...existing, ...update.$set });
    return { matchedCount: existing ? 1 : 0 };
  }

  async deleteOne(filter: { domain: string }) {
    return { deletedCount: this.docs.delete(filter.domain) ? 1 : 0 };
  }

  async deleteMany(filter: { expiresAt: { $lte: Date } }) {
    let deletedCount = 0;
    for (const [domain, doc] of this.docs) {
      if (doc.expiresAt.getTime() <= filter.expiresAt.$lte.getTime()) {
        this.docs.delete(domain);
        deletedCount++;
      }
    }
    return { deletedCount };
  }

  find() {
    return { toArray: async () => [...this.docs.values()] };
  }
}

type StoreFactory = (now: () => Date) => Promise<DomainTrustStore>;

const factories: Array<[string, StoreFactory]> = [
  ["MongoDomainTrustCache", async (now) => new MongoDomainTrustCache(new FakeTrustCollection(), 90, now)],
  ["InMemoryDomainTrustCache", async (now) => new InMemoryDomainTrustCache(90, now)],
];

describe.each(factories)("%s", (_name, createStore) => {
  let clock: Date;
  let store: DomainTrustStore;

  beforeEach(async () => {
    clock = new Date("2026-01-01T00:00:00.000Z");
    store = await createStore(() => clock);
  });

  afterEach(async () => {
    await store.close();
  });

  it("returns null for unknown domains", async () => {
    expect(await store.get("example.com")).toBeNull();
  });

  it("stores and reads back an entry", async () => {
    await store.set("example.com", 0.7784, "openpagerank");
    expect(await store.get("example.com")).toEqual({
      domain: "example.com",
      score: 0.7784,
      method: "openpagerank",
      updatedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("overwrites score, method and timestamp on re-resolution", async () => {
    await store.set("example.com", 0.45, "default");
    clock = new Date("2026-02-01T00:00:00.000Z");
    await store.set("example.com", 0.62, "llm");

    const entry = await store.get("example.com");
    expect(entry?.score).toBe(0.62);
    expect(entry?.method).toBe("llm");
    expect(entry?.updatedAt).toBe("2026-02-01T00:00:00.000Z");
  });

  it("hides entries once the TTL has passed", async () => {
    await store.set("example.com", 0.5, "default");
    clock = new Date(clock.getTime() + 89 * DAY_MS);
    expect(await store.get("example.com")).not.toBeNull();

    clock = new Date(clock.getTime() + 2 * DAY_MS);
    expect(await store.get("example.com")).toBeNull();
  });

  it("counts and removes expired entries", async () => {
    await store.set("old.example", 0.3, "default");
    clock = new Date(clock.getTime() + 60 * DAY_MS);
    await store.set("fresh.example", 0.9, "llm");
    clock = new Date(clock.getTime() + 31 * DAY_MS);

    const before = await store.getStats();
    expect(before.totalEntries).toBe(2);
    expect(before.expiredEntries).toBe(1);
    expect(before.avgScore).toBeCloseTo(0.6, 6);
    expect(before.byMethod).toEqual({ default: 1, llm: 1 });

    expect(await store.cleanupExpired()).toBe(1);
    expect((await store.getStats()).totalEntries).toBe(1);
    expect(await store.get("fresh.example")).not.toBeNull();
  });

  it("deletes a single entry", async () => {
    await store.set("example.com", 0.5, "default");
    expect(await store.delete("example.com")).toBe(true);
    expect(await store.delete("example.com")).toBe(false);
  });
});

describe("MongoDomainTrustCache documents", () => {
  const now = new Date("2026-01-01T00:00:00.000Z");

  it("upserts one document per domain with its expiry", async () => {
    const collection = new FakeTrustCollection();
    const updateOne = vi.spyOn(collection, "updateOne");
    const cache = new MongoDomainTrustCache(collection, 30, () => now);

    await cache.set("example.com", 0.45, "default");
    await cache.set("example.com", 0.5, "llm");

    expect(updateOne).toHaveBeenLastCalledWith(
      { domain: "example.com" },
      {
        $set: {
          domain: "example.com",
          score: 0.5,
          method: "llm",
          updatedAt: now,
          expiresAt: new Date("2026-01-31T00:00:00.000Z"),
        },
      },
      { upsert: true },
    );
    expect(collection.docs.size).toBe(1);
  });

  it("reads unrecognised stored methods as default", async () => {
    const collection = new FakeTrustCollection();
    collection.docs.set("example.com", {
      domain: "example.com",
      score: 0.5,
      method: "manual",
      updatedAt: now,
      expiresAt: new Date("2026-02-01T00:00:00.000Z"),
    });

    const entry = await new MongoDomainTrustCache(collection, 90, () => now).get("example.com");
    expect(entry?.method).toBe("default");
  });

  it("wraps driver errors in PersistenceError", async () => {
    const collection = new FakeTrustCollection();
    vi.spyOn(collection, "findOne").mockRejectedValue(new Error("connection reset"));
    const cache = new MongoDomainTrustCache(collection, 90, () => now);

    await expect(cache.get("example.com")).rejects.toBeInstanceOf(PersistenceError);
    await expect(cache.get("example.com")).rejects.toThrow("Domain trust cache read example.com failed");
  });
});
