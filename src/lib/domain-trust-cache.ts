/**
 * Domain Trust Cache
 *
 * Persistent cache of resolved source-authority scores keyed by registrable
 * domain, kept in a MongoDB collection. A document is upserted on the first
 * resolution of a domain and overwritten (score, method, timestamps) when the
 * domain is re-resolved after expiry.
 *
 * Concurrent first-time resolutions of one domain may both write; the last
 * write wins.
 *
 * @module domain-trust-cache
 */

import { MongoClient, type Collection } from "mongodb";
import { PersistenceError } from "./error-classification";
import type { DomainTrustEntry, TrustMethod } from "./analyzer/types";

// ============================================================================
// TYPES
// ============================================================================

export interface DomainTrustCacheStats {
  totalEntries: number;
  expiredEntries: number;
  avgScore: number;
  byMethod: Partial<Record<TrustMethod, number>>;
}

/**
 * Storage contract used by the source authority resolver.
 * `get` only returns entries that have not expired.
 */
export interface DomainTrustStore {
  get(domain: string): Promise<DomainTrustEntry | null>;
  set(domain: string, score: number, method: TrustMethod): Promise<void>;
  delete(domain: string): Promise<boolean>;
  cleanupExpired(): Promise<number>;
  getStats(): Promise<DomainTrustCacheStats>;
  close(): Promise<void>;
}

/** Stored shape of one cached domain */
export type DomainTrustDocument = {
  domain: string;
  score: number;
  method: string;
  updatedAt: Date;
  expiresAt: Date;
};

/**
 * The collection operations the cache issues. A driver `Collection` is
 * adapted with `fromMongoCollection`; tests supply an in-process fake.
 */
export interface DomainTrustCollection {
  findOne(filter: { domain: string; expiresAt: { $gt: Date } }): Promise<DomainTrustDocument | null>;
  updateOne(filter: { domain: string }, update: { $set: DomainTrustDocument }, options: { upsert: boolean }): Promise<unknown>;
  deleteOne(filter: { domain: string }): Promise<{ deletedCount: number }>;
  deleteMany(filter: { expiresAt: { $lte: Date } }): Promise<{ deletedCount: number }>;
  find(): { toArray(): Promise<DomainTrustDocument[]> };
}

export function fromMongoCollection(collection: Collection<DomainTrustDocument>): DomainTrustCollection {
  return {
    findOne: (filter) => collection.findOne(filter),
    updateOne: (filter, update, options) => collection.updateOne(filter, update, options),
    deleteOne: (filter) => collection.deleteOne(filter),
    deleteMany: (filter) => collection.deleteMany(filter),
    find: () => collection.find(),
  };
}

const TRUST_METHODS: readonly TrustMethod[] = ["static", "tld_pattern", "openpagerank", "llm", "default"];

function toTrustMethod(raw: string): TrustMethod {
  return TRUST_METHODS.find((m) => m === raw) ?? "default";
}

const DAY_MS = 24 * 60 * 60 * 1000;

function expiryFrom(now: Date, ttlDays: number): Date {
  return new Date(now.getTime() + ttlDays * DAY_MS);
}

// ============================================================================
// MONGODB IMPLEMENTATION
// ============================================================================

export interface MongoDomainTrustCacheOptions {
  uri: string;
  database: string;
  collection: string;
  ttlDays: number;
  now?: () => Date;
}

export class MongoDomainTrustCache implements DomainTrustStore {
  constructor(
    private readonly collection: DomainTrustCollection,
    private readonly ttlDays: number,
    private readonly now: () => Date = () => new Date(),
    private readonly client: MongoClient | null = null,
  ) {}

  /**
   * Connect to the server and make sure the collection's indexes exist.
   * The returned cache owns the client and closes it on `close()`.
   */
  static async connect(options: MongoDomainTrustCacheOptions): Promise<MongoDomainTrustCache> {
    console.log(`[SA-Cache] Connecting to ${options.database}.${options.collection}`);
    const client = new MongoClient(options.uri);

    try {
      await client.connect();
      const collection = client.db(options.database).collection<DomainTrustDocument>(options.collection);
      await collection.createIndex({ domain: 1 }, { unique: true });
      await collection.createIndex({ expiresAt: 1 });

      console.log(`[SA-Cache] Collection ready`);
      return new MongoDomainTrustCache(fromMongoCollection(collection), options.ttlDays, options.now, client);
    } catch (err) {
      await client.close();
      throw new PersistenceError(`Failed to open domain trust cache ${options.database}.${options.collection}`, err);
    }
  }

  async get(domain: string): Promise<DomainTrustEntry | null> {
    const doc = await this.guard(`read ${domain}`, () =>
      this.collection.findOne({ domain, expiresAt: { $gt: this.now() } }),
    );
    if (!doc) return null;

    return {
      domain: doc.domain,
      score: doc.score,
      method: toTrustMethod(doc.method),
      updatedAt: doc.updatedAt.toISOString(),
    };
  }

  async set(domain: string, score: number, method: TrustMethod): Promise<void> {
    const now = this.now();
    await this.guard(`write ${domain}`, () =>
      this.collection.updateOne(
        { domain },
        { $set: { domain, score, method, updatedAt: now, expiresAt: expiryFrom(now, this.ttlDays) } },
        { upsert: true },
      ),
    );
  }

  async delete(domain: string): Promise<boolean> {
    const result = await this.guard(`delete ${domain}`, () => this.collection.deleteOne({ domain }));
    return result.deletedCount > 0;
  }

  async cleanupExpired(): Promise<number> {
    const result = await this.guard("cleanup", () => this.collection.deleteMany({ expiresAt: { $lte: this.now() } }));
    return result.deletedCount;
  }

  async getStats(): Promise<DomainTrustCacheStats> {
    const docs = await this.guard("stats", () => this.collection.find().toArray());
    const now = this.now().getTime();

    const byMethod: Partial<Record<TrustMethod, number>> = {};
    let expired = 0;
    let scoreSum = 0;
    for (const doc of docs) {
      const method = toTrustMethod(doc.method);
      byMethod[method] = (byMethod[method] ?? 0) + 1;
      if (doc.expiresAt.getTime() <= now) expired++;
      scoreSum += doc.score;
    }

    return {
      totalEntries: docs.length,
      expiredEntries: expired,
      avgScore: docs.length > 0 ? scoreSum / docs.length : 0,
      byMethod,
    };
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    await this.guard("close", () => client.close());
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(`Domain trust cache ${operation} failed`, err);
    }
  }
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

/**
 * Map-backed store with the same expiry semantics, for tests and for
 * callers that do not want a database file.
 */
export class InMemoryDomainTrustCache implements DomainTrustStore {
  private readonly rows = new Map<string, DomainTrustEntry & { expiresAt: string }>();

  constructor(
    private readonly ttlDays = 90,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async get(domain: string): Promise<DomainTrustEntry | null> {
    const row = this.rows.get(domain);
    if (!row || row.expiresAt <= this.now().toISOString()) return null;
    return { domain: row.domain, score: row.score, method: row.method, updatedAt: row.updatedAt };
  }

  async set(domain: string, score: number, method: TrustMethod): Promise<void> {
    const now = this.now();
    this.rows.set(domain, {
      domain,
      score,
      method,
      updatedAt: now.toISOString(),
      expiresAt: expiryFrom(now, this.ttlDays).toISOString(),
    });
  }

  async delete(domain: string): Promise<boolean> {
    return this.rows.delete(domain);
  }

  async cleanupExpired(): Promise<number> {
    const nowIso = this.now().toISOString();
    let removed = 0;
    for (const [domain, row] of this.rows) {
      if (row.expiresAt <= nowIso) {
        this.rows.delete(domain);
        removed++;
      }
    }
    return removed;
  }

  async getStats(): Promise<DomainTrustCacheStats> {
    const nowIso = this.now().toISOString();
    const rows = [...this.rows.values()];
    const byMethod: Partial<Record<TrustMethod, number>> = {};
    for (const row of rows) {
      byMethod[row.method] = (byMethod[row.method] ?? 0) + 1;
    }
    return {
      totalEntries: rows.length,
      expiredEntries: rows.filter((r) => r.expiresAt <= nowIso).length,
      avgScore: rows.length > 0 ? rows.reduce((sum, r) => sum + r.score, 0) / rows.length : 0,
      byMethod,
    };
  }

  async close(): Promise<void> {
    this.rows.clear();
  }
}
