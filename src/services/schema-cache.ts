import type {
  AssociationConfiguration,
  AvailableObjects,
  HubSpotProperty,
  ObjectInfo,
} from "../types";
import logger from "../utils/logger";

export interface PortalPair<T> {
  portal_a: T;
  portal_b: T;
}

export interface AssociationSnapshot {
  associations: PortalPair<AssociationConfiguration[]>;
  customObjects: PortalPair<ObjectInfo[]>;
}

export interface CacheEntryStatus {
  cached: boolean;
  valid: boolean;
  age_seconds: number | null;
}

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

/**
 * In-memory cache whose entries expire a fixed time after they were stored.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  // Loads in progress, shared by concurrent misses
  private pending = new Map<string, Promise<T>>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now,
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry || !this.isValid(entry)) {
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): boolean {
    this.pending.delete(key);
    return this.entries.delete(key);
  }

  clear(): void {
    this.pending.clear();
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Return the cached value, or load, store and return a fresh one.
   * Concurrent misses share one load. Failed loads are not cached, and a
   * load outlived by `delete` or `clear` is not stored.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      logger.debug("Cache hit", { key });
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      logger.debug("Joining pending load", { key });
      return inFlight;
    }

    logger.debug("Cache miss", { key });
    const loading: Promise<T> = load()
      .then((value) => {
        if (this.pending.get(key) === loading) {
          this.set(key, value);
        }
        return value;
      })
      .finally(() => {
        if (this.pending.get(key) === loading) {
          this.pending.delete(key);
        }
      });

    this.pending.set(key, loading);
    return loading;
  }

  status(key: string): CacheEntryStatus {
    const entry = this.entries.get(key);
    if (!entry) {
      return { cached: false, valid: false, age_seconds: null };
    }
    return {
      cached: true,
      valid: this.isValid(entry),
      age_seconds: (this.now() - entry.storedAt) / 1000,
    };
  }

  private isValid(entry: CacheEntry<T>): boolean {
    return this.now() - entry.storedAt < this.ttlMs;
  }
}

export interface SessionCacheStatus {
  objects: CacheEntryStatus;
  properties: Record<string, CacheEntryStatus>;
  associations: CacheEntryStatus;
}

const SINGLE_KEY = "all";

/**
 * Everything fetched for one session, by kind.
 */
export class SessionCache {
  readonly objects: TtlCache<PortalPair<AvailableObjects>>;
  readonly properties: TtlCache<PortalPair<HubSpotProperty[]>>;
  readonly associations: TtlCache<AssociationSnapshot>;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.objects = new TtlCache(ttlMs, now);
    this.properties = new TtlCache(ttlMs, now);
    this.associations = new TtlCache(ttlMs, now);
  }

  getObjects(load: () => Promise<PortalPair<AvailableObjects>>) {
    return this.objects.getOrLoad(SINGLE_KEY, load);
  }

  getProperties(
    objectType: string,
    load: () => Promise<PortalPair<HubSpotProperty[]>>,
  ) {
    return this.properties.getOrLoad(objectType, load);
  }

  getAssociations(load: () => Promise<AssociationSnapshot>) {
    return this.associations.getOrLoad(SINGLE_KEY, load);
  }

  /**
   * Drop cached properties of one object type, or everything.
   */
  clear(objectType?: string): void {
    if (objectType) {
      this.properties.delete(objectType);
      return;
    }
    this.objects.clear();
    this.properties.clear();
    this.associations.clear();
  }

  status(): SessionCacheStatus {
    const properties: Record<string, CacheEntryStatus> = {};
    for (const objectType of this.properties.keys()) {
      properties[objectType] = this.properties.status(objectType);
    }

    return {
      objects: this.objects.status(SINGLE_KEY),
      properties,
      associations: this.associations.status(SINGLE_KEY),
    };
  }
}
