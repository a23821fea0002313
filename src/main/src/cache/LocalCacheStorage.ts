import PATH from 'path';
import { promises as fs } from 'fs';
import { KeyValueStore } from '../db';
import { logToFile } from '../../log';
import { BinaryCacheStorage, CacheMetadata, CacheStats, CacheStorage } from './CacheStorage';

export const MB = 1024 * 1024;
export const DAY = 24 * 60 * 60 * 1000;

const METADATA_KEY = '_metadata';

export interface LocalCacheStorageOptions<T> {
  namespace: string;
  store: KeyValueStore;
  maxSize?: number;
  maxItems?: number;
  /** Lifetime of entries set without a ttl; null keeps them until evicted. */
  defaultTtlMs?: number | null;
  /** Directory for binary entries; binary calls fail without it. */
  cacheDir?: string;
  serialize?: (value: T) => string;
  deserialize?: (raw: string) => T;
  now?: () => number;
}

/**
 * Two-tier cache: a memory map in front of the key-value store. Entries live under
 * `{namespace}:{key}`; their metadata is kept as one record under `{namespace}:_metadata`.
 * Eviction drops the least recently accessed entries first.
 */
export class LocalCacheStorage<T> implements CacheStorage<T>, BinaryCacheStorage {
  readonly namespace: string;
  private readonly store: KeyValueStore;
  private readonly maxSize: number;
  private readonly maxItems: number;
  private readonly defaultTtlMs: number | null;
  private readonly cacheDir?: string;
  private readonly serialize: (value: T) => string;
  private readonly deserialize: (raw: string) => T;
  private readonly now: () => number;

  private readonly memory = new Map<string, T>();
  private metadata = new Map<string, CacheMetadata>();
  private loadPromise: Promise<void> | null = null;
  private mutation: Promise<void> = Promise.resolve();
  /** Access times changed since the metadata record was last written. */
  private accessDirty = false;
  private hits = 0;
  private misses = 0;

  constructor(options: LocalCacheStorageOptions<T>) {
    this.namespace = options.namespace;
    this.store = options.store;
    this.maxSize = options.maxSize ?? 50 * MB;
    this.maxItems = options.maxItems ?? 1000;
    this.defaultTtlMs = options.defaultTtlMs === undefined ? 30 * DAY : options.defaultTtlMs;
    this.cacheDir = options.cacheDir;
    this.serialize = options.serialize ?? ((value) => JSON.stringify(value));
    this.deserialize = options.deserialize ?? ((raw) => JSON.parse(raw));
    this.now = options.now ?? Date.now;
  }

  private fullKey(key: string) {
    return `${this.namespace}:${key}`;
  }

  private get metadataKey() {
    return this.fullKey(METADATA_KEY);
  }

  private ready() {
    if (!this.loadPromise) {
      this.loadPromise = this.loadMetadata().then(async () => {
        await this.removeExpired();
      });
    }
    return this.loadPromise;
  }

  /** Runs metadata-changing work one task at a time. */
  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.mutation.then(task);
    this.mutation = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async loadMetadata() {
    const raw = await this.store.getString(this.metadataKey);
    if (!raw) {
      return;
    }
    try {
      const records: Record<string, CacheMetadata> = JSON.parse(raw);
      this.metadata = new Map(Object.entries(records));
    } catch (e) {
      logToFile('cache metadata unreadable, starting empty:', this.namespace, e);
      this.metadata = new Map();
    }
  }

  private async saveMetadata() {
    this.accessDirty = false;
    if (this.metadata.size === 0) {
      await this.store.remove(this.metadataKey);
      return;
    }
    await this.store.setString(this.metadataKey, JSON.stringify(Object.fromEntries(this.metadata)));
  }

  private expiryFrom(now: number, ttlMs?: number) {
    const ttl = ttlMs ?? this.defaultTtlMs;
    return ttl === null ? null : now + ttl;
  }

  private isExpired(meta: CacheMetadata) {
    return meta.expiresAt !== null && meta.expiresAt <= this.now();
  }

  private filePathOf(fullKey: string, extension: string) {
    if (!this.cacheDir) {
      throw new Error(`cache ${this.namespace} has no directory for binary entries`);
    }
    return PATH.join(this.cacheDir, `${fullKey.replace(/[:/\\]/g, '_')}.${extension}`);
  }

  /** Removes one entry from every tier without saving the metadata. */
  private async evict(fullKey: string) {
    const meta = this.metadata.get(fullKey);
    this.memory.delete(fullKey);
    this.metadata.delete(fullKey);
    if (meta?.dataType === 'binary') {
      await fs.rm(this.filePathOf(fullKey, meta.extension ?? 'bin'), { force: true });
    } else {
      await this.store.remove(fullKey);
    }
  }

  private async ensureCapacity(fullKey: string, incomingSize: number) {
    const others = [...this.metadata.values()]
      .filter((meta) => meta.key !== fullKey)
      .sort((a, b) => a.lastAccessedAt - b.lastAccessedAt);

    let evictCount = 0;
    if (others.length >= this.maxItems) {
      evictCount = others.length - this.maxItems + 1;
    }
    let total = others.slice(evictCount).reduce((acc, meta) => acc + meta.size, 0);
    while (evictCount < others.length && total + incomingSize > this.maxSize) {
      total -= others[evictCount].size;
      evictCount += 1;
    }
    for (const meta of others.slice(0, evictCount)) {
      await this.evict(meta.key);
    }
    if (evictCount > 0) {
      logToFile(`cache ${this.namespace} evicted ${evictCount} entries`);
    }
  }

  async get(key: string): Promise<T | null> {
    const fullKey = this.fullKey(key);
    try {
      return await this.exclusive(async () => {
        await this.ready();
        const meta = this.metadata.get(fullKey);
        if (!meta || meta.dataType !== 'json') {
          this.misses += 1;
          return null;
        }
        if (this.isExpired(meta)) {
          await this.evict(fullKey);
          await this.saveMetadata();
          this.misses += 1;
          return null;
        }
        meta.lastAccessedAt = this.now();
        this.accessDirty = true;
        const inMemory = this.memory.get(fullKey);
        if (inMemory !== undefined) {
          this.hits += 1;
          return inMemory;
        }
        this.misses += 1;
        const raw = await this.store.getString(fullKey);
        if (raw === null) {
          this.metadata.delete(fullKey);
          await this.saveMetadata();
          return null;
        }
        const value = this.deserialize(raw);
        this.memory.set(fullKey, value);
        return value;
      });
    } catch (e) {
      logToFile('cache get failed:', fullKey, e);
      return null;
    }
  }

  set(key: string, value: T, ttlMs?: number) {
    return this.exclusive(async () => {
      await this.ready();
      const fullKey = this.fullKey(key);
      const raw = this.serialize(value);
      const size = Buffer.byteLength(raw, 'utf8');
      await this.ensureCapacity(fullKey, size);
      await this.store.setString(fullKey, raw);
      this.memory.set(fullKey, value);
      const now = this.now();
      this.metadata.set(fullKey, {
        key: fullKey,
        createdAt: now,
        lastAccessedAt: now,
        expiresAt: this.expiryFrom(now, ttlMs),
        size,
        dataType: 'json',
      });
      await this.saveMetadata();
    });
  }

  async delete(key: string) {
    const fullKey = this.fullKey(key);
    try {
      await this.exclusive(async () => {
        await this.ready();
        await this.evict(fullKey);
        await this.saveMetadata();
      });
    } catch (e) {
      logToFile('cache delete failed:', fullKey, e);
    }
  }

  async deleteByPattern(pattern: string | RegExp) {
    try {
      return await this.exclusive(async () => {
        await this.ready();
        const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
        const matched = [...this.metadata.keys()].filter((fullKey) => regex.test(fullKey));
        for (const fullKey of matched) {
          await this.evict(fullKey);
        }
        await this.saveMetadata();
        return matched.length;
      });
    } catch (e) {
      logToFile('cache deleteByPattern failed:', this.namespace, pattern, e);
      return 0;
    }
  }

  async clear() {
    try {
      await this.exclusive(async () => {
        const keys = await this.store.keysWithPrefix(`${this.namespace}:`);
        for (const key of keys) {
          await this.store.remove(key);
        }
        if (this.cacheDir) {
          await fs.rm(this.cacheDir, { recursive: true, force: true });
        }
        this.memory.clear();
        this.metadata.clear();
        this.accessDirty = false;
        this.hits = 0;
        this.misses = 0;
      });
    } catch (e) {
      logToFile('cache clear failed:', this.namespace, e);
    }
  }

  async getKeys() {
    await this.ready();
    const prefixLength = this.namespace.length + 1;
    return [...this.metadata.keys()].map((fullKey) => fullKey.substring(prefixLength));
  }

  async getSize() {
    await this.ready();
    return [...this.metadata.values()].reduce((acc, meta) => acc + meta.size, 0);
  }

  async getItemCount() {
    await this.ready();
    return this.metadata.size;
  }

  /** Drops expired entries and writes out access times held back since the last save. */
  cleanupExpired() {
    return this.exclusive(async () => {
      await this.ready();
      const removed = await this.removeExpired();
      if (removed === 0 && this.accessDirty) {
        await this.saveMetadata();
      }
      return removed;
    });
  }

  private async removeExpired() {
    const expired = [...this.metadata.values()].filter((meta) => this.isExpired(meta));
    for (const meta of expired) {
      await this.evict(meta.key);
    }
    if (expired.length > 0) {
      await this.saveMetadata();
      logToFile(`cache ${this.namespace} removed ${expired.length} expired entries`);
    }
    return expired.length;
  }

  async getStats(): Promise<CacheStats> {
    const totalSize = await this.getSize();
    const lookups = this.hits + this.misses;
    return {
      namespace: this.namespace,
      itemCount: this.metadata.size,
      maxItems: this.maxItems,
      totalSize,
      totalSizeMB: Math.round((totalSize / MB) * 100) / 100,
      usagePercent: Math.round((totalSize / this.maxSize) * 10000) / 100,
      memoryItemCount: this.memory.size,
      memoryHitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  setBinary(key: string, data: Buffer, extension = 'bin', ttlMs?: number) {
    return this.exclusive(async () => {
      await this.ready();
      const fullKey = this.fullKey(key);
      const filePath = this.filePathOf(fullKey, extension);
      const previous = this.metadata.get(fullKey);
      if (previous && previous.extension !== extension) {
        await this.evict(fullKey);
      }
      await this.ensureCapacity(fullKey, data.length);
      await fs.mkdir(PATH.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, data);
      const now = this.now();
      this.metadata.set(fullKey, {
        key: fullKey,
        createdAt: now,
        lastAccessedAt: now,
        expiresAt: this.expiryFrom(now, ttlMs),
        size: data.length,
        dataType: 'binary',
        extension,
      });
      await this.saveMetadata();
      return filePath;
    });
  }

  async getFilePath(key: string) {
    const fullKey = this.fullKey(key);
    try {
      return await this.exclusive(async () => {
        await this.ready();
        const meta = this.metadata.get(fullKey);
        if (!meta || meta.dataType !== 'binary') {
          return null;
        }
        if (this.isExpired(meta)) {
          await this.evict(fullKey);
          await this.saveMetadata();
          return null;
        }
        const filePath = this.filePathOf(fullKey, meta.extension ?? 'bin');
        try {
          await fs.access(filePath);
        } catch (e) {
          logToFile('cached file missing:', filePath);
          this.metadata.delete(fullKey);
          await this.saveMetadata();
          return null;
        }
        meta.lastAccessedAt = this.now();
        this.accessDirty = true;
        return filePath;
      });
    } catch (e) {
      logToFile('cache getFilePath failed:', fullKey, e);
      return null;
    }
  }

  async getBinary(key: string) {
    const filePath = await this.getFilePath(key);
    if (!filePath) {
      return null;
    }
    try {
      return await fs.readFile(filePath);
    } catch (e) {
      logToFile('read cached file failed:', filePath, e);
      return null;
    }
  }
}
