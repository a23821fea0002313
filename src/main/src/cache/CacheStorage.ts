export type CacheDataType = 'json' | 'binary';

export interface CacheMetadata {
  key: string;
  createdAt: number;
  lastAccessedAt: number;
  expiresAt: number | null;
  size: number;
  dataType: CacheDataType;
  extension?: string;
}

export interface CacheStats {
  namespace: string;
  itemCount: number;
  maxItems: number;
  totalSize: number;
  totalSizeMB: number;
  usagePercent: number;
  memoryItemCount: number;
  memoryHitRate: number;
}

/** Namespaced key-value cache with TTL and bounded size. */
export interface CacheStorage<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<void>;
  deleteByPattern(pattern: string | RegExp): Promise<number>;
  clear(): Promise<void>;
  getKeys(): Promise<string[]>;
  getSize(): Promise<number>;
  getItemCount(): Promise<number>;
  cleanupExpired(): Promise<number>;
  getStats(): Promise<CacheStats>;
}

export interface BinaryCacheStorage {
  getBinary(key: string): Promise<Buffer | null>;
  setBinary(key: string, data: Buffer, extension?: string, ttlMs?: number): Promise<string>;
  getFilePath(key: string): Promise<string | null>;
}
