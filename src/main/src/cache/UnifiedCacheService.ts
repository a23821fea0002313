import { KeyValueStore } from '../db';
import { logToFile } from '../../log';
import { FlashCard } from '../types/FlashCard';
import { ProcessedText, TextProcessingMode } from '../types/ProcessedText';
import { escapeRegExp } from './CacheManager';
import { LocalCacheStorage, MB } from './LocalCacheStorage';

export const MAX_SEGMENT_ITEMS = 100;
export const MAX_FLASHCARD_ITEMS = 200;

/** The slow tier behind the local caches, usually the document store. */
export interface RemoteCacheSource {
  getSegments(imageId: string, mode: TextProcessingMode): Promise<ProcessedText | null>;
  saveSegments(imageId: string, segments: ProcessedText): Promise<void>;
  getFlashcards(noteId: string): Promise<FlashCard[] | null>;
}

export interface UnifiedCacheRegistryOptions {
  store: KeyValueStore;
  remoteFor?: (userId: string) => RemoteCacheSource;
  now?: () => number;
}

export interface UnifiedCacheServiceOptions {
  userId: string;
  store: KeyValueStore;
  remote?: RemoteCacheSource;
  now?: () => number;
}

export const segmentKey = (imageId: string, mode: TextProcessingMode) => `segments:${imageId}:${mode}`;
export const flashcardListKey = (noteId: string) => `flashcards:${noteId}`;

/**
 * Read-through cache for processed page text and note flashcards:
 * memory, then the local store, then the remote source.
 */
export class UnifiedCacheService {
  private readonly segments: LocalCacheStorage<ProcessedText>;
  private readonly flashcards: LocalCacheStorage<FlashCard[]>;
  private readonly remote?: RemoteCacheSource;

  constructor({ userId, store, remote, now }: UnifiedCacheServiceOptions) {
    this.remote = remote;
    this.segments = new LocalCacheStorage<ProcessedText>({
      namespace: `${userId}/segments`,
      store,
      now,
      maxItems: MAX_SEGMENT_ITEMS,
      maxSize: 20 * MB,
    });
    this.flashcards = new LocalCacheStorage<FlashCard[]>({
      namespace: `${userId}/flashcard_lists`,
      store,
      now,
      maxItems: MAX_FLASHCARD_ITEMS,
      maxSize: 10 * MB,
    });
  }

  async cacheSegments(imageId: string, mode: TextProcessingMode, segments: ProcessedText) {
    try {
      await this.segments.set(segmentKey(imageId, mode), segments);
    } catch (e) {
      logToFile('local cacheSegments failed:', imageId, e);
    }
    if (this.remote) {
      try {
        await this.remote.saveSegments(imageId, segments);
      } catch (e) {
        logToFile('remote saveSegments failed:', imageId, e);
      }
    }
  }

  async getSegments(imageId: string, mode: TextProcessingMode) {
    const local = await this.segments.get(segmentKey(imageId, mode));
    if (local) {
      return local;
    }
    if (!this.remote) {
      return null;
    }
    try {
      const remote = await this.remote.getSegments(imageId, mode);
      if (remote) {
        await this.segments.set(segmentKey(imageId, mode), remote);
      }
      return remote;
    } catch (e) {
      logToFile('remote getSegments failed:', imageId, e);
      return null;
    }
  }

  async cacheFlashcards(noteId: string, cards: FlashCard[]) {
    try {
      await this.flashcards.set(flashcardListKey(noteId), cards);
    } catch (e) {
      logToFile('local cacheFlashcards failed:', noteId, e);
    }
  }

  async getFlashcards(noteId: string) {
    const local = await this.flashcards.get(flashcardListKey(noteId));
    if (local) {
      return local;
    }
    if (!this.remote) {
      return null;
    }
    try {
      const remote = await this.remote.getFlashcards(noteId);
      if (remote) {
        await this.flashcards.set(flashcardListKey(noteId), remote);
      }
      return remote;
    } catch (e) {
      logToFile('remote getFlashcards failed:', noteId, e);
      return null;
    }
  }

  async isSynced(imageId: string, mode: TextProcessingMode) {
    if (!this.remote) {
      return false;
    }
    const local = await this.segments.get(segmentKey(imageId, mode));
    if (!local) {
      return false;
    }
    try {
      return (await this.remote.getSegments(imageId, mode)) !== null;
    } catch (e) {
      logToFile('remote getSegments failed:', imageId, e);
      return false;
    }
  }

  async clearImageCache(imageId: string) {
    await this.segments.deleteByPattern(`segments:${escapeRegExp(imageId)}:`);
  }

  async clearFlashcardCache(noteId: string) {
    await this.flashcards.delete(flashcardListKey(noteId));
  }

  async clear() {
    await this.segments.clear();
    await this.flashcards.clear();
  }

  async getStats() {
    return {
      segments: await this.segments.getStats(),
      flashcards: await this.flashcards.getStats(),
    };
  }
}

/** One read-through cache per user, each over that user's remote source. */
export class UnifiedCacheRegistry {
  private readonly services = new Map<string, UnifiedCacheService>();

  constructor(private readonly options: UnifiedCacheRegistryOptions) {}

  forUser(userId: string) {
    let service = this.services.get(userId);
    if (!service) {
      const { store, remoteFor, now } = this.options;
      service = new UnifiedCacheService({ userId, store, remote: remoteFor?.(userId), now });
      this.services.set(userId, service);
    }
    return service;
  }
}
