import PATH from 'path';
import { KeyValueStore } from '../db';
import { logToFile } from '../../log';
import { Note } from '../types/Note';
import { FlashCard } from '../types/FlashCard';
import { CacheStats } from './CacheStorage';
import { LocalCacheStorage, MB } from './LocalCacheStorage';

export type NoteContentType = 'chinese' | 'translation' | 'pinyin';

interface NoteListSnapshot {
  noteIds: string[];
  cachedAt: number;
}
type NoteMetadataValue = Note | NoteListSnapshot;

interface FlashcardSnapshot {
  cards: FlashCard[];
  cachedAt: number;
}

const NOTE_LIST_KEY = '_note_list';
const NOTE_LIST_VALID_MS = 5 * 60 * 1000;
const FLASHCARD_VALID_MS = 24 * 60 * 60 * 1000;

export const TIER_LIMITS = {
  note_contents: { maxSize: 100 * MB, maxItems: 5000 },
  note_metadata: { maxSize: 10 * MB, maxItems: 500 },
  flashcards: { maxSize: 10 * MB, maxItems: 1000 },
  images: { maxSize: 300 * MB, maxItems: 1000 },
  tts: { maxSize: 200 * MB, maxItems: 1000 },
} as const;

export type CacheTier = keyof typeof TIER_LIMITS;

export const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const noteContentKey = (noteId: string, pageId: string, dataMode: string, type: NoteContentType) =>
  `note:${noteId}:page:${pageId}:mode:${dataMode}:type:${type}`;
export const imageKey = (noteId: string, pageId: string) => `image:${noteId}:page:${pageId}:optimized`;
export const ttsKey = (noteId: string, pageId: string, segmentId: string, voiceId: string) =>
  `tts:${noteId}:page:${pageId}:segment:${segmentId}:voice:${voiceId}`;
export const flashcardKey = (noteId: string) => `flashcard:${noteId}:cards`;

const isNoteListSnapshot = (value: NoteMetadataValue): value is NoteListSnapshot => 'noteIds' in value;

export interface CacheManagerOptions {
  userId: string;
  store: KeyValueStore;
  /** Root of the binary tiers; each namespace gets a directory below it. */
  cacheRoot?: string;
  now?: () => number;
}

/** The cache tiers of one user. Every namespace is prefixed with the user id. */
export class CacheManager {
  readonly userId: string;
  private readonly now: () => number;
  private readonly noteContents: LocalCacheStorage<string>;
  private readonly noteMetadata: LocalCacheStorage<NoteMetadataValue>;
  private readonly flashcards: LocalCacheStorage<FlashcardSnapshot>;
  private readonly images: LocalCacheStorage<string>;
  private readonly tts: LocalCacheStorage<string>;

  constructor({ userId, store, cacheRoot, now = Date.now }: CacheManagerOptions) {
    this.userId = userId;
    this.now = now;
    const tier = <T>(name: CacheTier) => {
      const namespace = `${userId}/${name}`;
      return new LocalCacheStorage<T>({
        namespace,
        store,
        now,
        cacheDir: cacheRoot ? PATH.join(cacheRoot, userId, name) : undefined,
        ...TIER_LIMITS[name],
      });
    };
    this.noteContents = tier<string>('note_contents');
    this.noteMetadata = tier<NoteMetadataValue>('note_metadata');
    this.flashcards = tier<FlashcardSnapshot>('flashcards');
    this.images = tier<string>('images');
    this.tts = tier<string>('tts');
  }

  private get tiers() {
    return {
      note_contents: this.noteContents,
      note_metadata: this.noteMetadata,
      flashcards: this.flashcards,
      images: this.images,
      tts: this.tts,
    };
  }

  async cacheNoteContent(noteId: string, pageId: string, dataMode: string, type: NoteContentType, content: string) {
    try {
      await this.noteContents.set(noteContentKey(noteId, pageId, dataMode, type), content);
    } catch (e) {
      logToFile('cacheNoteContent failed:', noteId, pageId, e);
    }
  }

  async getNoteContent(noteId: string, pageId: string, dataMode: string, type: NoteContentType) {
    return this.noteContents.get(noteContentKey(noteId, pageId, dataMode, type));
  }

  async getAllNoteContentKeys() {
    return this.noteContents.getKeys();
  }

  async clearNoteContents(noteId: string) {
    return this.noteContents.deleteByPattern(`note:${escapeRegExp(noteId)}:.*`);
  }

  async clearPageContents(noteId: string, pageId: string) {
    return this.noteContents.deleteByPattern(`note:${escapeRegExp(noteId)}:page:${escapeRegExp(pageId)}:.*`);
  }

  async cacheNoteMetadata(note: Note) {
    try {
      await this.noteMetadata.set(note.id, note);
    } catch (e) {
      logToFile('cacheNoteMetadata failed:', note.id, e);
    }
  }

  async getNoteMetadata(noteId: string) {
    const value = await this.noteMetadata.get(noteId);
    return value && !isNoteListSnapshot(value) ? value : null;
  }

  async getAllNoteMetadata() {
    const keys = (await this.noteMetadata.getKeys()).filter((key) => key !== NOTE_LIST_KEY);
    const notes: Note[] = [];
    for (const key of keys) {
      const note = await this.getNoteMetadata(key);
      if (note) {
        notes.push(note);
      }
    }
    return notes;
  }

  async clearNoteMetadata(noteId: string) {
    await this.noteMetadata.delete(noteId);
  }

  /** Caches a user's note list together with the time it was fetched. */
  async cacheNotes(notes: Note[]) {
    try {
      for (const note of notes) {
        await this.noteMetadata.set(note.id, note);
      }
      await this.noteMetadata.set(NOTE_LIST_KEY, { noteIds: notes.map(({ id }) => id), cachedAt: this.now() });
    } catch (e) {
      logToFile('cacheNotes failed:', e);
    }
  }

  /** The cached note list, or null when there is none or a listed note has been evicted since. */
  async getCachedNotes(): Promise<Note[] | null> {
    const snapshot = await this.noteMetadata.get(NOTE_LIST_KEY);
    if (!snapshot || !isNoteListSnapshot(snapshot)) {
      return null;
    }
    const notes: Note[] = [];
    for (const noteId of snapshot.noteIds) {
      const note = await this.getNoteMetadata(noteId);
      if (!note) {
        return null;
      }
      notes.push(note);
    }
    return notes;
  }

  async getLastCacheTime() {
    const snapshot = await this.noteMetadata.get(NOTE_LIST_KEY);
    return snapshot && isNoteListSnapshot(snapshot) ? snapshot.cachedAt : null;
  }

  async isCacheValid(validMs = NOTE_LIST_VALID_MS) {
    const cachedAt = await this.getLastCacheTime();
    return cachedAt !== null && this.now() - cachedAt < validMs;
  }

  async invalidateNoteList() {
    await this.noteMetadata.delete(NOTE_LIST_KEY);
  }

  async cacheImage(noteId: string, pageId: string, data: Buffer, extension = 'jpg') {
    try {
      return await this.images.setBinary(imageKey(noteId, pageId), data, extension);
    } catch (e) {
      logToFile('cacheImage failed:', noteId, pageId, e);
      return null;
    }
  }

  async getImage(noteId: string, pageId: string) {
    return this.images.getBinary(imageKey(noteId, pageId));
  }

  async getImagePath(noteId: string, pageId: string) {
    return this.images.getFilePath(imageKey(noteId, pageId));
  }

  async clearNoteImages(noteId: string) {
    return this.images.deleteByPattern(`image:${escapeRegExp(noteId)}:.*`);
  }

  async cacheTTS(noteId: string, pageId: string, segmentId: string, voiceId: string, audio: Buffer) {
    try {
      return await this.tts.setBinary(ttsKey(noteId, pageId, segmentId, voiceId), audio, 'mp3');
    } catch (e) {
      logToFile('cacheTTS failed:', noteId, pageId, segmentId, e);
      return null;
    }
  }

  async getTTS(noteId: string, pageId: string, segmentId: string, voiceId: string) {
    return this.tts.getBinary(ttsKey(noteId, pageId, segmentId, voiceId));
  }

  async getTTSPath(noteId: string, pageId: string, segmentId: string, voiceId: string) {
    return this.tts.getFilePath(ttsKey(noteId, pageId, segmentId, voiceId));
  }

  async clearNoteTTS(noteId: string) {
    return this.tts.deleteByPattern(`tts:${escapeRegExp(noteId)}:.*`);
  }

  async cacheFlashcards(noteId: string, cards: FlashCard[]) {
    try {
      await this.flashcards.set(flashcardKey(noteId), { cards, cachedAt: this.now() });
    } catch (e) {
      logToFile('cacheFlashcards failed:', noteId, e);
    }
  }

  async getFlashcards(noteId: string) {
    const snapshot = await this.flashcards.get(flashcardKey(noteId));
    return snapshot ? snapshot.cards : null;
  }

  /** Replaces the card with the same id in the note's cached list, or appends it; no list cached, nothing to do. */
  async cacheFlashcard(noteId: string, card: FlashCard) {
    const cards = await this.getFlashcards(noteId);
    if (!cards) {
      return;
    }
    const index = cards.findIndex(({ id }) => id === card.id);
    if (index >= 0) {
      cards[index] = card;
    } else {
      cards.push(card);
    }
    await this.cacheFlashcards(noteId, cards);
  }

  async removeFlashcard(noteId: string, cardId: string) {
    const cards = await this.getFlashcards(noteId);
    if (!cards) {
      return;
    }
    await this.cacheFlashcards(noteId, cards.filter(({ id }) => id !== cardId));
  }

  async clearFlashcardCache(noteId: string) {
    await this.flashcards.delete(flashcardKey(noteId));
  }

  async isFlashcardCacheValid(noteId: string, validMs = FLASHCARD_VALID_MS) {
    const snapshot = await this.flashcards.get(flashcardKey(noteId));
    return snapshot !== null && this.now() - snapshot.cachedAt < validMs;
  }

  async clearNoteCache(noteId: string) {
    await this.clearNoteContents(noteId);
    await this.clearNoteMetadata(noteId);
    await this.clearNoteImages(noteId);
    await this.clearNoteTTS(noteId);
    await this.clearFlashcardCache(noteId);
    logToFile('note cache cleared:', this.userId, noteId);
  }

  async clearAllCache() {
    for (const storage of Object.values(this.tiers)) {
      await storage.clear();
    }
  }

  async cleanupExpiredCache() {
    let removed = 0;
    for (const storage of Object.values(this.tiers)) {
      try {
        removed += await storage.cleanupExpired();
      } catch (e) {
        logToFile('cleanupExpired failed:', storage.namespace, e);
      }
    }
    return removed;
  }

  async getCacheStats(): Promise<Record<CacheTier, CacheStats>> {
    return {
      note_contents: await this.noteContents.getStats(),
      note_metadata: await this.noteMetadata.getStats(),
      flashcards: await this.flashcards.getStats(),
      images: await this.images.getStats(),
      tts: await this.tts.getStats(),
    };
  }
}

/** Hands out one CacheManager per user. */
export class UserCacheRegistry {
  private readonly managers = new Map<string, CacheManager>();

  constructor(private readonly options: Omit<CacheManagerOptions, 'userId'>) {}

  forUser(userId: string) {
    let manager = this.managers.get(userId);
    if (!manager) {
      manager = new CacheManager({ ...this.options, userId });
      this.managers.set(userId, manager);
    }
    return manager;
  }

  users() {
    return [...this.managers.keys()];
  }
}
