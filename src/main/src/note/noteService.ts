import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { logToFile } from '../../log';
import { UserCacheRegistry } from '../cache/CacheManager';
import { NoteEntity } from '../data/entity/Note';
import { PageEntity } from '../data/entity/Page';
import { FlashCardEntity } from '../data/entity/FlashCard';
import { ProcessingJobEntity } from '../data/entity/ProcessingJob';
import { NotFoundError } from '../errors';
import { Note } from '../types/Note';
import { ProcessingStatus, statusProgress } from '../types/ProcessingStatus';
import { formatNoteTimestamp } from '../utils/time';

export type NotePatch = Partial<Pick<Note, 'title' | 'description' | 'isFavorite' | 'thumbnailKey' | 'pageCount'>>;

export class NoteService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly caches: UserCacheRegistry,
    private readonly now: () => number = Date.now,
  ) {}

  async createNote(userId: string, { title, description = null, pageCount = 0 }: { title?: string; description?: string | null; pageCount?: number } = {}) {
    const now = this.now();
    const note = this.dataSource.manager.create(NoteEntity, {
      id: uuidv4(),
      userId,
      title: title?.trim() || `Note ${formatNoteTimestamp(now)}`,
      description,
      isFavorite: false,
      flashcardCount: 0,
      pageCount,
      thumbnailKey: null,
      processingStatus: 'created',
      processingProgress: statusProgress('created'),
      processingError: null,
      createdAt: now,
      updatedAt: now,
    });
    await this.dataSource.manager.save(note);
    const cache = this.caches.forUser(userId);
    await cache.cacheNoteMetadata(note);
    await cache.invalidateNoteList();
    logToFile('note created:', note.id, 'for user', userId);
    return note;
  }

  async getNote(noteId: string) {
    return this.dataSource.manager.findOneBy(NoteEntity, { id: noteId });
  }

  async requireNote(noteId: string) {
    const note = await this.getNote(noteId);
    if (!note) {
      throw new NotFoundError('note', noteId);
    }
    return note;
  }

  /** Newest first; served from the note metadata cache while it is fresh. */
  async getNotes(userId: string): Promise<Note[]> {
    const cache = this.caches.forUser(userId);
    if (await cache.isCacheValid()) {
      const cached = await cache.getCachedNotes();
      if (cached) {
        return cached;
      }
    }
    const notes = await this.dataSource.manager.find(NoteEntity, {
      where: { userId },
      order: { createdAt: 'DESC' },
    });
    await cache.cacheNotes(notes);
    return notes;
  }

  async updateNote(noteId: string, patch: NotePatch) {
    await this.dataSource.manager.update(NoteEntity, { id: noteId }, { ...patch, updatedAt: this.now() });
    return this.refresh(noteId);
  }

  async toggleFavorite(noteId: string) {
    const note = await this.requireNote(noteId);
    return this.updateNote(noteId, { isFavorite: !note.isFavorite });
  }

  async updateProcessingStatus(noteId: string, status: ProcessingStatus, { progress, error }: { progress?: number; error?: string | null } = {}) {
    await this.dataSource.manager.update(
      NoteEntity,
      { id: noteId },
      {
        processingStatus: status,
        processingProgress: progress ?? statusProgress(status),
        processingError: error === undefined ? null : error,
        updatedAt: this.now(),
      },
    );
    return this.refresh(noteId);
  }

  async adjustFlashcardCount(noteId: string, delta: number) {
    const note = await this.requireNote(noteId);
    await this.dataSource.manager.update(
      NoteEntity,
      { id: noteId },
      { flashcardCount: Math.max(0, note.flashcardCount + delta), updatedAt: this.now() },
    );
    return this.refresh(noteId);
  }

  /** Removes the note with its pages, cards, pending jobs and every cached tier. */
  async deleteNote(noteId: string) {
    const note = await this.requireNote(noteId);
    await this.dataSource.transaction(async (manager) => {
      await manager.delete(PageEntity, { noteId });
      await manager.delete(FlashCardEntity, { noteId });
      await manager.delete(ProcessingJobEntity, { noteId });
      await manager.delete(NoteEntity, { id: noteId });
    });
    const cache = this.caches.forUser(note.userId);
    await cache.clearNoteCache(noteId);
    await cache.invalidateNoteList();
    logToFile('note deleted:', noteId);
  }

  private async refresh(noteId: string) {
    const note = await this.requireNote(noteId);
    await this.caches.forUser(note.userId).cacheNoteMetadata(note);
    return note;
  }
}
