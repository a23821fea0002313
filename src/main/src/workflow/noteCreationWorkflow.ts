import { v4 as uuidv4 } from 'uuid';
import { logToFile } from '../../log';
import { UserCacheRegistry, imageKey } from '../cache/CacheManager';
import { ValidationError } from '../errors';
import { NoteService } from '../note/noteService';
import { PageService } from '../note/pageService';
import { OcrService } from '../ocr/ocrService';
import { UsageLimitService } from '../subscription/usageLimitService';
import { TextCleaner } from '../text/textCleaner';
import { separateForCreation } from '../text/textSegmenter';
import { PageProcessingData } from '../types/ProcessingJob';
import { withOriginalOnly } from '../types/ProcessedText';
import { UserPreferences, processingModeOf } from '../types/UserPreferences';
import { UserPreferencesService } from '../user/userPreferencesService';
import { PostProcessingQueue } from './postProcessingQueue';

export interface NoteCreationDeps {
  notes: NoteService;
  pages: PageService;
  caches: UserCacheRegistry;
  ocr: OcrService;
  cleaner: TextCleaner;
  preferences: UserPreferencesService;
  usage: Pick<UsageLimitService, 'assertWithinLimit'>;
  queue: Pick<PostProcessingQueue, 'enqueueJob'>;
  now?: () => number;
}

interface CreatedPage {
  pageId: string;
  image: Buffer;
}

/**
 * First half of note creation: the note and its blank pages exist as soon as
 * `createNoteQuickly` returns, OCR and segmentation follow in the background
 * and hand over to the post-processing queue.
 */
export class NoteCreationWorkflow {
  private readonly background = new Map<string, Promise<void>>();
  private readonly now: () => number;

  constructor(private readonly deps: NoteCreationDeps) {
    this.now = deps.now ?? Date.now;
  }

  async createNoteQuickly(userId: string, images: Buffer[], { title }: { title?: string } = {}) {
    if (images.length === 0) {
      throw new ValidationError('at least one image is required');
    }
    const { notes, pages, caches, preferences, usage } = this.deps;
    await usage.assertWithinLimit(userId, 'ocrPages', images.length);

    const note = await notes.createNote(userId, { title, pageCount: images.length });
    const prefs = await preferences.getPreferences(userId);
    const mode = processingModeOf(prefs);
    const cache = caches.forUser(userId);

    const created: CreatedPage[] = [];
    for (const [pageNumber, image] of images.entries()) {
      const page = await pages.createPage({
        noteId: note.id,
        pageNumber,
        imageKey: null,
        imageFileSize: image.length,
        processingMode: mode,
        sourceLanguage: prefs.sourceLanguage,
        targetLanguage: prefs.targetLanguage,
      });
      const stored = await cache.cacheImage(note.id, page.id, image);
      if (stored !== null) {
        await pages.updatePage(page.id, { imageKey: imageKey(note.id, page.id) });
      }
      created.push({ pageId: page.id, image });
    }
    if (created.length > 0) {
      await notes.updateNote(note.id, { thumbnailKey: imageKey(note.id, created[0].pageId) });
    }

    const task = this.processInBackground(userId, note.id, created, prefs)
      .catch(async (e) => {
        logToFile('background processing failed:', note.id, e);
        const message = e instanceof Error ? e.message : String(e);
        await notes.updateProcessingStatus(note.id, 'failed', { error: message });
      })
      .catch((e) => logToFile('marking note failed did not work:', note.id, e))
      .finally(() => this.background.delete(note.id));
    this.background.set(note.id, task);
    return note.id;
  }

  /** Resolves when the OCR stage of a note has handed over (or there is none running). */
  async waitForBackground(noteId: string) {
    await this.background.get(noteId);
  }

  private async processInBackground(userId: string, noteId: string, created: CreatedPage[], prefs: UserPreferences) {
    const { notes, pages, ocr, cleaner, queue } = this.deps;
    const mode = processingModeOf(prefs);
    const processed: PageProcessingData[] = [];

    for (const { pageId, image } of created) {
      try {
        const raw = await ocr.extractText(userId, image, { skipUsageCount: true });
        const cleaned = cleaner.cleanText(raw);
        const segments = cleaned.trim() === '' ? [] : separateForCreation(cleaned, mode);
        const page = await pages.updatePage(pageId, {
          cleanedText: cleaned,
          originalText: segments.join(' '),
          textSegments: segments,
          processedText: withOriginalOnly({
            mode,
            segments,
            sourceLanguage: prefs.sourceLanguage,
            targetLanguage: prefs.targetLanguage,
          }),
          processingStatus: 'textExtracted',
        });
        processed.push({
          pageId,
          imageKey: page.imageKey,
          textSegments: segments,
          mode,
          sourceLanguage: prefs.sourceLanguage,
          targetLanguage: prefs.targetLanguage,
          imageFileSize: image.length,
          ocrSuccess: segments.length > 0,
        });
      } catch (e) {
        logToFile('page processing failed, skipping:', pageId, e);
      }
    }

    if (processed.length === 0) {
      await notes.updateProcessingStatus(noteId, 'failed', { error: 'no page could be processed' });
      return;
    }
    await notes.updateProcessingStatus(noteId, 'textExtracted');
    await queue.enqueueJob({
      jobId: uuidv4(),
      noteId,
      userId,
      pages: processed,
      userPrefs: prefs,
      createdAt: this.now(),
      priority: 0,
      retryCount: 0,
    });
  }
}
