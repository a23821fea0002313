import { v4 as uuidv4 } from 'uuid';
import { logToFile } from '../../log';
import { UserCacheRegistry } from '../cache/CacheManager';
import { UnifiedCacheRegistry } from '../cache/UnifiedCacheService';
import { NotFoundError } from '../errors';
import { PageService } from '../note/pageService';
import { separateForSettingsChange } from '../text/textSegmenter';
import { ProcessedText, TextProcessingMode, withOriginalOnly } from '../types/ProcessedText';
import { UserPreferencesService } from '../user/userPreferencesService';
import { PostProcessingQueue } from './postProcessingQueue';

export class TextProcessingWorkflow {
  constructor(
    private readonly pages: PageService,
    private readonly caches: UserCacheRegistry,
    private readonly segmentCaches: UnifiedCacheRegistry,
    private readonly preferences: UserPreferencesService,
    private readonly queue: Pick<PostProcessingQueue, 'enqueueJob'>,
    private readonly now: () => number = Date.now,
  ) {}

  /** Read through the segment cache; the page row answers on a miss. */
  async getProcessedText(userId: string, noteId: string, pageId: string): Promise<ProcessedText | null> {
    const page = await this.pages.getPage(pageId);
    if (!page || page.noteId !== noteId) {
      throw new NotFoundError('page', pageId);
    }
    const cached = await this.segmentCaches.forUser(userId).getSegments(pageId, page.processingMode);
    return cached ?? page.processedText;
  }

  /** Splits the page again for the new mode and sends it back through translation. */
  async reprocessForMode(userId: string, noteId: string, pageId: string, mode: TextProcessingMode) {
    const page = await this.pages.getPage(pageId);
    if (!page || page.noteId !== noteId) {
      throw new NotFoundError('page', pageId);
    }
    const source = page.cleanedText || page.originalText;
    const segments = source.trim() === '' ? [] : separateForSettingsChange(source, mode);
    const processedText = withOriginalOnly({
      mode,
      segments,
      sourceLanguage: page.sourceLanguage,
      targetLanguage: page.targetLanguage,
    });
    const updated = await this.pages.updatePage(pageId, {
      processingMode: mode,
      textSegments: segments,
      processedText,
      translatedText: '',
      pinyin: '',
      processingStatus: 'segmentsReady',
    });
    await this.caches.forUser(userId).clearPageContents(noteId, pageId);
    await this.segmentCaches.forUser(userId).clearImageCache(pageId);

    if (segments.length > 0) {
      const prefs = await this.preferences.getPreferences(userId);
      await this.queue.enqueueJob({
        jobId: uuidv4(),
        noteId,
        userId,
        pages: [
          {
            pageId,
            imageKey: page.imageKey,
            textSegments: segments,
            mode,
            sourceLanguage: page.sourceLanguage,
            targetLanguage: page.targetLanguage,
            imageFileSize: 0,
            ocrSuccess: false,
          },
        ],
        userPrefs: { ...prefs, useSegmentMode: mode === 'segment' },
        createdAt: this.now(),
        priority: 1,
        retryCount: 0,
      });
    }
    logToFile('page reprocessed:', pageId, 'mode:', mode, 'segments:', segments.length);
    return updated;
  }
}
