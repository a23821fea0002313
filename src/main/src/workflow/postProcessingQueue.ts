import { DataSource } from 'typeorm';
import { Observable, Subject, Subscription, from, mergeMap } from 'rxjs';
import { logToFile } from '../../log';
import { UnifiedCacheRegistry } from '../cache/UnifiedCacheService';
import { ProcessingJobEntity } from '../data/entity/ProcessingJob';
import { NoteService } from '../note/noteService';
import { PageService } from '../note/pageService';
import { UsageLimitService } from '../subscription/usageLimitService';
import { SegmentTranslator } from '../text/llmTextProcessor';
import { TranslationService } from '../translation/translationService';
import { PageProcessingData, PostProcessingJob } from '../types/ProcessingJob';
import { ProcessedText, TextProcessingMode, TextUnit, defaultSegmentType, withOriginalOnly, withTranslatedUnits } from '../types/ProcessedText';
import { ProcessingStatus } from '../types/ProcessingStatus';
import { sleep } from '../utils/time';

export const TRANSLATION_FAILED = '[translation failed]';

export type QueueEvent =
  | { type: 'pageProgress'; userId: string; noteId: string; pageId: string; progress: number }
  | { type: 'pageCompleted'; userId: string; noteId: string; pageId: string }
  | { type: 'noteStatus'; userId: string; noteId: string; status: ProcessingStatus; error?: string };

export interface PostProcessingQueueOptions {
  chunkSize?: number;
  chunkDelayMs?: number;
  jobDelayMs?: number;
  retryBaseDelayMs?: number;
  maxRetries?: number;
}

export interface PostProcessingDeps {
  dataSource: DataSource;
  notes: NoteService;
  pages: PageService;
  segmentCaches: UnifiedCacheRegistry;
  translator: SegmentTranslator;
  fallback?: TranslationService;
  usage?: Pick<UsageLimitService, 'updateUsageAfterNoteCreation'>;
  now?: () => number;
}

interface PendingSegment {
  page: PageProcessingData;
  text: string;
}

const groupKey = ({ mode, sourceLanguage, targetLanguage }: PageProcessingData) =>
  `${mode}|${sourceLanguage}|${targetLanguage}`;

const failedUnit = (
  originalText: string,
  { mode, sourceLanguage, targetLanguage }: Pick<PageProcessingData, 'mode' | 'sourceLanguage' | 'targetLanguage'>,
): TextUnit => ({
  originalText,
  translatedText: TRANSLATION_FAILED,
  pinyin: '',
  sourceLanguage,
  targetLanguage,
  segmentType: defaultSegmentType(mode),
});

const chunksOf = <T>(items: T[], size: number) => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Translates the segments OCR produced, one job at a time. Jobs are persisted
 * until they finish so that an interrupted run can be picked up again.
 */
export class PostProcessingQueue {
  private readonly jobs$ = new Subject<PostProcessingJob>();
  private readonly eventSubject = new Subject<QueueEvent>();
  readonly events$: Observable<QueueEvent> = this.eventSubject.asObservable();
  private readonly retryTimers = new Set<NodeJS.Timeout>();
  private subscription: Subscription | null = null;
  private outstanding = 0;
  private idleWaiters: Array<() => void> = [];

  private readonly chunkSize: number;
  private readonly chunkDelayMs: number;
  private readonly jobDelayMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxRetries: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: PostProcessingDeps,
    { chunkSize = 20, chunkDelayMs = 500, jobDelayMs = 500, retryBaseDelayMs = 1000, maxRetries = 3 }: PostProcessingQueueOptions = {},
  ) {
    this.chunkSize = chunkSize;
    this.chunkDelayMs = chunkDelayMs;
    this.jobDelayMs = jobDelayMs;
    this.retryBaseDelayMs = retryBaseDelayMs;
    this.maxRetries = maxRetries;
    this.now = deps.now ?? Date.now;
  }

  start() {
    if (this.subscription) {
      return;
    }
    this.subscription = this.jobs$.pipe(mergeMap((job) => from(this.runJob(job)), 1)).subscribe();
  }

  stop() {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.retryTimers.forEach((timer) => clearTimeout(timer));
    this.retryTimers.clear();
    this.outstanding = 0;
    this.settleIdle();
  }

  async enqueueJob(job: PostProcessingJob) {
    const now = this.now();
    const entity = this.deps.dataSource.manager.create(ProcessingJobEntity, {
      id: job.jobId,
      noteId: job.noteId,
      userId: job.userId,
      status: 'pending',
      payload: job,
      retryCount: job.retryCount,
      createdAt: job.createdAt,
      updatedAt: now,
    });
    await this.deps.dataSource.manager.save(entity);
    logToFile('post-processing job queued:', job.jobId, 'pages:', job.pages.length);
    this.enqueueExisting(job);
  }

  /** Queues a job whose row already exists. */
  enqueueExisting(job: PostProcessingJob) {
    this.start();
    this.outstanding += 1;
    this.jobs$.next(job);
  }

  /** Resolves once no job is queued, running or waiting for a retry. */
  onIdle() {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private settleIdle() {
    if (this.outstanding > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private emit(event: QueueEvent) {
    this.eventSubject.next(event);
  }

  private async setJobStatus(jobId: string, status: ProcessingJobEntity['status'], retryCount?: number) {
    await this.deps.dataSource.manager.update(
      ProcessingJobEntity,
      { id: jobId },
      retryCount === undefined ? { status, updatedAt: this.now() } : { status, retryCount, updatedAt: this.now() },
    );
  }

  private async runJob(job: PostProcessingJob) {
    try {
      await this.processJob(job);
      await sleep(this.jobDelayMs);
    } catch (e) {
      logToFile('post-processing job failed:', job.jobId, e);
      await this.handleFailure(job, e).catch((err) => logToFile('post-processing failure handling failed:', job.jobId, err));
    } finally {
      this.outstanding = Math.max(0, this.outstanding - 1);
      this.settleIdle();
    }
  }

  private async handleFailure(job: PostProcessingJob, error: unknown) {
    const { notes, dataSource } = this.deps;
    if (job.retryCount < this.maxRetries) {
      const delay = this.retryBaseDelayMs * 2 ** job.retryCount;
      const retry: PostProcessingJob = { ...job, retryCount: job.retryCount + 1 };
      await this.setJobStatus(job.jobId, 'retrying', retry.retryCount);
      await notes.updateProcessingStatus(job.noteId, 'retrying');
      this.emit({ type: 'noteStatus', userId: job.userId, noteId: job.noteId, status: 'retrying' });
      this.outstanding += 1;
      const timer = setTimeout(() => {
        this.retryTimers.delete(timer);
        this.jobs$.next(retry);
      }, delay);
      this.retryTimers.add(timer);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    await notes.updateProcessingStatus(job.noteId, 'failed', { error: message });
    await dataSource.manager.delete(ProcessingJobEntity, { id: job.jobId });
    this.emit({ type: 'noteStatus', userId: job.userId, noteId: job.noteId, status: 'failed', error: message });
  }

  private async processJob(job: PostProcessingJob) {
    const { notes, pages, segmentCaches, dataSource, usage } = this.deps;
    await this.setJobStatus(job.jobId, 'running');
    await notes.updateProcessingStatus(job.noteId, 'translating');
    this.emit({ type: 'noteStatus', userId: job.userId, noteId: job.noteId, status: 'translating' });

    const groups = new Map<string, PendingSegment[]>();
    const totals = new Map<string, number>();
    for (const page of job.pages) {
      const segments = page.textSegments.filter((text) => text.trim() !== '');
      totals.set(page.pageId, segments.length);
      if (segments.length === 0) {
        await pages.updatePage(page.pageId, { processingStatus: page.ocrSuccess ? 'completed' : 'failed' });
        continue;
      }
      const key = groupKey(page);
      groups.set(key, [...(groups.get(key) ?? []), ...segments.map((text) => ({ page, text }))]);
    }

    const units = new Map<string, TextUnit[]>();
    const announced = new Set<string>();
    let translatedChars = 0;
    const chunks = [...groups.values()].flatMap((segments) => chunksOf(segments, this.chunkSize));
    for (const [index, chunk] of chunks.entries()) {
      const translated = await this.translateChunk(chunk);
      chunk.forEach(({ page, text }, i) => {
        const unit = translated[i] ?? failedUnit(text, page);
        units.set(page.pageId, [...(units.get(page.pageId) ?? []), unit]);
      });
      translatedChars += chunk.reduce((sum, { text }) => sum + text.length, 0);

      const touched = new Map(chunk.map(({ page }) => [page.pageId, page]));
      for (const page of touched.values()) {
        const pageUnits = units.get(page.pageId) ?? [];
        const total = totals.get(page.pageId) ?? pageUnits.length;
        await this.savePageUnits(page, pageUnits, total);
        this.emit({ type: 'pageProgress', userId: job.userId, noteId: job.noteId, pageId: page.pageId, progress: pageUnits.length / total });
        if (pageUnits.length >= total && !announced.has(page.pageId)) {
          announced.add(page.pageId);
          this.emit({ type: 'pageCompleted', userId: job.userId, noteId: job.noteId, pageId: page.pageId });
        }
      }
      if (index < chunks.length - 1) {
        await sleep(this.chunkDelayMs);
      }
    }

    await notes.updateProcessingStatus(job.noteId, 'completed');
    this.emit({ type: 'noteStatus', userId: job.userId, noteId: job.noteId, status: 'completed' });

    if (usage) {
      await usage.updateUsageAfterNoteCreation(job.userId, {
        ocrPages: job.pages.filter(({ ocrSuccess }) => ocrSuccess).length,
        storageBytes: job.pages.reduce((sum, { imageFileSize }) => sum + imageFileSize, 0),
        translatedChars,
      });
    }
    await dataSource.manager.delete(ProcessingJobEntity, { id: job.jobId });

    const cache = segmentCaches.forUser(job.userId);
    for (const { pageId } of job.pages) {
      const page = await pages.getPage(pageId);
      if (page?.processedText) {
        await cache.cacheSegments(pageId, page.processedText.mode, page.processedText);
      }
    }
    logToFile('post-processing job done:', job.jobId, 'chars:', translatedChars);
  }

  private async translateChunk(chunk: PendingSegment[]): Promise<TextUnit[]> {
    const { mode, sourceLanguage, targetLanguage } = chunk[0].page;
    const segments = chunk.map(({ text }) => text);
    try {
      return await this.deps.translator.translateSegments({
        segments,
        sourceLanguage,
        targetLanguage,
        needPinyin: mode === 'segment',
        mode,
      });
    } catch (e) {
      logToFile('chunk translation failed, size', segments.length, e);
      return Promise.all(segments.map((text) => this.fallbackUnit(text, mode, sourceLanguage, targetLanguage)));
    }
  }

  private async fallbackUnit(originalText: string, mode: TextProcessingMode, sourceLanguage: string, targetLanguage: string): Promise<TextUnit> {
    const translated = this.deps.fallback ? await this.deps.fallback.translateOrNull(originalText, sourceLanguage, targetLanguage) : null;
    return { ...failedUnit(originalText, { mode, sourceLanguage, targetLanguage }), translatedText: translated ?? TRANSLATION_FAILED };
  }

  private async savePageUnits(page: PageProcessingData, pageUnits: TextUnit[], total: number) {
    const stored = await this.deps.pages.requirePage(page.pageId);
    const base =
      stored.processedText ??
      withOriginalOnly({
        mode: page.mode,
        segments: page.textSegments,
        sourceLanguage: page.sourceLanguage,
        targetLanguage: page.targetLanguage,
      });
    const done = pageUnits.length >= total;
    let processedText: ProcessedText;
    if (done) {
      processedText = withTranslatedUnits(base, pageUnits);
    } else {
      processedText = {
        ...withTranslatedUnits(base, [...pageUnits, ...base.units.slice(pageUnits.length)]),
        streamingStatus: 'streaming',
        completedUnits: pageUnits.length,
        progress: pageUnits.length / total,
      };
    }
    await this.deps.pages.updatePage(page.pageId, {
      translatedText: pageUnits.map(({ translatedText }) => translatedText ?? '').join(' '),
      pinyin: pageUnits
        .map(({ pinyin }) => pinyin ?? '')
        .filter((pinyin) => pinyin !== '')
        .join(' '),
      processedText,
      processingStatus: done ? 'completed' : 'translating',
    });
  }
}
