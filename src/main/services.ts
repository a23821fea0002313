import path from 'path';
import { DataSource } from 'typeorm';
import { AppConfig } from './config';
import { UserCacheRegistry } from './src/cache/CacheManager';
import { UnifiedCacheRegistry } from './src/cache/UnifiedCacheService';
import { FlashCardService } from './src/card/flashCardService';
import { DocumentStoreCacheSource } from './src/data/remote-cache-source';
import { KeyValueStore } from './src/db';
import { DictionaryService } from './src/dictionary/dictionaryService';
import { NoteService } from './src/note/noteService';
import { PageService } from './src/note/pageService';
import { GoogleVisionExtractor, OcrService, TextExtractor } from './src/ocr/ocrService';
import { PurchaseEventProcessor } from './src/purchase/purchaseEventProcessor';
import { ServerPurchasePlatform } from './src/purchase/serverPurchasePlatform';
import { EntitlementService } from './src/subscription/entitlementService';
import { UsageLimitService } from './src/subscription/usageLimitService';
import { LlmTextProcessor, SegmentTranslator } from './src/text/llmTextProcessor';
import { TextCleaner } from './src/text/textCleaner';
import {
  GoogleCloudTranslator,
  GoogleFreeTranslator,
  PapagoTranslator,
  TranslationService,
  Translator,
} from './src/translation/translationService';
import { UserPreferencesService } from './src/user/userPreferencesService';
import { NoteCreationWorkflow } from './src/workflow/noteCreationWorkflow';
import { PostProcessingQueue, PostProcessingQueueOptions } from './src/workflow/postProcessingQueue';
import { TextProcessingWorkflow } from './src/workflow/textProcessingWorkflow';

export interface Services {
  dataRoot: string;
  dataSource: DataSource;
  caches: UserCacheRegistry;
  segmentCaches: UnifiedCacheRegistry;
  notes: NoteService;
  pages: PageService;
  preferences: UserPreferencesService;
  entitlements: EntitlementService;
  usage: UsageLimitService;
  dictionary: DictionaryService;
  cards: FlashCardService;
  queue: PostProcessingQueue;
  creation: NoteCreationWorkflow;
  textProcessing: TextProcessingWorkflow;
  purchases: PurchaseEventProcessor;
  now: () => number;
}

/** Providers and timings tests swap out; production leaves them unset. */
export interface ServiceOverrides {
  extractor?: TextExtractor;
  translator?: SegmentTranslator;
  translators?: Translator[];
  dictionary?: DictionaryService;
  queueOptions?: PostProcessingQueueOptions;
  cacheRoot?: string;
  now?: () => number;
}

const configuredTranslators = (config: AppConfig): Translator[] => {
  const translators: Translator[] = [];
  if (config.googleCloudApiKey && config.googleCloudProjectId) {
    translators.push(new GoogleCloudTranslator());
  }
  if (config.papagoClientId && config.papagoClientSecret) {
    translators.push(new PapagoTranslator());
  }
  translators.push(new GoogleFreeTranslator());
  return translators;
};

export const createServices = async (
  config: AppConfig,
  dataSource: DataSource,
  store: KeyValueStore,
  overrides: ServiceOverrides = {},
): Promise<Services> => {
  const now = overrides.now ?? Date.now;
  const caches = new UserCacheRegistry({
    store,
    cacheRoot: overrides.cacheRoot ?? path.join(config.dataRoot, 'cache'),
    now,
  });
  const segmentCaches = new UnifiedCacheRegistry({
    store,
    remoteFor: (userId) => new DocumentStoreCacheSource(dataSource, userId, now),
    now,
  });
  const notes = new NoteService(dataSource, caches, now);
  const pages = new PageService(dataSource, now);
  const preferences = new UserPreferencesService(store);
  const entitlements = new EntitlementService(dataSource, now);
  const usage = new UsageLimitService(dataSource, entitlements, now);

  const llm = new LlmTextProcessor();
  const translator = overrides.translator ?? llm;
  const fallback = new TranslationService(overrides.translators ?? configuredTranslators(config));
  const dictionary = overrides.dictionary ?? (await DictionaryService.load({ external: llm, store, now }));

  const queue = new PostProcessingQueue(
    { dataSource, notes, pages, segmentCaches, translator, fallback, usage, now },
    overrides.queueOptions,
  );
  const ocr = new OcrService(overrides.extractor ?? new GoogleVisionExtractor(), (userId, count) =>
    usage.increment(userId, 'ocrPages', count),
  );
  const creation = new NoteCreationWorkflow({
    notes,
    pages,
    caches,
    ocr,
    cleaner: new TextCleaner(),
    preferences,
    usage,
    queue,
    now,
  });
  const textProcessing = new TextProcessingWorkflow(pages, caches, segmentCaches, preferences, queue, now);
  const cards = new FlashCardService(dataSource, notes, caches, segmentCaches, dictionary, now);
  const purchases = new PurchaseEventProcessor(
    new ServerPurchasePlatform(),
    async ({ userId, productId, transactionDate }) => {
      await entitlements.applyPurchase({ userId, productId, transactionDate: transactionDate ?? now() });
    },
    { now },
  );

  return {
    dataRoot: config.dataRoot,
    dataSource,
    caches,
    segmentCaches,
    notes,
    pages,
    preferences,
    entitlements,
    usage,
    dictionary,
    cards,
    queue,
    creation,
    textProcessing,
    purchases,
    now,
  };
};
