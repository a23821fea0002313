import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { PageEntity } from '../data/entity/Page';
import { NotFoundError } from '../errors';
import { Page } from '../types/Note';
import { TextProcessingMode } from '../types/ProcessedText';

export type PagePatch = Partial<Omit<Page, 'id' | 'noteId' | 'createdAt' | 'updatedAt'>>;

export interface NewPage {
  noteId: string;
  pageNumber: number;
  imageKey: string | null;
  imageFileSize: number;
  processingMode: TextProcessingMode;
  sourceLanguage: string;
  targetLanguage: string;
}

export class PageService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly now: () => number = Date.now,
  ) {}

  /** A page with no text yet; OCR fills it in later. */
  async createPage(input: NewPage) {
    const now = this.now();
    const page = this.dataSource.manager.create(PageEntity, {
      ...input,
      id: uuidv4(),
      cleanedText: '',
      originalText: '',
      translatedText: '',
      pinyin: '',
      textSegments: [],
      processedText: null,
      processingStatus: 'created',
      createdAt: now,
      updatedAt: now,
    });
    return this.dataSource.manager.save(page);
  }

  async getPage(pageId: string) {
    return this.dataSource.manager.findOneBy(PageEntity, { id: pageId });
  }

  async requirePage(pageId: string) {
    const page = await this.getPage(pageId);
    if (!page) {
      throw new NotFoundError('page', pageId);
    }
    return page;
  }

  async getPagesForNote(noteId: string) {
    return this.dataSource.manager.find(PageEntity, {
      where: { noteId },
      order: { pageNumber: 'ASC' },
    });
  }

  async updatePage(pageId: string, patch: PagePatch) {
    const page = await this.requirePage(pageId);
    Object.assign(page, patch, { updatedAt: this.now() });
    return this.dataSource.manager.save(page);
  }

  async deletePagesForNote(noteId: string) {
    await this.dataSource.manager.delete(PageEntity, { noteId });
  }
}
