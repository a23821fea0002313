import MiniSearch from 'minisearch';
import { DataSource, In, LessThan } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { supermemo, SuperMemoGrade } from 'supermemo';
import { logToFile } from '../../log';
import { UserCacheRegistry } from '../cache/CacheManager';
import { UnifiedCacheRegistry } from '../cache/UnifiedCacheService';
import { FlashCardEntity } from '../data/entity/FlashCard';
import { DictionaryService } from '../dictionary/dictionaryService';
import { NotFoundError, ValidationError } from '../errors';
import { NoteService } from '../note/noteService';
import { meaningFor } from '../types/Dictionary';
import { FlashCard } from '../types/FlashCard';
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from '../types/Language';
import { foldTerm, tokenizeMixed } from '../utils/searchText';
import { DAY } from '../utils/time';

export const REVIEW_BATCH_SIZE = 100;

export interface NewFlashCard {
  front: string;
  back?: string;
  pinyin?: string;
  noteId?: string | null;
  sourceLanguage?: string;
  targetLanguage?: string;
}

type FlashCardSearchItem = Pick<FlashCard, 'id' | 'front' | 'back' | 'pinyin'>;

const isGrade = (grade: number): grade is SuperMemoGrade => Number.isInteger(grade) && grade >= 0 && grade <= 5;

export class FlashCardService {
  private readonly indexes = new Map<string, MiniSearch<FlashCardSearchItem>>();

  constructor(
    private readonly dataSource: DataSource,
    private readonly notes: NoteService,
    private readonly caches: UserCacheRegistry,
    private readonly cardLists: UnifiedCacheRegistry,
    private readonly dictionary: DictionaryService,
    private readonly now: () => number = Date.now,
  ) {}

  /** Fills back and pinyin from the dictionary when they are missing. */
  async createFlashCard(userId: string, input: NewFlashCard) {
    const front = input.front.trim();
    if (front === '') {
      throw new ValidationError('flashcard front is empty');
    }
    const noteId = input.noteId ?? null;
    const targetLanguage = input.targetLanguage ?? DEFAULT_TARGET_LANGUAGE;
    if (noteId !== null) {
      await this.notes.requireNote(noteId);
      const existing = await this.dataSource.manager.findOneBy(FlashCardEntity, { userId, noteId, front });
      if (existing) {
        return existing;
      }
    }

    let back = input.back?.trim() ?? '';
    let pinyin = input.pinyin?.trim() ?? '';
    if (back === '' || pinyin === '') {
      const entry = await this.dictionary.lookup(front, targetLanguage);
      if (entry) {
        back = back || meaningFor(entry, targetLanguage);
        pinyin = pinyin || entry.pinyin;
      }
    }

    const now = this.now();
    const card = this.dataSource.manager.create(FlashCardEntity, {
      id: uuidv4(),
      userId,
      noteId,
      front,
      back,
      pinyin,
      sourceLanguage: input.sourceLanguage ?? DEFAULT_SOURCE_LANGUAGE,
      targetLanguage,
      dueDate: now,
      interval: 0,
      repetition: 0,
      efactor: 2.5,
      reviewCount: 0,
      lastReviewedAt: null,
      createdAt: now,
      updatedAt: now,
    });
    await this.dataSource.manager.save(card);
    if (noteId !== null) {
      await this.notes.adjustFlashcardCount(noteId, 1);
      await this.caches.forUser(userId).cacheFlashcard(noteId, card);
      await this.cardLists.forUser(userId).clearFlashcardCache(noteId);
    }
    const index = await this.indexFor(userId);
    if (!index.has(card.id)) {
      index.add({ id: card.id, front, back, pinyin });
    }
    logToFile('flashcard created:', card.id, front);
    return card;
  }

  async getFlashCard(cardId: string) {
    const card = await this.dataSource.manager.findOneBy(FlashCardEntity, { id: cardId });
    if (!card) {
      throw new NotFoundError('flashcard', cardId);
    }
    return card;
  }

  async getFlashCardsForNote(userId: string, noteId: string): Promise<FlashCard[]> {
    const cache = this.caches.forUser(userId);
    if (await cache.isFlashcardCacheValid(noteId)) {
      const cached = await cache.getFlashcards(noteId);
      if (cached) {
        return cached;
      }
    }
    const cards = await this.cardLists.forUser(userId).getFlashcards(noteId);
    if (!cards) {
      return [];
    }
    await cache.cacheFlashcards(noteId, cards);
    return cards;
  }

  async getCardsToReview(userId: string, date = this.now()) {
    return this.dataSource.manager.find(FlashCardEntity, {
      where: { userId, dueDate: LessThan(date) },
      order: { dueDate: 'ASC' },
      take: REVIEW_BATCH_SIZE,
    });
  }

  /** Pages start at 1, cards come soonest due first. */
  async cardsByPage(userId: string, pageSize: number, pageNumber: number) {
    return this.dataSource.manager.find(FlashCardEntity, {
      where: { userId },
      order: { dueDate: 'ASC' },
      take: pageSize,
      skip: pageSize * (pageNumber - 1),
    });
  }

  async reviewFlashCard(cardId: string, grade: number) {
    if (!isGrade(grade)) {
      throw new ValidationError(`grade must be an integer from 0 to 5, got ${grade}`);
    }
    const card = await this.getFlashCard(cardId);
    const { interval, repetition, efactor } = supermemo(card, grade);
    const now = this.now();
    Object.assign(card, {
      interval,
      repetition,
      efactor,
      dueDate: now + interval * DAY,
      reviewCount: card.reviewCount + 1,
      lastReviewedAt: now,
      updatedAt: now,
    });
    await this.dataSource.manager.save(card);
    if (card.noteId !== null) {
      await this.caches.forUser(card.userId).cacheFlashcard(card.noteId, card);
      await this.cardLists.forUser(card.userId).clearFlashcardCache(card.noteId);
    }
    return card;
  }

  async deleteFlashCard(cardId: string) {
    const card = await this.getFlashCard(cardId);
    await this.dataSource.manager.delete(FlashCardEntity, { id: cardId });
    if (card.noteId !== null) {
      const note = await this.notes.getNote(card.noteId);
      if (note) {
        await this.notes.adjustFlashcardCount(card.noteId, -1);
      }
      await this.caches.forUser(card.userId).removeFlashcard(card.noteId, cardId);
      await this.cardLists.forUser(card.userId).clearFlashcardCache(card.noteId);
    }
    const index = this.indexes.get(card.userId);
    if (index?.has(cardId)) {
      index.discard(cardId);
    }
  }

  async searchFlashCards(userId: string, keyword: string) {
    const query = keyword.trim();
    if (query === '') {
      return [];
    }
    const index = await this.indexFor(userId);
    const ids = index.search(query, { prefix: true, fuzzy: 0.3 }).map((result) => String(result.id));
    if (ids.length === 0) {
      return [];
    }
    const cards = await this.dataSource.manager.findBy(FlashCardEntity, { id: In(ids) });
    const byId = new Map(cards.map((card) => [card.id, card]));
    return ids.flatMap((id) => {
      const card = byId.get(id);
      return card ? [card] : [];
    });
  }

  private async indexFor(userId: string) {
    const existing = this.indexes.get(userId);
    if (existing) {
      return existing;
    }
    const index = new MiniSearch<FlashCardSearchItem>({
      fields: ['front', 'back', 'pinyin'],
      storeFields: ['id'],
      tokenize: tokenizeMixed,
      processTerm: foldTerm,
    });
    const cards = await this.dataSource.manager.find(FlashCardEntity, { where: { userId } });
    index.addAll(cards.map(({ id, front, back, pinyin }) => ({ id, front, back, pinyin })));
    this.indexes.set(userId, index);
    return index;
  }
}
