import { DictionaryService } from '../dictionary/dictionaryService';
import { NotFoundError, ValidationError } from '../errors';
import { TestContext, createTestContext } from '../testing/harness';
import { DAY } from '../utils/time';
import { FlashCardService } from './flashCardService';

describe('FlashCardService', () => {
  let ctx: TestContext;
  let cards: FlashCardService;
  let start: number;

  beforeEach(async () => {
    ctx = await createTestContext();
    start = ctx.clock.now;
    const dictionary = new DictionaryService({
      entries: [{ word: '学生', pinyin: 'xuésheng', meaningKo: '학생', meaningEn: 'student', examples: [] }],
    });
    cards = new FlashCardService(ctx.dataSource, ctx.notes, ctx.caches, ctx.segmentCaches, dictionary, () => ctx.clock.now);
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('fills missing fields from the dictionary and counts cards on the note', async () => {
    const note = await ctx.notes.createNote('u1');
    const card = await cards.createFlashCard('u1', { front: ' 学生 ', noteId: note.id });
    expect(card).toMatchObject({ front: '学生', back: '학생', pinyin: 'xuésheng', dueDate: start, repetition: 0 });
    expect((await ctx.notes.requireNote(note.id)).flashcardCount).toBe(1);

    const again = await cards.createFlashCard('u1', { front: '学生', noteId: note.id });
    expect(again.id).toBe(card.id);
    expect((await ctx.notes.requireNote(note.id)).flashcardCount).toBe(1);
  });

  it('keeps what the caller gives and leaves unknown words blank', async () => {
    expect(await cards.createFlashCard('u1', { front: '学生', back: 'pupil', targetLanguage: 'en' })).toMatchObject({
      back: 'pupil',
      pinyin: 'xuésheng',
      noteId: null,
    });
    expect(await cards.createFlashCard('u1', { front: '电脑' })).toMatchObject({ back: '', pinyin: '' });
    await expect(cards.createFlashCard('u1', { front: '  ' })).rejects.toBeInstanceOf(ValidationError);
    await expect(cards.createFlashCard('u1', { front: '书', noteId: 'missing' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('schedules reviews with the SM-2 intervals', async () => {
    const card = await cards.createFlashCard('u1', { front: '学生' });
    ctx.clock.now = start + 1000;
    const first = await cards.reviewFlashCard(card.id, 5);
    expect(first).toMatchObject({ interval: 1, repetition: 1, reviewCount: 1, lastReviewedAt: start + 1000 });
    expect(first.efactor).toBeCloseTo(2.6);
    expect(first.dueDate).toBe(start + 1000 + DAY);

    const second = await cards.reviewFlashCard(card.id, 5);
    expect(second).toMatchObject({ interval: 6, repetition: 2, reviewCount: 2 });
    expect(second.efactor).toBeCloseTo(2.7);
  });

  it('starts over after a failed review', async () => {
    const card = await cards.createFlashCard('u1', { front: '学生' });
    await cards.reviewFlashCard(card.id, 5);
    await cards.reviewFlashCard(card.id, 5);
    const failed = await cards.reviewFlashCard(card.id, 2);
    expect(failed).toMatchObject({ interval: 1, repetition: 0, reviewCount: 3 });
    expect(failed.efactor).toBeCloseTo(2.38);
    await expect(cards.reviewFlashCard(card.id, 6)).rejects.toBeInstanceOf(ValidationError);
  });

  it('lists cards that are due, soonest first', async () => {
    const early = await cards.createFlashCard('u1', { front: '学生' });
    ctx.clock.now = start + 10;
    const later = await cards.createFlashCard('u1', { front: '老师', back: 'teacher' });
    await cards.createFlashCard('u2', { front: '书', back: 'book' });

    expect(await cards.getCardsToReview('u1', start)).toEqual([]);
    expect((await cards.getCardsToReview('u1', start + 11)).map(({ id }) => id)).toEqual([early.id, later.id]);
    await cards.reviewFlashCard(early.id, 4);
    expect((await cards.getCardsToReview('u1', start + 11)).map(({ id }) => id)).toEqual([later.id]);
  });

  it('pages through cards by due date', async () => {
    for (const [i, front] of ['一', '二', '三'].entries()) {
      ctx.clock.now = start + i;
      await cards.createFlashCard('u1', { front, back: String(i) });
    }
    expect((await cards.cardsByPage('u1', 2, 2)).map(({ front }) => front)).toEqual(['三']);
  });

  it('serves note cards from the cache and keeps it in step on delete', async () => {
    const note = await ctx.notes.createNote('u1');
    const first = await cards.createFlashCard('u1', { front: '学生', noteId: note.id });
    ctx.clock.now = start + 1;
    const second = await cards.createFlashCard('u1', { front: '老师', back: 'teacher', noteId: note.id });
    expect((await cards.getFlashCardsForNote('u1', note.id)).map(({ id }) => id)).toEqual([first.id, second.id]);

    await ctx.dataSource.manager.query('DELETE FROM flash_cards WHERE id = ?', [first.id]);
    expect(await cards.getFlashCardsForNote('u1', note.id)).toHaveLength(2);

    await cards.deleteFlashCard(second.id);
    expect((await cards.getFlashCardsForNote('u1', note.id)).map(({ id }) => id)).toEqual([first.id]);
    expect((await ctx.notes.requireNote(note.id)).flashcardCount).toBe(1);
    await expect(cards.deleteFlashCard('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reads note cards through the per-user list cache once the note cache is gone', async () => {
    const note = await ctx.notes.createNote('u1');
    const first = await cards.createFlashCard('u1', { front: '学生', noteId: note.id });
    expect((await cards.getFlashCardsForNote('u1', note.id)).map(({ id }) => id)).toEqual([first.id]);

    await ctx.caches.forUser('u1').clearFlashcardCache(note.id);
    await ctx.dataSource.manager.query('DELETE FROM flash_cards WHERE id = ?', [first.id]);
    expect((await cards.getFlashCardsForNote('u1', note.id)).map(({ id }) => id)).toEqual([first.id]);

    ctx.clock.now = start + 1;
    const second = await cards.createFlashCard('u1', { front: '老师', back: 'teacher', noteId: note.id });
    expect((await cards.getFlashCardsForNote('u1', note.id)).map(({ id }) => id)).toEqual([second.id]);
    expect(await cards.getFlashCardsForNote('u2', note.id)).toEqual([]);
  });

  it('finds cards by front, pinyin or meaning', async () => {
    const student = await cards.createFlashCard('u1', { front: '学生' });
    const teacher = await cards.createFlashCard('u1', { front: '老师', back: 'teacher', pinyin: 'lǎoshī' });
    await cards.createFlashCard('u2', { front: '老虎', back: 'tiger' });

    expect((await cards.searchFlashCards('u1', 'teach')).map(({ id }) => id)).toEqual([teacher.id]);
    expect((await cards.searchFlashCards('u1', 'xuesheng')).map(({ id }) => id)).toEqual([student.id]);
    expect((await cards.searchFlashCards('u1', '老')).map(({ id }) => id)).toEqual([teacher.id]);

    await cards.deleteFlashCard(teacher.id);
    expect(await cards.searchFlashCards('u1', 'teacher')).toEqual([]);
  });
});
