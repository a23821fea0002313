import { Database } from 'sqlite';
import { SqliteKeyValueStore, openKeyValueDb } from '../db';
import { buildFlashCard, buildNote } from '../testing/fixtures';
import { CacheManager, flashcardKey, imageKey, noteContentKey, ttsKey } from './CacheManager';

describe('CacheManager', () => {
  let db: Database;
  let store: SqliteKeyValueStore;
  let clock: number;
  const now = () => clock;

  beforeEach(async () => {
    db = await openKeyValueDb(':memory:');
    store = new SqliteKeyValueStore(db);
    clock = 0;
  });

  afterEach(async () => {
    await db.close();
  });

  const managerFor = (userId: string) => new CacheManager({ userId, store, now });

  it('builds composite keys', () => {
    expect(noteContentKey('n1', 'p1', 'segment', 'translation')).toBe('note:n1:page:p1:mode:segment:type:translation');
    expect(imageKey('n1', 'p1')).toBe('image:n1:page:p1:optimized');
    expect(ttsKey('n1', 'p1', 's3', 'v1')).toBe('tts:n1:page:p1:segment:s3:voice:v1');
    expect(flashcardKey('n1')).toBe('flashcard:n1:cards');
  });

  it('clears the contents of one note only', async () => {
    const cache = managerFor('user-1');
    await cache.cacheNoteContent('n1', 'p1', 'segment', 'chinese', '你好');
    await cache.cacheNoteContent('n1', 'p2', 'segment', 'pinyin', 'nǐ hǎo');
    await cache.cacheNoteContent('n2', 'p1', 'segment', 'chinese', '再见');
    expect(await cache.clearNoteContents('n1')).toBe(2);
    expect(await cache.getAllNoteContentKeys()).toEqual(['note:n2:page:p1:mode:segment:type:chinese']);
    expect(await cache.getNoteContent('n2', 'p1', 'segment', 'chinese')).toBe('再见');
  });

  it('keeps users apart', async () => {
    await managerFor('user-1').cacheNoteContent('n1', 'p1', 'segment', 'chinese', '你好');
    expect(await managerFor('user-2').getNoteContent('n1', 'p1', 'segment', 'chinese')).toBeNull();
    expect(await managerFor('user-1').getNoteContent('n1', 'p1', 'segment', 'chinese')).toBe('你好');
  });

  it('treats the note list as valid for five minutes', async () => {
    const cache = managerFor('user-1');
    await cache.cacheNotes([buildNote({ id: 'a' }), buildNote({ id: 'b', title: 'Lesson 2' })]);
    clock = 299_999;
    expect(await cache.isCacheValid()).toBe(true);
    expect((await cache.getCachedNotes())?.map(({ title }) => title)).toEqual(['Lesson 1', 'Lesson 2']);
    clock = 300_000;
    expect(await cache.isCacheValid()).toBe(false);
  });

  it('gives up the note list once the metadata tier has evicted part of it', async () => {
    const cache = managerFor('user-1');
    const notes = Array.from({ length: 501 }, (_, i) => buildNote({ id: `n${i}`, title: `Lesson ${i}` }));
    await cache.cacheNotes(notes);
    expect(await cache.isCacheValid()).toBe(true);
    expect(await cache.getCachedNotes()).toBeNull();

    await cache.cacheNotes(notes.slice(0, 3));
    expect((await cache.getCachedNotes())?.map(({ id }) => id)).toEqual(['n0', 'n1', 'n2']);
  });

  it('upserts and removes single flashcards', async () => {
    const cache = managerFor('user-1');
    await cache.cacheFlashcards('n1', [buildFlashCard({ id: 'c1' }), buildFlashCard({ id: 'c2', front: '老师' })]);
    await cache.cacheFlashcard('n1', buildFlashCard({ id: 'c1', back: 'pupil' }));
    await cache.cacheFlashcard('n1', buildFlashCard({ id: 'c3', front: '书' }));
    await cache.removeFlashcard('n1', 'c2');
    const cards = await cache.getFlashcards('n1');
    expect(cards?.map(({ id, back }) => `${id}:${back}`)).toEqual(['c1:pupil', 'c3:student']);
    await cache.cacheFlashcard('n2', buildFlashCard({ id: 'c4' }));
    expect(await cache.getFlashcards('n2')).toBeNull();
    clock = 24 * 60 * 60 * 1000 - 1;
    expect(await cache.isFlashcardCacheValid('n1')).toBe(true);
    clock = 24 * 60 * 60 * 1000;
    expect(await cache.isFlashcardCacheValid('n1')).toBe(false);
  });

  it('clears every tier of a note', async () => {
    const cache = managerFor('user-1');
    await cache.cacheNoteMetadata(buildNote({ id: 'n1' }));
    await cache.cacheNoteContent('n1', 'p1', 'segment', 'chinese', '你好');
    await cache.cacheFlashcards('n1', [buildFlashCard()]);
    await cache.clearNoteCache('n1');
    expect(await cache.getNoteMetadata('n1')).toBeNull();
    expect(await cache.getNoteContent('n1', 'p1', 'segment', 'chinese')).toBeNull();
    expect(await cache.getFlashcards('n1')).toBeNull();
  });
});
