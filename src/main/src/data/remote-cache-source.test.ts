import { TestContext, createTestContext } from '../testing/harness';
import { withOriginalOnly } from '../types/ProcessedText';
import { FlashCardEntity } from './entity/FlashCard';
import { DocumentStoreCacheSource } from './remote-cache-source';
import { buildFlashCard } from '../testing/fixtures';

describe('DocumentStoreCacheSource', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.close();
  });

  const sourceFor = (userId: string) => new DocumentStoreCacheSource(ctx.dataSource, userId, () => ctx.clock.now);

  const setUpPage = async () => {
    const note = await ctx.notes.createNote('u1');
    const page = await ctx.pages.createPage({
      noteId: note.id,
      pageNumber: 0,
      imageKey: null,
      imageFileSize: 0,
      processingMode: 'segment',
      sourceLanguage: 'zh-CN',
      targetLanguage: 'ko',
    });
    return { note, page };
  };

  it('answers with the page result of the matching mode only', async () => {
    const { page } = await setUpPage();
    const processed = withOriginalOnly({ mode: 'segment', segments: ['你好'], sourceLanguage: 'zh-CN', targetLanguage: 'ko' });
    await ctx.pages.updatePage(page.id, { processedText: processed });

    expect(await sourceFor('u1').getSegments(page.id, 'segment')).toEqual(processed);
    expect(await sourceFor('u1').getSegments(page.id, 'paragraph')).toBeNull();
    expect(await sourceFor('u2').getSegments(page.id, 'segment')).toBeNull();
    expect(await sourceFor('u1').getSegments('missing', 'segment')).toBeNull();
  });

  it('writes results onto pages of its own user', async () => {
    const { page } = await setUpPage();
    const processed = withOriginalOnly({ mode: 'paragraph', segments: ['第一段'], sourceLanguage: 'zh-CN', targetLanguage: 'ko' });

    await sourceFor('u2').saveSegments(page.id, processed);
    expect((await ctx.pages.requirePage(page.id)).processedText).toBeNull();

    ctx.clock.now += 1000;
    await sourceFor('u1').saveSegments(page.id, processed);
    const saved = await ctx.pages.requirePage(page.id);
    expect(saved.processedText).toEqual(processed);
    expect(saved.updatedAt).toBe(ctx.clock.now);
  });

  it('lists the cards of a note oldest first', async () => {
    const { note } = await setUpPage();
    for (const card of [
      buildFlashCard({ id: 'c2', userId: 'u1', noteId: note.id, createdAt: 20 }),
      buildFlashCard({ id: 'c1', userId: 'u1', noteId: note.id, createdAt: 10 }),
      buildFlashCard({ id: 'c3', userId: 'u2', noteId: note.id, createdAt: 5 }),
    ]) {
      await ctx.dataSource.manager.save(ctx.dataSource.manager.create(FlashCardEntity, card));
    }
    expect((await sourceFor('u1').getFlashcards(note.id)).map(({ id }) => id)).toEqual(['c1', 'c2']);
  });
});
