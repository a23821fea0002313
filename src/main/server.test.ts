import os from 'os';
import PATH from 'path';
import { promises as fs } from 'fs';
import axios, { AxiosInstance } from 'axios';
import WebSocket from 'ws';
import { Database } from 'sqlite';
import { DEFAULT_CONFIG } from './config';
import { RunningServer, startServer } from './server';
import { Services, createServices } from './services';
import { openDataSource } from './src/data/data-source';
import { SqliteKeyValueStore, openKeyValueDb } from './src/db';
import { DictionaryService } from './src/dictionary/dictionaryService';
import { FakeSegmentTranslator } from './src/testing/harness';
import { DEFAULT_PREFERENCES } from './src/types/UserPreferences';
import { DAY } from './src/utils/time';

const PAGE_IMAGE = Buffer.from('page-1').toString('base64');

describe('server', () => {
  const start = new Date(2024, 4, 1, 9, 0).getTime();
  let dataRoot: string;
  let kvDb: Database;
  let services: Services;
  let running: RunningServer;
  let api: AxiosInstance;

  beforeEach(async () => {
    dataRoot = await fs.mkdtemp(PATH.join(os.tmpdir(), 'pikabook-server-'));
    kvDb = await openKeyValueDb(':memory:');
    services = await createServices(
      { ...DEFAULT_CONFIG, dataRoot },
      await openDataSource(':memory:'),
      new SqliteKeyValueStore(kvDb),
      {
        extractor: { extractText: async (image) => (image.toString() === 'page-1' ? '我是学生。\n你好吗？' : '') },
        translator: new FakeSegmentTranslator(),
        translators: [],
        dictionary: new DictionaryService({
          entries: [{ word: '学生', pinyin: 'xuésheng', meaningKo: '학생', meaningEn: 'student', examples: [] }],
        }),
        queueOptions: { chunkDelayMs: 0, jobDelayMs: 0, retryBaseDelayMs: 1 },
        now: () => start,
      },
    );
    running = await startServer(services, 0);
    api = axios.create({
      baseURL: `http://127.0.0.1:${running.port}`,
      headers: { 'x-user-id': 'u1' },
      validateStatus: () => true,
    });
  });

  afterEach(async () => {
    services.queue.stop();
    await running.close();
    await services.dataSource.destroy();
    await kvDb.close();
    await fs.rm(dataRoot, { recursive: true, force: true });
  });

  it('needs a user id from the header or the uid cookie', async () => {
    const missing = await api.get('/api/notes', { headers: { 'x-user-id': '' } });
    expect(missing.status).toBe(400);
    expect(missing.data).toEqual({ error: 'missing user id' });

    const fromCookie = await api.get('/api/notes', { headers: { 'x-user-id': '', Cookie: 'uid=u1' } });
    expect(fromCookie.status).toBe(200);
    expect(fromCookie.data).toEqual([]);
  });

  it('creates a note, translates it and serves the result', async () => {
    const created = await api.post('/api/notes', { images: [PAGE_IMAGE], title: 'Lesson 1' });
    expect(created.status).toBe(202);
    const { noteId } = created.data;
    await services.creation.waitForBackground(noteId);
    await services.queue.onIdle();

    const detail = await api.get(`/api/notes/${noteId}`);
    expect(detail.status).toBe(200);
    expect(detail.data.note).toMatchObject({ title: 'Lesson 1', processingStatus: 'completed', pageCount: 1 });
    expect(detail.data.pages).toHaveLength(1);
    const pageId = detail.data.pages[0].id;

    const text = await api.get(`/api/notes/${noteId}/pages/${pageId}/text`);
    expect(text.status).toBe(200);
    expect(text.data.units.map((unit: { translatedText: string }) => unit.translatedText)).toEqual([
      '<我是学生。>',
      '<你好吗？>',
    ]);

    const image = await api.get(`/api/notes/${noteId}/pages/${pageId}/image`, { responseType: 'arraybuffer' });
    expect(Buffer.from(image.data).toString()).toBe('page-1');

    const usage = await api.get('/api/usage');
    expect(usage.data.usage).toMatchObject({ ocrPages: 1, planType: 'free' });

    const elsewhere = await api.get(`/api/notes/${noteId}`, { headers: { 'x-user-id': 'u2' } });
    expect(elsewhere.status).toBe(404);
    expect(elsewhere.data).toEqual({ error: `note not found: ${noteId}` });
  });

  it('rejects bad note requests', async () => {
    const empty = await api.post('/api/notes', { images: [] });
    expect(empty.status).toBe(400);
    expect(empty.data).toEqual({ error: 'images must be a non-empty list' });

    await services.usage.increment('u1', 'ocrPages', 30);
    const overLimit = await api.post('/api/notes', { images: [PAGE_IMAGE] });
    expect(overLimit.status).toBe(429);
    expect(overLimit.data).toEqual({ error: 'usage limit reached for ocrPages (30)' });
  });

  it('renames, favorites and deletes a note', async () => {
    const note = await services.notes.createNote('u1', { title: 'draft' });
    const patched = await api.patch(`/api/notes/${note.id}`, { title: 'final', isFavorite: true });
    expect(patched.data).toMatchObject({ title: 'final', isFavorite: true });
    expect((await api.patch(`/api/notes/${note.id}`, { pinned: true })).status).toBe(400);

    const deleted = await api.delete(`/api/notes/${note.id}`);
    expect(deleted.data).toBe('success');
    expect((await api.get(`/api/notes/${note.id}`)).status).toBe(404);
  });

  it('creates, reviews, finds and deletes flashcards', async () => {
    const created = await api.post('/api/cards', { front: '学生' });
    expect(created.status).toBe(201);
    expect(created.data).toMatchObject({ front: '学生', back: '학생', pinyin: 'xuésheng' });
    const cardId = created.data.id;

    const reviewed = await api.post(`/api/cards/${cardId}/review`, { grade: 5 });
    expect(reviewed.data).toMatchObject({ interval: 1, repetition: 1, dueDate: start + DAY });
    const badGrade = await api.post(`/api/cards/${cardId}/review`, { grade: 'easy' });
    expect(badGrade.data).toEqual({ error: 'grade must be a number' });
    const stranger = await api.post(`/api/cards/${cardId}/review`, { grade: 5 }, { headers: { 'x-user-id': 'u2' } });
    expect(stranger.status).toBe(404);

    const found = await api.get('/api/cards', { params: { q: 'xuesheng' } });
    expect(found.data.map(({ id }: { id: string }) => id)).toEqual([cardId]);

    expect((await api.delete(`/api/cards/${cardId}`)).data).toBe('success');
    expect((await api.delete(`/api/cards/${cardId}`)).status).toBe(404);
  });

  it('looks words up in the dictionary', async () => {
    const entry = await api.get(`/api/dictionary/${encodeURIComponent('学生')}`);
    expect(entry.data).toMatchObject({ word: '学生', meaningKo: '학생' });
    const missing = await api.get(`/api/dictionary/${encodeURIComponent('电脑')}`);
    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ error: 'dictionary entry not found: 电脑' });
  });

  it('saves only well-typed preference fields', async () => {
    const saved = await api.put('/api/preferences', { useSegmentMode: false, showPinyin: 'yes' });
    expect(saved.data).toEqual({ ...DEFAULT_PREFERENCES, useSegmentMode: false });
    expect((await api.get('/api/preferences')).data).toEqual({ ...DEFAULT_PREFERENCES, useSegmentMode: false });

    const bad = await api.put('/api/preferences', { targetLanguage: 'english' });
    expect(bad.status).toBe(400);
    expect(bad.data).toEqual({ error: 'unsupported language code: english' });
  });

  it('grants a purchase once', async () => {
    const purchase = [{ transactionId: 't-1', productId: 'premium_monthly', status: 'purchased', transactionDate: start }];
    const first = await api.post('/api/purchases', purchase);
    expect(first.data).toEqual([{ transactionId: 't-1', productId: 'premium_monthly', outcome: 'granted' }]);
    const second = await api.post('/api/purchases', purchase);
    expect(second.data).toEqual([{ transactionId: 't-1', productId: 'premium_monthly', outcome: 'duplicate' }]);

    const usage = await api.get('/api/usage');
    expect(usage.data.subscription).toMatchObject({ planStatus: 'premiumActive', expiresAt: start + 30 * DAY });
    expect(usage.data.usage.limits).toEqual({ ocrPages: 300, ttsRequests: 1000 });

    const invalid = await api.post('/api/purchases', { productId: 'premium_monthly' });
    expect(invalid.data).toEqual({ error: 'invalid purchase update' });
  });

  it('appends client errors to the error log', async () => {
    await api.post('/api/error', { error: 'boom' });
    await api.post('/api/error', { error: 'bang' });
    expect(await fs.readFile(PATH.join(dataRoot, 'error.log'), 'utf8')).toBe('boom\nbang\n');
  });

  it('pushes queue progress only to sockets of the note owner', async () => {
    const connect = async (headers: Record<string, string>) => {
      const ws = new WebSocket(`ws://127.0.0.1:${running.port}`, { headers });
      const messages: string[] = [];
      ws.on('message', (data) => messages.push(data.toString()));
      await new Promise((resolve) => ws.once('open', resolve));
      return { ws, messages };
    };
    const drain = (ws: WebSocket) =>
      new Promise<void>((resolve) => {
        const onMessage = (data: WebSocket.RawData) => {
          if (data.toString() === '__pong__') {
            ws.off('message', onMessage);
            resolve();
          }
        };
        ws.on('message', onMessage);
        ws.send('__ping__');
      });

    const owner = await connect({ 'x-user-id': 'u1' });
    const stranger = await connect({ Cookie: 'uid=u2' });
    const created = await api.post('/api/notes', { images: [PAGE_IMAGE] });
    const { noteId } = created.data;
    await services.creation.waitForBackground(noteId);
    await services.queue.onIdle();
    await Promise.all([drain(owner.ws), drain(stranger.ws)]);

    const ownerEvents = owner.messages.filter((message) => message !== '__pong__').map((message) => JSON.parse(message));
    expect(ownerEvents.length).toBeGreaterThan(0);
    expect(ownerEvents.every((event) => event.userId === 'u1' && event.noteId === noteId)).toBe(true);
    expect(ownerEvents[ownerEvents.length - 1]).toEqual({ type: 'noteStatus', userId: 'u1', noteId, status: 'completed' });
    expect(stranger.messages).toEqual(['__pong__']);
    owner.ws.close();
    stranger.ws.close();
  });

  it('answers websocket pings', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${running.port}`);
    await new Promise((resolve) => ws.once('open', resolve));
    const reply = new Promise<string>((resolve) => ws.once('message', (data) => resolve(data.toString())));
    ws.send('__ping__');
    expect(await reply).toBe('__pong__');
    ws.close();
  });
});
