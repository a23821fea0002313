import express, { Request, Response } from 'express';
import cors from 'cors';
import path from 'path';
import bodyParser from 'body-parser';
import WebSocket from 'ws';
import { promises as fs } from 'fs';
import cookieParser from 'cookie-parser';
import { Subscription } from 'rxjs';
import * as http from 'http';
import { logToFile } from './log';
import { Services } from './services';
import { NotFoundError, UsageLimitExceededError, ValidationError } from './src/errors';
import { NotePatch } from './src/note/noteService';
import { PurchaseEvent, parsePurchaseEvent } from './src/purchase/purchaseEventProcessor';
import { isTextProcessingMode } from './src/types/ProcessedText';
import { parsePreferencesPatch } from './src/types/UserPreferences';

const field = (body: unknown, key: string): unknown =>
  typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;

const optionalString = (body: unknown, key: string) => {
  const value = field(body, key);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
};

const queryString = (req: Request, key: string) => {
  const value = req.query[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

const userIdOf = (req: Request) => {
  const fromCookie: unknown = req.cookies?.uid;
  const userId = typeof fromCookie === 'string' && fromCookie !== '' ? fromCookie : req.header('x-user-id');
  if (!userId) {
    throw new ValidationError('missing user id');
  }
  return userId;
};

const cookieValue = (header: string | undefined, name: string) => {
  for (const part of (header ?? '').split(';')) {
    const [key, ...value] = part.trim().split('=');
    if (key === name) {
      return decodeURIComponent(value.join('='));
    }
  }
  return undefined;
};

/** The user a websocket speaks for: uid query parameter, x-user-id header or uid cookie. */
const socketUserOf = (req: http.IncomingMessage) => {
  const fromQuery = new URL(req.url ?? '/', 'http://localhost').searchParams.get('uid');
  const fromHeader = req.headers['x-user-id'];
  const userId = fromQuery || (typeof fromHeader === 'string' ? fromHeader : undefined) || cookieValue(req.headers.cookie, 'uid');
  return userId || null;
};

const statusOf = (e: unknown) => {
  if (e instanceof NotFoundError) {
    return 404;
  }
  if (e instanceof UsageLimitExceededError) {
    return 429;
  }
  if (e instanceof ValidationError) {
    return 400;
  }
  return 500;
};

const sendError = (res: Response, e: unknown) => {
  const status = statusOf(e);
  if (status === 500) {
    logToFile('request failed:', e);
  }
  res.status(status);
  res.json({ error: e instanceof Error ? e.message : String(e) });
};

type Handler = (req: Request, res: Response, userId: string) => Promise<unknown>;

/** Runs a handler for the calling user; a result is sent as JSON, nothing as 'success'. */
const withUser = (handler: Handler) => (req: Request, res: Response) => {
  Promise.resolve()
    .then(() => handler(req, res, userIdOf(req)))
    .then((result) => {
      if (res.headersSent) {
        return;
      }
      if (result === undefined) {
        res.send('success');
      } else {
        res.json(result);
      }
    })
    .catch((e) => sendError(res, e));
};

const readImages = (body: unknown) => {
  const images = field(body, 'images');
  if (!Array.isArray(images) || images.length === 0) {
    throw new ValidationError('images must be a non-empty list');
  }
  return images.map((image, index) => {
    if (typeof image !== 'string' || image === '') {
      throw new ValidationError(`image ${index} is not base64 text`);
    }
    return Buffer.from(image, 'base64');
  });
};

const readNotePatch = (body: unknown) => {
  const patch: NotePatch = {};
  const title = optionalString(body, 'title');
  if (title !== undefined) {
    patch.title = title;
  }
  const description = field(body, 'description');
  if (typeof description === 'string' || description === null) {
    patch.description = description;
  }
  const isFavorite = field(body, 'isFavorite');
  if (typeof isFavorite === 'boolean') {
    patch.isFavorite = isFavorite;
  }
  if (Object.keys(patch).length === 0) {
    throw new ValidationError('nothing to update');
  }
  return patch;
};

const readPurchaseEvents = (body: unknown, userId: string) => {
  const items: unknown[] = Array.isArray(body) ? body : [body];
  return items.map((item): PurchaseEvent => {
    const event = parsePurchaseEvent(item, userId);
    if (!event) {
      throw new ValidationError('invalid purchase update');
    }
    return event;
  });
};

export const createApp = (services: Services) => {
  const {
    notes,
    pages,
    caches,
    segmentCaches,
    creation,
    textProcessing,
    cards,
    dictionary,
    preferences,
    usage,
    entitlements,
    purchases,
  } = services;

  const ownedNote = async (userId: string, noteId: string) => {
    const note = await notes.requireNote(noteId);
    if (note.userId !== userId) {
      throw new NotFoundError('note', noteId);
    }
    return note;
  };

  const ownedCard = async (userId: string, cardId: string) => {
    const card = await cards.getFlashCard(cardId);
    if (card.userId !== userId) {
      throw new NotFoundError('flashcard', cardId);
    }
    return card;
  };

  const app = express();

  app.use(cookieParser());
  app.use(cors());
  // parse application/x-www-form-urlencoded
  app.use(bodyParser.urlencoded({ extended: false }));
  // parse application/json
  app.use(bodyParser.json({
    limit: '10mb'
  }));

  app.post('/api/notes', withUser(async (req, res, userId) => {
    const images = readImages(req.body);
    const noteId = await creation.createNoteQuickly(userId, images, { title: optionalString(req.body, 'title') });
    res.status(202);
    return { noteId };
  }));

  app.get('/api/notes', withUser(async (req, res, userId) => notes.getNotes(userId)));

  app.get('/api/notes/:noteId', withUser(async (req, res, userId) => {
    const note = await ownedNote(userId, req.params.noteId);
    return { note, pages: await pages.getPagesForNote(note.id) };
  }));

  app.patch('/api/notes/:noteId', withUser(async (req, res, userId) => {
    const note = await ownedNote(userId, req.params.noteId);
    return notes.updateNote(note.id, readNotePatch(req.body));
  }));

  app.delete('/api/notes/:noteId', withUser(async (req, res, userId) => {
    const note = await ownedNote(userId, req.params.noteId);
    await notes.deleteNote(note.id);
  }));

  app.get('/api/notes/:noteId/pages/:pageId/image', withUser(async (req, res, userId) => {
    const { noteId, pageId } = req.params;
    await ownedNote(userId, noteId);
    const image = await caches.forUser(userId).getImage(noteId, pageId);
    if (!image) {
      throw new NotFoundError('image', pageId);
    }
    res.type('jpg');
    res.send(image);
  }));

  app.get('/api/notes/:noteId/pages/:pageId/text', withUser(async (req, res, userId) => {
    const { noteId, pageId } = req.params;
    await ownedNote(userId, noteId);
    const processedText = await textProcessing.getProcessedText(userId, noteId, pageId);
    if (!processedText) {
      throw new NotFoundError('processed text', pageId);
    }
    return processedText;
  }));

  app.post('/api/notes/:noteId/pages/:pageId/reprocess', withUser(async (req, res, userId) => {
    const { noteId, pageId } = req.params;
    const mode = field(req.body, 'mode');
    if (!isTextProcessingMode(mode)) {
      throw new ValidationError('mode must be segment or paragraph');
    }
    await ownedNote(userId, noteId);
    return textProcessing.reprocessForMode(userId, noteId, pageId, mode);
  }));

  app.get('/api/cards', withUser(async (req, res, userId) => {
    const keyword = queryString(req, 'q');
    if (keyword !== undefined) {
      return cards.searchFlashCards(userId, keyword);
    }
    const noteId = queryString(req, 'noteId');
    if (noteId !== undefined) {
      await ownedNote(userId, noteId);
      return cards.getFlashCardsForNote(userId, noteId);
    }
    const page = Number(queryString(req, 'page'));
    if (Number.isInteger(page) && page > 0) {
      const pageSize = Number(queryString(req, 'pageSize') ?? 20);
      return cards.cardsByPage(userId, Number.isInteger(pageSize) && pageSize > 0 ? pageSize : 20, page);
    }
    return cards.getCardsToReview(userId);
  }));

  app.post('/api/cards', withUser(async (req, res, userId) => {
    const front = optionalString(req.body, 'front');
    if (front === undefined) {
      throw new ValidationError('front is required');
    }
    const noteId = optionalString(req.body, 'noteId');
    if (noteId !== undefined) {
      await ownedNote(userId, noteId);
    }
    const { sourceLanguage, targetLanguage } = await preferences.getPreferences(userId);
    const card = await cards.createFlashCard(userId, {
      front,
      back: optionalString(req.body, 'back'),
      pinyin: optionalString(req.body, 'pinyin'),
      noteId,
      sourceLanguage,
      targetLanguage,
    });
    res.status(201);
    return card;
  }));

  app.post('/api/cards/:cardId/review', withUser(async (req, res, userId) => {
    const card = await ownedCard(userId, req.params.cardId);
    const grade = field(req.body, 'grade');
    if (typeof grade !== 'number') {
      throw new ValidationError('grade must be a number');
    }
    return cards.reviewFlashCard(card.id, grade);
  }));

  app.delete('/api/cards/:cardId', withUser(async (req, res, userId) => {
    const card = await ownedCard(userId, req.params.cardId);
    await cards.deleteFlashCard(card.id);
  }));

  app.get('/api/dictionary', withUser(async (req) => dictionary.search(queryString(req, 'q') ?? '')));

  app.get('/api/dictionary/:word', withUser(async (req, res, userId) => {
    const targetLanguage = queryString(req, 'target') ?? (await preferences.getPreferences(userId)).targetLanguage;
    const entry = await dictionary.lookup(req.params.word, targetLanguage);
    if (!entry) {
      throw new NotFoundError('dictionary entry', req.params.word);
    }
    return entry;
  }));

  app.get('/api/preferences', withUser(async (req, res, userId) => preferences.getPreferences(userId)));

  app.put('/api/preferences', withUser(async (req, res, userId) =>
    preferences.savePreferences(userId, parsePreferencesPatch(req.body)),
  ));

  app.get('/api/usage', withUser(async (req, res, userId) => ({
    usage: await usage.getUsage(userId),
    subscription: await entitlements.getStatus(userId),
  })));

  app.get('/api/subscription', withUser(async (req, res, userId) => entitlements.getStatus(userId)));

  app.post('/api/subscription/trial', withUser(async (req, res, userId) => entitlements.startTrial(userId)));

  app.post('/api/subscription/cancel', withUser(async (req, res, userId) => entitlements.cancel(userId)));

  app.post('/api/purchases', withUser(async (req, res, userId) => {
    const results = await purchases.handleEvents(readPurchaseEvents(req.body, userId));
    return results.map(({ event, outcome }) => ({
      transactionId: event.transactionId,
      productId: event.productId,
      outcome,
    }));
  }));

  app.get('/api/cache/stats', withUser(async (req, res, userId) => caches.forUser(userId).getCacheStats()));

  app.delete('/api/cache', withUser(async (req, res, userId) => {
    await caches.forUser(userId).clearAllCache();
    await segmentCaches.forUser(userId).clear();
  }));

  app.post('/api/error', (req, res) => {
    (async () => {
      const ERROR_LOG_PATH = path.join(services.dataRoot, 'error.log');
      try {
        await fs.stat(ERROR_LOG_PATH);
      } catch (e) {
        await fs.writeFile(ERROR_LOG_PATH, '');
      }
      const error = field(req.body, 'error');
      if (error !== undefined) {
        await fs.appendFile(ERROR_LOG_PATH, `${String(error)}\n`);
      }
      res.send('success');
    })().catch((e) => sendError(res, e));
  });

  return app;
};

export interface RunningServer {
  server: http.Server;
  port: number;
  close(): Promise<void>;
}

/** Serves the API and pushes queue progress to the websocket clients of the note's owner. */
export const startServer = (services: Services, port: number) =>
  new Promise<RunningServer>((resolve, reject) => {
    const server = http.createServer(createApp(services));

    const wsList = new Map<WebSocket, string | null>();
    const wss = new WebSocket.Server({ server });
    wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
      const userId = socketUserOf(req);
      logToFile('new websocket connection for user:', userId);
      wsList.set(ws, userId);
      ws.on('message', (data) => {
        if (data.toString() === '__ping__') {
          ws.send('__pong__');
        }
      });
      ws.on('close', (code) => {
        logToFile('websocket connection closed, code', code);
        wsList.delete(ws);
      });
      ws.on('error', (err) => {
        logToFile('websocket connection on error:', err);
      });
    });

    const events: Subscription = services.queue.events$.subscribe((event) => {
      const message = JSON.stringify(event);
      wsList.forEach((userId, ws) => {
        if (userId === event.userId && ws.readyState === WebSocket.OPEN) {
          ws.send(message);
        }
      });
    });

    server.once('error', reject);
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      logToFile('server listening on:', boundPort);
      resolve({
        server,
        port: boundPort,
        close: () =>
          new Promise<void>((done, fail) => {
            events.unsubscribe();
            [...wsList.keys()].forEach((ws) => ws.terminate());
            wss.close();
            server.close((e) => (e ? fail(e) : done()));
          }),
      });
    });
  });
