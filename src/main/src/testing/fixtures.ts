import { FlashCard } from '../types/FlashCard';
import { Note } from '../types/Note';

export const buildNote = (overrides: Partial<Note> = {}): Note => ({
  id: 'note-1',
  userId: 'user-1',
  title: 'Lesson 1',
  description: null,
  isFavorite: false,
  flashcardCount: 0,
  pageCount: 1,
  thumbnailKey: null,
  processingStatus: 'created',
  processingProgress: 0,
  processingError: null,
  createdAt: 1,
  updatedAt: 1,
  ...overrides,
});

export const buildFlashCard = (overrides: Partial<FlashCard> = {}): FlashCard => ({
  id: 'card-1',
  userId: 'user-1',
  noteId: 'note-1',
  front: '学生',
  back: 'student',
  pinyin: 'xuésheng',
  sourceLanguage: 'zh-CN',
  targetLanguage: 'en',
  dueDate: 0,
  interval: 0,
  repetition: 0,
  efactor: 2.5,
  reviewCount: 0,
  lastReviewedAt: null,
  createdAt: 1,
  updatedAt: 1,
  ...overrides,
});
