import { SuperMemoItem } from 'supermemo';

export interface FlashCard extends SuperMemoItem {
  id: string;
  userId: string;
  noteId: string | null;
  front: string;
  back: string;
  pinyin: string;
  sourceLanguage: string;
  targetLanguage: string;
  dueDate: number;
  reviewCount: number;
  lastReviewedAt: number | null;
  createdAt: number;
  updatedAt: number;
}
