import { ProcessedText, TextProcessingMode } from './ProcessedText';
import { ProcessingStatus } from './ProcessingStatus';

export interface Note {
  id: string;
  userId: string;
  title: string;
  description: string | null;
  isFavorite: boolean;
  flashcardCount: number;
  pageCount: number;
  thumbnailKey: string | null;
  processingStatus: ProcessingStatus;
  processingProgress: number;
  processingError: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface Page {
  id: string;
  noteId: string;
  pageNumber: number;
  imageKey: string | null;
  imageFileSize: number;
  /** OCR text after cleaning, line breaks kept. */
  cleanedText: string;
  originalText: string;
  translatedText: string;
  pinyin: string;
  textSegments: string[];
  processedText: ProcessedText | null;
  processingMode: TextProcessingMode;
  processingStatus: ProcessingStatus;
  sourceLanguage: string;
  targetLanguage: string;
  createdAt: number;
  updatedAt: number;
}
