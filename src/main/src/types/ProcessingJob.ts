import { TextProcessingMode } from './ProcessedText';
import { UserPreferences } from './UserPreferences';

/** What the OCR stage hands over for one page. */
export interface PageProcessingData {
  pageId: string;
  imageKey: string | null;
  textSegments: string[];
  mode: TextProcessingMode;
  sourceLanguage: string;
  targetLanguage: string;
  imageFileSize: number;
  ocrSuccess: boolean;
}

export interface PostProcessingJob {
  jobId: string;
  noteId: string;
  userId: string;
  pages: PageProcessingData[];
  userPrefs: UserPreferences;
  createdAt: number;
  priority: number;
  retryCount: number;
}

export type ProcessingJobStatus = 'pending' | 'running' | 'retrying';
