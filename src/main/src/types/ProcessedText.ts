export type TextProcessingMode = 'segment' | 'paragraph';

export type TextDisplayMode = 'full' | 'noPinyin';

export type StreamingStatus = 'preparing' | 'streaming' | 'completed' | 'failed';

export const SEGMENT_TYPES = [
  'title',
  'instruction',
  'passage',
  'vocabulary',
  'question',
  'choices',
  'answer',
  'dialogue',
  'example',
  'explanation',
  'sentence',
  'unknown',
] as const;

export type SegmentType = typeof SEGMENT_TYPES[number];

export const parseSegmentType = (value: string | null | undefined): SegmentType => {
  if (!value) {
    return 'unknown';
  }
  const lower = value.toLowerCase();
  return SEGMENT_TYPES.find((type) => type === value || type.toLowerCase() === lower) ?? 'unknown';
};

export const isTextProcessingMode = (value: unknown): value is TextProcessingMode =>
  value === 'segment' || value === 'paragraph';

/** One translated piece of a page: a sentence in segment mode, a paragraph otherwise. */
export interface TextUnit {
  originalText: string;
  translatedText?: string;
  pinyin?: string;
  sourceLanguage: string;
  targetLanguage: string;
  segmentType: SegmentType;
}

export interface ProcessedText {
  mode: TextProcessingMode;
  displayMode: TextDisplayMode;
  units: TextUnit[];
  fullOriginalText: string;
  fullTranslatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
  streamingStatus: StreamingStatus;
  completedUnits: number;
  progress: number;
}

export const defaultSegmentType = (mode: TextProcessingMode): SegmentType =>
  mode === 'segment' ? 'sentence' : 'passage';

/**
 * Processed text of a page right after OCR: every unit carries the original only,
 * translations arrive later from the post-processing queue.
 */
export const withOriginalOnly = (params: {
  mode: TextProcessingMode;
  segments: string[];
  sourceLanguage: string;
  targetLanguage: string;
}): ProcessedText => {
  const { mode, segments, sourceLanguage, targetLanguage } = params;
  return {
    mode,
    displayMode: 'full',
    units: segments.map((originalText) => ({
      originalText,
      sourceLanguage,
      targetLanguage,
      segmentType: defaultSegmentType(mode),
    })),
    fullOriginalText: segments.join(' '),
    fullTranslatedText: '',
    sourceLanguage,
    targetLanguage,
    streamingStatus: 'preparing',
    completedUnits: 0,
    progress: 0,
  };
};

export const withTranslatedUnits = (base: ProcessedText, units: TextUnit[]): ProcessedText => ({
  ...base,
  units,
  fullOriginalText: units.map((unit) => unit.originalText).join(' '),
  fullTranslatedText: units.map((unit) => unit.translatedText ?? '').join(' '),
  streamingStatus: 'completed',
  completedUnits: units.length,
  progress: 1.0,
});

export const toggleDisplayMode = (text: ProcessedText): ProcessedText => ({
  ...text,
  displayMode: text.displayMode === 'full' ? 'noPinyin' : 'full',
});
