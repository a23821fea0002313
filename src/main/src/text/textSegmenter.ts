import { TextProcessingMode } from '../types/ProcessedText';

export type SeparationContext = 'creation' | 'settings' | 'loading';

const UNIT_TITLE_PATTERNS = [
  /第[一二三四五六七八九十\d]+课/,
  /第[一二三四五六七八九十\d]+单元/,
  /小[一二三四五六\d]+预备/,
  /Unit\s*\d+/i,
  /Lesson\s*\d+/i,
  /Chapter\s*\d+/i,
];

const TITLE_MARKER_PATTERNS = [
  /^<<.*>>$/,
  /^<.*>$/,
  /^\[.*\]$/,
  /^【.*】$/,
  /^《.*》$/,
  /^〈.*〉$/,
  /^\*.*\*$/,
  /^=.*=$/,
];

const PUNCTUATION = /[。．.？！?!，,"“”‘’「」『』【】《》〈〉]/g;
const QUOTATION_MARK = /["“”‘’「」『』【】《》〈〉]/;
const CLOSING_QUOTES: Record<string, string> = {
  '“': '”',
  '‘': '’',
  '「': '」',
  '『': '』',
  '【': '】',
  '《': '》',
  '〈': '〉',
};

// segments shorter than this do not end at a comma and do not stand alone at the end of a line
const MIN_SEGMENT_LENGTH = 8;
const SENTENCES_PER_PARAGRAPH = 3;

export const isUnitOrLessonTitle = (line: string) => UNIT_TITLE_PATTERNS.some((pattern) => pattern.test(line));

const hasFontStyleIndicators = (line: string) =>
  (/^[A-Z\s\d]+$/.test(line) && line.length > 2) ||
  /^(.)\1{3,}$/.test(line) ||
  /^[\d一二三四五六七八九十]+[.．、]\s*[\u4e00-\u9fff]/.test(line);

export const isTitleLine = (line: string) => {
  const trimmed = line.trim();
  if (line.length > 20 || line.length < 2) {
    return false;
  }
  if (TITLE_MARKER_PATTERNS.some((pattern) => pattern.test(trimmed)) || hasFontStyleIndicators(trimmed)) {
    return true;
  }
  if (/[。？！.!?，,]/.test(line)) {
    return false;
  }
  if (/^[\d\s\p{P}]+$/u.test(line)) {
    return false;
  }
  return /[\u4e00-\u9fff]/.test(line);
};

const findClosingQuote = (text: string, openIndex: number, openQuote: string) => {
  const closeQuote = CLOSING_QUOTES[openQuote] ?? openQuote;
  const closeIndex = text.indexOf(closeQuote, openIndex + 1);
  return closeIndex === -1 ? null : closeIndex + 1;
};

const splitByPunctuation = (text: string) => {
  const matches = [...text.matchAll(PUNCTUATION)];
  const segments: string[] = [];
  let startIndex = 0;
  for (let i = 0; i < matches.length; i++) {
    const match = matches[i];
    const punctuation = match[0];
    const matchStart = match.index ?? 0;
    const endIndex = matchStart + punctuation.length;
    const segment = text.substring(startIndex, endIndex).trim();
    if (segment !== '') {
      if ((punctuation === ',' || punctuation === '，') && segment.length < MIN_SEGMENT_LENGTH) {
        continue;
      }
      if (QUOTATION_MARK.test(punctuation)) {
        const quoteEnd = findClosingQuote(text, matchStart, punctuation);
        if (quoteEnd !== null) {
          const quoted = text.substring(startIndex, quoteEnd).trim();
          if (quoted !== '') {
            segments.push(quoted);
          }
          startIndex = quoteEnd;
          i = matches.filter((m) => (m.index ?? 0) < quoteEnd).length - 1;
          continue;
        }
      }
      segments.push(segment);
    }
    startIndex = endIndex;
  }
  const remaining = text.substring(startIndex).trim();
  if (remaining !== '') {
    if (remaining.length < MIN_SEGMENT_LENGTH && segments.length > 0) {
      segments[segments.length - 1] = `${segments[segments.length - 1]} ${remaining}`;
    } else {
      segments.push(remaining);
    }
  }
  return segments;
};

const isAnyTitle = (line: string) => isTitleLine(line) || isUnitOrLessonTitle(line);

/** Groups the sentences into sections, each led by its title. */
const reorderTitlesToTop = (sentences: string[]) => {
  const result: string[] = [];
  let title: string | null = null;
  let section: string[] = [];
  const flush = () => {
    if (title !== null) {
      result.push(title);
    }
    result.push(...section);
  };
  for (const sentence of sentences) {
    if (isAnyTitle(sentence)) {
      flush();
      title = sentence;
      section = [];
    } else {
      section.push(sentence);
    }
  }
  flush();
  return result;
};

export const splitIntoSentences = (text: string) => {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n').map((line) => line.trim()).filter((line) => line !== '');
  const sentences: string[] = [];
  for (const line of lines) {
    if (isAnyTitle(line)) {
      sentences.push(line);
      continue;
    }
    sentences.push(...splitByPunctuation(line.replace(/\s+/g, ' ').trim()));
  }
  return reorderTitlesToTop(sentences.filter((sentence) => sentence.trim() !== ''));
};

export const splitIntoParagraphs = (text: string) => {
  if (text === '') {
    return [];
  }
  let paragraphs = text.split(/\n\s*\n/).map((p) => p.trim()).filter((p) => p !== '');
  if (paragraphs.length <= 1) {
    paragraphs = text.split('\n').map((p) => p.trim()).filter((p) => p !== '');
  }
  if (paragraphs.length <= 1) {
    const sentences = splitIntoSentences(text);
    paragraphs = [];
    for (let i = 0; i < sentences.length; i += SENTENCES_PER_PARAGRAPH) {
      const paragraph = sentences.slice(i, i + SENTENCES_PER_PARAGRAPH).join(' ').trim();
      if (paragraph !== '') {
        paragraphs.push(paragraph);
      }
    }
  }
  return paragraphs;
};

export const separateByMode = (text: string, mode: TextProcessingMode, context: SeparationContext = 'loading') => {
  if (text === '') {
    return [];
  }
  let result: string[];
  if (mode === 'segment') {
    result = splitIntoSentences(text);
  } else {
    result = context === 'creation' ? [text] : splitIntoParagraphs(text);
  }
  return result.length === 0 ? [text] : result;
};

export const separateForCreation = (text: string, mode: TextProcessingMode) => separateByMode(text, mode, 'creation');

export const separateForSettingsChange = (text: string, mode: TextProcessingMode) =>
  separateByMode(text, mode, 'settings');

export const previewSeparation = (text: string) => {
  const sentences = splitIntoSentences(text);
  const paragraphs = splitIntoParagraphs(text);
  return {
    sentences,
    paragraphs,
    originalLength: text.length,
    sentenceCount: sentences.length,
    paragraphCount: paragraphs.length,
  };
};
