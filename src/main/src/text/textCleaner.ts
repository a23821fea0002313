import { FifoCache } from '../utils/fifoCache';

const CHINESE_CHAR = /[\u4e00-\u9fff]/;
const CHINESE_CHARS = /[\u4e00-\u9fff]/g;
const TONE_MARKS = 'āáǎàēéěèīíǐìōóǒòūúǔùǖǘǚǜ';
const PINYIN = new RegExp(`[a-zA-Z${TONE_MARKS}]+`);
const ONLY_NUMBERS = /^[0-9]+$/;
const ONLY_PUNCTUATION = /^[\s\p{P}]+$/u;
const PAGE_NUMBER = /^(?:page\s*)?[0-9]+(?:\s*页)?$/i;
const COPYRIGHT_OR_SPECIAL = /^[^a-zA-Z\u4e00-\u9fff]*[©®™@#$%^&*+-]+[^a-zA-Z\u4e00-\u9fff]*$/;
const COPYRIGHT_KEYWORDS =
  /(copyright|all rights reserved|版权所有|保留所有权利|ltd\.?|inc\.?|corp\.?|company|pte\.?\s*ltd\.?|limited|international.*\(\d{4}\)|rights?\s+reserved)/i;
// times, scores, ratios, percentages, decimals, dates, time ranges
const NUMBER_SPECIAL_CHAR = new RegExp(
  [
    '^[\\d\\s]*[\\d]+[\\s]*[:/\\-%.]+[\\s]*[\\d]+[\\s]*[:/\\-%.]*[\\d]*[\\s]*$',
    '^[\\d]+[%]+$',
    '^[\\d]+\\.[\\d]+$',
    '^[\\d]{4}\\.[\\d]{2}\\.[\\d]{2}$',
    '^[\\d]{1,2}:[\\d]{2}(-[\\d]{1,2}:[\\d]{2})?$',
  ].join('|'),
);
const SIMPLE_NUMBER_COMBINATION = /^[\d\s]+$/;
const LATIN = /[a-zA-Z]/;
const LATIN_GLOBAL = /[a-zA-Z]/g;
const DIGIT = /[0-9]/;
const HANGUL = /[가-힣ㄱ-ㅎㅏ-ㅣ]/;
const KANA = /[\u3040-\u309F\u30A0-\u30FF]/;

const CACHE_VOLUME = 100;

const countMatches = (text: string, pattern: RegExp) => (text.match(pattern) ?? []).length;
const withoutSpaces = (text: string) => text.replace(/\s+/g, '');

export const containsChinese = (text: string) => CHINESE_CHAR.test(text);

export const extractChineseChars = (text: string) => (text.match(CHINESE_CHARS) ?? []).join('');

/** A line without CJK where every space-separated word looks like pinyin. */
export const isPinyinLine = (line: string) =>
  !containsChinese(line) &&
  PINYIN.test(line) &&
  line.trim().split(' ').every((word) => PINYIN.test(word) || word.trim() === '');

export const extractPinyinLines = (text: string) => text.split('\n').filter(isPinyinLine);

const isNumberSpecialCharMix = (text: string) => {
  if (containsChinese(text)) {
    if (countMatches(text, CHINESE_CHARS) / withoutSpaces(text).length >= 0.5) {
      return false;
    }
  }
  return NUMBER_SPECIAL_CHAR.test(text) || SIMPLE_NUMBER_COMBINATION.test(text);
};

/** Short OCR noise such as "学a1" or "让tol translate 8". */
const isMeaninglessMixedText = (text: string) => {
  if (!containsChinese(text)) {
    return false;
  }
  const totalChars = withoutSpaces(text).length;
  const chineseCount = countMatches(text, CHINESE_CHARS);
  const latinCount = countMatches(text, LATIN_GLOBAL);
  if (totalChars <= 15 && chineseCount >= 1 && latinCount >= 1 && DIGIT.test(text)) {
    return true;
  }
  return chineseCount <= 2 && latinCount >= chineseCount * 2;
};

const isNonChineseOnly = (text: string) =>
  !containsChinese(text) && (LATIN.test(text) || HANGUL.test(text) || KANA.test(text));

const LINE_FILTERS: Array<[string, (line: string) => boolean]> = [
  ['onlyNumbers', (line) => ONLY_NUMBERS.test(line)],
  ['numberSpecialChar', isNumberSpecialCharMix],
  ['pageNumber', (line) => PAGE_NUMBER.test(line)],
  ['copyrightOrSpecial', (line) => COPYRIGHT_OR_SPECIAL.test(line) && !containsChinese(line)],
  ['copyrightKeyword', (line) => COPYRIGHT_KEYWORDS.test(line)],
  ['onlyPunctuation', (line) => ONLY_PUNCTUATION.test(line)],
  ['meaninglessMix', isMeaninglessMixedText],
  ['nonChineseOnly', isNonChineseOnly],
];

/** Strips OCR output down to the lines worth studying. */
export class TextCleaner {
  private readonly cleanCache = new FifoCache<string, string>(CACHE_VOLUME);
  private readonly pinyinCache = new FifoCache<string, string>(CACHE_VOLUME);

  removePinyinLines(text: string) {
    if (text === '') {
      return text;
    }
    const cached = this.pinyinCache.get(text);
    if (cached !== undefined) {
      return cached;
    }
    const result = text.split('\n').filter((line) => !isPinyinLine(line)).join('\n');
    this.pinyinCache.set(text, result);
    return result;
  }

  cleanText(text: string) {
    if (text === '') {
      return text;
    }
    const cached = this.cleanCache.get(text);
    if (cached !== undefined) {
      return cached;
    }
    const kept: string[] = [];
    for (const line of this.removePinyinLines(text).split('\n')) {
      const trimmed = line.trim();
      if (trimmed === '') {
        continue;
      }
      if (LINE_FILTERS.some(([, drop]) => drop(trimmed))) {
        continue;
      }
      kept.push(trimmed);
    }
    const result = kept.join('\n');
    this.cleanCache.set(text, result);
    return result;
  }

  /** Which filter drops a line, or null when it is kept. */
  explain(line: string) {
    const trimmed = line.trim();
    if (trimmed === '') {
      return 'empty';
    }
    if (isPinyinLine(trimmed)) {
      return 'pinyin';
    }
    const filter = LINE_FILTERS.find(([, drop]) => drop(trimmed));
    return filter ? filter[0] : null;
  }

  clearCache() {
    this.cleanCache.clear();
    this.pinyinCache.clear();
  }
}
