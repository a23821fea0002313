import {
  isTitleLine,
  isUnitOrLessonTitle,
  previewSeparation,
  separateByMode,
  splitIntoParagraphs,
  splitIntoSentences,
} from './textSegmenter';

describe('splitIntoSentences', () => {
  it('keeps titles whole and respects quotations', () => {
    const text = '第一课 我的家\n我叫李明，我是中国人。我今年十岁。他说：「你好吗？」我很好。\n谢谢';
    expect(splitIntoSentences(text)).toEqual([
      '第一课 我的家',
      '我叫李明，我是中国人。',
      '我今年十岁。',
      '他说：「你好吗？」',
      '我很好。',
      '谢谢',
    ]);
  });

  it('splits at a comma only after a long enough segment and joins a short tail', () => {
    expect(splitIntoSentences('我们今天去公园玩，然后回家了。好')).toEqual(['我们今天去公园玩，', '然后回家了。 好']);
  });

  it('returns nothing for empty text', () => {
    expect(splitIntoSentences('')).toEqual([]);
  });
});

describe('title detection', () => {
  it('recognizes unit and lesson headings', () => {
    expect(isUnitOrLessonTitle('第3单元')).toBe(true);
    expect(isUnitOrLessonTitle('lesson 12')).toBe(true);
    expect(isUnitOrLessonTitle('我们上课')).toBe(false);
  });

  it('recognizes short headings', () => {
    expect(isTitleLine('【生词】')).toBe(true);
    expect(isTitleLine('ABC DEF')).toBe(true);
    expect(isTitleLine('一、课文')).toBe(true);
    expect(isTitleLine('你好。')).toBe(false);
    expect(isTitleLine('12')).toBe(false);
  });
});

describe('splitIntoParagraphs', () => {
  it('splits on blank lines first', () => {
    expect(splitIntoParagraphs('第一段第一句。\n\n第二段。')).toEqual(['第一段第一句。', '第二段。']);
  });

  it('falls back to single lines', () => {
    expect(splitIntoParagraphs('甲。\n乙。')).toEqual(['甲。', '乙。']);
  });

  it('groups three sentences when there is a single line', () => {
    expect(splitIntoParagraphs('一。二。三。四。')).toEqual(['一。 二。 三。', '四。']);
  });
});

describe('separateByMode', () => {
  it('returns the whole text for paragraphs during creation', () => {
    expect(separateByMode('甲。\n乙。', 'paragraph', 'creation')).toEqual(['甲。\n乙。']);
    expect(separateByMode('甲。\n乙。', 'paragraph', 'settings')).toEqual(['甲。', '乙。']);
  });

  it('returns nothing for empty text', () => {
    expect(separateByMode('', 'segment')).toEqual([]);
  });

  it('previews both separations', () => {
    const preview = previewSeparation('一。二。三。四。');
    expect(preview.sentenceCount).toBe(4);
    expect(preview.paragraphCount).toBe(2);
  });
});
