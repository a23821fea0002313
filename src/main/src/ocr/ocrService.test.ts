import { OcrService, TextExtractor } from './ocrService';

describe('OcrService', () => {
  const extractor: jest.Mocked<TextExtractor> = { extractText: jest.fn() };

  beforeEach(() => {
    extractor.extractText.mockReset();
  });

  it('counts one page per successful extraction', async () => {
    extractor.extractText.mockResolvedValue('你好');
    const countPages = jest.fn().mockResolvedValue(undefined);
    const ocr = new OcrService(extractor, countPages);
    expect(await ocr.extractText('u1', Buffer.from('img'))).toBe('你好');
    expect(await ocr.extractText('u1', Buffer.from('img'), { skipUsageCount: true })).toBe('你好');
    expect(countPages).toHaveBeenCalledTimes(1);
    expect(countPages).toHaveBeenCalledWith('u1', 1);
  });

  it('returns an empty string for empty images and failures', async () => {
    extractor.extractText.mockRejectedValue(new Error('quota'));
    const ocr = new OcrService(extractor);
    expect(await ocr.extractText('u1', Buffer.alloc(0))).toBe('');
    expect(await ocr.extractText('u1', Buffer.from('img'))).toBe('');
    expect(extractor.extractText).toHaveBeenCalledTimes(1);
  });
});
