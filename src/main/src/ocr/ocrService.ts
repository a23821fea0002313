import axios, { AxiosInstance } from 'axios';
import { logToFile } from '../../log';
import { configStore$ } from '../../state';

export interface TextExtractor {
  extractText(image: Buffer): Promise<string>;
}

interface VisionResponse {
  responses?: Array<{
    fullTextAnnotation?: { text?: string };
    error?: { message?: string };
  }>;
}

/** Google Cloud Vision TEXT_DETECTION over REST. */
export class GoogleVisionExtractor implements TextExtractor {
  constructor(
    private readonly http: AxiosInstance = axios.create(),
    private readonly getApiKey: () => string = () => configStore$.getValue().googleCloudApiKey,
  ) {}

  async extractText(image: Buffer) {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new Error('missing Google Cloud api key');
    }
    const response = await this.http.post<VisionResponse>(
      'https://vision.googleapis.com/v1/images:annotate',
      {
        requests: [
          {
            image: { content: image.toString('base64') },
            features: [{ type: 'TEXT_DETECTION' }],
            imageContext: { languageHints: ['zh'] },
          },
        ],
      },
      { params: { key: apiKey } },
    );
    const [result] = response.data.responses ?? [];
    if (result?.error?.message) {
      throw new Error(`vision error: ${result.error.message}`);
    }
    return result?.fullTextAnnotation?.text ?? '';
  }
}

/** Called for every page that went through OCR, unless the caller counts pages itself. */
export type OcrPageCounter = (userId: string, pages: number) => Promise<void>;

export class OcrService {
  constructor(
    private readonly extractor: TextExtractor,
    private readonly countPages?: OcrPageCounter,
  ) {}

  async extractText(userId: string, image: Buffer, { skipUsageCount = false } = {}) {
    if (image.length === 0) {
      return '';
    }
    try {
      const text = await this.extractor.extractText(image);
      if (!skipUsageCount && this.countPages) {
        await this.countPages(userId, 1);
      }
      return text;
    } catch (e) {
      logToFile('ocr failed:', e);
      return '';
    }
  }
}
