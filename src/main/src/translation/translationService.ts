import axios, { AxiosInstance } from 'axios';
import { logToFile } from '../../log';
import { configStore$ } from '../../state';
import { FifoCache } from '../utils/fifoCache';

export interface Translator {
  readonly name: string;
  translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string>;
}

const CACHE_VOLUME = 200;

/** Chinese variants become zh-CN/zh-TW; Papago takes bare codes for everything else. */
export const normalizeLanguage = (code: string, provider: 'google' | 'papago') => {
  const lower = code.toLowerCase();
  if (lower === 'zh' || lower === 'zh-cn' || lower === 'zh-hans') {
    return 'zh-CN';
  }
  if (lower === 'zh-tw' || lower === 'zh-hant') {
    return 'zh-TW';
  }
  return provider === 'papago' ? lower.split('-')[0] : code;
};

/** Tries each translator in order; the original text comes back when all of them fail. */
export class TranslationService {
  private readonly cache = new FifoCache<string, string>(CACHE_VOLUME);

  constructor(private readonly translators: Translator[]) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string) {
    return (await this.translateOrNull(text, sourceLanguage, targetLanguage)) ?? text;
  }

  /** Like translate, but null when no translator produced anything. */
  async translateOrNull(text: string, sourceLanguage: string, targetLanguage: string) {
    if (text.trim() === '') {
      return text;
    }
    const cacheKey = `${sourceLanguage}:${targetLanguage}:${text}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }
    for (const translator of this.translators) {
      try {
        const translated = await translator.translate(text, sourceLanguage, targetLanguage);
        if (translated.trim() !== '') {
          this.cache.set(cacheKey, translated);
          return translated;
        }
        logToFile(`translator ${translator.name} returned nothing`);
      } catch (e) {
        logToFile(`translator ${translator.name} failed:`, e);
      }
    }
    return null;
  }
}

interface CloudTranslateResponse {
  translations?: Array<{ translatedText?: string }>;
}

/** Cloud Translation v3 `translateText`. */
export class GoogleCloudTranslator implements Translator {
  readonly name = 'google-cloud';

  constructor(
    private readonly http: AxiosInstance = axios.create(),
    private readonly getConfig = () => configStore$.getValue(),
  ) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string) {
    const { googleCloudApiKey, googleCloudProjectId } = this.getConfig();
    if (!googleCloudApiKey || !googleCloudProjectId) {
      throw new Error('Google Cloud translation is not configured');
    }
    const response = await this.http.post<CloudTranslateResponse>(
      `https://translation.googleapis.com/v3/projects/${googleCloudProjectId}:translateText`,
      {
        contents: [text],
        mimeType: 'text/plain',
        sourceLanguageCode: normalizeLanguage(sourceLanguage, 'google'),
        targetLanguageCode: normalizeLanguage(targetLanguage, 'google'),
      },
      { params: { key: googleCloudApiKey } },
    );
    return response.data.translations?.[0]?.translatedText ?? '';
  }
}

/** The keyless endpoint used by the Google web widget. Its body is nested arrays of [translated, original]. */
export class GoogleFreeTranslator implements Translator {
  readonly name = 'google-free';

  constructor(private readonly http: AxiosInstance = axios.create()) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string) {
    const response = await this.http.get<unknown>('https://translate.googleapis.com/translate_a/single', {
      params: {
        client: 'gtx',
        sl: normalizeLanguage(sourceLanguage, 'google'),
        tl: normalizeLanguage(targetLanguage, 'google'),
        dt: 't',
        q: text,
      },
    });
    const body = response.data;
    if (!Array.isArray(body) || !Array.isArray(body[0])) {
      return '';
    }
    const sentences: unknown[] = body[0];
    return sentences
      .map((sentence) => (Array.isArray(sentence) && typeof sentence[0] === 'string' ? sentence[0] : ''))
      .join('');
  }
}

interface PapagoResponse {
  message?: { result?: { translatedText?: string } };
}

export const PAPAGO_URL = 'https://openapi.naver.com/v1/papago/n2mt';

export class PapagoTranslator implements Translator {
  readonly name = 'papago';

  constructor(
    private readonly http: AxiosInstance = axios.create(),
    private readonly getConfig = () => configStore$.getValue(),
  ) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string) {
    const { papagoClientId, papagoClientSecret } = this.getConfig();
    if (!papagoClientId || !papagoClientSecret) {
      throw new Error('Papago is not configured');
    }
    const response = await this.http.post<PapagoResponse>(
      PAPAGO_URL,
      new URLSearchParams({
        source: normalizeLanguage(sourceLanguage, 'papago'),
        target: normalizeLanguage(targetLanguage, 'papago'),
        text,
      }).toString(),
      {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          'X-Naver-Client-Id': papagoClientId,
          'X-Naver-Client-Secret': papagoClientSecret,
        },
      },
    );
    return response.data.message?.result?.translatedText ?? '';
  }
}
