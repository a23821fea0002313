import axios, { AxiosInstance } from 'axios';
import { logToFile } from '../../log';
import { configStore$ } from '../../state';
import { AppConfig } from '../../config';
import { LlmResponseError } from '../errors';
import { DictionaryEntry } from '../types/Dictionary';
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE, languageName } from '../types/Language';
import { TextProcessingMode, TextUnit, defaultSegmentType } from '../types/ProcessedText';

export interface TranslateSegmentsRequest {
  segments: string[];
  sourceLanguage?: string;
  targetLanguage?: string;
  needPinyin?: boolean;
  mode?: TextProcessingMode;
}

/** Anything that turns original segments into translated units, aligned with the input. */
export interface SegmentTranslator {
  translateSegments(request: TranslateSegmentsRequest): Promise<TextUnit[]>;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string } }>;
}

type LlmConfig = Pick<AppConfig, 'openAiApiKey' | 'openAiModel' | 'openAiBaseUrl'>;

export const extractJsonArray = (raw: string) => {
  const withoutFences = raw.replace(/```(json)?/gi, '').trim();
  const match = withoutFences.match(/\[[\s\S]*\]/);
  return match ? match[0] : withoutFences;
};

const readString = (item: unknown, key: string) => {
  if (typeof item !== 'object' || item === null) {
    return '';
  }
  const value: unknown = Reflect.get(item, key);
  return typeof value === 'string' ? value : '';
};

const segmentPrompt = (segments: string[], target: string, needPinyin: boolean) => `
You are a primary school Chinese teacher for ${target} speaking students. For each Chinese sentence, return a JSON object with:
- the original Chinese,
- a natural ${target} translation${needPinyin ? ',\n- Hanyu Pinyin (with tone marks)' : ''}

Respond in a valid UTF-8 encoded JSON array, in the same order as the input, with each item:
{
  "chinese": "...",
  "translation": "..."${needPinyin ? ',\n  "pinyin": "..."' : ''}
}

Chinese sentences:
${segments.join('\n')}

Output:
`;

const paragraphPrompt = (paragraphs: string[], target: string) => `
You are a professional translator. Translate the following Chinese paragraphs into ${target} naturally.
Each paragraph should be translated separately, preserving the original paragraph structure.
Respond with a JSON array where each item contains the original and translated text:
[
  {
    "original": "...",
    "translated": "..."
  }
]

Chinese paragraphs:
${paragraphs.join('\n\n')}

Output:
`;

const wordPrompt = (word: string, target: string) => `
You are a Chinese dictionary for ${target} speaking learners. Describe the Chinese word "${word}".
Respond with a JSON array holding exactly one object:
[
  {
    "pinyin": "Hanyu Pinyin with tone marks",
    "meaning": "short ${target} meaning",
    "examples": ["one or two short Chinese example sentences"]
  }
]

Output:
`;

export interface LlmTextProcessorOptions {
  http?: AxiosInstance;
  getConfig?: () => LlmConfig;
  now?: () => number;
}

interface CallTimings {
  count: number;
  totalMs: number;
  fastestMs: number;
  slowestMs: number;
}

const emptyTimings = (): CallTimings => ({ count: 0, totalMs: 0, fastestMs: Infinity, slowestMs: 0 });

export class LlmTextProcessor implements SegmentTranslator {
  private readonly http: AxiosInstance;
  private readonly getConfig: () => LlmConfig;
  private readonly now: () => number;
  private timings = emptyTimings();

  constructor({
    http = axios.create(),
    getConfig = () => configStore$.getValue(),
    now = Date.now,
  }: LlmTextProcessorOptions = {}) {
    this.http = http;
    this.getConfig = getConfig;
    this.now = now;
  }

  private recordCall(elapsedMs: number) {
    const { count, totalMs, fastestMs, slowestMs } = this.timings;
    this.timings = {
      count: count + 1,
      totalMs: totalMs + elapsedMs,
      fastestMs: Math.min(fastestMs, elapsedMs),
      slowestMs: Math.max(slowestMs, elapsedMs),
    };
  }

  async translateSegments({
    segments,
    sourceLanguage = DEFAULT_SOURCE_LANGUAGE,
    targetLanguage = DEFAULT_TARGET_LANGUAGE,
    needPinyin = true,
    mode = 'segment',
  }: TranslateSegmentsRequest): Promise<TextUnit[]> {
    if (segments.length === 0) {
      return [];
    }
    const target = languageName(targetLanguage);
    const prompt = mode === 'segment' ? segmentPrompt(segments, target, needPinyin) : paragraphPrompt(segments, target);
    const items = await this.complete(prompt);
    return segments.map((originalText, i) => {
      const item = items[i];
      const unit: TextUnit = {
        originalText,
        translatedText: readString(item, mode === 'segment' ? 'translation' : 'translated'),
        sourceLanguage,
        targetLanguage,
        segmentType: defaultSegmentType(mode),
      };
      if (mode === 'segment' && needPinyin) {
        unit.pinyin = readString(item, 'pinyin');
      }
      return unit;
    });
  }

  /** Dictionary entry for a word the internal dictionary does not know; null when the model gives no meaning. */
  async lookupWord(word: string, targetLanguage = DEFAULT_TARGET_LANGUAGE): Promise<DictionaryEntry | null> {
    const [item] = await this.complete(wordPrompt(word, languageName(targetLanguage)));
    const meaning = readString(item, 'meaning');
    if (meaning === '') {
      return null;
    }
    const examples: unknown = typeof item === 'object' && item !== null ? Reflect.get(item, 'examples') : undefined;
    const entry: DictionaryEntry = {
      word,
      pinyin: readString(item, 'pinyin'),
      examples: Array.isArray(examples) ? examples.filter((example): example is string => typeof example === 'string') : [],
      source: 'external',
    };
    if (targetLanguage === 'ko') {
      entry.meaningKo = meaning;
    } else if (targetLanguage === 'ja') {
      entry.meaningJa = meaning;
    } else {
      entry.meaningEn = meaning;
    }
    return entry;
  }

  private async complete(prompt: string): Promise<unknown[]> {
    const { openAiApiKey, openAiModel, openAiBaseUrl } = this.getConfig();
    if (!openAiApiKey) {
      throw new LlmResponseError('missing LLM api key');
    }
    const startedAt = this.now();
    const response = await this.http.post<ChatCompletionResponse>(
      `${openAiBaseUrl}/chat/completions`,
      {
        model: openAiModel,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
        max_tokens: 2000,
      },
      {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${openAiApiKey}`,
        },
        validateStatus: () => true,
      },
    );
    this.recordCall(this.now() - startedAt);
    if (response.status < 200 || response.status >= 300) {
      throw new LlmResponseError(`LLM request failed with status ${response.status}`, response.status);
    }
    const content = response.data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmResponseError('LLM response has no content', response.status);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonArray(content));
    } catch (e) {
      logToFile('LLM content is not JSON:', content);
      throw new LlmResponseError('LLM response is not a JSON array', response.status);
    }
    if (!Array.isArray(parsed)) {
      throw new LlmResponseError('LLM response is not a JSON array', response.status);
    }
    return parsed;
  }

  getStats() {
    const { count, totalMs, fastestMs, slowestMs } = this.timings;
    return {
      totalCalls: count,
      averageMs: count === 0 ? 0 : Math.round(totalMs / count),
      fastestMs: count === 0 ? 0 : fastestMs,
      slowestMs,
    };
  }

  resetStats() {
    this.timings = emptyTimings();
  }
}
