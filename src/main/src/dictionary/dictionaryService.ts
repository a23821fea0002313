import MiniSearch from 'minisearch';
import { promises as fs } from 'fs';
import { logToFile } from '../../log';
import { LocalCacheStorage } from '../cache/LocalCacheStorage';
import { KeyValueStore } from '../db';
import { DictionaryEntry } from '../types/Dictionary';
import { DEFAULT_TARGET_LANGUAGE } from '../types/Language';
import { getAssetPath } from '../utils/assetPath';
import { FifoCache } from '../utils/fifoCache';
import { foldTerm, tokenizeMixed } from '../utils/searchText';

export interface ExternalDictionary {
  lookupWord(word: string, targetLanguage?: string): Promise<DictionaryEntry | null>;
}

export interface DictionaryServiceOptions {
  entries?: DictionaryEntry[];
  external?: ExternalDictionary;
  store?: KeyValueStore;
  now?: () => number;
}

const EXTERNAL_MEMORY_VOLUME = 500;

const isEntry = (value: unknown): value is DictionaryEntry =>
  typeof value === 'object' &&
  value !== null &&
  typeof Reflect.get(value, 'word') === 'string' &&
  typeof Reflect.get(value, 'pinyin') === 'string';

export const readDictionaryFile = async (file = getAssetPath('dictionary.json')) => {
  const parsed: unknown = JSON.parse((await fs.readFile(file)).toString());
  if (!Array.isArray(parsed)) {
    throw new Error(`dictionary file is not a list: ${file}`);
  }
  return parsed.filter(isEntry).map((entry) => ({
    ...entry,
    examples: Array.isArray(entry.examples) ? entry.examples : [],
    source: 'internal' as const,
  }));
};

export class DictionaryService {
  private readonly entries = new Map<string, DictionaryEntry>();
  private readonly externalMemory = new FifoCache<string, DictionaryEntry>(EXTERNAL_MEMORY_VOLUME);
  private readonly externalStorage: LocalCacheStorage<DictionaryEntry> | null;
  private readonly external?: ExternalDictionary;
  private readonly miniSearch = new MiniSearch<DictionaryEntry>({
    idField: 'word',
    fields: ['word', 'pinyin', 'meaningKo', 'meaningEn', 'meaningJa'],
    storeFields: ['word'],
    tokenize: tokenizeMixed,
    processTerm: foldTerm,
  });

  constructor({ entries = [], external, store, now }: DictionaryServiceOptions = {}) {
    this.external = external;
    this.externalStorage = store
      ? new LocalCacheStorage<DictionaryEntry>({ namespace: 'dictionary_external', store, now, maxItems: 5000 })
      : null;
    entries.forEach((entry) => this.addEntry(entry));
  }

  static async load(options: Omit<DictionaryServiceOptions, 'entries'> = {}, file?: string) {
    const entries = await readDictionaryFile(file);
    logToFile('dictionary loaded, entries:', entries.length);
    return new DictionaryService({ ...options, entries });
  }

  get size() {
    return this.entries.size;
  }

  addEntry(entry: DictionaryEntry) {
    const word = entry.word.trim();
    if (word === '') {
      return;
    }
    const normalized = { ...entry, word };
    this.entries.set(word, normalized);
    if (this.miniSearch.has(word)) {
      this.miniSearch.replace(normalized);
    } else {
      this.miniSearch.add(normalized);
    }
  }

  getInternal(word: string) {
    return this.entries.get(word.trim()) ?? null;
  }

  /** Internal entry, then an earlier external answer, then the external dictionary itself. */
  async lookup(word: string, targetLanguage = DEFAULT_TARGET_LANGUAGE): Promise<DictionaryEntry | null> {
    const trimmed = word.trim();
    if (trimmed === '') {
      return null;
    }
    const internal = this.entries.get(trimmed);
    if (internal) {
      return internal;
    }
    const cacheKey = `${targetLanguage}:${trimmed}`;
    const remembered = this.externalMemory.get(cacheKey);
    if (remembered) {
      return remembered;
    }
    const stored = this.externalStorage ? await this.externalStorage.get(cacheKey) : null;
    if (stored) {
      this.externalMemory.set(cacheKey, stored);
      return stored;
    }
    if (!this.external) {
      return null;
    }
    try {
      const found = await this.external.lookupWord(trimmed, targetLanguage);
      if (found) {
        this.externalMemory.set(cacheKey, found);
        await this.externalStorage?.set(cacheKey, found);
      }
      return found;
    } catch (e) {
      logToFile('external dictionary lookup failed:', trimmed, e);
      return null;
    }
  }

  search(keyword: string, limit = 20) {
    const query = keyword.trim();
    if (query === '') {
      return [];
    }
    return this.miniSearch
      .search(query, { prefix: true, fuzzy: 0.2, combineWith: 'AND' })
      .slice(0, limit)
      .flatMap((result) => {
        const entry = this.entries.get(String(result.id));
        return entry ? [entry] : [];
      });
  }
}
