export type DictionarySource = 'internal' | 'external' | 'user';

export interface DictionaryEntry {
  word: string;
  pinyin: string;
  meaningKo?: string;
  meaningEn?: string;
  meaningJa?: string;
  examples: string[];
  source?: DictionarySource;
}

export const entryMeaning = (entry: DictionaryEntry) =>
  entry.meaningKo ?? entry.meaningEn ?? entry.meaningJa ?? '';

export const meaningFor = (entry: DictionaryEntry, languageCode: string) => {
  switch (languageCode) {
    case 'ko':
      return entry.meaningKo ?? entryMeaning(entry);
    case 'en':
      return entry.meaningEn ?? entryMeaning(entry);
    case 'ja':
      return entry.meaningJa ?? entryMeaning(entry);
    default:
      return entryMeaning(entry);
  }
};

export const availableLanguages = (entry: DictionaryEntry) => {
  const languages: string[] = [];
  if (entry.meaningKo) {
    languages.push('ko');
  }
  if (entry.meaningEn) {
    languages.push('en');
  }
  if (entry.meaningJa) {
    languages.push('ja');
  }
  return languages;
};
