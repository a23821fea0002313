export const DEFAULT_SOURCE_LANGUAGE = 'zh-CN';
export const DEFAULT_TARGET_LANGUAGE = 'ko';

export const LANGUAGE_NAMES: Record<string, string> = {
  'zh-CN': 'Simplified Chinese',
  'zh-TW': 'Traditional Chinese',
  ko: 'Korean',
  en: 'English',
  ja: 'Japanese',
};

export const languageName = (code: string) => LANGUAGE_NAMES[code] ?? code;
