import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from './Language';
import { TextProcessingMode } from './ProcessedText';

export interface UserPreferences {
  sourceLanguage: string;
  targetLanguage: string;
  useSegmentMode: boolean;
  showPinyin: boolean;
  ttsVoice: string;
}

export const DEFAULT_PREFERENCES: UserPreferences = {
  sourceLanguage: DEFAULT_SOURCE_LANGUAGE,
  targetLanguage: DEFAULT_TARGET_LANGUAGE,
  useSegmentMode: true,
  showPinyin: true,
  ttsVoice: 'zh-CN-Standard-A',
};

export const processingModeOf = (prefs: UserPreferences): TextProcessingMode =>
  prefs.useSegmentMode ? 'segment' : 'paragraph';

const field = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

/** Keeps the well-typed preference fields of an untrusted object. */
export const parsePreferencesPatch = (value: unknown): Partial<UserPreferences> => {
  const patch: Partial<UserPreferences> = {};
  const sourceLanguage = field(value, 'sourceLanguage');
  if (typeof sourceLanguage === 'string') {
    patch.sourceLanguage = sourceLanguage;
  }
  const targetLanguage = field(value, 'targetLanguage');
  if (typeof targetLanguage === 'string') {
    patch.targetLanguage = targetLanguage;
  }
  const useSegmentMode = field(value, 'useSegmentMode');
  if (typeof useSegmentMode === 'boolean') {
    patch.useSegmentMode = useSegmentMode;
  }
  const showPinyin = field(value, 'showPinyin');
  if (typeof showPinyin === 'boolean') {
    patch.showPinyin = showPinyin;
  }
  const ttsVoice = field(value, 'ttsVoice');
  if (typeof ttsVoice === 'string') {
    patch.ttsVoice = ttsVoice;
  }
  return patch;
};
