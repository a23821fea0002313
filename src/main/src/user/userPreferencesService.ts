import { KeyValueStore } from '../db';
import { ValidationError } from '../errors';
import { logToFile } from '../../log';
import { DEFAULT_PREFERENCES, UserPreferences, parsePreferencesPatch } from '../types/UserPreferences';

const isLanguageCode = (value: string) => /^[a-z]{2,3}(-[A-Za-z]{2,4})?$/.test(value);

export const preferencesKey = (userId: string) => `user_preferences:${userId}`;

/** Preferences are durable settings: one JSON record per user, never evicted. */
export class UserPreferencesService {
  constructor(private readonly store: KeyValueStore) {}

  async getPreferences(userId: string): Promise<UserPreferences> {
    const raw = await this.store.getString(preferencesKey(userId));
    if (raw === null) {
      return { ...DEFAULT_PREFERENCES };
    }
    try {
      return { ...DEFAULT_PREFERENCES, ...parsePreferencesPatch(JSON.parse(raw)) };
    } catch (e) {
      logToFile('stored preferences unreadable, using defaults:', userId, e);
      return { ...DEFAULT_PREFERENCES };
    }
  }

  async savePreferences(userId: string, patch: Partial<UserPreferences>) {
    for (const language of [patch.sourceLanguage, patch.targetLanguage]) {
      if (language !== undefined && !isLanguageCode(language)) {
        throw new ValidationError(`unsupported language code: ${language}`);
      }
    }
    const preferences = { ...(await this.getPreferences(userId)), ...patch };
    await this.store.setString(preferencesKey(userId), JSON.stringify(preferences));
    return preferences;
  }
}
