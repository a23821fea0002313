import path from 'path';

export interface AppConfig {
  dataRoot: string;
  port: number;
  logToFile: boolean;
  openAiApiKey: string;
  openAiModel: string;
  openAiBaseUrl: string;
  googleCloudApiKey: string;
  googleCloudProjectId: string;
  papagoClientId: string;
  papagoClientSecret: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  dataRoot: path.resolve('data'),
  port: 8080,
  logToFile: true,
  openAiApiKey: '',
  openAiModel: 'gpt-4o-mini',
  openAiBaseUrl: 'https://api.openai.com/v1',
  googleCloudApiKey: '',
  googleCloudProjectId: '',
  papagoClientId: '',
  papagoClientSecret: '',
};

const toInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toBool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    dataRoot: env.PIKABOOK_DATA_ROOT ? path.resolve(env.PIKABOOK_DATA_ROOT) : DEFAULT_CONFIG.dataRoot,
    port: toInt(env.PORT, DEFAULT_CONFIG.port),
    logToFile: toBool(env.LOG_TO_FILE, DEFAULT_CONFIG.logToFile),
    openAiApiKey: env.OPENAI_API_KEY ?? '',
    openAiModel: env.OPENAI_MODEL || DEFAULT_CONFIG.openAiModel,
    openAiBaseUrl: env.OPENAI_BASE_URL || DEFAULT_CONFIG.openAiBaseUrl,
    googleCloudApiKey: env.GOOGLE_CLOUD_API_KEY ?? '',
    googleCloudProjectId: env.GOOGLE_CLOUD_PROJECT_ID ?? '',
    papagoClientId: env.PAPAGO_CLIENT_ID ?? '',
    papagoClientSecret: env.PAPAGO_CLIENT_SECRET ?? '',
  };
};
