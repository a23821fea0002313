import path from 'path';
import { DEFAULT_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PIKABOOK_DATA_ROOT: '/tmp/pikabook',
      PORT: '9090',
      LOG_TO_FILE: 'false',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_MODEL: 'gpt-4',
    });
    expect(config.dataRoot).toBe(path.resolve('/tmp/pikabook'));
    expect(config.port).toBe(9090);
    expect(config.logToFile).toBe(false);
    expect(config.openAiApiKey).toBe('test-secret');
    expect(config.openAiModel).toBe('gpt-4');
    expect(config.openAiBaseUrl).toBe('https://api.openai.com/v1');
  });

  it('ignores a port that is not a number', () => {
    expect(loadConfig({ PORT: 'abc' }).port).toBe(8080);
  });
});
