import { ConfigService } from '@nestjs/config';
import { Language } from '../language/language.types';
import {
  assistantConfigFactory,
  DEFAULT_ASSISTANT_CONFIG,
  validateEnvironment,
} from './assistant.config';

describe('validateEnvironment', () => {
  it('converts numeric variables', () => {
    const env = validateEnvironment({ PORT: '3100', HISTORY_CAPACITY: '12' });

    expect(env.PORT).toBe(3100);
    expect(env.HISTORY_CAPACITY).toBe(12);
  });

  it('accepts an empty environment', () => {
    expect(() => validateEnvironment({})).not.toThrow();
  });

  it.each([
    ['HISTORY_CAPACITY', '0'],
    ['SEARCH_MAX_RESULTS', '50'],
    ['OLLAMA_BASE_URL', 'localhost'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => validateEnvironment({ [key]: value })).toThrow(
      new RegExp(`Invalid environment:\\n- ${key}`),
    );
  });
});

describe('assistantConfigFactory', () => {
  it('overrides defaults with configured values', () => {
    const config = assistantConfigFactory(
      new ConfigService({
        ASSISTANT_NAME: 'Asha',
        HISTORY_CAPACITY: 10,
        OLLAMA_BASE_URL: 'http://gpu-box:11434',
      }),
    );

    expect(config.assistantNames).toEqual({
      [Language.ENGLISH]: 'Asha',
      [Language.HINDI]: 'वाणी',
      [Language.GUJARATI]: 'વાણી',
    });
    expect(config.historyCapacity).toBe(10);
    expect(config.ollamaBaseUrl).toBe('http://gpu-box:11434');
    expect(config.defaultBrowser).toBe('firefox');
    expect(config.visionStaleAfterTurns).toBe(5);
  });

  it('falls back to defaults', () => {
    expect(assistantConfigFactory(new ConfigService({}))).toEqual(
      DEFAULT_ASSISTANT_CONFIG,
    );
  });
});
