import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors.js';
import { assertProviderConfigured, createConfig, loadConfigFromEnv } from '../config.js';

describe('config', () => {
  it('should apply defaults', () => {
    const config = createConfig({});
    expect(config.ai.provider).toBe('anthropic');
    expect(config.tmi).toMatchObject({
      serverUrl: 'https://api.tmi.dev',
      oauthIdp: 'google',
      callbackPort: 8888,
    });
    expect(config.analysis).toMatchObject({
      maxRepos: 3,
      noteName: 'Terraform Analysis Report',
      diagramName: 'Infrastructure Data Flow Diagram',
      maxDocChars: 2000,
    });
  });

  it('should coerce numbers and booleans from the environment', () => {
    const raw = loadConfigFromEnv({ MAX_REPOS: '5', VERBOSE: 'TRUE', TMI_OAUTH_IDP: 'github' });
    expect(raw).toMatchObject({
      analysis: { maxRepos: 5 },
      debug: { verbose: true },
      tmi: { oauthIdp: 'github' },
    });
  });

  it('should skip empty variables', () => {
    expect(createConfig({ TMI_SERVER_URL: '' }).tmi.serverUrl).toBe('https://api.tmi.dev');
  });

  it('should reject out-of-range values', () => {
    expect(() => createConfig({ MAX_REPOS: '0' })).toThrow(ConfigurationError);
    expect(() => createConfig({ AI_PROVIDER: 'other' })).toThrow(/ai\.provider/);
  });

  describe('assertProviderConfigured', () => {
    it('should require the selected provider key', () => {
      const config = createConfig({ AI_PROVIDER: 'gemini', ANTHROPIC_API_KEY: 'test-key' });
      expect(() => {
        assertProviderConfigured(config);
      }).toThrow('GEMINI_API_KEY must be set when AI_PROVIDER is gemini');
    });

    it('should pass when the key is set or debug mode is on', () => {
      expect(() => {
        assertProviderConfigured(createConfig({ GEMINI_API_KEY: 'test-key', AI_PROVIDER: 'gemini' }));
      }).not.toThrow();
      expect(() => {
        assertProviderConfigured(createConfig({ DEBUG_MODE: 'true' }));
      }).not.toThrow();
    });
  });
});
