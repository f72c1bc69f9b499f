import { testConfig } from '../../common/testing/page.fixtures';
import { GeminiProvider } from './gemini.provider';

describe('GeminiProvider', () => {
  it('is disabled without an API key', async () => {
    const provider = new GeminiProvider(testConfig());

    expect(provider.enabled).toBe(false);
    await expect(provider.generateText({ prompt: 'Summarize Acme' })).rejects.toThrow(
      'GEMINI_API_KEY is missing',
    );
  });

  it('is enabled with an API key', () => {
    expect(new GeminiProvider(testConfig({ GEMINI_API_KEY: 'test-secret' })).enabled).toBe(true);
  });
});
