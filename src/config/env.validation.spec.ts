import { validateEnv } from './env.validation';

describe('env.validation', () => {
  const minimal = {
    SUPABASE_URL: 'http://localhost:54321',
    SUPABASE_KEY: 'test-service-key',
  } as Record<string, unknown>;

  it('applies defaults to a minimal config', () => {
    const env = validateEnv({ ...minimal });
    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(10000);
    expect(env.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(env.WEBHOOK_TIMEOUT_MS).toBe(5000);
  });

  it('aborts when the data-store credentials are missing', () => {
    expect(() => validateEnv({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Invalid environment configuration: SUPABASE_KEY: SUPABASE_KEY is required',
    );
  });

  it('rejects a malformed webhook URL', () => {
    expect(() => validateEnv({ ...minimal, ZAPIER_WEBHOOK: 'not a url' })).toThrow(
      /ZAPIER_WEBHOOK: ZAPIER_WEBHOOK must be a valid URL/,
    );
  });

  it('requires API_KEY in production', () => {
    expect(() => validateEnv({ ...minimal, NODE_ENV: 'production' })).toThrow(/API_KEY: API_KEY is required in production/);
  });

  it('accepts production config when API_KEY is provided', () => {
    expect(() =>
      validateEnv({ ...minimal, NODE_ENV: 'production', API_KEY: 'test-api-key-0000' }),
    ).not.toThrow();
  });

  it('treats blank values as unset', () => {
    const env = validateEnv({ ...minimal, ZAPIER_WEBHOOK: '', PORT: '' });
    expect(env.ZAPIER_WEBHOOK).toBeUndefined();
    expect(env.PORT).toBe(10000);
  });
});
