import { ErrorCode } from '../common/errors';
import { DEFAULT_SYSTEM_PROMPT, LlmClient } from './llm.client';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockCreate } } })),
}));

describe('LlmClient', () => {
  const buildClient = (env: Record<string, string>) => {
    const config = { get: jest.fn((key: string) => env[key]) } as any;
    return new LlmClient(config);
  };

  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('sends the system prompt and the user message to the configured model', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: 'Hello there!' } }] });
    const client = buildClient({ OPENAI_API_KEY: 'test-key', OPENAI_MODEL: 'gpt-test' });

    await expect(client.complete('hi')).resolves.toBe('Hello there!');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
        { role: 'user', content: 'hi' },
      ],
    });
  });

  it('uses a configured system prompt', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const client = buildClient({ OPENAI_API_KEY: 'test-key', CHAT_SYSTEM_PROMPT: 'Be terse.' });

    await client.complete('hi');
    expect(mockCreate.mock.calls[0][0].messages[0]).toEqual({ role: 'system', content: 'Be terse.' });
    expect(mockCreate.mock.calls[0][0].model).toBe('gpt-4o-mini');
  });

  it('returns an empty reply when the completion has no content', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const client = buildClient({ OPENAI_API_KEY: 'test-key' });
    await expect(client.complete('hi')).resolves.toBe('');
  });

  it('fails with CHAT_NOT_CONFIGURED without an API key', async () => {
    const client = buildClient({});
    await expect(client.complete('hi')).rejects.toMatchObject({
      code: ErrorCode.CHAT_NOT_CONFIGURED,
      httpStatus: 500,
    });
  });

  it('wraps upstream failures with the upstream message', async () => {
    mockCreate.mockRejectedValue(new Error('429 Rate limit reached'));
    const client = buildClient({ OPENAI_API_KEY: 'test-key' });
    await expect(client.complete('hi')).rejects.toMatchObject({
      code: ErrorCode.LLM_REQUEST_FAILED,
      userMessage: '429 Rate limit reached',
    });
  });
});
