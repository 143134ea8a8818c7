import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { DomainError, ErrorCode } from '../common/errors';

export const DEFAULT_SYSTEM_PROMPT =
  'You are Helpy, the support assistant of a local delivery service. ' +
  'Answer customers briefly and politely. If they ask about a specific order, ' +
  'ask them to send their tracking ID.';

@Injectable()
export class LlmClient {
  private readonly logger = new Logger(LlmClient.name);
  private readonly client: OpenAI | null;
  private readonly model: string;
  private readonly systemPrompt: string;

  constructor(config: ConfigService) {
    const apiKey = config.get<string>('OPENAI_API_KEY');
    this.client = apiKey
      ? new OpenAI({ apiKey, baseURL: config.get<string>('OPENAI_BASE_URL'), maxRetries: 0 })
      : null;
    this.model = config.get<string>('OPENAI_MODEL') ?? 'gpt-4o-mini';
    this.systemPrompt = config.get<string>('CHAT_SYSTEM_PROMPT') ?? DEFAULT_SYSTEM_PROMPT;
    if (!this.client) {
      this.logger.warn('OPENAI_API_KEY is not configured; chat replies without a tracking ID will fail');
    }
  }

  /** Sends one user message with the fixed system prompt and returns the first completion verbatim. */
  async complete(message: string): Promise<string> {
    if (!this.client) {
      throw new DomainError(
        ErrorCode.CHAT_NOT_CONFIGURED,
        'Chat assistant is not configured',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
    const startedAt = Date.now();
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: message },
        ],
      });
      this.logger.debug({ msg: 'Completion received', model: this.model, durationMs: Date.now() - startedAt });
      return completion.choices[0]?.message?.content ?? '';
    } catch (err) {
      const reason = (err as Error).message;
      this.logger.error({ msg: 'Completion request failed', model: this.model, error: reason });
      throw new DomainError(ErrorCode.LLM_REQUEST_FAILED, reason, HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }
}
