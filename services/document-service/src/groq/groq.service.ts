import { Inject, Injectable } from '@nestjs/common';
import { request } from 'undici';
import { createLogger } from '@medidoc/shared';
import { SERVICE_CONFIG } from '../tokens';
import { isRecord } from '../guards';
import { SERVICE_NAME, ServiceConfig } from '../config/service.config';
import { CompletionClient, CompletionError, CompletionRequest } from './completion.types';

/**
 * Chat completions against Groq's OpenAI-compatible endpoint.
 * Any transport failure, non-2xx status or malformed body surfaces as a CompletionError.
 */
@Injectable()
export class GroqService implements CompletionClient {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'GroqService' });

  constructor(@Inject(SERVICE_CONFIG) private readonly config: ServiceConfig) {}

  async complete(input: CompletionRequest): Promise<string> {
    const { apiKey, baseUrl, model, timeoutMs } = this.config.completion;
    if (!apiKey) {
      throw new CompletionError('GROQ_API_KEY is not set');
    }

    const body = {
      model,
      messages: input.messages,
      temperature: input.temperature,
      max_tokens: input.maxTokens,
      top_p: 1,
      stream: false,
    };

    const url = `${baseUrl}/v1/chat/completions`;

    try {
      const res = await request(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(body),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });

      if (res.statusCode < 200 || res.statusCode >= 300) {
        const detail = await res.body.text();
        throw new CompletionError(`Groq responded ${res.statusCode}: ${detail.slice(0, 500)}`, res.statusCode);
      }

      const content = extractContent(await res.body.json());
      if (content === undefined) {
        throw new CompletionError('Groq response missing content', res.statusCode);
      }
      return content;
    } catch (error) {
      this.logger.error('Groq completion failed', error, { model });
      if (error instanceof CompletionError) throw error;
      throw new CompletionError(error instanceof Error ? error.message : String(error));
    }
  }
}

/** Reads `choices[0].message.content` from a chat-completions response body. */
export function extractContent(json: unknown): string | undefined {
  if (!isRecord(json) || !Array.isArray(json.choices)) return undefined;
  const [first] = json.choices;
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const content = first.message.content;
  return typeof content === 'string' ? content : undefined;
}
