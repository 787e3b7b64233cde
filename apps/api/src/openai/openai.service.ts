import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import { OPENAI_API_BASE_URL } from '../app.constants';
import type { AiPrompt, AiSuggestionClient } from '../ai/ai.types';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { getRecord, isPlainObject } from '../lib/json-narrow';

type OpenAiChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export function extractChatContent(data: unknown): string {
  const choices = isPlainObject(data) ? data['choices'] : null;
  const first: unknown = Array.isArray(choices) ? choices[0] : null;
  const content = getRecord(first, 'message')?.['content'];
  return typeof content === 'string' ? content : '';
}

@Injectable()
export class OpenAiService implements AiSuggestionClient {
  readonly provider = 'openai' as const;
  private readonly logger = new Logger(OpenAiService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async complete(prompt: AiPrompt): Promise<string> {
    return await this.chatCompletions({
      apiKey: this.config.ai.apiKey,
      model: this.config.ai.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      timeoutMs: this.config.http.aiTimeoutMs,
      jsonMode: true,
    });
  }

  private async extractOpenAiError(res: Response) {
    const text = await res.text().catch(() => '');
    if (!text) return '';
    try {
      const err = getRecord(JSON.parse(text), 'error');
      if (!err) return `body=${JSON.stringify(text.slice(0, 300))}`;
      return `message=${JSON.stringify(err['message'])} type=${JSON.stringify(err['type'])} code=${JSON.stringify(err['code'])}`;
    } catch {
      return `body=${JSON.stringify(text.slice(0, 300))}`;
    }
  }

  async chatCompletions(params: {
    apiKey: string;
    model: string;
    messages: OpenAiChatMessage[];
    timeoutMs?: number;
    jsonMode?: boolean;
  }): Promise<string> {
    const apiKey = params.apiKey.trim();
    const model = params.model.trim();
    const timeoutMs = params.timeoutMs ?? 30000;

    if (!apiKey) throw new BadGatewayException('OpenAI apiKey is required');
    if (!model) throw new BadGatewayException('OpenAI model is required');

    const url = `${OPENAI_API_BASE_URL}/chat/completions`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const startedAt = Date.now();

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: params.messages,
          temperature: 0.7,
          ...(params.jsonMode ? { response_format: { type: 'json_object' } } : {}),
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const detail = await this.extractOpenAiError(res);
        throw new BadGatewayException(
          `OpenAI chat.completions failed: HTTP ${res.status}${detail ? ` ${detail}` : ''}`.trim(),
        );
      }

      const content = extractChatContent(await res.json());
      this.logger.debug(
        `OpenAI chat.completions ok model=${model} ms=${Date.now() - startedAt} chars=${content.length}`,
      );
      return content;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `OpenAI chat.completions failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
