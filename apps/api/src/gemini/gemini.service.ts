import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import { GEMINI_API_BASE_URL } from '../app.constants';
import type { AiPrompt, AiSuggestionClient } from '../ai/ai.types';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { getRecord, isPlainObject } from '../lib/json-narrow';

export function extractCandidateText(data: unknown): string {
  const candidates = isPlainObject(data) ? data['candidates'] : null;
  const first: unknown = Array.isArray(candidates) ? candidates[0] : null;
  const parts = getRecord(first, 'content')?.['parts'];
  if (!Array.isArray(parts)) return '';
  return parts
    .map((p) => {
      const text: unknown = isPlainObject(p) ? p['text'] : null;
      return typeof text === 'string' ? text : '';
    })
    .join('');
}

@Injectable()
export class GeminiService implements AiSuggestionClient {
  readonly provider = 'gemini' as const;
  private readonly logger = new Logger(GeminiService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async complete(prompt: AiPrompt): Promise<string> {
    return await this.generateContent({
      apiKey: this.config.ai.apiKey,
      model: this.config.ai.model,
      system: prompt.system,
      user: prompt.user,
      timeoutMs: this.config.http.aiTimeoutMs,
    });
  }

  async generateContent(params: {
    apiKey: string;
    model: string;
    system: string;
    user: string;
    timeoutMs?: number;
  }): Promise<string> {
    const apiKey = params.apiKey.trim();
    const model = params.model.trim();
    if (!apiKey) throw new BadGatewayException('Gemini apiKey is required');
    if (!model) throw new BadGatewayException('Gemini model is required');

    const url = `${GEMINI_API_BASE_URL}/models/${encodeURIComponent(model)}:generateContent`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs ?? 30000);

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: params.system }] },
          contents: [{ role: 'user', parts: [{ text: params.user }] }],
          generationConfig: {
            temperature: 0.7,
            topK: 40,
            topP: 0.95,
            maxOutputTokens: 8192,
            responseMimeType: 'application/json',
          },
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(
          `Gemini generateContent failed: HTTP ${res.status} ${body.slice(0, 300)}`.trim(),
        );
      }

      const text = extractCandidateText(await res.json());
      if (!text) this.logger.warn(`Gemini returned no candidate text model=${model}`);
      return text;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `Gemini generateContent failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
