import type { AiProvider } from '../config/app-config';

export const AI_SUGGESTION_CLIENT = 'AI_SUGGESTION_CLIENT';

export type AiPrompt = {
  system: string;
  user: string;
};

/** One text-in, text-out completion against the configured model. */
export interface AiSuggestionClient {
  readonly provider: AiProvider;
  complete(prompt: AiPrompt): Promise<string>;
}
