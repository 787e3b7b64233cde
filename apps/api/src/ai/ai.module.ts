import { Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { GeminiService } from '../gemini/gemini.service';
import { OpenAiService } from '../openai/openai.service';
import { AI_SUGGESTION_CLIENT, type AiSuggestionClient } from './ai.types';

@Module({
  providers: [
    OpenAiService,
    GeminiService,
    {
      provide: AI_SUGGESTION_CLIENT,
      useFactory: (
        config: AppConfig,
        openai: OpenAiService,
        gemini: GeminiService,
      ): AiSuggestionClient => (config.ai.provider === 'gemini' ? gemini : openai),
      inject: [APP_CONFIG, OpenAiService, GeminiService],
    },
  ],
  exports: [AI_SUGGESTION_CLIENT],
})
export class AiModule {}
