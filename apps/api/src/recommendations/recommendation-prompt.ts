import { summarizeGenres } from '../history/history-fetcher.service';
import type { WatchEvent } from '../history/history.types';
import type { AiPrompt } from '../ai/ai.types';
import type { PromptVariant } from './recommendations.types';

const SYSTEM_PROMPT =
  'You are a movie recommendation engine. You answer with strict JSON only.';

const MAX_PROMPT_TITLES = 60;
const SIMPLIFIED_TITLES = 10;
const SIMPLIFIED_GENRES = 5;

function formatTitle(e: WatchEvent): string {
  return e.year ? `${e.title} (${e.year})` : e.title;
}

export function buildRecommendationPrompt(params: {
  history: WatchEvent[];
  genreFilters: string[];
  variant: PromptVariant;
  targetCount: number;
  similarCount: number;
  diverseCount: number;
}): AiPrompt {
  const { history, targetCount, similarCount, diverseCount } = params;
  const genres = summarizeGenres(history);
  const genreConstraint = params.genreFilters.length
    ? `Only suggest movies in at least one of these genres: ${params.genreFilters.join(', ')}.`
    : null;
  const schema = `{"similar":[{"title":"Title","year":1999}],"diverse":[{"title":"Title","year":2004}]}`;

  if (params.variant === 'simplified') {
    const titles = history.slice(0, SIMPLIFIED_TITLES).map(formatTitle);
    const topGenres = genres.slice(0, SIMPLIFIED_GENRES).map((g) => g.genre);
    const user = [
      `Recently watched: ${titles.join('; ')}.`,
      topGenres.length ? `Favorite genres: ${topGenres.join(', ')}.` : null,
      `Suggest ${similarCount} similar movies and ${diverseCount} different-but-complementary movies they have not watched.`,
      genreConstraint,
      `Reply with JSON only, exactly this shape: ${schema}`,
    ]
      .filter((l): l is string => l !== null)
      .join('\n');
    return { system: SYSTEM_PROMPT, user };
  }

  const titleLines = history.slice(0, MAX_PROMPT_TITLES).map((e) => `- ${formatTitle(e)}`);
  const omitted = history.length - titleLines.length;
  const genreLines = genres.map((g) => `- ${g.genre}: ${g.count}`);

  const user = [
    `The user watched ${history.length} movies in the selected period.`,
    ``,
    `Watched titles (most recent first):`,
    ...titleLines,
    omitted > 0 ? `- ...and ${omitted} more` : null,
    ``,
    `Genre frequency:`,
    ...(genreLines.length ? genreLines : ['- (unknown)']),
    ``,
    `Recommend exactly ${targetCount} movies:`,
    `- ${similarCount} in "similar": close to what they watch (genres, themes, directors, tone).`,
    `- ${diverseCount} in "diverse": outside their usual taste but likely to appeal.`,
    `- Do not include anything they already watched.`,
    `- No duplicates across both lists.`,
    `- Prefer well-known released films that a movie database will find; mix decades.`,
    genreConstraint ? `- ${genreConstraint}` : null,
    ``,
    `Return STRICT JSON only (no markdown, no prose) with this schema:`,
    schema,
  ]
    .filter((l): l is string => l !== null)
    .join('\n');

  return { system: SYSTEM_PROMPT, user };
}
