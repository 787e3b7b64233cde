export const TRAKT_API_BASE_URL = 'https://api.trakt.tv';
export const TRAKT_WEB_BASE_URL = 'https://trakt.tv';
export const TRAKT_API_VERSION = '2';
export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3';
export const OPENAI_API_BASE_URL = 'https://api.openai.com/v1';
export const GEMINI_API_BASE_URL =
  'https://generativelanguage.googleapis.com/v1beta';

export const HISTORY_PAGE_SIZE = 100;
export const HISTORY_MAX_PAGES = 50;

export const RECOMMENDATION_TARGET_COUNT = 50;
export const SIMILAR_RATIO = 0.7;
export const RANKED_LIST_SIZE = 20;
export const FUZZY_TITLE_MATCH_THRESHOLD = 0.6;

export const DEFAULT_LIST_NAME = 'AI Recommendations';
export const DEFAULT_NIGHTLY_CRON = '0 3 * * *';

export const TIME_PERIODS = ['1d', '7d', '30d', '90d'] as const;
export type TimePeriod = (typeof TIME_PERIODS)[number];

export const TIME_PERIOD_DAYS: Record<TimePeriod, number> = {
  '1d': 1,
  '7d': 7,
  '30d': 30,
  '90d': 90,
};
