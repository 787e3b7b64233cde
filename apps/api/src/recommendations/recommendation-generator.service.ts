import { Inject, Injectable, Logger } from '@nestjs/common';
import { RECOMMENDATION_TARGET_COUNT, SIMILAR_RATIO } from '../app.constants';
import { AI_SUGGESTION_CLIENT, type AiSuggestionClient } from '../ai/ai.types';
import type { WatchEvent } from '../history/history.types';
import { errToMessage, PipelineError } from '../lib/pipeline-errors';
import { titleMatchKey, titleYearKey } from '../lib/title-normalize';
import { buildRecommendationPrompt } from './recommendation-prompt';
import { decodeSuggestions } from './recommendation-response';
import type {
  Candidate,
  PromptVariant,
  RawSuggestion,
  SimilarityBucket,
} from './recommendations.types';

export function bucketTargets(targetCount: number, similarRatio = SIMILAR_RATIO) {
  const similar = Math.round(targetCount * similarRatio);
  return { similar, diverse: targetCount - similar };
}

/**
 * Drops suggestions already watched or already suggested, then takes up to
 * the diverse target and fills the remainder from similar (and the other
 * way round when similar runs short). Similar items come first.
 */
export function mixCandidates(params: {
  similar: RawSuggestion[];
  diverse: RawSuggestion[];
  history: WatchEvent[];
  targetCount: number;
  similarRatio?: number;
}): Candidate[] {
  const watchedTitles = new Set<string>();
  const watchedTitleYears = new Set<string>();
  for (const e of params.history) {
    watchedTitles.add(titleMatchKey(e.title));
    if (e.year) watchedTitleYears.add(titleYearKey(e.title, e.year));
  }

  const isWatched = (s: RawSuggestion): boolean => {
    const key = titleMatchKey(s.title);
    if (!watchedTitles.has(key)) return false;
    // Same title, different year (remakes) is still a new film.
    if (s.year === null) return true;
    const sameYear = watchedTitleYears.has(titleYearKey(s.title, s.year));
    const watchedWithoutYear = params.history.some(
      (e) => !e.year && titleMatchKey(e.title) === key,
    );
    return sameYear || watchedWithoutYear;
  };

  // An undated suggestion collides with any dated one of the same title.
  const seenTitles = new Set<string>();
  const seenUndated = new Set<string>();
  const seenTitleYears = new Set<string>();
  const isDuplicate = (s: RawSuggestion, title: string): boolean =>
    s.year === null
      ? seenTitles.has(title)
      : seenUndated.has(title) || seenTitleYears.has(titleYearKey(s.title, s.year));

  const accept = (s: RawSuggestion): boolean => {
    const title = titleMatchKey(s.title);
    if (!title) return false;
    if (isDuplicate(s, title) || isWatched(s)) return false;
    seenTitles.add(title);
    if (s.year === null) seenUndated.add(title);
    else seenTitleYears.add(titleYearKey(s.title, s.year));
    return true;
  };

  const similar = params.similar.filter(accept);
  const diverse = params.diverse.filter(accept);

  const targets = bucketTargets(params.targetCount, params.similarRatio);
  const diverseTaken = Math.min(diverse.length, targets.diverse);
  const similarTaken = Math.min(similar.length, params.targetCount - diverseTaken);
  const diverseTotal = Math.min(diverse.length, params.targetCount - similarTaken);

  const toCandidate =
    (bucket: SimilarityBucket) =>
    (s: RawSuggestion): Candidate =>
      s.year === null
        ? { title: s.title, similarityBucket: bucket }
        : { title: s.title, year: s.year, similarityBucket: bucket };

  return [
    ...similar.slice(0, similarTaken).map(toCandidate('similar')),
    ...diverse.slice(0, diverseTotal).map(toCandidate('diverse')),
  ];
}

@Injectable()
export class RecommendationGeneratorService {
  private readonly logger = new Logger(RecommendationGeneratorService.name);

  constructor(
    @Inject(AI_SUGGESTION_CLIENT) private readonly ai: AiSuggestionClient,
  ) {}

  /**
   * One model call. Transport failures raise AIServiceError, undecodable
   * output raises UnparsableResponse; the caller owns any fallback.
   */
  async generate(
    history: WatchEvent[],
    genreFilters: string[],
    variant: PromptVariant = 'primary',
  ): Promise<Candidate[]> {
    const targetCount = RECOMMENDATION_TARGET_COUNT;
    const targets = bucketTargets(targetCount);
    const prompt = buildRecommendationPrompt({
      history,
      genreFilters,
      variant,
      targetCount,
      similarCount: targets.similar,
      diverseCount: targets.diverse,
    });

    let text: string;
    try {
      text = await this.ai.complete(prompt);
    } catch (err) {
      throw new PipelineError(
        'AIServiceError',
        `${this.ai.provider} request failed (${variant} prompt): ${errToMessage(err)}`,
        { cause: err },
      );
    }

    const decoded = decodeSuggestions(text);
    if (!decoded.ok) {
      throw new PipelineError(
        'UnparsableResponse',
        `${this.ai.provider} response could not be decoded (${variant} prompt): ${decoded.reason}`,
      );
    }

    const candidates = mixCandidates({
      similar: decoded.similar,
      diverse: decoded.diverse,
      history,
      targetCount,
    });
    const diverseCount = candidates.filter((c) => c.similarityBucket === 'diverse').length;
    this.logger.log(
      `Generated candidates provider=${this.ai.provider} variant=${variant} ` +
        `returned=${decoded.similar.length + decoded.diverse.length} dropped=${decoded.dropped} ` +
        `kept=${candidates.length} similar=${candidates.length - diverseCount} diverse=${diverseCount}`,
    );
    return candidates;
  }
}
