export type SimilarityBucket = 'similar' | 'diverse';

export type PromptVariant = 'primary' | 'simplified';

export type Candidate = {
  /** Set only when the suggestion already carries a known id. */
  titleId?: number;
  title: string;
  year?: number;
  similarityBucket: SimilarityBucket;
};

/** One suggestion as decoded from model output, before mixing. */
export type RawSuggestion = {
  title: string;
  year: number | null;
};
