export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  /** Lifetime reported by the token endpoint. */
  expiresInSeconds: number;
};

export type TraktListSummary = {
  id: number;
  slug: string;
  name: string;
  itemCount: number;
};

export type TraktAddItemsResult = {
  added: number;
  existing: number;
  notFoundTmdbIds: number[];
};

export type TraktHttpMethod = 'GET' | 'POST' | 'DELETE';
