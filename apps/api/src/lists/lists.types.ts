export type ListSyncResult = {
  listId: number;
  listSlug: string;
  /** True when the list did not exist before this sync. */
  created: boolean;
  added: number;
  /** Items the list service could not resolve by TMDB id. */
  skipped: number;
  url: string;
};
