export {
  ObituarySearchClient,
  SearchHttpError,
  SearchBlockedError,
  SearchRateLimitedError,
  DEFAULT_SEARCH_WINDOW,
  buildSearchUrl,
} from './client.js';
export type {
  ObituarySearchClientOptions,
  ObituarySearcher,
  SearchClientLogger,
  SearchResult,
  SearchTerminalError,
} from './client.js';
export { parseSearchResponse, searchResponseSchema, searchResultItemSchema } from './schema.js';
export type { ParsedSearchResponse } from './schema.js';
export type { ObituaryEntry, SearchQuery, SearchWindow } from './types.js';
