import { parseSearchResponse } from './schema.js';
import type { ObituaryEntry, SearchQuery, SearchWindow } from './types.js';

const DEFAULT_BASE_URL = 'https://www.legacy.com/api/_frontend/search';
const DEFAULT_USER_AGENT = 'obitsweep/0.1';
const DEFAULT_CHALLENGE_MARKERS = ['captcha'];

export const DEFAULT_SEARCH_WINDOW: SearchWindow = {
  startDate: '01-01-2023',
  endDate: '12-01-2025',
  countryIds: ['1'],
  regionIds: ['41'],
  limit: 50,
};

export interface SearchClientLogger {
  warn(message: string): void;
}

export interface ObituarySearchClientOptions {
  baseUrl?: string;
  userAgent?: string;
  window?: Partial<SearchWindow>;
  minDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  rateLimitBackoffMs?: number;
  retryDelayMs?: number;
  challengeMarkers?: string[];
  logger?: SearchClientLogger;
  fetchImpl?: typeof fetch;
}

export class SearchHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Obituary search request failed with status ${status}`);
    this.name = 'SearchHttpError';
    this.status = status;
    this.body = body;
  }
}

/**
 * The service refused the session (403 or a challenge page). Retrying from the
 * same session only makes things worse, so callers should stop the whole run.
 */
export class SearchBlockedError extends Error {
  readonly status: number;
  readonly marker?: string;

  constructor(status: number, marker?: string) {
    super(marker ? `Obituary search returned a ${marker} challenge (status ${status})` : `Obituary search blocked with status ${status}`);
    this.name = 'SearchBlockedError';
    this.status = status;
    this.marker = marker;
  }
}

export class SearchRateLimitedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Obituary search still rate limited after ${attempts} attempts`);
    this.name = 'SearchRateLimitedError';
    this.attempts = attempts;
  }
}

export type SearchTerminalError = SearchBlockedError | SearchRateLimitedError;

export type SearchResult =
  | { status: 'ok'; totalRecordCount: number; entries: ObituaryEntry[]; attempts: number }
  | { status: 'soft_failure'; reason: string; attempts: number }
  | { status: 'hard_failure'; error: SearchTerminalError; attempts: number }
  | { status: 'cancelled'; attempts: number };

/**
 * Anything that can answer an obituary query. The scheduler only depends on this.
 */
export interface ObituarySearcher {
  search(query: SearchQuery, signal?: AbortSignal): Promise<SearchResult>;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function buildSearchUrl(baseUrl: string, query: SearchQuery, window: SearchWindow): string {
  const params: Array<[string, string | string[]]> = [
    ['countryIdList', window.countryIds],
    ['endDate', window.endDate],
    ['firstName', query.firstName.trim()],
    ['keyword', ''],
    ['lastName', query.lastName.trim()],
    ['limit', String(window.limit)],
    ['noticeType', 'all'],
    ['regionIdList', window.regionIds],
    ['session_id', ''],
    ['startDate', window.startDate],
  ];

  // id lists keep literal commas between the encoded ids
  const encode = (value: string | string[]): string =>
    Array.isArray(value) ? value.map((item) => encodeURIComponent(item)).join(',') : encodeURIComponent(value);
  const search = params.map(([key, value]) => `${key}=${encode(value)}`).join('&');
  return `${baseUrl}?${search}`;
}

export class ObituarySearchClient implements ObituarySearcher {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly window: SearchWindow;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly rateLimitBackoffMs: number;
  private readonly retryDelayMs: number;
  private readonly challengeMarkers: string[];
  private readonly logger?: SearchClientLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ObituarySearchClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.window = { ...DEFAULT_SEARCH_WINDOW, ...options.window };
    this.minDelayMs = options.minDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 1500;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 5_000;
    this.challengeMarkers = (options.challengeMarkers ?? DEFAULT_CHALLENGE_MARKERS).map((marker) => marker.toLowerCase());
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<SearchResult> {
    const url = buildSearchUrl(this.baseUrl, query, this.window);
    const label = `${query.firstName} ${query.lastName}`;

    await sleep(this.randomDelayMs(), signal);

    let lastReason = 'no attempt made';
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const attempts = attempt + 1;
      const isLastAttempt = attempts >= this.maxAttempts;

      if (signal?.aborted) {
        return { status: 'cancelled', attempts: attempt };
      }

      let reply: { response: Response; body: string };
      try {
        reply = await this.requestOnce(url, signal);
      } catch (error) {
        if (signal?.aborted) {
          return { status: 'cancelled', attempts };
        }

        lastReason = `request error: ${toMessage(error)}`;
        this.logger?.warn(`[search] ${label}: ${lastReason} (attempt ${attempts}/${this.maxAttempts})`);
        if (!isLastAttempt) await sleep(this.retryDelayMs, signal);
        continue;
      }

      const { response, body } = reply;
      if (response.status === 429) {
        if (isLastAttempt) {
          return { status: 'hard_failure', error: new SearchRateLimitedError(attempts), attempts };
        }

        const waitMs = this.rateLimitBackoffMs * 2 ** attempt;
        this.logger?.warn(`[search] ${label}: rate limited (429), waiting ${waitMs}ms`);
        await sleep(waitMs, signal);
        continue;
      }

      if (response.status === 403) {
        return { status: 'hard_failure', error: new SearchBlockedError(403), attempts };
      }

      const marker = this.findChallengeMarker(body);
      if (marker) {
        return { status: 'hard_failure', error: new SearchBlockedError(response.status, marker), attempts };
      }

      if (!response.ok) {
        lastReason = new SearchHttpError(response.status, body).message;
        this.logger?.warn(`[search] ${label}: ${lastReason} (attempt ${attempts}/${this.maxAttempts})`);
        if (!isLastAttempt) await sleep(this.retryDelayMs, signal);
        continue;
      }

      try {
        const parsed = parseSearchResponse(JSON.parse(body));
        return { status: 'ok', totalRecordCount: parsed.totalRecordCount, entries: parsed.entries, attempts };
      } catch (error) {
        lastReason = `malformed response: ${toMessage(error)}`;
        this.logger?.warn(`[search] ${label}: ${lastReason} (attempt ${attempts}/${this.maxAttempts})`);
        if (!isLastAttempt) await sleep(this.retryDelayMs, signal);
      }
    }

    if (signal?.aborted) {
      return { status: 'cancelled', attempts: this.maxAttempts };
    }

    return { status: 'soft_failure', reason: lastReason, attempts: this.maxAttempts };
  }

  private async requestOnce(url: string, signal?: AbortSignal): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: this.buildHeaders(),
      });
      const body = await response.text();
      return { response, body };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      'Accept-Language': 'en-US,en;q=0.9',
      'Cache-Control': 'no-cache',
      'User-Agent': this.userAgent,
    };
  }

  private findChallengeMarker(body: string): string | undefined {
    if (this.challengeMarkers.length === 0) return undefined;

    const lowered = body.toLowerCase();
    return this.challengeMarkers.find((marker) => lowered.includes(marker));
  }

  private randomDelayMs(): number {
    if (this.maxDelayMs <= this.minDelayMs) {
      return this.minDelayMs;
    }

    const spread = this.maxDelayMs - this.minDelayMs;
    return this.minDelayMs + Math.floor(Math.random() * (spread + 1));
  }
}
