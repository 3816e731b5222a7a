/**
 * YouTube Playlist Client
 *
 * PlaylistSource backed by the YouTube Data API v3 `playlistItems.list`
 * endpoint. Returns flat entries (titles only, in playlist order); no media
 * is downloaded and nested playlists are not resolved.
 *
 * @module playlist/client
 */

import type { VideoTitle } from '../schemas/recommendation.js';
import { createTimeoutSignal, AbortedError } from '../utils/timeout.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Fetches the ordered titles of a playlist.
 */
export interface PlaylistSource {
  fetchTitles(url: string, signal?: AbortSignal): Promise<VideoTitle[]>;
}

/**
 * Options for the YouTube playlist client
 */
export interface PlaylistClientOptions {
  /** Per-request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Maximum pages of 50 items to read (default: 20) */
  maxPages?: number;
  /** Fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
  /** Logger for truncation warnings */
  logger?: Logger;
}

/**
 * YouTube API error with additional context
 */
export class PlaylistApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'PlaylistApiError';
  }
}

// ============================================================================
// API Response Types (Internal)
// ============================================================================

interface PlaylistItemsResponse {
  nextPageToken?: string;
  items?: Array<{
    snippet?: {
      title?: string;
      position?: number;
    };
  }>;
}

interface ApiErrorBody {
  error?: {
    message?: string;
    errors?: Array<{ reason?: string }>;
  };
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  timeoutMs: 15000,
  maxPages: 20,
  pageSize: 50,
} as const;

const BASE_URL = 'https://www.googleapis.com/youtube/v3';

/** Bare playlist IDs, e.g. "PLtestPlaylist0123456789" */
const PLAYLIST_ID_PATTERN = /^[A-Za-z0-9_-]{10,64}$/;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Get the playlist ID from a playlist URL or a bare ID.
 *
 * @example
 * extractPlaylistId('https://www.youtube.com/playlist?list=PL123abcDEF') // 'PL123abcDEF'
 *
 * @throws PlaylistApiError (400) when no playlist ID can be found
 */
export function extractPlaylistId(input: string): string {
  const value = input.trim();

  if (PLAYLIST_ID_PATTERN.test(value)) {
    return value;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new PlaylistApiError(`Invalid playlist URL: ${value}`, 400, false);
  }

  const list = url.searchParams.get('list');
  if (!list || !PLAYLIST_ID_PATTERN.test(list)) {
    throw new PlaylistApiError(`URL has no playlist ID (missing "list" parameter): ${value}`, 400, false);
  }
  return list;
}

function parseErrorBody(text: string): ApiErrorBody | undefined {
  try {
    return JSON.parse(text) as ApiErrorBody;
  } catch {
    return undefined;
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * YouTubePlaylistClient reads playlist entries page by page.
 *
 * @example
 * ```typescript
 * const source = new YouTubePlaylistClient(apiKey, { timeoutMs: 10000 });
 * const titles = await source.fetchTitles('https://www.youtube.com/playlist?list=PL...');
 * ```
 */
export class YouTubePlaylistClient implements PlaylistSource {
  private readonly timeoutMs: number;
  private readonly maxPages: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly apiKey: string,
    options: PlaylistClientOptions = {}
  ) {
    if (!apiKey) {
      throw new Error('A YouTube API key is required to read playlists.');
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.maxPages = options.maxPages ?? DEFAULTS.maxPages;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch all titles of a playlist, in playlist order.
   *
   * @throws PlaylistApiError on invalid URLs, API errors or timeout
   * @throws AbortedError when `signal` aborts
   */
  async fetchTitles(url: string, signal?: AbortSignal): Promise<VideoTitle[]> {
    const playlistId = extractPlaylistId(url);
    const titles: VideoTitle[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < this.maxPages; page++) {
      const data = await this.fetchPage(playlistId, pageToken, signal);

      for (const item of data.items ?? []) {
        titles.push({ position: titles.length + 1, title: item.snippet?.title ?? '' });
      }

      pageToken = data.nextPageToken;
      if (!pageToken) {
        return titles;
      }
    }

    this.logger.warn(
      `Playlist ${playlistId} has more than ${this.maxPages} pages; using the first ${titles.length} entries`
    );
    return titles;
  }

  private async fetchPage(
    playlistId: string,
    pageToken: string | undefined,
    signal?: AbortSignal
  ): Promise<PlaylistItemsResponse> {
    const params = new URLSearchParams({
      part: 'snippet',
      playlistId,
      maxResults: String(DEFAULTS.pageSize),
      key: this.apiKey,
    });
    if (pageToken) {
      params.set('pageToken', pageToken);
    }

    const response = await this.fetchWithTimeout(`${BASE_URL}/playlistItems?${params.toString()}`, signal);

    if (!response.ok) {
      await this.handleError(response);
    }

    return (await response.json()) as PlaylistItemsResponse;
  }

  /**
   * Execute fetch with timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, signal?: AbortSignal): Promise<Response> {
    const { signal: requestSignal, dispose } = createTimeoutSignal(this.timeoutMs, signal);

    try {
      return await this.fetchImpl(url, { method: 'GET', signal: requestSignal });
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortedError('Playlist fetch aborted');
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new PlaylistApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true);
      }
      throw new PlaylistApiError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        503,
        true
      );
    } finally {
      dispose();
    }
  }

  /**
   * Handle API error responses.
   */
  private async handleError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');
    const parsed = parseErrorBody(text);
    const errorMessage = parsed?.error?.message || text;
    const reasons = (parsed?.error?.errors ?? [])
      .map((e) => e.reason)
      .filter((r): r is string => typeof r === 'string');

    const isQuotaExceeded = reasons.some(
      (r) => r === 'quotaExceeded' || r === 'dailyLimitExceeded' || r === 'rateLimitExceeded'
    );
    const isRetryable = !isQuotaExceeded && (response.status === 429 || response.status >= 500);

    let message: string;
    if (response.status === 404 || reasons.includes('playlistNotFound')) {
      message = `Playlist not found or private: ${errorMessage}`;
    } else if (isQuotaExceeded) {
      message = `YouTube API quota exceeded: ${errorMessage}`;
    } else if (response.status === 429) {
      message = `Rate limit exceeded: ${errorMessage}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${errorMessage}`;
    } else if (response.status === 403) {
      message = `Access forbidden: ${errorMessage}`;
    } else {
      message = `API error (${response.status}): ${errorMessage}`;
    }

    throw new PlaylistApiError(message, response.status, isRetryable);
  }
}
