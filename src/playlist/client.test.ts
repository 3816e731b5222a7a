/**
 * YouTube playlist client tests (fetch replaced by an in-process fake)
 */

import { describe, it, expect, jest } from '@jest/globals';
import { YouTubePlaylistClient, PlaylistApiError, extractPlaylistId } from './client.js';

const PLAYLIST_URL = 'https://www.youtube.com/playlist?list=PLtestPlaylist01';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function page(titles: string[], nextPageToken?: string) {
  return {
    nextPageToken,
    items: titles.map((title, position) => ({ snippet: { title, position } })),
  };
}

function fakeFetch(...responses: Response[]) {
  const queue = [...responses];
  return jest.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) {
      throw new Error('no more responses');
    }
    return next;
  });
}

describe('extractPlaylistId', () => {
  it('should read the list parameter of a playlist URL', () => {
    expect(extractPlaylistId(PLAYLIST_URL)).toBe('PLtestPlaylist01');
  });

  it('should read the list parameter of a watch URL', () => {
    expect(extractPlaylistId('https://youtube.com/watch?v=abc&list=PLwatchList123')).toBe('PLwatchList123');
  });

  it('should accept a bare playlist ID', () => {
    expect(extractPlaylistId('  PLbareIdentifier  ')).toBe('PLbareIdentifier');
  });

  it('should reject URLs without a playlist', () => {
    expect(() => extractPlaylistId('https://youtube.com/watch?v=abc')).toThrow(PlaylistApiError);
  });

  it('should reject text that is neither a URL nor an ID', () => {
    expect(() => extractPlaylistId('not a url')).toThrow('Invalid playlist URL: not a url');
  });
});

describe('YouTubePlaylistClient', () => {
  it('should require an API key', () => {
    expect(() => new YouTubePlaylistClient('')).toThrow('A YouTube API key is required to read playlists.');
  });

  it('should return titles in playlist order across pages', async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(page(['Intro to BST', 'AVL Rotations'], 'page-2')),
      jsonResponse(page(['Heaps']))
    );
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    await expect(client.fetchTitles(PLAYLIST_URL)).resolves.toEqual([
      { position: 1, title: 'Intro to BST' },
      { position: 2, title: 'AVL Rotations' },
      { position: 3, title: 'Heaps' },
    ]);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    const firstUrl = new URL(String(fetchImpl.mock.calls[0]?.[0]));
    expect(firstUrl.pathname).toBe('/youtube/v3/playlistItems');
    expect(firstUrl.searchParams.get('playlistId')).toBe('PLtestPlaylist01');
    expect(firstUrl.searchParams.get('maxResults')).toBe('50');
    expect(firstUrl.searchParams.get('pageToken')).toBeNull();
    const secondUrl = new URL(String(fetchImpl.mock.calls[1]?.[0]));
    expect(secondUrl.searchParams.get('pageToken')).toBe('page-2');
  });

  it('should stop at the page limit and warn', async () => {
    const warn = jest.fn();
    const fetchImpl = fakeFetch(jsonResponse(page(['One Video'], 'more')));
    const client = new YouTubePlaylistClient('test-key', {
      fetchImpl,
      maxPages: 1,
      logger: { debug: jest.fn(), info: jest.fn(), warn, error: jest.fn() },
    });

    await expect(client.fetchTitles(PLAYLIST_URL)).resolves.toEqual([{ position: 1, title: 'One Video' }]);
    expect(warn).toHaveBeenCalledWith(
      'Playlist PLtestPlaylist01 has more than 1 pages; using the first 1 entries'
    );
  });

  it('should report missing playlists as non-retryable', async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(
        { error: { message: 'The playlist identified with the request cannot be found.', errors: [{ reason: 'playlistNotFound' }] } },
        404
      )
    );
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    const error = await client.fetchTitles(PLAYLIST_URL).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PlaylistApiError);
    expect(error).toMatchObject({
      statusCode: 404,
      isRetryable: false,
      message: 'Playlist not found or private: The playlist identified with the request cannot be found.',
    });
  });

  it('should mark server errors as retryable', async () => {
    const fetchImpl = fakeFetch(new Response('upstream down', { status: 503 }));
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    await expect(client.fetchTitles(PLAYLIST_URL)).rejects.toMatchObject({
      statusCode: 503,
      isRetryable: true,
      message: 'Server error (503): upstream down',
    });
  });

  it('should treat quota errors as non-retryable', async () => {
    const fetchImpl = fakeFetch(
      jsonResponse({ error: { message: 'Quota used up', errors: [{ reason: 'quotaExceeded' }] } }, 403)
    );
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    await expect(client.fetchTitles(PLAYLIST_URL)).rejects.toMatchObject({
      isRetryable: false,
      message: 'YouTube API quota exceeded: Quota used up',
    });
  });

  it('should wrap network failures', async () => {
    const fetchImpl = jest.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    await expect(client.fetchTitles(PLAYLIST_URL)).rejects.toMatchObject({
      statusCode: 503,
      isRetryable: true,
      message: 'Network error: fetch failed',
    });
  });

  it('should not call the API for an invalid URL', async () => {
    const fetchImpl = fakeFetch();
    const client = new YouTubePlaylistClient('test-key', { fetchImpl });

    await expect(client.fetchTitles('ftp://example.com/nothing')).rejects.toMatchObject({ statusCode: 400 });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
