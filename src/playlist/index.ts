/**
 * Playlist Module
 *
 * @module playlist
 */

export {
  YouTubePlaylistClient,
  PlaylistApiError,
  extractPlaylistId,
  type PlaylistSource,
  type PlaylistClientOptions,
} from './client.js';
