// ABOUTME: Playlist Publisher - creates the playlist and uploads tracks in batches.

import { CURATION_CONFIG } from '@festlist/config';
import {
  chunk,
  type PlaylistRef,
  type PlaylistVisibility,
  type PlaylistWriter,
} from '@festlist/shared';

export interface PublishRequest {
  owner: string;
  name: string;
  visibility?: PlaylistVisibility;
  description?: string;
}

export interface PublishOptions {
  /** Track refs per add-items call; the Web API accepts at most 100 */
  batchSize?: number;
}

export interface PublishResult {
  playlist: PlaylistRef;
  itemCount: number;
  batchCount: number;
}

export function trackUri(trackId: string): string {
  return `spotify:track:${trackId}`;
}

export async function publishPlaylist(
  writer: PlaylistWriter,
  request: PublishRequest,
  trackIds: readonly string[],
  options: PublishOptions = {}
): Promise<PublishResult> {
  const batchSize = options.batchSize ?? CURATION_CONFIG.playlistBatchSize;
  const playlist = await writer.createPlaylist(request.owner, {
    name: request.name,
    visibility: request.visibility ?? 'public',
    description: request.description ?? CURATION_CONFIG.defaultDescription,
  });

  const batches = chunk(trackIds.map(trackUri), batchSize);
  // Sequential so the playlist keeps the curated order
  for (const [i, batch] of batches.entries()) {
    await writer.addItems(playlist.id, batch);
    console.log(`[Publisher] Added batch ${i + 1}/${batches.length} (${batch.length} items) to ${playlist.id}`);
  }

  return { playlist, itemCount: trackIds.length, batchCount: batches.length };
}
