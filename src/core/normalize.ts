/**
 * Raw service records to PlaylistSnapshot.
 *
 * Validation happens once here. Everything downstream works on the
 * normalized shape and never looks at raw records again.
 */

import { MalformedRecord } from "./errors.js";
import type {
  PlaylistSnapshot,
  RawPlaylist,
  RawTrack,
  TrackEntry,
} from "../types.js";

export function normalizePlaylist(
  raw: RawPlaylist,
  rawTracks: readonly RawTrack[],
  capturedAt: string
): PlaylistSnapshot {
  const id = present(raw.id);
  if (id === null) {
    throw new MalformedRecord("Playlist record has no id");
  }
  // The id names the playlist's file
  if (!isSafeSegment(id)) {
    throw new MalformedRecord(`Playlist id ${JSON.stringify(id)} is not usable as a file name`, id);
  }

  const name = raw.name ?? null;
  if (name === null) {
    throw new MalformedRecord(`Playlist ${id} has no name`, id);
  }

  const trackEntries: TrackEntry[] = [];
  rawTracks.forEach((item, position) => {
    // Items whose track was pulled from the catalogue carry no track at all
    if (!item.track) return;
    trackEntries.push(normalizeTrack(id, item, position));
  });

  return {
    id,
    name,
    owner_id: present(raw.owner?.id),
    owner_name: present(raw.owner?.display_name),
    track_entries: trackEntries,
    captured_at: capturedAt,
  };
}

function normalizeTrack(playlistId: string, item: RawTrack, position: number): TrackEntry {
  const track = item.track ?? {};
  const trackId = present(track.id);
  if (trackId === null) {
    throw new MalformedRecord(
      `Playlist ${playlistId}: track at position ${position} has no id`,
      playlistId
    );
  }

  const artists: string[] = [];
  for (const artist of track.artists ?? []) {
    const artistName = present(artist.name);
    if (artistName !== null) artists.push(artistName);
  }

  return {
    track_id: trackId,
    title: track.name ?? null,
    artists,
    album: present(track.album?.name),
    duration_ms: typeof track.duration_ms === "number" ? track.duration_ms : null,
    added_at: present(item.added_at),
    added_by: present(item.added_by?.id),
  };
}

function isSafeSegment(id: string): boolean {
  return !/[\\/\u0000-\u001f\u007f]/.test(id) && !id.includes("..") && id !== ".";
}

/** Empty strings from the service mean "absent". */
function present(value: string | null | undefined): string | null {
  return value === undefined || value === null || value === "" ? null : value;
}
