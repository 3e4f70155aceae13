/**
 * Shared builders for tests: raw records, snapshots, a scripted fetch source.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { FetchSource } from "./core/fetch.js";
import type {
  ArchiveLayout,
  ArchiverConfig,
  PlaylistSnapshot,
  RawPlaylist,
  RawTrack,
  TrackEntry,
} from "./types.js";

export const LAYOUT: ArchiveLayout = {
  playlists_dir: "playlists",
  index_filename: "playlists_index.yaml",
};

export const CAPTURED_AT = "2026-01-05T08:00:00.000Z";

export function rawTrack(id: string, title = `Song ${id}`, artist = "Artist"): RawTrack {
  return {
    added_at: null,
    added_by: null,
    track: {
      id,
      name: title,
      artists: [{ name: artist }],
      album: { name: "Album" },
      duration_ms: 1000,
    },
  };
}

export function rawPlaylist(id: string, name: string, ownerId = "user1"): RawPlaylist {
  return { id, name, owner: { id: ownerId, display_name: null } };
}

export function track(id: string, overrides: Partial<TrackEntry> = {}): TrackEntry {
  return {
    track_id: id,
    title: `Song ${id}`,
    artists: ["Artist"],
    album: "Album",
    duration_ms: 1000,
    added_at: null,
    added_by: null,
    ...overrides,
  };
}

export function snapshot(
  id: string,
  name: string,
  trackIds: string[],
  overrides: Partial<PlaylistSnapshot> = {}
): PlaylistSnapshot {
  return {
    id,
    name,
    owner_id: "user1",
    owner_name: null,
    track_entries: trackIds.map((t) => track(t)),
    captured_at: CAPTURED_AT,
    ...overrides,
  };
}

export interface FakePlaylist {
  raw: RawPlaylist;
  tracks: RawTrack[] | Error;
}

/** Fetch source answering from a fixed list; an Error in place of tracks is thrown. */
export class FakeSource implements FetchSource {
  readonly trackRequests: string[] = [];

  constructor(private readonly playlists: FakePlaylist[]) {}

  async listPlaylists(): Promise<RawPlaylist[]> {
    return this.playlists.map((p) => p.raw);
  }

  async listTracks(playlistId: string): Promise<RawTrack[]> {
    this.trackRequests.push(playlistId);
    const found = this.playlists.find((p) => p.raw.id === playlistId);
    if (!found) throw new Error(`unknown playlist ${playlistId}`);
    if (found.tracks instanceof Error) throw found.tracks;
    return found.tracks;
  }
}

export function fakePlaylist(id: string, name: string, trackCount: number, ownerId = "user1"): FakePlaylist {
  const tracks: RawTrack[] = [];
  for (let i = 1; i <= trackCount; i++) tracks.push(rawTrack(`${id}-t${i}`));
  return { raw: rawPlaylist(id, name, ownerId), tracks };
}

export async function tempDir(prefix = "playlist-archive-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(dir: string, overrides: Partial<ArchiverConfig> = {}): ArchiverConfig {
  return {
    account: "me",
    archive_dir: path.join(dir, "archive"),
    playlists_dir: LAYOUT.playlists_dir,
    index_filename: LAYOUT.index_filename,
    exclude_owned_by_service: true,
    service_owner_id: "spotify",
    exclude_ids: [],
    exclude_names: [],
    fetch_concurrency: 2,
    lock_file: path.join(dir, "archive.lock"),
    git: { author_name: "Test", author_email: "test@example.com" },
    spotify: { api_base: "https://api.example.test/v1", access_token_env: "TEST_TOKEN" },
    ...overrides,
  };
}
