/**
 * Fetch phase: list playlists, drop the ones the exclusion rules already
 * reject from their listing record, pull the rest's tracks in a bounded
 * worker pool, normalize each one.
 *
 * Per-playlist failures are collected. AuthError and RateLimited abort the
 * whole collection, and nothing downstream runs on a partial result.
 */

import { mapWithConcurrency } from "../utils/pool.js";
import { isRunAborting } from "./errors.js";
import { matchExclusion } from "./exclusion.js";
import { normalizePlaylist } from "./normalize.js";
import type {
  ExcludedPlaylist,
  ExclusionRules,
  FailedPlaylist,
  PlaylistSnapshot,
  RawPlaylist,
  RawTrack,
} from "../types.js";

export interface FetchSource {
  listPlaylists(account: string): Promise<RawPlaylist[]>;
  listTracks(playlistId: string): Promise<RawTrack[]>;
}

export interface CollectOptions {
  concurrency: number;
  capturedAt: string;
  /** Checked against each listing record before its tracks are requested. */
  rules?: ExclusionRules;
}

export interface CollectResult {
  playlists: PlaylistSnapshot[];
  failed: FailedPlaylist[];
  excluded: ExcludedPlaylist[];
}

type Outcome =
  | { ok: true; snapshot: PlaylistSnapshot }
  | { ok: false; failure: FailedPlaylist };

export async function collectPlaylists(
  source: FetchSource,
  account: string,
  options: CollectOptions
): Promise<CollectResult> {
  const listed = await source.listPlaylists(account);

  // The service can list the same playlist more than once (followed + owned)
  const seen = new Set<string>();
  const unique: Array<{ id: string; raw: RawPlaylist }> = [];
  const failed: FailedPlaylist[] = [];
  const excluded: ExcludedPlaylist[] = [];
  for (const raw of listed) {
    if (!raw.id) {
      failed.push({ playlist_id: null, name: raw.name ?? null, reason: "Playlist record has no id" });
      continue;
    }
    if (seen.has(raw.id)) continue;
    seen.add(raw.id);

    const name = raw.name ?? "";
    const reason = options.rules
      ? matchExclusion({ id: raw.id, name, owner_id: raw.owner?.id ?? null }, options.rules)
      : null;
    if (reason) {
      excluded.push({ id: raw.id, name, reason });
      continue;
    }
    unique.push({ id: raw.id, raw });
  }

  const outcomes = await mapWithConcurrency(unique, options.concurrency, async ({ id, raw }): Promise<Outcome> => {
    try {
      const tracks = await source.listTracks(id);
      return { ok: true, snapshot: normalizePlaylist(raw, tracks, options.capturedAt) };
    } catch (err) {
      if (isRunAborting(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[fetch] Skipping playlist ${id}: ${reason}`);
      return {
        ok: false,
        failure: { playlist_id: id, name: raw.name ?? null, reason },
      };
    }
  });

  const playlists: PlaylistSnapshot[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) playlists.push(outcome.snapshot);
    else failed.push(outcome.failure);
  }
  return { playlists, failed, excluded };
}
