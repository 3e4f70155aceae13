/**
 * Drops playlists that must never reach the archive.
 * Rules run in order: id denylist, name denylist, service ownership.
 */

import type {
  ExcludedPlaylist,
  ExclusionReason,
  ExclusionRules,
  PlaylistSnapshot,
} from "../types.js";

type Excludable = Pick<PlaylistSnapshot, "id" | "name" | "owner_id">;

export function matchExclusion(
  playlist: Excludable,
  rules: ExclusionRules
): ExclusionReason | null {
  if (rules.exclude_ids.includes(playlist.id)) return "id";
  if (rules.exclude_names.includes(playlist.name)) return "name";
  if (rules.exclude_owned_by_service && playlist.owner_id === rules.service_owner_id) {
    return "service_owned";
  }
  return null;
}

export function applyExclusions<T extends Excludable>(
  playlists: readonly T[],
  rules: ExclusionRules
): { included: T[]; excluded: ExcludedPlaylist[] } {
  const included: T[] = [];
  const excluded: ExcludedPlaylist[] = [];

  for (const playlist of playlists) {
    const reason = matchExclusion(playlist, rules);
    if (reason) {
      excluded.push({ id: playlist.id, name: playlist.name, reason });
    } else {
      included.push(playlist);
    }
  }

  return { included, excluded };
}
