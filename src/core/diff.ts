/**
 * Compares the run's artifact set against the prior head.
 *
 * Classification is by playlist id and exact serialized bytes. The parsed
 * documents are only used to describe what changed inside a playlist.
 */

import { archivePaths } from "../utils/paths.js";
import { compareIds, parsePlaylistArtifact, type PlaylistDocument } from "./snapshot.js";
import type {
  ArchiveLayout,
  ArtifactSet,
  ChangeKind,
  ChangeSet,
  PlaylistChange,
  TrackDelta,
  TrackRef,
} from "../types.js";

export interface DiffInput {
  next: ArtifactSet;
  prior: ArtifactSet;
  layout: ArchiveLayout;
}

const KIND_ORDER: Record<ChangeKind, number> = { added: 0, changed: 1, removed: 2 };

export function diffArtifacts({ next, prior, layout }: DiffInput): ChangeSet {
  const p = archivePaths(layout);
  const nextPlaylists = playlistArtifacts(next, p.playlistId);
  const priorPlaylists = playlistArtifacts(prior, p.playlistId);

  const changes: PlaylistChange[] = [];
  const unchanged: string[] = [];

  for (const [id, { path, content }] of nextPlaylists) {
    const before = priorPlaylists.get(id);
    const doc = parsePlaylistArtifact(content);
    const name = doc?.name ?? id;

    if (!before) {
      changes.push({ kind: "added", id, path, name, content });
      continue;
    }
    if (before.content === content) {
      unchanged.push(id);
      continue;
    }

    const previous = parsePlaylistArtifact(before.content);
    const change: PlaylistChange = { kind: "changed", id, path, name, content };
    if (previous && previous.name !== name) change.previous_name = previous.name;
    if (previous && doc) change.tracks = trackDelta(previous, doc);
    changes.push(change);
  }

  for (const [id, { path, content }] of priorPlaylists) {
    if (nextPlaylists.has(id)) continue;
    const name = parsePlaylistArtifact(content)?.name ?? id;
    changes.push({ kind: "removed", id, path, name, content: null });
  }

  changes.sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || compareIds(a.id, b.id));
  unchanged.sort(compareIds);

  const indexPath = p.index();
  const nextIndex = next.get(indexPath);
  const index =
    nextIndex !== undefined && nextIndex !== prior.get(indexPath)
      ? { path: indexPath, content: nextIndex }
      : null;

  return { changes, index, unchanged };
}

export function isEmpty(changeSet: ChangeSet): boolean {
  return changeSet.changes.length === 0 && changeSet.index === null;
}

export function countChanges(changeSet: ChangeSet): Record<ChangeKind, number> {
  const counts: Record<ChangeKind, number> = { added: 0, changed: 0, removed: 0 };
  for (const change of changeSet.changes) counts[change.kind]++;
  return counts;
}

function playlistArtifacts(
  artifacts: ArtifactSet,
  playlistId: (path: string) => string | null
): Map<string, { path: string; content: string }> {
  const result = new Map<string, { path: string; content: string }>();
  for (const [path, content] of artifacts) {
    const id = playlistId(path);
    if (id !== null) result.set(id, { path, content });
  }
  return result;
}

// ─── Track-level description ──────────────────────────────

/**
 * Multiset difference by track id. Duplicates count separately, so adding a
 * second copy of a track shows up as one added entry.
 */
export function trackDelta(before: PlaylistDocument, after: PlaylistDocument): TrackDelta {
  const added = surplus(after.tracks, before.tracks);
  const removed = surplus(before.tracks, after.tracks);

  let reordered = false;
  if (added.length === 0 && removed.length === 0) {
    reordered = before.tracks.some((t, i) => t.track_id !== after.tracks[i]?.track_id);
  }

  return { added, removed, reordered };
}

function surplus(
  from: PlaylistDocument["tracks"],
  against: PlaylistDocument["tracks"]
): TrackRef[] {
  const available = new Map<string, number>();
  for (const t of against) {
    available.set(t.track_id, (available.get(t.track_id) ?? 0) + 1);
  }

  const result: TrackRef[] = [];
  for (const t of from) {
    const left = available.get(t.track_id) ?? 0;
    if (left > 0) {
      available.set(t.track_id, left - 1);
    } else {
      result.push({ track_id: t.track_id, title: t.title, artists: [...t.artists] });
    }
  }
  return result;
}
