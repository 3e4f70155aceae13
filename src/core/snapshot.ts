/**
 * Turns normalized playlists into archive artifacts.
 *
 * Serialization is a pure function of the snapshot value: keys are emitted in
 * a fixed order and the run timestamp is left out, so an unchanged playlist
 * always produces the same bytes and the diff can compare strings.
 */

import { z } from "zod";
import { dumpYaml, parseYaml } from "../utils/yaml.js";
import { archivePaths } from "../utils/paths.js";
import type {
  ArchiveIndex,
  ArchiveIndexEntry,
  ArchiveLayout,
  ArtifactSet,
  PlaylistSnapshot,
  RetainedArtifact,
  TrackEntry,
} from "../types.js";

// ─── Documents ────────────────────────────────────────────

const TrackDocumentSchema = z.object({
  track_id: z.string(),
  title: z.string().nullable(),
  artists: z.array(z.string()),
  album: z.string().nullable(),
  duration_ms: z.number().nullable(),
  added_at: z.string().nullable(),
  added_by: z.string().nullable(),
});

const PlaylistDocumentSchema = z.object({
  id: z.string(),
  name: z.string(),
  owner_id: z.string().nullable(),
  owner_name: z.string().nullable(),
  track_count: z.number(),
  tracks: z.array(TrackDocumentSchema),
});

const IndexEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  owner_id: z.string().nullable(),
  owner_name: z.string().nullable(),
  track_count: z.number(),
  total_duration_ms: z.number(),
});

const IndexDocumentSchema = z.object({
  playlists: z.array(IndexEntrySchema),
});

export type PlaylistDocument = z.infer<typeof PlaylistDocumentSchema>;

function trackDocument(track: TrackEntry): TrackEntry {
  return {
    track_id: track.track_id,
    title: track.title,
    artists: [...track.artists],
    album: track.album,
    duration_ms: track.duration_ms,
    added_at: track.added_at,
    added_by: track.added_by,
  };
}

export function playlistDocument(snapshot: PlaylistSnapshot): PlaylistDocument {
  return {
    id: snapshot.id,
    name: snapshot.name,
    owner_id: snapshot.owner_id,
    owner_name: snapshot.owner_name,
    track_count: snapshot.track_entries.length,
    tracks: snapshot.track_entries.map(trackDocument),
  };
}

export function serializePlaylist(snapshot: PlaylistSnapshot): string {
  return dumpYaml(playlistDocument(snapshot));
}

// ─── Index ────────────────────────────────────────────────

export function indexEntry(snapshot: PlaylistSnapshot): ArchiveIndexEntry {
  let totalDuration = 0;
  for (const track of snapshot.track_entries) {
    totalDuration += track.duration_ms ?? 0;
  }
  return {
    id: snapshot.id,
    name: snapshot.name,
    owner_id: snapshot.owner_id,
    owner_name: snapshot.owner_name,
    track_count: snapshot.track_entries.length,
    total_duration_ms: totalDuration,
  };
}

export function buildIndex(
  snapshots: readonly PlaylistSnapshot[],
  retained: readonly ArchiveIndexEntry[] = []
): ArchiveIndex {
  const byId = new Map<string, ArchiveIndexEntry>();
  for (const entry of retained) byId.set(entry.id, { ...entry });
  for (const snapshot of snapshots) byId.set(snapshot.id, indexEntry(snapshot));

  const playlists = [...byId.values()].sort((a, b) => compareIds(a.id, b.id));
  return { playlists };
}

export function serializeIndex(index: ArchiveIndex): string {
  return dumpYaml({
    playlists: index.playlists.map((entry) => ({
      id: entry.id,
      name: entry.name,
      owner_id: entry.owner_id,
      owner_name: entry.owner_name,
      track_count: entry.track_count,
      total_duration_ms: entry.total_duration_ms,
    })),
  });
}

// ─── Artifact set ─────────────────────────────────────────

/**
 * Full artifact set for one run: one file per playlist plus the index.
 * Retained artifacts are copied byte-for-byte from the prior head.
 */
export function buildArtifacts(
  snapshots: readonly PlaylistSnapshot[],
  layout: ArchiveLayout,
  retained: readonly RetainedArtifact[] = []
): ArtifactSet {
  const p = archivePaths(layout);
  const fresh = new Set(snapshots.map((s) => s.id));
  const kept = retained.filter((r) => !fresh.has(r.entry.id));

  const artifacts = new Map<string, string>();
  for (const r of kept) {
    artifacts.set(p.playlist(r.entry.id), r.content);
  }
  for (const snapshot of snapshots) {
    artifacts.set(p.playlist(snapshot.id), serializePlaylist(snapshot));
  }

  const index = buildIndex(
    snapshots,
    kept.map((r) => r.entry)
  );
  artifacts.set(p.index(), serializeIndex(index));
  return artifacts;
}

// ─── Readers ──────────────────────────────────────────────

export function parsePlaylistArtifact(content: string): PlaylistDocument | null {
  return parseWith(PlaylistDocumentSchema, content);
}

export function parseIndexArtifact(content: string): ArchiveIndex | null {
  return parseWith(IndexDocumentSchema, content);
}

function parseWith<T>(schema: z.ZodType<T>, content: string): T | null {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch {
    return null;
  }
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

/** Plain code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
