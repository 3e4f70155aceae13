/**
 * Core type definitions for the playlist archive.
 */

// ─── Raw records (fetch boundary) ─────────────────────────

export interface RawPlaylistOwner {
  id?: string | null;
  display_name?: string | null;
}

export interface RawPlaylist {
  id?: string | null;
  name?: string | null;
  owner?: RawPlaylistOwner | null;
}

export interface RawTrackDetails {
  id?: string | null;
  name?: string | null;
  artists?: Array<{ name?: string | null }> | null;
  album?: { name?: string | null } | null;
  duration_ms?: number | null;
}

/** One position of a playlist as the service reports it. */
export interface RawTrack {
  added_at?: string | null;
  added_by?: { id?: string | null } | null;
  track?: RawTrackDetails | null;
}

// ─── Snapshot ─────────────────────────────────────────────

export interface TrackEntry {
  track_id: string;
  title: string | null;
  artists: string[];
  album: string | null;
  duration_ms: number | null;
  added_at: string | null;
  added_by: string | null;
}

export interface PlaylistSnapshot {
  id: string;
  name: string;
  owner_id: string | null;
  owner_name: string | null;
  track_entries: TrackEntry[];
  /** Run timestamp. In memory only, never serialized. */
  captured_at: string;
}

// ─── Index ────────────────────────────────────────────────

export interface ArchiveIndexEntry {
  id: string;
  name: string;
  owner_id: string | null;
  owner_name: string | null;
  track_count: number;
  total_duration_ms: number;
}

export interface ArchiveIndex {
  playlists: ArchiveIndexEntry[];
}

// ─── Artifacts ────────────────────────────────────────────

/** Archive-relative POSIX path → serialized content. */
export type ArtifactSet = ReadonlyMap<string, string>;

export type StagedFile =
  | { path: string; content: string }
  | { path: string; tombstone: true };

export interface ArchiveLayout {
  playlists_dir: string;
  index_filename: string;
}

/** Artifact carried over verbatim from the prior head. */
export interface RetainedArtifact {
  entry: ArchiveIndexEntry;
  content: string;
}

// ─── Change-set ───────────────────────────────────────────

export type ChangeKind = "added" | "changed" | "removed";

export interface TrackRef {
  track_id: string;
  title: string | null;
  artists: string[];
}

export interface TrackDelta {
  added: TrackRef[];
  removed: TrackRef[];
  reordered: boolean;
}

export interface PlaylistChange {
  kind: ChangeKind;
  id: string;
  path: string;
  name: string;
  /** New serialized content; null for removals. */
  content: string | null;
  previous_name?: string;
  tracks?: TrackDelta;
}

export interface IndexChange {
  path: string;
  content: string;
}

export interface ChangeSet {
  /** Added, then changed, then removed; each by id. */
  changes: PlaylistChange[];
  index: IndexChange | null;
  unchanged: string[];
}

// ─── Exclusion ────────────────────────────────────────────

export interface ExclusionRules {
  exclude_owned_by_service: boolean;
  service_owner_id: string;
  exclude_ids: string[];
  exclude_names: string[];
}

export type ExclusionReason = "id" | "name" | "service_owned";

export interface ExcludedPlaylist {
  id: string;
  name: string;
  reason: ExclusionReason;
}

// ─── Config ───────────────────────────────────────────────

export interface GitRemoteConfig {
  url: string;
  name: string;
  branch: string;
}

export interface GitConfig {
  author_name: string;
  author_email: string;
  remote?: GitRemoteConfig;
}

export interface SpotifyConfig {
  api_base: string;
  access_token_env: string;
}

export interface ArchiverConfig extends ExclusionRules, ArchiveLayout {
  account: string;
  archive_dir: string;
  lock_file: string;
  fetch_concurrency: number;
  git: GitConfig;
  spotify: SpotifyConfig;
}

// ─── Run ──────────────────────────────────────────────────

export interface FailedPlaylist {
  playlist_id: string | null;
  name: string | null;
  reason: string;
}

export interface RunSummary {
  started_at: string;
  included: number;
  excluded: ExcludedPlaylist[];
  failed: FailedPlaylist[];
  retained: string[];
  changes: {
    added: number;
    changed: number;
    removed: number;
    index_changed: boolean;
  };
  revision: string | null;
  pushed: boolean;
  warnings: string[];
}
