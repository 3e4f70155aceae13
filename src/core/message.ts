/**
 * Human-readable text for commits and run reports.
 * Commit messages depend only on the change-set, never on the clock.
 */

import { countChanges } from "./diff.js";
import type { ChangeSet, PlaylistChange, RunSummary, TrackRef } from "../types.js";

export function trackLabel(track: TrackRef): string {
  const artists = track.artists.length > 0 ? track.artists.join(", ") : "Unknown Artist";
  return `${track.title ?? track.track_id} by ${artists}`;
}

export function summaryLine(changeSet: ChangeSet): string {
  const counts = countChanges(changeSet);
  return `Archive update: ${counts.added} added, ${counts.changed} changed, ${counts.removed} removed`;
}

export function buildCommitMessage(changeSet: ChangeSet): string {
  const lines: string[] = [summaryLine(changeSet)];

  const section = (title: string, changes: PlaylistChange[], render: (c: PlaylistChange) => string[]) => {
    if (changes.length === 0) return;
    lines.push("", `${title}:`);
    for (const change of changes) lines.push(...render(change));
  };

  section(
    "Added playlists",
    changeSet.changes.filter((c) => c.kind === "added"),
    (c) => [`  + ${c.name} (${c.id})`]
  );
  section(
    "Changed playlists",
    changeSet.changes.filter((c) => c.kind === "changed"),
    describeChanged
  );
  section(
    "Removed playlists",
    changeSet.changes.filter((c) => c.kind === "removed"),
    (c) => [`  - ${c.name} (${c.id})`]
  );

  if (changeSet.index) {
    lines.push("", "Index updated.");
  }

  return `${lines.join("\n")}\n`;
}

function describeChanged(change: PlaylistChange): string[] {
  const title = change.previous_name
    ? `${change.previous_name} → ${change.name}`
    : change.name;
  const lines = [`  ~ ${title} (${change.id})`];

  const delta = change.tracks;
  if (!delta) return lines;

  for (const track of delta.added) lines.push(`      + ${trackLabel(track)}`);
  for (const track of delta.removed) lines.push(`      - ${trackLabel(track)}`);
  if (delta.reordered) lines.push("      * tracks reordered");
  if (delta.added.length === 0 && delta.removed.length === 0 && !delta.reordered && !change.previous_name) {
    lines.push("      * track details updated");
  }
  return lines;
}

export function formatRunSummary(summary: RunSummary): string {
  const { changes } = summary;
  const lines = [
    `Playlists: ${summary.included} included, ${summary.excluded.length} excluded, ${summary.failed.length} failed`,
    `Changes: ${changes.added} added, ${changes.changed} changed, ${changes.removed} removed${changes.index_changed ? ", index updated" : ""}`,
    summary.revision ? `Revision: ${summary.revision}${summary.pushed ? " (pushed)" : ""}` : "Revision: none (archive unchanged)",
  ];

  if (summary.retained.length > 0) {
    lines.push(`Kept previous version of: ${summary.retained.join(", ")}`);
  }
  for (const failure of summary.failed) {
    lines.push(`Failed: ${failure.name ?? failure.playlist_id ?? "(unknown playlist)"}: ${failure.reason}`);
  }
  for (const warning of summary.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  return lines.join("\n");
}
