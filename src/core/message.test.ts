import { describe, it, expect } from "vitest";
import { buildCommitMessage, formatRunSummary, summaryLine, trackLabel } from "./message.js";
import type { ChangeSet, RunSummary } from "../types.js";

const changeSet: ChangeSet = {
  changes: [
    { kind: "added", id: "c", path: "playlists/c.yaml", name: "Road Trip", content: "x" },
    {
      kind: "changed",
      id: "a",
      path: "playlists/a.yaml",
      name: "Morning Mix",
      previous_name: "Morning",
      content: "y",
      tracks: {
        added: [{ track_id: "t9", title: "New Song", artists: ["Band", "Guest"] }],
        removed: [{ track_id: "t1", title: null, artists: [] }],
        reordered: false,
      },
    },
    {
      kind: "changed",
      id: "b",
      path: "playlists/b.yaml",
      name: "Focus",
      content: "z",
      tracks: { added: [], removed: [], reordered: true },
    },
    { kind: "removed", id: "d", path: "playlists/d.yaml", name: "Gym", content: null },
  ],
  index: { path: "playlists_index.yaml", content: "i" },
  unchanged: [],
};

describe("trackLabel", () => {
  it("joins artists and falls back for missing fields", () => {
    expect(trackLabel({ track_id: "t1", title: "Song", artists: ["A", "B"] })).toBe("Song by A, B");
    expect(trackLabel({ track_id: "t1", title: null, artists: [] })).toBe("t1 by Unknown Artist");
  });
});

describe("buildCommitMessage", () => {
  it("summarizes counts on the first line", () => {
    expect(summaryLine(changeSet)).toBe("Archive update: 1 added, 2 changed, 1 removed");
  });

  it("lists every change in a fixed layout", () => {
    expect(buildCommitMessage(changeSet)).toBe(
      [
        "Archive update: 1 added, 2 changed, 1 removed",
        "",
        "Added playlists:",
        "  + Road Trip (c)",
        "",
        "Changed playlists:",
        "  ~ Morning → Morning Mix (a)",
        "      + New Song by Band, Guest",
        "      - t1 by Unknown Artist",
        "  ~ Focus (b)",
        "      * tracks reordered",
        "",
        "Removed playlists:",
        "  - Gym (d)",
        "",
        "Index updated.",
        "",
      ].join("\n")
    );
  });

  it("describes an index-only change", () => {
    const message = buildCommitMessage({
      changes: [],
      index: { path: "playlists_index.yaml", content: "i" },
      unchanged: ["a"],
    });
    expect(message).toBe("Archive update: 0 added, 0 changed, 0 removed\n\nIndex updated.\n");
  });

  it("notes detail-only changes", () => {
    const message = buildCommitMessage({
      changes: [
        {
          kind: "changed",
          id: "a",
          path: "playlists/a.yaml",
          name: "Ay",
          content: "y",
          tracks: { added: [], removed: [], reordered: false },
        },
      ],
      index: null,
      unchanged: [],
    });
    expect(message).toBe(
      "Archive update: 0 added, 1 changed, 0 removed\n\nChanged playlists:\n  ~ Ay (a)\n      * track details updated\n"
    );
  });
});

describe("formatRunSummary", () => {
  const base: RunSummary = {
    started_at: "2026-01-05T08:00:00.000Z",
    included: 3,
    excluded: [{ id: "s", name: "Daily Mix", reason: "service_owned" }],
    failed: [],
    retained: [],
    changes: { added: 1, changed: 0, removed: 0, index_changed: true },
    revision: "abc123",
    pushed: false,
    warnings: [],
  };

  it("reports counts and the new revision", () => {
    expect(formatRunSummary(base)).toBe(
      [
        "Playlists: 3 included, 1 excluded, 0 failed",
        "Changes: 1 added, 0 changed, 0 removed, index updated",
        "Revision: abc123",
      ].join("\n")
    );
  });

  it("reports a no-op run and failures", () => {
    const text = formatRunSummary({
      ...base,
      failed: [{ playlist_id: "f", name: "Broken", reason: "HTTP 500" }],
      retained: ["f"],
      changes: { added: 0, changed: 0, removed: 0, index_changed: false },
      revision: null,
      warnings: ["Could not archive Broken: HTTP 500"],
    });
    expect(text.split("\n")).toEqual([
      "Playlists: 3 included, 1 excluded, 1 failed",
      "Changes: 0 added, 0 changed, 0 removed",
      "Revision: none (archive unchanged)",
      "Kept previous version of: f",
      "Failed: Broken: HTTP 500",
      "Warning: Could not archive Broken: HTTP 500",
    ]);
  });
});
