import { describe, it, expect } from "vitest";
import { normalizePlaylist } from "./normalize.js";
import { MalformedRecord } from "./errors.js";
import { CAPTURED_AT, rawPlaylist, rawTrack } from "../test-fixtures.js";

describe("normalizePlaylist", () => {
  it("maps raw records to a snapshot in track order", () => {
    const snap = normalizePlaylist(
      { id: "pl1", name: "Morning", owner: { id: "user1", display_name: "Sam" } },
      [
        {
          added_at: "2025-03-01T10:00:00Z",
          added_by: { id: "user1" },
          track: {
            id: "t2",
            name: "Second",
            artists: [{ name: "A" }, { name: "B" }],
            album: { name: "LP" },
            duration_ms: 2000,
          },
        },
        rawTrack("t1"),
      ],
      CAPTURED_AT
    );

    expect(snap).toEqual({
      id: "pl1",
      name: "Morning",
      owner_id: "user1",
      owner_name: "Sam",
      captured_at: CAPTURED_AT,
      track_entries: [
        {
          track_id: "t2",
          title: "Second",
          artists: ["A", "B"],
          album: "LP",
          duration_ms: 2000,
          added_at: "2025-03-01T10:00:00Z",
          added_by: "user1",
        },
        {
          track_id: "t1",
          title: "Song t1",
          artists: ["Artist"],
          album: "Album",
          duration_ms: 1000,
          added_at: null,
          added_by: null,
        },
      ],
    });
  });

  it("represents missing optional fields as null, never empty strings", () => {
    const snap = normalizePlaylist(
      { id: "pl1", name: "Old" },
      [{ added_at: "", added_by: { id: "" }, track: { id: "t1" } }],
      CAPTURED_AT
    );

    expect(snap.owner_id).toBeNull();
    expect(snap.track_entries[0]).toEqual({
      track_id: "t1",
      title: null,
      artists: [],
      album: null,
      duration_ms: null,
      added_at: null,
      added_by: null,
    });
  });

  it("keeps duplicate tracks as separate entries", () => {
    const snap = normalizePlaylist(rawPlaylist("pl1", "Loop"), [rawTrack("t1"), rawTrack("t1")], CAPTURED_AT);
    expect(snap.track_entries.map((t) => t.track_id)).toEqual(["t1", "t1"]);
  });

  it("skips items whose track is gone from the catalogue", () => {
    const snap = normalizePlaylist(
      rawPlaylist("pl1", "Gaps"),
      [rawTrack("t1"), { added_at: "2025-01-01T00:00:00Z", track: null }, rawTrack("t3")],
      CAPTURED_AT
    );
    expect(snap.track_entries.map((t) => t.track_id)).toEqual(["t1", "t3"]);
  });

  it("drops artists without a name", () => {
    const snap = normalizePlaylist(
      rawPlaylist("pl1", "Mix"),
      [{ track: { id: "t1", artists: [{ name: "" }, { name: null }, { name: "Real" }] } }],
      CAPTURED_AT
    );
    expect(snap.track_entries[0].artists).toEqual(["Real"]);
  });

  it("rejects a playlist without id", () => {
    expect(() => normalizePlaylist({ name: "No id" }, [], CAPTURED_AT)).toThrow(MalformedRecord);
  });

  it("rejects a playlist without name and names the playlist", () => {
    try {
      normalizePlaylist({ id: "pl9" }, [], CAPTURED_AT);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecord);
      expect(err instanceof MalformedRecord && err.playlistId).toBe("pl9");
    }
  });

  it.each(["x/y", "..", "../up", "a\\b", ".", "tab\there"])("rejects the id %j, which cannot be a file name", (id) => {
    expect(() => normalizePlaylist(rawPlaylist(id, "Odd"), [], CAPTURED_AT)).toThrow(
      `Playlist id ${JSON.stringify(id)} is not usable as a file name`
    );
  });

  it("accepts ordinary service ids", () => {
    expect(normalizePlaylist(rawPlaylist("37i9dQZF1DXcBWIGoYBM5M", "Hits"), [], CAPTURED_AT).id).toBe(
      "37i9dQZF1DXcBWIGoYBM5M"
    );
  });

  it("rejects a track without id", () => {
    expect(() =>
      normalizePlaylist(rawPlaylist("pl1", "Bad"), [rawTrack("t1"), { track: { name: "Local file" } }], CAPTURED_AT)
    ).toThrow("Playlist pl1: track at position 1 has no id");
  });
});
