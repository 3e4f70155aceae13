/**
 * End-to-end runs against real git repositories:
 * first run → no-op run → change → removal → interrupted run cleanup,
 * then a second working copy continuing a remote's history.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { GitRevisionStore } from "./core/git.js";
import { runArchive } from "./core/run.js";
import { CAPTURED_AT, FakeSource, fakePlaylist, tempDir, testConfig } from "./test-fixtures.js";
import type { FakePlaylist } from "./test-fixtures.js";
import type { ArchiverConfig } from "./types.js";

async function revisionCount(repoDir: string, ref = "HEAD"): Promise<number> {
  const count = await simpleGit(repoDir).raw(["rev-list", "--count", ref]);
  return Number.parseInt(count.trim(), 10);
}

function runWith(config: ArchiverConfig, playlists: FakePlaylist[]) {
  return runArchive(config, {
    source: new FakeSource(playlists),
    store: () => GitRevisionStore.open(config.archive_dir, config.git),
    now: () => CAPTURED_AT,
  });
}

beforeAll(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterAll(() => {
  vi.restoreAllMocks();
});

describe("archive in a git repository", () => {
  let config: ArchiverConfig;

  const run = (playlists: FakePlaylist[]) => runWith(config, playlists);
  const head = async () => (await GitRevisionStore.open(config.archive_dir, config.git)).currentHead();

  beforeAll(async () => {
    config = testConfig(await tempDir());
  });

  it("initializes the repository and commits the first snapshot", async () => {
    const summary = await run([fakePlaylist("a", "Ay", 2), fakePlaylist("b", "Mix", 1, "spotify")]);

    expect(summary.revision).toMatch(/^[0-9a-f]{40}$/);
    expect(summary.changes).toEqual({ added: 1, changed: 0, removed: 0, index_changed: true });
    expect(await revisionCount(config.archive_dir)).toBe(1);

    const files = await head();
    expect([...files.keys()].sort()).toEqual(["playlists/a.yaml", "playlists_index.yaml"]);
    const onDisk = await fs.readFile(path.join(config.archive_dir, "playlists", "a.yaml"), "utf-8");
    expect(onDisk).toBe(files.get("playlists/a.yaml"));
  });

  it("makes no commit when the account is unchanged", async () => {
    const summary = await run([fakePlaylist("a", "Ay", 2), fakePlaylist("b", "Mix", 1, "spotify")]);

    expect(summary.revision).toBeNull();
    expect(await revisionCount(config.archive_dir)).toBe(1);
  });

  it("commits changes with a descriptive message", async () => {
    const summary = await run([fakePlaylist("a", "Ay", 3), fakePlaylist("c", "Sea", 1)]);

    expect(summary.changes).toEqual({ added: 1, changed: 1, removed: 0, index_changed: true });
    const message = await simpleGit(config.archive_dir).raw(["log", "-1", "--format=%B"]);
    expect(message.split("\n").slice(0, 9)).toEqual([
      "Archive update: 1 added, 1 changed, 0 removed",
      "",
      "Added playlists:",
      "  + Sea (c)",
      "",
      "Changed playlists:",
      "  ~ Ay (a)",
      "      + Song a-t3 by Artist",
      "",
    ]);
  });

  it("throws away files left behind by an interrupted run", async () => {
    await fs.writeFile(path.join(config.archive_dir, "playlists", "stray.yaml"), "id: stray\n");
    await fs.writeFile(path.join(config.archive_dir, "playlists", "a.yaml"), "half written");

    const summary = await run([fakePlaylist("a", "Ay", 3), fakePlaylist("c", "Sea", 1)]);

    expect(summary.revision).toBeNull();
    await expect(fs.access(path.join(config.archive_dir, "playlists", "stray.yaml"))).rejects.toThrow();
    const restored = await fs.readFile(path.join(config.archive_dir, "playlists", "a.yaml"), "utf-8");
    expect(restored).toContain("track_count: 3\n");
  });

  it("deletes the file of a removed playlist", async () => {
    const summary = await run([fakePlaylist("c", "Sea", 1)]);

    expect(summary.changes.removed).toBe(1);
    await expect(fs.access(path.join(config.archive_dir, "playlists", "a.yaml"))).rejects.toThrow();
    expect([...(await head()).keys()].sort()).toEqual(["playlists/c.yaml", "playlists_index.yaml"]);
    expect(await revisionCount(config.archive_dir)).toBe(3);
  });
});

describe("archive with a remote", () => {
  let remoteDir: string;
  let first: ArchiverConfig;
  let second: ArchiverConfig;

  beforeAll(async () => {
    const root = await tempDir();
    remoteDir = path.join(root, "remote.git");
    await fs.mkdir(remoteDir);
    await simpleGit(remoteDir).init(true);

    const remote = { url: remoteDir, name: "origin", branch: "main" };
    first = testConfig(path.join(root, "one"));
    first = { ...first, git: { ...first.git, remote } };
    second = testConfig(path.join(root, "two"));
    second = { ...second, git: { ...second.git, remote } };
    await fs.mkdir(path.join(root, "one"));
    await fs.mkdir(path.join(root, "two"));
  });

  it("pushes the first revision to an empty remote", async () => {
    const summary = await runWith(first, [fakePlaylist("a", "Ay", 2)]);

    expect(summary.pushed).toBe(true);
    expect(await revisionCount(remoteDir, "refs/heads/main")).toBe(1);
  });

  it("continues the remote's history from a fresh working copy", async () => {
    const unchanged = await runWith(second, [fakePlaylist("a", "Ay", 2)]);

    expect(unchanged.revision).toBeNull();
    expect(unchanged.pushed).toBe(true);

    const changed = await runWith(second, [fakePlaylist("a", "Ay", 2), fakePlaylist("c", "Sea", 1)]);

    expect(changed.pushed).toBe(true);
    expect(changed.warnings).toEqual([]);
    expect(await revisionCount(remoteDir, "refs/heads/main")).toBe(2);
    expect(await revisionCount(second.archive_dir)).toBe(2);
  });
});
