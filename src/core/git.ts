/**
 * Git-backed revision store for the archive directory.
 *
 * The head is always read from the committed tree (ls-tree / show), never
 * from the working directory, so files left behind by an interrupted run are
 * not trusted.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import { artifactFile } from "../utils/paths.js";
import { removeFile, writeText } from "../utils/yaml.js";
import { isTombstone, type RevisionStore } from "./store.js";
import type { ArtifactSet, GitConfig, GitRemoteConfig, StagedFile } from "../types.js";

const DEFAULT_BRANCH = "main";

export class GitRevisionStore implements RevisionStore {
  private constructor(
    private readonly root: string,
    private readonly git: SimpleGit,
    private readonly config: GitConfig
  ) {}

  static async open(root: string, config: GitConfig): Promise<GitRevisionStore> {
    await fs.mkdir(root, { recursive: true });
    const g = simpleGit(root);
    const store = new GitRevisionStore(root, g, config);
    await store.initRepo();
    return store;
  }

  private async initRepo(): Promise<void> {
    try {
      await fs.access(path.join(this.root, ".git"));
    } catch {
      await this.git.init();
      const branch = this.config.remote?.branch ?? DEFAULT_BRANCH;
      await this.git.raw(["symbolic-ref", "HEAD", `refs/heads/${branch}`]);
      console.error(`[git] Initialized archive repository at ${this.root}`);
    }
    await this.git.addConfig("user.name", this.config.author_name);
    await this.git.addConfig("user.email", this.config.author_email);
    await this.git.addConfig("commit.gpgsign", "false");

    if (this.config.remote && !(await this.hasHead())) {
      await this.adoptRemoteHistory(this.config.remote);
    }
  }

  /**
   * A repository without commits starts from the remote branch when it exists,
   * so later pushes fast-forward.
   */
  private async adoptRemoteHistory(remote: GitRemoteConfig): Promise<void> {
    await this.ensureRemote(remote);
    const heads = await this.git.raw(["ls-remote", "--heads", remote.name, `refs/heads/${remote.branch}`]);
    if (!heads.trim()) return;

    const tracking = `refs/remotes/${remote.name}/${remote.branch}`;
    await this.git.raw(["fetch", "--quiet", remote.name, `+refs/heads/${remote.branch}:${tracking}`]);
    await this.git.raw(["reset", "--hard", "--quiet", tracking]);
    console.error(`[git] Continuing history of ${remote.name}/${remote.branch}`);
  }

  private async ensureRemote(remote: GitRemoteConfig): Promise<void> {
    const remotes = await this.git.getRemotes(true);
    const existing = remotes.find((r) => r.name === remote.name);
    if (!existing) {
      await this.git.addRemote(remote.name, remote.url);
    } else if (existing.refs.push !== remote.url) {
      await this.git.remote(["set-url", remote.name, remote.url]);
    }
  }

  private async hasHead(): Promise<boolean> {
    try {
      await this.git.revparse(["--verify", "HEAD"]);
      return true;
    } catch {
      return false;
    }
  }

  async currentHead(): Promise<ArtifactSet> {
    const files = new Map<string, string>();
    if (!(await this.hasHead())) return files;

    const listing = await this.git.raw(["ls-tree", "-r", "--name-only", "-z", "HEAD"]);
    for (const filePath of listing.split("\0")) {
      if (!filePath) continue;
      files.set(filePath, await this.git.show([`HEAD:${filePath}`]));
    }
    return files;
  }

  async stage(files: readonly StagedFile[]): Promise<void> {
    for (const file of files) {
      const target = artifactFile(this.root, file.path);
      if (isTombstone(file)) await removeFile(target);
      else await writeText(target, file.content);
    }
    await this.git.raw(["add", "-A", "--", ...files.map((f) => f.path)]);
  }

  async commit(message: string): Promise<string> {
    const result = await this.git.commit(message);
    if (!result.commit) {
      throw new Error("git reported nothing to commit");
    }
    return (await this.git.revparse(["HEAD"])).trim();
  }

  async discardUncommitted(): Promise<void> {
    if (await this.hasHead()) {
      await this.git.raw(["reset", "--hard", "--quiet", "HEAD"]);
    } else {
      await this.git.raw(["read-tree", "--empty"]);
    }
    await this.git.raw(["clean", "-fd", "--quiet"]);
  }

  async push(): Promise<void> {
    const remote = this.config.remote;
    if (!remote) return;

    await this.ensureRemote(remote);
    await this.git.push(remote.name, `HEAD:refs/heads/${remote.branch}`);
    console.error(`[git] Pushed to ${remote.name}/${remote.branch}`);
  }
}
