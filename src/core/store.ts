/**
 * Revision store contract.
 *
 * commit() is the only atomicity boundary: staged files become part of the
 * archive's history only once it resolves.
 */

import type { ArtifactSet, StagedFile } from "../types.js";

export interface RevisionStore {
  /** Artifacts as committed at the current head; empty before the first commit. */
  currentHead(): Promise<ArtifactSet>;
  stage(files: readonly StagedFile[]): Promise<void>;
  commit(message: string): Promise<string>;
  /** Drops staged or written-but-uncommitted changes, restoring the head. */
  discardUncommitted(): Promise<void>;
  /** Publishes committed revisions, where the store has somewhere to publish to. */
  push?(): Promise<void>;
}

export function isTombstone(file: StagedFile): file is { path: string; tombstone: true } {
  return "tombstone" in file;
}

export interface StoredRevision {
  id: string;
  message: string;
  files: ArtifactSet;
}

/**
 * In-process store keeping every revision in memory.
 */
export class MemoryRevisionStore implements RevisionStore {
  readonly revisions: StoredRevision[] = [];
  stageCalls = 0;
  private head: Map<string, string>;
  private pending: StagedFile[] = [];

  constructor(initial: ArtifactSet = new Map()) {
    this.head = new Map(initial);
  }

  async currentHead(): Promise<ArtifactSet> {
    return new Map(this.head);
  }

  async stage(files: readonly StagedFile[]): Promise<void> {
    this.stageCalls++;
    this.pending.push(...files);
  }

  async commit(message: string): Promise<string> {
    if (this.pending.length === 0) {
      throw new Error("Nothing staged to commit");
    }
    const files = new Map(this.head);
    for (const file of this.pending) {
      if (isTombstone(file)) files.delete(file.path);
      else files.set(file.path, file.content);
    }

    const id = `rev-${this.revisions.length + 1}`;
    this.revisions.push({ id, message, files });
    this.head = files;
    this.pending = [];
    return id;
  }

  async discardUncommitted(): Promise<void> {
    this.pending = [];
  }

  get pendingCount(): number {
    return this.pending.length;
  }
}
