/**
 * Archive Writer / Revision Committer.
 *
 * Turns a change-set into staged writes and tombstones and commits them as
 * exactly one revision. An empty change-set touches nothing.
 */

import { CommitFailed } from "./errors.js";
import { isEmpty } from "./diff.js";
import { buildCommitMessage } from "./message.js";
import type { RevisionStore } from "./store.js";
import type { ChangeSet, StagedFile } from "../types.js";

export interface CommitResult {
  revision: string | null;
  message: string | null;
  files: StagedFile[];
}

export function stagedFiles(changeSet: ChangeSet): StagedFile[] {
  const files: StagedFile[] = [];
  for (const change of changeSet.changes) {
    if (change.content === null) {
      files.push({ path: change.path, tombstone: true });
    } else {
      files.push({ path: change.path, content: change.content });
    }
  }
  if (changeSet.index) {
    files.push({ path: changeSet.index.path, content: changeSet.index.content });
  }
  return files;
}

export async function commitChangeSet(
  store: RevisionStore,
  changeSet: ChangeSet
): Promise<CommitResult> {
  if (isEmpty(changeSet)) {
    return { revision: null, message: null, files: [] };
  }

  const files = stagedFiles(changeSet);
  const message = buildCommitMessage(changeSet);

  try {
    await store.stage(files);
    const revision = await store.commit(message);
    return { revision, message, files };
  } catch (err) {
    try {
      await store.discardUncommitted();
    } catch (discardErr) {
      console.error("[archive] could not discard uncommitted changes:", discardErr);
    }
    throw new CommitFailed(`Failed to commit ${files.length} file(s)`, { cause: err });
  }
}
