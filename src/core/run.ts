/**
 * One archive run: lock → discard leftovers → fetch (skipping excluded
 * listings) → filter → build → diff → commit → push → unlock.
 *
 * Stages hand values to each other; nothing is shared or mutated between
 * them. Fatal errors propagate with the archive still at its pre-run head.
 */

import { archivePaths } from "../utils/paths.js";
import { isoNow } from "../utils/time.js";
import { commitChangeSet } from "./archive.js";
import { countChanges, diffArtifacts } from "./diff.js";
import { applyExclusions, matchExclusion } from "./exclusion.js";
import { collectPlaylists, type FetchSource } from "./fetch.js";
import { withLock, type LockOptions } from "./lock.js";
import { buildArtifacts, parseIndexArtifact } from "./snapshot.js";
import type { RevisionStore } from "./store.js";
import type {
  ArchiverConfig,
  ArtifactSet,
  FailedPlaylist,
  RetainedArtifact,
  RunSummary,
} from "../types.js";

export interface RunDeps {
  source: FetchSource;
  /** A store, or a factory opened once the lock is held. */
  store: RevisionStore | (() => Promise<RevisionStore>);
  now?: () => string;
  lock?: LockOptions;
}

export async function runArchive(config: ArchiverConfig, deps: RunDeps): Promise<RunSummary> {
  return withLock(config.lock_file, () => runLocked(config, deps), deps.lock);
}

async function runLocked(config: ArchiverConfig, deps: RunDeps): Promise<RunSummary> {
  const startedAt = (deps.now ?? isoNow)();
  const store = typeof deps.store === "function" ? await deps.store() : deps.store;

  await store.discardUncommitted();

  const collected = await collectPlaylists(deps.source, config.account, {
    concurrency: config.fetch_concurrency,
    capturedAt: startedAt,
    rules: config,
  });
  const filtered = applyExclusions(collected.playlists, config);
  const included = filtered.included;
  const excluded = [...collected.excluded, ...filtered.excluded];

  const prior = await store.currentHead();
  const retained = retainFailed(collected.failed, prior, config);

  const next = buildArtifacts(included, config, retained);
  const changeSet = diffArtifacts({ next, prior, layout: config });
  const committed = await commitChangeSet(store, changeSet);

  const warnings = collected.failed.map(
    (f) => `Could not archive ${f.name ?? f.playlist_id ?? "a playlist"}: ${f.reason}`
  );

  // Every run with a head pushes, so a revision whose push failed earlier
  // goes out with the next run even when that run changes nothing.
  let pushed = false;
  const hasHead = committed.revision !== null || prior.size > 0;
  if (hasHead && store.push && config.git.remote) {
    try {
      await store.push();
      pushed = true;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[playlist-archive] push failed: ${reason}`);
      warnings.push(`Push failed, revision kept locally: ${reason}`);
    }
  }

  const counts = countChanges(changeSet);
  if (committed.revision) {
    console.error(
      `[playlist-archive] Committed ${committed.revision}: ${counts.added} added, ${counts.changed} changed, ${counts.removed} removed`
    );
  } else {
    console.error("[playlist-archive] No changes to commit");
  }

  return {
    started_at: startedAt,
    included: included.length,
    excluded,
    failed: collected.failed,
    retained: retained.map((r) => r.entry.id).sort(),
    changes: { ...counts, index_changed: changeSet.index !== null },
    revision: committed.revision,
    pushed,
    warnings,
  };
}

/**
 * Playlists that failed this run keep their last archived version, as long
 * as the current exclusion rules still admit them.
 */
function retainFailed(
  failed: readonly FailedPlaylist[],
  prior: ArtifactSet,
  config: ArchiverConfig
): RetainedArtifact[] {
  const p = archivePaths(config);
  const indexContent = prior.get(p.index());
  const priorIndex = indexContent === undefined ? null : parseIndexArtifact(indexContent);
  if (!priorIndex) return [];

  const retained: RetainedArtifact[] = [];
  for (const failure of failed) {
    if (failure.playlist_id === null) continue;
    const entry = priorIndex.playlists.find((e) => e.id === failure.playlist_id);
    const content = prior.get(p.playlist(failure.playlist_id));
    if (!entry || content === undefined) continue;
    if (matchExclusion(entry, config)) continue;
    retained.push({ entry, content });
  }
  return retained;
}
