/**
 * Archive layout resolution.
 * Artifact paths are archive-relative and always use "/" separators.
 */

import path from "node:path";
import type { ArchiveLayout } from "../types.js";

export const PLAYLIST_EXTENSION = ".yaml";

export function archivePaths(layout: ArchiveLayout) {
  const playlistsPrefix = `${trimSlashes(layout.playlists_dir)}/`;

  return {
    index: () => trimSlashes(layout.index_filename),
    playlist: (id: string) => `${playlistsPrefix}${id}${PLAYLIST_EXTENSION}`,

    /** Playlist id for a playlist artifact path, or null for anything else. */
    playlistId: (artifactPath: string): string | null => {
      if (!artifactPath.startsWith(playlistsPrefix)) return null;
      if (!artifactPath.endsWith(PLAYLIST_EXTENSION)) return null;
      const id = artifactPath.slice(
        playlistsPrefix.length,
        artifactPath.length - PLAYLIST_EXTENSION.length
      );
      return id.length > 0 && !id.includes("/") ? id : null;
    },
  };
}

/** Absolute filesystem path of an artifact inside the archive directory. */
export function artifactFile(archiveDir: string, artifactPath: string): string {
  return path.join(archiveDir, ...artifactPath.split("/"));
}

function trimSlashes(value: string): string {
  return value.replace(/\\/g, "/").replace(/^\/+|\/+$/g, "");
}
