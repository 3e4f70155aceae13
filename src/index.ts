#!/usr/bin/env node

/**
 * playlist-archive CLI entry point.
 *
 * Usage: playlist-archive [config.yaml]
 * Exit codes: 0 success or no-op, 1 config/unexpected, 2 AuthError,
 * 3 RateLimited, 4 ArchiveBusy, 5 CommitFailed.
 */

import path from "node:path";
import { DEFAULT_CONFIG_FILE, formatConfigReference, loadConfig } from "./core/config.js";
import { AuthError, describeError, exitCodeFor } from "./core/errors.js";
import { GitRevisionStore } from "./core/git.js";
import { formatRunSummary } from "./core/message.js";
import { runArchive } from "./core/run.js";
import { SpotifyFetchSource } from "./core/spotify.js";

const USAGE = `Usage: playlist-archive [config.yaml]

Captures every playlist of the configured account and commits a new archive
revision when anything changed. Defaults to ./${DEFAULT_CONFIG_FILE}.
`;

async function main(argv: string[]): Promise<number> {
  const arg = argv[0];
  if (arg === "--help" || arg === "-h") {
    console.log(USAGE);
    console.log(formatConfigReference());
    return 0;
  }

  const config = await loadConfig(path.resolve(arg ?? DEFAULT_CONFIG_FILE));

  const token = process.env[config.spotify.access_token_env];
  if (!token) {
    throw new AuthError(`No access token: set ${config.spotify.access_token_env}`);
  }

  const source = new SpotifyFetchSource({
    accessToken: token,
    apiBase: config.spotify.api_base,
  });

  const summary = await runArchive(config, {
    source,
    store: () => GitRevisionStore.open(config.archive_dir, config.git),
  });
  console.log(formatRunSummary(summary));
  return 0;
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(`[playlist-archive] ${describeError(err)}`);
    process.exit(exitCodeFor(err));
  });
