/**
 * Configuration loading for playlist-archive.
 * Reads a YAML file, validates it with zod and resolves relative paths
 * against the file's own directory.
 *
 * CONFIG_REFERENCE documents every key: default, meaning, where it is used.
 */

import path from "node:path";
import { z } from "zod";
import { readYaml } from "../utils/yaml.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_API_BASE } from "./spotify.js";
import type { ArchiverConfig } from "../types.js";

export const DEFAULT_CONFIG_FILE = "playlist-archive.yaml";

// ─── Centralized Configuration Reference ─────────────────

export interface ConfigParamInfo {
  path: string;
  default_value: unknown;
  type: string;
  description: string;
  code_ref: string;
}

export const CONFIG_REFERENCE: ConfigParamInfo[] = [
  {
    path: "account",
    default_value: "me",
    type: "string",
    description: "Account whose playlists are archived. 'me' means the token's own account",
    code_ref: "src/core/spotify.ts → listPlaylists()",
  },
  {
    path: "archive_dir",
    default_value: null,
    type: "string (path)",
    description: "Git working tree holding the archive. Created and initialized on first run",
    code_ref: "src/core/git.ts → GitRevisionStore.open()",
  },
  {
    path: "playlists_dir",
    default_value: "playlists",
    type: "string",
    description: "Directory inside archive_dir with one <playlist_id>.yaml per playlist",
    code_ref: "src/utils/paths.ts → archivePaths()",
  },
  {
    path: "index_filename",
    default_value: "playlists_index.yaml",
    type: "string",
    description: "Index file (id, name, owner, track count per playlist) inside archive_dir",
    code_ref: "src/utils/paths.ts → archivePaths()",
  },
  {
    path: "exclude_owned_by_service",
    default_value: true,
    type: "boolean",
    description: "Skip playlists owned by the service itself (editorial and generated mixes)",
    code_ref: "src/core/exclusion.ts → matchExclusion()",
  },
  {
    path: "service_owner_id",
    default_value: "spotify",
    type: "string",
    description: "Owner id that marks a playlist as service-owned",
    code_ref: "src/core/exclusion.ts → matchExclusion()",
  },
  {
    path: "exclude_ids",
    default_value: [],
    type: "string[]",
    description: "Playlist ids never archived (exact, case-sensitive)",
    code_ref: "src/core/exclusion.ts → matchExclusion()",
  },
  {
    path: "exclude_names",
    default_value: [],
    type: "string[]",
    description: "Playlist names never archived (exact match)",
    code_ref: "src/core/exclusion.ts → matchExclusion()",
  },
  {
    path: "fetch_concurrency",
    default_value: 4,
    type: "number (1-32)",
    description: "How many playlists have their tracks fetched at the same time",
    code_ref: "src/core/fetch.ts → collectPlaylists()",
  },
  {
    path: "lock_file",
    default_value: "<archive_dir>.lock",
    type: "string (path)",
    description: "Lock file guarding the archive against concurrent runs",
    code_ref: "src/core/lock.ts → acquireLock()",
  },
  {
    path: "git.author_name",
    default_value: "playlist-archive",
    type: "string",
    description: "Author name recorded on archive commits",
    code_ref: "src/core/git.ts → initRepo()",
  },
  {
    path: "git.author_email",
    default_value: "playlist-archive@localhost",
    type: "string",
    description: "Author email recorded on archive commits",
    code_ref: "src/core/git.ts → initRepo()",
  },
  {
    path: "git.remote",
    default_value: null,
    type: "{ url, name?, branch? } | null",
    description: "Remote pushed to after each new revision. name defaults to 'origin', branch to 'main'",
    code_ref: "src/core/git.ts → push()",
  },
  {
    path: "spotify.api_base",
    default_value: DEFAULT_API_BASE,
    type: "string (URL)",
    description: "Base URL of the Web API",
    code_ref: "src/core/spotify.ts → SpotifyFetchSource",
  },
  {
    path: "spotify.access_token_env",
    default_value: "SPOTIFY_ACCESS_TOKEN",
    type: "string",
    description: "Environment variable holding the OAuth access token",
    code_ref: "src/index.ts → main()",
  },
];

/**
 * Format CONFIG_REFERENCE as readable text.
 */
export function formatConfigReference(): string {
  const lines: string[] = ["# Configuration Reference", ""];
  for (const p of CONFIG_REFERENCE) {
    const defStr = Array.isArray(p.default_value)
      ? `[${p.default_value.join(", ")}]`
      : String(p.default_value);
    lines.push(`${p.path}`);
    lines.push(`  Type: ${p.type}`);
    lines.push(`  Default: ${defStr}`);
    lines.push(`  ${p.description}`);
    lines.push(`  Code: ${p.code_ref}`);
    lines.push("");
  }
  return lines.join("\n");
}

// ─── Schema ───────────────────────────────────────────────

const ConfigSchema = z.object({
  account: z.string().min(1).default("me"),
  archive_dir: z.string().min(1),
  playlists_dir: z.string().min(1).default("playlists"),
  index_filename: z.string().min(1).default("playlists_index.yaml"),
  exclude_owned_by_service: z.boolean().default(true),
  service_owner_id: z.string().min(1).default("spotify"),
  exclude_ids: z.array(z.string()).default([]),
  exclude_names: z.array(z.string()).default([]),
  fetch_concurrency: z.number().int().min(1).max(32).default(4),
  lock_file: z.string().min(1).optional(),
  git: z
    .object({
      author_name: z.string().min(1).default("playlist-archive"),
      author_email: z.string().min(1).default("playlist-archive@localhost"),
      remote: z
        .object({
          url: z.string().min(1),
          name: z.string().min(1).default("origin"),
          branch: z.string().min(1).default("main"),
        })
        .nullish(),
    })
    .default({}),
  spotify: z
    .object({
      api_base: z.string().url().default(DEFAULT_API_BASE),
      access_token_env: z.string().min(1).default("SPOTIFY_ACCESS_TOKEN"),
    })
    .default({}),
});

/**
 * Validate raw config data. Relative paths resolve against baseDir.
 */
export function parseConfig(data: unknown, baseDir: string): ArchiverConfig {
  const result = ConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const cfg = result.data;
  if (path.isAbsolute(cfg.playlists_dir) || cfg.playlists_dir.split(/[\\/]/).includes("..")) {
    throw new ConfigError("Invalid configuration: playlists_dir must stay inside archive_dir");
  }
  if (path.isAbsolute(cfg.index_filename) || cfg.index_filename.split(/[\\/]/).includes("..")) {
    throw new ConfigError("Invalid configuration: index_filename must stay inside archive_dir");
  }

  const archiveDir = path.resolve(baseDir, cfg.archive_dir);
  const { remote, ...git } = cfg.git;

  return {
    account: cfg.account,
    archive_dir: archiveDir,
    playlists_dir: cfg.playlists_dir,
    index_filename: cfg.index_filename,
    exclude_owned_by_service: cfg.exclude_owned_by_service,
    service_owner_id: cfg.service_owner_id,
    exclude_ids: cfg.exclude_ids,
    exclude_names: cfg.exclude_names,
    fetch_concurrency: cfg.fetch_concurrency,
    lock_file: cfg.lock_file ? path.resolve(baseDir, cfg.lock_file) : `${archiveDir}.lock`,
    git: remote ? { ...git, remote } : git,
    spotify: cfg.spotify,
  };
}

export async function loadConfig(filePath: string): Promise<ArchiverConfig> {
  let data: unknown;
  try {
    data = await readYaml(filePath);
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}`, { cause: err });
  }
  if (data === null) {
    throw new ConfigError(`Config not found: ${filePath}`);
  }
  return parseConfig(data, path.dirname(filePath));
}
