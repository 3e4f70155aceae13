/**
 * Spotify Web API fetch source.
 *
 * Read-only: lists an account's playlists and each playlist's items, following
 * the `next` links. Responses are validated with zod before they reach the
 * normalizer. The access token is supplied by the caller; refreshing it is
 * out of scope.
 */

import { z } from "zod";
import { AuthError, RateLimited } from "./errors.js";
import type { FetchSource } from "./fetch.js";
import type { RawPlaylist, RawTrack } from "../types.js";

export const DEFAULT_API_BASE = "https://api.spotify.com/v1";

const PlaylistItemSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  owner: z
    .object({
      id: z.string().nullish(),
      display_name: z.string().nullish(),
    })
    .nullish(),
});

const TrackItemSchema = z.object({
  added_at: z.string().nullish(),
  added_by: z.object({ id: z.string().nullish() }).nullish(),
  track: z
    .object({
      id: z.string().nullish(),
      name: z.string().nullish(),
      artists: z.array(z.object({ name: z.string().nullish() })).nullish(),
      album: z.object({ name: z.string().nullish() }).nullish(),
      duration_ms: z.number().nullish(),
    })
    .nullish(),
});

const PlaylistPageSchema = z.object({
  items: z.array(PlaylistItemSchema.nullable()),
  next: z.string().nullish(),
});

const TrackPageSchema = z.object({
  items: z.array(TrackItemSchema.nullable()),
  next: z.string().nullish(),
});

export interface SpotifyFetchOptions {
  accessToken: string;
  apiBase?: string;
  fetchImpl?: typeof fetch;
}

export class SpotifyFetchSource implements FetchSource {
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SpotifyFetchOptions) {
    this.apiBase = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async listPlaylists(account: string): Promise<RawPlaylist[]> {
    const first =
      account === "me"
        ? `${this.apiBase}/me/playlists?limit=50`
        : `${this.apiBase}/users/${encodeURIComponent(account)}/playlists?limit=50`;

    const playlists: RawPlaylist[] = [];
    let url: string | null = first;
    while (url) {
      const page = PlaylistPageSchema.safeParse(await this.request(url));
      if (!page.success) {
        throw new Error(`Unexpected playlist listing from ${url}: ${page.error.message}`);
      }
      for (const item of page.data.items) {
        if (item) playlists.push(item);
      }
      url = page.data.next ?? null;
    }
    return playlists;
  }

  async listTracks(playlistId: string): Promise<RawTrack[]> {
    const tracks: RawTrack[] = [];
    let url: string | null = `${this.apiBase}/playlists/${encodeURIComponent(playlistId)}/tracks?limit=100`;
    while (url) {
      const page = TrackPageSchema.safeParse(await this.request(url));
      if (!page.success) {
        throw new Error(`Unexpected track listing for ${playlistId}: ${page.error.message}`);
      }
      for (const item of page.data.items) {
        if (item) tracks.push(item);
      }
      url = page.data.next ?? null;
    }
    return tracks;
  }

  private async request(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { Authorization: `Bearer ${this.options.accessToken}` },
    });

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Spotify rejected the access token (HTTP ${response.status})`);
    }
    if (response.status === 429) {
      const retryAfter = Number.parseInt(response.headers.get("retry-after") ?? "", 10);
      throw new RateLimited(
        "Spotify rate limit reached",
        Number.isFinite(retryAfter) ? retryAfter : null
      );
    }
    if (!response.ok) {
      throw new Error(`Spotify API request failed: HTTP ${response.status} for ${url}`);
    }
    return response.json();
  }
}
