import { AuthenticationError, UpstreamApiError } from "./errors";
import { describeFetchFailure, fetchWithTimeout, isRecord, parseJson } from "./http";
import { logger } from "./logger";
import type { SpotifyUser, TrackRecord, UserCredentials } from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com";
const SPOTIFY_TRACK_URL_BASE = "https://open.spotify.com/track";
const REFRESH_TOKEN_PLACEHOLDER = "SPOTIFY_REFRESH_TOKEN";
const CLIENT_ID_PLACEHOLDER = "SPOTIFY_CLIENT_ID";
const CLIENT_SECRET_PLACEHOLDER = "SPOTIFY_CLIENT_SECRET";

export const MAX_RECENT_TRACKS = 50;
export const AUTH_SCOPES = ["user-read-recently-played", "user-read-private"];

function buildErrorMessage(subject: string, status: number, bodyText: string): string {
  const prefix = `${subject} failed with status ${status}`;
  const parsed = parseJson(bodyText);

  if (isRecord(parsed)) {
    // Accounts service: { error: "invalid_grant", error_description: "..." }
    if (typeof parsed.error === "string") {
      const description = typeof parsed.error_description === "string" ? `: ${parsed.error_description}` : "";
      return `${prefix}: ${parsed.error}${description}`;
    }

    // Web API: { error: { status, message } }
    if (isRecord(parsed.error) && typeof parsed.error.message === "string") {
      return `${prefix}: ${parsed.error.message}`;
    }

    if (typeof parsed.message === "string") {
      return `${prefix}: ${parsed.message}`;
    }
  }

  return bodyText ? `${prefix}: ${bodyText}` : prefix;
}

/** Credential fields still holding the example file's placeholder values. */
export function findPlaceholderClientCredentials(user: UserCredentials): Array<"client_id" | "client_secret"> {
  const placeholders: Array<"client_id" | "client_secret"> = [];

  if (user.client_id.startsWith(CLIENT_ID_PLACEHOLDER)) {
    placeholders.push("client_id");
  }

  if (user.client_secret.startsWith(CLIENT_SECRET_PLACEHOLDER)) {
    placeholders.push("client_secret");
  }

  return placeholders;
}

export function clampTrackLimit(limit: number): number {
  if (!Number.isFinite(limit)) {
    return MAX_RECENT_TRACKS;
  }

  return Math.min(MAX_RECENT_TRACKS, Math.max(1, Math.trunc(limit)));
}

export function buildAuthorizeUrl(params: { clientId: string; redirectUri: string; state: string }): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    scope: AUTH_SCOPES.join(" "),
    state: params.state,
    show_dialog: "true"
  });

  return `${SPOTIFY_ACCOUNTS_BASE}/authorize?${query.toString()}`;
}

function readArtistNames(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.flatMap((artist) => (isRecord(artist) && typeof artist.name === "string" ? [artist.name] : []));
}

function readAlbumArtUrl(album: unknown): string | null {
  if (!isRecord(album) || !Array.isArray(album.images)) {
    return null;
  }

  // Spotify lists album images widest first.
  const [largest] = album.images;
  return isRecord(largest) && typeof largest.url === "string" ? largest.url : null;
}

function readTrackUrl(track: Record<string, unknown>): string | null {
  if (isRecord(track.external_urls) && typeof track.external_urls.spotify === "string") {
    return track.external_urls.spotify;
  }

  return typeof track.id === "string" ? `${SPOTIFY_TRACK_URL_BASE}/${track.id}` : null;
}

export function toTrackRecord(item: unknown): TrackRecord | null {
  if (!isRecord(item) || !isRecord(item.track) || typeof item.track.name !== "string") {
    return null;
  }

  const track = item.track;
  const artists = readArtistNames(track.artists);

  return {
    title: item.track.name,
    artist: artists.length > 0 ? artists.join(", ") : "Unknown artist",
    albumArtUrl: readAlbumArtUrl(track.album),
    trackUrl: readTrackUrl(track),
    playedAt: typeof item.played_at === "string" ? item.played_at : ""
  };
}

export class SpotifyClient {
  constructor(private readonly credentials: UserCredentials) {}

  get username(): string {
    return this.credentials.username;
  }

  async refreshAccessToken(): Promise<string> {
    const refreshToken = this.credentials.refresh_token.trim();

    if (!refreshToken || refreshToken.startsWith(REFRESH_TOKEN_PLACEHOLDER)) {
      throw new AuthenticationError(
        null,
        `Refresh token for user ${this.username} is missing or still a placeholder. Run the refresh-token helper first.`
      );
    }

    const tokens = await this.requestToken({
      grant_type: "refresh_token",
      refresh_token: refreshToken
    });

    return tokens.accessToken;
  }

  async exchangeAuthorizationCode(code: string): Promise<{ accessToken: string; refreshToken: string | null }> {
    return this.requestToken({
      grant_type: "authorization_code",
      code,
      redirect_uri: this.credentials.redirect_uri
    });
  }

  async getCurrentUser(accessToken: string): Promise<SpotifyUser> {
    const payload = await this.request(`${SPOTIFY_API_BASE}/me`, accessToken);

    if (!isRecord(payload) || typeof payload.id !== "string") {
      throw new UpstreamApiError(null, "Spotify profile response did not include an id");
    }

    return {
      id: payload.id,
      display_name: typeof payload.display_name === "string" ? payload.display_name : null
    };
  }

  async getRecentlyPlayed(accessToken: string, limit: number): Promise<TrackRecord[]> {
    const boundedLimit = clampTrackLimit(limit);
    const payload = await this.request(
      `${SPOTIFY_API_BASE}/me/player/recently-played?limit=${boundedLimit}`,
      accessToken
    );

    if (!isRecord(payload) || !Array.isArray(payload.items)) {
      throw new UpstreamApiError(null, "Spotify recently played response did not include an items array");
    }

    const tracks: TrackRecord[] = [];
    let skippedCount = 0;

    for (const item of payload.items) {
      const track = toTrackRecord(item);
      if (!track) {
        skippedCount += 1;
        continue;
      }

      tracks.push(track);
    }

    if (skippedCount > 0) {
      logger.warn(`Skipped ${skippedCount} recently played items without track data user=${this.username}`);
    }

    logger.info(`Fetched recently played tracks user=${this.username} count=${tracks.length} limit=${boundedLimit}`);

    return tracks;
  }

  private async requestToken(
    grant: Record<string, string>
  ): Promise<{ accessToken: string; refreshToken: string | null }> {
    const params = new URLSearchParams({
      ...grant,
      client_id: this.credentials.client_id,
      client_secret: this.credentials.client_secret
    });

    let response: Response;
    try {
      response = await fetchWithTimeout(`${SPOTIFY_ACCOUNTS_BASE}/api/token`, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded"
        },
        body: params
      });
    } catch (error) {
      throw new AuthenticationError(null, `Spotify token request failed: ${describeFetchFailure(error)}`, { cause: error });
    }

    const bodyText = await response.text();

    if (!response.ok) {
      throw new AuthenticationError(response.status, buildErrorMessage("Spotify token request", response.status, bodyText));
    }

    const parsed = parseJson(bodyText);
    if (!isRecord(parsed) || typeof parsed.access_token !== "string" || !parsed.access_token) {
      throw new AuthenticationError(response.status, "Spotify token response did not include access_token");
    }

    return {
      accessToken: parsed.access_token,
      refreshToken: typeof parsed.refresh_token === "string" ? parsed.refresh_token : null
    };
  }

  private async request(url: string, accessToken: string): Promise<unknown> {
    logger.debug(`Spotify request: GET ${url}`);

    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${accessToken}`
        }
      });
    } catch (error) {
      throw new UpstreamApiError(null, `Spotify API request failed: ${describeFetchFailure(error)}`, { cause: error });
    }

    const bodyText = await response.text();

    if (!response.ok) {
      throw new UpstreamApiError(response.status, buildErrorMessage("Spotify API request", response.status, bodyText));
    }

    return parseJson(bodyText);
  }
}
