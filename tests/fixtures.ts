import type { TrackRecord, UserCredentials } from "../src/types";

export function userCredentials(username: string, overrides: Partial<UserCredentials> = {}): UserCredentials {
  return {
    username,
    client_id: `client-${username}`,
    client_secret: "test-secret",
    redirect_uri: "http://127.0.0.1:8888/callback",
    refresh_token: `refresh-${username}`,
    ...overrides
  };
}

export function playedItem(id: string, playedAt: string) {
  return {
    played_at: playedAt,
    track: {
      id,
      name: `Song ${id}`,
      artists: [{ name: `Artist ${id}` }],
      album: {
        images: [
          { url: `https://img.test/${id}-640.jpg`, width: 640, height: 640 },
          { url: `https://img.test/${id}-64.jpg`, width: 64, height: 64 }
        ]
      },
      external_urls: { spotify: `https://open.spotify.com/track/${id}` }
    }
  };
}

export function trackRecord(id: string, overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    title: `Song ${id}`,
    artist: `Artist ${id}`,
    albumArtUrl: `https://img.test/${id}-640.jpg`,
    trackUrl: `https://open.spotify.com/track/${id}`,
    playedAt: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}
