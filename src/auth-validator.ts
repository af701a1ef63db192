import { errorMessage } from "./errors";
import { SpotifyClient } from "./spotify-client";
import type { TrackRecord, UserCredentials } from "./types";

export interface AuthValidationReport {
  username: string;
  ok: boolean;
  displayName: string | null;
  userId: string | null;
  recentTracks: TrackRecord[];
  error: string | null;
}

export async function validateUserAuth(user: UserCredentials, sampleSize = 3): Promise<AuthValidationReport> {
  const report: AuthValidationReport = {
    username: user.username,
    ok: false,
    displayName: null,
    userId: null,
    recentTracks: [],
    error: null
  };

  const spotifyClient = new SpotifyClient(user);

  try {
    const accessToken = await spotifyClient.refreshAccessToken();

    const profile = await spotifyClient.getCurrentUser(accessToken);
    report.userId = profile.id;
    report.displayName = profile.display_name;

    report.recentTracks = await spotifyClient.getRecentlyPlayed(accessToken, sampleSize);
    report.ok = true;
  } catch (error) {
    report.error = errorMessage(error);
  }

  return report;
}

export function describeReport(report: AuthValidationReport): string[] {
  if (!report.ok) {
    return [`Auth failed user=${report.username}: ${report.error ?? "unknown error"}`];
  }

  const lines = [
    `Auth ok user=${report.username} spotifyId=${report.userId ?? "n/a"} displayName=${report.displayName ?? "n/a"}`
  ];

  if (report.recentTracks.length === 0) {
    lines.push("  No recently played tracks (normal if nothing was played lately).");
  }

  report.recentTracks.forEach((track, index) => {
    lines.push(`  ${index + 1}. ${track.title} by ${track.artist}`);
  });

  return lines;
}
