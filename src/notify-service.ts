import { buildTrackCard, toTeamsMessage } from "./card-builder";
import { logger } from "./logger";
import { SpotifyClient } from "./spotify-client";
import type { NotifyResult, NotifyStage, RunSummary, UserCredentials } from "./types";
import { postToWebhook } from "./webhook-client";

export interface NotifyOptions {
  trackCount: number;
  webhookUrl: string;
}

class StageError extends Error {
  constructor(
    readonly stage: NotifyStage,
    readonly original: Error
  ) {
    super(original.message, { cause: original });
    this.name = "StageError";
  }
}

async function runStage<T>(stage: NotifyStage, action: () => Promise<T> | T): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new StageError(stage, error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Refresh, fetch, build and post for one user. Any stage failure stops the
 * user's run before the webhook is called with a partial card.
 */
export async function notifyUser(user: UserCredentials, options: NotifyOptions): Promise<NotifyResult> {
  const spotifyClient = new SpotifyClient(user);

  try {
    logger.info(`Stage: refreshing access token user=${user.username}.`);
    const accessToken = await runStage("authenticate", () => spotifyClient.refreshAccessToken());

    logger.info(`Stage: fetching recently played user=${user.username} limit=${options.trackCount}.`);
    const tracks = await runStage("fetch", () => spotifyClient.getRecentlyPlayed(accessToken, options.trackCount));

    const message = await runStage("build", () => toTeamsMessage(buildTrackCard(user.username, tracks)));

    logger.info(`Stage: posting card user=${user.username} tracks=${tracks.length}.`);
    await runStage("deliver", () => postToWebhook(options.webhookUrl, message));

    return { username: user.username, status: "posted", trackCount: tracks.length };
  } catch (error) {
    if (error instanceof StageError) {
      return { username: user.username, status: "failed", stage: error.stage, error: error.original };
    }

    throw error;
  }
}

export async function runNotifications(
  users: readonly UserCredentials[],
  options: NotifyOptions
): Promise<RunSummary> {
  const results: NotifyResult[] = [];

  for (const user of users) {
    const result = await notifyUser(user, options);

    if (result.status === "failed") {
      logger.error(
        `Notification failed user=${result.username} stage=${result.stage} error=${result.error.name}: ${result.error.message}`
      );
    } else {
      logger.info(`Posted card user=${result.username} tracks=${result.trackCount}.`);
    }

    results.push(result);
  }

  const postedCount = results.filter((result) => result.status === "posted").length;

  return {
    results,
    postedCount,
    failedCount: results.length - postedCount
  };
}
