import { type AppConfig, type Env, loadConfig, parseCliArgs, USAGE } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { runNotifications } from "./notify-service";

/**
 * Resolves to the process exit code: 1 when configuration cannot be loaded,
 * 0 once the user loop has run, whatever happened to individual users.
 */
export async function run(argv: string[], env: Env): Promise<number> {
  let config: AppConfig;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }

    config = await loadConfig(args, env);
  } catch (error) {
    logger.error(`Run aborted: ${errorMessage(error)}`);
    return 1;
  }

  logger.info(
    `Fetching ${config.trackCount} tracks per user from ${config.usersJsonPath} for ${config.users.length} users.`
  );

  const summary = await runNotifications(config.users, {
    trackCount: config.trackCount,
    webhookUrl: config.webhookUrl
  });

  logger.info(
    [
      "Run complete.",
      `users=${summary.results.length}`,
      `postedCount=${summary.postedCount}`,
      `failedCount=${summary.failedCount}`
    ].join(" ")
  );

  return 0;
}
