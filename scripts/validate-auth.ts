import { describeReport, validateUserAuth } from "../src/auth-validator";
import { loadUsers, resolveUsersJsonPath } from "../src/config";
import { errorMessage } from "../src/errors";
import { logger } from "../src/logger";

async function main(): Promise<void> {
  const [username] = process.argv.slice(2);
  const usersJsonPath = resolveUsersJsonPath(undefined, process.env);
  const users = await loadUsers(usersJsonPath);

  const selected = username ? users.filter((user) => user.username === username) : users;
  if (selected.length === 0) {
    const available = users.map((user) => user.username).join(", ");
    throw new Error(`User "${username}" not found in ${usersJsonPath}. Available users: ${available}`);
  }

  let failures = 0;
  for (const user of selected) {
    const report = await validateUserAuth(user);
    for (const line of describeReport(report)) {
      if (report.ok) {
        logger.info(line);
      } else {
        logger.error(line);
      }
    }

    if (!report.ok) {
      failures += 1;
    }
  }

  logger.info(`Validated ${selected.length} users, failures=${failures}.`);
  if (failures > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error(`Auth validation failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
