import http from "node:http";
import { randomBytes } from "node:crypto";
import { spawn } from "node:child_process";
import { parseArgs } from "node:util";
import { loadUsers, resolveUsersJsonPath } from "../src/config";
import { errorMessage } from "../src/errors";
import { buildAuthorizeUrl, findPlaceholderClientCredentials, SpotifyClient } from "../src/spotify-client";

function openBrowser(url: string): void {
  const platform = process.platform;

  if (platform === "win32") {
    spawn("cmd", ["/c", "start", "", url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  if (platform === "darwin") {
    spawn("open", [url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  spawn("xdg-open", [url], { detached: true, stdio: "ignore" }).unref();
}

function callbackListener(redirectUri: string): { host: string; port: number; pathname: string } {
  const parsed = new URL(redirectUri);
  const port = Number(parsed.port || (parsed.protocol === "https:" ? "443" : "80"));

  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`redirect_uri must carry a valid TCP port: ${redirectUri}`);
  }

  return { host: parsed.hostname, port, pathname: parsed.pathname };
}

function waitForCallback(redirectUri: string): Promise<{ code: string; returnedState: string }> {
  const listener = callbackListener(redirectUri);

  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const requestUrl = req.url ? new URL(req.url, redirectUri) : null;

      if (!requestUrl || requestUrl.pathname !== listener.pathname) {
        res.statusCode = 404;
        res.end("Not found");
        return;
      }

      const code = requestUrl.searchParams.get("code");
      const returnedState = requestUrl.searchParams.get("state");
      const error = requestUrl.searchParams.get("error");

      if (error) {
        res.statusCode = 400;
        res.end(`Spotify auth failed: ${error}`);
        server.close(() => reject(new Error(`Spotify auth failed: ${error}`)));
        return;
      }

      if (!code || !returnedState) {
        res.statusCode = 400;
        res.end("Missing code/state in callback.");
        server.close(() => reject(new Error("Missing code/state in callback.")));
        return;
      }

      res.statusCode = 200;
      res.end("Authorization complete. Return to terminal.");
      server.close(() => resolve({ code, returnedState }));
    });

    server.on("error", reject);
    server.listen(listener.port, listener.host);
  });
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      username: { type: "string" },
      "users-json": { type: "string" }
    }
  });

  if (!values.username) {
    throw new Error("Pass --username <name> matching an entry in the users file");
  }

  const usersJsonPath = resolveUsersJsonPath(values["users-json"], process.env);
  const users = await loadUsers(usersJsonPath);
  const user = users.find((candidate) => candidate.username === values.username);
  if (!user) {
    throw new Error(`User "${values.username}" not found in ${usersJsonPath}`);
  }

  const placeholders = findPlaceholderClientCredentials(user);
  if (placeholders.length > 0) {
    throw new Error(
      `Update ${placeholders.join(" and ")} for "${user.username}" in ${usersJsonPath} with real Spotify app credentials first`
    );
  }

  const state = randomBytes(16).toString("hex");
  const authUrl = buildAuthorizeUrl({ clientId: user.client_id, redirectUri: user.redirect_uri, state });

  console.log(`Authorizing ${user.username}. Opening Spotify authorization URL in your browser...`);
  console.log("If it does not open automatically, use this URL:\n");
  console.log(authUrl);

  const callback = waitForCallback(user.redirect_uri);
  openBrowser(authUrl);
  const result = await callback;

  if (result.returnedState !== state) {
    throw new Error("State mismatch in OAuth callback.");
  }

  const tokens = await new SpotifyClient(user).exchangeAuthorizationCode(result.code);
  if (!tokens.refreshToken) {
    throw new Error("Spotify token response did not include refresh_token.");
  }

  console.log(`\nRefresh token generated. Set refresh_token for "${user.username}" in ${usersJsonPath} to:`);
  console.log(tokens.refreshToken);
}

main().catch((error) => {
  console.error(`Auth helper failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
