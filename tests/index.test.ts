import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { run } from "../src/cli";
import { logger } from "../src/logger";
import { installFakeFetch, jsonResponse, textResponse } from "./fake-fetch";
import { playedItem, userCredentials } from "./fixtures";

const WEBHOOK_URL = "https://example.test/webhook";

describe("run", () => {
  let tempDir: string;
  let usersPath: string;
  let restoreFetch: (() => void) | null = null;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "notifier-cli-"));
    usersPath = path.join(tempDir, "users.json");
    await fs.writeFile(usersPath, JSON.stringify([userCredentials("alice"), userCredentials("bob")]), "utf8");

    vi.spyOn(logger, "info").mockImplementation(() => undefined);
    vi.spyOn(logger, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    restoreFetch?.();
    restoreFetch = null;
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("exits 0 after posting one card when the other user's refresh fails", async () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => undefined);
    const fake = installFakeFetch((request) => {
      if (request.url === "https://accounts.spotify.com/api/token") {
        const clientId = new URLSearchParams(request.body).get("client_id");
        return clientId === "client-bob"
          ? jsonResponse(400, { error: "invalid_grant" })
          : jsonResponse(200, { access_token: "token-alice" });
      }

      if (request.url === WEBHOOK_URL) {
        return textResponse(200, "1");
      }

      return jsonResponse(200, {
        items: [
          playedItem("a1", "2026-01-02T10:00:00.000Z"),
          playedItem("a2", "2026-01-02T09:00:00.000Z"),
          playedItem("a3", "2026-01-02T08:00:00.000Z")
        ]
      });
    });
    restoreFetch = fake.restore;

    const exitCode = await run(["--num-tracks", "3"], { USERS_JSON_PATH: usersPath, WEBHOOK_URL });

    expect(exitCode).toBe(0);
    expect(fake.requests.filter((request) => request.url === WEBHOOK_URL)).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("exits 1 without any request when no webhook is configured", async () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => undefined);
    const fake = installFakeFetch(() => textResponse(200, "1"));
    restoreFetch = fake.restore;

    const exitCode = await run([], { USERS_JSON_PATH: usersPath });

    expect(exitCode).toBe(1);
    expect(fake.requests).toHaveLength(0);
    expect(errorSpy).toHaveBeenCalledWith("Run aborted: Missing webhook URL: pass --teams-webhook or set WEBHOOK_URL");
  });

  it("exits 1 on an unknown flag", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => undefined);

    await expect(run(["--verbose"], { USERS_JSON_PATH: usersPath, WEBHOOK_URL })).resolves.toBe(1);
  });
});
