import { afterEach, describe, expect, it } from "vitest";
import { buildTrackCard, toTeamsMessage } from "../src/card-builder";
import { DeliveryError } from "../src/errors";
import { postToWebhook } from "../src/webhook-client";
import { installFakeFetch, textResponse } from "./fake-fetch";
import { trackRecord } from "./fixtures";

const WEBHOOK_URL = "https://example.test/webhook";
const message = toTeamsMessage(buildTrackCard("alice", [trackRecord("a")]));

let restoreFetch: (() => void) | null = null;

afterEach(() => {
  restoreFetch?.();
  restoreFetch = null;
});

describe("postToWebhook", () => {
  it("posts the card as JSON and accepts any 2xx", async () => {
    const fake = installFakeFetch(() => textResponse(202, ""));
    restoreFetch = fake.restore;

    await postToWebhook(WEBHOOK_URL, message);

    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0]?.url).toBe(WEBHOOK_URL);
    expect(fake.requests[0]?.method).toBe("POST");
    expect(fake.requests[0]?.headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(fake.requests[0]?.body ?? "")).toEqual(message);
  });

  it("raises a delivery error with status and body on a non-2xx response", async () => {
    restoreFetch = installFakeFetch(() => textResponse(400, "Bad payload\n")).restore;

    const error = await postToWebhook(WEBHOOK_URL, message).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ status: 400, message: "Webhook request failed with status 400: Bad payload" });
  });

  it("truncates long error bodies", async () => {
    restoreFetch = installFakeFetch(() => textResponse(500, "x".repeat(250))).restore;

    await expect(postToWebhook(WEBHOOK_URL, message)).rejects.toThrow(
      `Webhook request failed with status 500: ${"x".repeat(200)}...`
    );
  });

  it("raises a delivery error on network failure", async () => {
    restoreFetch = installFakeFetch(() => {
      throw new TypeError("fetch failed");
    }).restore;

    const error = await postToWebhook(WEBHOOK_URL, message).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ status: null, message: "Webhook request failed: fetch failed" });
  });
});
