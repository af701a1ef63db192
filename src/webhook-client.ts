import { DeliveryError } from "./errors";
import { describeFetchFailure, fetchWithTimeout } from "./http";
import type { TeamsMessage } from "./types";

const MAX_ERROR_BODY_LENGTH = 200;

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY_LENGTH ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}...` : text;
}

export async function postToWebhook(webhookUrl: string, message: TeamsMessage): Promise<void> {
  let response: Response;
  try {
    response = await fetchWithTimeout(webhookUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json"
      },
      body: JSON.stringify(message)
    });
  } catch (error) {
    throw new DeliveryError(null, `Webhook request failed: ${describeFetchFailure(error)}`, { cause: error });
  }

  if (!response.ok) {
    const bodyText = (await response.text()).trim();
    const detail = bodyText ? `: ${truncate(bodyText)}` : "";
    throw new DeliveryError(response.status, `Webhook request failed with status ${response.status}${detail}`);
  }
}
