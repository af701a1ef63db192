import { errorMessage } from "./errors";

const REQUEST_TIMEOUT_MS = 30000;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
  if (!text) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export async function fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function describeFetchFailure(error: unknown): string {
  if (error instanceof Error && error.name === "AbortError") {
    return `timed out after ${REQUEST_TIMEOUT_MS}ms`;
  }

  return errorMessage(error);
}
