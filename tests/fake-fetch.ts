export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string;
}

type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function textResponse(status: number, text: string): Response {
  return new Response(text, { status });
}

function readBody(body: RequestInit["body"]): string {
  if (body === undefined || body === null) {
    return "";
  }

  return typeof body === "string" ? body : String(body);
}

export function installFakeFetch(handler: FetchHandler): { requests: RecordedRequest[]; restore: () => void } {
  const originalFetch = globalThis.fetch;
  const requests: RecordedRequest[] = [];

  globalThis.fetch = async (input: Parameters<typeof fetch>[0], init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: input instanceof Request ? input.url : input.toString(),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: readBody(init?.body)
    };

    requests.push(request);
    return handler(request);
  };

  return {
    requests,
    restore: () => {
      globalThis.fetch = originalFetch;
    }
  };
}
