// In-process stand-in for `fetch`, for exercising the live layers without a
// network. Provide it as FetchHttpClient.Fetch.

import { ConfigProvider } from "effect";

export interface MockReply {
  readonly status?: number;
  readonly body: unknown;
}

export interface RecordedRequest {
  readonly url: URL;
  readonly headers: Headers;
}

export interface FetchMock {
  readonly fetch: typeof globalThis.fetch;
  readonly requests: ReadonlyArray<RecordedRequest>;
}

/** `route` answers each request with a JSON reply, or an Error to simulate a
 *  connection failure. */
export function makeFetchMock(
  route: (url: URL) => MockReply | Error,
): FetchMock {
  const requests: RecordedRequest[] = [];

  const fetch = (
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    requests.push({ url, headers: new Headers(init?.headers) });

    const reply = route(url);
    if (reply instanceof Error) return Promise.reject(reply);
    return Promise.resolve(
      new Response(JSON.stringify(reply.body), {
        status: reply.status ?? 200,
        headers: { "content-type": "application/json" },
      }),
    );
  };

  return { fetch, requests };
}

/** Config from a fixed map instead of the environment; use with
 *  Effect.withConfigProvider. */
export const configFrom = (
  entries: Record<string, string>,
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(Object.entries(entries)));
