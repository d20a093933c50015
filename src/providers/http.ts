// GET + JSON with platform errors mapped onto the market-data taxonomy.

import type { HttpClient } from "@effect/platform";
import { Effect } from "effect";
import { HttpError, NetworkError, ParseError } from "../market-data.ts";

export function getJson(
  client: HttpClient.HttpClient,
  url: string,
): Effect.Effect<unknown, NetworkError | HttpError | ParseError> {
  return client.get(url).pipe(
    Effect.flatMap((response) => response.json),
    Effect.scoped,
    Effect.catchTags({
      RequestError: (e) =>
        Effect.fail(new NetworkError({ message: e.message })),
      ResponseError: (e) =>
        e.reason === "StatusCode"
          ? Effect.fail(new HttpError({ status: e.response.status }))
          : Effect.fail(
              new ParseError({
                message: `JSON parse failed: ${e.message}`,
              }),
            ),
    }),
  );
}
