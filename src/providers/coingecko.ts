// CoinGecko — implementation of CryptoQuotes.
//
// One /simple/price call per refresh for the whole crypto watch-list:
//   GET /simple/price?ids=bitcoin,ethereum&vs_currencies=usd
//   → { "bitcoin": { "usd": 67000.12 }, "ethereum": { "usd": 3500.5 } }

import { HttpClient, HttpClientRequest } from "@effect/platform";
import {
  Clock,
  Config,
  Effect,
  Layer,
  Option,
  Predicate,
  Schema,
} from "effect";
import { type Asset, type Quote, quoteFor } from "../domain.ts";
import {
  asProviderError,
  CryptoQuotes,
  ParseError,
  ServiceError,
} from "../market-data.ts";
import { getJson } from "./http.ts";

// --- CoinGecko error bodies ---

const CoinGeckoStatusError = Schema.Struct({
  status: Schema.Struct({
    error_code: Schema.Number,
    error_message: Schema.String,
  }),
});

const CoinGeckoPlainError = Schema.Struct({ error: Schema.String });

const isStatusError = Schema.is(CoinGeckoStatusError);
const isPlainError = Schema.is(CoinGeckoPlainError);

// --- Decode CoinGecko response into Quotes ---

export function decodeCoinGeckoResponse(
  json: unknown,
  assets: ReadonlyArray<Asset>,
  fetchedAt: number,
): Effect.Effect<ReadonlyArray<Quote>, ParseError | ServiceError> {
  if (!Predicate.isRecord(json)) {
    return Effect.fail(new ParseError({ message: "Response is not an object" }));
  }

  // Quota and key problems come back as a JSON body, sometimes with a 200.
  if (isStatusError(json)) {
    return Effect.fail(new ServiceError({ message: json.status.error_message }));
  }
  if (isPlainError(json)) {
    return Effect.fail(new ServiceError({ message: json.error }));
  }

  const prices = json;
  if (assets.length > 0 && !assets.some((a) => prices[a.sourceId] !== undefined)) {
    return Effect.fail(new ParseError({ message: "Empty response" }));
  }

  return Effect.succeed(
    assets.map((asset) =>
      quoteFor(asset, usdPrice(prices[asset.sourceId]), fetchedAt)
    ),
  );
}

function usdPrice(entry: unknown): unknown {
  return Predicate.isRecord(entry) ? entry["usd"] : undefined;
}

// --- CoinGecko layer ---

export const CoinGeckoLive = Layer.effect(
  CryptoQuotes,
  Effect.gen(function* () {
    const baseUrl = yield* Config.string("COINGECKO_BASE_URL").pipe(
      Config.withDefault("https://api.coingecko.com/api/v3"),
    );
    const apiKey = yield* Config.option(Config.string("COINGECKO_API_KEY"));
    const base = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const client = Option.match(apiKey, {
      onNone: () => base,
      onSome: (key) =>
        base.pipe(
          HttpClient.mapRequest(
            HttpClientRequest.setHeader("x-cg-demo-api-key", key),
          ),
        ),
    });

    return CryptoQuotes.of({
      name: "coingecko",
      fetchCryptoQuotes: (assets) =>
        assets.length === 0
          ? Effect.succeed([])
          : Effect.gen(function* () {
              const ids = assets.map((a) => a.sourceId).join(",");
              const json = yield* getJson(
                client,
                `${baseUrl}/simple/price?ids=${encodeURIComponent(ids)}&vs_currencies=usd`,
              );
              const fetchedAt = yield* Clock.currentTimeMillis;
              const quotes = yield* decodeCoinGeckoResponse(json, assets, fetchedAt);
              const ok = quotes.filter((q) => q.status === "Ok").length;
              yield* Effect.logDebug(`[coingecko] ${ok}/${assets.length} prices`);
              return quotes;
            }).pipe(asProviderError("coingecko")),
    });
  }),
);
