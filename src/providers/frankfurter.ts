// Frankfurter (ECB reference rates) — implementation of FiatRates.
//
// One batched call per refresh, no API key:
//   GET /latest?base=USD&symbols=EUR,JPY
//   → { "amount": 1, "base": "USD", "date": "2025-06-13", "rates": { "EUR": 0.87, "JPY": 144.1 } }
// Rates are units per USD; we report USD per unit.

import { HttpClient } from "@effect/platform";
import { Clock, Config, Effect, Layer, Schema } from "effect";
import { type Asset, type Quote, quoteFor, validPrice } from "../domain.ts";
import { asProviderError, FiatRates, ParseError } from "../market-data.ts";
import { getJson } from "./http.ts";

// --- Frankfurter response schema ---

const FrankfurterLatest = Schema.Struct({
  base: Schema.String,
  rates: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
});

// --- Decode Frankfurter response into Quotes ---

export function decodeFrankfurterResponse(
  json: unknown,
  assets: ReadonlyArray<Asset>,
  fetchedAt: number,
): Effect.Effect<ReadonlyArray<Quote>, ParseError> {
  return Schema.decodeUnknown(FrankfurterLatest)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap((response) => interpretRates(response, assets, fetchedAt)),
  );
}

function interpretRates(
  { base, rates }: typeof FrankfurterLatest.Type,
  assets: ReadonlyArray<Asset>,
  fetchedAt: number,
): Effect.Effect<ReadonlyArray<Quote>, ParseError> {
  if (base !== "USD") {
    return Effect.fail(new ParseError({ message: `Unexpected base ${base}` }));
  }

  // Frankfurter omits the base currency from `rates`.
  const foreign = assets.filter((a) => a.sourceId !== "USD");
  if (foreign.length > 0 && !foreign.some((a) => rates[a.sourceId] !== undefined)) {
    return Effect.fail(new ParseError({ message: "Empty response" }));
  }

  return Effect.succeed(
    assets.map((asset) =>
      asset.sourceId === "USD"
        ? quoteFor(asset, 1, fetchedAt)
        : quoteFor(asset, usdPerUnit(rates[asset.sourceId]), fetchedAt)
    ),
  );
}

function usdPerUnit(rate: unknown): number | undefined {
  const units = validPrice(rate);
  return units !== undefined && units > 0 ? 1 / units : undefined;
}

// --- Frankfurter layer ---

export const FrankfurterLive = Layer.effect(
  FiatRates,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const baseUrl = yield* Config.string("FRANKFURTER_BASE_URL").pipe(
      Config.withDefault("https://api.frankfurter.app"),
    );

    return FiatRates.of({
      name: "frankfurter",
      fetchFiatRates: (assets) =>
        assets.length === 0
          ? Effect.succeed([])
          : Effect.gen(function* () {
              const symbols = assets.map((a) => a.sourceId).join(",");
              const json = yield* getJson(
                client,
                `${baseUrl}/latest?base=USD&symbols=${encodeURIComponent(symbols)}`,
              );
              const fetchedAt = yield* Clock.currentTimeMillis;
              const quotes = yield* decodeFrankfurterResponse(json, assets, fetchedAt);
              const ok = quotes.filter((q) => q.status === "Ok").length;
              yield* Effect.logDebug(`[frankfurter] ${ok}/${assets.length} rates`);
              return quotes;
            }).pipe(asProviderError("frankfurter")),
    });
  }),
);
