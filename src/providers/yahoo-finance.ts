// Yahoo Finance — implementation of FiatRates.
//
// One chart call per currency. `EURUSD=X` is quoted as USD per 1 EUR, which
// is already the unit we report. Some pairs only exist the other way round
// (`USDEUR=X`), in which case the price is inverted.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, Effect, Layer, Schema } from "effect";
import { type Asset, quoteFor, validPrice } from "../domain.ts";
import {
  asProviderError,
  FiatRates,
  ParseError,
  type ProviderFailure,
  SymbolNotFound,
} from "../market-data.ts";
import { getJson } from "./http.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Unknown),
  currency: Schema.optional(Schema.String),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(Schema.Struct({ meta: YahooMeta }))),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

// --- Decode Yahoo response into a rate ---

/** The pair's last price, or undefined when Yahoo has no usable price. */
export function decodeYahooRate(
  json: unknown,
  ticker: string,
): Effect.Effect<number | undefined, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooResponse(response, ticker)),
  );
}

function interpretYahooResponse(
  response: YahooChartResponseType,
  ticker: string,
): Effect.Effect<number | undefined, SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null) {
    return Effect.fail(new SymbolNotFound({ symbol: ticker }));
  }

  if (chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol: ticker }));
  }

  return Effect.succeed(validPrice(chart.result[0].meta.regularMarketPrice));
}

// --- Rate resolution ---

export type FetchPair = (
  ticker: string,
) => Effect.Effect<number | undefined, ProviderFailure | SymbolNotFound>;

const invert = (rate: number | undefined): number | undefined =>
  rate !== undefined && rate > 0 ? 1 / rate : undefined;

/** USD value of one unit of `asset`: the direct pair, else the inverted
 *  inverse pair, else undefined. */
export function fetchUsdRate(
  asset: Asset,
  fetchPair: FetchPair,
): Effect.Effect<number | undefined, ProviderFailure> {
  const code = asset.sourceId;
  if (code === "USD") return Effect.succeed(1);

  return fetchPair(`${code}USD=X`).pipe(
    Effect.catchTag("SymbolNotFound", () =>
      fetchPair(`USD${code}=X`).pipe(
        Effect.map(invert),
        Effect.catchTag("SymbolNotFound", () => Effect.succeed(undefined)),
      )
    ),
  );
}

// --- Yahoo Finance layer ---

const CONCURRENCY = 4;

export const YahooFinanceLive = Layer.effect(
  FiatRates,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );
    const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
      Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
    );

    const fetchPair: FetchPair = (ticker) =>
      getJson(client, `${baseUrl}/${encodeURIComponent(ticker)}`).pipe(
        // Unknown tickers are answered with a 404.
        Effect.mapError((e) =>
          e._tag === "HttpError" && e.status === 404
            ? new SymbolNotFound({ symbol: ticker })
            : e
        ),
        Effect.flatMap((json) => decodeYahooRate(json, ticker)),
      );

    return FiatRates.of({
      name: "yahoo",
      fetchFiatRates: (assets) =>
        Effect.gen(function* () {
          const rates = yield* Effect.forEach(
            assets,
            (asset) =>
              fetchUsdRate(asset, fetchPair).pipe(
                Effect.map((rate) => ({ asset, rate })),
              ),
            { concurrency: CONCURRENCY },
          );
          const fetchedAt = yield* Clock.currentTimeMillis;
          const quotes = rates.map(({ asset, rate }) =>
            quoteFor(asset, rate, fetchedAt)
          );
          const ok = quotes.filter((q) => q.status === "Ok").length;
          yield* Effect.logDebug(`[yahoo] ${ok}/${assets.length} rates`);
          return quotes;
        }).pipe(asProviderError("yahoo")),
    });
  }),
);
