// Aggregator — one refresh across both providers.
//
// Each provider runs under its own timeout; a ProviderError (or a timeout)
// only costs that provider's assets, which come back Unavailable and the
// error travels in the result for the board to show. `refresh` itself never
// fails and keeps no state between calls.

import { Clock, Duration, Effect } from "effect";
import {
  type Asset,
  type Quote,
  type RefreshResult,
  Unavailable,
} from "./domain.ts";
import {
  CryptoQuotes,
  FiatRates,
  NetworkError,
  ProviderError,
} from "./market-data.ts";
import { CRYPTO_WATCH_LIST, FIAT_WATCH_LIST } from "./watch-list.ts";

// --- Options ---

export const DEFAULT_TIMEOUT: Duration.DurationInput = "10 seconds";

export interface RefreshOptions {
  readonly timeout?: Duration.DurationInput;
  readonly crypto?: ReadonlyArray<Asset>;
  readonly fiat?: ReadonlyArray<Asset>;
}

// --- Batch outcome ---

export interface BatchOutcome {
  readonly quotes: ReadonlyArray<Quote>;
  readonly failure?: ProviderError;
}

/** One quote per asset, in asset order. Entries the provider left out (or
 *  sent for assets it was not asked about) are dropped or filled in as
 *  Unavailable. */
export function alignQuotes(
  assets: ReadonlyArray<Asset>,
  quotes: ReadonlyArray<Quote>,
  now: number,
): ReadonlyArray<Quote> {
  const bySymbol = new Map(quotes.map((q) => [q.asset.symbol, q]));
  return assets.map((asset) => bySymbol.get(asset.symbol) ?? Unavailable(asset, now));
}

/** Run one provider batch, turning a failure or timeout into Unavailable
 *  quotes for every asset it was responsible for. */
export function guardBatch(
  provider: string,
  assets: ReadonlyArray<Asset>,
  fetch: Effect.Effect<ReadonlyArray<Quote>, ProviderError>,
  timeout: Duration.DurationInput,
): Effect.Effect<BatchOutcome> {
  return fetch.pipe(
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () =>
        new ProviderError({
          provider,
          reason: new NetworkError({ message: `${provider}: request timed out` }),
        }),
    }),
    Effect.flatMap((quotes) =>
      Clock.currentTimeMillis.pipe(
        Effect.map((now): BatchOutcome => ({
          quotes: alignQuotes(assets, quotes, now),
        })),
      )
    ),
    Effect.catchTag("ProviderError", (failure) =>
      Effect.logWarning(
        `[aggregator] ${failure.provider} failed: ${failure.reason._tag}`,
      ).pipe(
        Effect.zipRight(Clock.currentTimeMillis),
        Effect.map((now): BatchOutcome => ({
          quotes: assets.map((asset) => Unavailable(asset, now)),
          failure,
        })),
      )
    ),
  );
}

/** Merge batch outcomes (crypto first) into a RefreshResult. */
export function assemble(
  outcomes: ReadonlyArray<BatchOutcome>,
  completedAt: number,
): RefreshResult {
  const quotes = outcomes.flatMap((o) => o.quotes);
  const failures = outcomes.flatMap((o) =>
    o.failure === undefined ? [] : [o.failure]
  );
  return {
    quotes,
    partialFailure: quotes.some((q) => q.status === "Unavailable"),
    failures,
    completedAt,
  };
}

// --- Refresh ---

export function refresh(
  options: RefreshOptions = {},
): Effect.Effect<RefreshResult, never, CryptoQuotes | FiatRates> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const cryptoAssets = options.crypto ?? CRYPTO_WATCH_LIST;
  const fiatAssets = options.fiat ?? FIAT_WATCH_LIST;

  return Effect.gen(function* () {
    const crypto = yield* CryptoQuotes;
    const fiat = yield* FiatRates;

    const outcomes = yield* Effect.all(
      [
        guardBatch(
          crypto.name,
          cryptoAssets,
          crypto.fetchCryptoQuotes(cryptoAssets),
          timeout,
        ),
        guardBatch(
          fiat.name,
          fiatAssets,
          fiat.fetchFiatRates(fiatAssets),
          timeout,
        ),
      ],
      { concurrency: 2 },
    );

    const completedAt = yield* Clock.currentTimeMillis;
    const result = assemble(outcomes, completedAt);
    yield* Effect.logDebug(
      `[aggregator] refresh done: ${result.quotes.length} quotes` +
        (result.partialFailure ? " (partial)" : ""),
    );
    return result;
  });
}
