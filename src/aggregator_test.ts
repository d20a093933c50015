// Tests for one refresh across both providers: ordering, per-provider
// failure isolation, timeouts, and independence of consecutive refreshes.

import { Effect, Fiber, Layer, TestClock, TestContext } from "effect";
import { expect, test } from "vitest";
import { alignQuotes, assemble, refresh } from "./aggregator.ts";
import {
  CryptoQuotes,
  FiatRates,
  HttpError,
  NetworkError,
  ProviderError,
} from "./market-data.ts";
import {
  type Asset,
  Available,
  type Quote,
  type RefreshResult,
  Unavailable,
} from "./domain.ts";
import {
  CryptoQuotesTestLive,
  FiatRatesTestLive,
  MarketDataTestLive,
} from "./providers/market-data-mock.ts";
import { CRYPTO_WATCH_LIST, FIAT_WATCH_LIST, WATCH_LIST } from "./watch-list.ts";

// --- Helpers ---

type Fetch = (assets: ReadonlyArray<Asset>) => Effect.Effect<ReadonlyArray<Quote>, ProviderError>;

const cryptoLayer = (fetchCryptoQuotes: Fetch) =>
  Layer.succeed(CryptoQuotes, CryptoQuotes.of({ name: "coingecko", fetchCryptoQuotes }));

const fiatLayer = (fetchFiatRates: Fetch) =>
  Layer.succeed(FiatRates, FiatRates.of({ name: "yahoo", fetchFiatRates }));

const priced = (price: number): Fetch => (assets) =>
  Effect.succeed(assets.map((asset) => Available(asset, price, 0)));

const failing = (provider: string): Fetch => () =>
  Effect.fail(new ProviderError({ provider, reason: new HttpError({ status: 503 }) }));

function run(
  layer: Layer.Layer<CryptoQuotes | FiatRates>,
  effect: Effect.Effect<RefreshResult, never, CryptoQuotes | FiatRates> = refresh(),
): Promise<RefreshResult> {
  return Effect.runPromise(
    effect.pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)),
  );
}

const statuses = (result: RefreshResult) => result.quotes.map((q) => q.status);
const failedProviders = (result: RefreshResult) => result.failures.map((f) => f.provider);
const symbols = (quotes: ReadonlyArray<Quote>) => quotes.map((q) => q.asset.symbol);

// --- refresh ---

test("refresh: one quote per watch-list asset, crypto first", async () => {
  const result = await run(MarketDataTestLive);

  expect(result.quotes).toHaveLength(30);
  expect(symbols(result.quotes)).toEqual(WATCH_LIST.map((a) => a.symbol));
  expect(result.quotes.every((q) => q.status === "Ok")).toBe(true);
  expect(result.partialFailure).toBe(false);
  expect(failedProviders(result)).toEqual([]);
});

test("refresh: crypto provider failure leaves fiat quotes intact", async () => {
  const result = await run(Layer.merge(cryptoLayer(failing("coingecko")), FiatRatesTestLive));

  expect(statuses(result).slice(0, 20).every((s) => s === "Unavailable")).toBe(true);
  expect(statuses(result).slice(20).every((s) => s === "Ok")).toBe(true);
  expect(result.partialFailure).toBe(true);
  expect(failedProviders(result)).toEqual(["coingecko"]);
});

test("refresh: fiat provider failure leaves crypto quotes intact", async () => {
  const result = await run(Layer.merge(CryptoQuotesTestLive, fiatLayer(failing("yahoo"))));

  expect(statuses(result).slice(0, 20).every((s) => s === "Ok")).toBe(true);
  expect(statuses(result).slice(20).every((s) => s === "Unavailable")).toBe(true);
  expect(failedProviders(result)).toEqual(["yahoo"]);
});

test("refresh: both providers failing still yields a complete result", async () => {
  const result = await run(
    Layer.merge(cryptoLayer(failing("coingecko")), fiatLayer(failing("yahoo"))),
  );

  expect(result.quotes).toHaveLength(30);
  expect(result.quotes.every((q) => q.status === "Unavailable")).toBe(true);
  expect(result.partialFailure).toBe(true);
  expect(failedProviders(result)).toEqual(["coingecko", "yahoo"]);
});

test("refresh: assets the provider left out are Unavailable without a failed provider", async () => {
  const partial: Fetch = (assets) => priced(10)(assets.slice(0, 15));
  const result = await run(Layer.merge(cryptoLayer(partial), FiatRatesTestLive));

  expect(statuses(result).filter((s) => s === "Unavailable")).toHaveLength(5);
  expect(statuses(result).slice(15, 20)).toEqual(Array.from({ length: 5 }, () => "Unavailable"));
  expect(result.partialFailure).toBe(true);
  expect(failedProviders(result)).toEqual([]);
});

test("refresh: provider output in a different order is put back in watch-list order", async () => {
  const reversed: Fetch = (assets) => priced(10)([...assets].reverse());
  const result = await run(Layer.merge(cryptoLayer(reversed), fiatLayer(reversed)));

  expect(symbols(result.quotes)).toEqual(WATCH_LIST.map((a) => a.symbol));
});

test("refresh: consecutive refreshes are independent", async () => {
  let calls = 0;
  const counting: Fetch = (assets) =>
    Effect.suspend(() => {
      calls += 1;
      return priced(calls)(assets);
    });
  const layer = Layer.merge(cryptoLayer(counting), FiatRatesTestLive);

  const first = await run(layer);
  const second = await run(layer);

  expect(first).not.toBe(second);
  expect(first.quotes[0]).toEqual(Available(CRYPTO_WATCH_LIST[0], 1, 0));
  expect(second.quotes[0]).toEqual(Available(CRYPTO_WATCH_LIST[0], 2, 0));
});

test("refresh: a provider that exceeds the timeout only costs its own assets", async () => {
  const layer = Layer.merge(cryptoLayer(() => Effect.never), FiatRatesTestLive);
  const result = await run(
    layer,
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(refresh({ timeout: "5 seconds" }));
      yield* TestClock.adjust("5 seconds");
      return yield* Fiber.join(fiber);
    }),
  );

  expect(statuses(result).slice(0, 20).every((s) => s === "Unavailable")).toBe(true);
  expect(statuses(result).slice(20).every((s) => s === "Ok")).toBe(true);
  expect(failedProviders(result)).toEqual(["coingecko"]);
  expect(result.completedAt).toBe(5000);
});

test("refresh: custom asset lists are honored", async () => {
  const result = await run(
    MarketDataTestLive,
    refresh({ crypto: CRYPTO_WATCH_LIST.slice(0, 2), fiat: FIAT_WATCH_LIST.slice(0, 1) }),
  );
  expect(symbols(result.quotes)).toEqual(["BTC", "ETH", "EUR"]);
});

// --- alignQuotes ---

test("alignQuotes: drops quotes for assets that were not requested", () => {
  const [btc, eth] = CRYPTO_WATCH_LIST;
  const aligned = alignQuotes([btc], [Available(eth, 3481.22, 1), Available(btc, 67012.5, 1)], 7);
  expect(aligned).toEqual([Available(btc, 67012.5, 1)]);
});

test("alignQuotes: missing assets are Unavailable at the given time", () => {
  const [btc, eth] = CRYPTO_WATCH_LIST;
  expect(alignQuotes([btc, eth], [], 7)).toEqual([Unavailable(btc, 7), Unavailable(eth, 7)]);
});

// --- assemble ---

test("assemble: concatenates outcomes and collects failed providers", () => {
  const [btc] = CRYPTO_WATCH_LIST;
  const [eur] = FIAT_WATCH_LIST;
  const failure = new ProviderError({
    provider: "yahoo",
    reason: new NetworkError({ message: "down" }),
  });

  const result = assemble(
    [{ quotes: [Available(btc, 67012.5, 1)] }, { quotes: [Unavailable(eur, 1)], failure }],
    2,
  );

  expect(result).toEqual({
    quotes: [Available(btc, 67012.5, 1), Unavailable(eur, 1)],
    partialFailure: true,
    failures: [failure],
    completedAt: 2,
  });
});

test("assemble: no unavailable quotes means no partial failure", () => {
  const [btc] = CRYPTO_WATCH_LIST;
  const result = assemble([{ quotes: [Available(btc, 67012.5, 1)] }], 2);
  expect(result.partialFailure).toBe(false);
  expect(failedProviders(result)).toEqual([]);
});
