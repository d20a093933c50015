// Offline CryptoQuotes / FiatRates with fixed sample prices, for development
// and demos. Anything without a sample price comes back Unavailable.

import { Clock, Effect, Layer } from "effect";
import { type Asset, type Quote, quoteFor } from "../domain.ts";
import { CryptoQuotes, FiatRates } from "../market-data.ts";

// --- Sample data (USD per unit) ---

const samplePrices: Record<string, number> = {
  BTC: 67012.5,
  ETH: 3481.22,
  USDT: 1.0002,
  XRP: 0.5231,
  BNB: 592.4,
  SOL: 148.17,
  USDC: 0.9999,
  DOGE: 0.1234,
  TRX: 0.1189,
  ADA: 0.4467,
  LINK: 14.52,
  AVAX: 28.91,
  XLM: 0.1051,
  SUI: 1.02,
  TON: 6.84,
  SHIB: 0.00001712,
  HBAR: 0.0789,
  DOT: 6.21,
  BCH: 381.6,
  LTC: 72.35,
  EUR: 1.0842,
  JPY: 0.006392,
  GBP: 1.2711,
  AUD: 0.6648,
  CAD: 0.7302,
  CHF: 1.1187,
  CNY: 0.1379,
  HKD: 0.128,
  NZD: 0.6102,
  BRL: 0.1843,
};

function sampleQuotes(
  assets: ReadonlyArray<Asset>,
): Effect.Effect<ReadonlyArray<Quote>> {
  return Clock.currentTimeMillis.pipe(
    Effect.map((now) =>
      assets.map((asset) => quoteFor(asset, samplePrices[asset.symbol], now))
    ),
  );
}

// --- Mock layers ---

export const CryptoQuotesTestLive = Layer.succeed(
  CryptoQuotes,
  CryptoQuotes.of({ name: "sample", fetchCryptoQuotes: sampleQuotes }),
);

export const FiatRatesTestLive = Layer.succeed(
  FiatRates,
  FiatRates.of({ name: "sample", fetchFiatRates: sampleQuotes }),
);

export const MarketDataTestLive = Layer.merge(
  CryptoQuotesTestLive,
  FiatRatesTestLive,
);
