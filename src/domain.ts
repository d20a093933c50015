// Pure domain types — no I/O.

import type { ProviderError } from "./market-data.ts";

export type AssetKind = "Crypto" | "Fiat";

export interface Asset {
  readonly symbol: string;
  readonly kind: AssetKind;
  readonly displayName: string;
  readonly sourceId: string; // provider-side id (CoinGecko coin id, ISO code)
}

// --- Quote ---

export interface AvailableQuote {
  readonly status: "Ok";
  readonly asset: Asset;
  readonly priceUsd: number;
  readonly fetchedAt: number; // epoch ms
}

export interface UnavailableQuote {
  readonly status: "Unavailable";
  readonly asset: Asset;
  readonly fetchedAt: number; // epoch ms
}

export type Quote = AvailableQuote | UnavailableQuote;

export const Available = (
  asset: Asset,
  priceUsd: number,
  fetchedAt: number,
): AvailableQuote => ({ status: "Ok", asset, priceUsd, fetchedAt });

export const Unavailable = (
  asset: Asset,
  fetchedAt: number,
): UnavailableQuote => ({ status: "Unavailable", asset, fetchedAt });

/** The value as a price, if it is a finite non-negative number. */
export function validPrice(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value >= 0
    ? value
    : undefined;
}

export function quoteFor(
  asset: Asset,
  value: unknown,
  fetchedAt: number,
): Quote {
  const price = validPrice(value);
  return price === undefined
    ? Unavailable(asset, fetchedAt)
    : Available(asset, price, fetchedAt);
}

// --- Refresh result ---

export interface RefreshResult {
  readonly quotes: ReadonlyArray<Quote>;
  readonly partialFailure: boolean;
  readonly failures: ReadonlyArray<ProviderError>; // whole-batch failures, crypto first
  readonly completedAt: number; // epoch ms
}
