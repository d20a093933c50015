// Market data — service definitions and domain errors.

import { Context, Data, Effect } from "effect";
import type { Asset, Quote } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

/** A pair or coin the provider does not know. Adapters turn this into an
 *  Unavailable quote; it never leaves an adapter. */
export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

/** Why a provider produced no usable data. */
export type ProviderFailure =
  | NetworkError
  | HttpError
  | ParseError
  | ServiceError;

/** One provider's whole batch failed for this refresh. */
export class ProviderError extends Data.TaggedError("ProviderError")<{
  readonly provider: string;
  readonly reason: ProviderFailure;
}> {}

/** Wrap every failure of `effect` as a ProviderError for `provider`. */
export const asProviderError =
  (provider: string) =>
  <A, R>(
    effect: Effect.Effect<A, ProviderFailure, R>,
  ): Effect.Effect<A, ProviderError, R> =>
    Effect.mapError(effect, (reason) => new ProviderError({ provider, reason }));

// --- Services ---

export class CryptoQuotes extends Context.Tag("CryptoQuotes")<
  CryptoQuotes,
  {
    readonly name: string;
    readonly fetchCryptoQuotes: (
      assets: ReadonlyArray<Asset>,
    ) => Effect.Effect<ReadonlyArray<Quote>, ProviderError>;
  }
>() {}

export class FiatRates extends Context.Tag("FiatRates")<
  FiatRates,
  {
    readonly name: string;
    readonly fetchFiatRates: (
      assets: ReadonlyArray<Asset>,
    ) => Effect.Effect<ReadonlyArray<Quote>, ProviderError>;
  }
>() {}
