// Trigger boundary — wires "refresh requested" to the aggregator and board.

import { Effect, type Fiber } from "effect";
import { refresh, type RefreshOptions } from "./aggregator.ts";
import type { QuoteBoard } from "./board.ts";
import type { CryptoQuotes, FiatRates } from "./market-data.ts";

export interface RefreshController {
  /** Start a refresh in the background and hand its result to the board.
   *  Returns at once with the background fiber, which succeeds with whether
   *  the board drew the result. */
  readonly onRefreshRequested: Effect.Effect<Fiber.RuntimeFiber<boolean>>;
}

export function makeRefreshController(
  board: QuoteBoard,
  options: RefreshOptions = {},
): Effect.Effect<RefreshController, never, CryptoQuotes | FiatRates> {
  return Effect.gen(function* () {
    const context = yield* Effect.context<CryptoQuotes | FiatRates>();

    return {
      onRefreshRequested: refresh(options).pipe(
        Effect.flatMap(board.render),
        Effect.provide(context),
        Effect.forkDaemon,
      ),
    } satisfies RefreshController;
  });
}
