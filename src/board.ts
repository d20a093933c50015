// Quote board — Effect shell.
//
// Presentation adapter: owns the display state in a Ref, applies each
// RefreshResult through the pure `accept` transition, and draws the ones it
// accepts.

import { Effect, Option, Ref } from "effect";
import type { RefreshResult } from "./domain.ts";
import { accept, type BoardState, initialState } from "./board-state.ts";

export type { BoardState } from "./board-state.ts";

export interface QuoteBoard {
  /** Show `result` unless a newer one is already shown. Succeeds with
   *  whether it was drawn. */
  readonly render: (result: RefreshResult) => Effect.Effect<boolean>;

  /** The result currently on screen. */
  readonly current: Effect.Effect<Option.Option<RefreshResult>>;
}

export function makeQuoteBoard(
  draw: (result: RefreshResult) => Effect.Effect<void>,
): Effect.Effect<QuoteBoard> {
  return Effect.gen(function* () {
    const ref = yield* Ref.make<BoardState>(initialState);

    const render = (result: RefreshResult): Effect.Effect<boolean> =>
      Effect.gen(function* () {
        const decision = yield* Ref.modify(ref, (s) => accept(s, result));

        if (decision === "discard") {
          yield* Effect.logDebug("[board] discarding stale refresh result");
          return false;
        }

        yield* draw(result);
        return true;
      });

    return {
      render,
      current: Ref.get(ref).pipe(
        Effect.map((s) =>
          s._tag === "Showing" ? Option.some(s.result) : Option.none()
        ),
      ),
    } satisfies QuoteBoard;
  });
}
