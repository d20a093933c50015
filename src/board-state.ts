// Quote board — pure state machine.
//
// States:
//   Empty   → nothing drawn yet; the first result is always accepted
//   Showing → a result is on screen; an incoming result replaces it only if
//             it completed no earlier (last writer wins by completedAt)
//
// Refreshes can overlap, so a slow one may deliver its result after a newer
// one is already on screen. That stale result is discarded here.

import type { RefreshResult } from "./domain.ts";

// --- State ---

export type Empty = { readonly _tag: "Empty" };
export type Showing = {
  readonly _tag: "Showing";
  readonly result: RefreshResult;
};

export type BoardState = Empty | Showing;

export const Empty: Empty = { _tag: "Empty" };

export const Showing = (result: RefreshResult): Showing => ({
  _tag: "Showing",
  result,
});

export const initialState: BoardState = Empty;

// --- Transitions ---

export type RenderDecision = "accept" | "discard";

/** Decide whether `incoming` replaces what is shown, and the resulting state. */
export function accept(
  state: BoardState,
  incoming: RefreshResult,
): [RenderDecision, BoardState] {
  switch (state._tag) {
    case "Empty":
      return ["accept", Showing(incoming)];
    case "Showing":
      return incoming.completedAt >= state.result.completedAt
        ? ["accept", Showing(incoming)]
        : ["discard", state];
  }
}
