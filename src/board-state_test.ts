import { expect, test } from "vitest";
import { accept, Empty, initialState, Showing } from "./board-state.ts";
import type { RefreshResult } from "./domain.ts";

const resultAt = (completedAt: number): RefreshResult => ({
  quotes: [],
  partialFailure: false,
  failures: [],
  completedAt,
});

const NOW = 1000;

// --- accept ---

test("initialState: nothing shown", () => {
  expect(initialState).toEqual(Empty);
});

test("accept: first result is always accepted", () => {
  const incoming = resultAt(NOW);
  const [decision, next] = accept(Empty, incoming);
  expect(decision).toBe("accept");
  expect(next).toEqual(Showing(incoming));
});

test("accept: newer result replaces the shown one", () => {
  const incoming = resultAt(NOW + 1);
  const [decision, next] = accept(Showing(resultAt(NOW)), incoming);
  expect(decision).toBe("accept");
  expect(next).toEqual(Showing(incoming));
});

test("accept: result completed at the same time replaces the shown one", () => {
  const incoming = resultAt(NOW);
  const [decision, next] = accept(Showing(resultAt(NOW)), incoming);
  expect(decision).toBe("accept");
  expect(next._tag === "Showing" && next.result).toBe(incoming);
});

test("accept: older result is discarded and the state is unchanged", () => {
  const shown = Showing(resultAt(NOW));
  const [decision, next] = accept(shown, resultAt(NOW - 500));
  expect(decision).toBe("discard");
  expect(next).toBe(shown);
});
