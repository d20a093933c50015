import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, Console, Effect, Fiber, Layer } from "effect";
import { DEFAULT_TIMEOUT } from "./src/aggregator.ts";
import { makeQuoteBoard } from "./src/board.ts";
import { formatBoard } from "./src/format.ts";
import { makeRefreshController } from "./src/refresh-controller.ts";
import { CoinGeckoLive } from "./src/providers/coingecko.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { FrankfurterLive } from "./src/providers/frankfurter.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";

// --- CLI ---

const tab = Options.choice("tab", ["all", "crypto", "fiat"]).pipe(
  Options.withDescription("Which prices to show"),
  Options.withDefault("all" as const),
);

const interactive = Options.boolean("interactive").pipe(
  Options.withAlias("i"),
  Options.withDescription("Offer another refresh after each render"),
);

const refreshAgain = Prompt.confirm({
  message: "Refresh prices again?",
  initial: true,
});

const command = Command.make("market-board", { tab, interactive }).pipe(
  Command.withHandler(({ tab, interactive }) =>
    Effect.gen(function* () {
      const timeout = yield* Config.duration("REFRESH_TIMEOUT").pipe(
        Config.withDefault(DEFAULT_TIMEOUT),
      );
      const board = yield* makeQuoteBoard((result) =>
        Console.log(formatBoard(result, tab))
      );
      const controller = yield* makeRefreshController(board, { timeout });

      const refreshOnce = controller.onRefreshRequested.pipe(
        Effect.flatMap(Fiber.join),
      );

      yield* refreshOnce;
      while (interactive && (yield* Prompt.run(refreshAgain))) {
        yield* refreshOnce;
      }
    })
  ),
);

// --- Layers ---
// MARKET_DATA_PROVIDER: "live" (default) or "test".
// FIAT_PROVIDER: "yahoo" (default) or "frankfurter".

const FiatRatesLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("FIAT_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    return provider === "frankfurter" ? FrankfurterLive : YahooFinanceLive;
  }),
);

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("MARKET_DATA_PROVIDER").pipe(
      Config.withDefault("live"),
    );
    switch (provider) {
      case "test":
        return MarketDataTestLive;
      default:
        return Layer.merge(CoinGeckoLive, FiatRatesLive);
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "market-board",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(MarketDataLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
