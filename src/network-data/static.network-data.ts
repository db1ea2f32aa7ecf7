import { Clock, Effect, Layer } from "effect";
import { AppConfig } from "../config.js";
import type { NetworkSnapshot } from "../profitability/types.js";
import { NetworkDataSource, type INetworkDataSource } from "./types.js";

const THS_PER_EHS = 1e6;

// Serves a fixed snapshot, for running without network access.
export class StaticNetworkDataSource implements INetworkDataSource {
  constructor(private readonly snapshot: NetworkSnapshot) { }

  public getSnapshot() {
    const snapshot = this.snapshot;

    return Effect.gen(function* () {
      yield* Effect.logDebug("Using configured network data");

      return snapshot.fetchedAtMs === undefined
        ? { ...snapshot, fetchedAtMs: yield* Clock.currentTimeMillis }
        : snapshot;
    });
  }
}

export const StaticNetworkDataLayer = Layer.effect(
  NetworkDataSource,
  Effect.gen(function* () {
    const config = AppConfig.offline;

    return new StaticNetworkDataSource({
      btcPriceEur: yield* config.btcPriceEur,
      eurUsdRate: yield* config.eurUsdRate,
      networkHashrateThs: (yield* config.networkHashrateEhs) * THS_PER_EHS,
      avgFeePerBlockBtc: yield* config.avgFeePerBlockBtc,
    });
  })
);
