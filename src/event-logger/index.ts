import type { IEventLogger } from "./types.js";
import type { NetworkSnapshot } from "../profitability/types.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onSnapshotRefreshed(snapshot: NetworkSnapshot) {
    return Effect.log(
      `Network data refreshed. BTC: ${snapshot.btcPriceEur} EUR, EUR/USD: ${snapshot.eurUsdRate}, ` +
      `hashrate: ${(snapshot.networkHashrateThs / 1e6).toFixed(2)} EH/s, fees: ${snapshot.avgFeePerBlockBtc} BTC/block`
    );
  }

  public onFeeFallback(reason: string) {
    return Effect.logWarning(`Falling back to per-block fee analysis: ${reason}`);
  }
}
