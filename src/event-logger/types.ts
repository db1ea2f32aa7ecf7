import type { Effect } from "effect";
import type { NetworkSnapshot } from "../profitability/types.js";

export type IEventLogger = {
  onSnapshotRefreshed: (snapshot: NetworkSnapshot) => Effect.Effect<void>;
  onFeeFallback: (reason: string) => Effect.Effect<void>;
};
