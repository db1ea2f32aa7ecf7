import { Context, Data, Effect } from "effect";
import type { NetworkSnapshot } from "../profitability/types.js";

export type NetworkDataSourceName =
  | "frankfurter"
  | "coingecko"
  | "mempool-hashrate"
  | "mempool-fees"
  | "static";

export class NetworkDataNotAvailableError extends Data.TaggedError("NetworkDataNotAvailable")<{
  readonly source: NetworkDataSourceName;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type RequestPolicy = {
  readonly timeoutMs: number;
  // retries after the first attempt, on timeouts and transport errors only
  readonly retries: number;
};

export class NetworkDataSource extends Context.Tag("NetworkDataSource")<
  NetworkDataSource,
  {
    readonly getSnapshot: () => Effect.Effect<NetworkSnapshot, NetworkDataNotAvailableError>;
  }
>() {}

export type INetworkDataSource = Context.Tag.Service<typeof NetworkDataSource>;
