import { Clock, Duration, Effect, Layer } from "effect";
import { HttpClient } from "@effect/platform";
import { AppConfig } from "../config.js";
import type { IEventLogger } from "../event-logger/types.js";
import { EventLogger } from "../event-logger/index.js";
import type { NetworkSnapshot } from "../profitability/types.js";
import { fetchBtcPriceEur } from "./coingecko.client.js";
import { fetchEurUsdRate } from "./frankfurter.client.js";
import { MempoolSpaceClient } from "./mempool-space.client.js";
import {
  NetworkDataSource,
  type INetworkDataSource,
  type NetworkDataNotAvailableError,
  type RequestPolicy,
} from "./types.js";

export type LiveNetworkDataConfig = {
  readonly mempoolBaseUrl: string;
  readonly coingeckoBaseUrl: string;
  readonly frankfurterBaseUrl: string;
  readonly policy: RequestPolicy;
  readonly blockSubsidyBtc: number;
  readonly feeFallbackBlockCount: number;
  readonly feeFallbackDelay: Duration.DurationInput;
};

export class LiveNetworkDataSource implements INetworkDataSource {
  private readonly mempool: MempoolSpaceClient;

  constructor(
    private readonly config: LiveNetworkDataConfig,
    private readonly httpClient: HttpClient.HttpClient,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) {
    this.mempool = new MempoolSpaceClient(
      {
        baseUrl: config.mempoolBaseUrl,
        policy: config.policy,
        blockSubsidyBtc: config.blockSubsidyBtc,
        feeFallbackBlockCount: config.feeFallbackBlockCount,
        feeFallbackDelay: config.feeFallbackDelay,
      },
      httpClient,
      eventLogger
    );
  }

  public getSnapshot(): Effect.Effect<NetworkSnapshot, NetworkDataNotAvailableError> {
    const { config, httpClient, mempool, eventLogger } = this;

    return Effect.gen(function* () {
      const values = yield* Effect.all(
        {
          btcPriceEur: fetchBtcPriceEur(httpClient, config.coingeckoBaseUrl, config.policy),
          eurUsdRate: fetchEurUsdRate(httpClient, config.frankfurterBaseUrl, config.policy),
          networkHashrateThs: mempool.getNetworkHashrateThs(),
          avgFeePerBlockBtc: mempool.getAverageFeePerBlockBtc(),
        },
        { concurrency: "unbounded" }
      );

      const snapshot: NetworkSnapshot = {
        ...values,
        fetchedAtMs: yield* Clock.currentTimeMillis,
      };

      yield* eventLogger.onSnapshotRefreshed(snapshot);

      return snapshot;
    }).pipe(
      Effect.withSpan("network-data.snapshot")
    );
  }
}

export const LiveNetworkDataLayer = Layer.effect(
  NetworkDataSource,
  Effect.gen(function* () {
    const config = AppConfig.api;

    return new LiveNetworkDataSource(
      {
        mempoolBaseUrl: yield* config.mempoolBaseUrl,
        coingeckoBaseUrl: yield* config.coingeckoBaseUrl,
        frankfurterBaseUrl: yield* config.frankfurterBaseUrl,
        policy: {
          timeoutMs: yield* config.timeoutMs,
          retries: yield* config.retries,
        },
        blockSubsidyBtc: yield* AppConfig.model.blockSubsidyBtc,
        feeFallbackBlockCount: yield* config.feeFallbackBlockCount,
        feeFallbackDelay: Duration.millis(yield* config.feeFallbackDelayMs),
      },
      yield* HttpClient.HttpClient
    );
  })
);
