import { Duration, Effect, Option, Schema } from "effect";
import type { HttpClient } from "@effect/platform";
import type { IEventLogger } from "../event-logger/types.js";
import { EventLogger } from "../event-logger/index.js";
import { getJson, getText, joinUrl } from "./http.js";
import { NetworkDataNotAvailableError, type RequestPolicy } from "./types.js";

const SATS_PER_BTC = 100_000_000;
const HASHES_PER_TERAHASH = 1e12;

export type MempoolSpaceConfig = {
  readonly baseUrl: string;
  readonly policy: RequestPolicy;
  readonly blockSubsidyBtc: number;
  // latest blocks inspected when the 24h fee statistics are unusable
  readonly feeFallbackBlockCount: number;
  readonly feeFallbackDelay: Duration.DurationInput;
};

const HashrateSchema = Schema.Struct({
  currentHashrate: Schema.Number,
});

const BlockFeesSchema = Schema.Array(
  Schema.Struct({
    avgHeight: Schema.optional(Schema.Number),
    avgFees: Schema.optional(Schema.Number),
  })
);

const RecentBlocksSchema = Schema.Array(
  Schema.Struct({
    height: Schema.Number,
  })
);

const TxidsSchema = Schema.NonEmptyArray(Schema.String);

const TransactionSchema = Schema.Struct({
  vout: Schema.Array(
    Schema.Struct({
      value: Schema.Number,
    })
  ),
});

const average = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

export class MempoolSpaceClient {
  constructor(
    private readonly config: MempoolSpaceConfig,
    private readonly httpClient: HttpClient.HttpClient,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  public getNetworkHashrateThs(): Effect.Effect<number, NetworkDataNotAvailableError> {
    return getJson(
      this.httpClient,
      joinUrl(this.config.baseUrl, "/api/v1/mining/hashrate/3d"),
      HashrateSchema,
      "mempool-hashrate",
      this.config.policy
    ).pipe(
      Effect.map((response) => response.currentHashrate / HASHES_PER_TERAHASH)
    );
  }

  /**
   * Average transaction fees collected per block, in BTC. Uses the 24h block
   * fee statistics and falls back to summing the coinbase outputs of the
   * latest blocks.
   */
  public getAverageFeePerBlockBtc(): Effect.Effect<number, NetworkDataNotAvailableError> {
    const eventLogger = this.eventLogger;

    return this.getFeesFromDailyStatistics().pipe(
      Effect.catchTag("NetworkDataNotAvailable", (err) =>
        eventLogger.onFeeFallback(err.message).pipe(
          Effect.zipRight(this.getFeesFromRecentBlocks())
        )
      )
    );
  }

  private getFeesFromDailyStatistics(): Effect.Effect<number, NetworkDataNotAvailableError> {
    const url = joinUrl(this.config.baseUrl, "/api/v1/mining/blocks/fees/24h");

    return getJson(this.httpClient, url, BlockFeesSchema, "mempool-fees", this.config.policy).pipe(
      Effect.flatMap((entries) => {
        const fees = entries.flatMap((entry) =>
          entry.avgFees !== undefined && entry.avgFees > 0 ? [entry.avgFees] : []
        );

        if (fees.length === 0) {
          return Effect.fail(new NetworkDataNotAvailableError({
            source: "mempool-fees",
            message: `${url} reported no block with fees`,
          }));
        }

        return Effect.succeed(Number((average(fees) / SATS_PER_BTC).toFixed(6)));
      })
    );
  }

  private getFeesFromRecentBlocks(): Effect.Effect<number, NetworkDataNotAvailableError> {
    const config = this.config;
    const httpClient = this.httpClient;
    const getCoinbaseFees = (height: number) => this.getCoinbaseFeesBtc(height);

    return Effect.gen(function* () {
      const blocks = yield* getJson(
        httpClient,
        joinUrl(config.baseUrl, "/api/blocks"),
        RecentBlocksSchema,
        "mempool-fees",
        config.policy
      );

      const delay = Duration.decode(config.feeFallbackDelay);
      const fees: number[] = [];

      for (const [index, block] of blocks.slice(0, config.feeFallbackBlockCount).entries()) {
        if (index > 0 && Duration.greaterThan(delay, Duration.zero)) {
          yield* Effect.sleep(delay);
        }

        const fee = yield* getCoinbaseFees(block.height).pipe(
          Effect.map(Option.some),
          Effect.catchTag("NetworkDataNotAvailable", (err) =>
            Effect.logDebug(`Skipping block ${block.height}: ${err.message}`).pipe(
              Effect.as(Option.none<number>())
            )
          )
        );

        if (Option.isSome(fee)) {
          fees.push(fee.value);
        }
      }

      if (fees.length === 0) {
        return yield* Effect.fail(new NetworkDataNotAvailableError({
          source: "mempool-fees",
          message: "No recent block could be analysed for fees",
        }));
      }

      yield* Effect.logDebug(`Average fees over ${fees.length} recent blocks`, fees);

      return Number(average(fees).toFixed(6));
    });
  }

  // coinbase outputs minus the block subsidy
  private getCoinbaseFeesBtc(height: number): Effect.Effect<number, NetworkDataNotAvailableError> {
    const { baseUrl, policy, blockSubsidyBtc } = this.config;
    const httpClient = this.httpClient;

    return Effect.gen(function* () {
      const hash = yield* getText(httpClient, joinUrl(baseUrl, `/api/block-height/${height}`), "mempool-fees", policy);
      const [coinbaseTxid] = yield* getJson(
        httpClient,
        joinUrl(baseUrl, `/api/block/${hash}/txids`),
        TxidsSchema,
        "mempool-fees",
        policy
      );
      const coinbase = yield* getJson(
        httpClient,
        joinUrl(baseUrl, `/api/tx/${coinbaseTxid}`),
        TransactionSchema,
        "mempool-fees",
        policy
      );

      const rewardSats = coinbase.vout.reduce((sum, output) => sum + output.value, 0);

      return rewardSats / SATS_PER_BTC - blockSubsidyBtc;
    });
  }
}
