import { Duration, Effect } from "effect";
import { HttpClient, HttpClientResponse } from "@effect/platform";
import { describe, it, expect, vitest, beforeEach } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import type { IEventLogger } from "../event-logger/types.js";
import { MempoolSpaceClient, type MempoolSpaceConfig } from "./mempool-space.client.js";

type Route = { readonly status?: number; readonly body: unknown };

// Answers by path; unknown paths get a 404
const makeRoutingHttpClient = (routes: Record<string, Route>): HttpClient.HttpClient =>
  HttpClient.make((req) => {
    const route = routes[new URL(req.url).pathname];
    const body = route === undefined
      ? "not found"
      : typeof route.body === "string" ? route.body : JSON.stringify(route.body);

    return Effect.succeed(HttpClientResponse.fromWeb(
      req,
      new Response(body, {
        status: route?.status ?? (route === undefined ? 404 : 200),
        headers: { 'Content-Type': 'application/json' },
      })
    ));
  });

describe("MempoolSpaceClient", () => {
  const config: MempoolSpaceConfig = {
    baseUrl: "https://mempool.test/",
    policy: { timeoutMs: 5_000, retries: 0 },
    blockSubsidyBtc: 3.125,
    feeFallbackBlockCount: 2,
    feeFallbackDelay: Duration.zero,
  };

  const eventLoggerMock: MockedObject<IEventLogger> = {
    onSnapshotRefreshed: vitest.fn(),
    onFeeFallback: vitest.fn(),
  };

  beforeEach(() => {
    vitest.clearAllMocks();
    eventLoggerMock.onFeeFallback.mockReturnValue(Effect.void);
  });

  it.effect("should convert the network hashrate to TH/s", () => Effect.gen(function* () {
    const client = new MempoolSpaceClient(config, makeRoutingHttpClient({
      "/api/v1/mining/hashrate/3d": { body: { currentHashrate: 5e20, currentDifficulty: 1 } },
    }), eventLoggerMock);

    expect(yield* client.getNetworkHashrateThs()).toBe(500_000_000);
  }));

  it.effect("should average the daily fee statistics of blocks with fees", () => Effect.gen(function* () {
    const client = new MempoolSpaceClient(config, makeRoutingHttpClient({
      "/api/v1/mining/blocks/fees/24h": {
        body: [
          { avgHeight: 1, avgFees: 2_000_000 },
          { avgHeight: 2, avgFees: 0 },
          { avgHeight: 3, avgFees: 3_000_000 },
        ],
      },
    }), eventLoggerMock);

    expect(yield* client.getAverageFeePerBlockBtc()).toBe(0.025);
    expect(eventLoggerMock.onFeeFallback).not.toHaveBeenCalled();
  }));

  it.effect("should fall back to the coinbase of recent blocks", () => Effect.gen(function* () {
    const client = new MempoolSpaceClient(config, makeRoutingHttpClient({
      "/api/v1/mining/blocks/fees/24h": { body: [] },
      "/api/blocks": { body: [{ height: 100 }, { height: 101 }, { height: 102 }] },
      "/api/block-height/100": { body: "hash100" },
      "/api/block-height/101": { status: 500, body: "unavailable" },
      "/api/block/hash100/txids": { body: ["coinbase100", "tx1"] },
      "/api/tx/coinbase100": { body: { vout: [{ value: 312_500_000 }, { value: 2_000_000 }, { value: 0 }] } },
      // outside the configured block count
      "/api/block-height/102": { body: "hash102" },
    }), eventLoggerMock);

    expect(yield* client.getAverageFeePerBlockBtc()).toBe(0.02);
    expect(eventLoggerMock.onFeeFallback).toHaveBeenCalledWith(
      "https://mempool.test/api/v1/mining/blocks/fees/24h reported no block with fees"
    );
  }));

  it.effect("should fail when no recent block can be analysed", () => Effect.gen(function* () {
    const client = new MempoolSpaceClient(config, makeRoutingHttpClient({
      "/api/blocks": { body: [{ height: 100 }] },
    }), eventLoggerMock);

    const error = yield* Effect.flip(client.getAverageFeePerBlockBtc());

    expect(error._tag).toBe("NetworkDataNotAvailable");
    expect(error.source).toBe("mempool-fees");
    expect(error.message).toBe("No recent block could be analysed for fees");
    expect(eventLoggerMock.onFeeFallback).toHaveBeenCalledTimes(1);
  }));
});
