import { Effect, Schema } from "effect";
import type { HttpClient } from "@effect/platform";
import { getJson, joinUrl } from "./http.js";
import type { NetworkDataNotAvailableError, RequestPolicy } from "./types.js";

const SimplePriceSchema = Schema.Struct({
  bitcoin: Schema.Struct({
    eur: Schema.Number,
  }),
});

export const fetchBtcPriceEur = (
  httpClient: HttpClient.HttpClient,
  baseUrl: string,
  policy: RequestPolicy
): Effect.Effect<number, NetworkDataNotAvailableError> =>
  getJson(
    httpClient,
    joinUrl(baseUrl, "/api/v3/simple/price?ids=bitcoin&vs_currencies=eur"),
    SimplePriceSchema,
    "coingecko",
    policy
  ).pipe(
    Effect.map((response) => response.bitcoin.eur)
  );
