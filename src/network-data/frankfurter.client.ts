import { Effect, Schema } from "effect";
import type { HttpClient } from "@effect/platform";
import { getJson, joinUrl } from "./http.js";
import type { NetworkDataNotAvailableError, RequestPolicy } from "./types.js";

const LatestRatesSchema = Schema.Struct({
  base: Schema.optional(Schema.String),
  rates: Schema.Struct({
    USD: Schema.Number,
  }),
});

// USD per EUR, rounded to 4 decimals
export const fetchEurUsdRate = (
  httpClient: HttpClient.HttpClient,
  baseUrl: string,
  policy: RequestPolicy
): Effect.Effect<number, NetworkDataNotAvailableError> =>
  getJson(
    httpClient,
    joinUrl(baseUrl, "/latest?from=EUR&to=USD"),
    LatestRatesSchema,
    "frankfurter",
    policy
  ).pipe(
    Effect.map((response) => Number(response.rates.USD.toFixed(4)))
  );
