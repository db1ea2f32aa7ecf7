import { Duration, Effect, Schedule, Schema, type Scope } from "effect";
import type { ParseError } from "effect/ParseResult";
import type { HttpClient, HttpClientResponse } from "@effect/platform";
import type { HttpClientError } from "@effect/platform/HttpClientError";
import {
  NetworkDataNotAvailableError,
  type NetworkDataSourceName,
  type RequestPolicy,
} from "./types.js";

export const joinUrl = (baseUrl: string, path: string): string =>
  `${baseUrl.replace(/\/+$/, "")}${path}`;

const send = (
  httpClient: HttpClient.HttpClient,
  url: string,
  source: NetworkDataSourceName
): Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError | NetworkDataNotAvailableError, Scope.Scope> =>
  Effect.gen(function* () {
    const response = yield* httpClient.get(url, {
      headers: { Accept: "application/json" },
    });

    if (response.status !== 200) {
      const body = yield* response.text;
      return yield* Effect.fail(
        new NetworkDataNotAvailableError({
          source,
          message: `${url} returned status ${response.status}. Body: ${body}`,
        })
      );
    }

    return response;
  });

const withRequestPolicy = <A>(
  effect: Effect.Effect<A, HttpClientError | ParseError | NetworkDataNotAvailableError>,
  url: string,
  source: NetworkDataSourceName,
  policy: RequestPolicy
): Effect.Effect<A, NetworkDataNotAvailableError> =>
  effect.pipe(
    Effect.timeout(Duration.millis(policy.timeoutMs)),
    Effect.retry({
      schedule: Schedule.compose(
        Schedule.recurs(policy.retries),
        Schedule.exponential(Duration.seconds(1), 2) // 1s, 2s, 4s, ...
      ),
      while: (err) =>
        err._tag === "TimeoutException" || (err._tag === "RequestError" && err.reason === "Transport"),
    }),
    Effect.catchTags({
      TimeoutException: (cause) =>
        Effect.fail(new NetworkDataNotAvailableError({
          source,
          message: `${url} did not answer within ${policy.timeoutMs}ms`,
          cause,
        })),
      RequestError: (cause) =>
        Effect.fail(new NetworkDataNotAvailableError({
          source,
          message: `Could not reach ${url}: ${cause.message}`,
          cause,
        })),
      ResponseError: (cause) =>
        Effect.fail(new NetworkDataNotAvailableError({
          source,
          message: `Could not read the response of ${url}: ${cause.message}`,
          cause,
        })),
      ParseError: (cause) =>
        Effect.fail(new NetworkDataNotAvailableError({
          source,
          message: `Unrecognized response from ${url}`,
          cause,
        })),
    }),
    Effect.withSpan("network-data.fetch", { attributes: { url, source } })
  );

export const getJson = <A, I>(
  httpClient: HttpClient.HttpClient,
  url: string,
  schema: Schema.Schema<A, I>,
  source: NetworkDataSourceName,
  policy: RequestPolicy
): Effect.Effect<A, NetworkDataNotAvailableError> =>
  withRequestPolicy(
    Effect.gen(function* () {
      const response = yield* send(httpClient, url, source);
      const body = yield* response.json;

      yield* Effect.logDebug(`Response from ${url}`, body);

      return yield* Schema.decodeUnknown(schema)(body);
    }).pipe(Effect.scoped),
    url,
    source,
    policy
  );

export const getText = (
  httpClient: HttpClient.HttpClient,
  url: string,
  source: NetworkDataSourceName,
  policy: RequestPolicy
): Effect.Effect<string, NetworkDataNotAvailableError> =>
  withRequestPolicy(
    Effect.gen(function* () {
      const response = yield* send(httpClient, url, source);
      return (yield* response.text).trim();
    }).pipe(Effect.scoped),
    url,
    source,
    policy
  );
