import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"
import * as Sentry from "@sentry/node";
import { App } from './app.js';
import { networkDataLayer } from './layers.js';
import { NetworkDataSource } from './network-data/types.js';
import { loadCalculatorSettings, readCliFlags } from './settings.js';

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  enabled: process.env.SENTRY_DSN !== undefined,
  tracesSampleRate: 1.0,
});

const flags = readCliFlags(process.argv);

const program = Effect.gen(function*() {
  const settings = yield* loadCalculatorSettings(flags);

  yield* Effect.log(`Estimating ${settings.hardware.name} x${settings.energy.machineCount} in ${settings.displayCurrency}`);

  const app = new App(yield* NetworkDataSource, settings);

  yield* app.run();
}).pipe(
  Effect.tapError((err) => Effect.sync(() => Sentry.captureException(err))),
  Effect.tapErrorTag("NetworkDataNotAvailable", (err) =>
    Effect.logError(`Network data unavailable (${err.source}). Run with --offline to use configured values.`)
  ),
  Effect.ensuring(Effect.promise(() => Sentry.flush(2_000))),
  Effect.provide(networkDataLayer(flags.offline)),
  Effect.provide(NodeHttpClient.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
