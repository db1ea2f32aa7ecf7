import { Effect } from "effect";
import type { ConfigError } from "effect/ConfigError";
import { AppConfig } from "./config.js";
import type { DisplayCurrency } from "./currency/money.js";
import {
  CUSTOM_HARDWARE,
  customHardware,
  findHardware,
  type UnknownHardwareError,
} from "./hardware/catalog.js";
import type {
  EnergyConfig,
  HardwareProfile,
  ModelParameters,
} from "./profitability/types.js";

export type CalculatorSettings = {
  readonly hardware: HardwareProfile;
  readonly energy: EnergyConfig;
  readonly displayCurrency: DisplayCurrency;
  readonly parameters: ModelParameters;
};

export type CliFlags = {
  readonly usd: boolean;
  readonly offline: boolean;
};

export const readCliFlags = (argv: readonly string[]): CliFlags => ({
  usd: argv.includes("--usd"),
  offline: argv.includes("--offline"),
});

const loadHardware: Effect.Effect<HardwareProfile, ConfigError | UnknownHardwareError> = Effect.gen(function* () {
  const config = AppConfig.miner;
  const model = yield* config.model;

  if (model === CUSTOM_HARDWARE) {
    return customHardware({
      hashrateThs: yield* config.hashrateThs,
      powerWatts: yield* config.powerWatts,
      price: yield* config.price,
    });
  }

  return yield* findHardware(model);
});

// Only the parameters of the sources the mode uses are read.
const loadEnergy: Effect.Effect<EnergyConfig, ConfigError> = Effect.gen(function* () {
  const config = AppConfig.energy;
  const mode = yield* config.mode;

  const solar = mode === "grid"
    ? undefined
    : {
      sunHoursPerDay: yield* config.sunHoursPerDay,
      daysPerYear: yield* config.solarDaysPerYear,
      feedInPricePerKwh: yield* config.feedInPricePerKwh,
    };

  const grid = mode === "solar"
    ? undefined
    : {
      pricePerKwh: yield* config.gridPricePerKwh,
      hoursPerDay: yield* config.gridHoursPerDay,
      daysPerYear: yield* config.gridDaysPerYear,
    };

  return {
    machineCount: yield* AppConfig.miner.machineCount,
    mode,
    ...(solar === undefined ? {} : { solar }),
    ...(grid === undefined ? {} : { grid }),
  };
});

const loadModelParameters: Effect.Effect<ModelParameters, ConfigError> = Effect.all(AppConfig.model);

export const loadCalculatorSettings = (
  flags: CliFlags
): Effect.Effect<CalculatorSettings, ConfigError | UnknownHardwareError> =>
  Effect.gen(function* () {
    const displayCurrency: DisplayCurrency = flags.usd ? "USD" : yield* AppConfig.display.currency;

    return {
      hardware: yield* loadHardware,
      energy: yield* loadEnergy,
      displayCurrency,
      parameters: yield* loadModelParameters,
    };
  });
