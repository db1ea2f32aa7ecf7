import { Schema } from "effect";
import type { DisplayCurrency, Eur } from "../currency/money.js";

const FiniteNumber = Schema.Number.pipe(
  Schema.finite({ message: () => "must be a finite number" })
);

const positive = () =>
  FiniteNumber.pipe(
    Schema.positive({ message: () => "must be greater than 0" })
  );

const nonNegative = () =>
  FiniteNumber.pipe(
    Schema.nonNegative({ message: () => "must not be negative" })
  );

const within = (min: number, max: number) =>
  FiniteNumber.pipe(
    Schema.between(min, max, {
      message: () => `must be between ${min} and ${max}`,
    })
  );

export const HardwareProfileSchema = Schema.Struct({
  name: Schema.String,
  hashrateThs: positive(),
  powerWatts: nonNegative(),
  // purchase price per machine, EUR
  price: nonNegative(),
});

export type HardwareProfile = typeof HardwareProfileSchema.Type;

export const EnergyModeSchema = Schema.Literal("solar", "grid", "hybrid");

export type EnergyMode = typeof EnergyModeSchema.Type;

export const SolarConfigSchema = Schema.Struct({
  sunHoursPerDay: within(0, 24),
  daysPerYear: within(0, 365),
  // what the unused energy would earn if exported instead
  feedInPricePerKwh: Schema.optionalWith(nonNegative(), { exact: true }),
});

export type SolarConfig = typeof SolarConfigSchema.Type;

export const GridConfigSchema = Schema.Struct({
  pricePerKwh: nonNegative(),
  hoursPerDay: within(0, 24),
  daysPerYear: Schema.optionalWith(within(0, 365), { exact: true }),
});

export type GridConfig = typeof GridConfigSchema.Type;

export const EnergyConfigSchema = Schema.Struct({
  machineCount: Schema.Number.pipe(
    Schema.int({ message: () => "must be an integer" }),
    Schema.between(1, 1000, {
      message: () => "must be between 1 and 1000",
    })
  ),
  mode: EnergyModeSchema,
  solar: Schema.optionalWith(SolarConfigSchema, { exact: true }),
  grid: Schema.optionalWith(GridConfigSchema, { exact: true }),
}).pipe(
  Schema.filter((config) => {
    if (config.mode !== "grid" && config.solar === undefined) {
      return `mode "${config.mode}" requires solar parameters`;
    }
    if (config.mode !== "solar" && config.grid === undefined) {
      return `mode "${config.mode}" requires grid parameters`;
    }
    return undefined;
  })
);

export type EnergyConfig = typeof EnergyConfigSchema.Type;

export const NetworkSnapshotSchema = Schema.Struct({
  btcPriceEur: positive(),
  eurUsdRate: positive(),
  networkHashrateThs: positive(),
  avgFeePerBlockBtc: nonNegative(),
  fetchedAtMs: Schema.optionalWith(Schema.Number, { exact: true }),
});

export type NetworkSnapshot = typeof NetworkSnapshotSchema.Type;

export const ModelParametersSchema = Schema.Struct({
  blockSubsidyBtc: positive(),
  blockIntervalSeconds: positive(),
  poolFeeRate: within(0, 1),
  solarYieldFactor: FiniteNumber.pipe(
    Schema.greaterThan(0, { message: () => "must be greater than 0" }),
    Schema.lessThanOrEqualTo(1, { message: () => "must be at most 1" })
  ),
  soloWindowSeconds: positive(),
  amortizationYears: positive(),
  projectionYears: Schema.Number.pipe(
    Schema.int({ message: () => "must be an integer" }),
    Schema.between(1, 50, {
      message: () => "must be between 1 and 50",
    })
  ),
});

export type ModelParameters = typeof ModelParametersSchema.Type;

export type UndefinedReason =
  | "NonPositiveNetRevenue"
  | "NoActiveHours";

export type UndefinedResult = {
  readonly _tag: "UndefinedResult";
  readonly reason: UndefinedReason;
};

export type Defined<A> = {
  readonly _tag: "Defined";
  readonly value: A;
};

export type Estimate<A> = Defined<A> | UndefinedResult;

export type SoloMiningOdds =
  | { readonly _tag: "OneIn"; readonly n: number }
  | { readonly _tag: "Certain" }
  | { readonly _tag: "Negligible" };

export type SoloMiningEstimate = {
  readonly windowSeconds: number;
  readonly probability: number;
  readonly odds: SoloMiningOdds;
};

export type SourceEconomics = {
  readonly hoursPerYear: number;
  readonly energyKwh: number;
  readonly grossRevenue: Eur;
  readonly poolFee: Eur;
  readonly energyCost: Eur;
  readonly netRevenue: Eur;
  // seconds until cumulative net revenue covers the investment
  readonly breakeven: Estimate<number>;
};

export type CostToMineOneBtc = {
  readonly energy: Eur;
  readonly poolFee: Eur;
  readonly amortization: Eur;
  readonly total: Eur;
};

export type AmortizationPoint = {
  readonly year: number;
  readonly cumulativeNetRevenue: Eur;
};

export type ResultDisplay = {
  readonly currency: DisplayCurrency;
  readonly efficiency: string;
  readonly costPerTh: string;
  readonly energyCostPerTerahash: string;
  readonly hashprice: string;
  readonly eurToMine1Btc: string;
  readonly timeToMine1Btc: string;
  readonly investment: string;
  readonly breakeven: string;
  readonly breakevenSolar: string;
  readonly breakevenGrid: string;
  readonly netProfit5Years: string;
  readonly netProfit10Years: string;
  readonly soloMining: string;
  readonly pvPower: string;
};

// Reference-currency figures, independent of how they are displayed
export type ProfitabilityFigures = {
  readonly efficiencyWPerTh: number;
  readonly costPerThEur: Eur;
  readonly energyCostPerTerahashEur: Estimate<Eur>;
  readonly hashpriceEurPerPhDay: Eur;
  readonly eurToMine1Btc: Estimate<CostToMineOneBtc>;
  // seconds of wall-clock time
  readonly timeToMine1Btc: Estimate<number>;
  readonly btcPerYear: number;
  readonly investment: Eur;
  readonly breakevenPoint: Estimate<number>;
  readonly netProfit5Years: Eur;
  readonly netProfit10Years: Eur;
  readonly sources: {
    readonly solar: SourceEconomics;
    readonly grid: SourceEconomics;
    readonly combined: SourceEconomics;
  };
  readonly pvPowerKwp: number;
  readonly amortization: readonly AmortizationPoint[];
  readonly soloMining: SoloMiningEstimate;
};

export type ProfitabilityResult = ProfitabilityFigures & {
  readonly display: ResultDisplay;
};
