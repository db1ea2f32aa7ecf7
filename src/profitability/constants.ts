import type { ModelParameters } from "./types.js";

export const SECONDS_PER_HOUR = 3600;
export const HOURS_PER_DAY = 24;
export const SECONDS_PER_DAY = SECONDS_PER_HOUR * HOURS_PER_DAY;
export const DAYS_PER_YEAR = 365;
export const SECONDS_PER_YEAR = SECONDS_PER_DAY * DAYS_PER_YEAR;

export const WATTS_PER_KILOWATT = 1000;
export const THS_PER_PHS = 1000;

export const DEFAULT_MODEL_PARAMETERS: ModelParameters = {
  blockSubsidyBtc: 3.125, // since the April 2024 halving
  blockIntervalSeconds: 600,
  poolFeeRate: 0.02,
  // inverter, temperature, soiling and wiring losses
  solarYieldFactor: 0.8,
  soloWindowSeconds: SECONDS_PER_YEAR,
  amortizationYears: 5,
  projectionYears: 10,
};
