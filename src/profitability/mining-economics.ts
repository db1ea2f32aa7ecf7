import { Eur } from "../currency/money.js";
import { HOURS_PER_DAY, SECONDS_PER_DAY, SECONDS_PER_HOUR } from "./constants.js";
import { breakevenSeconds } from "./breakeven.js";
import { defined, undefinedResult } from "./estimate.js";
import type {
  CostToMineOneBtc,
  Estimate,
  ModelParameters,
  NetworkSnapshot,
  SourceEconomics,
} from "./types.js";

export const btcPerBlock = (network: NetworkSnapshot, parameters: ModelParameters): number =>
  parameters.blockSubsidyBtc + network.avgFeePerBlockBtc;

/**
 * Expected revenue of 1 TH/s hashing for a whole day at the current network
 * hashrate, subsidy plus fees.
 */
export const hashpricePerThDay = (
  network: NetworkSnapshot,
  parameters: ModelParameters
): Eur => {
  const blocksPerDay = SECONDS_PER_DAY / parameters.blockIntervalSeconds;
  const btcPerThDay = (btcPerBlock(network, parameters) * blocksPerDay) / network.networkHashrateThs;

  return Eur(btcPerThDay * network.btcPriceEur);
};

// Hashes the whole network performs, on average, for every BTC it issues.
export const terahashesPerBtc = (
  network: NetworkSnapshot,
  parameters: ModelParameters
): number =>
  (network.networkHashrateThs * parameters.blockIntervalSeconds) / btcPerBlock(network, parameters);

export const terahashesHashed = (fleetThs: number, hours: number): number =>
  fleetThs * hours * SECONDS_PER_HOUR;

export type SourceInputs = {
  readonly fleetThs: number;
  readonly fleetKw: number;
  readonly hoursPerYear: number;
  readonly pricePerKwh: number;
  readonly hashpricePerThDay: Eur;
  readonly poolFeeRate: number;
  readonly investment: Eur;
};

export const sourceEconomics = (inputs: SourceInputs): SourceEconomics => {
  const energyKwh = inputs.fleetKw * inputs.hoursPerYear;
  const grossRevenue = inputs.hashpricePerThDay * inputs.fleetThs * (inputs.hoursPerYear / HOURS_PER_DAY);
  const poolFee = grossRevenue * inputs.poolFeeRate;
  const energyCost = energyKwh * inputs.pricePerKwh;
  const netRevenue = Eur(grossRevenue - poolFee - energyCost);

  return {
    hoursPerYear: inputs.hoursPerYear,
    energyKwh,
    grossRevenue: Eur(grossRevenue),
    poolFee: Eur(poolFee),
    energyCost: Eur(energyCost),
    netRevenue,
    breakeven: breakevenSeconds(inputs.investment, netRevenue),
  };
};

export const combineSources = (
  first: SourceEconomics,
  second: SourceEconomics,
  investment: Eur
): SourceEconomics => {
  const netRevenue = Eur(first.netRevenue + second.netRevenue);

  return {
    hoursPerYear: first.hoursPerYear + second.hoursPerYear,
    energyKwh: first.energyKwh + second.energyKwh,
    grossRevenue: Eur(first.grossRevenue + second.grossRevenue),
    poolFee: Eur(first.poolFee + second.poolFee),
    energyCost: Eur(first.energyCost + second.energyCost),
    netRevenue,
    breakeven: breakevenSeconds(investment, netRevenue),
  };
};

/**
 * What each mined BTC costs: its share of the yearly energy bill and pool
 * fees, plus the hardware written off over `amortizationYears`.
 */
export const costToMineOneBtc = (
  economics: SourceEconomics,
  investment: Eur,
  amortizationYears: number,
  btcPerYear: number
): Estimate<CostToMineOneBtc> => {
  if (btcPerYear <= 0) {
    return undefinedResult("NoActiveHours");
  }

  const energy = economics.energyCost / btcPerYear;
  const poolFee = economics.poolFee / btcPerYear;
  const amortization = investment / amortizationYears / btcPerYear;

  return defined({
    energy: Eur(energy),
    poolFee: Eur(poolFee),
    amortization: Eur(amortization),
    total: Eur(energy + poolFee + amortization),
  });
};
