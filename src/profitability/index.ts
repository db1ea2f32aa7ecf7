import { Either } from "effect";
import { Eur, type DisplayCurrency } from "../currency/money.js";
import type { ValidationError } from "../errors/validation.error.js";
import { presentResult } from "../presentation/report.js";
import { amortizationSeries, netProfitAfter } from "./breakeven.js";
import { DEFAULT_MODEL_PARAMETERS, THS_PER_PHS } from "./constants.js";
import { buildEnergySchedule, fleetPowerKw } from "./energy-schedule.js";
import { defined, undefinedResult } from "./estimate.js";
import {
  combineSources,
  costToMineOneBtc,
  hashpricePerThDay,
  sourceEconomics,
  terahashesHashed,
  terahashesPerBtc,
} from "./mining-economics.js";
import { soloMiningEstimate } from "./solo-mining.js";
import type {
  EnergyConfig,
  HardwareProfile,
  ModelParameters,
  NetworkSnapshot,
  ProfitabilityFigures,
  ProfitabilityResult,
} from "./types.js";
import { validateInputs, type ValidatedInputs } from "./validation.js";

export const evaluate = ({ hardware, energy, network, parameters }: ValidatedInputs): ProfitabilityFigures => {
  const fleetThs = hardware.hashrateThs * energy.machineCount;
  const fleetKw = fleetPowerKw(hardware, energy.machineCount);
  const schedule = buildEnergySchedule(energy);
  const investment = Eur(hardware.price * energy.machineCount);
  const hashprice = hashpricePerThDay(network, parameters);

  const sourceInputs = {
    fleetThs,
    fleetKw,
    hashpricePerThDay: hashprice,
    poolFeeRate: parameters.poolFeeRate,
    investment,
  };
  const solar = sourceEconomics({
    ...sourceInputs,
    hoursPerYear: schedule.solarHoursPerYear,
    pricePerKwh: schedule.solarPricePerKwh,
  });
  const grid = sourceEconomics({
    ...sourceInputs,
    hoursPerYear: schedule.gridHoursPerYear,
    pricePerKwh: schedule.gridPricePerKwh,
  });
  const combined = combineSources(solar, grid, investment);

  const terahashesPerYear = terahashesHashed(fleetThs, schedule.activeHoursPerYear);
  const networkTerahashesPerBtc = terahashesPerBtc(network, parameters);
  const btcPerYear = terahashesPerYear / networkTerahashesPerBtc;

  return {
    efficiencyWPerTh: hardware.powerWatts / hardware.hashrateThs,
    costPerThEur: Eur((investment + combined.energyCost) / fleetThs),
    energyCostPerTerahashEur: terahashesPerYear > 0
      ? defined(Eur(combined.energyCost / terahashesPerYear))
      : undefinedResult("NoActiveHours"),
    hashpriceEurPerPhDay: Eur(hashprice * THS_PER_PHS),
    eurToMine1Btc: costToMineOneBtc(combined, investment, parameters.amortizationYears, btcPerYear),
    timeToMine1Btc: schedule.dutyCycle > 0
      ? defined(networkTerahashesPerBtc / (fleetThs * schedule.dutyCycle))
      : undefinedResult("NoActiveHours"),
    btcPerYear,
    investment,
    breakevenPoint: combined.breakeven,
    netProfit5Years: netProfitAfter(combined.netRevenue, investment, 5),
    netProfit10Years: netProfitAfter(combined.netRevenue, investment, 10),
    sources: { solar, grid, combined },
    pvPowerKwp: energy.mode !== "grid" ? fleetKw / parameters.solarYieldFactor : 0,
    amortization: amortizationSeries(combined.netRevenue, parameters.projectionYears),
    soloMining: soloMiningEstimate(fleetThs * schedule.dutyCycle, network.networkHashrateThs, parameters),
  };
};

/**
 * Estimates mining profitability for a hardware profile run under the given
 * energy configuration. Figures are computed in EUR; `displayCurrency` only
 * affects the formatted `display` fields.
 */
export const compute = (
  hardware: HardwareProfile,
  energy: EnergyConfig,
  network: NetworkSnapshot,
  displayCurrency: DisplayCurrency,
  parameters: ModelParameters = DEFAULT_MODEL_PARAMETERS
): Either.Either<ProfitabilityResult, ValidationError> =>
  validateInputs(hardware, energy, network, parameters).pipe(
    Either.map((inputs) => {
      const figures = evaluate(inputs);

      return {
        ...figures,
        display: presentResult(figures, displayCurrency, inputs.network.eurUsdRate),
      };
    })
  );
