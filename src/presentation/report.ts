import { toDisplay, type DisplayCurrency, type Eur } from "../currency/money.js";
import type {
  EnergyConfig,
  HardwareProfile,
  NetworkSnapshot,
  ProfitabilityFigures,
  ProfitabilityResult,
  ResultDisplay,
  SourceEconomics,
} from "../profitability/types.js";
import {
  formatDuration,
  formatEstimate,
  formatMoney,
  formatNumber,
  formatOdds,
  formatSmallMoney,
} from "./format.js";

const NOT_PROFITABLE = "not profitable";

/**
 * The single place where reference-currency figures are converted for
 * display. The figures themselves are left untouched.
 */
export const presentResult = (
  figures: ProfitabilityFigures,
  currency: DisplayCurrency,
  eurUsdRate: number
): ResultDisplay => {
  const money = (amount: Eur) => formatMoney(toDisplay(amount, currency, eurUsdRate));

  return {
    currency,
    efficiency: `${formatNumber(figures.efficiencyWPerTh)} W/TH`,
    costPerTh: `${money(figures.costPerThEur)}/TH`,
    energyCostPerTerahash: formatEstimate(
      figures.energyCostPerTerahashEur,
      (amount) => `${formatSmallMoney(toDisplay(amount, currency, eurUsdRate))}/TH`
    ),
    hashprice: `${money(figures.hashpriceEurPerPhDay)}/PH/day`,
    eurToMine1Btc: formatEstimate(figures.eurToMine1Btc, (cost) => money(cost.total)),
    timeToMine1Btc: formatEstimate(figures.timeToMine1Btc, formatDuration),
    investment: money(figures.investment),
    breakeven: formatEstimate(figures.breakevenPoint, formatDuration, NOT_PROFITABLE),
    breakevenSolar: formatEstimate(figures.sources.solar.breakeven, formatDuration, NOT_PROFITABLE),
    breakevenGrid: formatEstimate(figures.sources.grid.breakeven, formatDuration, NOT_PROFITABLE),
    netProfit5Years: money(figures.netProfit5Years),
    netProfit10Years: money(figures.netProfit10Years),
    soloMining: formatOdds(figures.soloMining.odds),
    pvPower: `${formatNumber(figures.pvPowerKwp)} kWp`,
  };
};

const sourceLines = (
  title: string,
  source: SourceEconomics,
  currency: DisplayCurrency,
  eurUsdRate: number
): string[] => {
  const money = (amount: Eur) => formatMoney(toDisplay(amount, currency, eurUsdRate));

  return [
    title,
    `  Hours per year:     ${formatNumber(source.hoursPerYear, 0)} h`,
    `  Energy:             ${formatNumber(source.energyKwh)} kWh`,
    `  Gross revenue:      ${money(source.grossRevenue)}`,
    `  Pool fee:           -${money(source.poolFee)}`,
    `  Energy cost:        -${money(source.energyCost)}`,
    `  Net revenue:        ${money(source.netRevenue)}`,
  ];
};

export const renderReport = (
  hardware: HardwareProfile,
  energy: EnergyConfig,
  network: NetworkSnapshot,
  result: ProfitabilityResult
): string[] => {
  const { display } = result;

  return [
    `Miner: ${hardware.name} x${energy.machineCount} (${energy.mode})`,
    `  Hashrate:           ${formatNumber(hardware.hashrateThs * energy.machineCount)} TH/s`,
    `  Efficiency:         ${display.efficiency}`,
    `  Cost per TH:        ${display.costPerTh}`,
    `  Energy per TH:      ${display.energyCostPerTerahash}`,
    `  Hashprice:          ${display.hashprice}`,
    `  To mine 1 BTC:      ${display.eurToMine1Btc}`,
    `  Time to mine 1 BTC: ${display.timeToMine1Btc}`,
    `  Investment:         ${display.investment}`,
    `  Solo odds (window): ${display.soloMining}`,
    "Breakeven",
    `  Solar:              ${display.breakevenSolar}`,
    `  Grid:               ${display.breakevenGrid}`,
    `  Combined:           ${display.breakeven}`,
    `  Net after 5 years:  ${display.netProfit5Years}`,
    `  Net after 10 years: ${display.netProfit10Years}`,
    ...(energy.mode !== "grid"
      ? [`  PV power needed:    ${display.pvPower}`]
      : []),
    ...sourceLines("Solar (yearly)", result.sources.solar, display.currency, network.eurUsdRate),
    ...sourceLines("Grid (yearly)", result.sources.grid, display.currency, network.eurUsdRate),
    ...sourceLines("Combined (yearly)", result.sources.combined, display.currency, network.eurUsdRate),
  ];
};
