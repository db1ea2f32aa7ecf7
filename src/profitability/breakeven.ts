import { Eur } from "../currency/money.js";
import { DAYS_PER_YEAR, SECONDS_PER_DAY } from "./constants.js";
import { defined, undefinedResult } from "./estimate.js";
import type { AmortizationPoint, Estimate } from "./types.js";

/**
 * Seconds until cumulative net revenue reaches the investment, assuming the
 * yearly net revenue accrues evenly over the days of the year.
 */
export const breakevenSeconds = (investment: Eur, annualNetRevenue: Eur): Estimate<number> => {
  if (investment <= 0) {
    return defined(0);
  }

  const dailyNetRevenue = annualNetRevenue / DAYS_PER_YEAR;
  if (dailyNetRevenue <= 0) {
    return undefinedResult("NonPositiveNetRevenue");
  }

  return defined((investment / dailyNetRevenue) * SECONDS_PER_DAY);
};

export const netProfitAfter = (annualNetRevenue: Eur, investment: Eur, years: number): Eur =>
  Eur(annualNetRevenue * years - investment);

// Year 0 through `years`, for the amortization chart
export const amortizationSeries = (annualNetRevenue: Eur, years: number): AmortizationPoint[] =>
  Array.from({ length: years + 1 }, (_, year) => ({
    year,
    cumulativeNetRevenue: Eur(annualNetRevenue * year),
  }));
