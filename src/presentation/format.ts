import { CURRENCY_SYMBOLS, type DisplayMoney } from "../currency/money.js";
import { SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_YEAR } from "../profitability/constants.js";
import type { Estimate, SoloMiningOdds } from "../profitability/types.js";

const DURATION_UNITS: ReadonlyArray<readonly [string, number]> = [
  ["years", SECONDS_PER_YEAR],
  ["days", SECONDS_PER_DAY],
  ["hours", SECONDS_PER_HOUR],
  ["minutes", 60],
];

export const formatNumber = (value: number, decimals = 2): string =>
  Number.isFinite(value) ? value.toFixed(decimals) : "n/a";

export const formatMoney = (money: DisplayMoney, decimals = 2): string =>
  `${formatNumber(money.amount, decimals)} ${CURRENCY_SYMBOLS[money.currency]}`;

// Per-terahash costs are far below a cent
export const formatSmallMoney = (money: DisplayMoney): string =>
  `${money.amount.toExponential(3)} ${CURRENCY_SYMBOLS[money.currency]}`;

/**
 * Renders a duration in the largest unit it fills at least once, e.g.
 * `"2.35 years"` or `"17.50 hours"`.
 */
export const formatDuration = (seconds: number): string => {
  const unit = DURATION_UNITS.find(([, unitSeconds]) => seconds >= unitSeconds);

  return unit
    ? `${formatNumber(seconds / unit[1])} ${unit[0]}`
    : `${formatNumber(seconds)} seconds`;
};

export const formatOdds = (odds: SoloMiningOdds): string => {
  switch (odds._tag) {
    case "OneIn":
      return `1 in ${odds.n.toLocaleString("en-US")}`;
    case "Certain":
      return "certain";
    case "Negligible":
      return "negligible";
  }
};

export const formatEstimate = <A>(
  estimate: Estimate<A>,
  format: (value: A) => string,
  whenUndefined = "n/a"
): string => (estimate._tag === "Defined" ? format(estimate.value) : whenUndefined);
