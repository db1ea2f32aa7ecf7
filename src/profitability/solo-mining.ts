import type { ModelParameters, SoloMiningEstimate, SoloMiningOdds } from "./types.js";

const CERTAIN: SoloMiningOdds = { _tag: "Certain" };
const NEGLIGIBLE: SoloMiningOdds = { _tag: "Negligible" };

export const oddsFor = (probability: number): SoloMiningOdds => {
  if (!(probability > 0)) {
    return NEGLIGIBLE;
  }
  if (probability >= 1) {
    return CERTAIN;
  }

  const n = Math.round(1 / probability);
  if (!Number.isFinite(n)) {
    return NEGLIGIBLE;
  }

  return { _tag: "OneIn", n: Math.max(1, n) };
};

/**
 * Chance of finding at least one block alone within the configured window,
 * for a fleet hashing `fleetThs` on average over the window:
 * 1 - (1 - share)^blocks, evaluated through expm1/log1p so that tiny hashrate
 * shares keep their precision.
 */
export const soloMiningEstimate = (
  fleetThs: number,
  networkHashrateThs: number,
  parameters: ModelParameters
): SoloMiningEstimate => {
  const windowSeconds = parameters.soloWindowSeconds;
  const share = networkHashrateThs > 0 ? fleetThs / networkHashrateThs : 0;

  if (share >= 1) {
    return { windowSeconds, probability: 1, odds: CERTAIN };
  }
  if (!(share > 0)) {
    return { windowSeconds, probability: 0, odds: NEGLIGIBLE };
  }

  const blocksInWindow = windowSeconds / parameters.blockIntervalSeconds;
  const probability = -Math.expm1(blocksInWindow * Math.log1p(-share));

  return { windowSeconds, probability, odds: oddsFor(probability) };
};
