import { describe, it, expect } from "@effect/vitest";
import { Either } from "effect";
import { compute } from "../../../profitability/index.js";
import type {
  EnergyConfig,
  HardwareProfile,
  NetworkSnapshot,
  ProfitabilityResult,
} from "../../../profitability/types.js";
import type { DisplayCurrency } from "../../../currency/money.js";

const bitaxeTouch: HardwareProfile = {
  name: "Bitaxe Touch",
  hashrateThs: 1.6,
  powerWatts: 22,
  price: 275,
};

const network: NetworkSnapshot = {
  btcPriceEur: 100_000,
  eurUsdRate: 1.1,
  networkHashrateThs: 892.5e6,
  avgFeePerBlockBtc: 0.025,
};

const hybrid: EnergyConfig = {
  machineCount: 1,
  mode: "hybrid",
  solar: { sunHoursPerDay: 5.5, daysPerYear: 365, feedInPricePerKwh: 0.04 },
  grid: { pricePerKwh: 0.08, hoursPerDay: 8, daysPerYear: 365 },
};

// solar energy that would otherwise earn nothing
const freeSolar: EnergyConfig = {
  machineCount: 1,
  mode: "solar",
  solar: { sunHoursPerDay: 5.5, daysPerYear: 365, feedInPricePerKwh: 0 },
};

const computeOrThrow = (
  hardware: HardwareProfile,
  energy: EnergyConfig,
  snapshot: NetworkSnapshot = network,
  currency: DisplayCurrency = "EUR"
): ProfitabilityResult =>
  Either.getOrThrowWith(
    compute(hardware, energy, snapshot, currency),
    (err) => new Error(err.message)
  );

describe("compute", () => {
  it("should report efficiency and cost per terahash of a single machine", () => {
    const result = computeOrThrow(bitaxeTouch, freeSolar);

    expect(result.efficiencyWPerTh).toBe(13.75);
    expect(result.costPerThEur).toBe(171.875);
    expect(result.display.efficiency).toBe("13.75 W/TH");
    expect(result.display.costPerTh).toBe("171.88 €/TH");
  });

  it("should convert figures into dollars only for display", () => {
    const eur = computeOrThrow(bitaxeTouch, hybrid, network, "EUR");
    const usd = computeOrThrow(bitaxeTouch, hybrid, network, "USD");

    expect(usd.display.currency).toBe("USD");
    expect(computeOrThrow(bitaxeTouch, freeSolar, network, "USD").display.costPerTh).toBe("189.06 $/TH");

    expect(usd.costPerThEur).toBe(eur.costPerThEur);
    expect(usd.hashpriceEurPerPhDay).toBe(eur.hashpriceEurPerPhDay);
    expect(usd.sources).toEqual(eur.sources);
    expect(usd.breakevenPoint).toEqual(eur.breakevenPoint);
    expect(usd.soloMining).toEqual(eur.soloMining);
  });

  it("should run the single machine grid scenario at no energy price", () => {
    const result = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "grid",
      grid: { pricePerKwh: 0, hoursPerDay: 24 },
    });

    expect(result.efficiencyWPerTh).toBe(13.75);
    expect(result.display.costPerTh).toBe("171.88 €/TH");
    expect(result.display.soloMining).toBe("1 in 10,613");
    expect(result.sources.grid.hoursPerYear).toBe(8760);
  });

  it("should be deterministic for identical inputs", () => {
    expect(computeOrThrow(bitaxeTouch, hybrid)).toEqual(computeOrThrow(bitaxeTouch, hybrid));
  });

  it("should price one hour of a 1 kW, 1 TH/s machine at 1/3600 per terahash", () => {
    const result = computeOrThrow(
      { name: "custom", hashrateThs: 1, powerWatts: 1000, price: 0 },
      {
        machineCount: 1,
        mode: "grid",
        grid: { pricePerKwh: 1, hoursPerDay: 1, daysPerYear: 1 },
      }
    );

    expect(result.sources.grid.energyKwh).toBe(1);
    expect(result.sources.grid.energyCost).toBe(1);
    expect(result.energyCostPerTerahashEur).toEqual({ _tag: "Defined", value: 1 / 3600 });
  });

  it("should compute the hybrid scenario", () => {
    const result = computeOrThrow(bitaxeTouch, hybrid);

    expect(result.display.hashprice).toBe("50.82 €/PH/day");
    expect(result.sources.solar.hoursPerYear).toBe(2007.5);
    expect(result.sources.grid.hoursPerYear).toBe(2920);
    expect(result.sources.solar.energyKwh).toBeCloseTo(44.165, 9);
    expect(result.sources.grid.energyCost).toBeCloseTo(5.1392, 9);
    expect(result.sources.combined.netRevenue).toBeCloseTo(9.4558188, 6);
    expect(result.display.costPerTh).toBe("176.19 €/TH");
    expect(result.display.investment).toBe("275.00 €");
    expect(result.display.breakeven).toBe("29.08 years");
    expect(result.netProfit5Years).toBeCloseTo(-227.7209059, 6);
    expect(result.pvPowerKwp).toBeCloseTo(0.0275, 12);
    expect(result.display.pvPower).toBe("0.03 kWp");
    expect(result.amortization).toHaveLength(11);
    expect(result.amortization[0]).toEqual({ year: 0, cumulativeNetRevenue: 0 });
  });

  it("should raise cost per terahash with power draw when energy has a price", () => {
    const frugal = computeOrThrow(bitaxeTouch, hybrid);
    const hungry = computeOrThrow({ ...bitaxeTouch, powerWatts: 44 }, hybrid);

    expect(hungry.costPerThEur).toBeGreaterThan(frugal.costPerThEur);
  });

  it("should shorten the time to mine a coin as machines are added", () => {
    const one = computeOrThrow(bitaxeTouch, hybrid);
    const two = computeOrThrow(bitaxeTouch, { ...hybrid, machineCount: 2 });

    if (one.timeToMine1Btc._tag !== "Defined" || two.timeToMine1Btc._tag !== "Defined") {
      throw new Error("Expected a defined time to mine");
    }

    expect(two.timeToMine1Btc.value).toBeLessThan(one.timeToMine1Btc.value);
    expect(two.timeToMine1Btc.value).toBeCloseTo(one.timeToMine1Btc.value / 2, 0);
  });

  it("should scale yearly revenue and investment with the machine count", () => {
    const one = computeOrThrow(bitaxeTouch, hybrid);
    const four = computeOrThrow(bitaxeTouch, { ...hybrid, machineCount: 4 });

    expect(four.investment).toBe(1100);
    expect(four.sources.combined.grossRevenue).toBeCloseTo(one.sources.combined.grossRevenue * 4, 9);
    expect(four.sources.combined.energyCost).toBeCloseTo(one.sources.combined.energyCost * 4, 9);
  });

  it("should report breakeven as not profitable when energy costs exceed revenue", () => {
    const result = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "grid",
      grid: { pricePerKwh: 100, hoursPerDay: 24 },
    });

    expect(result.breakevenPoint).toEqual({ _tag: "UndefinedResult", reason: "NonPositiveNetRevenue" });
    expect(result.display.breakeven).toBe("not profitable");
  });

  it("should report undefined per-hash figures when no hour is active", () => {
    const result = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "solar",
      solar: { sunHoursPerDay: 0, daysPerYear: 365 },
    });

    expect(result.timeToMine1Btc).toEqual({ _tag: "UndefinedResult", reason: "NoActiveHours" });
    expect(result.energyCostPerTerahashEur).toEqual({ _tag: "UndefinedResult", reason: "NoActiveHours" });
    expect(result.display.timeToMine1Btc).toBe("n/a");
  });

  it("should give solo mining odds over a year of round-the-clock hashing", () => {
    const result = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "grid",
      grid: { pricePerKwh: 0.08, hoursPerDay: 24 },
    });

    expect(result.soloMining.odds).toEqual({ _tag: "OneIn", n: 10613 });
    expect(result.display.soloMining).toBe("1 in 10,613");
  });

  it("should lower solo mining odds with the share of the year spent hashing", () => {
    const fullTime = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "grid",
      grid: { pricePerKwh: 0.08, hoursPerDay: 24 },
    });
    const partTime = computeOrThrow(bitaxeTouch, hybrid);

    expect(partTime.soloMining.probability).toBeLessThan(fullTime.soloMining.probability);
  });

  it("should report negligible solo odds when no hour is active", () => {
    const result = computeOrThrow(bitaxeTouch, {
      machineCount: 1,
      mode: "solar",
      solar: { sunHoursPerDay: 0, daysPerYear: 365 },
    });

    expect(result.soloMining.odds).toEqual({ _tag: "Negligible" });
    expect(result.display.soloMining).toBe("negligible");
  });

  it("should fail with every validation issue at once", () => {
    const result = compute(
      { ...bitaxeTouch, hashrateThs: 0 },
      { machineCount: 1, mode: "hybrid", solar: { sunHoursPerDay: 5.5, daysPerYear: 365 } },
      network,
      "EUR"
    );

    if (Either.isRight(result)) {
      throw new Error("Expected a validation error");
    }

    expect(result.left._tag).toBe("ValidationError");
    expect(result.left.issues).toEqual([
      "hardware.hashrateThs: must be greater than 0",
      'energy: mode "hybrid" requires grid parameters',
    ]);
  });

  it("should reject grid hours beyond a day", () => {
    const result = compute(
      bitaxeTouch,
      { machineCount: 1, mode: "grid", grid: { pricePerKwh: 0.08, hoursPerDay: 25 } },
      network,
      "EUR"
    );

    expect(Either.isLeft(result)).toBe(true);
    expect(Either.match(result, {
      onLeft: (err) => err.issues,
      onRight: () => [],
    })).toEqual(["energy.grid.hoursPerDay: must be between 0 and 24"]);
  });
});
