import { describe, it, expect } from "@effect/vitest";
import { formatDuration, formatEstimate, formatMoney, formatNumber, formatOdds, formatSmallMoney } from "../../../presentation/format.js";

describe("format", () => {
  it("should render durations in the largest unit they fill", () => {
    expect(formatDuration(45)).toBe("45.00 seconds");
    expect(formatDuration(90)).toBe("1.50 minutes");
    expect(formatDuration(63_000)).toBe("17.50 hours");
    expect(formatDuration(3 * 86_400)).toBe("3.00 days");
    expect(formatDuration(2.5 * 365 * 86_400)).toBe("2.50 years");
  });

  it("should not pass off non-finite values as numbers", () => {
    expect(formatNumber(Number.POSITIVE_INFINITY)).toBe("n/a");
    expect(formatNumber(Number.NaN)).toBe("n/a");
    expect(formatMoney({ currency: "EUR", amount: Number.POSITIVE_INFINITY })).toBe("n/a €");
  });

  it("should render money with the currency symbol", () => {
    expect(formatMoney({ currency: "EUR", amount: 1234.567 })).toBe("1234.57 €");
    expect(formatMoney({ currency: "USD", amount: 12 })).toBe("12.00 $");
    expect(formatSmallMoney({ currency: "EUR", amount: 0.00025 })).toBe("2.500e-4 €");
  });

  it("should render odds with thousands separators", () => {
    expect(formatOdds({ _tag: "OneIn", n: 10613 })).toBe("1 in 10,613");
    expect(formatOdds({ _tag: "Certain" })).toBe("certain");
    expect(formatOdds({ _tag: "Negligible" })).toBe("negligible");
  });

  it("should fall back for undefined results", () => {
    expect(formatEstimate({ _tag: "UndefinedResult", reason: "NoActiveHours" }, String)).toBe("n/a");
    expect(formatEstimate({ _tag: "UndefinedResult", reason: "NonPositiveNetRevenue" }, String, "not profitable")).toBe("not profitable");
    expect(formatEstimate({ _tag: "Defined", value: 3 }, String)).toBe("3");
  });
});
