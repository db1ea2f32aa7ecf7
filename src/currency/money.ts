import { Brand } from "effect";

/**
 * An amount in the reference currency. Every figure the profitability model
 * produces is an `Eur`; only {@link toDisplay} turns one into something a
 * user sees.
 */
export type Eur = number & Brand.Brand<"Eur">;

export const Eur = Brand.nominal<Eur>();

export type DisplayCurrency = "EUR" | "USD";

export type DisplayMoney = {
  readonly currency: DisplayCurrency;
  readonly amount: number;
};

export const CURRENCY_SYMBOLS: Record<DisplayCurrency, string> = {
  EUR: "€",
  USD: "$",
};

// eurUsdRate: how many dollars one euro buys
export const toDisplay = (
  amount: Eur,
  currency: DisplayCurrency,
  eurUsdRate: number
): DisplayMoney => ({
  currency,
  amount: currency === "USD" ? amount * eurUsdRate : amount,
});
