import { Data, Either } from "effect";
import type { HardwareProfile } from "../profitability/types.js";

export const CUSTOM_HARDWARE = "custom";

export class UnknownHardwareError extends Data.TaggedError("UnknownHardware")<{
  readonly model: string;
}> {
  public override readonly message = `Unknown miner model "${this.model}". Known models: ${catalogModels().join(", ")}`;
}

type CatalogEntry = Omit<HardwareProfile, "name">;

// Prices in EUR
export const HARDWARE_CATALOG: Readonly<Record<string, CatalogEntry>> = {
  "S19": { hashrateThs: 95, powerWatts: 3250, price: 550 },
  "S19K Pro": { hashrateThs: 120, powerWatts: 2760, price: 770 },
  "S21": { hashrateThs: 200, powerWatts: 3500, price: 2211 },
  "S21 XP": { hashrateThs: 270, powerWatts: 3645, price: 4850.62 },
  "S23 Hyd": { hashrateThs: 580, powerWatts: 5510, price: 11311 },
  "Fluminer T3": { hashrateThs: 115, powerWatts: 1700, price: 1900 },
  "Avalon Q": { hashrateThs: 90, powerWatts: 1674, price: 1500 },
  "Avalon Nano 3S": { hashrateThs: 6, powerWatts: 140, price: 290 },
  "NerdMiner NerdQaxe++": { hashrateThs: 4.8, powerWatts: 72, price: 350 },
  "NerdMiner NerdQaxe+ Hyd": { hashrateThs: 2.5, powerWatts: 60, price: 429 },
  "Bitaxe Touch": { hashrateThs: 1.6, powerWatts: 22, price: 275 },
  "Bitaxe Gamma 601": { hashrateThs: 1.2, powerWatts: 17, price: 58 },
  "Bitaxe Gamma Turbo": { hashrateThs: 2.5, powerWatts: 36, price: 347 },
  "Bitaxe Supra Hex 701": { hashrateThs: 4.2, powerWatts: 90, price: 235 },
};

export const catalogModels = (): string[] => Object.keys(HARDWARE_CATALOG);

export const findHardware = (name: string): Either.Either<HardwareProfile, UnknownHardwareError> => {
  const entry = Object.hasOwn(HARDWARE_CATALOG, name) ? HARDWARE_CATALOG[name] : undefined;

  return entry
    ? Either.right({ name, ...entry })
    : Either.left(new UnknownHardwareError({ model: name }));
};

export const customHardware = (entry: CatalogEntry): HardwareProfile => ({
  name: CUSTOM_HARDWARE,
  ...entry,
});
