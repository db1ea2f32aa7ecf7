import { DAYS_PER_YEAR, HOURS_PER_DAY, WATTS_PER_KILOWATT } from "./constants.js";
import type { EnergyConfig, HardwareProfile } from "./types.js";

export type EnergySchedule = {
  readonly solarHoursPerYear: number;
  readonly gridHoursPerYear: number;
  readonly activeHoursPerYear: number;
  // share of the year the fleet is hashing, 0..1
  readonly dutyCycle: number;
  readonly solarPricePerKwh: number;
  readonly gridPricePerKwh: number;
};

export const solarHoursPerDay = (energy: EnergyConfig): number =>
  energy.mode !== "grid" && energy.solar ? energy.solar.sunHoursPerDay : 0;

/**
 * Grid hours used on a day that also has sun. In hybrid mode the grid only
 * covers the hours the sun does not, so such a day never adds up to more
 * than 24 hours.
 */
export const gridHoursPerDay = (energy: EnergyConfig): number => {
  if (energy.mode === "solar" || !energy.grid) {
    return 0;
  }

  if (energy.mode === "hybrid") {
    return Math.min(energy.grid.hoursPerDay, HOURS_PER_DAY - solarHoursPerDay(energy));
  }

  return energy.grid.hoursPerDay;
};

// Sunny days are assumed to fall on grid days; the remaining grid days run the full grid hours.
const gridHoursPerYear = (energy: EnergyConfig, solarDays: number): number => {
  if (energy.mode === "solar" || !energy.grid) {
    return 0;
  }

  const gridDays = energy.grid.daysPerYear ?? DAYS_PER_YEAR;
  const sunnyGridDays = energy.mode === "hybrid" ? Math.min(solarDays, gridDays) : 0;

  return sunnyGridDays * gridHoursPerDay(energy) + (gridDays - sunnyGridDays) * energy.grid.hoursPerDay;
};

export const buildEnergySchedule = (energy: EnergyConfig): EnergySchedule => {
  const solarDays = energy.mode !== "grid" && energy.solar ? energy.solar.daysPerYear : 0;
  const solarHoursPerYear = solarHoursPerDay(energy) * solarDays;
  const gridHours = gridHoursPerYear(energy, solarDays);
  const activeHoursPerYear = solarHoursPerYear + gridHours;

  return {
    solarHoursPerYear,
    gridHoursPerYear: gridHours,
    activeHoursPerYear,
    dutyCycle: activeHoursPerYear / (HOURS_PER_DAY * DAYS_PER_YEAR),
    solarPricePerKwh: energy.solar?.feedInPricePerKwh ?? 0,
    gridPricePerKwh: energy.grid?.pricePerKwh ?? 0,
  };
};

export const fleetPowerKw = (hardware: HardwareProfile, machineCount: number): number =>
  (hardware.powerWatts / WATTS_PER_KILOWATT) * machineCount;
