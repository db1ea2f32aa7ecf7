import { Config as EffectConfig } from "effect";
import { DEFAULT_MODEL_PARAMETERS } from "./profitability/constants.js";


export const AppConfig = {
  miner: {
    model: EffectConfig.string("MINER_MODEL").pipe(
      EffectConfig.withDefault("Bitaxe Touch")
    ),
    // only read when MINER_MODEL=custom
    hashrateThs: EffectConfig.number("MINER_HASHRATE_THS"),
    powerWatts: EffectConfig.number("MINER_POWER_WATTS"),
    price: EffectConfig.number("MINER_PRICE_EUR"),
    machineCount: EffectConfig.integer("MACHINE_COUNT").pipe(
      EffectConfig.withDefault(1)
    ),
  },

  energy: {
    mode: EffectConfig.literal("solar", "grid", "hybrid")("ENERGY_MODE").pipe(
      EffectConfig.withDefault("hybrid" as const)
    ),
    sunHoursPerDay: EffectConfig.number("SOLAR_SUN_HOURS_PER_DAY").pipe(
      EffectConfig.withDefault(5.5)
    ),
    solarDaysPerYear: EffectConfig.number("SOLAR_DAYS_PER_YEAR").pipe(
      EffectConfig.withDefault(365)
    ),
    feedInPricePerKwh: EffectConfig.number("SOLAR_FEED_IN_PRICE_PER_KWH").pipe(
      EffectConfig.withDefault(0.04)
    ),
    gridPricePerKwh: EffectConfig.number("GRID_PRICE_PER_KWH").pipe(
      EffectConfig.withDefault(0.08)
    ),
    gridHoursPerDay: EffectConfig.number("GRID_HOURS_PER_DAY").pipe(
      EffectConfig.withDefault(8)
    ),
    gridDaysPerYear: EffectConfig.number("GRID_DAYS_PER_YEAR").pipe(
      EffectConfig.withDefault(365)
    ),
  },

  display: {
    currency: EffectConfig.literal("EUR", "USD")("DISPLAY_CURRENCY").pipe(
      EffectConfig.withDefault("EUR" as const)
    ),
  },

  model: {
    blockSubsidyBtc: EffectConfig.number("BLOCK_SUBSIDY_BTC").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.blockSubsidyBtc)
    ),
    blockIntervalSeconds: EffectConfig.number("BLOCK_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.blockIntervalSeconds)
    ),
    poolFeeRate: EffectConfig.number("POOL_FEE_RATE").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.poolFeeRate)
    ),
    solarYieldFactor: EffectConfig.number("SOLAR_YIELD_FACTOR").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.solarYieldFactor)
    ),
    soloWindowSeconds: EffectConfig.number("SOLO_WINDOW_SECONDS").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.soloWindowSeconds)
    ),
    amortizationYears: EffectConfig.number("AMORTIZATION_YEARS").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.amortizationYears)
    ),
    projectionYears: EffectConfig.integer("PROJECTION_YEARS").pipe(
      EffectConfig.withDefault(DEFAULT_MODEL_PARAMETERS.projectionYears)
    ),
  },

  api: {
    mempoolBaseUrl: EffectConfig.string("MEMPOOL_BASE_URL").pipe(
      EffectConfig.withDefault("https://mempool.space")
    ),
    coingeckoBaseUrl: EffectConfig.string("COINGECKO_BASE_URL").pipe(
      EffectConfig.withDefault("https://api.coingecko.com")
    ),
    frankfurterBaseUrl: EffectConfig.string("FRANKFURTER_BASE_URL").pipe(
      EffectConfig.withDefault("https://api.frankfurter.app")
    ),
    timeoutMs: EffectConfig.integer("API_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(5_000)
    ),
    retries: EffectConfig.integer("API_RETRIES").pipe(
      EffectConfig.withDefault(3)
    ),
    feeFallbackBlockCount: EffectConfig.integer("FEE_FALLBACK_BLOCK_COUNT").pipe(
      EffectConfig.withDefault(10)
    ),
    feeFallbackDelayMs: EffectConfig.integer("FEE_FALLBACK_DELAY_MS").pipe(
      EffectConfig.withDefault(200)
    ),
  },

  // snapshot used with --offline
  offline: {
    btcPriceEur: EffectConfig.number("OFFLINE_BTC_PRICE_EUR"),
    eurUsdRate: EffectConfig.number("OFFLINE_EUR_USD_RATE"),
    networkHashrateEhs: EffectConfig.number("OFFLINE_NETWORK_HASHRATE_EHS"),
    avgFeePerBlockBtc: EffectConfig.number("OFFLINE_AVG_FEE_PER_BLOCK_BTC").pipe(
      EffectConfig.withDefault(0)
    ),
  },
};
