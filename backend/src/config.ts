import dotenv from "dotenv";

dotenv.config();

export type PriceLookupMode = "off" | "mock";

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readPriceLookupMode = (value: string | undefined): PriceLookupMode =>
  value?.trim().toLowerCase() === "mock" ? "mock" : "off";

export interface AppConfig {
  port: number;
  /** Ingredient-label capture keeps fragments at or above this confidence */
  labelConfidenceThreshold: number;
  /** Front-of-pack capture is noisier, so it accepts weaker fragments */
  frontConfidenceThreshold: number;
  lineTolerance: number;
  vndToInrRate: number;
  priceLookupTimeoutMs: number;
  priceLookupMode: PriceLookupMode;
  scanRateLimitPerMinute: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: readNumber(env.PORT, 3001),
  labelConfidenceThreshold: readNumber(env.LABEL_CONFIDENCE_THRESHOLD, 0.5),
  frontConfidenceThreshold: readNumber(env.FRONT_CONFIDENCE_THRESHOLD, 0.3),
  lineTolerance: readNumber(env.LINE_TOLERANCE, 0.02),
  vndToInrRate: readNumber(env.VND_TO_INR_RATE, 0.0033),
  priceLookupTimeoutMs: readNumber(env.PRICE_LOOKUP_TIMEOUT_MS, 5000),
  priceLookupMode: readPriceLookupMode(env.PRICE_LOOKUP_MODE),
  scanRateLimitPerMinute: readNumber(env.SCAN_RATE_LIMIT_PER_MINUTE, 30),
});
