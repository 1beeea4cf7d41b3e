import { incrementMetric } from "./metrics.js";
import { convertDongToInr, convertPrice, DEFAULT_VND_TO_INR_RATE } from "./price.js";
import { combineSignals, createTimeoutSignal, isAbortError, raceSignal, sleep, TimeoutError } from "./resilience.js";
import type { PriceInfo } from "./types.js";

export const DEFAULT_PRICE_LOOKUP_TIMEOUT_MS = 5000;
export const NO_PRODUCT_MESSAGE = "Could not extract product information from image";
export const CANCELLED_MESSAGE = "Price lookup cancelled";

/** Anything that can turn a product query into a price listing */
export interface PriceSearchProvider {
  search(query: string, signal: AbortSignal): Promise<string>;
}

export type PriceLookupOutcome =
  | { status: "ok"; price: PriceInfo; raw: string }
  | { status: "timeout" | "failed"; message: string };

export type PriceLookupOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
  weightInGrams?: number | null;
  vndToInrRate?: number;
};

const LOCAL_PREFIX = /^local:\s*/i;

/** Providers answer "Local: ₫X\nConverted: ₹Y"; the local line is the one to parse. */
export const extractLocalPrice = (raw: string): string => {
  const localLine = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => LOCAL_PREFIX.test(line));
  return (localLine ? localLine.replace(LOCAL_PREFIX, "") : raw).trim();
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export async function lookupPrice(
  query: string | null,
  provider: PriceSearchProvider,
  options: PriceLookupOptions = {},
): Promise<PriceLookupOutcome> {
  const trimmed = query?.trim() ?? "";
  if (!trimmed) {
    incrementMetric("price_lookup_failed");
    return { status: "failed", message: NO_PRODUCT_MESSAGE };
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_PRICE_LOOKUP_TIMEOUT_MS;
  const deadline = createTimeoutSignal(timeoutMs);
  const { signal, cleanup } = combineSignals([deadline.signal, options.signal]);
  const startedAt = Date.now();

  try {
    const raw = await raceSignal(provider.search(trimmed, signal), signal);
    const price = convertPrice(
      extractLocalPrice(raw),
      options.weightInGrams,
      options.vndToInrRate ?? DEFAULT_VND_TO_INR_RATE,
    );
    incrementMetric("price_lookup_ok");
    console.log(`[Price] lookup ok in ${Date.now() - startedAt}ms currency=${price.currency}`);
    return { status: "ok", price, raw };
  } catch (error) {
    if (error instanceof TimeoutError) {
      incrementMetric("price_lookup_timeout");
      console.warn(`[Price] lookup timed out after ${timeoutMs}ms`);
      return { status: "timeout", message: `Price lookup timed out after ${timeoutMs}ms` };
    }
    incrementMetric("price_lookup_failed");
    if (isAbortError(error)) {
      return { status: "failed", message: CANCELLED_MESSAGE };
    }
    console.warn("[Price] lookup failed", errorMessage(error));
    return { status: "failed", message: errorMessage(error) };
  } finally {
    deadline.clear();
    cleanup();
  }
}

export interface MockPriceSearchConfig {
  /** Simulated network delay in ms */
  delayMs?: number;
  /** Uniform [0, 1) source; swap in a fixed value for repeatable prices */
  random?: () => number;
  vndToInrRate?: number;
}

const MOCK_DEFAULT_DELAY_MS = 1500;
const MOCK_BASE_PRICE_VND = 50_000;
const MOCK_VARIATION_MIN = -10_000;
const MOCK_VARIATION_MAX = 20_000;

/**
 * Stand-in provider that prices every product around ₫50,000.
 * Development only; real listings need a scraper or a shop API.
 */
export const createMockPriceSearch = (config: MockPriceSearchConfig = {}): PriceSearchProvider => {
  const delayMs = config.delayMs ?? MOCK_DEFAULT_DELAY_MS;
  const random = config.random ?? Math.random;
  const rate = config.vndToInrRate ?? DEFAULT_VND_TO_INR_RATE;

  return {
    async search(_query, signal) {
      await sleep(delayMs, signal);
      const variation = MOCK_VARIATION_MIN + random() * (MOCK_VARIATION_MAX - MOCK_VARIATION_MIN);
      const price = MOCK_BASE_PRICE_VND + variation;
      return `Local: ₫${price.toFixed(0)}\nConverted: ₹${convertDongToInr(price, rate).toFixed(2)}`;
    },
  };
};
