import { CLASSIFICATION_RULE_IDS, type ClassificationRuleId } from "./types.js";

export type ClassificationMetric = `classification_${ClassificationRuleId}`;

export const METRIC_NAMES = [
  "label_scan_ok",
  "label_scan_no_text",
  ...CLASSIFICATION_RULE_IDS.map((id): ClassificationMetric => `classification_${id}`),
  "price_convert_ok",
  "price_convert_failed",
  "price_lookup_ok",
  "price_lookup_timeout",
  "price_lookup_failed",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

type MetricsState = Map<MetricName, number>;

const buildEmptyCounts = (): MetricsState => new Map(METRIC_NAMES.map((name): [MetricName, number] => [name, 0]));

const totals = buildEmptyCounts();
let windowCounts = buildEmptyCounts();
const startedAt = new Date().toISOString();
let lastFlushAt = startedAt;
let flushTimer: ReturnType<typeof setInterval> | null = null;

const bump = (counts: MetricsState, name: MetricName, amount: number): void => {
  counts.set(name, (counts.get(name) ?? 0) + amount);
};

export const incrementMetric = (name: MetricName, amount = 1): void => {
  bump(totals, name, amount);
  bump(windowCounts, name, amount);
};

export const getMetric = (name: MetricName): number => totals.get(name) ?? 0;

export const getMetricsSnapshot = () => ({
  startedAt,
  lastFlushAt,
  totals: Object.fromEntries(totals),
  window: Object.fromEntries(windowCounts),
});

const formatCounts = (counts: MetricsState): string =>
  METRIC_NAMES.map((name) => `${name}=${counts.get(name) ?? 0}`).join(" ");

export const startMetricsFlush = (intervalMs = 60_000): (() => void) => {
  if (!flushTimer) {
    flushTimer = setInterval(() => {
      const hasActivity = METRIC_NAMES.some((name) => (windowCounts.get(name) ?? 0) > 0);
      if (hasActivity) {
        console.log(`[metrics] window ${formatCounts(windowCounts)}`);
      }
      windowCounts = buildEmptyCounts();
      lastFlushAt = new Date().toISOString();
    }, intervalMs);
    flushTimer.unref();
  }

  return () => {
    if (flushTimer) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
  };
};
