import cors from "cors";
import express, { type Express, NextFunction, Request, Response } from "express";
import { randomUUID } from "node:crypto";
import type { z } from "zod";

import { loadConfig, type AppConfig } from "./config.js";
import { getMetricsSnapshot, incrementMetric } from "./metrics.js";
import { analyzeFront, analyzeLabel, analyzeLabelText, buildFrontPriceQuery } from "./pipeline.js";
import { convertPrice } from "./price.js";
import { createMockPriceSearch, lookupPrice, type PriceSearchProvider } from "./priceLookup.js";
import {
  AnalyzeLabelRequestSchema,
  ConvertPriceRequestSchema,
  formatIssues,
  PriceLookupRequestSchema,
  ProductInfoRequestSchema,
} from "./schemas/scanRequest.js";

export interface AppDeps {
  config?: AppConfig;
  /** Overrides the provider picked from PRICE_LOOKUP_MODE */
  priceSearch?: PriceSearchProvider | null;
}

// ============================================================================
// RATE LIMITING
// ============================================================================

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const RATE_LIMIT_WINDOW_MS = 60_000;

export type RateLimitCheck = (clientId: string) => { allowed: boolean; retryAfter?: number };

export const createRateLimiter = (limitPerMinute: number): RateLimitCheck => {
  const entries = new Map<string, RateLimitEntry>();
  let nextPruneAt = Date.now() + RATE_LIMIT_WINDOW_MS;

  const prune = (now: number) => {
    if (now < nextPruneAt) return;
    for (const [key, entry] of entries) {
      if (now > entry.resetAt) entries.delete(key);
    }
    nextPruneAt = now + RATE_LIMIT_WINDOW_MS;
  };

  return (clientId) => {
    const now = Date.now();
    prune(now);

    let entry = entries.get(clientId);
    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + RATE_LIMIT_WINDOW_MS };
      entries.set(clientId, entry);
    }
    if (entry.count >= limitPerMinute) {
      return { allowed: false, retryAfter: Math.max(1, Math.ceil((entry.resetAt - now) / 1000)) };
    }

    entry.count++;
    return { allowed: true };
  };
};

// ============================================================================
// HELPERS
// ============================================================================

const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const parseBody = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response): T | null => {
  const parsed = schema.safeParse(req.body);
  if (parsed.success) return parsed.data;
  res.status(400).json({
    status: "failed",
    message: "Invalid request body",
    issues: formatIssues(parsed.error),
  });
  return null;
};

const isBodyParseError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";

// ============================================================================
// EXPRESS APP
// ============================================================================

export const createApp = (deps: AppDeps = {}): Express => {
  const config = deps.config ?? loadConfig();
  const priceSearch =
    deps.priceSearch !== undefined
      ? deps.priceSearch
      : config.priceLookupMode === "mock"
        ? createMockPriceSearch()
        : null;
  const checkRateLimit = createRateLimiter(config.scanRateLimitPerMinute);

  const app = express();
  app.set("trust proxy", 1);
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  // Request logging without bodies; label text stays out of the logs
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    res.setHeader("x-request-id", requestId);
    const startedAt = process.hrtime.bigint();

    res.on("finish", () => {
      if (req.path === "/health") return;
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      console.log(`[HTTP] ${res.statusCode} ${req.method} ${req.path} (${durationMs.toFixed(1)}ms) id=${requestId}`);
    });

    next();
  });

  app.use("/api", (req: Request, res: Response, next: NextFunction) => {
    const limit = checkRateLimit(req.ip ?? "unknown");
    if (!limit.allowed) {
      res.setHeader("Retry-After", String(limit.retryAfter ?? 60));
      res.status(429).json({ status: "failed", message: "Too many requests, slow down" });
      return;
    }
    next();
  });

  app.post(
    "/api/analyze-label",
    asyncRoute(async (req, res) => {
      const body = parseBody(AnalyzeLabelRequestSchema, req, res);
      if (!body) return;

      const pipelineOptions = {
        minConfidence: config.labelConfidenceThreshold,
        lineTolerance: config.lineTolerance,
      };
      const outcome = body.fragments
        ? await analyzeLabel(body.fragments, pipelineOptions)
        : await analyzeLabelText(body.text ?? "", pipelineOptions);

      res.json(outcome);
    }),
  );

  app.post("/api/product-info", (req: Request, res: Response) => {
    const body = parseBody(ProductInfoRequestSchema, req, res);
    if (!body) return;

    const result = analyzeFront(body.fragments, {
      priceText: body.priceText,
      weightInGrams: body.weightInGrams,
      minConfidence: config.frontConfidenceThreshold,
      lineTolerance: config.lineTolerance,
      vndToInrRate: config.vndToInrRate,
    });
    res.json({ status: "ok", ...result });
  });

  app.post("/api/convert-price", (req: Request, res: Response) => {
    const body = parseBody(ConvertPriceRequestSchema, req, res);
    if (!body) return;

    const price = convertPrice(body.price, body.weightInGrams, config.vndToInrRate);
    incrementMetric(price.currency === "unparsed" ? "price_convert_failed" : "price_convert_ok");
    res.json({ status: "ok", price });
  });

  app.post(
    "/api/price-lookup",
    asyncRoute(async (req, res) => {
      if (!priceSearch) {
        res.status(404).json({ status: "disabled", message: "Price lookup is not enabled" });
        return;
      }
      const body = parseBody(PriceLookupRequestSchema, req, res);
      if (!body) return;

      // Stop the provider when the client goes away before we answer
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      // Fragments take precedence: the query and grams come from the pack itself
      const { query, grams } = body.fragments
        ? buildFrontPriceQuery(body.fragments, {
            weightInGrams: body.weightInGrams,
            minConfidence: config.frontConfidenceThreshold,
            lineTolerance: config.lineTolerance,
          })
        : { query: body.query ?? null, grams: body.weightInGrams ?? null };

      const outcome = await lookupPrice(query, priceSearch, {
        timeoutMs: config.priceLookupTimeoutMs,
        signal: controller.signal,
        weightInGrams: grams,
        vndToInrRate: config.vndToInrRate,
      });

      const status =
        outcome.status === "ok" ? 200 : outcome.status === "timeout" ? 504 : query ? 502 : 422;
      res.status(status).json(outcome);
    }),
  );

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      uptimeSec: Math.round(process.uptime()),
      priceLookup: priceSearch ? "enabled" : "disabled",
      metrics: getMetricsSnapshot(),
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error) && !res.headersSent) {
      res.status(400).json({ status: "failed", message: "Malformed JSON body" });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error) {
      console.error(`[ERR] ${req.method} ${req.path}: ${message}\n${error.stack ?? ""}`);
    } else {
      console.error(`[ERR] ${req.method} ${req.path}: ${message}`);
    }

    if (res.headersSent) {
      return;
    }

    res.status(500).json({ error: "internal_error" });
  });

  return app;
};
