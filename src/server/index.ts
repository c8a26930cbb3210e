/**
 * Hono web server for the datasets API
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import api from "./routes/api.ts";
import admin from "./routes/admin.ts";
import { env } from "../config/env.ts";
import { SERVER_CONSTANTS, SECURITY_CONSTANTS } from "../config/constants.ts";
import { createRateLimitMiddleware, rateLimiter } from "./middleware/rateLimiter.ts";
import { createAuthMiddleware } from "./middleware/auth.ts";
import { createLogger } from "../core/logger.ts";
import { memoryCache } from "../cache/memory.ts";
import { getCacheTotalMetrics } from "../db/repository.ts";
import { metricsCollector, type MetricsSources } from "../metrics/collector.ts";
import { respondWithError } from "./routes/responses.ts";

const log = createLogger("http");

const app = new Hono();

// Middleware
app.use("*", logger((message, ...rest) => log.info([message, ...rest].join(" "))));
app.use(
  "*",
  cors({
    origin: (origin) => {
      // Allow requests with no origin (same-origin, curl, etc.)
      if (!origin) return "*";
      // Check if origin is in allowed list
      if (env.allowedOrigins.includes(origin)) return origin;
      // In development, allow all localhost origins
      // In production, only allow configured origins (no localhost wildcards)
      if (env.nodeEnv !== "production" && origin.startsWith("http://localhost:")) {
        return origin;
      }
      // Reject unknown origins
      return null;
    },
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization", SECURITY_CONSTANTS.AUTH_HEADER_NAME],
    exposeHeaders: ["X-Error-Code"],
    maxAge: SERVER_CONSTANTS.CORS_MAX_AGE_SECONDS,
  })
);

// Request timing
app.use("*", async (c, next) => {
  const started = performance.now();
  await next();
  metricsCollector.recordRequest(c.req.method, c.req.routePath, c.res.status, performance.now() - started);
});

// Rate limiting middleware (bypass health check endpoints to avoid 429 for probes)
app.use("*", createRateLimitMiddleware(SECURITY_CONSTANTS.BYPASS_AUTH_PATHS));

// Health checks
app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));
app.get("/healthcheck", (c) => c.text("ok"));

// Rate limit stats endpoint
app.get("/rate-limit-stats", (c) => c.json(rateLimiter.getStats()));

function metricsSources(): MetricsSources {
  return { memoryCache: memoryCache.getStats(), cacheTotals: getCacheTotalMetrics() };
}

app.get("/metrics", (c) => {
  try {
    if (c.req.query("format") === "json") {
      return c.json(metricsCollector.getMetrics(metricsSources()));
    }
    c.header("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
    return c.body(metricsCollector.getPrometheusMetrics(metricsSources()));
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Admin routes exist only when a key is configured
if (env.adminApiKey) {
  app.use("/admin/*", createAuthMiddleware(env.adminApiKey));
  app.route("/admin", admin);
}

// Datasets API
app.route("/", api);

app.notFound((c) => {
  c.header("X-Error-Code", "RouteNotFound");
  return c.json({ error: "Not found." }, 404);
});

app.onError((error, c) => respondWithError(c, error));

export default app;
export { app };
