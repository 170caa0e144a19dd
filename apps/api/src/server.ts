import Fastify from "fastify";
import cors from "@fastify/cors";
import { createDb, DrizzleStorage } from "@pantry/db";
import { loadCatalog, loadPricingRules } from "@pantry/shared";
import {
  createQuoteService,
  type Clock,
  type DecisionClient,
  type InventoryService,
  type ResettableStorage,
  type Storage,
} from "@pantry/quote-engine";
import type { AppConfig } from "./config.js";
import { createAnthropicDecisionClient } from "./decision/anthropic.js";
import { errorHandler } from "./errors.js";
import { registerMarketRoutes } from "./routes/market.js";

/** Collaborators a caller may supply instead of the ones built from config. */
export interface ServerOverrides {
  storage?: Storage;
  inventory?: InventoryService;
  decisionClient?: DecisionClient;
  clock?: Clock;
  generateId?: () => string;
  logger?: boolean;
}

function isResettable(storage: Storage): storage is Storage & ResettableStorage {
  return "reset" in storage && typeof storage.reset === "function";
}

export async function createServer(config: AppConfig, overrides: ServerOverrides = {}) {
  const app = Fastify({
    logger: overrides.logger === false ? false : { level: config.logLevel },
  });

  // ─── Storage ─────────────────────────────────────────────
  // In memory unless a database is configured.
  const storage =
    overrides.storage ?? (config.databaseUrl ? new DrizzleStorage(createDb(config.databaseUrl)) : undefined);

  // ─── Negotiation decisions ───────────────────────────────
  const decisionClient =
    overrides.decisionClient ??
    (config.anthropicApiKey
      ? createAnthropicDecisionClient({ apiKey: config.anthropicApiKey, model: config.decisionModel })
      : undefined);
  if (!decisionClient) {
    app.log.warn("no decision client configured, negotiations use the deterministic rule");
  }

  const service = createQuoteService({
    catalog: loadCatalog(),
    rules: loadPricingRules(),
    storage,
    inventory: overrides.inventory,
    decisionClient,
    clock: overrides.clock,
    decisionTimeoutMs: config.decisionTimeoutMs,
    logger: app.log,
    generateId: overrides.generateId,
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : [/^http:\/\/localhost:\d+$/],
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  app.setErrorHandler(errorHandler);

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  registerMarketRoutes(app, service, {
    resettable: storage && isResettable(storage) ? storage : undefined,
  });

  return app;
}
