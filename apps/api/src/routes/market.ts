import type { FastifyInstance } from "fastify";
import { createApiError } from "@pantry/shared";
import type { QuoteService, ResettableStorage } from "@pantry/quote-engine";
import {
  businessParamsSchema,
  buyRequestSchema,
  ingredientParamsSchema,
  negotiateRequestSchema,
  orderParamsSchema,
  parseRequest,
  quoteRequestSchema,
} from "./schemas.js";

export interface MarketRouteOptions {
  /** Set only when a database is configured; enables POST /reset-database. */
  resettable?: ResettableStorage;
}

/** Quote, negotiation, purchase and lookup routes. */
export function registerMarketRoutes(
  app: FastifyInstance,
  service: QuoteService,
  options: MarketRouteOptions = {},
) {
  // ─── POST /quote ─────────────────────────────────────────
  app.post("/quote", async (request) => {
    const { ingredient_id, quantity } = parseRequest(quoteRequestSchema, request.body);
    return service.quote(ingredient_id, quantity);
  });

  // ─── POST /negotiate ─────────────────────────────────────
  app.post("/negotiate", async (request) => {
    const body = parseRequest(negotiateRequestSchema, request.body);
    return service.negotiate(body);
  });

  // ─── POST /buy ───────────────────────────────────────────
  app.post("/buy", async (request) => {
    const body = parseRequest(buyRequestSchema, request.body);
    return service.buy(body);
  });

  // ─── GET /order/:orderId ─────────────────────────────────
  app.get("/order/:orderId", async (request, reply) => {
    const { orderId } = parseRequest(orderParamsSchema, request.params);
    const order = await service.getOrder(orderId);
    if (!order) {
      return reply.status(404).send(createApiError("ORDER_NOT_FOUND", `Order ${orderId} not found`));
    }
    return order;
  });

  // ─── GET /orders/business/:businessId ────────────────────
  app.get("/orders/business/:businessId", async (request) => {
    const { businessId } = parseRequest(businessParamsSchema, request.params);
    return service.listOrdersByBusiness(businessId);
  });

  // ─── GET /stock/:ingredientId ────────────────────────────
  app.get("/stock/:ingredientId", async (request, reply) => {
    const { ingredientId } = parseRequest(ingredientParamsSchema, request.params);
    const stock = await service.stockLevel(ingredientId);
    if (stock === null) {
      return reply
        .status(404)
        .send(createApiError("INGREDIENT_NOT_FOUND", `Ingredient ${ingredientId} not found`));
    }
    return { ingredient_id: ingredientId, stock_available: stock };
  });

  // ─── POST /reset-database ────────────────────────────────
  app.post("/reset-database", async (_request, reply) => {
    const { resettable } = options;
    if (!resettable) {
      return reply.status(400).send(createApiError("DATABASE_NOT_ENABLED", "Database is not enabled"));
    }
    await resettable.reset();
    app.log.warn("database reset, quotes and orders cleared");
    return {
      status: "success",
      message: "Database reset, quotes and orders tables cleared",
      tables_reset: ["quotes", "orders"],
    };
  });
}
