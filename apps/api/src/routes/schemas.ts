import { z } from "zod";
import { RequestValidationError } from "../errors.js";

export const quoteRequestSchema = z.object({
  ingredient_id: z.string().min(1),
  quantity: z.number().positive(),
});

// Price and rationale bounds are checked by the negotiation engine so they
// surface as INVALID_PROPOSAL.
export const negotiateRequestSchema = z.object({
  quote_id: z.string().min(1),
  proposed_price_per_unit: z.number(),
  rationale: z.string(),
});

export const buyRequestSchema = z.object({
  quote_id: z.string().min(1).optional(),
  ingredient_id: z.string().min(1),
  quantity: z.number().positive(),
  business_id: z.string().min(1).optional(),
  max_acceptable_price_per_unit: z.number().positive().optional(),
});

export const orderParamsSchema = z.object({ orderId: z.string().min(1) });
export const businessParamsSchema = z.object({ businessId: z.string().min(1) });
export const ingredientParamsSchema = z.object({ ingredientId: z.string().min(1) });

/** Parse `input` or throw a RequestValidationError (answered as 400). */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(parsed.error.issues);
  }
  return parsed.data;
}
