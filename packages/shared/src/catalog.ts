import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ONE_HOUR_MS } from "./constants.js";
import type { Ingredient, IngredientCatalog, PricingRules } from "./types/catalog.js";

const DATA_DIR = new URL("../data/", import.meta.url);

const ingredientSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  unit_of_measure: z.string(),
  currency: z.string().length(3),
  base_price: z.number().positive(),
  shelf_life_hours: z.number().positive(),
  initial_stock: z.number().nonnegative(),
});

const pricingRulesSchema = z.object({
  demand_window_hours: z.number().positive(),
  price_validity_hours: z.number().positive(),
  volume_discounts: z.record(
    z.array(z.object({ min_quantity: z.number(), discount: z.number() })),
  ),
  demand_rules: z.record(
    z.object({ quote_threshold: z.number(), price_hike: z.number() }),
  ),
});

function readJson(fileName: string): unknown {
  const path = fileURLToPath(new URL(fileName, DATA_DIR));
  return JSON.parse(readFileSync(path, "utf-8"));
}

/** Build a catalog keyed by ingredient id. Throws on duplicate ids. */
export function createCatalog(ingredients: Iterable<Ingredient>): IngredientCatalog {
  const catalog = new Map<string, Ingredient>();
  for (const ingredient of ingredients) {
    if (catalog.has(ingredient.id)) {
      throw new Error(`Duplicate ingredient id in catalog: ${ingredient.id}`);
    }
    catalog.set(ingredient.id, ingredient);
  }
  return catalog;
}

/** Load the default ingredient catalog shipped in data/ingredients.json. */
export function loadCatalog(): IngredientCatalog {
  const rows = z.array(ingredientSchema).parse(readJson("ingredients.json"));
  return createCatalog(
    rows.map(({ shelf_life_hours, ...rest }) => ({
      ...rest,
      shelf_life_ms: shelf_life_hours * ONE_HOUR_MS,
    })),
  );
}

/** Load the default discount tiers and demand rules shipped in data/pricing-rules.json. */
export function loadPricingRules(): PricingRules {
  const raw = pricingRulesSchema.parse(readJson("pricing-rules.json"));
  return {
    demand_window_ms: raw.demand_window_hours * ONE_HOUR_MS,
    price_validity_ms: raw.price_validity_hours * ONE_HOUR_MS,
    volume_discounts: raw.volume_discounts,
    demand_rules: raw.demand_rules,
  };
}
