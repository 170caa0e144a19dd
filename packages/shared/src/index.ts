// ─── Shared Types ────────────────────────────────────────────
export type {
  Ingredient,
  IngredientCatalog,
  VolumeDiscountTier,
  DemandRule,
  PricingRules,
} from "./types/catalog.js";
export type { ApiResponse, ApiError } from "./types/api.js";

// ─── Constants ───────────────────────────────────────────────
export {
  ONE_HOUR_MS,
  ONE_DAY_MS,
  ORDER_STATUSES,
  QUOTE_STATUSES,
  MAX_RATIONALE_LENGTH,
} from "./constants.js";

// ─── Catalog ─────────────────────────────────────────────────
export { createCatalog, loadCatalog, loadPricingRules } from "./catalog.js";

// ─── Utilities ───────────────────────────────────────────────
export { createApiError } from "./utils/api.js";
