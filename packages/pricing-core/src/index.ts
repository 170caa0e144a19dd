// Types
export type { PriceQuote, PricingStrategy, StrategyKind, PricingConfig } from './types.js';
export { PricingConfigError } from './types.js';

// Demand + discount
export { DemandTracker } from './demand/tracker.js';
export { VolumeDiscountCalculator } from './discount/volume.js';

// Strategies
export { createDefaultStrategy } from './strategy/default.js';
export { createVolumeDiscountStrategy } from './strategy/volume-discount.js';
export { createDemandAdjustedStrategy, computeDemandMarkup } from './strategy/demand-adjusted.js';
export { createPricingPipeline } from './strategy/pipeline.js';
export type { PricingPipeline } from './strategy/pipeline.js';

// Validation
export { validatePricingConfig, validateTiers, validateDemandRule } from './validation.js';

// Utils
export { roundMoney } from './utils.js';
