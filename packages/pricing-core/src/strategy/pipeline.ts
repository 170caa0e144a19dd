import { DemandTracker } from '../demand/tracker.js';
import { VolumeDiscountCalculator } from '../discount/volume.js';
import type { PricingConfig, PricingStrategy } from '../types.js';
import { validatePricingConfig } from '../validation.js';
import { createDefaultStrategy } from './default.js';
import { createDemandAdjustedStrategy } from './demand-adjusted.js';
import { createVolumeDiscountStrategy } from './volume-discount.js';

export interface PricingPipeline {
  strategy: PricingStrategy;
  tracker: DemandTracker;
  discounts: VolumeDiscountCalculator;
}

/**
 * Assemble base price → volume discount → demand markup from a PricingConfig.
 * Pass an existing tracker to share demand state with another pipeline.
 * Throws if the configuration is invalid.
 */
export function createPricingPipeline(
  config: PricingConfig,
  tracker: DemandTracker = new DemandTracker(config.demand_window_ms),
): PricingPipeline {
  const invalid = validatePricingConfig(config);
  if (invalid) {
    throw new Error(`Invalid pricing config: ${invalid.error}${invalid.detail ? ` (${invalid.detail})` : ''}`);
  }

  const discounts = new VolumeDiscountCalculator(config.volume_discounts);
  const strategy = createDemandAdjustedStrategy(
    createVolumeDiscountStrategy(createDefaultStrategy(config.price_validity_ms), discounts),
    tracker,
    config.demand_rules,
    config.demand_window_ms,
  );

  return { strategy, tracker, discounts };
}
