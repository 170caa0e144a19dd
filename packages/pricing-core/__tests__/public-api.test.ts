import { describe, expect, it } from 'vitest';
import * as api from '../src/index.js';

describe('Public API (@pantry/pricing-core)', () => {
  const functions: (keyof typeof api)[] = [
    'createDefaultStrategy',
    'createVolumeDiscountStrategy',
    'createDemandAdjustedStrategy',
    'computeDemandMarkup',
    'createPricingPipeline',
    'validatePricingConfig',
    'validateTiers',
    'validateDemandRule',
    'roundMoney',
  ];

  it.each(functions)('exports %s', (name) => {
    expect(typeof api[name]).toBe('function');
  });

  it('exports the DemandTracker and VolumeDiscountCalculator classes', () => {
    expect(new api.DemandTracker(1000).countWithinWindow('x', 0)).toBe(0);
    expect(new api.VolumeDiscountCalculator({}).discountFraction('x', 10)).toBe(0);
  });

  it('exports PricingConfigError', () => {
    expect(api.PricingConfigError.INVALID_WINDOW).toBe('INVALID_WINDOW');
  });
});

describe('roundMoney', () => {
  it('rounds half-cents up', () => {
    expect(api.roundMoney(1.005)).toBe(1.01);
    expect(api.roundMoney(13.799999999999999)).toBe(13.8);
    expect(api.roundMoney(7)).toBe(7);
  });
});
