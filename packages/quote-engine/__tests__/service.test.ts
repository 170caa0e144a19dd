import { describe, it, expect } from 'vitest';
import { createQuoteService } from '../src/service.js';
import { ManualClock } from '../src/clock.js';
import { QuoteErrorCode } from '../src/errors.js';
import { HOUR, T0, makeCatalog, makeRules, sequence, silentLogger } from './fixtures.js';

function setup() {
  const clock = new ManualClock(T0);
  const service = createQuoteService({
    catalog: makeCatalog(),
    rules: makeRules(),
    clock,
    logger: silentLogger,
    generateId: sequence('id'),
  });
  return { service, clock };
}

describe('createQuoteService', () => {
  it('runs quote → negotiate → buy against shared stores', async () => {
    const { service, clock } = setup();

    const quote = await service.quote('dark_roast_beans', 10);
    expect(quote.price_per_unit).toBe(13.5);

    clock.advance(HOUR);
    const negotiation = await service.negotiate({
      quote_id: quote.quote_id,
      proposed_price_per_unit: 12.5,
      rationale: 'Matching a competitor offer',
    });
    expect(negotiation.accepted).toBe(false);
    expect(negotiation.decided_by).toBe('fallback');

    const order = await service.buy({ quote_id: quote.quote_id, ingredient_id: 'dark_roast_beans', quantity: 10 });
    expect(order).toMatchObject({
      order_id: 'id-2',
      total_cost: 135,
      order_placed_at: T0 + HOUR,
      status: 'CONFIRMED',
    });
    expect(await service.getOrder('id-2')).toEqual(order);
    expect(await service.stockLevel('dark_roast_beans')).toBe(990);
    expect(service.lifecycle.statusOf(quote.quote_id)).toBeNull();
  });

  it('expires quotes by the injected clock', async () => {
    const { service, clock } = setup();
    const quote = await service.quote('whole_milk', 1);
    clock.advance(24 * HOUR + 1);
    await expect(
      service.buy({ quote_id: quote.quote_id, ingredient_id: 'whole_milk', quantity: 1 }),
    ).rejects.toMatchObject({ code: QuoteErrorCode.QUOTE_EXPIRED });
  });

  it('reports null stock for unknown ingredients', async () => {
    const { service } = setup();
    expect(await service.stockLevel('saffron')).toBeNull();
  });
});
