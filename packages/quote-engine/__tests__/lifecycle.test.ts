import { describe, it, expect } from 'vitest';
import { QuoteLifecycleManager } from '../src/lifecycle/manager.js';
import { QuoteErrorCode } from '../src/errors.js';
import type { NegotiationRecord } from '../src/types.js';
import { HOUR, T0, makeQuote, silentLogger } from './fixtures.js';

function makeRecord(overrides?: Partial<NegotiationRecord>): NegotiationRecord {
  return {
    quote_id: 'q-1',
    proposed_price_per_unit: 16,
    rationale: 'Weekly standing order',
    accepted: true,
    decision_rationale: 'Fine by us',
    decided_by: 'ai',
    decided_at: T0 + HOUR,
    ...overrides,
  };
}

function setup(cleanupThreshold?: number) {
  const lifecycle = new QuoteLifecycleManager({ cleanupThreshold, logger: silentLogger });
  lifecycle.open(makeQuote(), T0);
  return lifecycle;
}

describe('QuoteLifecycleManager — lookup', () => {
  it('returns an open quote', async () => {
    const lifecycle = setup();
    const live = await lifecycle.lookup('q-1', T0 + HOUR);
    expect(live.status).toBe('OPEN');
    expect(live.quote.price_per_unit).toBe(17.5);
  });

  it('is still valid at exactly price_valid_until', async () => {
    const lifecycle = setup();
    await expect(lifecycle.lookup('q-1', T0 + 24 * HOUR)).resolves.toMatchObject({ status: 'OPEN' });
  });

  it('evicts and reports an expired quote', async () => {
    const lifecycle = setup();
    await expect(lifecycle.lookup('q-1', T0 + 24 * HOUR + 1)).rejects.toMatchObject({
      code: QuoteErrorCode.QUOTE_EXPIRED,
      message: 'Quote q-1 expired at 2026-01-06T09:00:00.000Z. Request a new quote.',
    });
    expect(lifecycle.statusOf('q-1')).toBeNull();
    await expect(lifecycle.lookup('q-1', T0)).rejects.toMatchObject({ code: QuoteErrorCode.QUOTE_NOT_FOUND });
  });

  it('reports an unknown quote', async () => {
    const lifecycle = setup();
    await expect(lifecycle.lookup('missing', T0)).rejects.toMatchObject({
      code: QuoteErrorCode.QUOTE_NOT_FOUND,
      category: 'not_found',
      message: 'Quote missing not found',
    });
  });
});

describe('QuoteLifecycleManager — negotiation', () => {
  it('moves an accepted successor into the negotiated store', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    const successor = makeQuote({ price_per_unit: 16, total_price: 160 });

    await expect(lifecycle.commitNegotiation(makeRecord(), successor, T0 + HOUR)).resolves.toBe('NEGOTIATED');
    expect(lifecycle.statusOf('q-1')).toBe('NEGOTIATED');
    expect(lifecycle.size).toEqual({ open: 0, negotiated: 1 });
    const live = await lifecycle.lookup('q-1', T0 + HOUR);
    expect(live.quote.total_price).toBe(160);
  });

  it('keeps a rejected quote open and records the attempt', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    const record = makeRecord({ accepted: false });

    await expect(lifecycle.commitNegotiation(record, null, T0 + HOUR)).resolves.toBe('OPEN');
    expect(lifecycle.statusOf('q-1')).toBe('OPEN');
    expect(lifecycle.getNegotiation('q-1')).toEqual(record);
  });

  it('allows only one negotiation per quote', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    await expect(lifecycle.beginNegotiation('q-1', T0)).rejects.toMatchObject({
      code: QuoteErrorCode.ALREADY_NEGOTIATED,
      message: 'Quote q-1 has already been negotiated',
    });

    await lifecycle.commitNegotiation(makeRecord({ accepted: false }), null, T0);
    await expect(lifecycle.beginNegotiation('q-1', T0)).rejects.toMatchObject({
      code: QuoteErrorCode.ALREADY_NEGOTIATED,
    });
  });

  it('frees the reservation on abandon', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    lifecycle.abandonNegotiation('q-1');
    await expect(lifecycle.beginNegotiation('q-1', T0)).resolves.toMatchObject({ quote_id: 'q-1' });
  });

  it('refuses to commit once the quote has expired', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    await expect(
      lifecycle.commitNegotiation(makeRecord(), makeQuote({ price_per_unit: 16 }), T0 + 25 * HOUR),
    ).rejects.toMatchObject({ code: QuoteErrorCode.QUOTE_EXPIRED });
    expect(lifecycle.getNegotiation('q-1')).toBeUndefined();
  });
});

describe('QuoteLifecycleManager — removal', () => {
  it('consumes a quote inside withQuote', async () => {
    const lifecycle = setup();
    const price = await lifecycle.withQuote('q-1', T0, async (handle) => {
      handle.consume();
      return handle.quote.price_per_unit;
    });
    expect(price).toBe(17.5);
    expect(lifecycle.statusOf('q-1')).toBeNull();
  });

  it('leaves the quote in place when the callback throws', async () => {
    const lifecycle = setup();
    await expect(
      lifecycle.withQuote('q-1', T0, async () => {
        throw new Error('declined');
      }),
    ).rejects.toThrow('declined');
    expect(lifecycle.statusOf('q-1')).toBe('OPEN');
  });

  it('consume drops the quote and its negotiation record', async () => {
    const lifecycle = setup();
    await lifecycle.beginNegotiation('q-1', T0);
    await lifecycle.commitNegotiation(makeRecord({ accepted: false }), null, T0);

    await expect(lifecycle.consume('q-1')).resolves.toBe(true);
    expect(lifecycle.getNegotiation('q-1')).toBeUndefined();
    await expect(lifecycle.consume('q-1')).resolves.toBe(false);
  });

  it('sweeps expired quotes once the stores pass the threshold', () => {
    const lifecycle = setup(2);
    lifecycle.open(makeQuote({ quote_id: 'q-2' }), T0);
    expect(lifecycle.size).toEqual({ open: 2, negotiated: 0 });

    const later = T0 + 30 * HOUR;
    lifecycle.open(makeQuote({ quote_id: 'q-3', price_valid_until: later + 24 * HOUR }), later);

    expect(lifecycle.size).toEqual({ open: 1, negotiated: 0 });
    expect(lifecycle.statusOf('q-3')).toBe('OPEN');
  });

  it('counts negotiated quotes toward the sweep threshold', async () => {
    const lifecycle = setup(2);
    await lifecycle.beginNegotiation('q-1', T0);
    await lifecycle.commitNegotiation(makeRecord(), makeQuote({ price_per_unit: 16, total_price: 160 }), T0);
    lifecycle.open(makeQuote({ quote_id: 'q-2' }), T0);
    expect(lifecycle.size).toEqual({ open: 1, negotiated: 1 });

    const later = T0 + 30 * HOUR;
    lifecycle.open(makeQuote({ quote_id: 'q-3', price_valid_until: later + 24 * HOUR }), later);

    expect(lifecycle.size).toEqual({ open: 1, negotiated: 0 });
    expect(lifecycle.getNegotiation('q-1')).toBeUndefined();
  });

  it('sweepExpired returns the number evicted', () => {
    const lifecycle = setup();
    lifecycle.open(makeQuote({ quote_id: 'q-2', price_valid_until: T0 + 48 * HOUR }), T0);
    expect(lifecycle.sweepExpired(T0 + 30 * HOUR)).toBe(1);
    expect(lifecycle.statusOf('q-2')).toBe('OPEN');
  });
});
