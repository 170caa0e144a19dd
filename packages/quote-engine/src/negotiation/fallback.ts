/** Largest discount off the quoted price the fallback rule will grant. */
export const FALLBACK_MAX_DISCOUNT = 0.1;

/** Slack for binary rounding when comparing a proposal against the discount floor. */
const PRICE_EPSILON = 1e-9;

export const DETERMINISTIC_PREFIX = 'Evaluated by deterministic pricing rules';

export interface FallbackInput {
  base_price: number;
  quoted_price: number;
  proposed_price: number;
}

export interface FallbackDecision {
  accepted: boolean;
  rationale: string;
}

/**
 * Deterministic accept/reject rule used when no AI decision is available.
 *
 * Accept iff the proposal is at or above the base price AND no more than 10%
 * below the quoted price. The floor is compared unrounded and shown to the
 * cent only in the rationale, which lists every condition that failed.
 */
export function evaluateFallback(input: FallbackInput): FallbackDecision {
  const { base_price, quoted_price, proposed_price } = input;
  const floor = quoted_price * (1 - FALLBACK_MAX_DISCOUNT);
  const pct = Math.round(FALLBACK_MAX_DISCOUNT * 100);

  const failures: string[] = [];
  if (proposed_price < base_price) {
    failures.push(
      `proposed price below base price (${proposed_price.toFixed(2)} < ${base_price.toFixed(2)})`,
    );
  }
  if (proposed_price + PRICE_EPSILON < floor) {
    failures.push(
      `discount exceeds ${pct}% (${proposed_price.toFixed(2)} < ${floor.toFixed(2)})`,
    );
  }

  if (failures.length > 0) {
    return { accepted: false, rationale: `${DETERMINISTIC_PREFIX}: rejected, ${failures.join('; ')}.` };
  }
  return {
    accepted: true,
    rationale:
      `${DETERMINISTIC_PREFIX}: accepted, ${proposed_price.toFixed(2)} is at or above the base price ` +
      `and within ${pct}% of the quoted ${quoted_price.toFixed(2)}.`,
  };
}
