import type { QuoteStatus } from '../types.js';

/** Events that trigger quote state transitions. */
export type QuoteEvent =
  | 'negotiation_accepted'
  | 'negotiation_rejected'
  | 'purchased'
  | 'expired';

/** Terminal states that do not accept any transitions. */
const TERMINAL_STATES: ReadonlySet<QuoteStatus> = new Set(['CONSUMED', 'EXPIRED']);

/**
 * Valid state transitions map.
 * Key: current status → Map of event → next status.
 * A rejected negotiation leaves the quote OPEN; only one negotiation is
 * allowed, which the lifecycle manager enforces through the negotiation record.
 */
const TRANSITIONS: Partial<Record<QuoteStatus, Partial<Record<QuoteEvent, QuoteStatus>>>> = {
  OPEN: {
    negotiation_accepted: 'NEGOTIATED',
    negotiation_rejected: 'OPEN',
    purchased: 'CONSUMED',
    expired: 'EXPIRED',
  },
  NEGOTIATED: {
    purchased: 'CONSUMED',
    expired: 'EXPIRED',
  },
};

/**
 * Attempt a state transition. Returns the new status if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: QuoteStatus, event: QuoteEvent): QuoteStatus | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  const allowed = TRANSITIONS[current];
  if (!allowed) {
    return null;
  }
  return allowed[event] ?? null;
}
