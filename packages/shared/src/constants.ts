export const ONE_HOUR_MS = 60 * 60 * 1000;
export const ONE_DAY_MS = 24 * ONE_HOUR_MS;

export const ORDER_STATUSES = ["CONFIRMED", "FAILED"] as const;
export const QUOTE_STATUSES = ["OPEN", "NEGOTIATED", "CONSUMED", "EXPIRED"] as const;

/** Longest rationale a customer may attach to a counter-offer. */
export const MAX_RATIONALE_LENGTH = 1000;
