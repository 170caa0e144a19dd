import { roundMoney } from '@pantry/pricing-core';
import { MAX_RATIONALE_LENGTH, type IngredientCatalog } from '@pantry/shared';
import type { Clock, DecisionClient, DecisionContext, InventoryService } from '../collaborators.js';
import { ingredientNotFound, invalidProposal } from '../errors.js';
import type { QuoteLifecycleManager } from '../lifecycle/manager.js';
import { createLogger, type EngineLogger } from '../logger.js';
import type {
  DecisionSource,
  NegotiateRequest,
  NegotiationRecord,
  NegotiationResult,
  Quote,
} from '../types.js';
import { evaluateFallback } from './fallback.js';
import { decisionResponseSchema } from './schema.js';
import { withTimeout } from './timeout.js';

export const DEFAULT_DECISION_TIMEOUT_MS = 5000;

export interface NegotiationEngineOptions {
  catalog: IngredientCatalog;
  lifecycle: QuoteLifecycleManager;
  inventory: InventoryService;
  clock: Clock;
  decisionClient?: DecisionClient;
  timeoutMs?: number;
  logger?: EngineLogger;
}

interface Decision {
  accepted: boolean;
  rationale: string;
  decided_by: DecisionSource;
}

type AiOutcome = { ok: true; decision: Decision } | { ok: false; reason: string };

/** Successor of `quote` at `price`: same id and validity window, new total. */
export function buildSuccessorQuote(quote: Quote, price: number): Quote {
  return {
    ...quote,
    price_per_unit: price,
    total_price: roundMoney(price * quote.quantity),
  };
}

/**
 * Decides a customer's one counter-offer on an open quote.
 *
 * Pipeline:
 * 1. Validate the proposal shape (price > 0, rationale 1–1000 chars)
 * 2. Reserve the quote under its lock (not found / expired / already negotiated)
 * 3. Reject proposals at or above the quoted price
 * 4. Ask the decision client, bounded by a timeout, with no lock held
 * 5. Fall back to the deterministic rule if the client is absent, fails or answers malformed
 * 6. Re-validate and commit the outcome under the lock
 */
export class NegotiationDecisionEngine {
  private readonly logger: EngineLogger;
  private readonly timeoutMs: number;

  constructor(private readonly options: NegotiationEngineOptions) {
    this.logger = options.logger ?? createLogger('negotiation');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DECISION_TIMEOUT_MS;
  }

  async negotiate(request: NegotiateRequest, now: number = this.options.clock.now()): Promise<NegotiationResult> {
    const { lifecycle, catalog, inventory, clock } = this.options;
    const { quote_id, proposed_price_per_unit: proposed, rationale } = request;

    validateProposalShape(request);

    const quote = await lifecycle.beginNegotiation(quote_id, now);
    try {
      if (proposed >= quote.price_per_unit) {
        throw invalidProposal(
          `Proposed price ${proposed.toFixed(2)} must be lower than the quoted ${quote.price_per_unit.toFixed(2)}`,
          { quote_id, proposed_price_per_unit: proposed, price_per_unit: quote.price_per_unit },
        );
      }

      const ingredient = catalog.get(quote.ingredient_id);
      if (!ingredient) {
        throw ingredientNotFound(quote.ingredient_id);
      }
      const stock = await inventory.check(ingredient.id, quote.quantity);

      const context: DecisionContext = {
        quote_id,
        ingredient_id: ingredient.id,
        ingredient_name: ingredient.name,
        currency: ingredient.currency,
        quantity: quote.quantity,
        base_price: ingredient.base_price,
        quoted_price: quote.price_per_unit,
        proposed_price: proposed,
        rationale,
        stock_level: stock.stock_level,
      };
      const decision = await this.decide(context);

      const decidedAt = Math.max(now, clock.now());
      const record: NegotiationRecord = {
        quote_id,
        proposed_price_per_unit: proposed,
        rationale,
        accepted: decision.accepted,
        decision_rationale: decision.rationale,
        decided_by: decision.decided_by,
        decided_at: decidedAt,
      };
      const successor = decision.accepted ? buildSuccessorQuote(quote, proposed) : null;

      const status = await lifecycle.commitNegotiation(record, successor, decidedAt);
      this.logger.info(
        { quote_id, proposed, accepted: decision.accepted, decided_by: decision.decided_by, status },
        'negotiation decided',
      );

      return {
        original_quote: quote,
        proposed_price_per_unit: proposed,
        final_price_per_unit: successor ? successor.price_per_unit : quote.price_per_unit,
        accepted: decision.accepted,
        decision_rationale: decision.rationale,
        decided_by: decision.decided_by,
        new_quote: successor,
      };
    } catch (err) {
      lifecycle.abandonNegotiation(quote_id);
      throw err;
    }
  }

  private async decide(context: DecisionContext): Promise<Decision> {
    const outcome = await this.requestAiDecision(context);
    if (outcome.ok) {
      return outcome.decision;
    }

    this.logger.warn({ quote_id: context.quote_id, reason: outcome.reason }, 'using fallback negotiation rule');
    const fallback = evaluateFallback({
      base_price: context.base_price,
      quoted_price: context.quoted_price,
      proposed_price: context.proposed_price,
    });
    return { ...fallback, decided_by: 'fallback' };
  }

  private async requestAiDecision(context: DecisionContext): Promise<AiOutcome> {
    const client = this.options.decisionClient;
    if (!client) {
      return { ok: false, reason: 'no decision client configured' };
    }

    let raw: unknown;
    try {
      raw = await withTimeout((signal) => client.decide(context, signal), this.timeoutMs);
    } catch (err) {
      this.logger.warn({ err, quote_id: context.quote_id }, 'decision client failed');
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }

    const parsed = decisionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, reason: `malformed decision response: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
    }
    return { ok: true, decision: { ...parsed.data, decided_by: 'ai' } };
  }
}

function validateProposalShape(request: NegotiateRequest): void {
  const { quote_id, proposed_price_per_unit: proposed, rationale } = request;
  if (!Number.isFinite(proposed) || proposed <= 0) {
    throw invalidProposal(`Proposed price must be a positive number, got ${proposed}`, {
      quote_id,
      proposed_price_per_unit: proposed,
    });
  }
  // Counted in code points so astral characters count once.
  const length = [...rationale].length;
  if (length === 0 || length > MAX_RATIONALE_LENGTH) {
    throw invalidProposal(`Rationale must be between 1 and ${MAX_RATIONALE_LENGTH} characters`, {
      quote_id,
      rationale_length: length,
    });
  }
}
