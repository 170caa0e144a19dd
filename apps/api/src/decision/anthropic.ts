import { createAnthropic } from "@ai-sdk/anthropic";
import { generateObject } from "ai";
import { decisionResponseSchema, type DecisionClient, type DecisionContext } from "@pantry/quote-engine";

const SYSTEM_PROMPT = [
  "You are the pricing desk of a wholesale ingredient supplier for cafés.",
  "A customer has made one counter-offer on a quote. Decide whether to accept it.",
  "Protect margin: never accept below the base price unless the order is large and stock is plentiful.",
  "Reward reasonable, specific rationales. Keep your rationale to two sentences addressed to the customer.",
].join(" ");

export interface AnthropicDecisionOptions {
  apiKey: string;
  model: string;
}

export function buildDecisionPrompt(context: DecisionContext): string {
  const money = (value: number) => `${value.toFixed(2)} ${context.currency}`;
  return [
    `Ingredient: ${context.ingredient_name} (${context.ingredient_id})`,
    `Quantity: ${context.quantity}`,
    `Stock on hand: ${context.stock_level}`,
    `Base price per unit: ${money(context.base_price)}`,
    `Quoted price per unit: ${money(context.quoted_price)}`,
    `Proposed price per unit: ${money(context.proposed_price)}`,
    `Customer rationale: ${context.rationale}`,
  ].join("\n");
}

/**
 * Decision client backed by an Anthropic model through the AI SDK.
 * The engine bounds the call with `signal` and validates the answer itself.
 */
export function createAnthropicDecisionClient(options: AnthropicDecisionOptions): DecisionClient {
  const anthropic = createAnthropic({ apiKey: options.apiKey });
  const model = anthropic(options.model);

  return {
    async decide(context, signal) {
      const result = await generateObject({
        model,
        schema: decisionResponseSchema,
        system: SYSTEM_PROMPT,
        prompt: buildDecisionPrompt(context),
        abortSignal: signal,
        maxRetries: 0,
      });
      return result.object;
    },
  };
}
