import { z } from 'zod';

/** Shape a decision client must answer with. Anything else triggers the fallback rule. */
export const decisionResponseSchema = z.object({
  accepted: z.boolean(),
  rationale: z.string().min(1),
});

export type DecisionResponse = z.infer<typeof decisionResponseSchema>;
