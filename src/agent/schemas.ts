/**
 * Projections of the remote interactions API.
 *
 * The response shape evolves, so every field is optional and unknown keys
 * pass through. Parsing only fails when a present field has the wrong type.
 */

import { z } from 'zod';

export const interactionUsageSchema = z
  .object({
    total_input_tokens: z.number().optional(),
    total_output_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
    total_reasoning_tokens: z.number().optional(),
  })
  .passthrough();

export const interactionOutputSchema = z
  .object({
    type: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

export const interactionSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    outputs: z.array(interactionOutputSchema).optional(),
    usage: interactionUsageSchema.nullish(),
  })
  .passthrough();

export type Interaction = z.infer<typeof interactionSchema>;

export const apiErrorBodySchema = z
  .object({
    error: z
      .object({
        code: z.union([z.number(), z.string()]).optional(),
        message: z.string().optional(),
        status: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Request body for creating a background research interaction.
 */
export interface CreateInteractionBody {
  input: string;
  agent: string;
  background: true;
  stream: false;
  agent_config: {
    type: 'deep-research';
    thinking_summaries: string;
  };
  previous_interaction_id?: string;
}
