import { z } from 'zod';

export const UsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const ChoiceSchema = z.object({
  index: z.number().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z
      .string({
        required_error: 'first choice has no text content',
        invalid_type_error: 'first choice has no text content',
      })
      .min(1, 'first choice has no text content'),
  }, {
    required_error: 'first choice has no message',
    invalid_type_error: 'first choice has no message',
  }),
  finish_reason: z.string().nullish(),
});

/**
 * Only the first choice has to carry text. Usage is informational, so a
 * malformed usage block is dropped instead of failing the call.
 */
export const CompletionEnvelopeSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(z.unknown(), {
      required_error: 'response has no choices',
      invalid_type_error: 'response has no choices',
    })
    .min(1, 'response has no choices'),
  usage: UsageSchema.nullish().catch(null),
}, {
  required_error: 'response is empty',
  invalid_type_error: 'response is not an object',
});
