import { z } from 'zod';
import { DEFAULT_MODELS } from '../providers/base.js';

export const DEFAULT_MODEL = DEFAULT_MODELS.openai;
export const DEFAULT_TEMPERATURE = 0;

const nonEmpty = (field: string) => z.string().min(1, `${field} must not be empty`);

export const RoleSchema = z.enum(['system', 'user', 'assistant'], {
  errorMap: () => ({ message: 'role must be one of system, user, assistant' }),
});

export const MessageSchema = z.object({
  role: RoleSchema,
  content: nonEmpty('content'),
});

export const ConversationSchema = z
  .array(MessageSchema)
  .min(1, 'conversation must contain at least one message')
  .superRefine((messages, ctx) => {
    messages.forEach((message, index) => {
      if (message.role === 'system' && index > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'role'],
          message: 'a system message is only allowed as the first message',
        });
      }
    });
  });

export const GenerationConfigSchema = z.object({
  model: nonEmpty('model'),
  temperature: z
    .number({ invalid_type_error: 'temperature must be a number' })
    .min(0, 'temperature must be between 0 and 1')
    .max(1, 'temperature must be between 0 and 1'),
  maxTokens: z.number().int().positive().optional(),
});

export const PromptSchema = nonEmpty('prompt');
