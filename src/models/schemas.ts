import { z } from 'zod';

/** Optional integer that tolerates `null` in the payload */
const optionalInt = z
  .number()
  .int()
  .nullable()
  .optional()
  .transform((v) => v ?? undefined);

/** One entry of the `GET /models` listing */
export const modelEntrySchema = z.object({
  id: z.string().min(1),
  context_length: z.number().int().positive(),
  supported_parameters: z
    .array(z.string())
    .nullable()
    .optional()
    .transform((v) => v ?? []),
  top_provider: z
    .object({
      context_length: optionalInt,
      max_completion_tokens: optionalInt,
    })
    .nullable()
    .optional()
    .transform((v) => v ?? undefined),
});

export type ModelEntry = z.infer<typeof modelEntrySchema>;

/** Envelope of the `GET /models` listing; entries are validated one by one */
export const modelsPayloadSchema = z.object({
  data: z.array(z.unknown()),
});

const toolCallSchema = z.object({
  id: z.string().nullable().optional(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z
      .string()
      .nullable()
      .optional()
      .transform((v) => v ?? '{}'),
  }),
});

/** Response body of `POST /chat/completions` */
export const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(toolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
});

/** Error body some providers return with HTTP 200 */
export const errorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string().optional(), code: z.unknown() })]),
});
