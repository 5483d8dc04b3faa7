import { z } from '@hono/zod-openapi';

export const HealthResponseSchema = z.object({
  status: z.string().openapi({ example: 'healthy' }),
  version: z.string().openapi({ example: '0.1.0' }),
  modelsAvailable: z
    .object({
      anthropic: z.boolean(),
      openai: z.boolean(),
    })
    .openapi({
      example: { anthropic: true, openai: false },
      description: 'Which vision providers have credentials configured',
    }),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
