export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    stage: { type: 'string' },
    message: { type: 'string' },
    log: { type: 'array', items: { type: 'string' } },
  },
  required: ['error', 'message'],
} as const;

export const glossaryParamsSchema = {
  type: 'object',
  properties: {
    fileName: { type: 'string', minLength: 1 },
  },
  required: ['fileName'],
} as const;
