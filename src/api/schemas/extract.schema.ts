export const outputRowSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    zh: { type: 'string' },
    en: { type: 'string' },
  },
  required: ['id', 'zh', 'en'],
} as const;

export const extractResponseSchema = {
  type: 'object',
  properties: {
    outputFile: { type: 'string' },
    termCount: { type: 'number' },
    chunkCount: { type: 'number' },
    modelId: { type: 'string' },
    rows: { type: 'array', items: outputRowSchema },
    log: { type: 'array', items: { type: 'string' } },
  },
  required: ['outputFile', 'termCount', 'rows', 'log'],
} as const;

export const modelsResponseSchema = {
  type: 'object',
  properties: {
    defaultModel: { type: 'string' },
    models: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          label: { type: 'string' },
          family: { type: 'string', enum: ['chat', 'completion'] },
        },
        required: ['id', 'label', 'family'],
      },
    },
  },
  required: ['defaultModel', 'models'],
} as const;
