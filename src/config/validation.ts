import { z } from 'zod';

export const idModeSchema = z.enum(['sequential', 'random_token']);
export const outputFormatSchema = z.enum(['csv', 'xlsx']);

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(7860),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  llm: z.object({
    model: z.string().min(1).default('claude-3-5-sonnet-latest'),
    anthropicApiKey: z.string().default(''),
    openaiApiKey: z.string().default(''),
    openaiBaseUrl: z.string().url().optional(),
    maxTokens: z.number().int().positive().default(5000),
    temperature: z.number().min(0).max(2).default(0),
    timeoutMs: z.number().int().positive().default(120_000),
    contextTokens: z.number().int().nonnegative().default(150_000),
  }),
  extraction: z.object({
    maxChars: z.number().int().positive().default(50_000),
    templateFile: z.string().min(1).optional(),
    idMode: idModeSchema.default('random_token'),
    tokenLength: z.number().int().min(4).max(32).default(6),
  }),
  output: z.object({
    dir: z.string().min(1).default('./glossary_files'),
    format: outputFormatSchema.default('csv'),
  }),
  storage: z.object({
    maxUploadSizeMB: z.number().positive().default(50),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type IdMode = z.infer<typeof idModeSchema>;
export type OutputFormat = z.infer<typeof outputFormatSchema>;
