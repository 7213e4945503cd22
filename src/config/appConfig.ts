import path from 'path';
import { z } from 'zod';
import { ConfigurationError, formatValidationErrors } from '../errors';

export const DEFAULT_MAX_DOCUMENT_BYTES = 20 * 1024 * 1024;

const AppConfigSchema = z.object({
  promptsDir: z.string().min(1),
  promptDuplicatePolicy: z.enum(['first-wins', 'last-wins']).default('first-wins'),
  apiKey: z.string().optional(),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  corsOrigin: z.string().default('*'),
  maxDocumentBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_DOCUMENT_BYTES),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

function blank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse({
    promptsDir: path.resolve(blank(env.PROMPTS_DIR) ?? 'prompts'),
    promptDuplicatePolicy: blank(env.PROMPT_DUPLICATE_POLICY),
    apiKey: blank(env.API_KEY),
    host: blank(env.API_HOST),
    port: blank(env.PORT) ?? blank(env.API_PORT),
    corsOrigin: blank(env.CORS_ORIGIN),
    maxDocumentBytes: blank(env.MAX_DOCUMENT_BYTES),
  });
  if (!result.success) {
    throw new ConfigurationError('Invalid application configuration', [
      formatValidationErrors(result.error),
    ]);
  }
  return result.data;
}
