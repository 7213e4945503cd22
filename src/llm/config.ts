import { z } from 'zod';
import { ConfigurationError, formatValidationErrors } from '../errors';

export const DEFAULT_TIMEOUT_MS = 60000;

const SamplingSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  temperature: z.coerce.number().min(0).max(2).optional(),
  topP: z.coerce.number().min(0).max(1).optional(),
  topK: z.coerce.number().int().positive().optional(),
});

export const GeminiConfigSchema = SamplingSchema.extend({
  backend: z.literal('gemini'),
  apiKey: z.string({ required_error: 'GOOGLE_API_KEY is required' }).min(1, 'GOOGLE_API_KEY is required'),
  baseUrl: z.string().url().optional(),
  textModel: z.string().min(1).default('gemini-2.0-flash'),
  multimodalModel: z.string().min(1).default('gemini-2.0-flash'),
});

export const OllamaConfigSchema = SamplingSchema.extend({
  backend: z.literal('ollama'),
  baseUrl: z.string({ required_error: 'OLLAMA_BASE_URL is required' }).url(),
  textModel: z.string({ required_error: 'OLLAMA_TEXT_MODEL is required' }).min(1),
  multimodalModel: z.string({ required_error: 'OLLAMA_MULTIMODAL_MODEL is required' }).min(1),
  keepAlive: z.string().default('5m'),
});

export const ProviderConfigSchema = z.discriminatedUnion('backend', [
  GeminiConfigSchema,
  OllamaConfigSchema,
]);

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid LLM provider configuration', [
      formatValidationErrors(result.error),
    ]);
  }
  return result.data;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/** Reads provider settings from environment variables. */
export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const backend = blankToUndefined(env.LLM_BACKEND) ?? 'gemini';
  const sampling = {
    timeoutMs: blankToUndefined(env.LLM_TIMEOUT_MS),
    temperature: blankToUndefined(env.LLM_TEMPERATURE),
    topP: blankToUndefined(env.LLM_TOP_P),
    topK: blankToUndefined(env.LLM_TOP_K),
  };

  if (backend === 'ollama') {
    return parseConfig(ProviderConfigSchema, {
      backend,
      ...sampling,
      baseUrl: blankToUndefined(env.OLLAMA_BASE_URL),
      textModel: blankToUndefined(env.OLLAMA_TEXT_MODEL),
      multimodalModel: blankToUndefined(env.OLLAMA_MULTIMODAL_MODEL),
      keepAlive: blankToUndefined(env.OLLAMA_KEEP_ALIVE),
    });
  }

  return parseConfig(ProviderConfigSchema, {
    backend,
    ...sampling,
    apiKey: blankToUndefined(env.GOOGLE_API_KEY),
    baseUrl: blankToUndefined(env.GEMINI_BASE_URL),
    textModel: blankToUndefined(env.GEMINI_TEXT_MODEL),
    multimodalModel: blankToUndefined(env.GEMINI_MULTIMODAL_MODEL),
  });
}
