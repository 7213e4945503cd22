import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type Content,
  type GenerateContentRequest,
  type ModelParams,
  type Part,
  type RequestOptions,
  type SingleRequestOptions,
  type UsageMetadata,
} from '@google/generative-ai';
import { BackendError, CancelledError, TimeoutError, TransportError, toError } from '../../errors';
import { GeminiConfig, GeminiConfigSchema, ProviderConfigInput, parseConfig } from '../config';
import type { CompletionRequest, CompletionResult, LlmBackend } from './types';

export interface GeminiModelLike {
  generateContent(
    request: GenerateContentRequest,
    options?: SingleRequestOptions
  ): Promise<{ response: { text(): string; usageMetadata?: UsageMetadata } }>;
}

export interface GeminiClientLike {
  getGenerativeModel(params: ModelParams, requestOptions?: RequestOptions): GeminiModelLike;
}

export type GeminiBackendInput = Extract<ProviderConfigInput, { backend: 'gemini' }>;

function toContents(request: CompletionRequest): Content[] {
  const contents: Content[] = request.history.map((message) => ({
    role: message.role,
    parts: [{ text: message.content }],
  }));
  const parts: Part[] = [{ text: request.prompt }];
  for (const image of request.images) {
    parts.push({ inlineData: { mimeType: image.mimeType, data: image.data } });
  }
  contents.push({ role: 'user', parts });
  return contents;
}

export class GeminiBackend implements LlmBackend {
  readonly kind = 'gemini' as const;
  readonly config: GeminiConfig;
  private readonly client: GeminiClientLike;

  constructor(config: GeminiBackendInput, client?: GeminiClientLike) {
    this.config = parseConfig(GeminiConfigSchema, config);
    this.client = client ?? new GoogleGenerativeAI(this.config.apiKey);
  }

  get textModel(): string {
    return this.config.textModel;
  }

  get multimodalModel(): string {
    return this.config.multimodalModel;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const { temperature, topP, topK, baseUrl } = this.config;
    const model = this.client.getGenerativeModel(
      {
        model: request.model,
        generationConfig: {
          responseMimeType: request.json ? 'application/json' : undefined,
          temperature,
          topP,
          topK,
        },
      },
      baseUrl ? { baseUrl } : undefined
    );

    try {
      const result = await model.generateContent(
        { contents: toContents(request) },
        { signal: request.signal }
      );
      const text = result.response.text();
      const usage = result.response.usageMetadata;
      return {
        text,
        usage: usage
          ? {
              promptTokens: usage.promptTokenCount,
              completionTokens: usage.candidatesTokenCount,
              totalTokens: usage.totalTokenCount,
            }
          : undefined,
      };
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): Error {
    if (error instanceof TimeoutError || error instanceof CancelledError) {
      return error;
    }
    if (error instanceof GoogleGenerativeAIFetchError) {
      return new BackendError('gemini', error.message, error.status);
    }
    if (error instanceof GoogleGenerativeAIResponseError) {
      return new BackendError('gemini', error.message);
    }
    return new TransportError('gemini', toError(error));
  }
}
