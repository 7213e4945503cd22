import fetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import { BackendError, CancelledError, TimeoutError, TransportError, toError } from '../../errors';
import { OllamaConfig, OllamaConfigSchema, ProviderConfigInput, parseConfig } from '../config';
import type { CompletionRequest, CompletionResult, LlmBackend } from './types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type OllamaBackendInput = Extract<ProviderConfigInput, { backend: 'ollama' }>;

interface OllamaMessage {
  role: 'user' | 'assistant';
  content: string;
  images?: string[];
}

const ChatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const ErrorBodySchema = z.object({ error: z.string() });

export class OllamaBackend implements LlmBackend {
  readonly kind = 'ollama' as const;
  readonly config: OllamaConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: OllamaBackendInput, fetchImpl: FetchLike = fetch) {
    this.config = parseConfig(OllamaConfigSchema, config);
    this.fetchImpl = fetchImpl;
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

  buildRequestBody(request: CompletionRequest): Record<string, unknown> {
    const messages: OllamaMessage[] = request.history.map((message) => ({
      role: message.role === 'model' ? 'assistant' : 'user',
      content: message.content,
    }));
    const current: OllamaMessage = { role: 'user', content: request.prompt };
    if (request.images.length > 0) {
      current.images = request.images.map((image) => image.data);
    }
    messages.push(current);

    const { temperature, topP, topK, keepAlive } = this.config;
    return {
      model: request.model,
      messages,
      stream: false,
      ...(request.json ? { format: 'json' } : {}),
      keep_alive: keepAlive,
      options: { temperature, top_p: topP, top_k: topK },
    };
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildRequestBody(request)),
        signal: request.signal,
      });
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof CancelledError) throw error;
      throw new TransportError('ollama', toError(error));
    }

    const body = await res.text();
    if (!res.ok) {
      throw new BackendError('ollama', this.errorMessage(body, res.statusText), res.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new BackendError('ollama', `response is not JSON: ${toError(error).message}`, res.status);
    }

    const parsed = ChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new BackendError('ollama', 'response is missing message content', res.status);
    }

    const promptTokens = parsed.data.prompt_eval_count;
    const completionTokens = parsed.data.eval_count;
    return {
      text: parsed.data.message.content,
      usage:
        promptTokens !== undefined && completionTokens !== undefined
          ? { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
          : undefined,
    };
  }

  private errorMessage(body: string, fallback: string): string {
    const raw = body.trim() || fallback;
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      return raw;
    }
    const parsed = ErrorBodySchema.safeParse(json);
    return parsed.success ? parsed.data.error : raw;
  }
}
