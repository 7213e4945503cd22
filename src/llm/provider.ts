import { parseContract, type ResponseContract } from '../contracts/contract';
import { ConfigurationError, DeserializationError, formatValidationErrors, toError } from '../errors';
import { Logger, createLogger } from '../utils/logger';
import { GeminiBackend, GeminiClientLike } from './backends/gemini';
import { FetchLike, OllamaBackend } from './backends/ollama';
import type { EncodedImage, LlmBackend, TokenUsage } from './backends/types';
import type { ProviderConfigInput } from './config';
import { ConversationState } from './conversation';
import { withDeadline } from './deadline';
import { cleanJsonResponseText, estimateTokens } from './jsonText';

export interface ReadableDocument {
  readAll(): Buffer;
}

export interface ImageAttachment {
  stream: ReadableDocument | Buffer;
  mimeType: string;
}

export interface SendOptions {
  conversation?: ConversationState;
  stepName?: string;
  signal?: AbortSignal;
}

export interface TextReply {
  text: string;
  model: string;
  usage: TokenUsage;
}

export interface StructuredReply<T> {
  data: T;
  rawText: string;
  model: string;
  usage: TokenUsage;
}

interface SendRequest {
  prompt: string;
  images: readonly ImageAttachment[];
  json: boolean;
  options: SendOptions;
}

function encodeImage(image: ImageAttachment): EncodedImage {
  const bytes = Buffer.isBuffer(image.stream) ? image.stream : image.stream.readAll();
  return { mimeType: image.mimeType, data: bytes.toString('base64') };
}

/**
 * Single entry point for model calls. The wire protocol is delegated to the
 * backend chosen at construction.
 */
export class LlmProvider {
  private readonly logger: Logger;

  constructor(
    readonly backend: LlmBackend,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger(`llm:${backend.kind}`);
  }

  get kind() {
    return this.backend.kind;
  }

  createConversation(): ConversationState {
    return new ConversationState();
  }

  sendTextPrompt(prompt: string, options: SendOptions = {}): Promise<TextReply> {
    return this.send({ prompt, images: [], json: false, options });
  }

  sendMultimodalPrompt(
    prompt: string,
    images: readonly ImageAttachment[],
    options: SendOptions = {}
  ): Promise<TextReply> {
    return this.send({ prompt, images, json: false, options });
  }

  async sendStructuredPrompt<T>(
    contract: ResponseContract<T>,
    prompt: string,
    options: SendOptions = {}
  ): Promise<StructuredReply<T>> {
    const reply = await this.send({ prompt, images: [], json: true, options });
    return this.decode(contract, reply);
  }

  async sendMultimodalStructuredPrompt<T>(
    contract: ResponseContract<T>,
    prompt: string,
    images: readonly ImageAttachment[],
    options: SendOptions = {}
  ): Promise<StructuredReply<T>> {
    const reply = await this.send({ prompt, images, json: true, options });
    return this.decode(contract, reply);
  }

  private async send({ prompt, images, json, options }: SendRequest): Promise<TextReply> {
    const { conversation, stepName, signal } = options;
    const model = images.length > 0 ? this.backend.multimodalModel : this.backend.textModel;
    const label = stepName ? `${this.backend.kind} call for ${stepName}` : `${this.backend.kind} call`;

    const history = conversation ? [...conversation.messages] : [];
    conversation?.addUserMessage(prompt, stepName);

    const encoded = images.map(encodeImage);
    const startedAt = Date.now();
    this.logger.info(`Sending prompt to ${model}`, {
      stepName,
      promptChars: prompt.length,
      images: encoded.length,
      historyMessages: history.length,
    });

    const result = await withDeadline(
      (callSignal) =>
        this.backend.complete({ model, history, prompt, images: encoded, json, signal: callSignal }),
      { label, timeoutMs: this.backend.timeoutMs, signal }
    );

    conversation?.addModelMessage(result.text, stepName);
    this.logger.info(`Received response from ${model}`, {
      stepName,
      responseChars: result.text.length,
      durationMs: Date.now() - startedAt,
    });

    const usage = result.usage ?? {
      promptTokens: estimateTokens(prompt),
      completionTokens: estimateTokens(result.text),
      totalTokens: estimateTokens(prompt) + estimateTokens(result.text),
    };
    return { text: result.text, model, usage };
  }

  private decode<T>(contract: ResponseContract<T>, reply: TextReply): StructuredReply<T> {
    const cleaned = cleanJsonResponseText(reply.text);

    let json: unknown;
    try {
      json = JSON.parse(cleaned);
    } catch (error) {
      this.logger.warn(`Response for ${contract.id} is not valid JSON`, {
        preview: cleaned.slice(0, 500),
      });
      throw new DeserializationError(contract.id, cleaned, toError(error).message, error);
    }

    const parsed = parseContract(contract, json);
    if (!parsed.success) {
      this.logger.warn(`Response does not match ${contract.id}`, {
        errors: parsed.error.issues,
      });
      throw new DeserializationError(
        contract.id,
        cleaned,
        formatValidationErrors(parsed.error),
        parsed.error
      );
    }

    return { data: parsed.data, rawText: cleaned, model: reply.model, usage: reply.usage };
  }
}

export interface ProviderDependencies {
  logger?: Logger;
  geminiClient?: GeminiClientLike;
  fetch?: FetchLike;
}

export function createBackend(
  config: ProviderConfigInput,
  deps: ProviderDependencies = {}
): LlmBackend {
  switch (config.backend) {
    case 'gemini':
      return new GeminiBackend(config, deps.geminiClient);
    case 'ollama':
      return new OllamaBackend(config, deps.fetch);
    default:
      throw new ConfigurationError('Unsupported LLM backend');
  }
}

export function createLlmProvider(
  config: ProviderConfigInput,
  deps: ProviderDependencies = {}
): LlmProvider {
  return new LlmProvider(createBackend(config, deps), deps.logger);
}
