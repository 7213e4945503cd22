import type { BackendKind } from '../../errors';
import type { ConversationMessage } from '../conversation';

export interface EncodedImage {
  mimeType: string;
  /** Base64 without a data: prefix. */
  data: string;
}

export interface CompletionRequest {
  model: string;
  /** Earlier turns, oldest first. Does not include `prompt`. */
  history: readonly ConversationMessage[];
  prompt: string;
  images: readonly EncodedImage[];
  /** Ask the backend for JSON output. */
  json: boolean;
  signal: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  text: string;
  usage?: TokenUsage;
}

export interface LlmBackend {
  readonly kind: BackendKind;
  readonly textModel: string;
  readonly multimodalModel: string;
  readonly timeoutMs: number;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
