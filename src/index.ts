export * from './contracts';
export * from './errors';
export { PromptTemplateStore, PromptTemplateSchema } from './prompts/templateStore';
export type { PromptTemplate, LoadSummary, DuplicatePolicy } from './prompts/templateStore';
export { PromptBuilder } from './prompts/promptBuilder';
export { ConversationState } from './llm/conversation';
export type { ConversationMessage, MessageRole } from './llm/conversation';
export { LlmProvider, createBackend, createLlmProvider } from './llm/provider';
export type { ImageAttachment, SendOptions, StructuredReply, TextReply } from './llm/provider';
export { GeminiBackend } from './llm/backends/gemini';
export { OllamaBackend } from './llm/backends/ollama';
export type { LlmBackend, CompletionRequest, CompletionResult } from './llm/backends/types';
export { loadProviderConfig } from './llm/config';
export type { ProviderConfig } from './llm/config';
export { loadAppConfig } from './config/appConfig';
export { DocumentStream } from './pipeline/documentStream';
export { ValidationPipeline, runPipeline } from './pipeline/runPipeline';
export { ValidationState } from './pipeline/validationState';
export * from './pipeline/types';
export * from './pipeline/steps';
export { WithdrawalProofValidationService, createValidationService } from './services/validationService';
export { toValidationReport } from './services/report';
