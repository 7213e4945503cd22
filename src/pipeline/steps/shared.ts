import type { ResponseContract } from '../../contracts/contract';
import { TemplateNotFoundError } from '../../errors';
import type { StructuredReply } from '../../llm/provider';
import type { PromptBuilder, PromptVariables } from '../../prompts/promptBuilder';
import type { DocumentStream } from '../documentStream';
import type { PreparedPrompt } from '../types';
import type { ValidationState } from '../validationState';

export interface StepDependencies {
  prompts: PromptBuilder;
}

export function requirePrompt<T>(
  prompts: PromptBuilder,
  templateName: string,
  contract: ResponseContract<T>,
  variables?: PromptVariables
): string {
  const prompt = prompts.build(templateName, contract, variables);
  if (prompt === null) {
    throw new TemplateNotFoundError(templateName);
  }
  return prompt;
}

export function withDocument(
  state: ValidationState,
  document: DocumentStream,
  prompt: string
): PreparedPrompt {
  return {
    prompt,
    images: [{ stream: document, mimeType: state.inputDocument.contentType }],
  };
}

export function languageVariables(state: ValidationState): PromptVariables {
  return { language: state.language?.languageName ?? 'an unknown language' };
}

export function recordUsage<T>(
  state: ValidationState,
  operation: string,
  response: StructuredReply<T>
): void {
  state.recordModelUsage(response.model, operation, response.usage.totalTokens);
}

export function formatAmount(amount: number, currency = 'EUR'): string {
  return `${currency} ${amount.toFixed(2)}`;
}
