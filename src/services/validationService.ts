import { ContractRegistry, createContractRegistry } from '../contracts';
import type { AppConfig } from '../config/appConfig';
import type { LlmProvider } from '../llm/provider';
import { PromptBuilder } from '../prompts/promptBuilder';
import { LoadSummary, PromptTemplateStore } from '../prompts/templateStore';
import { DocumentStream } from '../pipeline/documentStream';
import { ValidationPipeline } from '../pipeline/runPipeline';
import { createDefaultSteps } from '../pipeline/steps';
import type { PipelineStep } from '../pipeline/types';
import { ValidationState } from '../pipeline/validationState';
import { Logger, createLogger } from '../utils/logger';

export interface DocumentUpload {
  fileName: string;
  contentType: string;
  content: Buffer;
}

export interface ValidationServiceOptions {
  provider: LlmProvider;
  templates: PromptTemplateStore;
  contracts?: ContractRegistry;
  /** Replaces the default steps. */
  steps?: (prompts: PromptBuilder) => PipelineStep[];
  logger?: Logger;
}

export class WithdrawalProofValidationService {
  readonly prompts: PromptBuilder;
  private readonly pipeline: ValidationPipeline;
  private readonly templates: PromptTemplateStore;
  private readonly logger: Logger;

  constructor(options: ValidationServiceOptions) {
    this.logger = options.logger ?? createLogger('validation-service');
    this.templates = options.templates;
    this.prompts = new PromptBuilder(
      options.templates,
      options.contracts ?? createContractRegistry(),
      options.logger
    );
    const steps = options.steps
      ? options.steps(this.prompts)
      : createDefaultSteps({ prompts: this.prompts });
    this.pipeline = new ValidationPipeline(steps, options.provider, options.logger);
  }

  get stepNames(): string[] {
    return this.pipeline.steps.map((step) => step.name);
  }

  reloadTemplates(): Promise<LoadSummary> {
    return this.templates.reload();
  }

  async validate(upload: DocumentUpload, options: { signal?: AbortSignal } = {}): Promise<ValidationState> {
    const state = new ValidationState({
      fileName: upload.fileName,
      contentType: upload.contentType,
      sizeBytes: upload.content.length,
      uploadedAt: new Date(),
    });
    this.logger.info(`Validating ${upload.fileName}`, {
      validationId: state.id,
      sizeBytes: upload.content.length,
    });
    return this.pipeline.run(state, new DocumentStream(upload.content), options);
  }
}

export async function createValidationService(
  config: Pick<AppConfig, 'promptsDir' | 'promptDuplicatePolicy'>,
  provider: LlmProvider
): Promise<WithdrawalProofValidationService> {
  const templates = new PromptTemplateStore({
    rootDir: config.promptsDir,
    duplicatePolicy: config.promptDuplicatePolicy,
  });
  await templates.load();
  return new WithdrawalProofValidationService({ provider, templates });
}
