import { CancelledError, PipelineStepError, toError } from '../errors';
import type { LlmProvider } from '../llm/provider';
import { Logger, createLogger } from '../utils/logger';
import type { DocumentStream } from './documentStream';
import type { PipelineStep, PipelineTermination } from './types';
import type { ValidationState } from './validationState';

export interface RunOptions {
  signal?: AbortSignal;
}

export class ValidationPipeline {
  readonly steps: readonly PipelineStep[];
  private readonly logger: Logger;

  constructor(
    steps: readonly PipelineStep[],
    private readonly provider: LlmProvider,
    logger?: Logger
  ) {
    const names = new Set<string>();
    for (const step of steps) {
      if (names.has(step.name)) {
        throw new Error(`Duplicate pipeline step name: ${step.name}`);
      }
      names.add(step.name);
    }
    // Array.prototype.sort is stable, so equal orders keep declaration order.
    this.steps = [...steps].sort((a, b) => a.order - b.order);
    this.logger = logger ?? createLogger('pipeline');
  }

  async run(
    state: ValidationState,
    document: DocumentStream,
    { signal }: RunOptions = {}
  ): Promise<ValidationState> {
    const startedAt = Date.now();
    state.logStep('InitializePipeline', 'Starting document validation pipeline', 'Success');
    state.conversation = this.provider.createConversation();
    this.logger.info('Starting validation', {
      validationId: state.id,
      fileName: state.inputDocument.fileName,
      steps: this.steps.map((s) => s.name),
    });

    let termination: PipelineTermination = 'CompletedNormally';

    for (const step of this.steps) {
      if (signal?.aborted) {
        this.markCancelled(state, step.name);
        termination = 'Cancelled';
        break;
      }

      if (!step.shouldExecute(state)) {
        state.logStep(step.name, 'Step skipped', 'Skipped');
        this.logger.info(`Skipping step ${step.name}`, { validationId: state.id });
        continue;
      }

      try {
        this.logger.info(`Executing step ${step.name}`, { validationId: state.id });
        await this.executeStep(step, state, document, signal);
      } catch (error) {
        const cause = toError(error);
        if (cause instanceof CancelledError) {
          this.markCancelled(state, step.name);
          termination = 'Cancelled';
          break;
        }
        this.markFailed(state, new PipelineStepError(step.name, cause));
        termination = 'HaltedOnError';
        break;
      } finally {
        document.rewind();
      }

      if (state.outcome === 'Invalid') {
        this.logger.info(`Document disqualified by ${step.name}`, { validationId: state.id });
        termination = 'HaltedOnDisqualification';
        break;
      }
      if (state.outcome === 'Error') {
        termination = 'HaltedOnError';
        break;
      }
    }

    state.logStep(
      'CompletePipeline',
      `Document validation pipeline completed with outcome: ${state.outcome}`,
      'Success'
    );
    state.termination = termination;
    state.elapsedMs = Date.now() - startedAt;
    this.logger.info('Validation finished', {
      validationId: state.id,
      outcome: state.outcome,
      termination,
      elapsedMs: state.elapsedMs,
    });
    return state;
  }

  private async executeStep<T>(
    step: PipelineStep<T>,
    state: ValidationState,
    document: DocumentStream,
    signal?: AbortSignal
  ): Promise<void> {
    const { prompt, images } = await step.preparePrompt(state, document);
    const options = { conversation: state.conversation, stepName: step.name, signal };
    const response =
      images.length > 0
        ? await this.provider.sendMultimodalStructuredPrompt(step.contract, prompt, images, options)
        : await this.provider.sendStructuredPrompt(step.contract, prompt, options);
    await step.processResponse(state, response);
  }

  private markFailed(state: ValidationState, failure: PipelineStepError): void {
    const { stepName, originalError } = failure;
    this.logger.error(`Error executing step ${stepName}`, {
      validationId: state.id,
      error: originalError.message,
      errorType: originalError.name,
    });
    state.logStep(stepName, `Error executing step: ${originalError.message}`, 'Error');
    state.addIssue(`${stepName}Error`, originalError.message, 'Error');
    state.setOutcome('Error', `Validation failed during ${stepName}: ${originalError.message}`);
    state.failure = failure;
  }

  private markCancelled(state: ValidationState, stepName: string): void {
    this.logger.warn(`Validation cancelled before completing ${stepName}`, {
      validationId: state.id,
    });
    state.logStep(stepName, 'Validation cancelled', 'Warning');
    state.addIssue('PipelineCancelled', `Validation was cancelled during ${stepName}`, 'Warning');
    state.setOutcome('Cancelled', 'Validation was cancelled before completion');
  }
}

export function runPipeline(
  state: ValidationState,
  document: DocumentStream,
  steps: readonly PipelineStep[],
  provider: LlmProvider,
  options: RunOptions = {}
): Promise<ValidationState> {
  return new ValidationPipeline(steps, provider).run(state, document, options);
}
