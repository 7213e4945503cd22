import type { ResponseContract } from '../contracts/contract';
import type { ImageAttachment, StructuredReply } from '../llm/provider';
import type { DocumentStream } from './documentStream';
import type { ValidationState } from './validationState';

export type ValidationOutcome =
  | 'Unknown'
  | 'Valid'
  | 'Invalid'
  | 'NeedsReview'
  | 'Error'
  | 'Cancelled';

export type StepStatus = 'InProgress' | 'Success' | 'Warning' | 'Error' | 'Skipped';

export type IssueSeverity = 'Info' | 'Warning' | 'Error';

export type PipelineTermination =
  | 'CompletedNormally'
  | 'HaltedOnError'
  | 'HaltedOnDisqualification'
  | 'Cancelled';

export interface ProcessingStepLogEntry {
  stepName: string;
  description: string;
  status: StepStatus;
  timestamp: Date;
}

export interface ValidationIssue {
  type: string;
  description: string;
  severity: IssueSeverity;
  field?: string;
  timestamp: Date;
}

export interface ModelUsageRecord {
  model: string;
  modelVersion: string;
  operation: string;
  tokenCount: number;
  timestamp: Date;
}

export interface InputDocument {
  fileName: string;
  contentType: string;
  sizeBytes: number;
  uploadedAt: Date;
}

export interface PreparedPrompt {
  prompt: string;
  images: ImageAttachment[];
}

/**
 * One stage of the validation pipeline. Steps share data only through the
 * ValidationState they receive.
 */
export interface PipelineStep<T = unknown> {
  readonly name: string;
  readonly order: number;
  readonly contract: ResponseContract<T>;
  shouldExecute(state: ValidationState): boolean;
  preparePrompt(state: ValidationState, document: DocumentStream): Promise<PreparedPrompt>;
  processResponse(state: ValidationState, response: StructuredReply<T>): Promise<void> | void;
}
