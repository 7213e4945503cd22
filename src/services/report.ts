import type { ValidationState } from '../pipeline/validationState';

export interface ValidationReport {
  validationId: string;
  fileName: string;
  outcome: ValidationState['outcome'];
  summary: string;
  termination?: ValidationState['termination'];
  documentType?: string;
  language?: string;
  invoice?: ValidationState['invoice'];
  eligibility?: ValidationState['eligibility'];
  fraud?: { possibleFraud: boolean; confidence: number; indicators: string[] };
  audit?: ValidationState['auditSummary'];
  issues: Array<{ type: string; description: string; severity: string; field?: string }>;
  steps: Array<{ stepName: string; description: string; status: string; timestamp: string }>;
  modelUsage: Array<{ model: string; operation: string; tokenCount: number }>;
  failure?: { step: string; error: string; retryable: boolean };
  elapsedMs?: number;
}

export function toValidationReport(state: ValidationState): ValidationReport {
  return {
    validationId: state.id,
    fileName: state.inputDocument.fileName,
    outcome: state.outcome,
    summary: state.outcomeSummary,
    termination: state.termination,
    documentType: state.classification?.documentType,
    language: state.language?.languageCode,
    invoice: state.invoice,
    eligibility: state.eligibility,
    fraud: state.fraudAnalysis
      ? {
          possibleFraud: state.fraudAnalysis.possibleFraud,
          confidence: state.fraudAnalysis.confidence,
          indicators: state.fraudAnalysis.visualIndicators ?? [],
        }
      : undefined,
    audit: state.auditSummary,
    issues: state.issues.map(({ type, description, severity, field }) => ({
      type,
      description,
      severity,
      field,
    })),
    steps: state.processingSteps.map((entry) => ({
      stepName: entry.stepName,
      description: entry.description,
      status: entry.status,
      timestamp: entry.timestamp.toISOString(),
    })),
    modelUsage: state.modelUsage.map(({ model, operation, tokenCount }) => ({
      model,
      operation,
      tokenCount,
    })),
    failure: state.failure
      ? {
          step: state.failure.stepName,
          error: state.failure.originalError.message,
          retryable: state.failure.retryable,
        }
      : undefined,
    elapsedMs: state.elapsedMs,
  };
}
