import { v4 as uuidv4 } from 'uuid';
import type {
  AuditSummary,
  Customer,
  FraudDetection,
  LanguageDetection,
  Vendor,
} from '../contracts/responses';
import type { PipelineStepError } from '../errors';
import type { ConversationState } from '../llm/conversation';
import type {
  InputDocument,
  IssueSeverity,
  ModelUsageRecord,
  PipelineTermination,
  ProcessingStepLogEntry,
  StepStatus,
  ValidationIssue,
  ValidationOutcome,
} from './types';

export interface InvoiceLineItem {
  description: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
  vatRate?: number;
  isEligible?: boolean;
  eligibilityCategory?: string;
  eligibilityReason?: string;
  eligibilityConfidence?: number;
}

export interface ExtractedInvoice {
  invoiceNumber?: string;
  invoiceDate?: string;
  dueDate?: string;
  totalAmount?: number;
  taxAmount?: number;
  currency?: string;
  vendor?: Vendor;
  customer?: Customer;
  lineItems: InvoiceLineItem[];
  paymentTerms?: string;
  paymentMethod?: string;
  paymentReference?: string;
  notes?: string;
}

export interface DocumentClassification {
  documentType: string;
  isInvoice: boolean;
  isReceipt: boolean;
  isQuotation: boolean;
  confidence: number;
  explanation?: string;
}

export interface EligibilityAssessment {
  isHomeImprovement: boolean;
  eligibleCategories: string[];
  totalEligibleAmount: number;
  totalIneligibleAmount?: number;
  overallConfidence?: number;
}

/** Maps the null the backend may send for an absent optional field to undefined. */
export function present<T>(value: T | null | undefined): T | undefined {
  return value === null ? undefined : value;
}

export class ValidationState {
  readonly id: string = uuidv4();
  readonly issues: ValidationIssue[] = [];
  readonly processingSteps: ProcessingStepLogEntry[] = [];
  readonly modelUsage: ModelUsageRecord[] = [];

  language?: LanguageDetection;
  classification?: DocumentClassification;
  invoice?: ExtractedInvoice;
  fraudAnalysis?: FraudDetection;
  eligibility?: EligibilityAssessment;
  auditSummary?: AuditSummary;

  outcome: ValidationOutcome = 'Unknown';
  outcomeSummary = '';
  conversation?: ConversationState;
  termination?: PipelineTermination;
  failure?: PipelineStepError;
  elapsedMs?: number;

  constructor(readonly inputDocument: InputDocument) {}

  ensureInvoice(): ExtractedInvoice {
    if (!this.invoice) {
      this.invoice = { lineItems: [] };
    }
    return this.invoice;
  }

  logStep(stepName: string, description: string, status: StepStatus): void {
    this.processingSteps.push({ stepName, description, status, timestamp: new Date() });
  }

  addIssue(type: string, description: string, severity: IssueSeverity, field?: string): void {
    this.issues.push({ type, description, severity, field, timestamp: new Date() });
  }

  recordModelUsage(model: string, operation: string, tokenCount: number, modelVersion = 'latest'): void {
    this.modelUsage.push({ model, modelVersion, operation, tokenCount, timestamp: new Date() });
  }

  setOutcome(outcome: ValidationOutcome, summary: string): void {
    this.outcome = outcome;
    this.outcomeSummary = summary;
  }
}
