import type { PipelineStep } from '../types';
import { createAssessWithdrawalEligibilityStep } from './assessWithdrawalEligibility';
import { createDetectFraudStep } from './detectFraud';
import { createDetectLanguageStep } from './detectLanguage';
import { createExtractInvoicePartiesStep } from './extractInvoiceParties';
import { createExtractInvoiceStructureStep } from './extractInvoiceStructure';
import { createExtractLineItemsStep } from './extractLineItems';
import { createGenerateAuditSummaryStep } from './generateAuditSummary';
import type { StepDependencies } from './shared';
import { createVerifyDocumentTypeStep } from './verifyDocumentType';

export type { StepDependencies } from './shared';
export {
  createAssessWithdrawalEligibilityStep,
  createDetectFraudStep,
  createDetectLanguageStep,
  createExtractInvoicePartiesStep,
  createExtractInvoiceStructureStep,
  createExtractLineItemsStep,
  createGenerateAuditSummaryStep,
  createVerifyDocumentTypeStep,
};

export function createDefaultSteps(deps: StepDependencies): PipelineStep[] {
  return [
    createDetectLanguageStep(deps),
    createVerifyDocumentTypeStep(deps),
    createExtractInvoiceStructureStep(deps),
    createExtractInvoicePartiesStep(deps),
    createExtractLineItemsStep(deps),
    createDetectFraudStep(deps),
    createAssessWithdrawalEligibilityStep(deps),
    createGenerateAuditSummaryStep(deps),
  ];
}
