import {
  DocumentTypeVerificationResponse,
  type DocumentTypeVerification,
} from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { present } from '../validationState';
import {
  StepDependencies,
  languageVariables,
  recordUsage,
  requirePrompt,
  withDocument,
} from './shared';

export function createVerifyDocumentTypeStep({
  prompts,
}: StepDependencies): PipelineStep<DocumentTypeVerification> {
  return {
    name: 'VerifyDocumentType',
    order: 200,
    contract: DocumentTypeVerificationResponse,

    shouldExecute: () => true,

    async preparePrompt(state, document) {
      state.logStep('VerifyDocumentType', 'Verifying document type', 'InProgress');
      return withDocument(
        state,
        document,
        requirePrompt(
          prompts,
          'document-type-verification',
          DocumentTypeVerificationResponse,
          languageVariables(state)
        )
      );
    },

    processResponse(state, response) {
      const result = response.data;
      state.classification = {
        documentType: result.documentType,
        isInvoice: result.isInvoice,
        isReceipt: result.isReceipt,
        isQuotation: result.isQuotation,
        confidence: result.confidence,
        explanation: present(result.explanation),
      };
      recordUsage(state, 'DocumentTypeVerification', response);

      if (!result.isInvoice && !result.isReceipt && !result.isQuotation) {
        state.addIssue(
          'InvalidDocumentType',
          `The document is not an invoice, receipt or quotation (detected: ${result.documentType})`,
          'Error'
        );
        state.setOutcome(
          'Invalid',
          `Document is not a valid withdrawal proof. Detected type: ${result.documentType}`
        );
        state.logStep('VerifyDocumentType', `Invalid document type: ${result.documentType}`, 'Warning');
        return;
      }

      state.logStep(
        'VerifyDocumentType',
        `Verified document type: ${result.documentType} (confidence ${result.confidence}%)`,
        'Success'
      );
    },
  };
}
