import { InvoiceHeaderResponse, type InvoiceHeader } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { present } from '../validationState';
import {
  StepDependencies,
  formatAmount,
  languageVariables,
  recordUsage,
  requirePrompt,
  withDocument,
} from './shared';

export function createExtractInvoiceStructureStep({
  prompts,
}: StepDependencies): PipelineStep<InvoiceHeader> {
  return {
    name: 'ExtractInvoiceStructure',
    order: 300,
    contract: InvoiceHeaderResponse,

    shouldExecute: (state) =>
      state.classification !== undefined &&
      (state.classification.isInvoice ||
        state.classification.isReceipt ||
        state.classification.isQuotation),

    async preparePrompt(state, document) {
      state.logStep('ExtractInvoiceStructure', 'Extracting invoice header', 'InProgress');
      return withDocument(
        state,
        document,
        requirePrompt(prompts, 'invoice-header-extraction', InvoiceHeaderResponse, languageVariables(state))
      );
    },

    processResponse(state, response) {
      const header = response.data;
      const invoice = state.ensureInvoice();
      invoice.invoiceNumber = header.invoiceNumber;
      invoice.invoiceDate = header.invoiceDate;
      invoice.dueDate = present(header.dueDate);
      invoice.totalAmount = header.totalAmount;
      invoice.taxAmount = header.taxAmount;
      invoice.currency = present(header.currency) ?? 'EUR';
      recordUsage(state, 'InvoiceHeaderExtraction', response);

      if (header.totalAmount <= 0) {
        state.addIssue('MissingTotalAmount', 'The document does not show a positive total amount', 'Warning', 'totalAmount');
      }

      state.logStep(
        'ExtractInvoiceStructure',
        `Extracted invoice ${header.invoiceNumber} dated ${header.invoiceDate}, total ${formatAmount(header.totalAmount, invoice.currency)}`,
        'Success'
      );
    },
  };
}
