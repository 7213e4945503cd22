import { InvoiceLineItemsResponse, type InvoiceLineItems } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { ExtractedInvoice, present } from '../validationState';
import {
  StepDependencies,
  formatAmount,
  languageVariables,
  recordUsage,
  requirePrompt,
  withDocument,
} from './shared';

/** Line totals plus tax may differ from the document total by at most one percent. */
export function amountsReconcile(invoice: ExtractedInvoice): boolean {
  if (invoice.totalAmount === undefined || invoice.lineItems.length === 0) return true;
  const lines = invoice.lineItems.reduce((sum, item) => sum + item.totalPrice, 0);
  const expected = lines + (invoice.taxAmount ?? 0);
  return Math.abs(expected - invoice.totalAmount) <= Math.max(0.01, invoice.totalAmount * 0.01);
}

export function createExtractLineItemsStep({
  prompts,
}: StepDependencies): PipelineStep<InvoiceLineItems> {
  return {
    name: 'ExtractLineItems',
    order: 400,
    contract: InvoiceLineItemsResponse,

    shouldExecute: (state) => state.invoice !== undefined,

    async preparePrompt(state, document) {
      state.logStep('ExtractLineItems', 'Extracting line items and payment details', 'InProgress');
      return withDocument(
        state,
        document,
        requirePrompt(prompts, 'line-item-extraction', InvoiceLineItemsResponse, languageVariables(state))
      );
    },

    processResponse(state, response) {
      const result = response.data;
      const invoice = state.ensureInvoice();
      invoice.lineItems = result.lineItems.map((item) => ({
        description: item.description,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        totalPrice: item.totalPrice,
        vatRate: present(item.vatRate),
      }));
      invoice.paymentTerms = present(result.paymentTerms);
      invoice.paymentMethod = present(result.paymentMethod);
      invoice.paymentReference = present(result.paymentReference);
      invoice.notes = present(result.notes);
      recordUsage(state, 'LineItemExtraction', response);

      if (invoice.lineItems.length === 0) {
        state.addIssue('NoLineItems', 'No line items could be extracted from the document', 'Warning', 'lineItems');
        state.setOutcome('NeedsReview', 'No line items could be extracted; the document needs manual review');
        state.logStep('ExtractLineItems', 'No line items found', 'Warning');
        return;
      }

      if (!amountsReconcile(invoice)) {
        state.addIssue(
          'AmountMismatch',
          `Line items and tax do not add up to the total of ${formatAmount(invoice.totalAmount ?? 0, invoice.currency)}`,
          'Warning',
          'totalAmount'
        );
      }

      state.logStep('ExtractLineItems', `Extracted ${invoice.lineItems.length} line items`, 'Success');
    },
  };
}
