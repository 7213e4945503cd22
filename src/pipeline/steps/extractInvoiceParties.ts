import { InvoicePartiesResponse, type InvoiceParties } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { present } from '../validationState';
import {
  StepDependencies,
  languageVariables,
  recordUsage,
  requirePrompt,
  withDocument,
} from './shared';

export function createExtractInvoicePartiesStep({
  prompts,
}: StepDependencies): PipelineStep<InvoiceParties> {
  return {
    name: 'ExtractInvoiceParties',
    order: 350,
    contract: InvoicePartiesResponse,

    shouldExecute: (state) => state.invoice !== undefined,

    async preparePrompt(state, document) {
      state.logStep('ExtractInvoiceParties', 'Extracting vendor and customer details', 'InProgress');
      return withDocument(
        state,
        document,
        requirePrompt(prompts, 'invoice-parties-extraction', InvoicePartiesResponse, languageVariables(state))
      );
    },

    processResponse(state, response) {
      const { vendor, customer } = response.data;
      const invoice = state.ensureInvoice();
      invoice.vendor = vendor;
      invoice.customer = present(customer);
      recordUsage(state, 'InvoicePartiesExtraction', response);

      if (!vendor.kvkNumber && !vendor.vatNumber) {
        state.addIssue(
          'MissingVendorRegistration',
          'Neither a Chamber of Commerce number nor a VAT number is shown for the vendor',
          'Info',
          'vendor'
        );
      }

      state.logStep('ExtractInvoiceParties', `Vendor: ${vendor.name}`, 'Success');
    },
  };
}
