import { AuditSummaryResponse, type AuditSummary } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import type { ValidationState } from '../validationState';
import { StepDependencies, formatAmount, recordUsage, requirePrompt } from './shared';

export function buildAuditContext(state: ValidationState): string {
  const lines = [`Document: ${state.inputDocument.fileName} (${state.inputDocument.contentType})`];
  if (state.language) lines.push(`Language: ${state.language.languageName}`);
  if (state.classification) lines.push(`Document type: ${state.classification.documentType}`);

  const invoice = state.invoice;
  if (invoice) {
    const currency = invoice.currency ?? 'EUR';
    if (invoice.invoiceNumber) lines.push(`Invoice number: ${invoice.invoiceNumber}`);
    if (invoice.invoiceDate) lines.push(`Invoice date: ${invoice.invoiceDate}`);
    if (invoice.vendor) lines.push(`Vendor: ${invoice.vendor.name}`);
    if (invoice.totalAmount !== undefined) lines.push(`Total: ${formatAmount(invoice.totalAmount, currency)}`);
    for (const item of invoice.lineItems) {
      const verdict =
        item.isEligible === undefined ? 'not assessed' : item.isEligible ? 'eligible' : 'not eligible';
      lines.push(`- ${item.description}: ${formatAmount(item.totalPrice, currency)} (${verdict})`);
    }
  }
  if (state.eligibility) {
    lines.push(`Eligible amount: ${formatAmount(state.eligibility.totalEligibleAmount, invoice?.currency)}`);
  }
  if (state.fraudAnalysis) {
    lines.push(`Possible fraud: ${state.fraudAnalysis.possibleFraud ? 'yes' : 'no'}`);
  }
  for (const issue of state.issues) {
    lines.push(`Issue (${issue.severity}): ${issue.type} - ${issue.description}`);
  }
  lines.push(`Current outcome: ${state.outcome}`);
  return lines.join('\n');
}

export function createGenerateAuditSummaryStep({
  prompts,
}: StepDependencies): PipelineStep<AuditSummary> {
  return {
    name: 'GenerateAuditSummary',
    order: 900,
    contract: AuditSummaryResponse,

    shouldExecute: () => true,

    async preparePrompt(state) {
      state.logStep('GenerateAuditSummary', 'Generating audit summary', 'InProgress');
      return {
        prompt: requirePrompt(prompts, 'audit-summary', AuditSummaryResponse, {
          context: buildAuditContext(state),
        }),
        images: [],
      };
    },

    processResponse(state, response) {
      state.auditSummary = response.data;
      recordUsage(state, 'AuditSummary', response);
      state.logStep('GenerateAuditSummary', `Recommendation: ${response.data.recommendation}`, 'Success');
    },
  };
}
