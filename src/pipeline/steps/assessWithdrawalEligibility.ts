import {
  WithdrawalEligibilityResponse,
  type LineItemEligibility,
  type WithdrawalEligibility,
} from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { InvoiceLineItem, present } from '../validationState';
import {
  StepDependencies,
  formatAmount,
  languageVariables,
  recordUsage,
  requirePrompt,
  withDocument,
} from './shared';

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export function describeLineItems(items: readonly InvoiceLineItem[]): string {
  return items
    .map((item, index) => `${index + 1}. ${item.description} (${item.quantity} x ${item.unitPrice.toFixed(2)} = ${item.totalPrice.toFixed(2)})`)
    .join('\n');
}

/**
 * Pairs each assessment with a line item, by description first and by position when
 * no description matches.
 */
export function applyAssessments(
  items: InvoiceLineItem[],
  assessments: readonly LineItemEligibility[]
): void {
  const unmatched = new Set(items.keys());
  assessments.forEach((assessment, position) => {
    let index = items.findIndex(
      (item, i) => unmatched.has(i) && normalize(item.description) === normalize(assessment.description)
    );
    if (index === -1 && unmatched.has(position)) {
      index = position;
    }
    if (index === -1) return;
    unmatched.delete(index);
    const item = items[index];
    item.isEligible = assessment.isEligible;
    item.eligibilityCategory = present(assessment.category);
    item.eligibilityReason = present(assessment.reason);
    item.eligibilityConfidence = present(assessment.confidence);
  });
}

export function createAssessWithdrawalEligibilityStep({
  prompts,
}: StepDependencies): PipelineStep<WithdrawalEligibility> {
  return {
    name: 'AssessWithdrawalEligibility',
    order: 600,
    contract: WithdrawalEligibilityResponse,

    shouldExecute: (state) => (state.invoice?.lineItems.length ?? 0) > 0,

    async preparePrompt(state, document) {
      state.logStep('AssessWithdrawalEligibility', 'Assessing construction fund eligibility', 'InProgress');
      const variables = {
        ...languageVariables(state),
        lineItems: describeLineItems(state.invoice?.lineItems ?? []),
      };
      return withDocument(
        state,
        document,
        requirePrompt(prompts, 'withdrawal-eligibility', WithdrawalEligibilityResponse, variables)
      );
    },

    processResponse(state, response) {
      const result = response.data;
      const invoice = state.ensureInvoice();
      applyAssessments(invoice.lineItems, result.lineItemAssessments);
      state.eligibility = {
        isHomeImprovement: result.isHomeImprovement,
        eligibleCategories: result.eligibleCategories ?? [],
        totalEligibleAmount: result.totalEligibleAmount,
        totalIneligibleAmount: present(result.totalIneligibleAmount),
        overallConfidence: present(result.overallConfidence),
      };
      recordUsage(state, 'WithdrawalEligibility', response);

      invoice.lineItems.forEach((item, index) => {
        if (item.isEligible === false) {
          state.addIssue(
            'IneligibleLineItem',
            `${item.description}: ${item.eligibilityReason ?? 'not a home improvement expense'}`,
            'Info',
            `lineItems[${index}]`
          );
        }
      });

      if (!result.isHomeImprovement || result.totalEligibleAmount <= 0) {
        state.addIssue('NotEligible', 'The document contains no expenses eligible for the construction fund', 'Error');
        state.setOutcome('Invalid', 'The document does not qualify as proof of a construction fund withdrawal');
        state.logStep('AssessWithdrawalEligibility', 'No eligible expenses found', 'Warning');
        return;
      }

      const eligible = formatAmount(result.totalEligibleAmount, invoice.currency);
      if (state.outcome !== 'NeedsReview') {
        state.setOutcome('Valid', `Eligible amount: ${eligible}`);
      }
      state.logStep('AssessWithdrawalEligibility', `Eligible amount: ${eligible}`, 'Success');
    },
  };
}
