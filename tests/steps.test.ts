import { describe, it, expect } from '@jest/globals';
import { ContractRegistry } from '../src/contracts';
import type { StructuredReply } from '../src/llm/provider';
import { PromptBuilder } from '../src/prompts/promptBuilder';
import { PromptTemplateStore } from '../src/prompts/templateStore';
import {
  applyAssessments,
  createAssessWithdrawalEligibilityStep,
  describeLineItems,
} from '../src/pipeline/steps/assessWithdrawalEligibility';
import { createExtractInvoicePartiesStep } from '../src/pipeline/steps/extractInvoiceParties';
import { amountsReconcile, createExtractLineItemsStep } from '../src/pipeline/steps/extractLineItems';
import { buildAuditContext } from '../src/pipeline/steps/generateAuditSummary';
import { formatAmount } from '../src/pipeline/steps/shared';
import { InvoiceLineItem, ValidationState } from '../src/pipeline/validationState';
import { silentLogger } from '../src/utils/logger';

const prompts = new PromptBuilder(
  new PromptTemplateStore({ rootDir: 'unused', logger: silentLogger }),
  new ContractRegistry(),
  silentLogger
);

function reply<T>(data: T): StructuredReply<T> {
  return {
    data,
    rawText: JSON.stringify(data),
    model: 'test-vision-model',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
  };
}

function newState() {
  return new ValidationState({
    fileName: 'bon.jpg',
    contentType: 'image/jpeg',
    sizeBytes: 3,
    uploadedAt: new Date(),
  });
}

const item = (description: string, totalPrice: number): InvoiceLineItem => ({
  description,
  quantity: 1,
  unitPrice: totalPrice,
  totalPrice,
});

describe('formatAmount', () => {
  it('prints two decimals after the currency', () => {
    expect(formatAmount(800)).toBe('EUR 800.00');
    expect(formatAmount(12.5, 'USD')).toBe('USD 12.50');
  });
});

describe('amountsReconcile', () => {
  it('allows a one percent difference', () => {
    const lineItems = [item('Tiles', 1000)];
    expect(amountsReconcile({ totalAmount: 1210, taxAmount: 210, lineItems })).toBe(true);
    expect(amountsReconcile({ totalAmount: 1200, taxAmount: 210, lineItems })).toBe(true);
    expect(amountsReconcile({ totalAmount: 1100, taxAmount: 210, lineItems })).toBe(false);
  });

  it('passes when there is nothing to compare', () => {
    expect(amountsReconcile({ lineItems: [item('Tiles', 10)] })).toBe(true);
    expect(amountsReconcile({ totalAmount: 50, lineItems: [] })).toBe(true);
  });
});

describe('describeLineItems', () => {
  it('numbers each line with quantity and prices', () => {
    expect(
      describeLineItems([{ description: 'Paint', quantity: 3, unitPrice: 12.5, totalPrice: 37.5 }])
    ).toBe('1. Paint (3 x 12.50 = 37.50)');
  });
});

describe('applyAssessments', () => {
  it('matches by description, ignoring case, and falls back to position', () => {
    const items = [item('Heat pump', 4000), item('Sofa', 900), item('Installation labour', 600)];

    applyAssessments(items, [
      { description: 'SOFA', isEligible: false, reason: 'Furniture' },
      { description: 'Heat pump', isEligible: true, category: 'sustainability' },
      { description: 'Labour', isEligible: true, confidence: 0.7 },
    ]);

    expect(items.map((i) => [i.isEligible, i.eligibilityCategory, i.eligibilityReason])).toEqual([
      [true, 'sustainability', undefined],
      [false, undefined, 'Furniture'],
      [true, undefined, undefined],
    ]);
    expect(items[2].eligibilityConfidence).toBe(0.7);
  });
});

describe('ExtractInvoiceParties', () => {
  it('notes a vendor without registration numbers', async () => {
    const state = newState();
    const step = createExtractInvoicePartiesStep({ prompts });

    await step.processResponse(state, reply({ vendor: { name: 'Klusbedrijf Bakker', vatNumber: null } }));

    expect(state.invoice?.vendor?.name).toBe('Klusbedrijf Bakker');
    expect(state.issues).toMatchObject([
      { type: 'MissingVendorRegistration', severity: 'Info', field: 'vendor' },
    ]);
    expect(state.modelUsage).toMatchObject([
      { model: 'test-vision-model', operation: 'InvoicePartiesExtraction', tokenCount: 15 },
    ]);
  });
});

describe('ExtractLineItems', () => {
  it('warns when no line items are found', async () => {
    const state = newState();
    state.invoice = { totalAmount: 100, lineItems: [] };

    await createExtractLineItemsStep({ prompts }).processResponse(
      state,
      reply({ lineItems: [], confidence: 0.4 })
    );

    expect(state.issues.map((i) => i.type)).toEqual(['NoLineItems']);
    expect(state.outcome).toBe('NeedsReview');
    expect(state.outcomeSummary).toBe('No line items could be extracted; the document needs manual review');
    expect(state.processingSteps.at(-1)).toMatchObject({ description: 'No line items found', status: 'Warning' });
  });

  it('warns when the lines do not add up to the total', async () => {
    const state = newState();
    state.invoice = { totalAmount: 500, taxAmount: 0, currency: 'EUR', lineItems: [] };

    await createExtractLineItemsStep({ prompts }).processResponse(
      state,
      reply({
        lineItems: [{ description: 'Plaster', quantity: 4, unitPrice: 25, totalPrice: 100 }],
        confidence: 0.8,
      })
    );

    expect(state.issues).toMatchObject([
      {
        type: 'AmountMismatch',
        description: 'Line items and tax do not add up to the total of EUR 500.00',
        field: 'totalAmount',
      },
    ]);
    expect(state.processingSteps.at(-1)?.description).toBe('Extracted 1 line items');
  });
});

describe('AssessWithdrawalEligibility', () => {
  it('disqualifies a document without eligible costs', async () => {
    const state = newState();
    state.invoice = { currency: 'EUR', lineItems: [item('Garden chair', 200)] };

    await createAssessWithdrawalEligibilityStep({ prompts }).processResponse(
      state,
      reply({
        isHomeImprovement: false,
        lineItemAssessments: [{ description: 'Garden chair', isEligible: false }],
        totalEligibleAmount: 0,
      })
    );

    expect(state.outcome).toBe('Invalid');
    expect(state.issues.map((i) => [i.type, i.description])).toEqual([
      ['IneligibleLineItem', 'Garden chair: not a home improvement expense'],
      ['NotEligible', 'The document contains no expenses eligible for the construction fund'],
    ]);
    expect(state.eligibility).toEqual({
      isHomeImprovement: false,
      eligibleCategories: [],
      totalEligibleAmount: 0,
      totalIneligibleAmount: undefined,
      overallConfidence: undefined,
    });
  });

  it('keeps a pending review outcome', async () => {
    const state = newState();
    state.invoice = { currency: 'EUR', lineItems: [item('Kitchen', 5000)] };
    state.setOutcome('NeedsReview', 'tampering suspected');

    await createAssessWithdrawalEligibilityStep({ prompts }).processResponse(
      state,
      reply({
        isHomeImprovement: true,
        lineItemAssessments: [{ description: 'Kitchen', isEligible: true }],
        totalEligibleAmount: 5000,
      })
    );

    expect(state.outcome).toBe('NeedsReview');
    expect(state.outcomeSummary).toBe('tampering suspected');
    expect(state.processingSteps.at(-1)?.description).toBe('Eligible amount: EUR 5000.00');
  });

  it('is skipped without line items', () => {
    const state = newState();
    state.invoice = { lineItems: [] };

    expect(createAssessWithdrawalEligibilityStep({ prompts }).shouldExecute(state)).toBe(false);
  });
});

describe('buildAuditContext', () => {
  it('lists the findings so far', () => {
    const state = newState();
    state.language = { languageCode: 'nl', languageName: 'Dutch', confidence: 0.9 };
    state.invoice = {
      invoiceNumber: 'B-77',
      totalAmount: 121,
      currency: 'EUR',
      lineItems: [{ ...item('Paint', 100), isEligible: true }],
    };
    state.addIssue('AmountMismatch', 'totals differ', 'Warning');

    expect(buildAuditContext(state)).toBe(
      [
        'Document: bon.jpg (image/jpeg)',
        'Language: Dutch',
        'Invoice number: B-77',
        'Total: EUR 121.00',
        '- Paint: EUR 100.00 (eligible)',
        'Issue (Warning): AmountMismatch - totals differ',
        'Current outcome: Unknown',
      ].join('\n')
    );
  });
});
