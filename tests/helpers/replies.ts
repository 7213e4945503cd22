/** Scripted model replies for a full run over a Dutch renovation invoice. */

const json = (value: unknown) => JSON.stringify(value);

export const LANGUAGE_REPLY = json({ languageCode: 'nl', languageName: 'Dutch', confidence: 0.98 });

export const INVOICE_TYPE_REPLY = json({
  documentType: 'invoice',
  isInvoice: true,
  isReceipt: false,
  isQuotation: false,
  confidence: 96,
});

export const QUOTATION_TYPE_REPLY = json({
  documentType: 'quotation',
  isInvoice: false,
  isReceipt: false,
  isQuotation: true,
  confidence: 90,
  explanation: 'The document is titled Offerte',
});

export const OTHER_TYPE_REPLY = json({
  documentType: 'other',
  isInvoice: false,
  isReceipt: false,
  isQuotation: false,
  confidence: 85,
  explanation: 'The document is a bank statement',
});

export const HEADER_REPLY = json({
  invoiceNumber: 'F-1001',
  invoiceDate: '2024-05-02',
  totalAmount: 1210,
  taxAmount: 210,
});

export const PARTIES_REPLY = json({
  vendor: { name: 'Bouwbedrijf De Vries', kvkNumber: '12345678' },
  customer: { name: 'A. Jansen' },
});

export const LINE_ITEMS_REPLY =
  '```json\n' +
  json({
    lineItems: [
      { description: 'Roof insulation', quantity: 1, unitPrice: 800, totalPrice: 800, vatRate: 21 },
      { description: 'Garden chair', quantity: 2, unitPrice: 100, totalPrice: 200, vatRate: 21 },
    ],
    paymentTerms: '14 days',
    confidence: 0.9,
  }) +
  '\n```';

export const NO_FRAUD_REPLY = json({ possibleFraud: false, confidence: 0.05 });

export const FRAUD_REPLY = json({
  possibleFraud: true,
  confidence: 0.8,
  visualEvidence: 'Total amount appears edited',
  visualIndicators: ['mismatched font in total'],
});

export const ELIGIBILITY_REPLY = json({
  isHomeImprovement: true,
  eligibleCategories: ['insulation'],
  lineItemAssessments: [
    { description: 'Garden chair', isEligible: false, reason: 'Furniture' },
    { description: 'Roof insulation', isEligible: true, category: 'insulation', confidence: 0.95 },
  ],
  totalEligibleAmount: 800,
  totalIneligibleAmount: 200,
});

export const AUDIT_REPLY = json({
  summary: 'Invoice F-1001 covers roof insulation and a garden chair.',
  recommendation: 'Approve',
  keyFindings: ['Roof insulation is eligible'],
});

export function validInvoiceReplies(): string[] {
  return [
    LANGUAGE_REPLY,
    INVOICE_TYPE_REPLY,
    HEADER_REPLY,
    PARTIES_REPLY,
    LINE_ITEMS_REPLY,
    NO_FRAUD_REPLY,
    ELIGIBILITY_REPLY,
    AUDIT_REPLY,
  ];
}
