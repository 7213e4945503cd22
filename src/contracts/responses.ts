import { AnyContract, ContractValue, defineContract, field } from './contract';

export const LanguageDetectionResponse = defineContract(
  'LanguageDetectionResponse',
  {
    languageCode: field.string({
      required: true,
      description: 'ISO 639-1 code of the main language of the document',
      example: 'nl',
    }),
    languageName: field.string({
      required: true,
      description: 'English name of the language',
      example: 'Dutch',
    }),
    confidence: field.number({
      required: true,
      description: 'Confidence between 0 and 1',
      example: 0.97,
    }),
    explanation: field.string({ description: 'Short reasoning for the detection' }),
  },
  { description: 'Detected document language' }
);

export const DocumentTypeVerificationResponse = defineContract(
  'DocumentTypeVerificationResponse',
  {
    documentType: field.string({
      required: true,
      description: 'Type of the document: invoice, receipt, quotation or other',
      example: 'invoice',
    }),
    isInvoice: field.boolean({ required: true, description: 'Document is an invoice' }),
    isReceipt: field.boolean({
      required: true,
      description: 'Document is a receipt',
      example: false,
    }),
    isQuotation: field.boolean({
      required: true,
      description: 'Document is a quotation or estimate',
      example: false,
    }),
    confidence: field.integer({
      required: true,
      description: 'Confidence score between 0 and 100',
      example: 95,
    }),
    explanation: field.string({ description: 'Reasoning behind the classification' }),
  },
  { description: 'Classification of the submitted document' }
);

export const InvoiceHeaderResponse = defineContract(
  'InvoiceHeaderResponse',
  {
    invoiceNumber: field.string({
      required: true,
      description: 'Invoice or receipt number',
      example: 'INV-2024-0117',
    }),
    invoiceDate: field.string({
      required: true,
      description: 'Issue date in ISO 8601 format (YYYY-MM-DD)',
      example: '2024-03-14',
    }),
    dueDate: field.string({ description: 'Payment due date in ISO 8601 format' }),
    totalAmount: field.number({
      required: true,
      description: 'Total amount including tax',
      example: 1815,
    }),
    taxAmount: field.number({
      required: true,
      description: 'Total tax (VAT) amount',
      example: 315,
    }),
    currency: field.string({
      description: 'ISO 4217 currency code',
      defaultValue: 'EUR',
    }),
  },
  { description: 'Header fields of an invoice, receipt or quotation' }
);

export const VendorInfo = defineContract(
  'VendorInfo',
  {
    name: field.string({ required: true, description: 'Vendor or company name', example: 'Bouwmarkt Jansen B.V.' }),
    address: field.string({ description: 'Full postal address' }),
    kvkNumber: field.string({ description: 'Chamber of Commerce registration number' }),
    vatNumber: field.string({ description: 'VAT identification number' }),
    iban: field.string({ description: 'Bank account number (IBAN)' }),
    contact: field.string({ description: 'Phone number, e-mail or website' }),
  },
  { description: 'Party that issued the document' }
);

export const CustomerInfo = defineContract(
  'CustomerInfo',
  {
    name: field.string({ required: true, description: 'Customer name', example: 'J. de Vries' }),
    address: field.string({ description: 'Customer address, usually the property being improved' }),
  },
  { description: 'Party the document is addressed to' }
);

export const InvoicePartiesResponse = defineContract(
  'InvoicePartiesResponse',
  {
    vendor: field.object(VendorInfo, { required: true, description: 'Issuing party' }),
    customer: field.object(CustomerInfo, { description: 'Receiving party, when shown' }),
  },
  { description: 'Parties named on the document' }
);

export const LineItem = defineContract(
  'LineItem',
  {
    description: field.string({ required: true, description: 'Item or service description' }),
    quantity: field.integer({ required: true, description: 'Number of units' }),
    unitPrice: field.number({ required: true, description: 'Price per unit excluding tax' }),
    totalPrice: field.number({ required: true, description: 'Line total excluding tax' }),
    vatRate: field.number({ description: 'VAT rate as a percentage, e.g. 21' }),
  },
  { description: 'A single line on the document' }
);

export const InvoiceLineItemsResponse = defineContract(
  'InvoiceLineItemsResponse',
  {
    lineItems: field.array(field.object(LineItem), {
      required: true,
      description: 'All line items in document order',
    }),
    paymentTerms: field.string({ description: 'Payment terms, e.g. 14 days' }),
    paymentMethod: field.string({ description: 'Payment method, when stated' }),
    paymentReference: field.string({ description: 'Payment reference or order number' }),
    notes: field.string({ description: 'Remarks printed on the document' }),
    confidence: field.number({
      required: true,
      description: 'Extraction confidence between 0 and 1',
      example: 0.9,
    }),
  },
  { description: 'Line items and payment details' }
);

export const FraudDetectionResponse = defineContract(
  'FraudDetectionResponse',
  {
    possibleFraud: field.boolean({
      required: true,
      description: 'Document shows signs of tampering or forgery',
      example: false,
    }),
    confidence: field.number({
      required: true,
      description: 'Confidence between 0 and 1',
      example: 0.88,
    }),
    visualEvidence: field.string({ description: 'Description of what was observed' }),
    visualIndicators: field.array(field.string(), {
      description: 'Individual indicators such as mismatched fonts or altered amounts',
      example: [],
    }),
  },
  { description: 'Visual fraud assessment' }
);

export const LineItemAssessment = defineContract(
  'LineItemAssessment',
  {
    description: field.string({ required: true, description: 'Line item description as on the document' }),
    isEligible: field.boolean({ required: true, description: 'Counts as a home improvement expense' }),
    category: field.string({ description: 'Improvement category, e.g. insulation' }),
    confidence: field.number({ description: 'Confidence between 0 and 1' }),
    reason: field.string({ description: 'Why the item is or is not eligible' }),
  },
  { description: 'Eligibility verdict for one line item' }
);

export const WithdrawalEligibilityResponse = defineContract(
  'WithdrawalEligibilityResponse',
  {
    isHomeImprovement: field.boolean({
      required: true,
      description: 'Document relates to improving a home',
    }),
    eligibleCategories: field.array(field.string(), {
      description: 'Improvement categories found on the document',
    }),
    lineItemAssessments: field.array(field.object(LineItemAssessment), {
      required: true,
      description: 'One assessment per line item',
    }),
    totalEligibleAmount: field.number({
      required: true,
      description: 'Sum of eligible line totals',
    }),
    totalIneligibleAmount: field.number({ description: 'Sum of ineligible line totals' }),
    overallConfidence: field.number({ description: 'Confidence between 0 and 1' }),
  },
  { description: 'Construction fund eligibility assessment' }
);

export const AuditSummaryResponse = defineContract(
  'AuditSummaryResponse',
  {
    summary: field.string({ required: true, description: 'Plain-language summary of the validation' }),
    recommendation: field.string({
      required: true,
      description: 'approve, reject or review',
      example: 'approve',
    }),
    keyFindings: field.array(field.string(), { description: 'Notable findings' }),
  },
  { description: 'Audit summary for the reviewer' }
);

export type LanguageDetection = ContractValue<typeof LanguageDetectionResponse>;
export type DocumentTypeVerification = ContractValue<typeof DocumentTypeVerificationResponse>;
export type InvoiceHeader = ContractValue<typeof InvoiceHeaderResponse>;
export type Vendor = ContractValue<typeof VendorInfo>;
export type Customer = ContractValue<typeof CustomerInfo>;
export type InvoiceParties = ContractValue<typeof InvoicePartiesResponse>;
export type ExtractedLineItem = ContractValue<typeof LineItem>;
export type InvoiceLineItems = ContractValue<typeof InvoiceLineItemsResponse>;
export type FraudDetection = ContractValue<typeof FraudDetectionResponse>;
export type LineItemEligibility = ContractValue<typeof LineItemAssessment>;
export type WithdrawalEligibility = ContractValue<typeof WithdrawalEligibilityResponse>;
export type AuditSummary = ContractValue<typeof AuditSummaryResponse>;

export const RESPONSE_CONTRACTS: readonly AnyContract[] = [
  LanguageDetectionResponse,
  DocumentTypeVerificationResponse,
  InvoiceHeaderResponse,
  InvoicePartiesResponse,
  InvoiceLineItemsResponse,
  FraudDetectionResponse,
  WithdrawalEligibilityResponse,
  AuditSummaryResponse,
];
