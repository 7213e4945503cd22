import type { ExampleOverride } from './registry';
import { LineItem, LineItemAssessment } from './responses';

export const EXAMPLE_OVERRIDES: readonly ExampleOverride[] = [
  {
    contract: LineItem,
    example: {
      description: 'Mineral wool insulation boards 100mm',
      quantity: 12,
      unitPrice: 125,
      totalPrice: 1500,
      vatRate: 21,
    },
  },
  {
    contract: LineItemAssessment,
    example: {
      description: 'Mineral wool insulation boards 100mm',
      isEligible: true,
      category: 'insulation',
      confidence: 0.95,
      reason: 'Roof insulation improves the energy performance of the home',
    },
  },
];
