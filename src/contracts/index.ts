export * from './contract';
export * from './registry';
export * from './responses';
export { EXAMPLE_OVERRIDES } from './exampleOverrides';

import { ContractRegistry } from './registry';
import { EXAMPLE_OVERRIDES } from './exampleOverrides';

export function createContractRegistry(): ContractRegistry {
  return new ContractRegistry(EXAMPLE_OVERRIDES);
}
