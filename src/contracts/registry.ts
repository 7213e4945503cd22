import { zodToJsonSchema, type JsonSchema7Type } from 'zod-to-json-schema';
import { SchemaGenerationError, formatValidationErrors, toError } from '../errors';
import {
  AnyContract,
  FieldType,
  MAX_CONTRACT_DEPTH,
  ResponseContract,
  contractSchema,
  exampleSchema,
} from './contract';

export type JsonObject = Record<string, unknown>;

export type JsonSchemaDocument = JsonSchema7Type;

export interface ExampleOverride {
  contract: AnyContract;
  example: JsonObject;
}

export const CANNED_EXAMPLES = {
  string: 'Example string',
  integer: 42,
  number: 42.42,
  boolean: true,
} as const;

/**
 * Derives JSON Schema text and example responses from response contracts.
 * Example overrides are registered per contract and apply wherever that contract
 * is nested.
 */
export class ContractRegistry {
  private readonly overrides = new Map<AnyContract, JsonObject>();
  private readonly schemaText = new Map<AnyContract, string>();

  constructor(overrides: readonly ExampleOverride[] = []) {
    for (const override of overrides) {
      this.registerExample(override.contract, override.example);
    }
  }

  registerExample<T>(contract: ResponseContract<T>, example: JsonObject): void {
    const result = this.checkExample(contract, example);
    if (!result.success) {
      throw new SchemaGenerationError(
        contract.id,
        `example override does not match the contract:\n${formatValidationErrors(result.error)}`
      );
    }
    this.overrides.set(contract, example);
  }

  hasOverride(contract: AnyContract): boolean {
    return this.overrides.has(contract);
  }

  generateSchemaDocument<T>(contract: ResponseContract<T>): JsonSchemaDocument {
    // The zod generics are too deep for the compiler to instantiate here (TS2589).
    return zodToJsonSchema(this.schemaFor(contract) as any, {
      target: 'jsonSchema7',
      $refStrategy: 'none',
    });
  }

  generateSchema<T>(contract: ResponseContract<T>): string {
    const cached = this.schemaText.get(contract);
    if (cached !== undefined) return cached;
    const text = JSON.stringify(this.generateSchemaDocument(contract), null, 2);
    this.schemaText.set(contract, text);
    return text;
  }

  generateExampleObject<T>(contract: ResponseContract<T>): JsonObject {
    const example = this.exampleFor(contract, 0);
    const result = this.checkExample(contract, example);
    if (!result.success) {
      throw new SchemaGenerationError(
        contract.id,
        `generated example does not match the contract:\n${formatValidationErrors(result.error)}`
      );
    }
    return example;
  }

  generateExample<T>(contract: ResponseContract<T>): string {
    return JSON.stringify(this.generateExampleObject(contract), null, 2);
  }

  private schemaFor<T>(contract: ResponseContract<T>) {
    try {
      return contractSchema(contract);
    } catch (error) {
      if (error instanceof SchemaGenerationError) throw error;
      throw new SchemaGenerationError(contract.id, toError(error).message, error);
    }
  }

  private checkExample<T>(contract: ResponseContract<T>, value: unknown) {
    this.schemaFor(contract);
    return exampleSchema(contract).safeParse(value);
  }

  private exampleFor(contract: AnyContract, depth: number): JsonObject {
    const override = this.overrides.get(contract);
    if (override) return override;

    if (depth > MAX_CONTRACT_DEPTH) {
      throw new SchemaGenerationError(
        contract.id,
        `nesting deeper than ${MAX_CONTRACT_DEPTH} levels`
      );
    }

    const example: JsonObject = {};
    for (const f of contract.fields) {
      if (f.ignore) continue;
      if (f.example !== undefined) {
        example[f.wireName] = f.example;
      } else if (f.defaultValue !== undefined) {
        example[f.wireName] = f.defaultValue;
      } else {
        example[f.wireName] = this.cannedValue(f.type, depth);
      }
    }
    return example;
  }

  private cannedValue(type: FieldType, depth: number): unknown {
    switch (type.kind) {
      case 'string':
      case 'integer':
      case 'number':
      case 'boolean':
        return CANNED_EXAMPLES[type.kind];
      case 'array':
        return [this.cannedValue(type.items, depth + 1)];
      case 'object':
        return this.exampleFor(type.contract, depth + 1);
    }
  }
}
