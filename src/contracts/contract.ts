import { z } from 'zod';
import { SchemaGenerationError } from '../errors';

export const MAX_CONTRACT_DEPTH = 10;

export type FieldType =
  | { kind: 'string' }
  | { kind: 'integer' }
  | { kind: 'number' }
  | { kind: 'boolean' }
  | { kind: 'array'; items: FieldType }
  | { kind: 'object'; contract: AnyContract };

export type FieldKind = FieldType['kind'];

export interface FieldOptions<T> {
  description?: string;
  example?: T;
  defaultValue?: T;
  /** JSON property name; defaults to the lower-camel-case key. */
  wireName?: string;
}

export interface FieldSpec<T, R extends boolean> {
  readonly type: FieldType;
  readonly required: R;
  readonly ignore: boolean;
  readonly description?: string;
  readonly example?: T;
  readonly defaultValue?: T;
  readonly wireName?: string;
  readonly __value?: T;
}

export interface FieldDescriptor {
  readonly key: string;
  readonly wireName: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly ignore: boolean;
  readonly description?: string;
  readonly example?: unknown;
  readonly defaultValue?: unknown;
}

export interface ResponseContract<T> {
  readonly id: string;
  readonly description?: string;
  readonly fields: readonly FieldDescriptor[];
  readonly __type?: T;
}

export type AnyContract = ResponseContract<unknown>;

export type ContractShape = Record<string, FieldSpec<unknown, boolean>>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type ValueOf<F> = F extends FieldSpec<infer T, boolean> ? T : never;

type RequiredKeys<S extends ContractShape> = {
  [K in keyof S]: S[K] extends FieldSpec<unknown, true> ? K : never;
}[keyof S];

type OptionalKeys<S extends ContractShape> = Exclude<keyof S, RequiredKeys<S>>;

export type InferShape<S extends ContractShape> = Simplify<
  { [K in RequiredKeys<S>]: ValueOf<S[K]> } & {
    [K in OptionalKeys<S>]?: ValueOf<S[K]> | null;
  }
>;

export type ContractValue<C> = C extends ResponseContract<infer T> ? T : never;

interface FieldBuilder<T> {
  (options: FieldOptions<T> & { required: true }): FieldSpec<T, true>;
  (options?: FieldOptions<T> & { required?: false }): FieldSpec<T, false>;
}

function makeField<T>(
  type: FieldType,
  options: FieldOptions<T> & { required?: boolean }
): FieldSpec<T, boolean> {
  return {
    type,
    required: options.required ?? false,
    ignore: false,
    description: options.description,
    example: options.example,
    defaultValue: options.defaultValue,
    wireName: options.wireName,
  };
}

function primitive<T>(type: FieldType): FieldBuilder<T> {
  function build(options: FieldOptions<T> & { required: true }): FieldSpec<T, true>;
  function build(options?: FieldOptions<T> & { required?: false }): FieldSpec<T, false>;
  function build(options: FieldOptions<T> & { required?: boolean } = {}): FieldSpec<T, boolean> {
    return makeField(type, options);
  }
  return build;
}

function array<E>(
  items: FieldSpec<E, boolean>,
  options: FieldOptions<E[]> & { required: true }
): FieldSpec<E[], true>;
function array<E>(
  items: FieldSpec<E, boolean>,
  options?: FieldOptions<E[]> & { required?: false }
): FieldSpec<E[], false>;
function array<E>(
  items: FieldSpec<E, boolean>,
  options: FieldOptions<E[]> & { required?: boolean } = {}
): FieldSpec<E[], boolean> {
  return makeField({ kind: 'array', items: items.type }, options);
}

function object<C>(
  contract: ResponseContract<C>,
  options: FieldOptions<C> & { required: true }
): FieldSpec<C, true>;
function object<C>(
  contract: ResponseContract<C>,
  options?: FieldOptions<C> & { required?: false }
): FieldSpec<C, false>;
function object<C>(
  contract: ResponseContract<C>,
  options: FieldOptions<C> & { required?: boolean } = {}
): FieldSpec<C, boolean> {
  return makeField({ kind: 'object', contract }, options);
}

/** Keeps a field on the decoded type but out of the schema, the example and decoding. */
function ignored<T>(field: FieldSpec<T, boolean>): FieldSpec<T, false> {
  return { ...field, required: false, ignore: true };
}

export const field = {
  string: primitive<string>({ kind: 'string' }),
  integer: primitive<number>({ kind: 'integer' }),
  number: primitive<number>({ kind: 'number' }),
  boolean: primitive<boolean>({ kind: 'boolean' }),
  array,
  object,
  ignored,
};

export function toWireName(key: string): string {
  return key.charAt(0).toLowerCase() + key.slice(1);
}

export function defineContract<S extends ContractShape>(
  id: string,
  shape: S,
  options: { description?: string } = {}
): ResponseContract<InferShape<S>> {
  const fields: FieldDescriptor[] = Object.entries(shape).map(([key, f]) => ({
    key,
    wireName: f.wireName ?? toWireName(key),
    type: f.type,
    required: f.required,
    ignore: f.ignore,
    description: f.description,
    example: f.example,
    defaultValue: f.defaultValue,
  }));
  return { id, description: options.description, fields };
}

const schemaCache = new WeakMap<AnyContract, z.ZodTypeAny>();

function typeSchema(type: FieldType, rootId: string, path: string[]): z.ZodTypeAny {
  switch (type.kind) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(typeSchema(type.items, rootId, [...path, '[]']));
    case 'object':
      return objectSchema(type.contract, rootId, path);
  }
}

function objectSchema(contract: AnyContract, rootId: string, path: string[]): z.ZodTypeAny {
  const cached = schemaCache.get(contract);
  if (cached) return cached;

  if (path.length > MAX_CONTRACT_DEPTH) {
    throw new SchemaGenerationError(
      rootId,
      `nesting deeper than ${MAX_CONTRACT_DEPTH} levels at ${path.join('.')}`
    );
  }
  if (!contract.id.trim()) {
    throw new SchemaGenerationError(rootId, 'contract identifier is empty');
  }

  const shape: Record<string, z.ZodTypeAny> = {};
  const seen = new Set<string>();
  const active = contract.fields.filter((f) => !f.ignore);
  for (const f of active) {
    if (seen.has(f.wireName)) {
      throw new SchemaGenerationError(
        contract.id,
        `duplicate property name '${f.wireName}'`
      );
    }
    let schema = typeSchema(f.type, rootId, [...path, f.wireName]);
    if (!f.required) {
      schema = schema.nullish();
      if (f.defaultValue !== undefined) {
        schema = schema.default(f.defaultValue);
      }
    }
    if (f.description) {
      schema = schema.describe(f.description);
    }
    seen.add(f.wireName);
    shape[f.wireName] = schema;
  }

  const wire = contract.description
    ? z.object(shape).describe(contract.description)
    : z.object(shape);

  const schema = wire.transform((value) => {
    const decoded: Record<string, unknown> = {};
    for (const f of active) {
      if (value[f.wireName] !== undefined) {
        decoded[f.key] = value[f.wireName];
      }
    }
    return decoded;
  });

  schemaCache.set(contract, schema);
  return schema;
}

const exampleSchemaCache = new WeakMap<AnyContract, z.ZodTypeAny>();

function exampleTypeSchema(type: FieldType): z.ZodTypeAny {
  switch (type.kind) {
    case 'array':
      return z.array(exampleTypeSchema(type.items));
    case 'object':
      return exampleSchema(type.contract);
    default:
      return typeSchema(type, '', []);
  }
}

/**
 * Wire-form schema that also rejects properties the contract does not declare, at
 * every level. Examples are checked against it so they stay valid under
 * `additionalProperties: false`. Assumes `contractSchema` has accepted the contract.
 */
export function exampleSchema(contract: AnyContract): z.ZodTypeAny {
  const cached = exampleSchemaCache.get(contract);
  if (cached) return cached;

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const f of contract.fields) {
    if (f.ignore) continue;
    const schema = exampleTypeSchema(f.type);
    shape[f.wireName] = f.required ? schema : schema.nullish();
  }

  const schema = z.object(shape).strict();
  exampleSchemaCache.set(contract, schema);
  return schema;
}

/**
 * Zod schema for a contract. Accepts the wire (JSON) form and yields the decoded
 * form keyed by property key. Cached per contract.
 */
export function contractSchema<T>(contract: ResponseContract<T>): z.ZodType<T> {
  return objectSchema(contract, contract.id, []);
}

export function parseContract<T>(
  contract: ResponseContract<T>,
  value: unknown
): z.SafeParseReturnType<T, T> {
  return contractSchema(contract).safeParse(value);
}
