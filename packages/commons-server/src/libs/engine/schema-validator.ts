import { ConfigValidationError } from '../../types/route-config';
import { getValueAtPath, isPlainObject } from '../utils';

export type SchemaType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'array'
  | 'object';

const typeAliases: Record<string, SchemaType> = {
  string: 'string',
  str: 'string',
  integer: 'integer',
  int: 'integer',
  number: 'number',
  float: 'number',
  boolean: 'boolean',
  bool: 'boolean',
  array: 'array',
  object: 'object'
};

export interface ConditionTrigger {
  readonly field: string;
  readonly equals: unknown;
}

/**
 * The only constraint kinds a request schema is made of.
 */
export type Constraint =
  | { readonly kind: 'required'; readonly field: string; readonly parent?: string }
  | { readonly kind: 'enum'; readonly field: string; readonly values: readonly unknown[] }
  | {
      readonly kind: 'conditional-required';
      readonly when: readonly ConditionTrigger[];
      readonly fields: readonly string[];
    }
  | { readonly kind: 'type-shape'; readonly field: string; readonly type: SchemaType };

export interface RequestSchema {
  readonly constraints: readonly Constraint[];
}

export type ViolationReason = Constraint['kind'];

export interface Violation {
  field: string;
  reason: ViolationReason;
  message: string;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; violations: Violation[] };

const declarationKeys = [
  'type',
  'enum',
  'const',
  'format',
  'properties',
  'required',
  'items',
  'description'
];

const kindOrder: ViolationReason[] = [
  'required',
  'enum',
  'conditional-required',
  'type-shape'
];

class SchemaCompiler {
  private required: Constraint[] = [];
  private enums: Constraint[] = [];
  private conditionals: Constraint[] = [];
  private types: Constraint[] = [];

  constructor(private location: string) {}

  public compile(raw: Record<string, unknown>): RequestSchema {
    if (raw.type !== undefined && raw.type !== 'object') {
      this.fail('type', 'a request schema must be of type object');
    }

    if (raw.properties !== undefined) {
      this.compileProperties(raw.properties, '', 'properties');
    }

    for (const field of this.stringList(raw.required, 'required')) {
      this.required.push({ kind: 'required', field });
    }

    if (raw.allOf !== undefined) {
      if (!Array.isArray(raw.allOf)) {
        this.fail('allOf', 'must be a list of if/then entries');
      }

      raw.allOf.forEach((entry, index) => {
        if (!isPlainObject(entry)) {
          this.fail(`allOf[${index}]`, 'must be an if/then mapping');
        }
        this.compileConditional(entry.if, entry.then, `allOf[${index}]`);
      });
    }

    if (raw.if !== undefined || raw.then !== undefined) {
      this.compileConditional(raw.if, raw.then, 'if');
    }

    return {
      constraints: [
        ...this.required,
        ...this.enums,
        ...this.conditionals,
        ...this.types
      ]
    };
  }

  private compileProperties(
    properties: unknown,
    prefix: string,
    at: string
  ): void {
    if (!isPlainObject(properties)) {
      this.fail(at, 'properties must be a mapping');
    }

    for (const [name, declaration] of Object.entries(properties)) {
      const field = `${prefix}${name}`;

      if (!isPlainObject(declaration)) {
        this.fail(`${at}.${name}`, 'a property declaration must be a mapping');
      }

      const isDeclaration = Object.keys(declaration).some((key) =>
        declarationKeys.includes(key)
      );

      // shorthand nesting: `message: { text: { type: string } }`
      if (!isDeclaration) {
        this.compileProperties(declaration, `${field}.`, `${at}.${name}`);
        continue;
      }

      this.compileDeclaration(declaration, field, `${at}.${name}`);
    }
  }

  private compileDeclaration(
    declaration: Record<string, unknown>,
    field: string,
    at: string
  ): void {
    if (declaration.type !== undefined) {
      const type =
        typeof declaration.type === 'string'
          ? typeAliases[declaration.type]
          : undefined;

      if (!type) {
        this.fail(`${at}.type`, `unsupported type ${String(declaration.type)}`);
      }
      this.types.push({ kind: 'type-shape', field, type });
    }

    if (declaration.enum !== undefined) {
      if (!Array.isArray(declaration.enum)) {
        this.fail(`${at}.enum`, 'must be a list');
      }
      this.enums.push({ kind: 'enum', field, values: declaration.enum });
    }

    if (declaration.const !== undefined) {
      this.enums.push({ kind: 'enum', field, values: [declaration.const] });
    }

    if (declaration.properties !== undefined) {
      this.compileProperties(
        declaration.properties,
        `${field}.`,
        `${at}.properties`
      );
    }

    for (const nested of this.stringList(declaration.required, `${at}.required`)) {
      this.required.push({
        kind: 'required',
        field: `${field}.${nested}`,
        parent: field
      });
    }
  }

  private compileConditional(
    condition: unknown,
    consequence: unknown,
    at: string
  ): void {
    if (!isPlainObject(condition) || !isPlainObject(condition.properties)) {
      this.fail(`${at}.if`, 'must declare properties with a const value');
    }

    const when: ConditionTrigger[] = Object.entries(condition.properties).map(
      ([field, trigger]) => {
        if (isPlainObject(trigger) && 'const' in trigger) {
          return { field, equals: trigger.const };
        }

        if (
          isPlainObject(trigger) &&
          Array.isArray(trigger.enum) &&
          trigger.enum.length === 1
        ) {
          return { field, equals: trigger.enum[0] };
        }

        return this.fail(
          `${at}.if.properties.${field}`,
          'only a const condition is supported'
        );
      }
    );

    if (when.length === 0) {
      this.fail(`${at}.if`, 'must declare at least one property');
    }

    if (!isPlainObject(consequence)) {
      this.fail(`${at}.then`, 'must declare the required fields');
    }

    const fields = this.stringList(consequence.required, `${at}.then.required`);

    if (fields.length === 0) {
      this.fail(`${at}.then.required`, 'must list at least one field');
    }

    this.conditionals.push({ kind: 'conditional-required', when, fields });
  }

  private stringList(value: unknown, at: string): string[] {
    if (value === undefined) {
      return [];
    }

    if (
      !Array.isArray(value) ||
      !value.every((item): item is string => typeof item === 'string')
    ) {
      this.fail(at, 'must be a list of field names');
    }

    return value;
  }

  private fail(at: string, message: string): never {
    throw new ConfigValidationError(
      `${this.location}.request_schema.${at}: ${message}`
    );
  }
}

/**
 * Compile a declared request schema into its constraint list.
 *
 * @param raw - `request_schema` block of a method
 * @param location - prefix used in configuration error messages
 */
export const compileRequestSchema = (
  raw: Record<string, unknown>,
  location: string
): RequestSchema => new SchemaCompiler(location).compile(raw);

const isPresent = (value: unknown): boolean =>
  value !== undefined && value !== null;

/**
 * Query strings and form bodies only carry strings, so numbers and booleans
 * are also accepted in their string form.
 */
const hasShape = (value: unknown, type: SchemaType): boolean => {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return (
        Number.isInteger(value) ||
        (typeof value === 'string' && /^-?\d+$/.test(value))
      );
    case 'number':
      return (
        (typeof value === 'number' && Number.isFinite(value)) ||
        (typeof value === 'string' &&
          value.trim() !== '' &&
          Number.isFinite(Number(value)))
      );
    case 'boolean':
      return (
        typeof value === 'boolean' || value === 'true' || value === 'false'
      );
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
  }
};

const describeTrigger = (when: readonly ConditionTrigger[]): string =>
  when
    .map((trigger) => `${trigger.field} is ${JSON.stringify(trigger.equals)}`)
    .join(' and ');

/**
 * Check a request payload against a schema. Every violated constraint is
 * reported, not only the first one.
 */
export const validateRequest = (
  schema: RequestSchema | undefined,
  payload: unknown
): ValidationResult => {
  if (!schema) {
    return { valid: true };
  }

  const violations: Violation[] = [];
  const missing = new Set<string>();

  for (const kind of kindOrder) {
    for (const constraint of schema.constraints) {
      if (constraint.kind !== kind) {
        continue;
      }

      switch (constraint.kind) {
        case 'required':
          if (
            constraint.parent !== undefined &&
            !isPresent(getValueAtPath(payload, constraint.parent))
          ) {
            break;
          }

          if (
            !isPresent(getValueAtPath(payload, constraint.field)) &&
            !missing.has(constraint.field)
          ) {
            missing.add(constraint.field);
            violations.push({
              field: constraint.field,
              reason: 'required',
              message: `${constraint.field} is required`
            });
          }
          break;
        case 'enum': {
          const value = getValueAtPath(payload, constraint.field);

          if (isPresent(value) && !constraint.values.includes(value)) {
            violations.push({
              field: constraint.field,
              reason: 'enum',
              message: `${constraint.field} must be one of: ${constraint.values
                .map((allowed) => String(allowed))
                .join(', ')}`
            });
          }
          break;
        }
        case 'conditional-required':
          if (
            constraint.when.every(
              (trigger) =>
                getValueAtPath(payload, trigger.field) === trigger.equals
            )
          ) {
            for (const field of constraint.fields) {
              if (
                !isPresent(getValueAtPath(payload, field)) &&
                !missing.has(field)
              ) {
                missing.add(field);
                violations.push({
                  field,
                  reason: 'conditional-required',
                  message: `${field} is required when ${describeTrigger(
                    constraint.when
                  )}`
                });
              }
            }
          }
          break;
        case 'type-shape': {
          const value = getValueAtPath(payload, constraint.field);

          if (isPresent(value) && !hasShape(value, constraint.type)) {
            violations.push({
              field: constraint.field,
              reason: 'type-shape',
              message: `${constraint.field} must be of type ${constraint.type}`
            });
          }
          break;
        }
      }
    }
  }

  return violations.length > 0 ? { valid: false, violations } : { valid: true };
};
