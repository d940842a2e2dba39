import { ConfigValidationError } from '../../types/route-config';
import { isPlainObject, stringifyValue } from '../utils';
import { TemplateCoercionError } from './route-errors';
import type { TokenContext } from './token-resolver';

export type TemplateScalar = string | number | boolean | null;

export type TokenPart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'token'; readonly name: string; readonly synthetic: boolean };

/**
 * Template tree, classified once when the configuration is loaded
 */
export type TemplateNode =
  | { readonly kind: 'literal'; readonly value: TemplateScalar }
  | { readonly kind: 'token-expr'; readonly parts: readonly TokenPart[] }
  | {
      readonly kind: 'typed-token';
      readonly value: TemplateNode;
      readonly type: CoercionType;
    }
  | { readonly kind: 'sequence'; readonly items: readonly TemplateNode[] }
  | {
      readonly kind: 'mapping';
      readonly entries: readonly (readonly [string, TemplateNode])[];
    };

const tokenRegex = /\{(\$?)([A-Za-z_][A-Za-z0-9_]*)\}/g;

const parseTokenExpression = (text: string): TemplateNode => {
  const parts: TokenPart[] = [];
  let lastIndex = 0;

  for (const marker of text.matchAll(tokenRegex)) {
    const index = marker.index ?? 0;

    if (index > lastIndex) {
      parts.push({ kind: 'text', text: text.slice(lastIndex, index) });
    }
    parts.push({ kind: 'token', name: marker[2], synthetic: marker[1] === '$' });
    lastIndex = index + marker[0].length;
  }

  if (!parts.some((part) => part.kind === 'token')) {
    return { kind: 'literal', value: text };
  }

  if (lastIndex < text.length) {
    parts.push({ kind: 'text', text: text.slice(lastIndex) });
  }

  return { kind: 'token-expr', parts };
};

const coercionTypes = [
  'int',
  'integer',
  'number',
  'float',
  'bool',
  'boolean',
  'str',
  'string'
] as const;

export type CoercionType = (typeof coercionTypes)[number];

const isCoercionType = (value: unknown): value is CoercionType =>
  coercionTypes.some((type) => type === value);

/**
 * `{value: "{token}", type: int}`, anything else shaped like it is plain data
 */
const asTypedToken = (
  value: Record<string, unknown>
): { value: TemplateNode; type: CoercionType } | null => {
  const keys = Object.keys(value);
  const { value: expression, type } = value;

  if (
    keys.length !== 2 ||
    typeof expression !== 'string' ||
    !isCoercionType(type)
  ) {
    return null;
  }

  const node = parseTokenExpression(expression);

  return node.kind === 'token-expr' ? { value: node, type } : null;
};

/**
 * Classify a configuration value into a template tree.
 *
 * A mapping with exactly the keys `value` and `type`, whose value holds a
 * token and whose type is a known conversion, is a typed placeholder.
 * Strings holding `{name}` or `{$name}` markers are token expressions.
 *
 * @param location - prefix used in configuration error messages
 */
export const compileTemplate = (
  raw: unknown,
  location = 'template'
): TemplateNode => {
  if (raw === null || raw === undefined) {
    return { kind: 'literal', value: null };
  }

  if (typeof raw === 'string') {
    return parseTokenExpression(raw);
  }

  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return { kind: 'literal', value: raw };
  }

  // YAML timestamps
  if (raw instanceof Date) {
    return { kind: 'literal', value: raw.toISOString() };
  }

  if (Array.isArray(raw)) {
    return {
      kind: 'sequence',
      items: raw.map((item, index) =>
        compileTemplate(item, `${location}[${index}]`)
      )
    };
  }

  if (isPlainObject(raw)) {
    const typed = asTypedToken(raw);

    if (typed) {
      return { kind: 'typed-token', ...typed };
    }

    return {
      kind: 'mapping',
      entries: Object.entries(raw).map(
        ([key, value]) =>
          [key, compileTemplate(value, `${location}.${key}`)] as const
      )
    };
  }

  throw new ConfigValidationError(
    `${location}: unsupported template value ${String(raw)}`
  );
};

const coerce = (value: unknown, type: CoercionType): unknown => {
  switch (type) {
    case 'int':
    case 'integer': {
      const numeric = typeof value === 'string' ? Number(value) : value;

      if (typeof numeric === 'number' && Number.isFinite(numeric)) {
        if (typeof value === 'string' && value.trim() === '') {
          break;
        }

        return Math.trunc(numeric);
      }

      if (typeof value === 'boolean') {
        return value ? 1 : 0;
      }
      break;
    }
    case 'number':
    case 'float': {
      const numeric = typeof value === 'string' ? Number(value) : value;

      if (
        typeof numeric === 'number' &&
        Number.isFinite(numeric) &&
        !(typeof value === 'string' && value.trim() === '')
      ) {
        return numeric;
      }
      break;
    }
    case 'bool':
    case 'boolean':
      if (typeof value === 'boolean') {
        return value;
      }

      if (value === 'true' || value === 'false') {
        return value === 'true';
      }

      if (typeof value === 'number') {
        return value !== 0;
      }
      break;
    case 'str':
    case 'string':
      return stringifyValue(value);
  }

  throw new TemplateCoercionError(value, type);
};

/**
 * Produce the concrete value of a template for one request.
 * Throws UnresolvedTokenError or TemplateCoercionError.
 */
export const renderTemplate = (
  node: TemplateNode,
  context: TokenContext
): unknown => {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'token-expr': {
      const [first] = node.parts;

      // a lone marker keeps the native type of its value
      if (node.parts.length === 1 && first.kind === 'token') {
        return context.resolve(first.name, first.synthetic);
      }

      return node.parts
        .map((part) =>
          part.kind === 'text'
            ? part.text
            : stringifyValue(context.resolve(part.name, part.synthetic))
        )
        .join('');
    }
    case 'typed-token':
      return coerce(renderTemplate(node.value, context), node.type);
    case 'sequence':
      return node.items.map((item) => renderTemplate(item, context));
    case 'mapping': {
      const result: Record<string, unknown> = {};

      for (const [key, value] of node.entries) {
        result[key] = renderTemplate(value, context);
      }

      return result;
    }
  }
};

/**
 * Every token a template refers to, `$`-prefixed for synthetic ones
 */
export const collectTokenReferences = (node: TemplateNode): string[] => {
  const references = new Set<string>();

  const walk = (current: TemplateNode) => {
    switch (current.kind) {
      case 'token-expr':
        for (const part of current.parts) {
          if (part.kind === 'token') {
            references.add(part.synthetic ? `$${part.name}` : part.name);
          }
        }
        break;
      case 'typed-token':
        walk(current.value);
        break;
      case 'sequence':
        current.items.forEach(walk);
        break;
      case 'mapping':
        current.entries.forEach(([, value]) => walk(value));
        break;
      case 'literal':
        break;
    }
  };

  walk(node);

  return [...references];
};
