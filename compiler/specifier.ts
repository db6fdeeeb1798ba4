/**
 * Specifier parsing and canonical naming
 *
 * "<kind>[_<param>]*" → { kind, params }, checked against the kind's
 * parameter schema. The canonical text (lower-case kind, schema-ordered and
 * default-filled params) is both the dedup key and the output column name.
 */
import { IndicatorDescriptor, OutputColumn, Specifier } from '../spec/types';
import { paramValueSchema } from '../spec/schema';
import { InvalidParameterError, MalformedSpecifierError } from '../spec/errors';
import { IndicatorRegistry } from '../features/registry';

const KIND_TOKEN = /^[A-Za-z][A-Za-z0-9]*$/;
const NUMBER_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// ============================================================================
// Parser
// ============================================================================

export function parseSpecifier(text: string, registry: IndicatorRegistry): Specifier {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new MalformedSpecifierError(text, 'empty specifier');
  }
  if (/\s/.test(trimmed)) {
    throw new MalformedSpecifierError(text, 'whitespace is not allowed');
  }

  const [kindToken, ...paramTokens] = trimmed.split('_');
  if (!KIND_TOKEN.test(kindToken)) {
    throw new MalformedSpecifierError(text, `"${kindToken}" is not a valid kind name`);
  }
  if (paramTokens.some((token) => token.length === 0)) {
    throw new MalformedSpecifierError(text, 'empty parameter between separators');
  }

  const descriptor = registry.lookup(kindToken, text);

  const values = paramTokens.map((token, i) => {
    const name = descriptor.params[i]?.name;
    if (!NUMBER_TOKEN.test(token)) {
      throw new InvalidParameterError(text, `"${token}" is not a decimal number`, name);
    }
    return Number(token);
  });

  return resolveParams(descriptor, values, text);
}

/**
 * Check an already-built specifier (e.g. a declared sub-dependency) and
 * return its canonical form
 */
export function normalizeSpecifier(specifier: Specifier, registry: IndicatorRegistry): Specifier {
  const origin = formatSpecifier(specifier);
  const descriptor = registry.lookup(specifier.kind, origin);
  return resolveParams(descriptor, specifier.params, origin);
}

function resolveParams(
  descriptor: IndicatorDescriptor,
  supplied: readonly number[],
  origin: string
): Specifier {
  const schema = descriptor.params;
  const required = schema.filter((p) => p.default === undefined).length;

  if (supplied.length > schema.length) {
    throw new InvalidParameterError(
      origin,
      `${descriptor.kind} takes at most ${schema.length} parameter(s), got ${supplied.length}`
    );
  }
  if (supplied.length < required) {
    throw new InvalidParameterError(
      origin,
      `${descriptor.kind} requires at least ${required} parameter(s), got ${supplied.length}`
    );
  }

  const params: number[] = [];
  for (const [i, param] of schema.entries()) {
    const value = i < supplied.length ? supplied[i] : param.default;
    if (value === undefined) {
      throw new InvalidParameterError(origin, 'missing value', param.name);
    }

    const check = paramValueSchema(param).safeParse(value);
    if (!check.success) {
      throw new InvalidParameterError(origin, check.error.issues[0]?.message ?? 'invalid value', param.name);
    }
    // -0 and 0 render the same; keep the key stable
    params.push(value === 0 ? 0 : value);
  }

  const crossCheck = descriptor.validate?.(params) ?? null;
  if (crossCheck) {
    throw new InvalidParameterError(origin, crossCheck);
  }

  return Object.freeze({ kind: descriptor.kind, params: Object.freeze(params) });
}

// ============================================================================
// Canonical naming
// ============================================================================

export function formatSpecifier(specifier: Specifier): string {
  return [specifier.kind.toLowerCase(), ...specifier.params.map((p) => String(p))].join('_');
}

export function specifiersEqual(a: Specifier, b: Specifier): boolean {
  return (
    a.kind.toLowerCase() === b.kind.toLowerCase() &&
    a.params.length === b.params.length &&
    a.params.every((p, i) => p === b.params[i])
  );
}

/**
 * Column names for an indicator: the canonical text for a single output,
 * "<text>_<output>" per output otherwise
 */
export function outputColumns(specifier: Specifier, descriptor: IndicatorDescriptor): OutputColumn[] {
  const text = formatSpecifier(specifier);
  if (descriptor.outputs.length === 1) {
    return [{ name: text, output: descriptor.outputs[0] }];
  }
  return descriptor.outputs.map((output) => ({ name: `${text}_${output}`, output }));
}
