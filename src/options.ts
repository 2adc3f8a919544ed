import { fail } from './errors';
import { isIdentifierName, isPlainObject, isString } from './guards';

/**
 * Argument types accepted by `argumentInterpolation` nodes when no explicit
 * list is configured.
 */
export const DEFAULT_ARGUMENT_PARSERS: readonly string[] = [
  'bool',
  'double',
  'float',
  'integer',
  'long',
  'string',
  'word',
  'greedy_string',
  'entity',
  'block_pos',
  'vec3',
  'resource_location',
  'nbt_compound',
  'json'
];

export type CodegenOptions = {
  /**
   * Prefix of every name the generated source introduces
   * (`<prefix>_runtime`, `<prefix>_refs`, `<prefix>_var0`, ...).
   * Must be a valid identifier.
   *
   * @default '_script'
   */
  prefix?: string;

  /**
   * One level of indentation in the generated source.
   *
   * @default '    '
   */
  indent?: string;

  /**
   * Emit original line numbers and the source-position table
   * (`<prefix>_lineno`) used to map runtime failures back to the script.
   *
   * @default true
   */
  sourcePositions?: boolean;

  /**
   * Argument types an `argumentInterpolation` may convert to. Referencing
   * any other type fails the compilation.
   *
   * @default DEFAULT_ARGUMENT_PARSERS
   */
  argumentParsers?: readonly string[];
};

export type ResolvedCodegenOptions = Required<CodegenOptions>;

/**
 * Merges user options over the defaults and validates the result.
 *
 * @throws `invalid-options` failure when a value cannot be used to generate
 *         well-formed source.
 */
export function normalizeOptions(
  options?: CodegenOptions | null
): ResolvedCodegenOptions {
  const input: unknown = options ?? {};

  if (!isPlainObject(input)) {
    fail('invalid-options', 'Expected codegen options to be a plain object.');
  }

  const resolved: ResolvedCodegenOptions = {
    prefix: options?.prefix ?? '_script',
    indent: options?.indent ?? '    ',
    sourcePositions: options?.sourcePositions ?? true,
    argumentParsers: options?.argumentParsers ?? DEFAULT_ARGUMENT_PARSERS
  };

  if (!isIdentifierName(resolved.prefix)) {
    fail(
      'invalid-options',
      `Invalid prefix "${resolved.prefix}": expected an identifier.`
    );
  }

  if (!/^(?: +|\t+)$/.test(resolved.indent)) {
    fail(
      'invalid-options',
      'Invalid indent: expected a non-empty run of spaces or tabs.'
    );
  }

  if (!resolved.argumentParsers.every(name => isString(name) && name !== '')) {
    fail(
      'invalid-options',
      'Invalid argumentParsers: expected non-empty parser names.'
    );
  }

  return resolved;
}
