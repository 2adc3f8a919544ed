import type { FragmentOutcome, StructuralSharing } from '../architecture';
import type { ScriptNode } from './nodes';

/**
 * A piece of host-language expression text produced by compiling one node.
 */
export type Fragment = string;

/**
 * Result of compiling one node.
 *
 * - `undefined`: the subtree is unchanged; the caller reuses the original
 *   node by reference and no code is emitted for it.
 * - `[]`: the node was handled purely through emitted statements.
 * - `[fragment]`: the expression that rebuilds (or evaluates) the node.
 *
 * See {@link StructuralSharing} and {@link FragmentOutcome}.
 */
export type CodegenOutcome = readonly Fragment[] | undefined;

/**
 * Runtime helpers the generated text calls through the helper table.
 *
 * The set is closed except for the per-converter and per-argument-type
 * families, whose suffix comes from the tree.
 */
export type HelperName =
  | 'replace'
  | 'children'
  | 'missing'
  | 'get_attribute'
  | 'set_location'
  | `interpolate_${string}`
  | `convert:${string}`;

/**
 * Output of one compilation.
 *
 * When the whole tree is static there is nothing to execute: `source` and
 * `output` are `null` and the caller keeps the original tree.
 */
export type CodegenResult =
  | {
      /** Generated host-language source. */
      source: string;
      /** Name of the variable the source binds the compiled tree to. */
      output: string;
      /** Objects the generated source indexes through the reference table. */
      refs: readonly ScriptNode[];
    }
  | {
      source: null;
      output: null;
      refs: readonly ScriptNode[];
    };

declare module 'unified' {
  interface CompileResultMap {
    CodegenResult: CodegenResult;
  }
}
