import type { Compiler, Plugin } from 'unified';
import type { Node } from 'unist';

import type { CodegenOptions } from './options';
import type { CodegenResult, RootNode } from './types';
import { isCodegenFailure } from './errors';
import { isNodeOfKind, isScriptNode } from './node-fields';
import { Transpiler } from './codegen/transpiler';

export type * from './types';
export type { CodegenOptions, ResolvedCodegenOptions } from './options';
export type { FailureKind } from './errors';
export type { CollectorClass } from './codegen/collectors';
export type { CodegenScope, VisitMode } from './codegen/visit';
export type {
  DispatchScope,
  Rule,
  RuleConstraints,
  RuleFactory,
  RuleHandler,
  RuleSource,
  RuleTarget,
  TargetNode
} from './dispatch';

export { b } from './builders';
export { createRule, defineRule, Visitor } from './dispatch';
export { DEFAULT_ARGUMENT_PARSERS, normalizeOptions } from './options';
export { FAILURE_SOURCE, isCodegenFailure } from './errors';
export {
  NODE_FIELDS,
  childNodes,
  fieldEntries,
  getLineNumber,
  isNodeOfKind,
  isScriptNode
} from './node-fields';
export { Accumulator } from './codegen/accumulator';
export {
  ChildrenCollector,
  CommandCollector,
  RootCommandCollector
} from './codegen/collectors';
export {
  visitBody,
  visitGeneric,
  visitMultiple,
  visitSingle
} from './codegen/visit';
export {
  Transpiler,
  compileScript,
  transpilerRules
} from './codegen/transpiler';

function isRootNode(tree: Node): tree is RootNode {
  const node: unknown = tree;
  return isScriptNode(node) && isNodeOfKind<'root'>(node, 'root');
}

/**
 * unified compiler plugin turning a script tree into host-language source.
 *
 * The compile result is a {@link CodegenResult} (`file.result` after
 * `process`, or the return value of `stringify`).
 *
 * Failures are fatal: the message is added to `file.messages` and thrown,
 * the same way `file.fail` reports.
 *
 * @example
 * ```ts
 * const result = unified().use(scriptCodegen, { prefix: '_fn' }).stringify(tree);
 * ```
 */
export const scriptCodegen: Plugin<
  [(CodegenOptions | null | undefined)?],
  RootNode,
  CodegenResult
> = function (options) {
  // 1. Resolve the options once per processor.
  //    Invalid options fail here, before any tree is compiled.
  const transpiler = new Transpiler(options);

  // 2. Register the compiler.
  //    Contract: only script roots are accepted; anything else is a usage
  //    error of the processor pipeline.
  const compiler: Compiler<Node, CodegenResult> = (tree, file) => {
    if (!isRootNode(tree)) {
      throw new TypeError(
        `[codegen] Expected a script root node, got "${tree.type}".`
      );
    }

    try {
      return transpiler.compile(tree);
    } catch (error) {
      if (isCodegenFailure(error)) file.messages.push(error);
      throw error;
    }
  };

  this.compiler = compiler;
};
