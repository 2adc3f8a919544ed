import type { OrderPreservation, StructuralSharing } from '../architecture';
import type { DispatchScope } from '../dispatch';
import type {
  CodegenOutcome,
  Fragment,
  RootNode,
  ScriptNode
} from '../types';
import type { Accumulator } from './accumulator';
import type { CollectorClass } from './collectors';

import { describeNode, fail } from '../errors';
import { fieldEntries } from '../node-fields';
import { ChildrenCollector, CommandCollector } from './collectors';

/** Dispatch scope of the code generator. */
export type CodegenScope = DispatchScope<CodegenOutcome, Accumulator>;

/**
 * What a single-child position does with an unchanged child.
 *
 * - `optional`:  reports it as unchanged (`undefined`).
 * - `required`:  fails with `arity-violation`; the position needs code.
 * - `reference`: substitutes the original node through the reference table.
 */
export type VisitMode = 'optional' | 'required' | 'reference';

/**
 * Compiles one child that must produce at most one fragment.
 *
 * @throws `arity-violation` failure when the child yields zero or several
 *         fragments, or yields nothing in `required` mode.
 */
export function visitSingle(
  node: ScriptNode,
  scope: CodegenScope,
  mode?: 'optional'
): Fragment | undefined;

export function visitSingle(
  node: ScriptNode,
  scope: CodegenScope,
  mode: 'required' | 'reference'
): Fragment;

export function visitSingle(
  node: ScriptNode,
  scope: CodegenScope,
  mode: VisitMode = 'optional'
): Fragment | undefined {
  const result = scope.invoke(node);

  if (result === undefined) {
    if (mode === 'reference') return scope.context.makeRef(node);
    if (mode === 'required') {
      fail(
        'arity-violation',
        `Expected a result for ${describeNode(node)}, got none (unchanged).`,
        node
      );
    }
    return undefined;
  }

  if (result.length !== 1) {
    fail(
      'arity-violation',
      `Expected a single result for ${describeNode(node)}, got ${result.length}.`,
      node
    );
  }

  return result[0];
}

/**
 * Compiles a children field and returns the expression of the rebuilt
 * sequence, or `undefined` when no child changed.
 *
 * Logic:
 * 1. Children are compiled in order; unchanged ones are only counted.
 * 2. On a changed child, the code it just emitted is taken out of the
 *    buffer, the run of unchanged children before it is registered, and the
 *    code is put back before the child's fragments are registered.
 * 3. The trailing run of unchanged children is registered before `flush`.
 *
 * Side effects therefore follow source order (see {@link OrderPreservation}).
 */
export function visitMultiple(
  children: readonly ScriptNode[],
  scope: CodegenScope,
  Collector: CollectorClass = ChildrenCollector
): Fragment | undefined {
  const acc = scope.context;
  let collector: ChildrenCollector | undefined;
  let pending = 0;
  let index = acc.position;

  for (const [i, child] of children.entries()) {
    const result = scope.invoke(child);
    if (result === undefined) continue;

    if (!collector) collector = new Collector(acc, index);

    const lines = acc.take(index);
    collector.addStatic(...children.slice(pending, i));
    acc.restore(lines);
    collector.addDynamic(...result);

    pending = i + 1;
    index = acc.position;
  }

  if (!collector) return undefined;

  collector.addStatic(...children.slice(pending));
  return collector.flush();
}

/**
 * Compiles every field of `node` and rebuilds it through the `replace`
 * helper with the changed fields only.
 *
 * Returns `undefined` when no field changed (see {@link StructuralSharing}).
 */
export function visitGeneric(
  node: ScriptNode,
  scope: CodegenScope,
  Collector: CollectorClass = ChildrenCollector
): Fragment | undefined {
  const changed: Record<string, Fragment> = {};

  for (const entry of fieldEntries(node)) {
    let result: Fragment | undefined;

    if (entry.shape === 'children') {
      result = visitMultiple(entry.value, scope, Collector);
    } else if (entry.shape === 'node' && entry.value) {
      result = visitSingle(entry.value, scope);
    }

    if (result !== undefined) changed[entry.name] = result;
  }

  if (Object.keys(changed).length === 0) return undefined;

  const acc = scope.context;
  return acc.replace(acc.makeRef(node), changed);
}

/**
 * Emits the commands of a nested body into the ambient command buffer.
 *
 * An unchanged body is registered with a single statement extending the
 * buffer with the original commands.
 */
export function visitBody(
  root: RootNode,
  scope: CodegenScope,
  Collector: CollectorClass = CommandCollector
): void {
  const result = visitMultiple(root.commands, scope, Collector);
  if (result !== undefined) return;

  const acc = scope.context;
  acc.statement(`${acc.commands}.extend(${acc.makeRef(root)}.commands)`);
}
