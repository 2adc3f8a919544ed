import type {
  LeafValue,
  NodeKind,
  NodeOfKind,
  ScriptNode
} from '../types';

import { isLeafValue } from '../guards';
import { readField } from '../node-fields';

/**
 * What a rule is registered for: one node kind, or `'*'` for every kind.
 *
 * A wildcard rule is less specific than any kind-specific rule and acts as
 * the fallback of a visitor.
 */
export type RuleTarget = NodeKind | '*';

/** Node type a handler receives for a given target. */
export type TargetNode<T extends RuleTarget> = T extends NodeKind
  ? NodeOfKind<T>
  : ScriptNode;

/**
 * Leaf fields of `N` that a rule may constrain to a literal value.
 */
type ConstrainableField<N> = {
  [F in keyof N]-?: F extends 'type'
    ? never
    : NonNullable<N[F]> extends LeafValue
      ? F
      : never;
}[keyof N];

/**
 * `field = literal` constraints of a rule. A rule matches a node only when
 * every listed field holds exactly the given value.
 *
 * @example
 *   `{ identifier: 'if:condition:body' }` on `command` nodes
 */
export type RuleConstraints<N> = {
  readonly [F in ConstrainableField<N>]?: N[F];
};

/**
 * The engine side of a rule invocation.
 *
 * `invoke` hands a child node back to the engine, which resolves and runs
 * the child's own rule and returns its result; the calling handler then
 * continues with that result. Nesting is strictly last-in first-out.
 */
export type DispatchScope<R, C> = {
  readonly context: C;
  invoke(node: ScriptNode): R;
};

export type RuleHandler<N, R, C> = (node: N, scope: DispatchScope<R, C>) => R;

/**
 * A registered dispatch rule (type-erased over the node kind).
 */
export type Rule<R, C> = {
  readonly target: RuleTarget;
  readonly constraints: ReadonlyArray<readonly [field: string, value: LeafValue]>;
  /** Readable form used in debug traces, e.g. `command[identifier="pass"]`. */
  readonly label: string;
  matches(node: ScriptNode): boolean;
  apply(node: ScriptNode, scope: DispatchScope<R, C>): R;
};

function isTargetNode<T extends RuleTarget>(
  node: ScriptNode,
  target: T
): node is TargetNode<T> {
  return target === '*' || node.type === target;
}

function isHandler<N, R, C>(
  value: RuleConstraints<N> | RuleHandler<N, R, C>
): value is RuleHandler<N, R, C> {
  return typeof value === 'function';
}

function formatLabel(
  target: RuleTarget,
  constraints: ReadonlyArray<readonly [string, LeafValue]>
): string {
  const filters = constraints.map(
    ([field, value]) => `[${field}=${JSON.stringify(value)}]`
  );
  return `${target}${filters.join('')}`;
}

/**
 * Creates a rule for `target`, optionally constrained on leaf field values.
 *
 * Constraint entries whose value is `undefined` are ignored.
 */
export function createRule<T extends RuleTarget, R, C>(
  target: T,
  handler: RuleHandler<TargetNode<T>, R, C>
): Rule<R, C>;

export function createRule<T extends RuleTarget, R, C>(
  target: T,
  constraints: RuleConstraints<TargetNode<T>>,
  handler: RuleHandler<TargetNode<T>, R, C>
): Rule<R, C>;

export function createRule<T extends RuleTarget, R, C>(
  target: T,
  constraintsOrHandler:
    | RuleConstraints<TargetNode<T>>
    | RuleHandler<TargetNode<T>, R, C>,
  maybeHandler?: RuleHandler<TargetNode<T>, R, C>
): Rule<R, C> {
  const handler = isHandler(constraintsOrHandler)
    ? constraintsOrHandler
    : maybeHandler;

  if (!handler) {
    throw new TypeError(`Rule for "${target}" is missing its handler.`);
  }

  const entries: [string, unknown][] = isHandler(constraintsOrHandler)
    ? []
    : Object.entries(constraintsOrHandler);

  const constraints = entries.filter(
    (entry): entry is [string, LeafValue] => isLeafValue(entry[1])
  );

  return {
    target,
    constraints,
    label: formatLabel(target, constraints),

    matches(node) {
      if (!isTargetNode(node, target)) return false;
      return constraints.every(
        ([field, value]) => readField(node, field) === value
      );
    },

    apply(node, scope) {
      if (!isTargetNode(node, target)) {
        throw new TypeError(
          `Rule ${formatLabel(target, constraints)} cannot handle ${node.type} nodes.`
        );
      }
      return handler(node, scope);
    }
  };
}

/**
 * Rule factory with the result and context types of a visitor fixed.
 */
export type RuleFactory<R, C> = {
  <T extends RuleTarget>(
    target: T,
    handler: RuleHandler<TargetNode<T>, R, C>
  ): Rule<R, C>;
  <T extends RuleTarget>(
    target: T,
    constraints: RuleConstraints<TargetNode<T>>,
    handler: RuleHandler<TargetNode<T>, R, C>
  ): Rule<R, C>;
};

/**
 * Creates a rule factory bound to a visitor's result and context types.
 *
 * Implementation Note:
 * Utilizes a curried function pattern so the result/context generics are
 * given once, explicitly, while the node type of every handler is still
 * inferred from its target kind.
 *
 * Usage:
 * ```ts
 * const rule = defineRule<string[], Accumulator>();
 * rule('command', { identifier: 'pass' }, (node, scope) => { ... });
 * ```
 */
export function defineRule<R, C = void>(): RuleFactory<R, C> {
  return createRule;
}
