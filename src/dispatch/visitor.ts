import type { RuleSpecificity } from '../architecture';
import type { ScriptNode } from '../types';
import type { DispatchScope, Rule, RuleTarget } from './rule';

import { debugLog } from '../debug';
import { describeNode, fail } from '../errors';

type RegisteredRule<R, C> = {
  rule: Rule<R, C>;
  /** Registration order within this visitor; higher is more recent. */
  order: number;
};

/**
 * Anything a visitor can be built or extended from.
 */
export type RuleSource<R, C> = Rule<R, C> | Visitor<R, C>;

/**
 * Orders candidate rules from most to least specific.
 *
 * 1. More constraints first.
 * 2. Equal constraint count: most recently registered first.
 */
function compareSpecificity<R, C>(
  a: RegisteredRule<R, C>,
  b: RegisteredRule<R, C>
): number {
  return (
    b.rule.constraints.length - a.rule.constraints.length || b.order - a.order
  );
}

/**
 * Type-and-attribute dispatch over script trees.
 *
 * Resolution
 * ----------
 * For a node of kind `K`, the rules registered for `K` are tried first, then
 * the wildcard (`'*'`) rules. Within each group the candidates are kept
 * sorted at registration time (see {@link compareSpecificity}); the first
 * rule whose constraints all hold wins. Exactly one handler runs per node
 * (see {@link RuleSpecificity}).
 *
 * Composition
 * -----------
 * `extend` registers the rules of other visitors (in their own order) after
 * the current ones, so for equally specific rules the later rule set takes
 * precedence. Rule sets authored independently can therefore be combined
 * into one traversal.
 *
 * @template R - Result type of every handler.
 * @template C - Context value shared by one traversal (e.g. an accumulator).
 */
export class Visitor<R, C = void> {
  private readonly registry = new Map<RuleTarget, RegisteredRule<R, C>[]>();
  private readonly registered: Rule<R, C>[] = [];

  constructor(...sources: RuleSource<R, C>[]) {
    this.extend(...sources);
  }

  /** Every rule of this visitor, in registration order. */
  get rules(): readonly Rule<R, C>[] {
    return this.registered;
  }

  addRule(rule: Rule<R, C>): this {
    const candidates = this.registry.get(rule.target) ?? [];

    candidates.push({ rule, order: this.registered.length });
    candidates.sort(compareSpecificity);

    this.registry.set(rule.target, candidates);
    this.registered.push(rule);
    return this;
  }

  extend(...sources: RuleSource<R, C>[]): this {
    for (const source of sources) {
      if (source instanceof Visitor) {
        // Snapshot: extending a visitor with itself must terminate.
        for (const rule of [...source.rules]) this.addRule(rule);
      } else {
        this.addRule(source);
      }
    }
    return this;
  }

  /**
   * Returns the rule that handles `node`, or `undefined` when none matches.
   */
  resolve(node: ScriptNode): Rule<R, C> | undefined {
    const groups = [this.registry.get(node.type), this.registry.get('*')];

    for (const candidates of groups) {
      const match = candidates?.find(({ rule }) => rule.matches(node));
      if (match) return match.rule;
    }

    return undefined;
  }

  /**
   * Runs the best matching rule for `node`.
   *
   * @throws `missing-rule` failure when no rule matches.
   */
  invoke(node: ScriptNode, context: C): R {
    const rule = this.resolve(node);

    if (!rule) {
      fail(
        'missing-rule',
        `No rule matches ${describeNode(node)}; register a wildcard fallback rule.`,
        node
      );
    }

    debugLog('dispatch', `${describeNode(node)} -> ${rule.label}`);

    const scope: DispatchScope<R, C> = {
      context,
      invoke: child => this.invoke(child, context)
    };

    return rule.apply(node, scope);
  }
}
