import { describe, expect, test } from 'vitest';

import type { Rule } from '../rule';
import type { ScriptNode } from '../../types';
import type { TestScenario } from '../../codegen/tests/types';
import { b } from '../../builders';
import { childNodes, isNodeOfKind } from '../../node-fields';
import {
  captureFailure,
  resolveScenarioInput
} from '../../codegen/tests/test-utils';
import { defineRule } from '../rule';
import { Visitor } from '../visitor';

/**
 * Test suite: type-and-attribute dispatch.
 *
 * Scope:
 * - Collecting visitors (side effects only).
 * - Composition through `extend`.
 * - Visitors returning results through `scope.invoke`.
 * - Rule specificity and failure on unmatched nodes.
 */
describe('Visitor dispatch', () => {
  const particle = () =>
    b.command('particle:dust', [
      b.vector([b.number(1), b.number(0.5), b.number(7)]),
      b.number(1),
      b.vector([b.text('~7'), b.text('~7'), b.text('~7')])
    ]);

  describe('Collecting visitors', () => {
    test('a wildcard walk reaches every number in field order', () => {
      const rule = defineRule<void>();
      const numbers: number[] = [];

      const visitor = new Visitor(
        rule('*', (node, scope) => {
          for (const child of childNodes(node)) scope.invoke(child);
        }),
        rule('number', node => {
          numbers.push(node.value);
        })
      );

      visitor.invoke(particle());

      expect(numbers).toStrictEqual([1, 0.5, 7, 1]);
    });

    test('extended rule sets combine and constrained rules win', () => {
      const rule = defineRule<void>();
      const kinds: string[] = [];
      const numbers: number[] = [];
      const sevens: number[] = [];

      const foo = new Visitor(
        rule('*', (node, scope) => {
          kinds.push(node.type);
          for (const child of childNodes(node)) scope.invoke(child);
        }),
        rule('number', { value: 7 }, node => {
          sevens.push(node.value);
        })
      );

      const visitor = new Visitor<void>().extend(
        rule('number', node => {
          numbers.push(node.value);
        }),
        foo
      );

      visitor.invoke(particle());

      expect(kinds).toStrictEqual([
        'command',
        'vector',
        'vector',
        'text',
        'text',
        'text'
      ]);
      expect(numbers).toStrictEqual([1, 0.5, 1]);
      expect(sevens).toStrictEqual([7]);
    });
  });

  describe('Visitor results', () => {
    test('handlers combine the results of their children', () => {
      const rule = defineRule<string[]>();

      const visitor = new Visitor(
        rule('root', (node, scope) =>
          node.commands.flatMap(command => scope.invoke(command))
        ),
        rule('command', (node, scope) => {
          const args = node.arguments.map(
            argument => `'${scope.invoke(argument).join('')}'`
          );
          return [`${node.identifier}(${args.join(', ')})`];
        }),
        rule('message', node => [
          node.fragments
            .map(fragment =>
              isNodeOfKind(fragment, 'text') ? fragment.value : ''
            )
            .join('')
        ])
      );

      const tree = b.root([
        b.command('say:message', [b.message([b.text('hello')])]),
        b.command('say:message', [b.message([b.text('world')])])
      ]);

      expect(visitor.invoke(tree)).toStrictEqual([
        "say:message('hello')",
        "say:message('world')"
      ]);
    });
  });

  describe('Rule specificity', () => {
    const rule = defineRule<string>();

    const scenarios: TestScenario<
      { rules: Rule<string, void>[]; node: ScriptNode },
      string
    >[] = [
      {
        id: 'Kind Over Wildcard',
        description: 'A kind rule wins over a more recent wildcard rule.',
        input: {
          rules: [rule('command', () => 'kind'), rule('*', () => 'wildcard')],
          node: b.command('pass')
        },
        expected: 'kind'
      },
      {
        id: 'Constraints Over Recency',
        description:
          'A constrained rule wins over a more recent unconstrained one.',
        input: {
          rules: [
            rule('command', { identifier: 'pass' }, () => 'pass'),
            rule('command', () => 'any command')
          ],
          node: b.command('pass')
        },
        expected: 'pass'
      },
      {
        id: 'Unmet Constraint',
        description: 'A rule whose constraint does not hold is skipped.',
        input: {
          rules: [
            rule('command', () => 'any command'),
            rule('command', { identifier: 'pass' }, () => 'pass')
          ],
          node: b.command('break')
        },
        expected: 'any command'
      },
      {
        id: 'Recency Breaks Ties',
        description: 'Between equally specific rules the newest wins.',
        input: {
          rules: [
            rule('number', () => 'first'),
            rule('number', () => 'second')
          ],
          node: b.number(1)
        },
        expected: 'second'
      },
      {
        id: 'Wildcard Fallback',
        description: 'The wildcard handles kinds without their own rule.',
        input: {
          rules: [rule('*', () => 'wildcard'), rule('number', () => 'number')],
          node: b.text('x')
        },
        expected: 'wildcard'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { rules, node } = resolveScenarioInput(input);
      expect(new Visitor(...rules).invoke(node)).toBe(expected);
    });

    test('extending registers the other rules as the most recent', () => {
      const base = new Visitor(rule('number', () => 'base'));
      const override = new Visitor(rule('number', () => 'override'));

      expect(base.extend(override).invoke(b.number(1))).toBe('override');
    });

    test('extending a visitor with itself duplicates its rules once', () => {
      const visitor = new Visitor(rule('number', () => 'n'));

      expect(visitor.extend(visitor).rules).toHaveLength(2);
    });

    test('resolve labels the chosen rule', () => {
      const visitor = new Visitor(
        rule('command', { identifier: 'pass' }, () => 'pass')
      );

      expect(visitor.resolve(b.command('pass'))?.label).toBe(
        'command[identifier="pass"]'
      );
      expect(visitor.resolve(b.command('break'))).toBeUndefined();
    });
  });

  describe('Missing rules', () => {
    test('an unmatched node is a missing-rule failure', () => {
      const rule = defineRule<string>();
      const visitor = new Visitor(rule('number', () => 'n'));

      const failure = captureFailure(() =>
        visitor.invoke(b.command('say:message', [], 3))
      );

      expect(failure.ruleId).toBe('missing-rule');
      expect(failure.reason).toBe(
        '[codegen] No rule matches command "say:message"; register a wildcard fallback rule.'
      );
      expect(failure.line).toBe(3);
    });
  });
});
