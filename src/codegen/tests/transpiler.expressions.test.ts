import { describe, expect, test } from 'vitest';

import type { CodegenOutcome, ScriptNode } from '../../types';
import type { TestScenario } from './types';
import { b } from '../../builders';
import { defineRule } from '../../dispatch';
import { normalizeOptions } from '../../options';
import { Accumulator } from '../accumulator';
import { Transpiler } from '../transpiler';
import { compileNode, resolveScenarioInput } from './test-utils';

/**
 * Test suite: expression fragments.
 *
 * Every scenario compiles one expression node and checks the fragment list
 * it returns. Nodes carry no position unless a scenario is about markers.
 */
describe('Transpiler: expressions', () => {
  const scenarios: TestScenario<ScriptNode, CodegenOutcome>[] = [
    {
      id: 'Identifier',
      description: 'Identifiers are parenthesized.',
      input: b.identifier('x'),
      expected: ['(x)']
    },
    {
      id: 'Identifier With Line',
      description: 'A located identifier carries a line marker.',
      input: b.identifier('x', 4),
      expected: ['(\n#4\nx)']
    },
    {
      id: 'Target Identifier',
      description: 'Assignment targets are bare names.',
      input: b.targetIdentifier('t'),
      expected: ['t']
    },
    {
      id: 'String Value',
      description: 'Values render as host literals.',
      input: b.value("it's"),
      expected: ['"it\'s"']
    },
    {
      id: 'None Value',
      description: 'null renders as None.',
      input: b.value(null),
      expected: ['None']
    },
    {
      id: 'Binary',
      description: 'Underscores in operators become spaces.',
      input: b.binary('not_in', b.identifier('a'), b.identifier('b')),
      expected: ['((a) not in (b))']
    },
    {
      id: 'Unary',
      description: 'The operator precedes its operand.',
      input: b.unary('not', b.identifier('a')),
      expected: ['(not (a))']
    },
    {
      id: 'Format String',
      description: 'Format strings call format with every value.',
      input: b.formatString('{} + {}', [b.value(1), b.identifier('x')]),
      expected: ["('{} + {}'.format(1, (x)))"]
    },
    {
      id: 'Single Tuple',
      description: 'Tuple items keep a trailing comma.',
      input: b.tuple([b.value(1)]),
      expected: ['((1,))']
    },
    {
      id: 'Pair Tuple',
      description: 'Every tuple item is followed by a comma.',
      input: b.tuple([b.value(1), b.value(2)]),
      expected: ['((1,2,))']
    },
    {
      id: 'Empty List',
      description: 'An empty list is still a list literal.',
      input: b.list([]),
      expected: ['([])']
    },
    {
      id: 'List With Static Item',
      description: 'Static items are referenced in place (no mutation).',
      input: b.list([b.text('a'), b.identifier('y'), b.text('c')]),
      expected: ['([_script_refs[0], (y), _script_refs[1]])']
    },
    {
      id: 'Dict',
      description: 'Dict items compile key then value.',
      input: b.dict([b.dictItem(b.value('k'), b.identifier('v'))]),
      expected: ["({'k': (v)})"]
    },
    {
      id: 'Attribute',
      description: 'Attribute access goes through the get_attribute helper.',
      input: b.attribute(b.identifier('o'), 'name'),
      expected: ["(_script_helper_get_attribute((o), 'name'))"]
    },
    {
      id: 'Lookup',
      description: 'Lookups index the compiled base.',
      input: b.lookup(b.identifier('o'), [b.value(0)]),
      expected: ['((o)[0])']
    },
    {
      id: 'Call',
      description: 'Calls pass every compiled argument.',
      input: b.call(b.identifier('f'), [b.value(1), b.identifier('x')]),
      expected: ['((f)(1, (x)))']
    },
    {
      id: 'Call With Static Argument',
      description: 'A static argument is passed by reference.',
      input: b.call(b.identifier('f'), [b.text('a')]),
      expected: ['((f)(_script_refs[0]))']
    },
    {
      id: 'Call Argument Order',
      description: 'Arguments are referenced before the callee.',
      input: b.call(b.text('f'), [b.text('a')]),
      expected: ['(_script_refs[1](_script_refs[0]))']
    },
    {
      id: 'Lookup Argument Order',
      description: 'Keys are referenced before the base.',
      input: b.lookup(b.text('o'), [b.text('k')]),
      expected: ['(_script_refs[1][_script_refs[0]])']
    },
    {
      id: 'Assignment',
      description: 'The operator is kept verbatim.',
      input: b.assignment('+=', b.targetIdentifier('t'), b.value(1)),
      expected: ['t += 1']
    },
    {
      id: 'Interpolation',
      description: 'Interpolations convert the value and reference the node.',
      input: b.interpolation('int', b.value(5)),
      expected: ['(_script_helper_interpolate_int(5, _script_refs[0]))']
    },
    {
      id: 'Argument Interpolation',
      description:
        'Argument interpolations convert to the argument type and keep the location.',
      input: b.argumentInterpolation('entity', b.identifier('e')),
      expected: [
        '(_script_helper_set_location(_script_helper_convert_entity((e)), _script_refs[0]))'
      ]
    },
    {
      id: 'Static Text',
      description: 'A node without dynamic content is unchanged.',
      input: b.text('x'),
      expected: undefined
    },
    {
      id: 'Static Command',
      description: 'A command without dynamic arguments is unchanged.',
      input: b.command('say:message', [b.message([b.text('hi')])]),
      expected: undefined
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const { outcome } = compileNode(resolveScenarioInput(input));
    expect(outcome).toStrictEqual(expected);
  });

  test('helpers used by expressions are bound in the header', () => {
    const { acc } = compileNode(
      b.attribute(b.argumentInterpolation('entity', b.identifier('e')), 'x')
    );

    expect(acc.getSource()).toBe(
      [
        "_script_helper_convert_entity = _script_runtime.helpers['convert:entity']",
        "_script_helper_set_location = _script_runtime.helpers['set_location']",
        "_script_helper_get_attribute = _script_runtime.helpers['get_attribute']"
      ].join('\n')
    );
  });

  test('configured argument parsers are accepted', () => {
    const { outcome } = compileNode(
      b.argumentInterpolation('block_state', b.identifier('s')),
      { argumentParsers: ['block_state'] }
    );

    expect(outcome).toStrictEqual([
      '(_script_helper_set_location(_script_helper_convert_block_state((s)), _script_refs[0]))'
    ]);
  });

  test('constrained extension rules take over matching nodes', () => {
    const rule = defineRule<CodegenOutcome, Accumulator>();
    const transpiler = new Transpiler().extend(
      rule('identifier', { value: 'secret' }, () => ["'***'"])
    );
    const acc = new Accumulator(normalizeOptions());

    const outcome = transpiler.invoke(
      b.call(b.identifier('print'), [b.identifier('secret')]),
      acc
    );

    expect(outcome).toStrictEqual(["((print)('***'))"]);
  });
});
