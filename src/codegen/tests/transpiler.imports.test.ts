import { describe, expect, test } from 'vitest';

import type { CommandNode } from '../../types';
import type { TestScenario } from './types';
import { b } from '../../builders';
import { compileScript } from '../transpiler';
import {
  captureFailure,
  resolveScenarioInput,
  rootSource
} from './test-utils';

const importModule = (location: string) =>
  b.command('import:module', [b.resourceLocation(location)]);

const importAlias = (location: string, alias: string) =>
  b.command('import:module:as:alias', [
    b.resourceLocation(location),
    b.importedIdentifier(alias)
  ]);

/**
 * `from <location> import a, b, ...` as a chain of subcommands.
 */
const importFrom = (location: string, names: string[]) => {
  const chain = names.reduceRight<CommandNode | undefined>(
    (next, name) =>
      next
        ? b.command('from:module:import:name:subcommand', [
            b.importedIdentifier(name),
            next
          ])
        : b.command('from:module:import:name', [b.importedIdentifier(name)]),
    undefined
  );

  return b.command(
    'from:module:import:subcommand',
    chain ? [b.resourceLocation(location), chain] : [b.resourceLocation(location)]
  );
};

describe('Transpiler: imports', () => {
  const scenarios: TestScenario<CommandNode, string>[] = [
    {
      id: 'Native Module',
      description: 'A module without namespace uses the native import.',
      input: importModule('math'),
      expected: 'import math'
    },
    {
      id: 'Runtime Module',
      description: 'A namespaced module binds its last path segment.',
      input: importModule('demo:utils/strings'),
      expected:
        "strings = _script_runtime.import_module('demo:utils/strings').namespace"
    },
    {
      id: 'Native Alias',
      description: 'Native modules keep the native alias form.',
      input: importAlias('os.path', 'p'),
      expected: 'import os.path as p'
    },
    {
      id: 'Runtime Alias',
      description: 'A namespaced module is bound to the alias.',
      input: importAlias('demo:utils', 'u'),
      expected: "u = _script_runtime.import_module('demo:utils').namespace"
    },
    {
      id: 'Native From Import',
      description: 'Imported names are listed in source order.',
      input: () => importFrom('math', ['a', 'b']),
      expected: 'from math import a, b'
    },
    {
      id: 'Runtime From Import',
      description: 'Names of a namespaced module are unpacked from the runtime.',
      input: () => importFrom('demo:lib', ['a', 'b', 'c']),
      expected:
        "a, b, c = _script_runtime.from_module_import('demo:lib', 'a', 'b', 'c')"
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const tree = b.root([resolveScenarioInput(input)]);
    expect(compileScript(tree).source).toBe(rootSource([expected], 0));
  });

  describe('Malformed imports', () => {
    const failures: TestScenario<CommandNode, string>[] = [
      {
        id: 'No Names',
        description: 'A from-import needs at least one link.',
        input: () => importFrom('math', []),
        expected:
          '[codegen] Expected argument 1 of command "from:module:import:subcommand" to be of kind "command", got nothing.'
      },
      {
        id: 'Link Without Name',
        description: 'Every link must hold an imported name.',
        input: b.command('from:module:import:subcommand', [
          b.resourceLocation('math'),
          b.command('from:module:import:name', [b.identifier('a')])
        ]),
        expected:
          '[codegen] Expected argument 0 of command "from:module:import:name" to be of kind "importedIdentifier", got "identifier".'
      },
      {
        id: 'Unbindable Module',
        description: 'A path segment that is not a name needs an alias.',
        input: importModule('demo:my-lib'),
        expected:
          '[codegen] Cannot bind module "my-lib" to a name; use "import ... as <alias>".'
      },
      {
        id: 'Missing Module',
        description: 'The module location is mandatory.',
        input: b.command('import:module', []),
        expected:
          '[codegen] Expected argument 0 of command "import:module" to be of kind "resourceLocation", got nothing.'
      }
    ];

    test.for(failures)('[$id] $description', ({ input, expected }) => {
      const tree = b.root([resolveScenarioInput(input)]);
      const failure = captureFailure(() => compileScript(tree));

      expect(failure.ruleId).toBe('malformed-import');
      expect(failure.reason).toBe(expected);
    });
  });
});
