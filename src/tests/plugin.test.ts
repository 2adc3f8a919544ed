import { unified } from 'unified';
import { VFile } from 'vfile';
import { describe, expect, test } from 'vitest';

import { b } from '../builders';
import { scriptCodegen } from '../index';
import {
  captureFailure,
  rootSource
} from '../codegen/tests/test-utils';

const conditional = () =>
  b.root([
    b.command('if:condition:body', [
      b.identifier('x'),
      b.root([b.command('say:message', [b.message([b.text('a')])])])
    ])
  ]);

describe('scriptCodegen', () => {
  test('stringify returns the compiled source', () => {
    const result = unified().use(scriptCodegen).stringify(conditional());

    expect(result.source).toBe(
      rootSource(
        [
          'if (x):',
          '    _script_runtime.commands.extend(_script_refs[0].commands)'
        ],
        1
      )
    );
    expect(result.output).toBe('_script_var1');
    expect(result.refs).toHaveLength(2);
  });

  test('plugin options reach the transpiler', () => {
    const result = unified()
      .use(scriptCodegen, { prefix: '_fn' })
      .stringify(conditional());

    expect(result.output).toBe('_fn_var1');
  });

  test('invalid options fail when the plugin is attached', () => {
    const failure = captureFailure(() =>
      unified().use(scriptCodegen, { indent: '' }).freeze()
    );

    expect(failure.ruleId).toBe('invalid-options');
  });

  test('failures are recorded on the file and thrown', () => {
    const file = new VFile();
    const tree = b.root([b.command('import:module', [], 5)]);

    const failure = captureFailure(() =>
      unified().use(scriptCodegen).stringify(tree, file)
    );

    expect(failure.ruleId).toBe('malformed-import');
    expect(failure.line).toBe(5);
    expect(file.messages).toStrictEqual([failure]);
  });
});
