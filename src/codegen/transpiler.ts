import type { FailureKind } from '../errors';
import type { CodegenOptions, ResolvedCodegenOptions } from '../options';
import type {
  CodegenOutcome,
  CodegenResult,
  CommandNode,
  Fragment,
  NodeKind,
  NodeOfKind,
  RootNode,
  ScriptNode
} from '../types';
import type { CodegenScope } from './visit';

import { debugLog } from '../debug';
import { defineRule, Visitor } from '../dispatch';
import { describeNode, fail } from '../errors';
import { isIdentifierName } from '../guards';
import { isNodeOfKind } from '../node-fields';
import { normalizeOptions } from '../options';
import { Accumulator } from './accumulator';
import { RootCommandCollector } from './collectors';
import { renderLiteral, renderString } from './host-literal';
import { visitBody, visitGeneric, visitSingle } from './visit';

const rule = defineRule<CodegenOutcome, Accumulator>();

function single(fragment: Fragment | undefined): CodegenOutcome {
  return fragment === undefined ? undefined : [fragment];
}

/**
 * Reads argument `index` of a command and checks its kind.
 *
 * @throws `failure` (default `malformed-command`) when the argument is
 *         missing or of another kind.
 */
function argumentOf<K extends NodeKind>(
  node: CommandNode,
  index: number,
  kind: K,
  failure: FailureKind = 'malformed-command'
): NodeOfKind<K> {
  const argument = node.arguments.at(index);

  if (!argument || !isNodeOfKind(argument, kind)) {
    fail(
      failure,
      `Expected argument ${index} of ${describeNode(node)} to be of kind "${kind}", got ${argument ? `"${argument.type}"` : 'nothing'}.`,
      node
    );
  }

  return argument;
}

function operandOf(node: CommandNode, index: number): ScriptNode {
  const argument = node.arguments.at(index);

  if (!argument) {
    fail(
      'malformed-command',
      `Expected argument ${index} of ${describeNode(node)}.`,
      node
    );
  }

  return argument;
}

function compileAll(
  nodes: readonly ScriptNode[],
  scope: CodegenScope
): Fragment[] {
  return nodes.map(node => visitSingle(node, scope, 'reference'));
}

function operator(value: string): string {
  return value.replace(/_/g, ' ');
}

/* -------------------------------------------------------------------------- */
/* Structural rules                                                            */
/* -------------------------------------------------------------------------- */

const fallback = rule('*', (node, scope) => single(visitGeneric(node, scope)));

const root = rule('root', (node, scope) =>
  single(visitGeneric(node, scope, RootCommandCollector))
);

/* -------------------------------------------------------------------------- */
/* Statements                                                                  */
/* -------------------------------------------------------------------------- */

const statement = rule(
  'command',
  { identifier: 'statement' },
  (node, scope) => {
    const value = visitSingle(operandOf(node, 0), scope);
    if (value !== undefined) scope.context.statement(value);
    return [];
  }
);

/**
 * Keyword statement with an optional operand (`return`, `yield from x`,
 * `break`, ...).
 */
function keywordStatement(identifier: string, keyword: string) {
  return rule('command', { identifier }, (node, scope) => {
    const operand = node.arguments.at(0);
    const value = operand
      ? ` ${visitSingle(operand, scope, 'reference')}`
      : '';

    scope.context.statement(`${keyword}${value}`);
    return [];
  });
}

/**
 * Block statement (`if`, `elif`, `while`) with a condition as argument 0 and
 * the nested body as argument 1.
 */
function conditionalBlock(identifier: string, keyword: string) {
  return rule('command', { identifier }, (node, scope) => {
    const acc = scope.context;
    const condition = visitSingle(operandOf(node, 0), scope, 'reference');
    const body = argumentOf(node, 1, 'root');

    acc.statement(`${keyword} ${condition}:`);
    acc.block(() => visitBody(body, scope));
    return [];
  });
}

const elseBlock = rule('command', { identifier: 'else:body' }, (node, scope) => {
  const acc = scope.context;
  const body = argumentOf(node, 0, 'root');

  acc.statement('else:');
  acc.block(() => visitBody(body, scope));
  return [];
});

const forBlock = rule(
  'command',
  { identifier: 'for:target:in:iterable:body' },
  (node, scope) => {
    const acc = scope.context;
    const target = visitSingle(operandOf(node, 0), scope, 'required');
    const iterable = visitSingle(operandOf(node, 1), scope, 'reference');
    const body = argumentOf(node, 2, 'root');

    acc.statement(`for ${target} in ${iterable}:`);
    acc.block(() => visitBody(body, scope));
    return [];
  }
);

/**
 * Function definition.
 *
 * Logic:
 * 1. Parameters with a default are declared with the shared missing
 *    sentinel as their default.
 * 2. Inside the body, each such parameter is assigned its compiled default
 *    when the caller did not supply it:
 *
 *      def f(x=<missing>):
 *          if x is <missing>:
 *              x = <default>
 *          <body>
 */
const functionDefinition = rule(
  'command',
  { identifier: 'def:function:body' },
  (node, scope) => {
    const acc = scope.context;
    const signature = argumentOf(node, 0, 'functionSignature');
    const body = argumentOf(node, 1, 'root');

    const parameters = signature.arguments.map(argument =>
      argument.default ? `${argument.name}=${acc.missing()}` : argument.name
    );

    acc.statement(`def ${signature.name}(${parameters.join(', ')}):`);

    acc.block(() => {
      for (const argument of signature.arguments) {
        const defaultValue = argument.default;
        if (!defaultValue) continue;

        acc.statement(`if ${argument.name} is ${acc.missing()}:`);
        acc.block(() => {
          const value = visitSingle(defaultValue, scope, 'reference');
          acc.statement(`${argument.name} = ${value}`);
        });
      }

      visitBody(body, scope);
    });

    return [];
  }
);

/* -------------------------------------------------------------------------- */
/* Imports                                                                     */
/* -------------------------------------------------------------------------- */

/**
 * Names listed by a `from ... import` chain, in source order.
 *
 * Each link holds an imported name as argument 0; the
 * `from:module:import:name:subcommand` links continue with the next link as
 * argument 1.
 */
function importedNames(node: CommandNode): string[] {
  const names: string[] = [];
  let link = argumentOf(node, 1, 'command', 'malformed-import');

  for (;;) {
    names.push(argumentOf(link, 0, 'importedIdentifier', 'malformed-import').value);

    if (link.identifier !== 'from:module:import:name:subcommand') break;
    link = argumentOf(link, 1, 'command', 'malformed-import');
  }

  return names;
}

/**
 * Binding introduced by `import ns:a/b`: the last path segment.
 */
function moduleBinding(node: CommandNode, path: string): string {
  const binding = path.slice(path.lastIndexOf('/') + 1);

  if (!isIdentifierName(binding)) {
    fail(
      'malformed-import',
      `Cannot bind module "${path}" to a name; use "import ... as <alias>".`,
      node
    );
  }

  return binding;
}

/**
 * Import statements.
 *
 * Modules without a namespace are host modules and use the native import
 * forms. Namespaced modules only exist inside the runtime and are resolved
 * through `import_module` / `from_module_import`.
 */
function importStatement(identifier: string) {
  return rule('command', { identifier }, (node, scope) => {
    const acc = scope.context;
    const marker = acc.lineno(node);
    if (marker) acc.statement(marker);

    const module = argumentOf(node, 0, 'resourceLocation', 'malformed-import');
    const location = module.namespace
      ? renderString(`${module.namespace}:${module.path}`)
      : undefined;

    switch (node.identifier) {
      case 'from:module:import:subcommand': {
        const names = importedNames(node);
        acc.statement(
          location
            ? `${names.join(', ')} = ${acc.runtime}.from_module_import(${[location, ...names.map(renderString)].join(', ')})`
            : `from ${module.path} import ${names.join(', ')}`
        );
        break;
      }

      case 'import:module:as:alias': {
        const alias = argumentOf(
          node,
          1,
          'importedIdentifier',
          'malformed-import'
        ).value;
        acc.statement(
          location
            ? `${alias} = ${acc.runtime}.import_module(${location}).namespace`
            : `import ${module.path} as ${alias}`
        );
        break;
      }

      default:
        acc.statement(
          location
            ? `${moduleBinding(node, module.path)} = ${acc.runtime}.import_module(${location}).namespace`
            : `import ${module.path}`
        );
    }

    return [];
  });
}

/* -------------------------------------------------------------------------- */
/* Interpolations                                                              */
/* -------------------------------------------------------------------------- */

const interpolation = rule('interpolation', (node, scope) => {
  const acc = scope.context;
  const value = visitSingle(node.value, scope, 'reference');
  const result = acc.helper(
    `interpolate_${node.converter}`,
    value,
    acc.makeRef(node)
  );
  return [`(${acc.lineno(node)}${result})`];
});

/**
 * `(set_location(convert:<parser>(value), <node>))`: converts the value to
 * the command argument type, then carries the interpolation's location over
 * to the produced argument node.
 */
const argumentInterpolation = rule('argumentInterpolation', (node, scope) => {
  const acc = scope.context;

  if (!acc.options.argumentParsers.includes(node.parser)) {
    fail(
      'unknown-argument-type',
      `Unknown argument type "${node.parser}" in ${describeNode(node)}.`,
      node
    );
  }

  const value = visitSingle(node.value, scope, 'reference');
  const converted = acc.helper(`convert:${node.parser}`, value);
  const result = acc.helper('set_location', converted, acc.makeRef(node));
  return [`(${acc.lineno(node)}${result})`];
});

/* -------------------------------------------------------------------------- */
/* Expressions                                                                 */
/* -------------------------------------------------------------------------- */

const binary = rule('binary', (node, scope) => {
  const left = visitSingle(node.left, scope, 'reference');
  const right = visitSingle(node.right, scope, 'reference');
  return [
    `(${scope.context.lineno(node)}${left} ${operator(node.operator)} ${right})`
  ];
});

const unary = rule('unary', (node, scope) => {
  const value = visitSingle(node.value, scope, 'reference');
  return [`(${scope.context.lineno(node)}${operator(node.operator)} ${value})`];
});

const value = rule('value', node => [renderLiteral(node.value)]);

const identifier = rule('identifier', (node, scope) => [
  `(${scope.context.lineno(node)}${node.value})`
]);

const targetIdentifier = rule('targetIdentifier', node => [node.value]);

const formatString = rule('formatString', (node, scope) => {
  const values = compileAll(node.values, scope);
  return [
    `(${scope.context.lineno(node)}${renderString(node.fmt)}.format(${values.join(', ')}))`
  ];
});

/** Every item keeps its trailing comma so `(a,)` stays a tuple. */
const tuple = rule('tuple', (node, scope) => {
  const items = compileAll(node.items, scope).map(item => `${item},`);
  return [`(${scope.context.lineno(node)}(${items.join('')}))`];
});

const list = rule('list', (node, scope) => {
  const items = compileAll(node.items, scope);
  return [`(${scope.context.lineno(node)}[${items.join(', ')}])`];
});

const dict = rule('dict', (node, scope) => {
  const items = node.items.map(item => {
    const key = visitSingle(item.key, scope, 'reference');
    const entry = visitSingle(item.value, scope, 'reference');
    return `${key}: ${entry}`;
  });
  return [`(${scope.context.lineno(node)}{${items.join(', ')}})`];
});

const attribute = rule('attribute', (node, scope) => {
  const acc = scope.context;
  const base = visitSingle(node.value, scope, 'reference');
  const result = acc.helper('get_attribute', base, renderString(node.name));
  return [`(${acc.lineno(node)}${result})`];
});

// Arguments are compiled before the base value they apply to.
const lookup = rule('lookup', (node, scope) => {
  const keys = compileAll(node.arguments, scope);
  const base = visitSingle(node.value, scope, 'reference');
  return [`(${scope.context.lineno(node)}${base}[${keys.join(', ')}])`];
});

const call = rule('call', (node, scope) => {
  const args = compileAll(node.arguments, scope);
  const callee = visitSingle(node.value, scope, 'reference');
  return [`(${scope.context.lineno(node)}${callee}(${args.join(', ')}))`];
});

const assignment = rule('assignment', (node, scope) => {
  const target = visitSingle(node.target, scope, 'required');
  const result = visitSingle(node.value, scope, 'reference');
  return [`${target} ${node.operator} ${result}`];
});

/**
 * Every rule of the transpiler, least specific first.
 */
export const transpilerRules = [
  fallback,
  root,
  statement,
  functionDefinition,
  keywordStatement('return', 'return'),
  keywordStatement('return:value', 'return'),
  keywordStatement('yield', 'yield'),
  keywordStatement('yield:value', 'yield'),
  keywordStatement('yield:from:value', 'yield from'),
  keywordStatement('break', 'break'),
  keywordStatement('continue', 'continue'),
  keywordStatement('pass', 'pass'),
  conditionalBlock('if:condition:body', 'if'),
  conditionalBlock('elif:condition:body', 'elif'),
  conditionalBlock('while:condition:body', 'while'),
  elseBlock,
  forBlock,
  importStatement('import:module'),
  importStatement('import:module:as:alias'),
  importStatement('from:module:import:subcommand'),
  interpolation,
  argumentInterpolation,
  binary,
  unary,
  value,
  identifier,
  targetIdentifier,
  formatString,
  tuple,
  list,
  dict,
  attribute,
  lookup,
  call,
  assignment
];

/**
 * Compiles script trees into host-language source.
 *
 * The transpiler only holds its rules and options; every compilation gets a
 * fresh {@link Accumulator}, so one instance can be reused. Additional rules
 * registered through `extend` / `addRule` take precedence over built-in rules
 * of equal specificity.
 *
 * @example
 * ```ts
 * const { source, output, refs } = new Transpiler().compile(tree);
 * ```
 */
export class Transpiler extends Visitor<CodegenOutcome, Accumulator> {
  readonly options: ResolvedCodegenOptions;

  constructor(options?: CodegenOptions | null) {
    super(...transpilerRules);
    this.options = normalizeOptions(options);
  }

  /**
   * Compiles `root`.
   *
   * Logic:
   * 1. Dispatch the root with a fresh accumulator.
   * 2. Unchanged: nothing to execute, `source` and `output` are `null`.
   * 3. Otherwise bind the single result fragment to a fresh variable, which
   *    becomes `output`.
   */
  compile(root: RootNode): CodegenResult {
    const acc = new Accumulator(this.options);
    const result = this.invoke(root, acc);

    if (result === undefined) {
      debugLog('codegen', `static tree, ${acc.refs.length} refs`);
      return { source: null, output: null, refs: acc.refs };
    }

    if (result.length !== 1) {
      fail(
        'arity-violation',
        `Expected a single result for ${describeNode(root)}, got ${result.length}.`,
        root
      );
    }

    const output = acc.makeVariable();
    acc.statement(`${output} = ${result[0]}`);

    const source = acc.getSource();

    debugLog(
      'codegen',
      `${acc.refs.length} refs, ${acc.helpers.length} helpers, ${source.split('\n').length} lines`
    );

    return { source, output, refs: acc.refs };
  }
}

/**
 * Compiles `root` with a one-off {@link Transpiler}.
 */
export function compileScript(
  root: RootNode,
  options?: CodegenOptions | null
): CodegenResult {
  return new Transpiler(options).compile(root);
}
