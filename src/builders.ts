import type { Position } from 'unist';
import type {
  ArgumentInterpolationNode,
  AssignmentNode,
  AttributeNode,
  BinaryNode,
  CallNode,
  CommandNode,
  DictItemNode,
  DictNode,
  FormatStringNode,
  FunctionArgumentNode,
  FunctionSignatureNode,
  IdentifierNode,
  ImportedIdentifierNode,
  InterpolationNode,
  LeafValue,
  ListNode,
  LookupNode,
  MessageNode,
  NumberNode,
  ResourceLocationNode,
  RootNode,
  ScriptNode,
  TargetIdentifierNode,
  TextNode,
  TupleNode,
  UnaryNode,
  ValueNode,
  VectorNode
} from './types';

/**
 * Position covering the start of `line`, or nothing when the line is unknown.
 */
function at(line: number | undefined): { position?: Position } {
  if (line === undefined) return {};
  return {
    position: { start: { line, column: 1 }, end: { line, column: 1 } }
  };
}

/**
 * Node builders for upstream producers and tests.
 *
 * Every builder takes the original source line as its optional last
 * argument.
 *
 * @example
 * ```ts
 * b.root([
 *   b.command('say:message', [b.message([b.text('hi')])], 1)
 * ]);
 * ```
 */
export const b = {
  root: (commands: readonly ScriptNode[], line?: number): RootNode => ({
    type: 'root',
    commands,
    ...at(line)
  }),

  command: (
    identifier: string,
    args: readonly ScriptNode[] = [],
    line?: number
  ): CommandNode => ({
    type: 'command',
    identifier,
    arguments: args,
    ...at(line)
  }),

  number: (value: number, line?: number): NumberNode => ({
    type: 'number',
    value,
    ...at(line)
  }),

  text: (value: string, line?: number): TextNode => ({
    type: 'text',
    value,
    ...at(line)
  }),

  message: (fragments: readonly ScriptNode[], line?: number): MessageNode => ({
    type: 'message',
    fragments,
    ...at(line)
  }),

  vector: (components: readonly ScriptNode[], line?: number): VectorNode => ({
    type: 'vector',
    components,
    ...at(line)
  }),

  /** `'ns:a/b'` or `'a.b'`; the part before the first colon is the namespace. */
  resourceLocation: (location: string, line?: number): ResourceLocationNode => {
    const separator = location.indexOf(':');

    return separator === -1
      ? { type: 'resourceLocation', path: location, ...at(line) }
      : {
          type: 'resourceLocation',
          namespace: location.slice(0, separator),
          path: location.slice(separator + 1),
          ...at(line)
        };
  },

  interpolation: (
    converter: string,
    value: ScriptNode,
    line?: number
  ): InterpolationNode => ({
    type: 'interpolation',
    converter,
    value,
    ...at(line)
  }),

  argumentInterpolation: (
    parser: string,
    value: ScriptNode,
    line?: number
  ): ArgumentInterpolationNode => ({
    type: 'argumentInterpolation',
    parser,
    value,
    ...at(line)
  }),

  value: (value: LeafValue, line?: number): ValueNode => ({
    type: 'value',
    value,
    ...at(line)
  }),

  identifier: (value: string, line?: number): IdentifierNode => ({
    type: 'identifier',
    value,
    ...at(line)
  }),

  targetIdentifier: (value: string, line?: number): TargetIdentifierNode => ({
    type: 'targetIdentifier',
    value,
    ...at(line)
  }),

  importedIdentifier: (
    value: string,
    line?: number
  ): ImportedIdentifierNode => ({
    type: 'importedIdentifier',
    value,
    ...at(line)
  }),

  binary: (
    operator: string,
    left: ScriptNode,
    right: ScriptNode,
    line?: number
  ): BinaryNode => ({
    type: 'binary',
    operator,
    left,
    right,
    ...at(line)
  }),

  unary: (operator: string, value: ScriptNode, line?: number): UnaryNode => ({
    type: 'unary',
    operator,
    value,
    ...at(line)
  }),

  formatString: (
    fmt: string,
    values: readonly ScriptNode[],
    line?: number
  ): FormatStringNode => ({
    type: 'formatString',
    fmt,
    values,
    ...at(line)
  }),

  tuple: (items: readonly ScriptNode[], line?: number): TupleNode => ({
    type: 'tuple',
    items,
    ...at(line)
  }),

  list: (items: readonly ScriptNode[], line?: number): ListNode => ({
    type: 'list',
    items,
    ...at(line)
  }),

  dict: (items: readonly DictItemNode[], line?: number): DictNode => ({
    type: 'dict',
    items,
    ...at(line)
  }),

  dictItem: (
    key: ScriptNode,
    value: ScriptNode,
    line?: number
  ): DictItemNode => ({
    type: 'dictItem',
    key,
    value,
    ...at(line)
  }),

  attribute: (value: ScriptNode, name: string, line?: number): AttributeNode => ({
    type: 'attribute',
    value,
    name,
    ...at(line)
  }),

  lookup: (
    value: ScriptNode,
    args: readonly ScriptNode[],
    line?: number
  ): LookupNode => ({
    type: 'lookup',
    value,
    arguments: args,
    ...at(line)
  }),

  call: (
    value: ScriptNode,
    args: readonly ScriptNode[],
    line?: number
  ): CallNode => ({
    type: 'call',
    value,
    arguments: args,
    ...at(line)
  }),

  assignment: (
    operator: string,
    target: ScriptNode,
    value: ScriptNode,
    line?: number
  ): AssignmentNode => ({
    type: 'assignment',
    operator,
    target,
    value,
    ...at(line)
  }),

  functionSignature: (
    name: string,
    args: readonly FunctionArgumentNode[],
    line?: number
  ): FunctionSignatureNode => ({
    type: 'functionSignature',
    name,
    arguments: args,
    ...at(line)
  }),

  functionArgument: (
    name: string,
    defaultValue?: ScriptNode,
    line?: number
  ): FunctionArgumentNode =>
    defaultValue
      ? { type: 'functionArgument', name, default: defaultValue, ...at(line) }
      : { type: 'functionArgument', name, ...at(line) }
};
