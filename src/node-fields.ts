import type {
  LeafValue,
  NodeKind,
  NodeOfKind,
  ScriptNode
} from './types';

import { isArray, isLeafValue, isRecord } from './guards';

/**
 * Storage shape of a node field.
 *
 * - `leaf`:     a {@link LeafValue}; never traversed.
 * - `node`:     exactly one child node (may be absent when optional).
 * - `children`: an ordered sequence of child nodes.
 */
export type FieldShape = 'leaf' | 'node' | 'children';

type NodeFieldName<N> = Exclude<keyof N, 'type' | 'position' | 'data'> &
  string;

export type FieldSpec<N> = {
  readonly name: NodeFieldName<N>;
  readonly shape: FieldShape;
};

/**
 * Per-kind field metadata, in declaration order.
 *
 * The table is exhaustive over {@link NodeKind}: adding a node kind without
 * describing its fields is a type error.
 */
export type NodeFieldTable = {
  readonly [K in NodeKind]: readonly FieldSpec<NodeOfKind<K>>[];
};

export const NODE_FIELDS: NodeFieldTable = {
  root: [{ name: 'commands', shape: 'children' }],
  command: [
    { name: 'identifier', shape: 'leaf' },
    { name: 'arguments', shape: 'children' }
  ],
  number: [{ name: 'value', shape: 'leaf' }],
  text: [{ name: 'value', shape: 'leaf' }],
  message: [{ name: 'fragments', shape: 'children' }],
  vector: [{ name: 'components', shape: 'children' }],
  resourceLocation: [
    { name: 'namespace', shape: 'leaf' },
    { name: 'path', shape: 'leaf' }
  ],
  interpolation: [
    { name: 'converter', shape: 'leaf' },
    { name: 'value', shape: 'node' }
  ],
  argumentInterpolation: [
    { name: 'parser', shape: 'leaf' },
    { name: 'value', shape: 'node' }
  ],
  value: [{ name: 'value', shape: 'leaf' }],
  identifier: [{ name: 'value', shape: 'leaf' }],
  targetIdentifier: [{ name: 'value', shape: 'leaf' }],
  importedIdentifier: [{ name: 'value', shape: 'leaf' }],
  binary: [
    { name: 'operator', shape: 'leaf' },
    { name: 'left', shape: 'node' },
    { name: 'right', shape: 'node' }
  ],
  unary: [
    { name: 'operator', shape: 'leaf' },
    { name: 'value', shape: 'node' }
  ],
  formatString: [
    { name: 'fmt', shape: 'leaf' },
    { name: 'values', shape: 'children' }
  ],
  tuple: [{ name: 'items', shape: 'children' }],
  list: [{ name: 'items', shape: 'children' }],
  dict: [{ name: 'items', shape: 'children' }],
  dictItem: [
    { name: 'key', shape: 'node' },
    { name: 'value', shape: 'node' }
  ],
  attribute: [
    { name: 'value', shape: 'node' },
    { name: 'name', shape: 'leaf' }
  ],
  lookup: [
    { name: 'value', shape: 'node' },
    { name: 'arguments', shape: 'children' }
  ],
  call: [
    { name: 'value', shape: 'node' },
    { name: 'arguments', shape: 'children' }
  ],
  assignment: [
    { name: 'operator', shape: 'leaf' },
    { name: 'target', shape: 'node' },
    { name: 'value', shape: 'node' }
  ],
  functionSignature: [
    { name: 'name', shape: 'leaf' },
    { name: 'arguments', shape: 'children' }
  ],
  functionArgument: [
    { name: 'name', shape: 'leaf' },
    { name: 'default', shape: 'node' }
  ]
};

/**
 * Type guard for {@link ScriptNode}.
 *
 * Shallow check: the value is a record whose `type` names a kind of the
 * field table. Field contents are validated lazily by {@link fieldEntries}.
 */
export function isScriptNode(value: unknown): value is ScriptNode {
  if (!isRecord(value)) return false;

  const kind = value.type;
  return typeof kind === 'string' && Object.hasOwn(NODE_FIELDS, kind);
}

/**
 * Narrows `node` to the node type registered under `kind`.
 */
export function isNodeOfKind<K extends NodeKind>(
  node: ScriptNode,
  kind: K
): node is NodeOfKind<K> {
  return node.type === kind;
}

/**
 * A field read from a node, tagged with its declared shape.
 */
export type FieldEntry =
  | { name: string; shape: 'leaf'; value: LeafValue | undefined }
  | { name: string; shape: 'node'; value: ScriptNode | undefined }
  | { name: string; shape: 'children'; value: readonly ScriptNode[] };

/**
 * Reads a field by name without knowing the node's kind.
 */
export function readField(node: ScriptNode, name: string): unknown {
  return Reflect.get(node, name);
}

/**
 * Reads every declared field of `node`, in declaration order.
 *
 * Values are checked against the declared shape. A mismatch means the
 * upstream producer handed over a tree that does not follow the node model,
 * which is reported as a `TypeError`.
 */
export function fieldEntries(node: ScriptNode): FieldEntry[] {
  const specs: readonly { name: string; shape: FieldShape }[] =
    NODE_FIELDS[node.type];

  return specs.map(({ name, shape }): FieldEntry => {
    const value = readField(node, name);

    switch (shape) {
      case 'leaf':
        if (value === undefined || isLeafValue(value)) {
          return { name, shape, value };
        }
        break;

      case 'node':
        if (value === undefined || isScriptNode(value)) {
          return { name, shape, value };
        }
        break;

      case 'children':
        if (isArray(value) && value.every(isScriptNode)) {
          return { name, shape, value };
        }
        break;
    }

    throw new TypeError(
      `Field "${name}" of ${node.type} node does not hold a ${shape} value.`
    );
  });
}

/**
 * Every direct child of `node`, flattened in field order.
 */
export function childNodes(node: ScriptNode): ScriptNode[] {
  const result: ScriptNode[] = [];

  for (const entry of fieldEntries(node)) {
    if (entry.shape === 'node' && entry.value) result.push(entry.value);
    if (entry.shape === 'children') result.push(...entry.value);
  }

  return result;
}

/**
 * Original source line of `node`, or `undefined` when the location is unknown.
 */
export function getLineNumber(node: ScriptNode): number | undefined {
  return node.position?.start.line;
}
