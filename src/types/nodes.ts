import type { Data, Position } from 'unist';

/**
 * Value stored in a leaf field of a node.
 *
 * Leaf fields are never traversed: they are compared by value (rule
 * constraints) or rendered verbatim (literals, identifiers, operators).
 */
export type LeafValue = string | number | boolean | null;

/**
 * Fields shared by every node.
 *
 * Nodes are unist-compatible so the tree can flow through a unified
 * processor. `position.start.line` is the original source line; a node
 * without `position` has an unknown location.
 */
type NodeBase<K extends string> = {
  readonly type: K;
  readonly position?: Position;
  readonly data?: Data;
};

/* -------------------------------------------------------------------------- */
/* Commands                                                                    */
/* -------------------------------------------------------------------------- */

export type RootNode = NodeBase<'root'> & {
  readonly commands: readonly ScriptNode[];
};

/**
 * A command invocation.
 *
 * `identifier` is the colon-joined path through the command grammar
 * (e.g. `"if:condition:body"`), which is what transpiler rules match on.
 */
export type CommandNode = NodeBase<'command'> & {
  readonly identifier: string;
  readonly arguments: readonly ScriptNode[];
};

/* -------------------------------------------------------------------------- */
/* Static command arguments                                                    */
/* -------------------------------------------------------------------------- */

export type NumberNode = NodeBase<'number'> & {
  readonly value: number;
};

export type TextNode = NodeBase<'text'> & {
  readonly value: string;
};

export type MessageNode = NodeBase<'message'> & {
  readonly fragments: readonly ScriptNode[];
};

export type VectorNode = NodeBase<'vector'> & {
  readonly components: readonly ScriptNode[];
};

/**
 * Module or resource reference. A `namespace` marks a virtual module that
 * only exists inside the runtime.
 */
export type ResourceLocationNode = NodeBase<'resourceLocation'> & {
  readonly namespace?: string;
  readonly path: string;
};

/* -------------------------------------------------------------------------- */
/* Interpolations                                                              */
/* -------------------------------------------------------------------------- */

/**
 * An expression spliced into a command argument.
 * `converter` names the runtime coercion (`interpolate_<converter>`).
 */
export type InterpolationNode = NodeBase<'interpolation'> & {
  readonly converter: string;
  readonly value: ScriptNode;
};

/**
 * An expression spliced into a typed command argument.
 * `parser` names the argument type the runtime converts to
 * (`convert:<parser>`).
 */
export type ArgumentInterpolationNode = NodeBase<'argumentInterpolation'> & {
  readonly parser: string;
  readonly value: ScriptNode;
};

/* -------------------------------------------------------------------------- */
/* Expressions                                                                 */
/* -------------------------------------------------------------------------- */

export type ValueNode = NodeBase<'value'> & {
  readonly value: LeafValue;
};

export type IdentifierNode = NodeBase<'identifier'> & {
  readonly value: string;
};

export type TargetIdentifierNode = NodeBase<'targetIdentifier'> & {
  readonly value: string;
};

export type ImportedIdentifierNode = NodeBase<'importedIdentifier'> & {
  readonly value: string;
};

export type BinaryNode = NodeBase<'binary'> & {
  readonly operator: string;
  readonly left: ScriptNode;
  readonly right: ScriptNode;
};

export type UnaryNode = NodeBase<'unary'> & {
  readonly operator: string;
  readonly value: ScriptNode;
};

export type FormatStringNode = NodeBase<'formatString'> & {
  readonly fmt: string;
  readonly values: readonly ScriptNode[];
};

export type TupleNode = NodeBase<'tuple'> & {
  readonly items: readonly ScriptNode[];
};

export type ListNode = NodeBase<'list'> & {
  readonly items: readonly ScriptNode[];
};

export type DictNode = NodeBase<'dict'> & {
  readonly items: readonly DictItemNode[];
};

export type DictItemNode = NodeBase<'dictItem'> & {
  readonly key: ScriptNode;
  readonly value: ScriptNode;
};

export type AttributeNode = NodeBase<'attribute'> & {
  readonly value: ScriptNode;
  readonly name: string;
};

export type LookupNode = NodeBase<'lookup'> & {
  readonly value: ScriptNode;
  readonly arguments: readonly ScriptNode[];
};

export type CallNode = NodeBase<'call'> & {
  readonly value: ScriptNode;
  readonly arguments: readonly ScriptNode[];
};

/**
 * Assignment expression. `operator` is kept verbatim (`=`, `+=`, ...).
 */
export type AssignmentNode = NodeBase<'assignment'> & {
  readonly operator: string;
  readonly target: ScriptNode;
  readonly value: ScriptNode;
};

export type FunctionSignatureNode = NodeBase<'functionSignature'> & {
  readonly name: string;
  readonly arguments: readonly FunctionArgumentNode[];
};

export type FunctionArgumentNode = NodeBase<'functionArgument'> & {
  readonly name: string;
  readonly default?: ScriptNode;
};

/**
 * Closed union of every node kind the code generator understands.
 */
export type ScriptNode =
  | RootNode
  | CommandNode
  | NumberNode
  | TextNode
  | MessageNode
  | VectorNode
  | ResourceLocationNode
  | InterpolationNode
  | ArgumentInterpolationNode
  | ValueNode
  | IdentifierNode
  | TargetIdentifierNode
  | ImportedIdentifierNode
  | BinaryNode
  | UnaryNode
  | FormatStringNode
  | TupleNode
  | ListNode
  | DictNode
  | DictItemNode
  | AttributeNode
  | LookupNode
  | CallNode
  | AssignmentNode
  | FunctionSignatureNode
  | FunctionArgumentNode;

/** Discriminant of {@link ScriptNode}. */
export type NodeKind = ScriptNode['type'];

/** The node type registered under kind `K`. */
export type NodeOfKind<K extends NodeKind> = Extract<ScriptNode, { type: K }>;
