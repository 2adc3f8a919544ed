import { VFileMessage } from 'vfile-message';

import type { ScriptNode } from './types';

/**
 * Failure taxonomy
 * ----------------
 * Every failure is a compile-time defect: the compilation is aborted, no
 * partial output is produced and nothing is retried.
 *
 * - `arity-violation`:
 *   A single-child position received zero or several fragments, or a
 *   required position received "unchanged" with nothing to substitute.
 * - `missing-rule`:
 *   No rule of the visitor matches a node (no wildcard fallback registered).
 * - `malformed-import`:
 *   An import command whose module or imported names are missing.
 * - `unknown-argument-type`:
 *   An argument interpolation references a parser without a conversion.
 * - `malformed-command`:
 *   A control-flow command whose arguments do not have the expected kinds.
 * - `invalid-options`:
 *   Codegen options that cannot produce well-formed source.
 */
export type FailureKind =
  | 'arity-violation'
  | 'missing-rule'
  | 'malformed-import'
  | 'unknown-argument-type'
  | 'malformed-command'
  | 'invalid-options';

/**
 * `source` of every message raised by this package, so callers handling
 * messages from several unified plugins can tell them apart.
 */
export const FAILURE_SOURCE = 'script-codegen';

/**
 * Short human-readable label for a node, used in failure messages.
 *
 * Commands are labelled with their identifier since the kind alone does not
 * say which construct failed (e.g. `command "for:target:in:iterable:body"`).
 */
export function describeNode(node: ScriptNode): string {
  return node.type === 'command'
    ? `command "${node.identifier}"`
    : `${node.type} node`;
}

/**
 * Report (and throw) a fatal codegen failure.
 *
 * The failure is a `VFileMessage`, the message type of the unified
 * ecosystem, so a processor surfaces it with the offending node's position
 * like any other fatal plugin message:
 *
 * - `ruleId` is the {@link FailureKind}.
 * - `source` is {@link FAILURE_SOURCE}.
 * - `place` is the node's position when it is known.
 *
 * @throws Always throws the constructed message.
 */
export function fail(
  kind: FailureKind,
  reason: string,
  node?: ScriptNode
): never {
  const message = new VFileMessage(`[codegen] ${reason}`, {
    place: node?.position,
    ruleId: kind,
    source: FAILURE_SOURCE
  });

  message.fatal = true;
  throw message;
}

/**
 * Type guard for failures raised through {@link fail}.
 */
export function isCodegenFailure(error: unknown): error is VFileMessage {
  return error instanceof VFileMessage && error.source === FAILURE_SOURCE;
}
