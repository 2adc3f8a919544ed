import type { Accumulator } from './codegen/accumulator';
import type { visitMultiple, visitSingle } from './codegen/visit';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Compile-Time Trees, Run-Time Values
 *
 * DEFINITION
 * 2. Structural Sharing (Unchanged Subtrees)
 * 3. Fragments and Outcomes
 *
 * POLICY
 * 4. Arity Law
 *
 * STRATEGY
 * 5. Order Preservation (Buffer Splicing)
 *
 * CONCEPT
 * 6. Rule Specificity
 *
 * LIFECYCLE
 * 7. Source Position Table
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> POLICY -> STRATEGY -> CONCEPT -> LIFECYCLE
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - CONCEPT:
 *   Mental model framing the problem space.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Compile-Time Trees, Run-Time Values
 *
 * ---
 *
 * A script tree mixes two kinds of content:
 *
 * - **Static commands**: plain commands whose arguments are fully known when
 *   the script is compiled (`say hello`).
 * - **Dynamic content**: interpolated expressions, control flow and function
 *   definitions, whose effect only exists once the script runs.
 *
 * The code generator does not evaluate anything. It emits host-language
 * source which, executed once against the runtime, produces the final
 * command sequence:
 *
 *   _script_runtime.commands.extend(_script_refs[0:2])
 *   if (x):
 *       _script_runtime.commands.append(_script_refs[2])
 *
 * Static content is never re-encoded as source text; the generated code
 * reaches it through the reference table (see {@link StructuralSharing}).
 */
type CompileTimeBoundary = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Structural Sharing (Unchanged Subtrees)
 *
 * ---
 *
 * A subtree is **unchanged** when compiling it produces no code: its rule
 * returns `undefined`. The caller then reuses the original node through the
 * reference table (`<prefix>_refs[i]`) instead of rebuilding it.
 *
 * Rules
 * -----
 * 1. A node is rebuilt only if at least one field changed. The rebuilt node
 *    is `replace(<ref of original>, field=<new value>, ...)`, listing the
 *    changed fields only.
 *
 * 2. Within a children field, consecutive unchanged children are registered
 *    together. Command sequences register them as one reference slice
 *    (`commands.extend(_script_refs[a:b])`), never one by one.
 *
 * 3. A tree without dynamic content compiles to nothing: the result has no
 *    source and the caller keeps the tree as is.
 *
 * The reference table is append-only for the whole compilation, so every
 * index handed out stays valid.
 */
export type StructuralSharing = never;

/**
 * ARCHITECTURAL DEFINITION (3)
 * Fragments and Outcomes
 *
 * ---
 *
 * Every rule returns a `CodegenOutcome`:
 *
 * - `undefined`: unchanged (see {@link StructuralSharing}).
 * - `[]`: the node was fully handled by emitted statements (control flow,
 *   imports, `pass`). Nothing is left to register.
 * - `[fragment]`: a host-language expression that evaluates to the node's
 *   replacement (expressions, interpolations, rebuilt nodes).
 *
 * Statements go to the {@link Accumulator}; fragments flow back to the
 * parent rule, which embeds them in its own fragment or statement.
 */
export type FragmentOutcome = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Arity Law
 *
 * ---
 *
 * A single-child position (an operand, a condition, an assignment target)
 * must receive exactly one fragment.
 *
 * Enforcement ({@link visitSingle})
 * ---------------------------------
 * - More than one fragment, or none (`[]`), is an `arity-violation`.
 * - Unchanged is resolved by the position's mode:
 *   - `optional`: stays unchanged.
 *   - `reference`: becomes the original node's reference. A required operand
 *     that legitimately never changes still yields a usable expression.
 *   - `required`: is an `arity-violation`. Used where only generated text is
 *     meaningful (assignment and loop targets).
 *
 * Violations are defects of the rule set, not of the script: they abort the
 * compilation and are never retried.
 */
export type ArityLaw = never;

/**
 * ARCHITECTURAL STRATEGY (5)
 * Order Preservation (Buffer Splicing)
 *
 * ---
 *
 * Problem
 * -------
 * Children are compiled in order, but whether a run of unchanged children
 * needs registering is only known once the next child turns out to be
 * dynamic. By then, that child's statements are already in the buffer.
 *
 * Strategy ({@link visitMultiple})
 * --------------------------------
 * For a field `[s0, s1, d2, s3]` where only `d2` changes:
 *
 * 1. `s0`, `s1` compile to nothing.
 * 2. `d2` compiles; its statements land at the end of the buffer.
 * 3. Those statements are taken out, the run `[s0, s1]` is registered
 *    (`commands.extend(_script_refs[0:2])`), and the statements are put back.
 * 4. `d2`'s fragment is registered.
 * 5. The trailing run `[s3]` is registered before the collector flushes.
 *
 * The emitted side effects therefore follow source order:
 *
 *   _script_runtime.commands.extend(_script_refs[0:2])
 *   <statements of d2>
 *   _script_runtime.commands.append(<fragment of d2>)
 *   _script_runtime.commands.append(_script_refs[2])
 *
 * A root that must produce a value moves the statements emitted for its
 * field into a runtime scope (`with _script_runtime.scope() as v:`) and
 * rebuilds itself from the scope's commands.
 */
export type OrderPreservation = never;

/**
 * ARCHITECTURAL CONCEPT (6)
 * Rule Specificity
 *
 * ---
 *
 * A visitor may hold several rules able to handle one node. Exactly one
 * runs, chosen by:
 *
 * 1. Kind-specific rules before wildcard rules.
 * 2. More `field = literal` constraints before fewer
 *    (`command[identifier="if:condition:body"]` before `command`).
 * 3. Most recently registered first.
 *
 * Candidates are sorted when a rule is registered, so dispatch is a scan
 * of one presorted list per kind. Extending a visitor registers the other
 * visitor's rules as the most recent ones, which lets a derived rule set
 * override a built-in rule of equal specificity.
 */
export type RuleSpecificity = never;

/**
 * ARCHITECTURAL LIFECYCLE (7)
 * Source Position Table
 *
 * ---
 *
 * 1. Emission
 *    Fragments and import statements embed a marker line `#<line>` carrying
 *    the original line of their node ({@link Accumulator.lineno}).
 *
 * 2. Stripping
 *    `getSource` removes every marker line and records, whenever the
 *    original line changes, the index of the next generated line.
 *
 * 3. Table
 *    The first generated line binds the two parallel lists:
 *
 *      _script_lineno = [1, 4, 6], [1, 3, 7]
 *
 *    Generated line 4 (counting the table as line 0) onwards comes from
 *    original line 3, line 6 onwards from original line 7.
 *
 * 4. Runtime
 *    A fault at a generated line is mapped back by locating the last entry
 *    at or before it. The table is emitted as soon as one marker is found,
 *    and omitted only when there is none.
 */
export type SourcePositionTable = never;
