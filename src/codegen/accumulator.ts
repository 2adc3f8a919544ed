import type { SourcePositionTable } from '../architecture';
import type { ResolvedCodegenOptions } from '../options';
import type { Fragment, HelperName, ScriptNode } from '../types';

import { getLineNumber } from '../node-fields';
import { normalizeName, renderString } from './host-literal';

const MARKER_LINE = /^#(\d+)$/;

/**
 * Output buffer of one compilation.
 *
 * Owns everything the generated source shares across rules:
 *
 * - the statement lines and the current indentation,
 * - the reference table (`<prefix>_refs`), append-only,
 * - the header of helper bindings, one local per distinct helper,
 * - the counter behind fresh variable names.
 *
 * Statements are stored with their trailing newline; an expression fragment
 * may embed line markers (see {@link Accumulator.lineno}), so one stored
 * statement can span several physical lines until {@link getSource} strips
 * the markers.
 */
export class Accumulator {
  /** Original nodes the generated source indexes through `<prefix>_refs`. */
  readonly refs: ScriptNode[] = [];

  private readonly lines: string[] = [];
  private readonly header = new Map<string, string>();
  private readonly locals = new Set<string>();
  private indentation = '';
  private counter = 0;

  constructor(readonly options: ResolvedCodegenOptions) {}

  /** Name of the runtime object the generated source runs against. */
  get runtime(): string {
    return `${this.options.prefix}_runtime`;
  }

  /** Name of the reference table. */
  get refsName(): string {
    return `${this.options.prefix}_refs`;
  }

  /** The ambient command buffer of the runtime. */
  get commands(): string {
    return `${this.runtime}.commands`;
  }

  /** Helper locals bound so far, in binding order. */
  get helpers(): string[] {
    return [...this.header.values()];
  }

  /** Index in the buffer where the next statement lands. */
  get position(): number {
    return this.lines.length;
  }

  statement(code: string): void {
    this.lines.push(`${this.indentation}${code}\n`);
  }

  /**
   * Runs `emit` one indentation level deeper.
   *
   * The previous indentation is restored however `emit` exits, so a failure
   * raised inside a nested block leaves the accumulator usable.
   */
  block<T>(emit: () => T): T {
    const previous = this.indentation;
    this.indentation += this.options.indent;

    try {
      return emit();
    } finally {
      this.indentation = previous;
    }
  }

  makeRef(node: ScriptNode): Fragment {
    const index = this.refs.length;
    this.refs.push(node);
    return `${this.refsName}[${index}]`;
  }

  makeRefSlice(nodes: readonly ScriptNode[]): Fragment {
    const start = this.refs.length;
    this.refs.push(...nodes);
    return `${this.refsName}[${start}:${this.refs.length}]`;
  }

  makeVariable(): string {
    return `${this.options.prefix}_var${this.counter++}`;
  }

  /**
   * Call of the runtime helper `name`.
   *
   * The helper is looked up once: the header binds it to a local on first
   * use and every later call goes through that local.
   *
   * Example:
   *   helper('get_attribute', 'x', "'y'")
   *   -> "_script_helper_get_attribute(x, 'y')"
   *   header: "_script_helper_get_attribute = _script_runtime.helpers['get_attribute']"
   */
  helper(name: HelperName, ...args: string[]): Fragment {
    return `${this.bindHelper(name)}(${args.join(', ')})`;
  }

  replace(ref: Fragment, fields: Readonly<Record<string, Fragment>>): Fragment {
    const assignments = Object.entries(fields).map(
      ([field, value]) => `${field}=${value}`
    );
    return this.helper('replace', ref, ...assignments);
  }

  /** The shared "argument not supplied" sentinel. */
  missing(): Fragment {
    return this.bindHelper('missing');
  }

  children(fragments: readonly Fragment[]): Fragment {
    return this.helper('children', `[${fragments.join(', ')}]`);
  }

  /**
   * Inline marker carrying the original line of `node`, or `''` when the
   * line is unknown or source positions are disabled.
   */
  lineno(node?: ScriptNode): string {
    const line = node ? getLineNumber(node) : undefined;

    if (!this.options.sourcePositions || line === undefined) return '';
    return `\n#${line}\n`;
  }

  /**
   * Removes and returns every line from `from` to the end of the buffer.
   */
  take(from: number): string[] {
    return this.lines.splice(from);
  }

  restore(lines: readonly string[]): void {
    this.lines.push(...lines);
  }

  /**
   * Moves the statements emitted since `from` into a runtime scope whose
   * command buffer is bound to `variable`:
   *
   *   with <runtime>.scope() as <variable>:
   *       <statements since from>
   */
  wrapInScope(from: number, variable: string): void {
    const body = this.lines
      .splice(from)
      .map(line => `${this.options.indent}${line}`);

    this.lines.push(
      `${this.indentation}with ${this.runtime}.scope() as ${variable}:\n`,
      ...body
    );
  }

  /**
   * Final source text.
   *
   * Logic:
   * 1. Header bindings first, then statements.
   * 2. Marker lines are removed; blank lines left behind by markers too.
   * 3. Each marker whose line differs from the previous one records
   *    (index of the next output line, original line). Indices count the
   *    position table itself as line 0.
   * 4. The table `<prefix>_lineno = [...], [...]` is prepended whenever a
   *    marker was found, even one that only repeats line 1.
   *
   * See {@link SourcePositionTable}.
   */
  getSource(): string {
    const header = [...this.header].map(
      ([expression, local]) => `${local} = ${expression}\n`
    );

    const output: string[] = [];
    const generated = [1];
    const original = [1];
    let tracked = false;

    for (const line of [...header, ...this.lines].join('').split('\n')) {
      const marker = MARKER_LINE.exec(line);

      if (marker) {
        tracked = true;
        const current = Number(marker[1]);
        if (original[original.length - 1] !== current) {
          generated.push(output.length + 1);
          original.push(current);
        }
        continue;
      }

      if (line.trim() !== '') output.push(line);
    }

    if (tracked) {
      output.unshift(
        `${this.options.prefix}_lineno = [${generated.join(', ')}], [${original.join(', ')}]`
      );
    }

    return output.join('\n');
  }

  private bindHelper(name: HelperName): string {
    const expression = `${this.runtime}.helpers[${renderString(name)}]`;
    const bound = this.header.get(expression);
    if (bound) return bound;

    const base = `${this.options.prefix}_helper_${normalizeName(name)}`;
    let local = base;
    for (let n = 2; this.locals.has(local); n++) local = `${base}_${n}`;

    this.locals.add(local);
    this.header.set(expression, local);
    return local;
  }
}
