import type { Fragment, ScriptNode } from '../types';
import type { Accumulator } from './accumulator';

/**
 * Constructor of a collector, passed to the rewrite algorithms to choose how
 * a changed children field is rebuilt.
 */
export type CollectorClass = new (
  acc: Accumulator,
  anchor: number
) => ChildrenCollector;

/**
 * Rebuilds a children field as a sequence literal.
 *
 * Static (unchanged) children are listed by reference, dynamic children by
 * their compiled fragment, in their original order:
 *
 *   children([<refs>[0], <fragment>, <refs>[1]])
 *
 * A collector is created lazily, on the first changed child of a field.
 * `anchor` is the buffer position where the code of the field begins.
 */
export class ChildrenCollector {
  protected readonly items: Fragment[] = [];

  constructor(
    protected readonly acc: Accumulator,
    protected readonly anchor: number
  ) {}

  addStatic(...nodes: readonly ScriptNode[]): void {
    for (const node of nodes) this.items.push(this.acc.makeRef(node));
  }

  addDynamic(...fragments: readonly Fragment[]): void {
    this.items.push(...fragments);
  }

  flush(): Fragment {
    return this.acc.children(this.items);
  }
}

/**
 * Rebuilds a command sequence by side effects on the runtime command buffer.
 *
 * Runs of static commands are registered in bulk through one reference
 * slice; each dynamic command is appended once its statements have run.
 */
export class CommandCollector extends ChildrenCollector {
  override addStatic(...nodes: readonly ScriptNode[]): void {
    const [first] = nodes;

    if (nodes.length > 1) {
      this.acc.statement(
        `${this.acc.commands}.extend(${this.acc.makeRefSlice(nodes)})`
      );
    } else if (first) {
      this.acc.statement(`${this.acc.commands}.append(${this.acc.makeRef(first)})`);
    }
  }

  override addDynamic(...fragments: readonly Fragment[]): void {
    for (const fragment of fragments) {
      this.acc.statement(`${this.acc.commands}.append(${fragment})`);
    }
  }

  override flush(): Fragment {
    return this.acc.commands;
  }
}

/**
 * Command collector of a standalone root, which has to produce a value.
 *
 * On flush the statements emitted since the anchor are moved into a fresh
 * runtime scope, and the collected commands of that scope become the new
 * children of the root.
 */
export class RootCommandCollector extends CommandCollector {
  override flush(): Fragment {
    const variable = this.acc.makeVariable();
    this.acc.wrapInScope(this.anchor, variable);
    return this.acc.helper('children', variable);
  }
}
