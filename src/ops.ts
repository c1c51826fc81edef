import type { MultiGraph } from './GraphValidator';
import { type MonoOp, parseMonoOp } from './MonoOps';
import { type MultiOp, parseMultiOp } from './MultiOps';

/**
 * Terse node notation: an operation name followed by its argument positions.
 * Names are case-insensitive, e.g. `['add', 0, 1]` or `['Sin', 2]`.
 * @public
 */
export type NodeTuple = readonly [op: MultiOp | Lowercase<MultiOp>, ...args: number[]];

/**
 * Builds a chain from operation names.
 *
 * @example
 * ```typescript
 * monoOps('sin', 'sin', 'exp'); // [MonoOp.Sin, MonoOp.Sin, MonoOp.Exp]
 * ```
 */
export function monoOps(...names: (MonoOp | Lowercase<MonoOp>)[]): MonoOp[] {
  return names.map(parseMonoOp);
}

/**
 * Builds a graph from node tuples.
 *
 * @example
 * ```typescript
 * multiOps(['inp', 0], ['inp', 1], ['add', 0, 1], ['sin', 0], ['mul', 2, 3]);
 * ```
 */
export function multiOps(...nodes: NodeTuple[]): MultiGraph {
  return nodes.map(([name, ...args]) => ({ op: parseMultiOp(name), args }));
}
