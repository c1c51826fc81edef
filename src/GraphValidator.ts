import { AutodiffError, EmptyGraphError, IndexOutOfBoundsError } from './AutodiffError';
import { MULTI_OP_ARITY, MultiOp, isMultiOp } from './MultiOps';

/**
 * One node of a multi-input graph: an operation and its predecessor positions.
 * @public
 */
export interface MultiNode {
  readonly op: MultiOp;
  readonly args: readonly number[];
}

/** @public */
export type MultiGraph = readonly MultiNode[];

/**
 * Checks a graph against an input count before anything is evaluated.
 *
 * Computed nodes may only read positions strictly below their own; `Inp`
 * placeholders may only read the input range. Fails if there would be nothing
 * to return (no inputs and no computed nodes).
 *
 * @returns Number of tape positions the forward pass will produce
 */
export function validateGraph(graph: MultiGraph, numInputs: number): number {
  let position = numInputs;

  for (const node of graph) {
    if (!isMultiOp(node.op)) {
      throw new TypeError(`Unknown graph operation: ${String(node.op)}`);
    }
    AutodiffError.checkArity(node.op, MULTI_OP_ARITY[node.op], node.args.length);

    const limit = node.op === MultiOp.Inp ? numInputs : position;
    for (const index of node.args) {
      if (!Number.isInteger(index) || index < 0 || index >= limit) {
        throw new IndexOutOfBoundsError(index, limit - 1);
      }
    }

    if (node.op !== MultiOp.Inp) position++;
  }

  if (position === 0) {
    throw new EmptyGraphError();
  }
  return position;
}
