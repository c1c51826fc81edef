import { OwnedGradient, SharedGradient } from './GradientHandle';
import { GradientTape, type GradientTapeSnapshot, type TapeRecord } from './GradientTape';
import { type MultiGraph, validateGraph } from './GraphValidator';
import { MultiOp, MultiOps } from './MultiOps';

/** @public */
export type MultiGradient = OwnedGradient<number[], GradientTapeSnapshot>;

/** @public */
export type SharedMultiGradient = SharedGradient<number[], GradientTapeSnapshot>;

/**
 * Value of a graph plus a handle producing its gradient w.r.t. every input.
 * @public
 */
export interface MultiResult<G> {
  value: number;
  gradient: G;
}

/**
 * Reverse-mode differentiation of multi-input scalar graphs.
 *
 * Positions `0..inputs.length-1` address the raw inputs; each computed node
 * appends one position in evaluation order. `Inp` nodes append nothing.
 *
 * @example
 * ```typescript
 * // f(x, y) = sin(x) * (x + y)
 * const graph = multiOps(['inp', 0], ['inp', 1], ['add', 0, 1], ['sin', 0], ['mul', 2, 3]);
 * const { value, gradient } = MultiAD.evaluateWithGradient(graph, [0.6, 1.4]);
 * gradient.call(1.0); // [cos(0.6) * 2 + sin(0.6), sin(0.6)]
 * ```
 * @public
 */
export class MultiAD {
  /**
   * Forward pass only.
   * @throws ArityError, IndexOutOfBoundsError or EmptyGraphError
   */
  static evaluate(graph: MultiGraph, inputs: readonly number[]): number {
    validateGraph(graph, inputs.length);
    const values = [...inputs];
    for (const node of graph) {
      if (node.op === MultiOp.Inp) continue;
      values.push(MultiOps.forward(node.op, node.args.map(i => values[i])));
    }
    return values[values.length - 1];
  }

  /**
   * Forward pass that records every computed node for the backward sweep.
   */
  static record(graph: MultiGraph, inputs: readonly number[]): GradientTape {
    validateGraph(graph, inputs.length);
    const values = [...inputs];
    const records: TapeRecord[] = [];
    for (const node of graph) {
      if (node.op === MultiOp.Inp) continue;
      const argValues = node.args.map(i => values[i]);
      values.push(MultiOps.forward(node.op, argValues));
      records.push({ op: node.op, args: node.args, argValues });
    }
    return new GradientTape(inputs.length, values, records);
  }

  static evaluateWithGradient(graph: MultiGraph, inputs: readonly number[]): MultiResult<MultiGradient> {
    const tape = MultiAD.record(graph, inputs);
    return { value: tape.output, gradient: new OwnedGradient(tape) };
  }

  static evaluateWithSharedGradient(graph: MultiGraph, inputs: readonly number[]): MultiResult<SharedMultiGradient> {
    const tape = MultiAD.record(graph, inputs);
    return { value: tape.output, gradient: SharedGradient.create(tape) };
  }
}
