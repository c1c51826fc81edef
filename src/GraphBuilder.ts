import type { MultiGraph, MultiNode } from './GraphValidator';
import { MultiOp } from './MultiOps';

/**
 * Fluent builder for multi-input graphs that keeps track of tape positions.
 *
 * Usage:
 * ```typescript
 * // f(x, y) = sin(x) * (x + y)
 * const graph = new GraphBuilder(2)
 *   .add(0, 1)   // x + y at position 2
 *   .sin(0)      // sin(x) at position 3
 *   .mul(2, 3)   // product at position 4
 *   .build();
 * ```
 *
 * Arity and index checks are left to the evaluator, so `custom()` can express
 * any node the evaluator would reject.
 */
export class GraphBuilder {
  readonly numInputs: number;
  private nodes: MultiNode[] = [];
  private next: number;

  /**
   * @param numInputs - Inputs occupy positions 0..numInputs-1
   */
  constructor(numInputs: number) {
    if (!Number.isInteger(numInputs) || numInputs < 0) {
      throw new RangeError(`numInputs must be a non-negative integer, got ${numInputs}`);
    }
    this.numInputs = numInputs;
    this.next = numInputs;
  }

  /**
   * Position the next computed node will occupy.
   */
  get nextIndex(): number {
    return this.next;
  }

  get length(): number {
    return this.nodes.length;
  }

  get isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  /**
   * Documents a read of raw input `inputIndex`. Takes no position.
   */
  input(inputIndex: number): this {
    return this.custom(MultiOp.Inp, [inputIndex]);
  }

  add(left: number, right: number): this { return this.custom(MultiOp.Add, [left, right]); }
  sub(left: number, right: number): this { return this.custom(MultiOp.Sub, [left, right]); }
  mul(left: number, right: number): this { return this.custom(MultiOp.Mul, [left, right]); }
  div(numerator: number, denominator: number): this { return this.custom(MultiOp.Div, [numerator, denominator]); }
  pow(base: number, exponent: number): this { return this.custom(MultiOp.Pow, [base, exponent]); }

  sin(arg: number): this { return this.custom(MultiOp.Sin, [arg]); }
  cos(arg: number): this { return this.custom(MultiOp.Cos, [arg]); }
  tan(arg: number): this { return this.custom(MultiOp.Tan, [arg]); }
  exp(arg: number): this { return this.custom(MultiOp.Exp, [arg]); }
  ln(arg: number): this { return this.custom(MultiOp.Ln, [arg]); }
  sqrt(arg: number): this { return this.custom(MultiOp.Sqrt, [arg]); }
  abs(arg: number): this { return this.custom(MultiOp.Abs, [arg]); }

  /**
   * Appends any operation with explicit argument positions.
   */
  custom(op: MultiOp, args: readonly number[]): this {
    this.nodes.push({ op, args: [...args] });
    if (op !== MultiOp.Inp) this.next++;
    return this;
  }

  /**
   * Returns a copy of the graph built so far; the builder stays usable.
   */
  build(): MultiGraph {
    return this.nodes.map(node => ({ op: node.op, args: [...node.args] }));
  }
}
