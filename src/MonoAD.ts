import { OwnedGradient, SharedGradient } from './GradientHandle';
import { MonoTape, type MonoTapeSnapshot } from './GradientTape';
import type { MultiResult } from './MultiAD';
import { type MonoOp, MonoOps, checkChain } from './MonoOps';

/** @public */
export type MonoGradient = OwnedGradient<number, MonoTapeSnapshot>;

/** @public */
export type SharedMonoGradient = SharedGradient<number, MonoTapeSnapshot>;

/** @public */
export type MonoResult<G> = MultiResult<G>;

/**
 * Reverse-mode differentiation of a chain of unary ops applied to one scalar.
 * An empty chain is the identity.
 *
 * @example
 * ```typescript
 * const { value, gradient } = MonoAD.evaluateWithGradient(monoOps('sin', 'sin', 'exp'), 2.0);
 * gradient.call(); // exp(sin(sin(2))) * cos(sin(2)) * cos(2)
 * ```
 * @public
 */
export class MonoAD {
  static evaluate(ops: readonly MonoOp[], x: number): number {
    checkChain(ops);
    let value = x;
    for (const op of ops) {
      value = MonoOps.forward(op, value);
    }
    return value;
  }

  static record(ops: readonly MonoOp[], x: number): { value: number; tape: MonoTape } {
    checkChain(ops);
    let value = x;
    const inputs: number[] = [];
    for (const op of ops) {
      inputs.push(value);
      value = MonoOps.forward(op, value);
    }
    return { value, tape: new MonoTape(ops, inputs) };
  }

  static evaluateWithGradient(ops: readonly MonoOp[], x: number): MonoResult<MonoGradient> {
    const { value, tape } = MonoAD.record(ops, x);
    return { value, gradient: new OwnedGradient(tape) };
  }

  static evaluateWithSharedGradient(ops: readonly MonoOp[], x: number): MonoResult<SharedMonoGradient> {
    const { value, tape } = MonoAD.record(ops, x);
    return { value, gradient: SharedGradient.create(tape) };
  }
}
