import { GradientReleasedError } from './AutodiffError';
import type { GradientProgram } from './GradientTape';

/**
 * A gradient program that can also describe itself as plain data.
 * @public
 */
export interface SnapshotProgram<R, S> extends GradientProgram<R> {
  toJSON(): S;
}

/**
 * Sole-owner handle to a gradient program.
 *
 * There is no clone: ownership can only move, via transfer() or share(), and
 * the handle it moves out of is released.
 *
 * @example
 * ```typescript
 * const { value, gradient } = MultiAD.evaluateWithGradient(graph, [0.6, 1.4]);
 * const [dx, dy] = gradient.call(1.0);
 * ```
 * @public
 */
export class OwnedGradient<R, S = unknown> {
  private program: SnapshotProgram<R, S> | undefined;

  constructor(program: SnapshotProgram<R, S>) {
    this.program = program;
  }

  get released(): boolean {
    return this.program === undefined;
  }

  /**
   * Runs the backward sweep for one seed cotangent (1.0 gives the plain derivative).
   */
  call(seed = 1): R {
    return this.require().backward(seed);
  }

  /**
   * Moves ownership to a new handle. This handle is released.
   */
  transfer(): OwnedGradient<R, S> {
    return new OwnedGradient(this.take());
  }

  /**
   * Moves ownership into a reference-counted handle. This handle is released.
   */
  share(): SharedGradient<R, S> {
    return SharedGradient.create(this.take());
  }

  dispose(): void {
    this.program = undefined;
  }

  /**
   * Plain function bound to this handle; it fails once the handle is released.
   */
  asFunction(): (seed?: number) => R {
    return (seed = 1) => this.call(seed);
  }

  private take(): SnapshotProgram<R, S> {
    const program = this.require();
    this.program = undefined;
    return program;
  }

  private require(): SnapshotProgram<R, S> {
    if (this.program === undefined) {
      throw new GradientReleasedError('OwnedGradient');
    }
    return this.program;
  }
}

interface SharedCell<R, S> {
  program: SnapshotProgram<R, S> | undefined;
  refs: number;
}

/**
 * Reference-counted handle to a gradient program.
 *
 * Clones share one immutable program; the program is dropped when the last
 * clone is disposed. Invocations never touch shared mutable state, so clones
 * may be called in any interleaving.
 * @public
 */
export class SharedGradient<R, S = unknown> {
  private cell: SharedCell<R, S> | undefined;

  private constructor(cell: SharedCell<R, S>) {
    this.cell = cell;
  }

  static create<R, S>(program: SnapshotProgram<R, S>): SharedGradient<R, S> {
    return new SharedGradient({ program, refs: 1 });
  }

  get released(): boolean {
    return this.cell === undefined;
  }

  /** Live handles sharing this program; 0 once this handle is released. */
  get refCount(): number {
    return this.cell?.refs ?? 0;
  }

  call(seed = 1): R {
    return this.require().backward(seed);
  }

  clone(): SharedGradient<R, S> {
    const cell = this.requireCell();
    cell.refs++;
    return new SharedGradient(cell);
  }

  /**
   * Plain-data copy of the program, for rebuilding it in another worker.
   */
  snapshot(): S {
    return this.require().toJSON();
  }

  dispose(): void {
    const cell = this.cell;
    if (cell === undefined) return;
    this.cell = undefined;
    cell.refs--;
    if (cell.refs === 0) {
      cell.program = undefined;
    }
  }

  asFunction(): (seed?: number) => R {
    return (seed = 1) => this.call(seed);
  }

  private requireCell(): SharedCell<R, S> {
    if (this.cell === undefined) {
      throw new GradientReleasedError('SharedGradient');
    }
    return this.cell;
  }

  private require(): SnapshotProgram<R, S> {
    const program = this.requireCell().program;
    if (program === undefined) {
      throw new GradientReleasedError('SharedGradient');
    }
    return program;
  }
}
