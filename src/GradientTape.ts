import { AutodiffError, IndexOutOfBoundsError } from './AutodiffError';
import { MonoOp, MonoOps, checkChain } from './MonoOps';
import { MULTI_OP_ARITY, MultiOp, MultiOps, isMultiOp } from './MultiOps';

/**
 * Pure backward evaluation shared by every gradient handle.
 * @public
 */
export interface GradientProgram<R> {
  /**
   * Propagates `seed` (the cotangent of the final output) back to the inputs.
   */
  backward(seed: number): R;
}

/**
 * One computed node as recorded during the forward pass.
 * @public
 */
export interface TapeRecord {
  readonly op: MultiOp;
  /** Predecessor tape positions */
  readonly args: readonly number[];
  /** Predecessor values captured at evaluation time */
  readonly argValues: readonly number[];
}

/**
 * Plain-data form of a GradientTape, safe to structured-clone into a worker.
 * @public
 */
export interface GradientTapeSnapshot {
  numInputs: number;
  values: number[];
  records: { op: MultiOp; args: number[]; argValues: number[] }[];
}

/**
 * A record rebuilt from plain data may only read positions below its own.
 */
function checkRecord(record: TapeRecord, position: number): void {
  if (!isMultiOp(record.op) || record.op === MultiOp.Inp) {
    throw new TypeError(`Unknown tape operation: ${String(record.op)}`);
  }
  AutodiffError.checkArity(record.op, MULTI_OP_ARITY[record.op], record.args.length);
  AutodiffError.checkArity(record.op, record.args.length, record.argValues.length);
  for (const index of record.args) {
    if (!Number.isInteger(index) || index < 0 || index >= position) {
      throw new IndexOutOfBoundsError(index, position - 1);
    }
  }
}

/**
 * Recorded forward pass of a multi-input graph.
 *
 * Immutable after construction. Each backward() call allocates its own
 * cotangent buffer, so one tape can serve any number of callers.
 * @public
 */
export class GradientTape implements GradientProgram<number[]> {
  readonly numInputs: number;
  private readonly values: readonly number[];
  private readonly records: readonly TapeRecord[];

  constructor(numInputs: number, values: readonly number[], records: readonly TapeRecord[]) {
    if (numInputs + records.length !== values.length) {
      throw new RangeError(
        `Tape holds ${values.length} values but ${numInputs} inputs and ${records.length} records were given`
      );
    }
    records.forEach((record, i) => checkRecord(record, numInputs + i));
    this.numInputs = numInputs;
    this.values = Object.freeze([...values]);
    this.records = Object.freeze(records.map(r => Object.freeze({
      op: r.op,
      args: Object.freeze([...r.args]),
      argValues: Object.freeze([...r.argValues]),
    })));
  }

  static fromSnapshot(snapshot: GradientTapeSnapshot): GradientTape {
    return new GradientTape(snapshot.numInputs, snapshot.values, snapshot.records);
  }

  /** Number of tape positions (inputs plus computed nodes). */
  get length(): number {
    return this.values.length;
  }

  /** Final output of the forward pass. */
  get output(): number {
    return this.values[this.values.length - 1];
  }

  backward(seed: number): number[] {
    const len = this.values.length;
    const cotangents = new Float64Array(len);
    cotangents[len - 1] = seed;

    const count = this.records.length;
    for (let i = 0; i < count; i++) {
      const record = this.records[count - 1 - i];
      const position = len - 1 - i;
      const argCotangents = MultiOps.backward(record.op, record.argValues, cotangents[position]);
      // Accumulate: a position feeding several consumers sums every contribution
      for (let k = 0; k < record.args.length; k++) {
        cotangents[record.args[k]] += argCotangents[k];
      }
    }

    return Array.from(cotangents.subarray(0, this.numInputs));
  }

  toJSON(): GradientTapeSnapshot {
    return {
      numInputs: this.numInputs,
      values: [...this.values],
      records: this.records.map(r => ({ op: r.op, args: [...r.args], argValues: [...r.argValues] })),
    };
  }
}

/**
 * Plain-data form of a MonoTape.
 * @public
 */
export interface MonoTapeSnapshot {
  ops: MonoOp[];
  /** Argument each op saw, in chain order */
  inputs: number[];
}

/**
 * Recorded forward pass of a single-input chain. Every op reads the previous
 * value, so the backward sweep is a reverse fold.
 * @public
 */
export class MonoTape implements GradientProgram<number> {
  private readonly ops: readonly MonoOp[];
  private readonly inputs: readonly number[];

  constructor(ops: readonly MonoOp[], inputs: readonly number[]) {
    if (ops.length !== inputs.length) {
      throw new RangeError(`Chain has ${ops.length} ops but ${inputs.length} recorded arguments`);
    }
    checkChain(ops);
    this.ops = Object.freeze([...ops]);
    this.inputs = Object.freeze([...inputs]);
  }

  static fromSnapshot(snapshot: MonoTapeSnapshot): MonoTape {
    return new MonoTape(snapshot.ops, snapshot.inputs);
  }

  get length(): number {
    return this.ops.length;
  }

  backward(seed: number): number {
    let grad = seed;
    for (let i = this.ops.length - 1; i >= 0; i--) {
      grad = MonoOps.backward(this.ops[i], this.inputs[i], grad);
    }
    return grad;
  }

  toJSON(): MonoTapeSnapshot {
    return { ops: [...this.ops], inputs: [...this.inputs] };
  }
}
