/**
 * Discriminant for every failure the engine can report.
 * @public
 */
export type AutodiffErrorCode = 'ARITY' | 'EMPTY_GRAPH' | 'INDEX_OUT_OF_BOUNDS' | 'GRADIENT_RELEASED';

/**
 * Base class for engine failures. Evaluation either succeeds completely or
 * throws one of the subclasses below; no partial value is ever returned.
 * @public
 */
export abstract class AutodiffError extends Error {
  abstract readonly code: AutodiffErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Throws an ArityError unless `actual` matches the operation's declared arity.
   */
  static checkArity(operation: string, expected: number, actual: number): void {
    if (actual !== expected) {
      throw new ArityError(operation, expected, actual);
    }
  }
}

/**
 * A node supplied the wrong number of predecessor indices for its operation.
 * @public
 */
export class ArityError extends AutodiffError {
  readonly code = 'ARITY';

  constructor(
    readonly operation: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Arity error in ${operation}: expected ${expected}, got ${actual}`);
  }
}

/**
 * Nothing to evaluate: no computed nodes and no inputs.
 * @public
 */
export class EmptyGraphError extends AutodiffError {
  readonly code = 'EMPTY_GRAPH';

  constructor() {
    super('Computation graph is empty');
  }
}

/**
 * A predecessor index addresses a tape position that does not exist when the
 * node is evaluated.
 * @public
 */
export class IndexOutOfBoundsError extends AutodiffError {
  readonly code = 'INDEX_OUT_OF_BOUNDS';

  constructor(
    readonly index: number,
    readonly maxIndex: number
  ) {
    super(`Index ${index} is out of bounds (max: ${maxIndex})`);
  }
}

/**
 * A gradient handle was invoked after it was disposed or its ownership moved.
 * @public
 */
export class GradientReleasedError extends AutodiffError {
  readonly code = 'GRADIENT_RELEASED';

  constructor(handle: string) {
    super(`${handle} has been released and can no longer be called`);
  }
}
