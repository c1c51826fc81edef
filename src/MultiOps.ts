import { AutodiffError } from './AutodiffError';

/**
 * Operations available to multi-input graphs.
 *
 * `Inp` is a placeholder: it documents which raw input a graph reads but does
 * not occupy a tape position of its own.
 * @public
 */
export const MultiOp = {
  Inp: 'Inp',
  Add: 'Add',
  Sub: 'Sub',
  Mul: 'Mul',
  Div: 'Div',
  Pow: 'Pow',
  Sin: 'Sin',
  Cos: 'Cos',
  Tan: 'Tan',
  Exp: 'Exp',
  Ln: 'Ln',
  Sqrt: 'Sqrt',
  Abs: 'Abs',
} as const;

/** @public */
export type MultiOp = (typeof MultiOp)[keyof typeof MultiOp];

/**
 * Declared number of predecessor indices per operation.
 * @public
 */
export const MULTI_OP_ARITY: Readonly<Record<MultiOp, 1 | 2>> = {
  Inp: 1,
  Add: 2,
  Sub: 2,
  Mul: 2,
  Div: 2,
  Pow: 2,
  Sin: 1,
  Cos: 1,
  Tan: 1,
  Exp: 1,
  Ln: 1,
  Sqrt: 1,
  Abs: 1,
};

const MULTI_OPS_BY_NAME = new Map<string, MultiOp>(
  Object.values(MultiOp).map(op => [op.toLowerCase(), op])
);

export function isMultiOp(name: string): name is MultiOp {
  return MULTI_OPS_BY_NAME.get(name.toLowerCase()) === name;
}

export function findMultiOp(name: string): MultiOp | undefined {
  return MULTI_OPS_BY_NAME.get(name.trim().toLowerCase());
}

/**
 * Resolves a case-insensitive operation name, e.g. `"mul"` → `MultiOp.Mul`.
 */
export function parseMultiOp(name: string): MultiOp {
  const op = findMultiOp(name);
  if (op === undefined) {
    throw new TypeError(`Unsupported graph operation: ${name}. Use one of: ${Object.values(MultiOp).join(', ')}`);
  }
  return op;
}

export class MultiOps {
  static arity(op: MultiOp): number {
    return MULTI_OP_ARITY[op];
  }

  /**
   * Forward formula. `args` holds the predecessor values in index order.
   */
  static forward(op: MultiOp, args: readonly number[]): number {
    AutodiffError.checkArity(op, MULTI_OP_ARITY[op], args.length);
    const [a, b] = args;
    switch (op) {
      case MultiOp.Inp: return a;
      case MultiOp.Add: return a + b;
      case MultiOp.Sub: return a - b;
      case MultiOp.Mul: return a * b;
      case MultiOp.Div: return a / b;
      case MultiOp.Pow: return Math.pow(a, b);
      case MultiOp.Sin: return Math.sin(a);
      case MultiOp.Cos: return Math.cos(a);
      case MultiOp.Tan: return Math.tan(a);
      case MultiOp.Exp: return Math.exp(a);
      case MultiOp.Ln: return Math.log(a);
      case MultiOp.Sqrt: return Math.sqrt(a);
      case MultiOp.Abs: return Math.abs(a);
    }
  }

  /**
   * Local-gradient rule: maps the output cotangent `dz` to one cotangent per
   * argument, evaluated at the captured argument values.
   */
  static backward(op: MultiOp, args: readonly number[], dz: number): number[] {
    AutodiffError.checkArity(op, MULTI_OP_ARITY[op], args.length);
    const [a, b] = args;
    switch (op) {
      case MultiOp.Inp: return [dz];
      case MultiOp.Add: return [dz, dz];
      case MultiOp.Sub: return [dz, -dz];
      case MultiOp.Mul: return [dz * b, dz * a];
      case MultiOp.Div: return [dz / b, -dz * a / (b * b)];
      case MultiOp.Pow: return [dz * b * Math.pow(a, b - 1), dz * Math.pow(a, b) * Math.log(a)];
      case MultiOp.Sin: return [dz * Math.cos(a)];
      case MultiOp.Cos: return [dz * -Math.sin(a)];
      case MultiOp.Tan: {
        const c = Math.cos(a);
        return [dz / (c * c)];
      }
      case MultiOp.Exp: return [dz * Math.exp(a)];
      case MultiOp.Ln: return [dz / a];
      case MultiOp.Sqrt: return [dz / (2 * Math.sqrt(a))];
      // Subgradient at 0 is taken as 0
      case MultiOp.Abs: return [a === 0 ? 0 : dz * Math.sign(a)];
    }
  }
}
