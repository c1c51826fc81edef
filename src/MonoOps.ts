/**
 * Unary operations available to the single-input chain.
 * @public
 */
export const MonoOp = {
  Sin: 'Sin',
  Cos: 'Cos',
  Exp: 'Exp',
  Neg: 'Neg',
} as const;

/** @public */
export type MonoOp = (typeof MonoOp)[keyof typeof MonoOp];

const MONO_OPS_BY_NAME = new Map<string, MonoOp>(
  Object.values(MonoOp).map(op => [op.toLowerCase(), op])
);

export function isMonoOp(name: string): name is MonoOp {
  return MONO_OPS_BY_NAME.get(name.toLowerCase()) === name;
}

export function findMonoOp(name: string): MonoOp | undefined {
  return MONO_OPS_BY_NAME.get(name.trim().toLowerCase());
}

/**
 * Resolves a case-insensitive operation name, e.g. `"sin"` → `MonoOp.Sin`.
 */
export function parseMonoOp(name: string): MonoOp {
  const op = findMonoOp(name);
  if (op === undefined) {
    throw new TypeError(`Unsupported chain operation: ${name}. Use one of: ${Object.values(MonoOp).join(', ')}`);
  }
  return op;
}

/**
 * Throws a TypeError for any entry that is not a chain operation, e.g. one read
 * from an untyped snapshot.
 */
export function checkChain(ops: readonly string[]): void {
  for (const op of ops) {
    if (!isMonoOp(op)) {
      throw new TypeError(`Unknown chain operation: ${String(op)}`);
    }
  }
}

export class MonoOps {
  static forward(op: MonoOp, x: number): number {
    switch (op) {
      case MonoOp.Sin: return Math.sin(x);
      case MonoOp.Cos: return Math.cos(x);
      case MonoOp.Exp: return Math.exp(x);
      case MonoOp.Neg: return -x;
    }
  }

  /**
   * Local gradient: maps the output cotangent `dy` to the cotangent of `x`.
   */
  static backward(op: MonoOp, x: number, dy: number): number {
    switch (op) {
      case MonoOp.Sin: return dy * Math.cos(x);
      case MonoOp.Cos: return dy * -Math.sin(x);
      case MonoOp.Exp: return dy * Math.exp(x);
      case MonoOp.Neg: return -dy;
    }
  }
}
