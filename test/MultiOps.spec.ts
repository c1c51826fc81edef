import { describe, expect, it } from 'vitest';
import { ArityError } from '../src/AutodiffError';
import { MULTI_OP_ARITY, MultiOp, MultiOps, isMultiOp, parseMultiOp } from '../src/MultiOps';
import { MultiAD } from '../src/MultiAD';
import { catchError } from './testUtils';

type Unary = 'Sin' | 'Cos' | 'Tan' | 'Exp' | 'Ln' | 'Sqrt' | 'Abs';

const UNARY: [Unary, (x: number) => number, (x: number) => number, number[]][] = [
  ['Sin', Math.sin, Math.cos, [-2, 0, 0.6, 3]],
  ['Cos', Math.cos, x => -Math.sin(x), [-2, 0, 0.6, 3]],
  ['Tan', Math.tan, x => 1 / Math.cos(x) ** 2, [-1.2, 0, 0.6]],
  ['Exp', Math.exp, Math.exp, [-3, 0, 0.6, 2]],
  ['Ln', Math.log, x => 1 / x, [0.1, 1, 2.5]],
  ['Sqrt', Math.sqrt, x => 1 / (2 * Math.sqrt(x)), [0.25, 1, 9]],
  ['Abs', Math.abs, x => Math.sign(x), [-2.5, 1.5]],
];

type Binary = 'Add' | 'Sub' | 'Mul' | 'Div' | 'Pow';

const BINARY: [Binary, (a: number, b: number) => number, (a: number, b: number) => [number, number]][] = [
  ['Add', (a, b) => a + b, () => [1, 1]],
  ['Sub', (a, b) => a - b, () => [1, -1]],
  ['Mul', (a, b) => a * b, (a, b) => [b, a]],
  ['Div', (a, b) => a / b, (a, b) => [1 / b, -a / (b * b)]],
  ['Pow', (a, b) => a ** b, (a, b) => [b * a ** (b - 1), a ** b * Math.log(a)]],
];

describe('graph operation catalog', () => {
  describe.each(UNARY)('%s', (op, f, df, points) => {
    it.each(points)('matches the scalar function and its derivative at %d', x => {
      const graph = [{ op, args: [0] }];
      expect(MultiAD.evaluate(graph, [x])).toBeCloseTo(f(x), 10);

      const { value, gradient } = MultiAD.evaluateWithGradient(graph, [x]);
      expect(value).toBeCloseTo(f(x), 10);
      expect(gradient.call(1)[0]).toBeCloseTo(df(x), 10);
    });
  });

  describe.each(BINARY)('%s', (op, f, df) => {
    it.each([[1.7, 0.8], [2, 3], [0.5, -1.25]])('matches at (%d, %d)', (a, b) => {
      const graph = [{ op, args: [0, 1] }];
      const { value, gradient } = MultiAD.evaluateWithGradient(graph, [a, b]);
      const [da, db] = gradient.call(1);
      const [ea, eb] = df(a, b);

      expect(value).toBeCloseTo(f(a, b), 10);
      expect(da).toBeCloseTo(ea, 10);
      expect(db).toBeCloseTo(eb, 10);
    });
  });

  it('declares the arity of every operation', () => {
    expect(MULTI_OP_ARITY).toEqual({
      Inp: 1, Add: 2, Sub: 2, Mul: 2, Div: 2, Pow: 2,
      Sin: 1, Cos: 1, Tan: 1, Exp: 1, Ln: 1, Sqrt: 1, Abs: 1,
    });
    expect(MultiOps.arity(MultiOp.Pow)).toBe(2);
  });

  it('passes the cotangent of a placeholder through unchanged', () => {
    expect(MultiOps.forward(MultiOp.Inp, [4.5])).toBe(4.5);
    expect(MultiOps.backward(MultiOp.Inp, [4.5], 0.25)).toEqual([0.25]);
  });

  it('takes the Abs subgradient at zero as 0', () => {
    expect(MultiOps.backward(MultiOp.Abs, [0], 3)).toEqual([0]);
    expect(MultiOps.backward(MultiOp.Abs, [-2], 3)).toEqual([-3]);
    expect(MultiOps.backward(MultiOp.Abs, [2], 3)).toEqual([3]);
  });

  it('scales every local gradient by the output cotangent', () => {
    expect(MultiOps.backward(MultiOp.Mul, [3, 4], 2)).toEqual([8, 6]);
    expect(MultiOps.backward(MultiOp.Sub, [3, 4], 2)).toEqual([2, -2]);
    expect(MultiOps.backward(MultiOp.Div, [3, 2], 2)).toEqual([1, -1.5]);
    expect(MultiOps.backward(MultiOp.Sqrt, [4], 2)).toEqual([0.5]);
    expect(MultiOps.backward(MultiOp.Ln, [4], 2)).toEqual([0.5]);
  });

  describe('IEEE-754 results are values, not errors', () => {
    it('divides by zero', () => {
      expect(MultiOps.forward(MultiOp.Div, [1, 0])).toBe(Infinity);
      expect(MultiOps.forward(MultiOp.Div, [-1, 0])).toBe(-Infinity);
      expect(MultiOps.forward(MultiOp.Div, [0, 0])).toBeNaN();
    });

    it('takes logarithms and square roots outside their domain', () => {
      expect(MultiOps.forward(MultiOp.Ln, [0])).toBe(-Infinity);
      expect(MultiOps.forward(MultiOp.Ln, [-1])).toBeNaN();
      expect(MultiOps.forward(MultiOp.Sqrt, [-1])).toBeNaN();
    });
  });

  it('checks arity before running a rule', () => {
    const err = catchError(() => MultiOps.forward(MultiOp.Add, [1]));
    expect(err).toBeInstanceOf(ArityError);
    expect(err).toMatchObject({ operation: 'Add', expected: 2, actual: 1 });

    expect(() => MultiOps.backward(MultiOp.Sin, [1, 2], 1)).toThrow('Arity error in Sin: expected 1, got 2');
  });

  it('resolves operation names case-insensitively', () => {
    expect(parseMultiOp('add')).toBe(MultiOp.Add);
    expect(parseMultiOp(' SQRT ')).toBe(MultiOp.Sqrt);
    expect(() => parseMultiOp('tanh')).toThrow(TypeError);
    expect(isMultiOp('Mul')).toBe(true);
    expect(isMultiOp('mul')).toBe(false);
  });
});
