import { describe, expect, it } from 'vitest';
import { MonoOp } from '../src/MonoOps';
import { MultiOp } from '../src/MultiOps';
import { monoOps, multiOps } from '../src/ops';

describe('monoOps', () => {
  it('resolves names regardless of case', () => {
    expect(monoOps('sin', 'Cos', 'exp', 'Neg')).toEqual([MonoOp.Sin, MonoOp.Cos, MonoOp.Exp, MonoOp.Neg]);
  });

  it('returns an empty chain for no names', () => {
    expect(monoOps()).toEqual([]);
  });
});

describe('multiOps', () => {
  it('splits each tuple into an operation and its arguments', () => {
    expect(multiOps(['inp', 1], ['Pow', 0, 1], ['abs', 2])).toEqual([
      { op: MultiOp.Inp, args: [1] },
      { op: MultiOp.Pow, args: [0, 1] },
      { op: MultiOp.Abs, args: [2] },
    ]);
  });

  it('keeps argument lists as given, leaving arity checks to evaluation', () => {
    expect(multiOps(['add', 0])).toEqual([{ op: MultiOp.Add, args: [0] }]);
  });
});

describe('package entry point', () => {
  it('exposes the evaluators and notation helpers', async () => {
    const entry = await import('../src/index');
    const { value } = entry.MultiAD.evaluateWithGradient(entry.multiOps(['mul', 0, 1]), [3, 4]);
    expect(value).toBe(12);
    expect(entry.MonoAD.evaluate(entry.monoOps('neg'), 2)).toBe(-2);
  });
});
