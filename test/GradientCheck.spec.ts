import { describe, expect, it } from 'vitest';
import { checkChainGradient, checkGradient } from '../src/GradientCheck';
import { monoOps, multiOps } from '../src/ops';
import { MONO_FUNCTIONS, MULTI_FUNCTIONS, MULTI_POINTS } from './fixtures/referenceFunctions';
import { testLog } from './testUtils';

describe('checkGradient', () => {
  describe.each(MULTI_FUNCTIONS)('$name', fn => {
    it.each(MULTI_POINTS[fn.name])('passes at %j', (...inputs: number[]) => {
      const result = checkGradient(fn.graph, inputs);
      testLog(fn.name, inputs, result.maxError);
      expect(result.ok).toBe(true);
      expect(result.entries).toHaveLength(inputs.length);
      expect(result.value).toBeCloseTo(fn.value(inputs), 12);
    });
  });

  it('reports each entry against its input', () => {
    // f(x, y) = x * y
    const result = checkGradient(multiOps(['mul', 0, 1]), [3, 4]);
    expect(result.entries.map(e => e.index)).toEqual([0, 1]);
    expect(result.entries.map(e => e.analytic)).toEqual([4, 3]);
    expect(result.entries[0].numeric).toBeCloseTo(4, 6);
    expect(result.entries[1].numeric).toBeCloseTo(3, 6);
  });

  it('fails when the step is too coarse for the curvature', () => {
    // exp at 0: (e^0.5 - e^-0.5) / 1 = 1.0422 against an exact 1
    const result = checkGradient(multiOps(['exp', 0]), [0], { epsilon: 0.5 });
    const numeric = Math.exp(0.5) - Math.exp(-0.5);
    expect(result.ok).toBe(false);
    expect(result.maxError).toBeCloseTo((numeric - 1) / numeric, 12);
  });

  it('accepts the same result under a looser tolerance', () => {
    const result = checkGradient(multiOps(['exp', 0]), [0], { epsilon: 0.5, tolerance: 0.1 });
    expect(result.ok).toBe(true);
  });

  it('fails on a non-finite gradient', () => {
    // sqrt at 0 has an infinite derivative
    const result = checkGradient(multiOps(['sqrt', 0]), [0], { epsilon: 1e-6 });
    expect(result.entries[0].analytic).toBe(Infinity);
    expect(result.ok).toBe(false);
  });
});

describe('checkChainGradient', () => {
  it.each(MONO_FUNCTIONS)('passes for $name', fn => {
    const result = checkChainGradient(fn.ops, 0.7);
    expect(result.ok).toBe(true);
    expect(result.entries).toHaveLength(1);
    expect(result.value).toBeCloseTo(fn.value(0.7), 12);
  });

  it('checks the identity chain', () => {
    const result = checkChainGradient(monoOps(), 5);
    expect(result.value).toBe(5);
    expect(result.entries[0].analytic).toBe(1);
  });
});
