import type { MultiGraph } from './GraphValidator';
import { MonoAD } from './MonoAD';
import type { MonoOp } from './MonoOps';
import { MultiAD } from './MultiAD';

export interface GradientCheckOptions {
  /** Central-difference step (default 1e-6) */
  epsilon?: number;
  /** Largest accepted scaled error (default 1e-6) */
  tolerance?: number;
}

export interface GradientCheckEntry {
  index: number;
  analytic: number;
  numeric: number;
  /** |analytic - numeric| / max(1, |analytic|, |numeric|) */
  error: number;
}

export interface GradientCheckResult {
  value: number;
  entries: GradientCheckEntry[];
  maxError: number;
  ok: boolean;
}

function scaledError(analytic: number, numeric: number): number {
  return Math.abs(analytic - numeric) / Math.max(1, Math.abs(analytic), Math.abs(numeric));
}

function summarize(value: number, entries: GradientCheckEntry[], tolerance: number): GradientCheckResult {
  const maxError = entries.reduce((max, e) => Math.max(max, e.error), 0);
  const ok = entries.every(e => Number.isFinite(e.error) && e.error <= tolerance);
  return { value, entries, maxError, ok };
}

/**
 * Cross-checks backpropagated gradients of a graph against central differences.
 */
export function checkGradient(
  graph: MultiGraph,
  inputs: readonly number[],
  options: GradientCheckOptions = {}
): GradientCheckResult {
  const { epsilon = 1e-6, tolerance = 1e-6 } = options;
  const { value, gradient } = MultiAD.evaluateWithGradient(graph, inputs);
  const analytic = gradient.call(1);
  gradient.dispose();

  const entries = analytic.map((a, index) => {
    const plus = [...inputs];
    const minus = [...inputs];
    plus[index] += epsilon;
    minus[index] -= epsilon;
    const numeric = (MultiAD.evaluate(graph, plus) - MultiAD.evaluate(graph, minus)) / (2 * epsilon);
    return { index, analytic: a, numeric, error: scaledError(a, numeric) };
  });

  return summarize(value, entries, tolerance);
}

/**
 * Single-input counterpart of checkGradient().
 */
export function checkChainGradient(
  ops: readonly MonoOp[],
  x: number,
  options: GradientCheckOptions = {}
): GradientCheckResult {
  const { epsilon = 1e-6, tolerance = 1e-6 } = options;
  const { value, gradient } = MonoAD.evaluateWithGradient(ops, x);
  const analytic = gradient.call(1);
  gradient.dispose();

  const numeric = (MonoAD.evaluate(ops, x + epsilon) - MonoAD.evaluate(ops, x - epsilon)) / (2 * epsilon);
  return summarize(value, [{ index: 0, analytic, numeric, error: scaledError(analytic, numeric) }], tolerance);
}
