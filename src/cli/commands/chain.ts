import { z } from 'zod';
import { MonoAD } from '../../MonoAD';
import { type MonoOp, findMonoOp } from '../../MonoOps';
import { CliError, withCliErrors } from '../cli-error';
import { formatNumber } from '../format';

export const chainSchema = z.object({
  ops: z.string().min(1, '--ops is required'),
  x: z.coerce.number({ invalid_type_error: '--x must be a number' }),
  seed: z.coerce.number().default(1),
});

export type ChainArgs = z.infer<typeof chainSchema>;

export interface ChainReport {
  ops: MonoOp[];
  x: number;
  value: number;
  seed: number;
  gradient: number;
}

export function parseChainOps(text: string): MonoOp[] {
  return text.split(',').map(name => {
    const op = findMonoOp(name);
    if (op === undefined) {
      throw new CliError(`Unknown chain operation "${name.trim()}" (expected sin, cos, exp or neg)`);
    }
    return op;
  });
}

export function runChain(args: ChainArgs): ChainReport {
  const ops = parseChainOps(args.ops);
  return withCliErrors(() => {
    const { value, gradient } = MonoAD.evaluateWithGradient(ops, args.x);
    return { ops, x: args.x, value, seed: args.seed, gradient: gradient.call(args.seed) };
  });
}

export function formatChainReport(report: ChainReport, precision: number): string[] {
  return [
    `ops: ${report.ops.join(' -> ') || '(identity)'}`,
    `f(${formatNumber(report.x, precision)}) = ${formatNumber(report.value, precision)}`,
    `gradient (seed ${formatNumber(report.seed, precision)}): ${formatNumber(report.gradient, precision)}`,
  ];
}
