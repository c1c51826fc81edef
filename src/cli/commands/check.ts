import { z } from 'zod';
import { type GradientCheckResult, checkGradient } from '../../GradientCheck';
import { withCliErrors } from '../cli-error';
import { formatNumber } from '../format';
import { resolveGraph } from './graph';

export const checkSchema = z.object({
  file: z.string().min(1, '--file is required'),
  inputs: z.string().optional(),
  epsilon: z.coerce.number().positive('--epsilon must be positive').default(1e-6),
  tolerance: z.coerce.number().positive('--tolerance must be positive').default(1e-6),
});

export type CheckArgs = z.infer<typeof checkSchema>;

export interface CheckReport extends GradientCheckResult {
  file: string;
  tolerance: number;
}

export function runCheck(args: CheckArgs): CheckReport {
  const { inputs, nodes } = resolveGraph(args.file, args.inputs);
  const result = withCliErrors(() =>
    checkGradient(nodes, inputs, { epsilon: args.epsilon, tolerance: args.tolerance })
  );
  return { ...result, file: args.file, tolerance: args.tolerance };
}

export function formatCheckReport(report: CheckReport, precision: number): string[] {
  const lines = [`file: ${report.file}`, `value: ${formatNumber(report.value, precision)}`];
  for (const entry of report.entries) {
    lines.push(
      `x${entry.index}  analytic ${formatNumber(entry.analytic, precision)}  ` +
      `numeric ${formatNumber(entry.numeric, precision)}  error ${formatNumber(entry.error, 3)}`
    );
  }
  lines.push(
    report.ok
      ? `ok (max error ${formatNumber(report.maxError, 3)})`
      : `FAILED (max error ${formatNumber(report.maxError, 3)} > tolerance ${formatNumber(report.tolerance, 3)})`
  );
  return lines;
}
