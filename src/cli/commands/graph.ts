import { z } from 'zod';
import { type GraphFile, loadGraphFile } from '../../GraphFile';
import { MultiAD } from '../../MultiAD';
import { assert, withCliErrors } from '../cli-error';
import { formatNumber, formatVector, parseNumberList } from '../format';

export const graphSchema = z.object({
  file: z.string().min(1, '--file is required'),
  inputs: z.string().optional(),
  seed: z.coerce.number().default(1),
});

export type GraphArgs = z.infer<typeof graphSchema>;

export interface GraphReport {
  file: string;
  inputs: number[];
  value: number;
  seed: number;
  gradient: number[];
}

/**
 * Loads the graph file and applies an `--inputs` override when one is given.
 */
export function resolveGraph(file: string, inputs: string | undefined): GraphFile {
  const graph = withCliErrors(() => loadGraphFile(file));
  if (inputs === undefined) return graph;

  const override = parseNumberList(inputs);
  assert(override !== undefined, `--inputs must be a comma-separated list of numbers, got "${inputs}"`);
  return { ...graph, inputs: override };
}

export function runGraph(args: GraphArgs): GraphReport {
  const { inputs, nodes } = resolveGraph(args.file, args.inputs);
  return withCliErrors(() => {
    const { value, gradient } = MultiAD.evaluateWithGradient(nodes, inputs);
    return { file: args.file, inputs, value, seed: args.seed, gradient: gradient.call(args.seed) };
  });
}

export function formatGraphReport(report: GraphReport, precision: number): string[] {
  return [
    `file: ${report.file}`,
    `inputs: ${formatVector(report.inputs, precision)}`,
    `value: ${formatNumber(report.value, precision)}`,
    `gradient (seed ${formatNumber(report.seed, precision)}): ${formatVector(report.gradient, precision)}`,
  ];
}
