import * as fs from 'fs';
import { z } from 'zod';
import type { MultiGraph } from './GraphValidator';
import { findMultiOp } from './MultiOps';

/**
 * JSON graph definition:
 *
 * ```json
 * {
 *   "inputs": [0.6, 1.4],
 *   "nodes": [["inp", 0], ["inp", 1], ["add", 0, 1], ["sin", 0], ["mul", 2, 3]]
 * }
 * ```
 *
 * Nodes may also be written as `{ "op": "Add", "args": [0, 1] }`.
 */
const opSchema = z.string().transform((name, ctx) => {
  const op = findMultiOp(name);
  if (op === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown operation "${name}"` });
    return z.NEVER;
  }
  return op;
});

const indexSchema = z.number().int().nonnegative();

// Tuple nodes are rewritten to the object form before validation
const nodeSchema = z.preprocess(
  node => (Array.isArray(node) ? { op: node[0], args: node.slice(1) } : node),
  z.object({ op: opSchema, args: z.array(indexSchema) })
);

export const graphFileSchema = z.object({
  inputs: z.array(z.number()).default([]),
  nodes: z.array(nodeSchema),
});

export interface GraphFile {
  inputs: number[];
  nodes: MultiGraph;
}

export class GraphFileError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'GraphFileError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates an already-parsed JSON value as a graph definition.
 */
export function parseGraphFile(data: unknown, source?: string): GraphFile {
  const result = graphFileSchema.safeParse(data);
  if (!result.success) {
    throw new GraphFileError(formatIssues(result.error), source);
  }
  return result.data;
}

export function readGraphFile(text: string, source?: string): GraphFile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphFileError(`invalid JSON (${reason})`, source);
  }
  return parseGraphFile(data, source);
}

export function loadGraphFile(filePath: string): GraphFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphFileError(`cannot read file (${reason})`, filePath);
  }
  return readGraphFile(text, filePath);
}
