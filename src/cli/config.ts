import { z } from 'zod';
import { CliError } from './cli-error';

const envSchema = z.object({
  REVGRAPH_PRECISION: z.coerce
    .number()
    .int()
    .min(1, 'REVGRAPH_PRECISION must be between 1 and 17')
    .max(17, 'REVGRAPH_PRECISION must be between 1 and 17')
    .default(10),
});

export interface CliConfig {
  /** Significant digits used when printing numbers */
  readonly precision: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new CliError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return { precision: parsed.data.REVGRAPH_PRECISION };
}
