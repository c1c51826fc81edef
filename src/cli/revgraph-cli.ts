#!/usr/bin/env tsx
/**
 * revgraph - evaluate scalar graphs and their reverse-mode gradients from the shell.
 *
 *   revgraph chain --ops sin,sin,exp --x 2
 *   revgraph graph --file f1.json --inputs 0.6,1.4
 *   revgraph check --file f1.json
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ZodError } from 'zod';
import { CliError } from './cli-error';
import { loadConfig } from './config';
import { chainSchema, formatChainReport, runChain } from './commands/chain';
import { checkSchema, formatCheckReport, runCheck } from './commands/check';
import { formatGraphReport, graphSchema, runGraph } from './commands/graph';

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120;

function emit(json: boolean | undefined, report: object, lines: () => string[]): void {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  for (const line of lines()) {
    console.log(line);
  }
}

yargs(hideBin(process.argv))
  .scriptName('revgraph')
  .usage('$0 <command> [options]')
  .strict()
  .demandCommand(1, 'Specify a command.')
  .option('json', { type: 'boolean', describe: 'Emit machine-readable JSON.', default: false })
  .command(
    'chain',
    'Differentiate a chain of unary ops applied to one scalar.',
    cmd => cmd
      .option('ops', { type: 'string', demandOption: true, describe: 'Comma-separated ops: sin, cos, exp, neg.' })
      .option('x', { type: 'number', demandOption: true, describe: 'Input value.' })
      .option('seed', { type: 'number', default: 1, describe: 'Cotangent of the output.' }),
    argv => {
      const config = loadConfig();
      const report = runChain(chainSchema.parse(argv));
      emit(argv.json, report, () => formatChainReport(report, config.precision));
    }
  )
  .command(
    'graph',
    'Evaluate a JSON graph file and backpropagate to its inputs.',
    cmd => cmd
      .option('file', { type: 'string', demandOption: true, describe: 'Path to the graph definition.' })
      .option('inputs', { type: 'string', describe: 'Comma-separated inputs overriding the file.' })
      .option('seed', { type: 'number', default: 1, describe: 'Cotangent of the output.' }),
    argv => {
      const config = loadConfig();
      const report = runGraph(graphSchema.parse(argv));
      emit(argv.json, report, () => formatGraphReport(report, config.precision));
    }
  )
  .command(
    'check',
    'Compare backpropagated gradients of a graph file against central differences.',
    cmd => cmd
      .option('file', { type: 'string', demandOption: true, describe: 'Path to the graph definition.' })
      .option('inputs', { type: 'string', describe: 'Comma-separated inputs overriding the file.' })
      .option('epsilon', { type: 'number', default: 1e-6, describe: 'Finite-difference step.' })
      .option('tolerance', { type: 'number', default: 1e-6, describe: 'Largest accepted scaled error.' }),
    argv => {
      const config = loadConfig();
      const report = runCheck(checkSchema.parse(argv));
      emit(argv.json, report, () => formatCheckReport(report, config.precision));
      if (!report.ok) {
        process.exitCode = 1;
      }
    }
  )
  .fail((msg, err, instance) => {
    if (err instanceof CliError) {
      console.error(`[revgraph] ${err.message}`);
      process.exit(err.exitCode);
    }
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        console.error(`[revgraph] ${issue.message}`);
      }
    } else if (err) {
      console.error(`[revgraph] ${err.message}`);
    }
    if (msg) {
      console.error(msg);
    }
    instance.showHelp();
    process.exit(1);
  })
  .help()
  .wrap(Math.min(terminalWidth, 120))
  .parse();
