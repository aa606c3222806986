#!/usr/bin/env node
/**
 * gn-fit - fit catalog models to sample files with Gauss-Newton steps.
 *
 * Built with Yargs + Zod: yargs declares the flags and help output, zod
 * validates and coerces the parsed values before anything runs.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { listModels } from '../models';
import { CliError } from './cli-error';
import { formatReport, runFit } from './commands/fit';
import { formatModels } from './commands/models';

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120;

yargs(hideBin(process.argv))
  .scriptName('gn-fit')
  .usage('$0 <command> [options]')
  .strict()
  .demandCommand(1, 'Specify a command.')
  .command(
    'models',
    'List the models in the catalog.',
    cmd => cmd.option('json', { type: 'boolean', describe: 'Emit machine-readable JSON.' }),
    argv => {
      const models = listModels();
      if (argv.json) {
        console.log(JSON.stringify(models, null, 2));
        return;
      }
      formatModels(models).forEach(line => console.log(line));
    }
  )
  .command(
    'fit',
    'Refine an initial guess against samples until the step size falls below the tolerance.',
    cmd => cmd
      .option('model', { type: 'string', demandOption: true, describe: 'Catalog model name (see `models`).' })
      .option('data', { type: 'string', demandOption: true, describe: 'Samples: .json {"x":[],"y":[]} or two-column .csv.' })
      .option('guess', { type: 'string', demandOption: true, describe: 'Initial coefficients, comma-separated.' })
      .option('base', { type: 'number', describe: 'Fixed base n for the fixedBase models.' })
      .option('iterations', { type: 'number', default: 50, describe: 'Maximum number of refinement steps.' })
      .option('tolerance', { type: 'number', default: 1e-10, describe: 'Stop once max |Δc| is at most this.' })
      .option('json', { type: 'boolean', describe: 'Emit machine-readable JSON.' })
      .option('verbose', { type: 'boolean', default: false, describe: 'Log every iteration.' }),
    argv => {
      const report = runFit(argv);
      if (argv.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      formatReport(report).forEach(line => console.log(line));
      if (!report.converged) {
        console.error(`Warning: tolerance not reached in ${report.iterations} iteration(s); last step ${report.lastStep}`);
      }
    }
  )
  .fail((msg, err, instance) => {
    if (err instanceof CliError) {
      console.error(err.message);
      process.exit(err.exitCode);
    }
    if (msg) {
      console.error(msg);
    }
    if (err) {
      console.error(err.message);
    }
    instance.showHelp();
    process.exit(1);
  })
  .help()
  .epilogue('Each step solves the Gauss-Newton normal equations once; the stopping rule lives here, not in the library.')
  .wrap(Math.min(terminalWidth, 120))
  .parseSync();
