#!/usr/bin/env node

// CLI entry point
// - Command name: `quotient` with subcommands calc, round, approx and inspect.
// - Every value argument uses the fraction wire format (`-?\d+(/\d+)?`);
//   approx takes a decimal literal instead.
// - Errors are rendered through ErrorPresenter and exit with the error's
//   exit code.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  FractionError,
  RationalEngine,
  bigintEngine,
  isFractionError,
  type EngineDiagnostic,
  type EngineOptions,
} from '@quotient/core';

import { runApprox } from './commands/approx.js';
import { runCalc } from './commands/calc.js';
import { runInspect } from './commands/inspect.js';
import type { CommandReport } from './commands/report.js';
import { runRound } from './commands/round.js';
import { resolveOutputFormat, type CliOptions } from './flags.js';
import { renderCLIView } from './render.js';

const program = new Command();

program
  .name('quotient')
  .description('Exact rational arithmetic from the command line')
  .version('0.1.0')
  .addHelpText(
    'after',
    '\nNegative values go after "--", e.g. quotient calc -- -3/4 add 1/2'
  );

function withCommonOptions(command: Command): Command {
  return command
    .option('--out <format>', 'Output format: text|json', 'text')
    .option('--debug', 'Print effective configuration and diagnostics to stderr')
    .option('--print-metrics', 'Print engine counters as JSON to stderr', false);
}

withCommonOptions(
  program
    .command('calc')
    .description('Apply a binary operation to two fractions')
    .argument('<left>', 'Left operand, e.g. 3/4')
    .argument('<op>', 'add|sub|mul|div|pow|min|max|cmp')
    .argument('<right>', 'Right operand (an integer exponent for pow)')
).action(
  (left: string, op: string, right: string, options: CliOptions): void => {
    run(options, (engine) => runCalc(engine, left, op, right));
  }
);

withCommonOptions(
  program
    .command('round')
    .description('Round a fraction to an integer')
    .argument('<value>', 'Fraction to round')
    .option('--mode <mode>', 'Rounding mode: floor|ceil|trunc|round', 'round')
).action((value: string, options: CliOptions): void => {
  run(options, (engine) => runRound(engine, value, options.mode));
});

withCommonOptions(
  program
    .command('approx')
    .description('Approximate a decimal number by a fraction')
    .argument('<double>', 'Decimal literal, e.g. 3.14159')
    .option(
      '--max-denominator <n>',
      'Largest denominator to consider (0 for unbounded)',
      '0'
    )
).action((value: string, options: CliOptions): void => {
  run(options, (engine) => runApprox(engine, value, options.maxDenominator));
});

withCommonOptions(
  program
    .command('inspect')
    .description('Show every derived view of a fraction')
    .argument('<value>', 'Fraction to inspect')
).action((value: string, options: CliOptions): void => {
  run(options, (engine) => runInspect(engine, value));
});

function writeDiagnostic(diagnostic: EngineDiagnostic): void {
  process.stderr.write(
    `[quotient] diagnostic: ${JSON.stringify(diagnostic)}\n`
  );
}

function createEngine(options: CliOptions): RationalEngine<bigint> {
  const engineOptions: EngineOptions = {
    metrics: options.printMetrics === true,
    onDiagnostic: options.debug ? writeDiagnostic : undefined,
  };
  const engine = new RationalEngine(bigintEngine, engineOptions);

  // Print effective configuration if requested
  if (options.debug) {
    process.stderr.write(
      `[quotient] effective config: ${JSON.stringify(engine.options, null, 2)}\n`
    );
  }
  return engine;
}

function run(
  options: CliOptions,
  command: (engine: RationalEngine<bigint>) => CommandReport
): void {
  try {
    const outFormat = resolveOutputFormat(options.out);
    const engine = createEngine(options);
    const report = command(engine);

    if (outFormat === 'json') {
      process.stdout.write(JSON.stringify(report.data, null, 2) + '\n');
    } else {
      process.stdout.write(report.text + '\n');
    }

    if (options.printMetrics === true) {
      process.stderr.write(
        `[quotient] metrics: ${JSON.stringify(engine.metrics.snapshot())}\n`
      );
    }
  } catch (err: unknown) {
    handleCliError(err);
  }
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: FractionError;
  if (isFractionError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends FractionError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  process.stderr.write(renderCLIView(view) + '\n');

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
