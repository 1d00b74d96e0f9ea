import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  FrequencyInputError,
  RP2040_CLOCK_PARAMETERS,
  configureLogging,
  createLogger,
  formatDiagnostic,
  formatHz,
  khzToHz,
  parseFrequencyKhz,
  renderConfigModule,
  searchEvaluated,
  type EvaluatedCandidate,
  type SearchOptions,
} from '@pllcalc/engine';

const log = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_INFEASIBLE = 1;
export const EXIT_INVALID = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

interface ConfigOptions {
  json?: boolean;
  module?: boolean;
  exportName: string;
  lowVco?: boolean;
  refdiv?: number;
  verbose?: boolean;
  debug?: boolean;
}

function parseKhzArgument(value: string): number {
  try {
    return parseFrequencyKhz(value);
  } catch (err) {
    if (err instanceof FrequencyInputError) throw new InvalidArgumentError(err.message);
    throw err;
  }
}

function parseDividerArgument(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`'${value}' is not a positive integer`);
  }
  return n;
}

export function formatText(khz: number, result: EvaluatedCandidate): string {
  return [
    `PLL configuration for ${khz} kHz`,
    `  refdiv:   ${result.referenceDivider}`,
    `  fbdiv:    ${result.feedbackDivider}`,
    `  postdiv1: ${result.postDivider1}`,
    `  postdiv2: ${result.postDivider2}`,
    `  vco:      ${formatHz(result.vcoFrequencyHz)} Hz`,
    `  output:   ${formatHz(result.outputFrequencyHz)} Hz`,
    `  error:    ${formatHz(result.absoluteErrorHz)} Hz`,
    '',
  ].join('\n');
}

export function formatJSON(khz: number, result: EvaluatedCandidate | undefined): string {
  const body = result
    ? {
        requestedKhz: khz,
        config: {
          referenceDivider: result.referenceDivider,
          feedbackDivider: result.feedbackDivider,
          postDivider1: result.postDivider1,
          postDivider2: result.postDivider2,
        },
        vcoFrequencyHz: result.vcoFrequencyHz,
        outputFrequencyHz: result.outputFrequencyHz,
        absoluteErrorHz: result.absoluteErrorHz,
      }
    : { requestedKhz: khz, config: null };
  return JSON.stringify(body, null, 2) + '\n';
}

/**
 * Build the command tree. A fresh program is created per run so that option
 * state never leaks between invocations.
 */
export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('pllcalc')
    .description('Compute PLL divider settings for an RP2040-class clock generator')
    .version('0.1.0')
    .argument('<khz>', 'Requested output frequency in kHz (e.g. 480000 or 480_000)', parseKhzArgument)
    .option('--json', 'Print the result as JSON')
    .option('--module', 'Print a TypeScript module exporting the configuration')
    .option('--export-name <name>', 'Constant name used by --module', 'PLL_CONFIG')
    .option('--low-vco', 'Prefer the lowest VCO frequency among equally close solutions')
    .option('--refdiv <n>', 'Lock the reference divider to this value', parseDividerArgument)
    .option('-v, --verbose', 'Enable informational logging')
    .option('--debug', 'Enable debug logging')
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .action((khz: number, options: ConfigOptions) => {
      if (options.debug) configureLogging({ level: 'debug' });
      else if (options.verbose) configureLogging({ level: 'info' });

      const searchOptions: SearchOptions = {
        preferLowVco: options.lowVco === true,
        lockedReferenceDivider: options.refdiv,
      };
      log.info('searching', { khz, ...searchOptions });
      const result = searchEvaluated(khzToHz(khz), RP2040_CLOCK_PARAMETERS, searchOptions);

      if (options.module) {
        io.stdout(renderConfigModule(khz, result, { exportName: options.exportName }));
      } else if (options.json) {
        io.stdout(formatJSON(khz, result));
      } else if (result) {
        io.stdout(formatText(khz, result));
      }

      if (!result) {
        io.stderr(formatDiagnostic('ERROR', 'pllcalc', 'no PLL configuration reaches the requested frequency', { khz }) + '\n');
        onExit(EXIT_INFEASIBLE);
        return;
      }
      onExit(EXIT_OK);
    });

  return program;
}

/**
 * Run the CLI against `argv` (in `process.argv` form) and resolve with the
 * exit code.
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(io, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version surface here with exitCode 0
      return err.exitCode === 0 ? EXIT_OK : EXIT_INVALID;
    }
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(formatDiagnostic('ERROR', 'pllcalc', message) + '\n');
    log.debug(err);
    return EXIT_INVALID;
  }
  return exitCode;
}
