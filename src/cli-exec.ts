/**
 * CLI Execution
 *
 * Implements parseArgs() and runCli() for the intcalc binary. Output goes
 * through injected writers so the whole command can run in-process.
 */

import { calculate, type PipelineCallbacks } from './calculator.js';
import { loadConfig } from './cli-config.js';
import {
  formatError,
  isOutputFormat,
  OUTPUT_FORMATS,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import {
  detectHelpVersionFlag,
  formatResult,
  joinExpression,
  VERSION,
} from './cli-shared.js';
import { CalcError } from './types.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'eval';
      expression: string;
      format?: OutputFormat | undefined;
      verbose?: boolean | undefined;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Directory searched for .intcalc.yaml */
  readonly cwd: string;
}

export const USAGE = 'Usage: intcalc <expression>';

const HELP_TEXT = `intcalc - integer expression calculator

${USAGE}

Options:
  --format <human|json|compact>  Error output format (default: human)
  --verbose                      Show resolutions and stage timings
  --explain <errorId>            Describe an error, e.g. CALC-P006
  --help, -h                     Show this help message
  --version, -v                  Show version information

Operators: + - x / % ^ and parentheses. Quote the expression:
  intcalc "(2 x 3) ^ 2"`;

/** `-5` and `-(2)` are expressions, `-h` and `--format` are options */
function isOption(arg: string): boolean {
  return /^--?[A-Za-z]/.test(arg);
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown options or missing option values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  let format: OutputFormat | undefined;
  let verbose: boolean | undefined;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (!isOption(arg)) {
      positional.push(arg);
      continue;
    }

    switch (arg) {
      case '--explain': {
        const errorId = argv[i + 1];
        if (errorId === undefined) {
          throw new Error('Missing error ID after --explain');
        }
        return { mode: 'explain', errorId };
      }
      case '--format': {
        const value = argv[i + 1];
        if (!isOutputFormat(value)) {
          throw new Error(
            `Invalid --format value: ${value ?? ''}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
          );
        }
        format = value;
        i++;
        break;
      }
      case '--verbose':
        verbose = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return {
    mode: 'eval',
    expression: joinExpression(positional),
    format,
    verbose,
  };
}

function traceCallbacks(io: CliIO): PipelineCallbacks {
  return {
    onStageEnd: ({ stage, durationMs }) => {
      io.stderr(`[intcalc] ${stage} ${durationMs.toFixed(3)}ms`);
    },
  };
}

function evaluateCommand(
  command: Extract<ParsedArgs, { mode: 'eval' }>,
  io: CliIO
): number {
  if (command.expression === '') {
    io.stderr(USAGE);
    return 1;
  }

  const config = loadConfig(io.cwd) ?? {};
  const options: FormatOptions = {
    format: command.format ?? config.format ?? 'human',
    verbose: command.verbose ?? config.verbose ?? false,
  };

  try {
    const result = calculate(command.expression, {
      callbacks: options.verbose ? traceCallbacks(io) : undefined,
    });
    for (const line of formatResult(result)) {
      io.stdout(line);
    }
    return 0;
  } catch (err) {
    if (err instanceof CalcError) {
      io.stderr(formatError(err, command.expression, options));
      return 1;
    }
    throw err;
  }
}

/**
 * Run the intcalc command.
 *
 * @returns Process exit code: 0 on success, 1 on usage, syntax,
 * evaluation or configuration errors
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  try {
    const command = parseArgs(argv);

    switch (command.mode) {
      case 'help':
        io.stdout(HELP_TEXT);
        return 0;
      case 'version':
        io.stdout(`intcalc ${VERSION}`);
        return 0;
      case 'explain': {
        const documentation = explainError(command.errorId);
        if (documentation === null) {
          io.stderr(`Unknown error ID: ${command.errorId}`);
          return 1;
        }
        io.stdout(documentation);
        return 0;
      }
      case 'eval':
        return evaluateCommand(command, io);
    }
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
