#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import chokidar from 'chokidar';
import { codeFrameColumns } from '@babel/code-frame';
import { CONFIG_FILES, DEFAULT_CONFIG, loadConfigWithInfo, type CfgPruneConfig } from './config';
import { cfgStats } from './control-flow/cfg-visualizer';
import { SourceLocationError } from './errors';
import {
  formatProgram,
  generateFromFile,
  isOutputFormat,
  type GenerationResult,
  type OutputFormat,
} from './generator';

interface CliOptions {
  format?: string;
  typescript?: boolean; // Commander turns --no-typescript into typescript: false
  jsx?: boolean;
  function?: string[];
  output?: string;
  color?: boolean;
  debug?: boolean;
}

/**
 * Where the CLI writes and which directory it treats as current.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  cwd(): string;
  setExitCode(code: number): void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  cwd: () => process.cwd(),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const WATCH_DEBOUNCE_MS = 300;

interface ResolvedRun {
  format: OutputFormat;
  config: Required<CfgPruneConfig>;
}

/**
 * Merge the nearest config file with the flags given on the command line.
 * Returns null when a flag is invalid.
 */
function resolveRun(
  io: CliIO,
  filePath: string,
  options: CliOptions,
  command: Command
): ResolvedRun | null {
  const { config, configPath, warnings } = loadConfigWithInfo(path.dirname(filePath));

  for (const warning of warnings) {
    io.stderr(chalk.yellow(`Warning: ${warning}\n`));
  }
  if (options.debug && configPath) {
    io.stderr(chalk.gray(`Using config: ${configPath}\n`));
  }

  let format = config.format;
  if (options.format !== undefined) {
    if (!isOutputFormat(options.format)) {
      io.stderr(chalk.red(`Error: Unknown format "${options.format}" (expected text, dot or json)\n`));
      return null;
    }
    format = options.format;
  }

  return {
    format,
    config: {
      format,
      typescript:
        command.getOptionValueSource('typescript') === 'cli'
          ? options.typescript !== false
          : config.typescript,
      jsx: options.jsx ?? config.jsx,
      functions: options.function ?? config.functions,
    },
  };
}

/**
 * Build, prune and format one file. Returns null after reporting an error.
 */
function runOnce(io: CliIO, filePath: string, run: ResolvedRun, debug = false): string | null {
  let result: GenerationResult;
  try {
    result = generateFromFile(path.resolve(io.cwd(), filePath), run.config, filePath);
  } catch (error) {
    reportError(io, filePath, error);
    return null;
  }

  if (debug) {
    printDebugInfo(io, result);
  }
  return formatProgram(result.program, run.format);
}

function reportError(io: CliIO, filePath: string, error: unknown): void {
  if (error instanceof SourceLocationError) {
    io.stderr(chalk.red(`Error: ${error.message} (${filePath}:${error.line}:${error.column})\n`));
    const codeFrame = generateCodeFrame(path.resolve(io.cwd(), filePath), error.line, error.column);
    if (codeFrame) {
      io.stderr(`${codeFrame}\n`);
    }
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  io.stderr(chalk.red(`Error: ${message}\n`));
}

function generateCodeFrame(filePath: string, line: number, column: number): string | null {
  if (line <= 0) return null;

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }

  // Babel columns are 0-based, code frames are 1-based
  return codeFrameColumns(
    content,
    { start: { line, column: column + 1 } },
    {
      highlightCode: chalk.level > 0,
      linesAbove: 2,
      linesBelow: 2,
    }
  );
}

function printDebugInfo(io: CliIO, result: GenerationResult): void {
  for (const { name, report } of result.reports) {
    io.stderr(
      chalk.gray(
        `${name}: ${report.created} blocks created, ${report.unreachable} unreachable, ` +
          `${report.elided} elided, ${report.merged} merged, ${report.surviving} surviving\n`
      )
    );
  }
  for (const cfg of result.program.functions) {
    io.stderr(chalk.gray(`${cfgStats(cfg)}\n`));
  }
}

/**
 * Build the command tree. Nothing is parsed until the caller does so.
 */
export function createCli(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .name('cfg-prune')
    .description('Build, prune and print the control-flow graph of every function in a file')
    .version('1.0.0')
    .argument('<file>', 'Source file to build CFGs for')
    .option('-f, --format <format>', 'Output format (text, dot, json)')
    .option('--no-typescript', 'Reject TypeScript syntax')
    .option('--jsx', 'Accept JSX syntax')
    .option('--function <names...>', 'Only output these functions')
    .option('-o, --output <file>', 'Write the output to a file instead of stdout')
    .option('--no-color', 'Disable colored output')
    .option('--debug', 'Print pruning statistics for every function')
    .hook('preAction', (thisCommand) => {
      // Disable colors if --no-color flag is used
      if (thisCommand.opts().color === false) {
        chalk.level = 0;
      }
    })
    .action((filePath: string, options: CliOptions, command: Command) => {
      const absolutePath = path.resolve(io.cwd(), filePath);
      if (!fs.existsSync(absolutePath)) {
        io.stderr(chalk.red(`Error: File "${filePath}" does not exist\n`));
        io.setExitCode(1);
        return;
      }

      const run = resolveRun(io, absolutePath, options, command);
      if (!run) {
        io.setExitCode(1);
        return;
      }

      const output = runOnce(io, filePath, run, options.debug);
      if (output === null) {
        io.setExitCode(1);
        return;
      }

      if (options.output) {
        const outputPath = path.resolve(io.cwd(), options.output);
        fs.writeFileSync(outputPath, output);
        io.stderr(chalk.green(`Wrote ${options.output}\n`));
      } else {
        io.stdout(output);
      }
    });

  // Watch command for continuous output
  program
    .command('watch <file>')
    .description('Print the CFGs again whenever the file changes')
    .option('-f, --format <format>', 'Output format (text, dot, json)')
    .option('--no-typescript', 'Reject TypeScript syntax')
    .option('--jsx', 'Accept JSX syntax')
    .option('--function <names...>', 'Only output these functions')
    .option('--debug', 'Print pruning statistics on every rebuild')
    .action((filePath: string, watchOptions: CliOptions, command: Command) => {
      const absolutePath = path.resolve(io.cwd(), filePath);

      if (!fs.existsSync(absolutePath)) {
        io.stderr(chalk.red(`Error: File "${filePath}" does not exist\n`));
        io.setExitCode(1);
        return;
      }

      const run = resolveRun(io, absolutePath, watchOptions, command);
      if (!run) {
        io.setExitCode(1);
        return;
      }

      io.stderr(chalk.blue(`Watching ${filePath}\n`));
      io.stderr(chalk.gray('Press Ctrl+C to stop\n'));

      const render = () => {
        io.stderr(chalk.gray(`\n[${new Date().toLocaleTimeString()}] Building...\n`));
        const output = runOnce(io, filePath, run, watchOptions.debug);
        if (output !== null) {
          io.stdout(output);
        }
      };

      render();

      const watcher = chokidar.watch(absolutePath, { persistent: true, ignoreInitial: true });

      // Debounce file changes
      let debounceTimer: NodeJS.Timeout | null = null;

      watcher.on('change', () => {
        if (debounceTimer) {
          clearTimeout(debounceTimer);
        }
        debounceTimer = setTimeout(render, WATCH_DEBOUNCE_MS);
      });

      // Handle graceful shutdown
      process.on('SIGINT', () => {
        io.stderr(chalk.blue('\nStopping watch mode...\n'));
        if (debounceTimer) {
          clearTimeout(debounceTimer);
        }
        watcher.close().then(
          () => process.exit(0),
          (error: unknown) => {
            reportError(io, filePath, error);
            process.exit(1);
          }
        );
      });
    });

  // Init command to generate default config file
  program
    .command('init')
    .description(`Generate a default ${CONFIG_FILES[0]} configuration file`)
    .action(() => {
      const configPath = path.join(io.cwd(), CONFIG_FILES[0]);

      if (fs.existsSync(configPath)) {
        io.stderr(chalk.yellow(`Config file already exists: ${configPath}\n`));
        io.stderr(chalk.gray('Delete it first if you want to regenerate.\n'));
        io.setExitCode(1);
        return;
      }

      fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
      io.stderr(chalk.green(`Created ${configPath}\n`));
      io.stderr(chalk.gray('\nConfiguration options:\n'));
      io.stderr(chalk.gray('  format: Output format (text, dot, json)\n'));
      io.stderr(chalk.gray('  typescript: Accept TypeScript syntax\n'));
      io.stderr(chalk.gray('  jsx: Accept JSX syntax\n'));
      io.stderr(chalk.gray('  functions: Only output these functions (empty for all)\n'));
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the matching
 * command. Resolves to the exit code.
 */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
  let exitCode = 0;
  const program = createCli({
    stdout: (text) => io.stdout(text),
    stderr: (text) => io.stderr(text),
    cwd: () => io.cwd(),
    setExitCode: (code) => {
      exitCode = code;
      io.setExitCode(code);
    },
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(chalk.red('Error:'), error);
      process.exitCode = 1;
    }
  );
}
