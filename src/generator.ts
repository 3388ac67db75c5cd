/**
 * Generator - file to pruned program, and program to output text.
 *
 * @example
 * ```typescript
 * import { generateFromFile, formatProgram } from 'cfg-prune';
 *
 * const { program } = generateFromFile('./input.ts');
 * process.stdout.write(formatProgram(program, 'text'));
 * ```
 */

import { pruneCFG } from './control-flow/cfg-pruner';
import { renderProgram } from './control-flow/cfg-renderer';
import type { CFG, Program, PruneReport } from './control-flow/cfg-types';
import { programToDot, programToJson } from './control-flow/cfg-visualizer';
import { lowerProgram } from './lowering';
import { parseSource, parseSourceFile, type ParseOptions } from './parser';
import type { SourceProgram } from './source-model';
import { buildFunctionCFG, buildGlobals } from './traversal-driver';

export type OutputFormat = 'text' | 'dot' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'dot', 'json'];

export interface GeneratorOptions extends ParseOptions {
  /** Only build these functions (default: all) */
  functions?: string[];
}

export interface FunctionReport {
  name: string;
  report: PruneReport;
}

export interface GenerationResult {
  program: Program;
  reports: FunctionReport[];
}

/**
 * Read, parse and lower a file, then build and prune one CFG per function.
 *
 * @param displayName Name printed in the program header (default: the path as given)
 */
export function generateFromFile(
  filePath: string,
  options: GeneratorOptions = {},
  displayName: string = filePath
): GenerationResult {
  const parsed = parseSourceFile(filePath, options);
  return generateProgram(displayName, lowerProgram(parsed), options);
}

/**
 * Same as generateFromFile, for source text already in memory.
 */
export function generateFromSource(
  sourceFile: string,
  source: string,
  options: GeneratorOptions = {}
): GenerationResult {
  const parsed = parseSource(source, { sourceFilename: sourceFile, ...options });
  return generateProgram(sourceFile, lowerProgram(parsed), options);
}

/**
 * Build and prune the CFGs of a lowered program.
 */
export function generateProgram(
  sourceFile: string,
  source: SourceProgram,
  options: Pick<GeneratorOptions, 'functions'> = {}
): GenerationResult {
  const selected =
    options.functions && options.functions.length > 0 ? new Set(options.functions) : null;

  const functions: CFG[] = [];
  const reports: FunctionReport[] = [];

  for (const fn of source.functions) {
    if (selected && !selected.has(fn.name)) continue;
    const cfg = buildFunctionCFG(fn);
    reports.push({ name: fn.name, report: pruneCFG(cfg) });
    functions.push(cfg);
  }

  return {
    program: { sourceFile, globals: buildGlobals(source.globals), functions },
    reports,
  };
}

export function formatProgram(program: Program, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return renderProgram(program);
    case 'dot':
      return `${programToDot(program)}\n`;
    case 'json':
      return `${JSON.stringify(programToJson(program), null, 2)}\n`;
  }
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}
