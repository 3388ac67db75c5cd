/**
 * cfg-prune
 *
 * Builds a block-level control-flow graph for every function of a structured
 * program, prunes it to its canonical form and prints it.
 *
 * @example
 * ```typescript
 * import { generateFromSource, renderProgram } from 'cfg-prune';
 *
 * const { program } = generateFromSource('input.ts', 'function main() { return 0; }');
 * console.log(renderProgram(program));
 * ```
 */

// Generator (main entry point)
export {
  generateFromFile,
  generateFromSource,
  generateProgram,
  formatProgram,
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  type GeneratorOptions,
  type GenerationResult,
  type FunctionReport,
} from './generator';

// Control-flow core
export * from './control-flow';

// Front-end
export {
  parseSource,
  parseSourceFile,
  type ParseOptions,
  type ParsedSource,
  type SourceToken,
} from './parser';
export { lowerProgram, lowerFunction, lowerStatement } from './lowering';
export { buildFunctionCFG, buildGlobals, visitStatement } from './traversal-driver';
export type {
  SourceLocation,
  SourceStatement,
  SimpleStatement,
  SequenceStatement,
  IfStatement,
  WhileStatement,
  ForStatement,
  ReturnStatement,
  SourceFunction,
  SourceProgram,
} from './source-model';

// Configuration
export {
  loadConfig,
  loadConfigWithInfo,
  mergeConfig,
  validateConfig,
  DEFAULT_CONFIG,
  type CfgPruneConfig,
  type LoadConfigResult,
} from './config';

// Errors
export {
  ScopeNestingError,
  CfgLifecycleError,
  SourceLocationError,
  SourceParseError,
  UnsupportedSyntaxError,
} from './errors';
