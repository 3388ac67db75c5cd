/**
 * Control Flow Graph module for block-level CFGs of structured code.
 *
 * This module provides:
 * - Incremental CFG construction during a traversal
 * - The four pruning passes
 * - Canonical text rendering
 * - DOT/JSON output and statistics
 */

// Types
export type {
  Block,
  BlockHandle,
  BlockKind,
  CFG,
  CFGState,
  Global,
  Program,
  PruneReport,
} from './cfg-types';

// Graph primitives
export { aliveBlocks, blockAt, createCFG, isAlive } from './cfg-graph';

// Builder
export { GraphBuilder, type FunctionSignature } from './cfg-builder';

// Pruner
export {
  pruneCFG,
  removeUnreachableBlocks,
  elideEmptyBlocks,
  mergeStraightLineBlocks,
  renumberBlocks,
} from './cfg-pruner';

// Renderer
export {
  renderProgram,
  renderGlobals,
  renderCFG,
  blockLabel,
  sortedLabels,
  STATEMENT_INDENT,
} from './cfg-renderer';

// Visualizer
export {
  programToDot,
  programToJson,
  cfgToJson,
  cfgStats,
  type DotOptions,
  type BlockJson,
  type CFGJson,
  type ProgramJson,
} from './cfg-visualizer';
