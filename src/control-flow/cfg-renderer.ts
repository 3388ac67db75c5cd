/**
 * CFG Renderer - the canonical text form of a pruned program.
 *
 * Each block is one stanza:
 *
 *   @main_B0 {
 *       x = 1 ;
 *   }
 *   Predecessors: main_entry
 *   Successors: main_exit
 *
 * Statement fragments are printed verbatim; the renderer only looks at the
 * bare `if`/`while`/`for` keyword fragments and the indent fragment to place
 * the then/else/loop_end annotations and the `{ }` placeholder.
 */

import { CfgLifecycleError } from '../errors';
import { aliveBlocks, blockAt, isAlive } from './cfg-graph';
import type { Block, BlockHandle, CFG, Global, Program } from './cfg-types';

/** Indent fragment that opens every statement */
export const STATEMENT_INDENT = '    ';

const CONTROL_KEYWORDS = new Set(['if', 'while', 'for']);

/**
 * Render the whole program: header line, globals, then every function.
 */
export function renderProgram(program: Program): string {
  let output = `/*--- program: ${program.sourceFile} ---*/\n`;
  output += renderGlobals(program.globals);
  for (const cfg of program.functions) {
    output += renderCFG(cfg);
  }
  return output;
}

/**
 * Render the globals stanza; empty when there are no globals.
 */
export function renderGlobals(globals: Global): string {
  if (globals.lines.length === 0) return '';
  return `@Globals {\n${globals.lines.join('')}}\n` + 'Predecessors: -\nSuccessors: -\n\n';
}

/**
 * Render one pruned CFG: entry, numbered blocks in display order, exit.
 */
export function renderCFG(cfg: CFG): string {
  if (cfg.state !== 'pruned') {
    throw new CfgLifecycleError(cfg.name, 'CFG must be pruned before it is rendered');
  }

  const entry = blockAt(cfg, cfg.entry);
  let output = `@${blockLabel(cfg, entry)} {\n`;
  output += `   name: ${cfg.name}\n`;
  output += `   ret_type: ${cfg.returnType.join('')}\n`;
  output += `   args: ${joinTokens(cfg.parameters)}\n`;
  output += '}\n';
  output += renderNeighbors(cfg, entry);

  for (const block of aliveBlocks(cfg)) {
    output += renderBlock(cfg, block);
  }
  output += renderBlock(cfg, blockAt(cfg, cfg.exit));
  return output;
}

/**
 * Display name of a block, e.g. `main_entry` or `main_B3`.
 * null for a block removed by pruning.
 */
export function blockLabel(cfg: CFG, block: Block): string | null {
  switch (block.kind) {
    case 'entry':
      return `${cfg.name}_entry`;
    case 'exit':
      return `${cfg.name}_exit`;
    case 'body': {
      const index = cfg.canonicalIndex.get(block.handle);
      if (block.id === null || index === undefined) return null;
      return `${cfg.name}_B${index}`;
    }
  }
}

/**
 * Labels of the live blocks among `handles`: numbered blocks first, in id
 * order, then entry/exit alphabetically.
 */
export function sortedLabels(cfg: CFG, handles: Iterable<BlockHandle>): string[] {
  return [...handles]
    .map((handle) => blockAt(cfg, handle))
    .filter(isAlive)
    .sort(compareBlocks)
    .map((block) => blockLabel(cfg, block))
    .filter((label): label is string => label !== null);
}

function compareBlocks(a: Block, b: Block): number {
  if (a.id !== null && b.id !== null) return a.id - b.id;
  if (a.id !== null) return -1;
  if (b.id !== null) return 1;
  return a.kind.localeCompare(b.kind);
}

function renderBlock(cfg: CFG, block: Block): string {
  const label = blockLabel(cfg, block);
  if (label === null) return '';
  return `@${label} {\n${renderBlockBody(cfg, block)}}\n${renderNeighbors(cfg, block)}`;
}

/**
 * Statement fragments plus annotations.
 *
 * Only the last control keyword in a block gets an annotation: an earlier
 * `if` can only survive inside a merged block when both of its arms were
 * elided, so it is printed with the `{ }` placeholder instead.
 */
function renderBlockBody(cfg: CFG, block: Block): string {
  const thenLabel = targetLabel(cfg, block.thenTarget);
  const loopExitLabel = targetLabel(cfg, block.loopExit);

  let remainingKeywords = block.lines.filter((line) => CONTROL_KEYWORDS.has(line)).length;
  let annotated = false;
  let placeholderPending = false;
  let annotationWidth = STATEMENT_INDENT.length;
  let output = '';

  for (const line of block.lines) {
    if (CONTROL_KEYWORDS.has(line)) {
      remainingKeywords--;
      if (remainingKeywords === 0) {
        annotated = line === 'if' ? thenLabel !== null : true;
      }
    }

    if (line === 'if' && !annotated) {
      placeholderPending = true;
    }
    if (placeholderPending && line === STATEMENT_INDENT) {
      output += '{ }\n';
      placeholderPending = false;
    }

    output += line;
    if (annotated) annotationWidth += line.length;
  }

  if (placeholderPending) {
    output += '{ }\n';
  }

  if (thenLabel !== null) {
    annotationWidth += STATEMENT_INDENT.length;
    const elseLabel = targetLabel(cfg, block.elseTarget) ?? '-';
    output += `${STATEMENT_INDENT}# then: ${thenLabel}\n`;
    output += `${' '.repeat(annotationWidth)}# else: ${elseLabel}\n`;
  } else if (loopExitLabel !== null) {
    output += `${STATEMENT_INDENT}# loop_end: ${loopExitLabel}\n`;
  }

  return output;
}

function targetLabel(cfg: CFG, handle: BlockHandle | null): string | null {
  if (handle === null) return null;
  return blockLabel(cfg, blockAt(cfg, handle));
}

function renderNeighbors(cfg: CFG, block: Block): string {
  return (
    `Predecessors: ${joinLabels(sortedLabels(cfg, block.predecessors))}\n` +
    `Successors: ${joinLabels(sortedLabels(cfg, block.successors))}\n\n`
  );
}

function joinLabels(labels: string[]): string {
  return labels.length > 0 ? labels.join(', ') : '-';
}

function joinTokens(tokens: string[]): string {
  return tokens.length > 0 ? tokens.join('') : '-';
}
