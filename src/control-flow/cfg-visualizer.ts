/**
 * CFG Visualizer - DOT and JSON output for pruned CFGs, plus statistics.
 *
 * The DOT format can be rendered using Graphviz (https://graphviz.org/).
 *
 * Usage:
 *   const dot = programToDot(program);
 *   console.log(dot);  // Copy to Graphviz
 */

import { aliveBlocks, blockAt } from './cfg-graph';
import { blockLabel, sortedLabels } from './cfg-renderer';
import type { Block, CFG, Program } from './cfg-types';

/**
 * Options for DOT generation.
 */
export interface DotOptions {
  /** Title for the graph (defaults to the source file) */
  title?: string;

  /** Use left-to-right layout instead of top-to-bottom */
  leftToRight?: boolean;

  /** Include statement text in node labels */
  showLines?: boolean;
}

/**
 * One block of a pruned CFG, as plain data.
 */
export interface BlockJson {
  name: string;
  lines: string[];
  predecessors: string[];
  successors: string[];
  then: string | null;
  else: string | null;
  loopEnd: string | null;
}

export interface CFGJson {
  name: string;
  returnType: string[];
  parameters: string[];
  blocks: BlockJson[];
}

export interface ProgramJson {
  program: string;
  globals: string[];
  functions: CFGJson[];
}

/**
 * Convert a pruned program to DOT format, one cluster per function.
 */
export function programToDot(program: Program, options: DotOptions = {}): string {
  const { title = program.sourceFile, leftToRight = false, showLines = true } = options;

  const lines: string[] = [];

  // Graph header
  lines.push('digraph CFG {');
  lines.push(`  label="${escapeLabel(title)}";`);
  lines.push('  labelloc="t";');
  lines.push('  fontsize=16;');
  lines.push(`  rankdir="${leftToRight ? 'LR' : 'TB'}";`);
  lines.push('  node [fontname="monospace", fontsize=10];');
  lines.push('  edge [fontname="monospace", fontsize=9];');

  program.functions.forEach((cfg, index) => {
    lines.push('');
    lines.push(...cfgToDotCluster(cfg, index, showLines));
  });

  lines.push('}');

  return lines.join('\n');
}

function cfgToDotCluster(cfg: CFG, index: number, showLines: boolean): string[] {
  const lines: string[] = [];
  const blocks = graphBlocks(cfg);

  lines.push(`  subgraph cluster_${index} {`);
  lines.push(`    label="${escapeLabel(cfg.name)}";`);

  // Generate nodes
  for (const block of blocks) {
    const name = blockLabel(cfg, block);
    if (name === null) continue;
    const text = block.lines.join('').trim();
    const label = showLines && text.length > 0 ? `${name}\n${text}` : name;
    lines.push(`    "${name}" [label="${escapeLabel(label)}"${getNodeAttributes(block)}];`);
  }

  // Generate edges
  for (const block of blocks) {
    const from = blockLabel(cfg, block);
    if (from === null) continue;

    for (const successorHandle of block.successors) {
      const successor = blockAt(cfg, successorHandle);
      const to = blockLabel(cfg, successor);
      if (to === null) continue;
      lines.push(`    "${from}" -> "${to}"${getEdgeAttributes(block, successor)};`);
    }
  }

  lines.push('  }');
  return lines;
}

/**
 * Entry, live body blocks in display order, exit.
 */
function graphBlocks(cfg: CFG): Block[] {
  return [blockAt(cfg, cfg.entry), ...aliveBlocks(cfg), blockAt(cfg, cfg.exit)];
}

/**
 * Get DOT attributes for a node based on its role.
 */
function getNodeAttributes(block: Block): string {
  const attrs: string[] = [];

  if (block.kind !== 'body') {
    attrs.push('shape=ellipse');
    attrs.push(`fillcolor="${block.kind === 'entry' ? '#90EE90' : '#FFB6C1'}"`);
    attrs.push('style=filled');
  } else if (block.thenTarget !== null || block.loopExit !== null) {
    attrs.push('shape=box');
    attrs.push('fillcolor="#87CEEB"'); // Sky blue
    attrs.push('style=filled');
  } else if (block.sealed) {
    attrs.push('shape=box');
    attrs.push('fillcolor="#DDA0DD"'); // Plum
    attrs.push('style=filled');
  } else {
    attrs.push('shape=box');
  }

  return `, ${attrs.join(', ')}`;
}

/**
 * Get DOT attributes for an edge.
 */
function getEdgeAttributes(from: Block, to: Block): string {
  const attrs: string[] = [];

  if (from.thenTarget === to.handle) {
    attrs.push('label="then"');
    attrs.push('color="#228B22"'); // Forest green
  } else if (from.elseTarget === to.handle) {
    attrs.push('label="else"');
    attrs.push('color="#DC143C"'); // Crimson
  } else if (from.loopExit === to.handle) {
    attrs.push('label="loop_end"');
  }

  // Back edges (loops)
  if (to.kind === 'body' && from.kind === 'body' && to.id !== null && from.id !== null && to.id <= from.id) {
    attrs.push('style=dashed');
    attrs.push('constraint=false');
  }

  return attrs.length > 0 ? ` [${attrs.join(', ')}]` : '';
}

/**
 * Escape special characters for DOT labels.
 */
function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Plain-data form of a pruned program.
 */
export function programToJson(program: Program): ProgramJson {
  return {
    program: program.sourceFile,
    globals: [...program.globals.lines],
    functions: program.functions.map(cfgToJson),
  };
}

export function cfgToJson(cfg: CFG): CFGJson {
  const blocks: BlockJson[] = [];
  for (const block of graphBlocks(cfg)) {
    const name = blockLabel(cfg, block);
    if (name === null) continue;
    blocks.push({
      name,
      lines: [...block.lines],
      predecessors: sortedLabels(cfg, block.predecessors),
      successors: sortedLabels(cfg, block.successors),
      then: targetName(cfg, block.thenTarget),
      else: targetName(cfg, block.elseTarget),
      loopEnd: targetName(cfg, block.loopExit),
    });
  }

  return {
    name: cfg.name,
    returnType: [...cfg.returnType],
    parameters: [...cfg.parameters],
    blocks,
  };
}

function targetName(cfg: CFG, handle: number | null): string | null {
  return handle === null ? null : blockLabel(cfg, blockAt(cfg, handle));
}

/**
 * Print CFG statistics.
 */
export function cfgStats(cfg: CFG): string {
  const blocks = aliveBlocks(cfg);
  let edges = 0;
  let branchPoints = 0;
  let loopHeaders = 0;
  let returns = 0;

  for (const block of graphBlocks(cfg)) {
    edges += sortedLabels(cfg, block.successors).length;
  }
  for (const block of blocks) {
    if (block.thenTarget !== null) branchPoints++;
    if (block.loopExit !== null) loopHeaders++;
    if (block.sealed) returns++;
  }

  return [
    `CFG Statistics (${cfg.name}):`,
    `  Blocks: ${blocks.length}`,
    `  Edges: ${edges}`,
    `  Branch points: ${branchPoints}`,
    `  Loop headers: ${loopHeaders}`,
    `  Returning blocks: ${returns}`,
  ].join('\n');
}
