/**
 * CFG Pruner - normalizes a finished CFG into its canonical, minimal form.
 *
 * Four passes, run once and in order:
 * 1. drop blocks unreachable from block 0
 * 2. elide blocks without statements
 * 3. merge straight-line chains
 * 4. assign dense display indices
 *
 * Pruned blocks are never removed from the table; they lose their id, so
 * every pass still walks the blocks in creation order.
 */

import { CfgLifecycleError } from '../errors';
import { aliveBlocks, blockAt, soleSuccessor } from './cfg-graph';
import type { Block, BlockHandle, CFG, PruneReport } from './cfg-types';

/**
 * Run all four passes. A CFG can only be pruned once.
 */
export function pruneCFG(cfg: CFG): PruneReport {
  if (cfg.state === 'pruned') {
    throw new CfgLifecycleError(cfg.name, 'CFG has already been pruned');
  }

  const created = cfg.table.length;
  const unreachable = removeUnreachableBlocks(cfg);
  const elided = elideEmptyBlocks(cfg);
  const merged = mergeStraightLineBlocks(cfg);
  const surviving = renumberBlocks(cfg);
  cfg.state = 'pruned';

  return { created, unreachable, elided, merged, surviving };
}

/**
 * Pass 1: one ascending sweep from block 0.
 *
 * Apart from loop back edges, every edge leads to a higher id, and a loop
 * header is always reached through the lower-numbered block before it, so
 * a block not yet reached when the sweep gets to it is unreachable.
 */
export function removeUnreachableBlocks(cfg: CFG): number {
  const reached = new Set<BlockHandle>();
  if (cfg.table.length > 0) {
    reached.add(cfg.table[0]);
  }

  let removed = 0;
  for (const handle of cfg.table) {
    const block = blockAt(cfg, handle);
    if (!reached.has(handle)) {
      markDead(block);
      for (const successor of block.successors) {
        blockAt(cfg, successor).predecessors.delete(handle);
      }
      removed++;
      continue;
    }
    for (const successor of block.successors) {
      reached.add(successor);
    }
  }
  return removed;
}

/**
 * Pass 2: bypass every block that holds no statements.
 *
 * Only join points, loop-update placeholders and empty arms can be empty,
 * and each of them has exactly one successor.
 */
export function elideEmptyBlocks(cfg: CFG): number {
  let elided = 0;
  for (const block of aliveBlocks(cfg)) {
    if (block.lines.length > 0) continue;

    const next = soleSuccessor(cfg, block.handle);
    for (const predecessorHandle of block.predecessors) {
      const predecessor = blockAt(cfg, predecessorHandle);
      if (predecessor.thenTarget === block.handle) {
        predecessor.thenTarget = next;
      }
      if (predecessor.elseTarget === block.handle) {
        predecessor.elseTarget = next;
      }
      if (predecessor.loopExit === block.handle) {
        predecessor.loopExit = next;
      }
      predecessor.successors.delete(block.handle);
      for (const successor of block.successors) {
        predecessor.successors.add(successor);
      }
    }
    for (const successorHandle of block.successors) {
      const successor = blockAt(cfg, successorHandle);
      successor.predecessors.delete(block.handle);
      for (const predecessor of block.predecessors) {
        successor.predecessors.add(predecessor);
      }
    }
    markDead(block);
    elided++;
  }
  return elided;
}

/**
 * Pass 3: absorb a successor when it is the block's only successor and the
 * block is its only predecessor. Chains collapse completely in one visit.
 */
export function mergeStraightLineBlocks(cfg: CFG): number {
  let merged = 0;
  for (const handle of cfg.table) {
    const block = blockAt(cfg, handle);
    if (block.id === null) continue;

    while (block.successors.size === 1) {
      const next = blockAt(cfg, soleSuccessor(cfg, handle));
      if (next.kind === 'exit' || next.handle === handle || next.predecessors.size !== 1) break;

      block.lines.push(...next.lines);
      block.successors.delete(next.handle);
      for (const successorHandle of next.successors) {
        const successor = blockAt(cfg, successorHandle);
        successor.predecessors.delete(next.handle);
        successor.predecessors.add(handle);
        block.successors.add(successorHandle);
      }

      block.thenTarget = next.thenTarget;
      block.elseTarget = next.elseTarget;
      block.loopExit = next.loopExit;

      markDead(next);
      merged++;
    }
  }
  return merged;
}

/**
 * Pass 4: number the surviving blocks 0..k-1 in creation order.
 * Returns k.
 */
export function renumberBlocks(cfg: CFG): number {
  cfg.canonicalIndex.clear();
  for (const block of aliveBlocks(cfg)) {
    cfg.canonicalIndex.set(block.handle, cfg.canonicalIndex.size);
  }
  return cfg.canonicalIndex.size;
}

function markDead(block: Block): void {
  block.id = null;
}
