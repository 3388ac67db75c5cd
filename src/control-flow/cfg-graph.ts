/**
 * Arena and edge primitives shared by the builder, the pruner and the
 * renderers. Every edge update touches both endpoints so predecessor and
 * successor sets stay mirror images of each other.
 */

import type { Block, BlockHandle, BlockKind, CFG } from './cfg-types';

/**
 * Create an empty CFG holding only its entry and exit blocks.
 */
export function createCFG(name: string, returnType: string[] = [], parameters: string[] = []): CFG {
  const cfg: CFG = {
    name,
    returnType,
    parameters,
    arena: [],
    entry: 0,
    exit: 0,
    table: [],
    canonicalIndex: new Map(),
    state: 'building',
  };
  cfg.entry = allocateBlock(cfg, 'entry');
  cfg.exit = allocateBlock(cfg, 'exit');
  return cfg;
}

/**
 * Add a block to the arena. Body blocks start anonymous.
 */
export function allocateBlock(cfg: CFG, kind: BlockKind): BlockHandle {
  const handle = cfg.arena.length;
  cfg.arena.push({
    handle,
    kind,
    id: null,
    lines: [],
    sealed: false,
    predecessors: new Set(),
    successors: new Set(),
    thenTarget: null,
    elseTarget: null,
    loopExit: null,
  });
  return handle;
}

/**
 * Give an anonymous body block the next creation-order id.
 */
export function registerBlock(cfg: CFG, handle: BlockHandle): number {
  const id = cfg.table.length;
  cfg.table.push(handle);
  blockAt(cfg, handle).id = id;
  return id;
}

export function blockAt(cfg: CFG, handle: BlockHandle): Block {
  const block = cfg.arena[handle];
  if (!block) {
    throw new RangeError(`${cfg.name}: no block with handle ${handle}`);
  }
  return block;
}

export function connect(cfg: CFG, from: BlockHandle, to: BlockHandle): void {
  blockAt(cfg, from).successors.add(to);
  blockAt(cfg, to).predecessors.add(from);
}

export function disconnect(cfg: CFG, from: BlockHandle, to: BlockHandle): void {
  blockAt(cfg, from).successors.delete(to);
  blockAt(cfg, to).predecessors.delete(from);
}

/**
 * Entry and exit are always alive; a body block is alive while it has an id.
 */
export function isAlive(block: Block): boolean {
  return block.kind !== 'body' || block.id !== null;
}

/**
 * The one successor of a block known to have exactly one.
 */
export function soleSuccessor(cfg: CFG, handle: BlockHandle): BlockHandle {
  const block = blockAt(cfg, handle);
  for (const successor of block.successors) {
    return successor;
  }
  throw new RangeError(`${cfg.name}: block ${block.id ?? handle} has no successor`);
}

/**
 * Body blocks still alive, in creation order.
 */
export function aliveBlocks(cfg: CFG): Block[] {
  return cfg.table.map((handle) => blockAt(cfg, handle)).filter(isAlive);
}
