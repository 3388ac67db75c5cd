/**
 * CFG Builder - grows a CFG while the function body is being traversed.
 *
 * The builder keeps one open fallthrough edge, from the current block to the
 * end of the innermost open scope (or to exit when no scope is open). Every
 * new block is spliced into that edge:
 *
 *   current -> end    becomes    current -> block -> end
 *
 * and then becomes the current block. Sequencing, branch arms and loop bodies
 * are all built this way, which keeps the graph reducible: apart from loop
 * back edges, every edge points at a block created later.
 */

import { ScopeNestingError } from '../errors';
import {
  allocateBlock,
  blockAt,
  connect,
  createCFG,
  disconnect,
  registerBlock,
} from './cfg-graph';
import type { Block, BlockHandle, CFG } from './cfg-types';

/**
 * Tokens of a function's signature, as shown in the entry stanza.
 */
export interface FunctionSignature {
  returnType?: string[];
  parameters?: string[];
}

/**
 * Build a CFG for one function.
 *
 * Owns the current block and the two parallel scope stacks:
 * - segmentStart: where a scope began (branch point or loop header)
 * - segmentEnd: where its fallthrough leads (join point or loop header)
 */
export class GraphBuilder {
  readonly cfg: CFG;
  private current: BlockHandle;
  private readonly segmentStart: BlockHandle[] = [];
  private readonly segmentEnd: BlockHandle[] = [];

  constructor(functionName: string, signature: FunctionSignature = {}) {
    this.cfg = createCFG(functionName, signature.returnType, signature.parameters);
    this.current = this.cfg.entry;
    connect(this.cfg, this.cfg.entry, this.cfg.exit);
    this.advance();
  }

  get currentHandle(): BlockHandle {
    return this.current;
  }

  get currentBlock(): Block {
    return blockAt(this.cfg, this.current);
  }

  /**
   * Number of scopes currently open.
   */
  get depth(): number {
    return this.segmentEnd.length;
  }

  /**
   * Append a statement fragment to the current block.
   * Returns false when the block is sealed and the fragment was dropped.
   */
  appendLine(text: string): boolean {
    const block = this.currentBlock;
    if (block.sealed) return false;
    block.lines.push(text);
    return true;
  }

  /**
   * Splice a new numbered block into the fallthrough edge.
   */
  advance(): boolean {
    if (this.splice() === null) return false;
    registerBlock(this.cfg, this.current);
    return true;
  }

  /**
   * Start a loop: the new header is both the scope's start and the target
   * its body falls back to.
   */
  openLoopScope(): boolean {
    if (!this.advance()) return false;
    this.segmentStart.push(this.current);
    this.segmentEnd.push(this.current);
    return true;
  }

  /**
   * Start a branch: splice in an anonymous join block. The block spliced out
   * becomes the scope start; the join block stays nameless until the scope
   * closes.
   */
  openBranchScope(): boolean {
    const branchPoint = this.splice();
    if (branchPoint === null) return false;
    this.segmentStart.push(branchPoint);
    this.segmentEnd.push(this.current);
    return true;
  }

  /**
   * Go back to the start of the innermost scope, e.g. before building the
   * second arm of an `if`.
   */
  resetToScopeStart(): void {
    if (this.segmentStart.length === 0) {
      throw new ScopeNestingError('resetToScopeStart');
    }
    this.current = this.segmentStart[this.segmentStart.length - 1];
  }

  /**
   * Leave the innermost scope and resume at its end block, numbering it if it
   * is still anonymous. Returns false when that block is sealed.
   */
  closeScope(): boolean {
    const end = this.segmentEnd.pop();
    const start = this.segmentStart.pop();
    if (end === undefined || start === undefined) {
      throw new ScopeNestingError('closeScope');
    }

    this.current = end;
    const block = this.currentBlock;
    if (block.id === null) {
      registerBlock(this.cfg, end);
    }
    return !block.sealed;
  }

  /**
   * Terminate the current block with a `return`: its only successor becomes
   * exit and it accepts nothing further.
   */
  sealToExit(): void {
    const block = this.currentBlock;
    for (const successor of [...block.successors]) {
      disconnect(this.cfg, this.current, successor);
    }
    connect(this.cfg, this.current, this.cfg.exit);
    block.sealed = true;
  }

  /**
   * Open a branch scope, run `body`, and close the scope again whatever
   * happens inside. Returns false, without running `body`, when the current
   * block is sealed.
   */
  withBranchScope(body: () => void): boolean {
    if (!this.openBranchScope()) return false;
    try {
      body();
    } finally {
      this.closeScope();
    }
    return true;
  }

  /**
   * Open a loop scope, run `body`, and close it. Returns false when the loop
   * could not be opened or its header is sealed after closing.
   */
  withLoopScope(body: () => void): boolean {
    if (!this.openLoopScope()) return false;
    let resumed = false;
    try {
      body();
    } finally {
      resumed = this.closeScope();
    }
    return resumed;
  }

  recordThenTarget(branchPoint: BlockHandle): void {
    blockAt(this.cfg, branchPoint).thenTarget = this.current;
  }

  recordElseTarget(branchPoint: BlockHandle): void {
    blockAt(this.cfg, branchPoint).elseTarget = this.current;
  }

  recordLoopExit(header: BlockHandle): void {
    blockAt(this.cfg, header).loopExit = this.current;
  }

  /**
   * Hand over the finished CFG. Every scope must have been closed.
   */
  finish(): CFG {
    if (this.depth > 0) {
      throw new ScopeNestingError('finish', this.depth);
    }
    return this.cfg;
  }

  private fallthroughTarget(): BlockHandle {
    if (this.segmentEnd.length === 0) return this.cfg.exit;
    return this.segmentEnd[this.segmentEnd.length - 1];
  }

  /**
   * Replace current -> end with current -> block -> end and move to the new
   * anonymous block. Returns the block spliced out, or null when the current
   * block is sealed.
   */
  private splice(): BlockHandle | null {
    if (this.currentBlock.sealed) return null;

    const previous = this.current;
    const end = this.fallthroughTarget();
    const block = allocateBlock(this.cfg, 'body');

    disconnect(this.cfg, previous, end);
    connect(this.cfg, previous, block);
    connect(this.cfg, block, end);

    this.current = block;
    return previous;
  }
}
