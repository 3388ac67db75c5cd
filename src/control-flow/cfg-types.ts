/**
 * Control Flow Graph (CFG) types for the block-level graph of a function.
 *
 * Blocks live in an arena owned by their CFG and refer to each other only
 * through integer handles, so the cyclic predecessor/successor structure of
 * loops needs no owning references.
 */

/**
 * Stable handle of a block: its index in the owning CFG's arena.
 */
export type BlockHandle = number;

/**
 * Role of a block inside its CFG.
 */
export type BlockKind =
  | 'entry' // Function entry (no predecessors)
  | 'exit' // Function exit (no successors)
  | 'body'; // Everything in between

/**
 * A basic block of the CFG.
 */
export interface Block {
  /** Position of this block in the arena */
  readonly handle: BlockHandle;

  readonly kind: BlockKind;

  /**
   * Dense creation-order id for body blocks.
   * null while the block is still anonymous (an unclosed join point) and
   * again once pruning has removed it.
   */
  id: number | null;

  /** Opaque statement fragments, in emission order */
  lines: string[];

  /** Set by a `return`: nothing more is appended and the only successor is exit */
  sealed: boolean;

  /** Insertion-ordered; an edge exists once or not at all */
  predecessors: Set<BlockHandle>;

  successors: Set<BlockHandle>;

  /** For a block ending in an `if`: first block of the then-arm */
  thenTarget: BlockHandle | null;

  /** For a block ending in an `if`: first block of the else-arm */
  elseTarget: BlockHandle | null;

  /** For a loop header: the block control reaches when the loop ends */
  loopExit: BlockHandle | null;
}

/**
 * Lifecycle of a CFG. Pruning happens exactly once, between building and
 * rendering.
 */
export type CFGState = 'building' | 'pruned';

/**
 * A complete Control Flow Graph for one function.
 */
export interface CFG {
  /** Function name, used as the prefix of every block label */
  name: string;

  /** Return type tokens */
  returnType: string[];

  /** Parameter list tokens */
  parameters: string[];

  /** Every block ever created, indexed by handle */
  arena: Block[];

  entry: BlockHandle;

  exit: BlockHandle;

  /**
   * Body blocks keyed by creation-order id (the array index).
   * Pruned blocks stay in place so later passes keep the original order.
   */
  table: BlockHandle[];

  /** Display index of each surviving body block, filled by renumbering */
  canonicalIndex: Map<BlockHandle, number>;

  state: CFGState;
}

/**
 * File-scope declarations. No graph structure.
 */
export interface Global {
  lines: string[];
}

/**
 * Everything produced for one input file.
 */
export interface Program {
  /** Shown in the leading `program:` line */
  sourceFile: string;

  globals: Global;

  /** One CFG per function, in traversal order */
  functions: CFG[];
}

/**
 * What each pruning pass removed from a CFG.
 */
export interface PruneReport {
  /** Body blocks present before pruning */
  created: number;

  unreachable: number;

  elided: number;

  merged: number;

  /** Body blocks left after pruning */
  surviving: number;
}
