/**
 * Errors raised while turning a source file into pruned CFGs.
 *
 * Construction calls that hit an already-sealed block are not errors: they
 * report failure through their return value and the caller skips the
 * statement.
 */

/**
 * Scopes were not opened and closed in pairs: a reset or close with no scope
 * open, or a finished CFG with scopes left open. Only a traversal driver that
 * breaks the nesting discipline can cause this.
 */
export class ScopeNestingError extends Error {
  constructor(
    readonly operation: string,
    readonly openScopes = 0
  ) {
    super(
      openScopes === 0
        ? `${operation} called with no open scope`
        : `${operation} called with ${openScopes} scope(s) still open`
    );
    this.name = 'ScopeNestingError';
  }
}

/**
 * A CFG was used out of order: pruned twice, or rendered before pruning.
 */
export class CfgLifecycleError extends Error {
  constructor(
    readonly functionName: string,
    message: string
  ) {
    super(`${functionName}: ${message}`);
    this.name = 'CfgLifecycleError';
  }
}

/**
 * Base class for errors that point at a place in the input file.
 */
export abstract class SourceLocationError extends Error {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number
  ) {
    super(message);
  }
}

/**
 * The input is not syntactically valid.
 */
export class SourceParseError extends SourceLocationError {
  constructor(message: string, line: number, column: number) {
    super(message, line, column);
    this.name = 'SourceParseError';
  }
}

/**
 * The input uses a construct outside sequences, if/else, while, for and return.
 */
export class UnsupportedSyntaxError extends SourceLocationError {
  constructor(
    readonly nodeType: string,
    line: number,
    column: number
  ) {
    super(`Unsupported statement: ${nodeType}`, line, column);
    this.name = 'UnsupportedSyntaxError';
  }
}
