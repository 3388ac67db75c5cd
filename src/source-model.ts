/**
 * Source model - the structured program as the CFG driver sees it.
 *
 * The set of constructs is closed: every function body is made of these six
 * statement kinds. Text is kept as the raw token list of each piece; the
 * driver decides how tokens become statement fragments.
 */

/**
 * Where a statement starts in the input file (1-based line, 0-based column).
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * A statement with no control flow of its own: declaration, expression,
 * empty statement.
 */
export interface SimpleStatement {
  kind: 'simple';
  tokens: string[];
  loc?: SourceLocation;
}

export interface SequenceStatement {
  kind: 'sequence';
  body: SourceStatement[];
  loc?: SourceLocation;
}

export interface IfStatement {
  kind: 'if';
  condition: string[];
  consequent: SourceStatement;
  alternate: SourceStatement | null;
  loc?: SourceLocation;
}

export interface WhileStatement {
  kind: 'while';
  condition: string[];
  body: SourceStatement;
  loc?: SourceLocation;
}

export interface ForStatement {
  kind: 'for';
  /** null when the init clause is empty */
  init: string[] | null;
  /** Empty when the test clause is empty */
  condition: string[];
  /** null when the update clause is empty */
  update: string[] | null;
  body: SourceStatement;
  loc?: SourceLocation;
}

export interface ReturnStatement {
  kind: 'return';
  /** The whole statement, `return` keyword included */
  tokens: string[];
  loc?: SourceLocation;
}

export type SourceStatement =
  | SimpleStatement
  | SequenceStatement
  | IfStatement
  | WhileStatement
  | ForStatement
  | ReturnStatement;

/**
 * One function to build a CFG for.
 */
export interface SourceFunction {
  name: string;
  returnType: string[];
  parameters: string[];
  body: SequenceStatement;
  loc?: SourceLocation;
}

/**
 * A whole input file: file-scope statements plus functions, in source order.
 */
export interface SourceProgram {
  /** Token list of each file-scope statement */
  globals: string[][];
  functions: SourceFunction[];
}
