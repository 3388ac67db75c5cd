/**
 * Traversal driver - walks the source model of a function and issues the
 * construction calls that build its CFG.
 *
 * Fragments follow one convention throughout: a statement opens with the
 * indent fragment, each token is followed by a space, control keywords are
 * emitted bare, and plain statements close with a newline.
 */

import { GraphBuilder } from './control-flow/cfg-builder';
import { STATEMENT_INDENT } from './control-flow/cfg-renderer';
import type { CFG, Global } from './control-flow/cfg-types';
import type {
  ForStatement,
  IfStatement,
  SourceFunction,
  SourceStatement,
  WhileStatement,
} from './source-model';

/**
 * Build the (unpruned) CFG of one function.
 */
export function buildFunctionCFG(fn: SourceFunction): CFG {
  const builder = new GraphBuilder(fn.name, {
    returnType: tokenFragments(fn.returnType),
    parameters: tokenFragments(fn.parameters),
  });
  visitStatement(builder, fn.body);
  return builder.finish();
}

/**
 * Collect file-scope statements, one line each.
 */
export function buildGlobals(statements: string[][]): Global {
  const lines: string[] = [];
  for (const tokens of statements) {
    lines.push(STATEMENT_INDENT, ...tokenFragments(tokens), '\n');
  }
  return { lines };
}

export function tokenFragments(tokens: string[]): string[] {
  return tokens.map((token) => `${token} `);
}

/**
 * Dispatch on the statement kind.
 */
export function visitStatement(builder: GraphBuilder, statement: SourceStatement): void {
  switch (statement.kind) {
    case 'simple':
      appendStatement(builder, statement.tokens);
      return;

    case 'sequence':
      for (const child of statement.body) {
        visitStatement(builder, child);
      }
      return;

    case 'if':
      visitIf(builder, statement);
      return;

    case 'while':
      visitWhile(builder, statement);
      return;

    case 'for':
      visitFor(builder, statement);
      return;

    case 'return':
      appendStatement(builder, statement.tokens);
      builder.sealToExit();
      return;
  }
}

function visitIf(builder: GraphBuilder, statement: IfStatement): void {
  appendHeader(builder, 'if', ['( ', ...tokenFragments(statement.condition), ') ']);

  builder.withBranchScope(() => {
    builder.resetToScopeStart();
    const branchPoint = builder.currentHandle;

    builder.advance();
    builder.recordThenTarget(branchPoint);
    visitStatement(builder, statement.consequent);

    builder.resetToScopeStart();
    builder.advance();
    builder.recordElseTarget(branchPoint);
    if (statement.alternate) {
      visitStatement(builder, statement.alternate);
    }
  });
}

function visitWhile(builder: GraphBuilder, statement: WhileStatement): void {
  const resumed = builder.withLoopScope(() => {
    appendHeader(builder, 'while', ['( ', ...tokenFragments(statement.condition), ') ']);
    builder.advance();
    visitStatement(builder, statement.body);
  });
  if (!resumed) return;

  recordLoopExit(builder);
}

function visitFor(builder: GraphBuilder, statement: ForStatement): void {
  if (statement.init) {
    appendClause(builder, statement.init);
  }

  const resumed = builder.withLoopScope(() => {
    appendHeader(builder, 'for', [
      '( ',
      '; ',
      ...tokenFragments(statement.condition),
      '; ',
      ') ',
    ]);
    builder.advance();

    // The update runs after the body: it goes in a block spliced between
    // the body entry and the header, and the body is then built in front of it.
    builder.withBranchScope(() => {
      if (statement.update) {
        appendClause(builder, statement.update);
      }
      builder.resetToScopeStart();
      visitStatement(builder, statement.body);
    });
  });
  if (!resumed) return;

  recordLoopExit(builder);
}

function recordLoopExit(builder: GraphBuilder): void {
  const header = builder.currentHandle;
  builder.advance();
  builder.recordLoopExit(header);
}

function appendStatement(builder: GraphBuilder, tokens: string[]): void {
  appendAll(builder, [STATEMENT_INDENT, ...tokenFragments(tokens), '\n']);
}

/**
 * A `for` init or update clause, written as a statement of its own.
 */
function appendClause(builder: GraphBuilder, tokens: string[]): void {
  appendAll(builder, [STATEMENT_INDENT, ...tokenFragments(tokens), '; ', '\n']);
}

function appendHeader(builder: GraphBuilder, keyword: string, rest: string[]): void {
  appendAll(builder, [STATEMENT_INDENT, keyword, ...rest]);
}

function appendAll(builder: GraphBuilder, fragments: string[]): void {
  for (const fragment of fragments) {
    builder.appendLine(fragment);
  }
}
