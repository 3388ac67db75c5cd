/**
 * Lowering - turns a Babel AST into the source model.
 *
 * Top-level function declarations become functions; every other top-level
 * statement is kept as a global. Inside a function only sequences, if/else,
 * while, for, return and plain statements are accepted.
 */

import * as t from '@babel/types';
import { UnsupportedSyntaxError } from './errors';
import { nodeTokens, tokensBetween, type ParsedSource } from './parser';
import type {
  SequenceStatement,
  SourceFunction,
  SourceLocation,
  SourceProgram,
  SourceStatement,
} from './source-model';

export function lowerProgram(parsed: ParsedSource): SourceProgram {
  const program = parsed.ast.program;
  const globals: string[][] = program.directives.map((directive) => nodeTokens(parsed, directive));
  const functions: SourceFunction[] = [];

  for (const statement of program.body) {
    const declaration = functionDeclarationOf(statement);
    if (declaration) {
      functions.push(lowerFunction(parsed, declaration));
    } else {
      globals.push(nodeTokens(parsed, statement));
    }
  }

  return { globals, functions };
}

/**
 * The function declared by a top-level statement, looking through `export`.
 */
function functionDeclarationOf(statement: t.Statement): t.FunctionDeclaration | null {
  if (t.isFunctionDeclaration(statement)) return statement;
  if (
    (t.isExportNamedDeclaration(statement) || t.isExportDefaultDeclaration(statement)) &&
    t.isFunctionDeclaration(statement.declaration)
  ) {
    return statement.declaration;
  }
  return null;
}

export function lowerFunction(parsed: ParsedSource, fn: t.FunctionDeclaration): SourceFunction {
  return {
    name: fn.id?.name ?? 'default',
    returnType: returnTypeTokens(parsed, fn),
    parameters: parameterTokens(parsed, fn),
    body: lowerBlock(parsed, fn.body),
    loc: locationOf(fn),
  };
}

function returnTypeTokens(parsed: ParsedSource, fn: t.FunctionDeclaration): string[] {
  const annotation = fn.returnType;
  if (t.isTSTypeAnnotation(annotation) || t.isTypeAnnotation(annotation)) {
    return nodeTokens(parsed, annotation.typeAnnotation);
  }
  return [];
}

function parameterTokens(parsed: ParsedSource, fn: t.FunctionDeclaration): string[] {
  if (fn.params.length === 0) return [];
  const first = fn.params[0];
  const last = fn.params[fn.params.length - 1];
  if (first.start == null || last.end == null) return [];
  return tokensBetween(parsed, first.start, last.end);
}

function lowerBlock(parsed: ParsedSource, block: t.BlockStatement): SequenceStatement {
  return {
    kind: 'sequence',
    body: block.body.map((statement) => lowerStatement(parsed, statement)),
    loc: locationOf(block),
  };
}

/**
 * Lower one statement of a function body.
 */
export function lowerStatement(parsed: ParsedSource, statement: t.Statement): SourceStatement {
  const loc = locationOf(statement);

  switch (statement.type) {
    case 'BlockStatement':
      return lowerBlock(parsed, statement);

    case 'VariableDeclaration':
    case 'ExpressionStatement':
    case 'EmptyStatement':
    case 'DebuggerStatement':
      return { kind: 'simple', tokens: nodeTokens(parsed, statement), loc };

    case 'IfStatement':
      return {
        kind: 'if',
        condition: nodeTokens(parsed, statement.test),
        consequent: lowerStatement(parsed, statement.consequent),
        alternate: statement.alternate ? lowerStatement(parsed, statement.alternate) : null,
        loc,
      };

    case 'WhileStatement':
      return {
        kind: 'while',
        condition: nodeTokens(parsed, statement.test),
        body: lowerStatement(parsed, statement.body),
        loc,
      };

    case 'ForStatement':
      return {
        kind: 'for',
        init: statement.init ? nodeTokens(parsed, statement.init) : null,
        condition: statement.test ? nodeTokens(parsed, statement.test) : [],
        update: statement.update ? nodeTokens(parsed, statement.update) : null,
        body: lowerStatement(parsed, statement.body),
        loc,
      };

    case 'ReturnStatement':
      return { kind: 'return', tokens: nodeTokens(parsed, statement), loc };

    default:
      throw new UnsupportedSyntaxError(statement.type, loc?.line ?? 0, loc?.column ?? 0);
  }
}

function locationOf(node: t.Node): SourceLocation | undefined {
  const start = node.loc?.start;
  return start ? { line: start.line, column: start.column } : undefined;
}
