import * as parser from '@babel/parser';
import type { ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';
import * as fs from 'fs';
import { SourceParseError } from './errors';

export interface ParseOptions {
  /** Accept TypeScript syntax (default: true) */
  typescript?: boolean;
  /** Accept JSX syntax (default: false) */
  jsx?: boolean;
  /** Reported in Babel's error messages */
  sourceFilename?: string;
}

/**
 * A non-empty token and its exact source text.
 */
export interface SourceToken {
  start: number;
  end: number;
  text: string;
}

export interface ParsedSource {
  ast: t.File;
  source: string;
  /** Code tokens in source order; comments excluded */
  tokens: SourceToken[];
}

export function parseSourceFile(filePath: string, options: ParseOptions = {}): ParsedSource {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseSource(content, { sourceFilename: filePath, ...options });
}

/**
 * Parse a module with token collection enabled.
 */
export function parseSource(source: string, options: ParseOptions = {}): ParsedSource {
  const plugins: ParserPlugin[] = [];
  if (options.typescript ?? true) plugins.push('typescript');
  if (options.jsx) plugins.push('jsx');

  let ast: t.File;
  try {
    ast = parser.parse(source, {
      sourceType: 'module',
      sourceFilename: options.sourceFilename,
      tokens: true,
      plugins,
    });
  } catch (error) {
    if (error instanceof SyntaxError) {
      const position = errorPosition(error);
      throw new SourceParseError(error.message, position.line, position.column);
    }
    throw error;
  }

  return { ast, source, tokens: collectTokens(ast, source) };
}

/**
 * Source text of every token inside `node`.
 */
export function nodeTokens(parsed: ParsedSource, node: t.Node): string[] {
  if (node.start == null || node.end == null) return [];
  return tokensBetween(parsed, node.start, node.end);
}

/**
 * Source text of every token lying within [start, end).
 */
export function tokensBetween(parsed: ParsedSource, start: number, end: number): string[] {
  const { tokens } = parsed;
  const texts: string[] = [];
  for (let index = firstTokenAt(tokens, start); index < tokens.length; index++) {
    const token = tokens[index];
    if (token.end > end) break;
    texts.push(token.text);
  }
  return texts;
}

/**
 * Index of the first token starting at or after `offset`. Tokens are in
 * source order and never overlap.
 */
function firstTokenAt(tokens: SourceToken[], offset: number): number {
  let low = 0;
  let high = tokens.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if (tokens[middle].start < offset) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}

function collectTokens(ast: t.File, source: string): SourceToken[] {
  const raw: unknown[] = ast.tokens ?? [];
  const tokens: SourceToken[] = [];

  for (const token of raw) {
    if (!isCodeToken(token) || token.end <= token.start) continue;
    tokens.push({ start: token.start, end: token.end, text: source.slice(token.start, token.end) });
  }

  return tokens;
}

/**
 * Babel interleaves comment nodes with tokens when tokens are requested.
 */
function isCodeToken(value: unknown): value is { start: number; end: number } {
  if (typeof value !== 'object' || value === null) return false;
  if (!('start' in value) || !('end' in value)) return false;
  if ('type' in value && (value.type === 'CommentBlock' || value.type === 'CommentLine')) {
    return false;
  }
  return typeof value.start === 'number' && typeof value.end === 'number';
}

function errorPosition(error: SyntaxError): { line: number; column: number } {
  if ('loc' in error) {
    const loc = error.loc;
    if (
      typeof loc === 'object' &&
      loc !== null &&
      'line' in loc &&
      'column' in loc &&
      typeof loc.line === 'number' &&
      typeof loc.column === 'number'
    ) {
      return { line: loc.line, column: loc.column };
    }
  }
  return { line: 0, column: 0 };
}
