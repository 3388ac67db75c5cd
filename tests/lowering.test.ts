import { SourceParseError, UnsupportedSyntaxError } from '../src/errors';
import { lowerProgram } from '../src/lowering';
import { parseSource, tokensBetween } from '../src/parser';
import type { SourceStatement } from '../src/source-model';

function lower(source: string) {
  return lowerProgram(parseSource(source));
}

function firstStatement(source: string): SourceStatement {
  const [fn] = lower(source).functions;
  return fn.body.body[0];
}

describe('Parser', () => {
  it('should leave comments out of the token list', () => {
    const parsed = parseSource('x = 1; /* note */ y = 2; // tail');

    expect(parsed.tokens.map((token) => token.text)).toEqual([
      'x',
      '=',
      '1',
      ';',
      'y',
      '=',
      '2',
      ';',
    ]);
  });

  it('should slice tokens by source range', () => {
    const parsed = parseSource('a = b + c;');

    expect(tokensBetween(parsed, 4, 9)).toEqual(['b', '+', 'c']);
  });

  it('should leave out tokens that cross either end of the range', () => {
    const parsed = parseSource('a = bb + c;');

    expect(tokensBetween(parsed, 5, 11)).toEqual(['+', 'c', ';']);
    expect(tokensBetween(parsed, 0, 5)).toEqual(['a', '=']);
    expect(tokensBetween(parsed, 20, 30)).toEqual([]);
  });

  it('should report syntax errors with their position', () => {
    expect(() => parseSource('function f( {')).toThrow(SourceParseError);

    let caught: unknown;
    try {
      parseSource('let x = ;');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SourceParseError);
    expect(caught).toMatchObject({ line: 1, column: 8 });
  });

  it('should reject TypeScript syntax when TypeScript is disabled', () => {
    expect(() => parseSource('let x: number = 1;', { typescript: false })).toThrow(
      SourceParseError
    );
  });

  it('should accept JSX only when enabled', () => {
    const source = 'function f() { return <div />; }';

    expect(() => parseSource(source, { typescript: false })).toThrow(SourceParseError);
    expect(() => parseSource(source, { typescript: false, jsx: true })).not.toThrow();
  });
});

describe('Lowering', () => {
  it('should split top-level functions from globals', () => {
    const program = lower(
      "import x from 'y';\nconst limit = 10;\nexport function g(a: number, b: string): void { x = 1; }"
    );

    expect(program.globals).toEqual([
      ['import', 'x', 'from', "'y'", ';'],
      ['const', 'limit', '=', '10', ';'],
    ]);
    expect(program.functions).toHaveLength(1);

    const [fn] = program.functions;
    expect(fn.name).toBe('g');
    expect(fn.returnType).toEqual(['void']);
    expect(fn.parameters).toEqual(['a', ':', 'number', ',', 'b', ':', 'string']);
    expect(fn.loc).toEqual({ line: 3, column: 7 });
    expect(fn.body.body).toEqual([
      { kind: 'simple', tokens: ['x', '=', '1', ';'], loc: { line: 3, column: 48 } },
    ]);
  });

  it('should name an anonymous default export "default"', () => {
    const [fn] = lower('export default function () { return 1; }').functions;

    expect(fn.name).toBe('default');
    expect(fn.parameters).toEqual([]);
    expect(fn.returnType).toEqual([]);
  });

  it('should lower if/else with and without braces', () => {
    const statement = firstStatement('function f(x) { if (x > 1) y = 1; else { y = 2; } }');

    expect(statement).toMatchObject({
      kind: 'if',
      condition: ['x', '>', '1'],
      consequent: { kind: 'simple', tokens: ['y', '=', '1', ';'] },
      alternate: { kind: 'sequence', body: [{ kind: 'simple', tokens: ['y', '=', '2', ';'] }] },
    });
  });

  it('should lower an if without else', () => {
    const statement = firstStatement('function f(x) { if (x) { } }');

    expect(statement).toMatchObject({ kind: 'if', alternate: null });
  });

  it('should lower while loops', () => {
    const statement = firstStatement('function f(n) { while (n) n = n - 1; }');

    expect(statement).toMatchObject({
      kind: 'while',
      condition: ['n'],
      body: { kind: 'simple', tokens: ['n', '=', 'n', '-', '1', ';'] },
    });
  });

  it('should lower every clause of a for loop', () => {
    const statement = firstStatement('function f() { for (let i = 0; i < 3; i++) { } }');

    expect(statement).toMatchObject({
      kind: 'for',
      init: ['let', 'i', '=', '0'],
      condition: ['i', '<', '3'],
      update: ['i', '++'],
      body: { kind: 'sequence', body: [] },
    });
  });

  it('should lower empty for clauses', () => {
    const statement = firstStatement('function f() { for (;;) { } }');

    expect(statement).toMatchObject({ kind: 'for', init: null, condition: [], update: null });
  });

  it('should keep the return keyword in return statements', () => {
    const statement = firstStatement('function f() { return a + 1; }');

    expect(statement).toMatchObject({ kind: 'return', tokens: ['return', 'a', '+', '1', ';'] });
  });

  it.each([
    ['switch', 'function f(x) { switch (x) { } }', 'SwitchStatement', 16],
    ['do-while', 'function f() { do { } while (1); }', 'DoWhileStatement', 15],
    ['break', 'function f() { while (1) { break; } }', 'BreakStatement', 27],
    ['try', 'function f() { try { } finally { } }', 'TryStatement', 15],
    ['nested function', 'function f() { function g() { } }', 'FunctionDeclaration', 15],
  ])('should reject %s', (_name, source, nodeType, column) => {
    let caught: unknown;
    try {
      lower(source);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnsupportedSyntaxError);
    expect(caught).toMatchObject({
      nodeType,
      message: `Unsupported statement: ${nodeType}`,
      line: 1,
      column,
    });
  });
});
