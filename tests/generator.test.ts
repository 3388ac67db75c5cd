import * as path from 'path';
import { UnsupportedSyntaxError } from '../src/errors';
import {
  formatProgram,
  generateFromFile,
  generateFromSource,
  isOutputFormat,
} from '../src/generator';

const programsPath = path.join(__dirname, 'fixtures', 'programs');
const sumPath = path.join(programsPath, 'sum.ts');

function lines(...text: string[]): string {
  return text.map((line) => `${line}\n`).join('');
}

const SUM_TEXT = lines(
  '/*--- program: sum.ts ---*/',
  '@Globals {',
  '    const limit = 10 ; ',
  '}',
  'Predecessors: -',
  'Successors: -',
  '',
  '@sum_entry {',
  '   name: sum',
  '   ret_type: number ',
  '   args: n : number ',
  '}',
  'Predecessors: -',
  'Successors: sum_B0',
  '',
  '@sum_B0 {',
  '    let total = 0 ; ',
  '    let i = 0 ; ',
  '}',
  'Predecessors: sum_entry',
  'Successors: sum_B1',
  '',
  '@sum_B1 {',
  '    for( ; i < n ; )     # loop_end: sum_B5',
  '}',
  'Predecessors: sum_B0, sum_B4',
  'Successors: sum_B2, sum_B5',
  '',
  '@sum_B2 {',
  '    if( i > limit )     # then: sum_B3',
  '                        # else: sum_B4',
  '}',
  'Predecessors: sum_B1',
  'Successors: sum_B3, sum_B4',
  '',
  '@sum_B3 {',
  '    return total ; ',
  '}',
  'Predecessors: sum_B2',
  'Successors: sum_exit',
  '',
  '@sum_B4 {',
  '    total = total + i ; ',
  '    i ++ ; ',
  '}',
  'Predecessors: sum_B2',
  'Successors: sum_B1',
  '',
  '@sum_B5 {',
  '    return total ; ',
  '}',
  'Predecessors: sum_B1',
  'Successors: sum_exit',
  '',
  '@sum_exit {',
  '}',
  'Predecessors: sum_B3, sum_B5',
  'Successors: -',
  ''
);

const SIGN_TEXT = lines(
  '@sign_entry {',
  '   name: sign',
  '   ret_type: number ',
  '   args: x : number ',
  '}',
  'Predecessors: -',
  'Successors: sign_B0',
  '',
  '@sign_B0 {',
  '    if( x < 0 )     # then: sign_B1',
  '                    # else: sign_B2',
  '}',
  'Predecessors: sign_entry',
  'Successors: sign_B1, sign_B2',
  '',
  '@sign_B1 {',
  '    return - 1 ; ',
  '}',
  'Predecessors: sign_B0',
  'Successors: sign_exit',
  '',
  '@sign_B2 {',
  '    return 1 ; ',
  '}',
  'Predecessors: sign_B0',
  'Successors: sign_exit',
  '',
  '@sign_exit {',
  '}',
  'Predecessors: sign_B1, sign_B2',
  'Successors: -',
  ''
);

describe('Generator', () => {
  describe('generateFromFile', () => {
    it('should render a whole file', () => {
      const { program } = generateFromFile(sumPath, {}, 'sum.ts');

      expect(formatProgram(program, 'text')).toBe(SUM_TEXT + SIGN_TEXT);
    });

    it('should name the program after the path as given by default', () => {
      const { program } = generateFromFile(sumPath);

      expect(program.sourceFile).toBe(sumPath);
    });

    it('should report pruning statistics per function', () => {
      const { reports } = generateFromFile(sumPath);

      expect(reports).toEqual([
        {
          name: 'sum',
          report: { created: 8, unreachable: 0, elided: 1, merged: 1, surviving: 6 },
        },
        {
          name: 'sign',
          report: { created: 4, unreachable: 1, elided: 0, merged: 0, surviving: 3 },
        },
      ]);
    });

    it('should only build the requested functions', () => {
      const { program, reports } = generateFromFile(sumPath, { functions: ['sign'] }, 'sum.ts');

      expect(program.functions.map((cfg) => cfg.name)).toEqual(['sign']);
      expect(reports.map((entry) => entry.name)).toEqual(['sign']);
      expect(formatProgram(program, 'text')).toBe(
        lines(
          '/*--- program: sum.ts ---*/',
          '@Globals {',
          '    const limit = 10 ; ',
          '}',
          'Predecessors: -',
          'Successors: -',
          ''
        ) + SIGN_TEXT
      );
    });

    it('should reject unsupported statements with their location', () => {
      const unsupportedPath = path.join(programsPath, 'unsupported.ts');

      expect(() => generateFromFile(unsupportedPath)).toThrow(UnsupportedSyntaxError);
      expect(() => generateFromFile(unsupportedPath)).toThrow(
        expect.objectContaining({ nodeType: 'SwitchStatement', line: 3, column: 2 })
      );
    });
  });

  describe('generateFromSource', () => {
    it('should render a header only for an empty file', () => {
      const { program } = generateFromSource('empty.ts', '');

      expect(formatProgram(program, 'text')).toBe('/*--- program: empty.ts ---*/\n');
    });

    it('should honour the parse options', () => {
      expect(() =>
        generateFromSource('plain.js', 'function f(x: number) { return x; }', {
          typescript: false,
        })
      ).toThrow();
    });
  });

  describe('formatProgram', () => {
    it('should produce JSON', () => {
      const { program } = generateFromFile(sumPath, { functions: ['sign'] }, 'sum.ts');
      const parsed: unknown = JSON.parse(formatProgram(program, 'json'));

      expect(parsed).toMatchObject({
        program: 'sum.ts',
        functions: [{ name: 'sign', returnType: ['number '] }],
      });
    });

    it('should produce DOT', () => {
      const { program } = generateFromFile(sumPath, { functions: ['sign'] }, 'sum.ts');
      const dot = formatProgram(program, 'dot');

      expect(dot.startsWith('digraph CFG {')).toBe(true);
      expect(dot.endsWith('}\n')).toBe(true);
    });
  });

  describe('isOutputFormat', () => {
    it('should accept only known formats', () => {
      expect(isOutputFormat('text')).toBe(true);
      expect(isOutputFormat('dot')).toBe(true);
      expect(isOutputFormat('json')).toBe(true);
      expect(isOutputFormat('xml')).toBe(false);
      expect(isOutputFormat(3)).toBe(false);
    });
  });
});
