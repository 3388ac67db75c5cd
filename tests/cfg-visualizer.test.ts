import { cfgStats, cfgToJson, programToDot, programToJson } from '../src/control-flow';
import { generateFromSource } from '../src/generator';

const IF_ELSE = 'function f(x: number) { if (x) { a(); } else { b(); } return x; }';
const WHILE_LOOP = 'function g() { let i = 0; while (i < 3) { i = i + 1; } return i; }';

describe('CFG Visualizer', () => {
  describe('programToJson', () => {
    it('should describe every live block with its neighbours and targets', () => {
      const { program } = generateFromSource('input.ts', `let seed = 1;\n${IF_ELSE}`);
      const json = programToJson(program);

      expect(json.program).toBe('input.ts');
      expect(json.globals).toEqual(['    ', 'let ', 'seed ', '= ', '1 ', '; ', '\n']);
      expect(json.functions).toHaveLength(1);

      const cfg = json.functions[0];
      expect(cfg.name).toBe('f');
      expect(cfg.returnType).toEqual([]);
      expect(cfg.parameters).toEqual(['x ', ': ', 'number ']);
      expect(cfg.blocks.map((block) => block.name)).toEqual([
        'f_entry',
        'f_B0',
        'f_B1',
        'f_B2',
        'f_B3',
        'f_exit',
      ]);
      expect(cfg.blocks[1]).toEqual({
        name: 'f_B0',
        lines: ['    ', 'if', '( ', 'x ', ') '],
        predecessors: ['f_entry'],
        successors: ['f_B1', 'f_B2'],
        then: 'f_B1',
        else: 'f_B2',
        loopEnd: null,
      });
    });

    it('should record the loop end of a header', () => {
      const { program } = generateFromSource('input.ts', WHILE_LOOP);
      const header = cfgToJson(program.functions[0]).blocks[2];

      expect(header.name).toBe('g_B1');
      expect(header.loopEnd).toBe('g_B3');
      expect(header.then).toBeNull();
      expect(header.predecessors).toEqual(['g_B0', 'g_B2']);
    });
  });

  describe('programToDot', () => {
    it('should emit one cluster per function with labelled branch edges', () => {
      const { program } = generateFromSource('input.ts', IF_ELSE);
      const dot = programToDot(program);

      expect(dot.startsWith('digraph CFG {\n  label="input.ts";')).toBe(true);
      expect(dot).toContain('  subgraph cluster_0 {\n    label="f";');
      expect(dot).toContain('    "f_B0" -> "f_B1" [label="then", color="#228B22"];');
      expect(dot).toContain('    "f_B0" -> "f_B2" [label="else", color="#DC143C"];');
      expect(dot).toContain('    "f_B3" -> "f_exit";');
      expect(dot.endsWith('}')).toBe(true);
    });

    it('should dash loop back edges', () => {
      const { program } = generateFromSource('input.ts', WHILE_LOOP);
      const dot = programToDot(program, { leftToRight: true });

      expect(dot).toContain('  rankdir="LR";');
      expect(dot).toContain('    "g_B2" -> "g_B1" [style=dashed, constraint=false];');
      expect(dot).toContain('    "g_B1" -> "g_B3" [label="loop_end"];');
    });

    it('should leave statement text out of labels when asked', () => {
      const { program } = generateFromSource('input.ts', WHILE_LOOP);
      const dot = programToDot(program, { showLines: false, title: 'loops' });

      expect(dot).toContain('  label="loops";');
      expect(dot).toContain('    "g_B0" [label="g_B0", shape=box];');
    });
  });

  describe('cfgStats', () => {
    it('should count blocks, edges, branches and returns', () => {
      const { program } = generateFromSource('input.ts', IF_ELSE);

      expect(cfgStats(program.functions[0])).toBe(
        [
          'CFG Statistics (f):',
          '  Blocks: 4',
          '  Edges: 6',
          '  Branch points: 1',
          '  Loop headers: 0',
          '  Returning blocks: 1',
        ].join('\n')
      );
    });

    it('should count loop headers', () => {
      const { program } = generateFromSource('input.ts', WHILE_LOOP);

      expect(cfgStats(program.functions[0])).toContain('  Loop headers: 1');
    });
  });
});
