import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_CONFIG,
  NetlistGenerator,
  acceptsOperandCount,
  armTargets,
  blockOperations,
  emitVerilog,
  generate,
  generateNetlist,
  inferOutputType,
  type GeneratorConfig,
  type Netlist,
  type Operation,
} from '../src/index.js';

function config(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  return { ...DEFAULT_CONFIG, seed: 1, ...overrides };
}

const FULL: Partial<GeneratorConfig> = {
  numOperations: 60,
  generateCaseStatements: true,
  generateIfElseChains: true,
  generateSharingOpportunities: true,
  numPipelineStages: 3,
};

function allOperations(netlist: Netlist): Operation[] {
  return [...netlist.operations, ...netlist.controlBlocks.flatMap(blockOperations)];
}

describe('NetlistGenerator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reproduce the same netlist for the same seed', () => {
    const a = generateNetlist(config({ ...FULL, seed: 314 }));
    const b = generateNetlist(config({ ...FULL, seed: 314 }));
    expect(b).toEqual(a);

    const timestamp = '2000-01-01 00:00:00';
    expect(emitVerilog(b, { timestamp })).toBe(emitVerilog(a, { timestamp }));
  });

  it('should differ between seeds', () => {
    const a = generateNetlist(config({ seed: 1 }));
    const b = generateNetlist(config({ seed: 2 }));
    expect(b.signals).not.toEqual(a.signals);
  });

  it('should create the configured ports within their width ranges', () => {
    const netlist = generateNetlist(
      config({ numInputs: 5, numOutputs: 3, inputWidthMin: 4, inputWidthMax: 6, outputWidthMin: 9, outputWidthMax: 9 })
    );

    expect(netlist.inputs).toEqual([0, 1, 2, 3, 4]);
    expect(netlist.outputs).toEqual([5, 6, 7]);
    for (const id of netlist.inputs) {
      const sig = netlist.signals[id];
      expect(sig.width).toBeGreaterThanOrEqual(4);
      expect(sig.width).toBeLessThanOrEqual(6);
    }
    for (const id of netlist.outputs) {
      expect(netlist.signals[id].width).toBe(9);
    }
  });

  it('should create only unsigned ports when signed values are disabled', () => {
    const netlist = generateNetlist(config({ useSigned: false, seed: 8 }));
    const ports = [...netlist.inputs, ...netlist.outputs].map((id) => netlist.signals[id]);
    expect(ports.every((sig) => !sig.signed)).toBe(true);
  });

  for (const seed of [3, 17, 4242]) {
    describe(`invariants with seed ${seed}`, () => {
      const netlist = generateNetlist(config({ ...FULL, seed }));
      const ops = allOperations(netlist);

      it('should give every operation an acceptable operand count', () => {
        for (const op of ops) {
          expect(acceptsOperandCount(op.kind, op.operands.length)).toBe(true);
        }
      });

      it('should give every output the inferred width', () => {
        for (const op of ops) {
          const expected = inferOutputType(
            op.kind,
            op.operands.map((id) => netlist.signals[id])
          );
          const out = netlist.signals[op.output];
          expect(out.width).toBe(expected.width);
          expect(out.signed).toBe(expected.signed);
        }
      });

      it('should only read signals created before the operation', () => {
        for (const op of ops) {
          for (const operand of op.operands) {
            expect(operand).toBeLessThan(op.output);
            const role = netlist.signals[operand].role;
            expect(role === 'input' || role === 'wire').toBe(true);
          }
        }
      });

      it('should write the same register set in every arm', () => {
        expect(netlist.controlBlocks.length).toBeGreaterThan(0);
        for (const block of netlist.controlBlocks) {
          const arms = armTargets(block).map((t) => [...t].sort((x, y) => x - y));
          for (const targets of arms) {
            expect(targets).toEqual(arms[0]);
            expect(new Set(targets).size).toBe(targets.length);
            for (const id of targets) {
              expect(netlist.signals[id].role).toBe('register');
            }
          }
        }
      });

      it('should keep signal names unique', () => {
        const names = netlist.signals.map((s) => s.name);
        expect(new Set(names).size).toBe(names.length);
      });

      it('should connect every output exactly once', () => {
        expect(netlist.connections.map((c) => c.output)).toEqual(netlist.outputs);
        for (const conn of netlist.connections) {
          const mismatch = netlist.signals[conn.source].width !== netlist.signals[conn.output].width;
          expect(conn.coercion).toBe(mismatch ? 'unchecked' : 'exact');
        }
      });

      it('should label depths cyclically and tag stages before depths exist', () => {
        netlist.operations.forEach((op, i) => {
          expect(op.depth).toBe(i % netlist.maxDepth);
          expect(op.stage).toBe(0);
        });
      });

      it('should index sharing groups into the main operation list', () => {
        for (const group of netlist.sharingGroups) {
          for (const index of group.operations) {
            const op = netlist.operations[index];
            expect(op.kind === 'mul' || op.kind === 'add').toBe(true);
          }
        }
      });
    });
  }

  it('should build a single add for the minimal arithmetic scenario', () => {
    const netlist = generateNetlist(
      config({
        seed: 42,
        numInputs: 2,
        numOutputs: 1,
        inputWidthMin: 8,
        inputWidthMax: 8,
        outputWidthMin: 8,
        outputWidthMax: 8,
        useSigned: false,
        numOperations: 1,
        weightArithmetic: 1,
        weightLogical: 0,
        weightComparison: 0,
        weightShift: 0,
        weightMux: 0,
        weightConcat: 0,
        weightReduction: 0,
        weightAdd: 1,
        weightSub: 0,
        weightMul: 0,
        weightDiv: 0,
        weightMod: 0,
      })
    );

    expect(netlist.operations).toHaveLength(1);
    const [op] = netlist.operations;
    expect(op.kind).toBe('add');
    expect(op.operands.map((id) => netlist.signals[id].width)).toEqual([8, 8]);
    expect(netlist.signals[op.output].width).toBe(8);
    expect(netlist.signals[op.output].signed).toBe(false);

    expect(netlist.connections).toHaveLength(1);
    expect(netlist.connections[0].output).toBe(netlist.outputs[0]);
    expect(netlist.connections[0].coercion).toBe('exact');
  });

  it('should skip every operation when there are no inputs', () => {
    const netlist = generateNetlist(config({ numInputs: 0, numOutputs: 2, numOperations: 25 }));
    expect(netlist.operations).toEqual([]);
    expect(netlist.wires).toEqual([]);
    expect(netlist.connections).toEqual([]);
  });

  it('should tag stages from dependency depths under that strategy', () => {
    const netlist = generateNetlist(
      config({ seed: 9, numOperations: 30, numPipelineStages: 3, depthStrategy: 'dependency' })
    );
    for (const op of netlist.operations) {
      expect(op.stage).toBe(Math.min(Math.floor((op.depth * 3) / netlist.maxDepth), 2));
    }
  });

  it('should replace narrow mux4 selectors with undriven 2-bit wires', () => {
    const netlist = generateNetlist(
      config({
        seed: 3,
        numOperations: 40,
        inputWidthMin: 1,
        inputWidthMax: 1,
        weightArithmetic: 0,
        weightLogical: 0,
        weightComparison: 0,
        weightShift: 0,
        weightMux: 1,
        weightConcat: 0,
        weightReduction: 0,
      })
    );
    const driven = new Set(netlist.operations.map((op) => op.output));
    const mux4 = netlist.operations.filter((op) => op.kind === 'mux4');

    expect(mux4).toHaveLength(10);
    for (const op of mux4) {
      const sel = netlist.signals[op.operands[0]];
      expect(sel.width).toBeGreaterThanOrEqual(2);
      expect(sel.role).toBe('wire');
      expect(sel.signed).toBe(false);
      expect(driven.has(sel.id)).toBe(false);
    }
  });

  it('should use the dependency depth strategy when asked', () => {
    const netlist = generateNetlist(config({ seed: 9, depthStrategy: 'dependency' }));
    const level = new Map<number, number>();
    for (const op of netlist.operations) {
      level.set(op.output, op.depth);
    }
    for (const op of netlist.operations) {
      const deepest = Math.max(0, ...op.operands.map((id) => level.get(id) ?? 0));
      expect(op.depth).toBe(deepest + 1);
    }
  });

  it('should only generate once per instance', () => {
    const generator = new NetlistGenerator(config());
    generator.generate();
    expect(() => generator.generate()).toThrow(
      'NetlistGenerator.generate() can only be called once per instance'
    );
  });

  it('should expose the module name', () => {
    const generator = new NetlistGenerator(config({ moduleName: 'alu_top' }));
    expect(generator.getModuleName()).toBe('alu_top');
    expect(generator.generate().name).toBe('alu_top');
  });

  it('should log progress only in verbose mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    generateNetlist(config());
    expect(log).not.toHaveBeenCalled();

    generateNetlist(config({ verbose: true }));
    expect(log).toHaveBeenCalledWith('Generating netlist...');
  });

  it('should validate configuration in the convenience entry point', () => {
    expect(() => generate({ seed: 5, numOperations: 0 })).toThrow(
      'Invalid configuration: num_operations must be at least 1'
    );
    expect(generate({ seed: 5, numOperations: 3 }).seed).toBe(5);
  });
});
