import { describe, it, expect } from 'vitest';
import {
  CaseStatementBuilder,
  IfElseChainBuilder,
  SignalRegistry,
  buildOperation,
  createNetlist,
  declarationOf,
  emitControlBlock,
  emitTestbench,
  emitVerilog,
  formatTimestamp,
  operationAssign,
  operationExpression,
  type Netlist,
  type Operation,
  type OperationKind,
} from '../src/index.js';

const TIMESTAMP = '2024-01-02 03:04:05';
const RULE = '// ============================================================================';

function must(value: Operation | null): Operation {
  if (!value) throw new Error('operation should build');
  return value;
}

// in_0[8], in_1 signed [4], out_0[8], wire_0 = in_0 + in_1
function smallNetlist(): Netlist {
  const netlist = createNetlist('demo', 5);
  const registry = new SignalRegistry(netlist);
  const a = registry.create('input', 8);
  const b = registry.create('input', 4, true);
  const out = registry.create('output', 8);
  const sum = must(buildOperation(registry, 'add', [a, b]));
  netlist.operations.push(sum);
  netlist.connections.push({ output: out, source: sum.output, coercion: 'exact' });
  return netlist;
}

describe('emitVerilog', () => {
  it('should render a complete module', () => {
    const expected = [
      RULE,
      '// Random Verilog Datapath Generator',
      `// Generated: ${TIMESTAMP}`,
      RULE,
      '// This file was automatically generated for synthesis tool benchmarking.',
      '// Module: demo',
      '// Seed: 5',
      '// Inputs: 2',
      '// Outputs: 1',
      '// Operations: 1',
      RULE,
      '',
      'module demo (',
      '    input [7:0] in_0,',
      '    input signed [3:0] in_1,',
      '    output [7:0] out_0',
      ');',
      '',
      '    // Internal wires',
      '    wire signed [7:0] wire_0;',
      '',
      '    // ========================================',
      '    // Combinational Logic',
      '    // ========================================',
      '',
      '    assign wire_0 = (in_0 + in_1);',
      '',
      '    // ========================================',
      '    // Output Connections',
      '    // ========================================',
      '',
      '    assign out_0 = wire_0;',
      '',
      'endmodule',
      '',
    ].join('\n');

    expect(emitVerilog(smallNetlist(), { timestamp: TIMESTAMP })).toBe(expected);
  });

  it('should note an empty datapath and undriven outputs', () => {
    const netlist = createNetlist('empty', 1);
    const registry = new SignalRegistry(netlist);
    registry.create('output', 4);

    const lines = emitVerilog(netlist, { timestamp: TIMESTAMP }).split('\n');
    expect(lines).toContain('    // No operations generated');
    expect(lines).toContain('    // out_0 left undriven');
    expect(lines).not.toContain('    // Internal wires');
  });

  it('should flag width mismatches on output connections', () => {
    const netlist = smallNetlist();
    const registry = new SignalRegistry(netlist);
    const narrow = registry.create('output', 3);
    netlist.connections.push({ output: narrow, source: 0, coercion: 'unchecked' });

    const lines = emitVerilog(netlist, { timestamp: TIMESTAMP }).split('\n');
    expect(lines).toContain('    assign out_1 = in_0; // unchecked width coercion: 8 -> 3 bits');
  });

  it('should annotate depth and stage when pipelining', () => {
    const netlist = smallNetlist();
    netlist.pipelineStages = 2;
    netlist.operations[0].depth = 4;
    netlist.operations[0].stage = 1;

    const lines = emitVerilog(netlist, { timestamp: TIMESTAMP }).split('\n');
    expect(lines).toContain('    assign wire_0 = (in_0 + in_1); // depth 4, stage 1');
  });

  it('should render a case statement block', () => {
    const netlist = createNetlist('ctl');
    const registry = new SignalRegistry(netlist);
    const a = registry.create('input', 8);
    const sel = registry.create('input', 2);
    const reg = registry.createRegister(8);
    const sum = must(buildOperation(registry, 'add', [a, a]));

    const builder = new CaseStatementBuilder((id) => registry.get(id), sel);
    builder.addCase(0);
    builder.addCaseOperation(0, sum);
    builder.addCaseAssignment(0, reg, sum.output);
    builder.addCase(1);
    builder.addCaseAssignment(1, reg, a);
    builder.setDefault([{ target: reg, source: a }]);
    netlist.controlBlocks.push(builder.build());

    expect(emitControlBlock(netlist, builder.build())).toEqual([
      '    assign wire_1 = (in_0 + in_0);',
      '    always @(*) begin',
      '        case (in_1)',
      '            0: begin',
      '                reg_0 = wire_1;',
      '            end',
      '            1: begin',
      '                reg_0 = in_0;',
      '            end',
      '            default: begin',
      '                reg_0 = in_0;',
      '            end',
      '        endcase',
      '    end',
    ]);

    const lines = emitVerilog(netlist, { timestamp: TIMESTAMP }).split('\n');
    expect(lines).toContain('    // Control Flow Structures');
    expect(lines).toContain('    reg [7:0] reg_0;');
  });

  it('should render an if/else chain', () => {
    const netlist = createNetlist('ctl');
    const registry = new SignalRegistry(netlist);
    const a = registry.create('input', 8);
    const cond = registry.create('input', 1);
    const reg = registry.createRegister(8);
    const w = registry.createWire(8);

    const builder = new IfElseChainBuilder((id) => registry.get(id));
    builder.addBranch(cond);
    builder.addBranchAssignment(0, reg, a);
    builder.addElseBranch();
    builder.addBranchAssignment(1, reg, w);

    expect(emitControlBlock(netlist, builder.build(), 0)).toEqual([
      'always @(*) begin',
      '    if (in_1) begin',
      '        reg_0 = in_0;',
      '    end else begin',
      '        reg_0 = wire_1;',
      '    end',
      'end',
    ]);
  });
});

describe('operationExpression', () => {
  const netlist = createNetlist('expr');
  const registry = new SignalRegistry(netlist);
  const ids = [8, 8, 8, 8, 8].map((w) => registry.create('input', w));
  const [a, b, c, d, e] = ids;

  const render = (kind: OperationKind, operands: number[]) =>
    operationExpression(netlist, { kind, output: 0, operands, depth: 0, stage: 0 });

  it('should render binary operators in parentheses', () => {
    expect(render('sub', [a, b])).toBe('(in_0 - in_1)');
    expect(render('sra', [a, b])).toBe('(in_0 >>> in_1)');
    expect(render('neq', [a, b])).toBe('(in_0 != in_1)');
  });

  it('should render negated logic as an inverted group', () => {
    expect(render('nand', [a, b])).toBe('~((in_0 & in_1))');
    expect(render('xnor', [a, b])).toBe('~((in_0 ^ in_1))');
    expect(render('not', [a])).toBe('(~in_0)');
  });

  it('should render reductions', () => {
    expect(render('red_or', [a])).toBe('(|in_0)');
    expect(render('red_nor', [a])).toBe('(~|in_0)');
  });

  it('should render multiplexers as nested ternaries', () => {
    expect(render('mux2', [a, b, c])).toBe('(in_0 ? in_1 : in_2)');
    expect(render('mux4', [a, b, c, d, e])).toBe('(in_0[1] ? (in_0[0] ? in_4 : in_3) : (in_0[0] ? in_2 : in_1))');
  });

  it('should render concatenation', () => {
    expect(render('concat', [a, b, c])).toBe('{in_0, in_1, in_2}');
  });

  it('should build the assign statement', () => {
    const op: Operation = { kind: 'add', output: e, operands: [a, b], depth: 2, stage: 0 };
    expect(operationAssign(netlist, op)).toBe('assign in_4 = (in_0 + in_1);');
    expect(operationAssign(netlist, op, true)).toBe('assign in_4 = (in_0 + in_1); // depth 2, stage 0');
  });
});

describe('declarationOf', () => {
  it('should omit the range of a single bit', () => {
    expect(declarationOf({ id: 0, name: 'flag', width: 1, role: 'wire', signed: false })).toBe('flag');
    expect(declarationOf({ id: 1, name: 'v', width: 16, role: 'wire', signed: true })).toBe('signed [15:0] v');
  });
});

describe('formatTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });
});

describe('emitTestbench', () => {
  it('should instantiate the module and drive every input', () => {
    const lines = emitTestbench(smallNetlist(), { timestamp: TIMESTAMP }).split('\n');

    expect(lines[1]).toBe('// Testbench for demo');
    expect(lines).toContain('module tb_demo;');
    expect(lines).toContain('    reg [7:0] in_0;');
    expect(lines).toContain('    reg signed [3:0] in_1;');
    expect(lines).toContain('    wire [7:0] out_0;');
    expect(lines).toContain('    demo dut (');
    expect(lines).toContain('        .in_0(in_0),');
    expect(lines).toContain('        .out_0(out_0)');
    expect(lines).toContain('            in_1 = $random;');
    expect(lines).toContain('        $monitor("Time=%0t", $time, " out_0=%h", out_0);');
    expect(lines[lines.length - 2]).toBe('endmodule');
  });
});
