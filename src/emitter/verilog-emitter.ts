// Verilog Emitter: renders a generated netlist as a synthesizable module
//
// Output layout:
//   header comment, module ports, wire / reg declarations,
//   continuous assigns for the datapath,
//   control-block operations as assigns plus always @(*) blocks,
//   output connections, endmodule

import {
  getSignal,
  type Assignment,
  type CaseStatement,
  type ControlBlock,
  type IfElseChain,
  type Netlist,
  type Operation,
  type OutputConnection,
  type Signal,
  type SignalId,
} from '../types/netlist.js';
import type { OperationKind } from '../types/operations.js';

export interface EmitOptions {
  // Header timestamp; defaults to the current local time
  timestamp: string;

  // Annotate datapath assigns with their depth / stage labels
  annotateStages: boolean;
}

const INDENT = '    ';
const RULE = '// ============================================================================';
const SECTION_RULE = '// ========================================';

function indent(level: number): string {
  return INDENT.repeat(level);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a date as 'YYYY-MM-DD HH:MM:SS' in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function resolveOptions(netlist: Netlist, options: Partial<EmitOptions>): EmitOptions {
  return {
    timestamp: options.timestamp ?? formatTimestamp(new Date()),
    annotateStages: options.annotateStages ?? netlist.pipelineStages > 0,
  };
}

/**
 * Declaration body for a signal: [signed ][[msb:0] ]name
 */
export function declarationOf(sig: Signal): string {
  const signed = sig.signed ? 'signed ' : '';
  const range = sig.width > 1 ? `[${sig.width - 1}:0] ` : '';
  return `${signed}${range}${sig.name}`;
}

function keywordOf(sig: Signal): string {
  switch (sig.role) {
    case 'input':
      return 'input';
    case 'output':
      return 'output';
    case 'wire':
      return 'wire';
    case 'register':
      return 'reg';
  }
}

// ============================================================
// Expressions
// ============================================================

function binaryOperator(kind: OperationKind): string | null {
  switch (kind) {
    case 'add': return '+';
    case 'sub': return '-';
    case 'mul': return '*';
    case 'div': return '/';
    case 'mod': return '%';
    case 'and': return '&';
    case 'or': return '|';
    case 'xor': return '^';
    case 'eq': return '==';
    case 'neq': return '!=';
    case 'lt': return '<';
    case 'gt': return '>';
    case 'lte': return '<=';
    case 'gte': return '>=';
    case 'shl': return '<<';
    case 'shr': return '>>';
    case 'sra': return '>>>';
    default: return null;
  }
}

function reductionOperator(kind: OperationKind): string | null {
  switch (kind) {
    case 'red_and': return '&';
    case 'red_or': return '|';
    case 'red_xor': return '^';
    case 'red_nand': return '~&';
    case 'red_nor': return '~|';
    case 'red_xnor': return '~^';
    default: return null;
  }
}

/**
 * Right-hand side of an operation's assignment.
 */
export function operationExpression(netlist: Netlist, op: Operation): string {
  const name = (id: SignalId) => getSignal(netlist, id).name;
  const operands = op.operands.map(name);

  const binary = binaryOperator(op.kind);
  if (binary) {
    return `(${operands[0]} ${binary} ${operands[1]})`;
  }

  const reduction = reductionOperator(op.kind);
  if (reduction) {
    return `(${reduction}${operands[0]})`;
  }

  switch (op.kind) {
    case 'not':
      return `(~${operands[0]})`;
    case 'nand':
      return `~((${operands[0]} & ${operands[1]}))`;
    case 'nor':
      return `~((${operands[0]} | ${operands[1]}))`;
    case 'xnor':
      return `~((${operands[0]} ^ ${operands[1]}))`;
    case 'mux2':
    case 'conditional':
      return `(${operands[0]} ? ${operands[1]} : ${operands[2]})`;
    case 'mux4': {
      // sel[1] picks the upper pair, sel[0] the element within it
      const [sel, d0, d1, d2, d3] = operands;
      return `(${sel}[1] ? (${sel}[0] ? ${d3} : ${d2}) : (${sel}[0] ? ${d1} : ${d0}))`;
    }
    case 'concat':
      return `{${operands.join(', ')}}`;
    default:
      throw new Error(`No Verilog rendering for operation '${op.kind}'`);
  }
}

/**
 * Continuous assignment for an operation, without indentation.
 */
export function operationAssign(netlist: Netlist, op: Operation, annotate: boolean = false): string {
  const target = getSignal(netlist, op.output).name;
  const line = `assign ${target} = ${operationExpression(netlist, op)};`;
  return annotate ? `${line} // depth ${op.depth}, stage ${op.stage}` : line;
}

function procedural(netlist: Netlist, a: Assignment): string {
  return `${getSignal(netlist, a.target).name} = ${getSignal(netlist, a.source).name};`;
}

// ============================================================
// Control blocks
// ============================================================

function emitCaseStatement(netlist: Netlist, block: CaseStatement, level: number): string[] {
  const lines: string[] = [];
  const selector = getSignal(netlist, block.selector).name;

  lines.push(`${indent(level)}always @(*) begin`);
  lines.push(`${indent(level + 1)}case (${selector})`);

  for (const item of block.cases) {
    lines.push(`${indent(level + 2)}${item.value}: begin`);
    for (const a of item.assignments) {
      lines.push(`${indent(level + 3)}${procedural(netlist, a)}`);
    }
    lines.push(`${indent(level + 2)}end`);
  }

  if (block.defaultAssignments.length > 0) {
    lines.push(`${indent(level + 2)}default: begin`);
    for (const a of block.defaultAssignments) {
      lines.push(`${indent(level + 3)}${procedural(netlist, a)}`);
    }
    lines.push(`${indent(level + 2)}end`);
  }

  lines.push(`${indent(level + 1)}endcase`);
  lines.push(`${indent(level)}end`);
  return lines;
}

function emitIfElseChain(netlist: Netlist, block: IfElseChain, level: number): string[] {
  const lines: string[] = [];
  lines.push(`${indent(level)}always @(*) begin`);

  block.branches.forEach((branch, i) => {
    const cond = branch.condition === null ? null : getSignal(netlist, branch.condition).name;
    if (i === 0 && cond !== null) {
      lines.push(`${indent(level + 1)}if (${cond}) begin`);
    } else if (cond !== null) {
      lines.push(`${indent(level + 1)}end else if (${cond}) begin`);
    } else {
      lines.push(`${indent(level + 1)}end else begin`);
    }

    for (const a of branch.assignments) {
      lines.push(`${indent(level + 2)}${procedural(netlist, a)}`);
    }
  });

  if (block.branches.length > 0) {
    lines.push(`${indent(level + 1)}end`);
  }
  lines.push(`${indent(level)}end`);
  return lines;
}

/**
 * Render one control block. Its operations become continuous assigns ahead
 * of the always block, which only routes their results into registers.
 */
export function emitControlBlock(netlist: Netlist, block: ControlBlock, level: number = 1): string[] {
  const arms = block.type === 'case' ? block.cases : block.branches;
  const lines: string[] = [];

  for (const arm of arms) {
    for (const op of arm.operations) {
      lines.push(`${indent(level)}${operationAssign(netlist, op)}`);
    }
  }

  if (block.type === 'case') {
    lines.push(...emitCaseStatement(netlist, block, level));
  } else {
    lines.push(...emitIfElseChain(netlist, block, level));
  }
  return lines;
}

// ============================================================
// Module
// ============================================================

function emitHeader(netlist: Netlist, opts: EmitOptions): string[] {
  return [
    RULE,
    '// Random Verilog Datapath Generator',
    `// Generated: ${opts.timestamp}`,
    RULE,
    '// This file was automatically generated for synthesis tool benchmarking.',
    `// Module: ${netlist.name}`,
    `// Seed: ${netlist.seed}`,
    `// Inputs: ${netlist.inputs.length}`,
    `// Outputs: ${netlist.outputs.length}`,
    `// Operations: ${netlist.operations.length}`,
    RULE,
    '',
  ];
}

function emitPorts(netlist: Netlist): string[] {
  const ports = [...netlist.inputs, ...netlist.outputs].map((id) => getSignal(netlist, id));
  const lines = [`module ${netlist.name} (`];
  ports.forEach((sig, i) => {
    const comma = i < ports.length - 1 ? ',' : '';
    lines.push(`${INDENT}${keywordOf(sig)} ${declarationOf(sig)}${comma}`);
  });
  lines.push(');', '');
  return lines;
}

function emitDeclarations(netlist: Netlist): string[] {
  const lines: string[] = [];

  if (netlist.wires.length > 0) {
    lines.push(`${INDENT}// Internal wires`);
    for (const id of netlist.wires) {
      const sig = getSignal(netlist, id);
      lines.push(`${INDENT}wire ${declarationOf(sig)};`);
    }
    lines.push('');
  }

  if (netlist.registers.length > 0) {
    lines.push(`${INDENT}// Registers`);
    for (const id of netlist.registers) {
      const sig = getSignal(netlist, id);
      lines.push(`${INDENT}reg ${declarationOf(sig)};`);
    }
    lines.push('');
  }

  return lines;
}

function sectionHeader(...titles: string[]): string[] {
  return [
    `${INDENT}${SECTION_RULE}`,
    ...titles.map((t) => `${INDENT}// ${t}`),
    `${INDENT}${SECTION_RULE}`,
    '',
  ];
}

function emitCombinationalLogic(netlist: Netlist, opts: EmitOptions): string[] {
  if (netlist.operations.length === 0) {
    return [`${INDENT}// No operations generated`, ''];
  }

  const lines = sectionHeader('Combinational Logic');
  for (const op of netlist.operations) {
    lines.push(`${INDENT}${operationAssign(netlist, op, opts.annotateStages)}`);
  }
  lines.push('');
  return lines;
}

function emitControlFlow(netlist: Netlist): string[] {
  if (netlist.controlBlocks.length === 0) {
    return [];
  }

  const lines = sectionHeader('Control Flow Structures', '(for testing synthesis optimization)');
  for (const block of netlist.controlBlocks) {
    lines.push(...emitControlBlock(netlist, block, 1), '');
  }
  return lines;
}

function connectionLine(netlist: Netlist, conn: OutputConnection): string {
  const out = getSignal(netlist, conn.output);
  const src = getSignal(netlist, conn.source);
  const line = `${INDENT}assign ${out.name} = ${src.name};`;
  if (conn.coercion === 'unchecked') {
    return `${line} // unchecked width coercion: ${src.width} -> ${out.width} bits`;
  }
  return line;
}

function emitOutputConnections(netlist: Netlist): string[] {
  if (netlist.outputs.length === 0) {
    return [];
  }

  const lines = sectionHeader('Output Connections');
  const byOutput = new Map(netlist.connections.map((c) => [c.output, c]));
  for (const id of netlist.outputs) {
    const conn = byOutput.get(id);
    if (conn) {
      lines.push(connectionLine(netlist, conn));
    } else {
      lines.push(`${INDENT}// ${getSignal(netlist, id).name} left undriven`);
    }
  }
  lines.push('');
  return lines;
}

/**
 * Render the complete Verilog module.
 */
export function emitVerilog(netlist: Netlist, options: Partial<EmitOptions> = {}): string {
  const opts = resolveOptions(netlist, options);
  const lines = [
    ...emitHeader(netlist, opts),
    ...emitPorts(netlist),
    ...emitDeclarations(netlist),
    ...emitCombinationalLogic(netlist, opts),
    ...emitControlFlow(netlist),
    ...emitOutputConnections(netlist),
    'endmodule',
  ];
  return lines.join('\n') + '\n';
}

// ============================================================
// Testbench
// ============================================================

/**
 * Render a stimulus testbench: random input vectors and a $monitor over
 * every output.
 */
export function emitTestbench(netlist: Netlist, options: Partial<EmitOptions> = {}): string {
  const opts = resolveOptions(netlist, options);
  const name = netlist.name;
  const inputs = netlist.inputs.map((id) => getSignal(netlist, id));
  const outputs = netlist.outputs.map((id) => getSignal(netlist, id));
  const ports = [...inputs, ...outputs];

  const lines: string[] = [
    RULE,
    `// Testbench for ${name}`,
    `// Generated: ${opts.timestamp}`,
    RULE,
    '',
    '`timescale 1ns / 1ps',
    '',
    `module tb_${name};`,
    '',
    `${INDENT}// Testbench signals`,
  ];

  for (const sig of inputs) {
    lines.push(`${INDENT}reg ${declarationOf(sig)};`);
  }
  for (const sig of outputs) {
    lines.push(`${INDENT}wire ${declarationOf(sig)};`);
  }

  lines.push('', `${INDENT}// Instantiate DUT`, `${INDENT}${name} dut (`);
  ports.forEach((sig, i) => {
    const comma = i < ports.length - 1 ? ',' : '';
    lines.push(`${indent(2)}.${sig.name}(${sig.name})${comma}`);
  });
  lines.push(`${INDENT});`, '');

  lines.push(
    `${INDENT}// Test stimulus`,
    `${INDENT}initial begin`,
    `${indent(2)}$dumpfile("${name}.vcd");`,
    `${indent(2)}$dumpvars(0, tb_${name});`,
    '',
    `${indent(2)}// Initialize inputs`
  );
  for (const sig of inputs) {
    lines.push(`${indent(2)}${sig.name} = 0;`);
  }

  lines.push('', `${indent(2)}// Apply random test vectors`, `${indent(2)}repeat (100) begin`, `${indent(3)}#10;`);
  for (const sig of inputs) {
    lines.push(`${indent(3)}${sig.name} = $random;`);
  }
  lines.push(`${indent(2)}end`, '', `${indent(2)}#100 $finish;`, `${INDENT}end`, '');

  const monitorArgs = outputs.map((sig) => `, " ${sig.name}=%h", ${sig.name}`).join('');
  lines.push(
    `${INDENT}// Monitor outputs`,
    `${INDENT}initial begin`,
    `${indent(2)}$monitor("Time=%0t", $time${monitorArgs});`,
    `${INDENT}end`,
    '',
    'endmodule'
  );

  return lines.join('\n') + '\n';
}
