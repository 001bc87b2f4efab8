// Netlist types for a generated datapath
// Signals live in one arena per run; everything else refers to them by id

import type { OperationKind } from './operations.js';

export type SignalId = number;

export type SignalRole = 'input' | 'output' | 'wire' | 'register';

// A named, width-typed value. Immutable once created.
export interface Signal {
  readonly id: SignalId;      // Index into Netlist.signals
  readonly name: string;      // Unique within the run (in_0, out_0, wire_3, reg_4)
  readonly width: number;     // Always >= 1
  readonly role: SignalRole;
  readonly signed: boolean;
}

// One datapath node: a fresh output computed from existing operands
export interface Operation {
  readonly kind: OperationKind;
  readonly output: SignalId;
  readonly operands: readonly SignalId[];
  depth: number;              // Set by the depth post-pass
  stage: number;              // Set by pipeline tagging
}

// Procedural write of a register from another signal
export interface Assignment {
  readonly target: SignalId;  // Always a register
  readonly source: SignalId;
}

export interface CaseItem {
  readonly value: number;
  readonly operations: Operation[];
  readonly assignments: Assignment[];
}

// condition === null marks the trailing else
export interface Branch {
  readonly condition: SignalId | null;
  readonly operations: Operation[];
  readonly assignments: Assignment[];
}

export interface CaseStatement {
  readonly type: 'case';
  readonly selector: SignalId;
  readonly cases: CaseItem[];
  readonly defaultAssignments: Assignment[];
}

export interface IfElseChain {
  readonly type: 'if-else';
  readonly branches: Branch[];
}

export type ControlBlock = CaseStatement | IfElseChain;

// 'unchecked' marks a width mismatch accepted without truncation or extension
export type WidthCoercion = 'exact' | 'unchecked';

export interface OutputConnection {
  readonly output: SignalId;
  readonly source: SignalId;
  readonly coercion: WidthCoercion;
}

// Operations that share an enable signal (recorded for documentation only)
export interface SharingGroup {
  readonly enable: SignalId;
  readonly operations: readonly number[]; // Indices into Netlist.operations
}

// The complete generated design
export interface Netlist {
  name: string;
  seed: number;

  // Signal arena and role-ordered views (declaration order)
  signals: Signal[];
  inputs: SignalId[];
  outputs: SignalId[];
  wires: SignalId[];
  registers: SignalId[];

  operations: Operation[];
  controlBlocks: ControlBlock[];
  connections: OutputConnection[];
  sharingGroups: SharingGroup[];

  maxDepth: number;
  pipelineStages: number;
}

// Helper to create an empty netlist
export function createNetlist(name: string, seed: number = 0): Netlist {
  return {
    name,
    seed,
    signals: [],
    inputs: [],
    outputs: [],
    wires: [],
    registers: [],
    operations: [],
    controlBlocks: [],
    connections: [],
    sharingGroups: [],
    maxDepth: 1,
    pipelineStages: 0,
  };
}

export function getSignal(netlist: Netlist, id: SignalId): Signal {
  const sig = netlist.signals[id];
  if (!sig) {
    throw new Error(`Unknown signal id ${id}`);
  }
  return sig;
}

export function isCaseStatement(block: ControlBlock): block is CaseStatement {
  return block.type === 'case';
}

export function isIfElseChain(block: ControlBlock): block is IfElseChain {
  return block.type === 'if-else';
}
