// Netlist generator: builds a random datapath from a configuration and seed
//
// Phases, in draw order:
// 1. Inputs and outputs with random widths
// 2. Datapath operations over the pool of inputs and wires
// 3. Pipeline stages, from the depths known so far (no random draws)
// 4. Control blocks (case statements, if/else chains, sharing groups)
// 5. Output connections
// 6. Depth labels (no random draws); dependency depths re-tag stages

import type { GeneratorConfig } from '../config/config.js';
import { RandomStream } from '../random/mt19937.js';
import {
  createNetlist,
  type Assignment,
  type Netlist,
  type Operation,
  type SignalId,
} from '../types/netlist.js';
import {
  ARITHMETIC_KINDS,
  type ArithmeticKind,
  CATEGORY_ORDER,
  COMPARISON_KINDS,
  LOGICAL_KINDS,
  type OperationCategory,
  REDUCTION_KINDS,
  SHIFT_KINDS,
  type ShiftKind,
} from '../types/operations.js';
import { CaseStatementBuilder, IfElseChainBuilder } from './control-block.js';
import { assignCyclicDepths, assignDependencyDepths, tagPipelineStages } from './depth.js';
import { buildOperation } from './operation.js';
import { SignalRegistry } from './signal-registry.js';

// Fixed probabilities of the generation heuristics
const MUX4_PROBABILITY = 0.3;
const CASE_ARITHMETIC_PROBABILITY = 0.7;
const BRANCH_MULTIPLY_PROBABILITY = 0.8;
const SHARING_MULTIPLY_PROBABILITY = 0.7;
const DEFAULT_BLOCK_COUNT = 2;

export class NetlistGenerator {
  private readonly config: GeneratorConfig;
  private readonly rng: RandomStream;
  private readonly netlist: Netlist;
  private readonly registry: SignalRegistry;
  private generated = false;

  constructor(config: GeneratorConfig) {
    this.config = { ...config };
    this.rng = new RandomStream(config.seed);
    this.netlist = createNetlist(config.moduleName, config.seed);
    this.netlist.maxDepth = config.maxDepth;
    this.netlist.pipelineStages = config.numPipelineStages;
    this.registry = new SignalRegistry(this.netlist);
  }

  /**
   * Run every phase and return the finished netlist. A generator instance
   * owns one random stream, so it can only generate once.
   */
  generate(): Netlist {
    if (this.generated) {
      throw new Error('NetlistGenerator.generate() can only be called once per instance');
    }
    this.generated = true;

    this.log('Generating netlist...');

    this.generateInputs();
    this.generateOutputs();
    this.generateDatapath();

    // Cyclic labels run last, so this tags every datapath op at stage 0
    if (this.config.depthStrategy === 'cyclic') {
      this.tagStages();
    }

    this.generateControlBlocks();
    this.connectOutputs();
    this.assignDepths();

    if (this.config.depthStrategy === 'dependency') {
      this.tagStages();
    }

    this.log(`Generated ${this.netlist.operations.length} operations`);
    this.log(`Generated ${this.netlist.controlBlocks.length} control blocks`);
    this.log(`Total signals: ${this.netlist.signals.length}`);

    return this.netlist;
  }

  getModuleName(): string {
    return this.netlist.name;
  }

  // ============================================================
  // Ports
  // ============================================================

  private generateInputs(): void {
    for (let i = 0; i < this.config.numInputs; i++) {
      const width = this.rng.int(this.config.inputWidthMin, this.config.inputWidthMax);
      const signed = this.randomSigned();
      this.registry.create('input', width, signed);
    }
  }

  private generateOutputs(): void {
    for (let i = 0; i < this.config.numOutputs; i++) {
      const width = this.rng.int(this.config.outputWidthMin, this.config.outputWidthMax);
      const signed = this.randomSigned();
      this.registry.create('output', width, signed);
    }
  }

  // ============================================================
  // Datapath
  // ============================================================

  private generateDatapath(): void {
    for (let i = 0; i < this.config.numOperations; i++) {
      const category = this.selectCategory();
      let available = this.registry.available();
      if (available.length === 0) {
        available = this.registry.inputs();
      }

      const op = this.generateOperation(category, available);
      if (op) {
        this.netlist.operations.push(op);
      }
    }
  }

  private generateOperation(category: OperationCategory, available: SignalId[]): Operation | null {
    switch (category) {
      case 'arithmetic':
        return this.generateArithmeticOp(available);
      case 'logical':
        return this.generateLogicalOp(available);
      case 'comparison':
        return this.generateComparisonOp(available);
      case 'shift':
        return this.generateShiftOp(available);
      case 'mux':
        return this.generateMuxOp(available);
      case 'concat':
        return this.generateConcatOp(available);
      case 'reduction':
        return this.generateReductionOp(available);
    }
  }

  private selectCategory(): OperationCategory {
    const weights: number[] = [];
    const categories: OperationCategory[] = [];

    for (const category of CATEGORY_ORDER) {
      const weight = this.categoryWeight(category);
      if (weight > 0) {
        weights.push(weight);
        categories.push(category);
      }
    }

    if (categories.length === 0) {
      throw new Error('No operation category has a positive weight');
    }
    return categories[this.rng.weighted(weights)];
  }

  private categoryWeight(category: OperationCategory): number {
    switch (category) {
      case 'arithmetic':
        return this.config.weightArithmetic;
      case 'logical':
        return this.config.weightLogical;
      case 'comparison':
        return this.config.weightComparison;
      case 'shift':
        return this.config.weightShift;
      case 'mux':
        return this.config.weightMux;
      case 'concat':
        return this.config.weightConcat;
      case 'reduction':
        return this.config.weightReduction;
    }
  }

  private selectArithmeticKind(): ArithmeticKind {
    const { weightAdd, weightSub, weightMul, weightDiv, weightMod } = this.config;
    return ARITHMETIC_KINDS[this.rng.weighted([weightAdd, weightSub, weightMul, weightDiv, weightMod])];
  }

  private selectShiftKind(): ShiftKind {
    const { weightShl, weightShr, weightSra } = this.config;
    return SHIFT_KINDS[this.rng.weighted([weightShl, weightShr, weightSra])];
  }

  private generateArithmeticOp(available: SignalId[]): Operation | null {
    const kind = this.selectArithmeticKind();
    const a = this.rng.pick(available);
    const b = this.rng.pick(available);
    if (a === undefined || b === undefined) return null;
    return buildOperation(this.registry, kind, [a, b]);
  }

  private generateLogicalOp(available: SignalId[]): Operation | null {
    const kind = LOGICAL_KINDS[this.rng.int(0, LOGICAL_KINDS.length - 1)];

    if (kind === 'not') {
      const a = this.rng.pick(available);
      if (a === undefined) return null;
      return buildOperation(this.registry, kind, [a]);
    }

    const a = this.rng.pick(available);
    const b = this.rng.pick(available);
    if (a === undefined || b === undefined) return null;
    return buildOperation(this.registry, kind, [a, b]);
  }

  private generateComparisonOp(available: SignalId[]): Operation | null {
    const kind = COMPARISON_KINDS[this.rng.int(0, COMPARISON_KINDS.length - 1)];
    const a = this.rng.pick(available);
    const b = this.rng.pick(available);
    if (a === undefined || b === undefined) return null;
    return buildOperation(this.registry, kind, [a, b]);
  }

  private generateShiftOp(available: SignalId[]): Operation | null {
    const kind = this.selectShiftKind();
    const a = this.rng.pick(available);
    const b = this.rng.pick(available);
    if (a === undefined || b === undefined) return null;
    return buildOperation(this.registry, kind, [a, b]);
  }

  private generateMuxOp(available: SignalId[]): Operation | null {
    const useMux4 = this.rng.bool(MUX4_PROBABILITY);

    if (!useMux4) {
      const sel = this.rng.pick(available);
      const a = this.rng.pick(available);
      const b = this.rng.pick(available);
      if (sel === undefined || a === undefined || b === undefined) return null;
      return buildOperation(this.registry, 'mux2', [sel, a, b]);
    }

    let sel = this.rng.pick(available);
    if (sel === undefined) return null;
    if (this.registry.get(sel).width < 2) {
      // Needs a 2-bit select; the substitute is left undriven
      sel = this.registry.createWire(2, false);
    }

    const data: SignalId[] = [];
    for (let i = 0; i < 4; i++) {
      const d = this.rng.pick(available);
      if (d !== undefined) data.push(d);
    }
    return buildOperation(this.registry, 'mux4', [sel, ...data]);
  }

  private generateConcatOp(available: SignalId[]): Operation | null {
    const count = this.rng.int(2, 4);
    const parts: SignalId[] = [];

    for (let i = 0; i < count; i++) {
      const sig = this.rng.pick(available);
      if (sig !== undefined) parts.push(sig);
    }
    return buildOperation(this.registry, 'concat', parts);
  }

  private generateReductionOp(available: SignalId[]): Operation | null {
    const kind = REDUCTION_KINDS[this.rng.int(0, REDUCTION_KINDS.length - 1)];
    const a = this.rng.pick(available);
    if (a === undefined) return null;
    return buildOperation(this.registry, kind, [a]);
  }

  // ============================================================
  // Control blocks
  // ============================================================

  private generateControlBlocks(): void {
    if (this.config.generateCaseStatements || this.config.numCaseStatements > 0) {
      this.generateCaseStatements();
    }
    if (this.config.generateIfElseChains || this.config.numIfElseChains > 0) {
      this.generateIfElseChains();
    }
    if (this.config.generateSharingOpportunities) {
      this.generateSharingOpportunities();
    }
  }

  private blockCount(explicit: number, enabled: boolean): number {
    if (explicit > 0) return explicit;
    return enabled ? DEFAULT_BLOCK_COUNT : 0;
  }

  private createSharedRegisters(): SignalId[] {
    const count = this.rng.int(1, 3);
    const registers: SignalId[] = [];
    for (let i = 0; i < count; i++) {
      const width = this.rng.int(this.config.inputWidthMin, this.config.inputWidthMax);
      registers.push(this.registry.createRegister(width, this.randomSigned()));
    }
    return registers;
  }

  private generateCaseStatements(): void {
    const count = this.blockCount(this.config.numCaseStatements, this.config.generateCaseStatements);
    const lookup = (id: SignalId) => this.registry.get(id);

    for (let i = 0; i < count; i++) {
      const available = this.registry.available();
      const selector = this.rng.pick(available);
      if (selector === undefined) continue;

      // Limit the arm count to what the selector can encode, at most 16
      const selectorWidth = this.registry.get(selector).width;
      const numCases = Math.min(1 << Math.min(selectorWidth, 4), this.config.casesPerStatement);

      const block = new CaseStatementBuilder(lookup, selector);
      const registers = this.createSharedRegisters();

      for (let value = 0; value < numCases; value++) {
        block.addCase(value);

        for (const reg of registers) {
          if (this.config.generateSharingOpportunities && this.rng.bool(CASE_ARITHMETIC_PROBABILITY)) {
            const a = this.rng.pick(available);
            const b = this.rng.pick(available);
            if (a === undefined || b === undefined) continue;

            const kind = this.selectArithmeticKind();
            const op = buildOperation(this.registry, kind, [a, b]);
            if (!op) continue;
            block.addCaseOperation(value, op);
            block.addCaseAssignment(value, reg, op.output);
          } else {
            const source = this.rng.pick(available);
            if (source !== undefined) {
              block.addCaseAssignment(value, reg, source);
            }
          }
        }
      }

      const defaults: Assignment[] = [];
      for (const reg of registers) {
        const source = this.rng.pick(available);
        if (source !== undefined) {
          defaults.push({ target: reg, source });
        }
      }
      block.setDefault(defaults);

      this.netlist.controlBlocks.push(block.build());
      this.log(`Generated case statement with ${numCases} cases`);
    }
  }

  private generateIfElseChains(): void {
    const count = this.blockCount(this.config.numIfElseChains, this.config.generateIfElseChains);
    const lookup = (id: SignalId) => this.registry.get(id);

    for (let i = 0; i < count; i++) {
      const available = this.registry.available();
      if (available.length < 3) continue;

      const block = new IfElseChainBuilder(lookup);
      const registers = this.createSharedRegisters();
      const numBranches = this.rng.int(2, 4);

      for (let b = 0; b < numBranches; b++) {
        let branch: number;
        if (b < numBranches - 1) {
          const cond = this.rng.pick(available);
          if (cond === undefined) continue;
          branch = block.addBranch(cond);
        } else {
          branch = block.addElseBranch();
        }

        // Mutually exclusive multiplies: candidates for one shared unit
        for (const reg of registers) {
          if (this.config.generateSharingOpportunities && this.rng.bool(BRANCH_MULTIPLY_PROBABILITY)) {
            const x = this.rng.pick(available);
            const y = this.rng.pick(available);
            if (x === undefined || y === undefined) continue;

            const op = buildOperation(this.registry, 'mul', [x, y]);
            if (!op) continue;
            block.addBranchOperation(branch, op);
            block.addBranchAssignment(branch, reg, op.output);
          } else {
            const source = this.rng.pick(available);
            if (source !== undefined) {
              block.addBranchAssignment(branch, reg, source);
            }
          }
        }
      }

      this.netlist.controlBlocks.push(block.build());
      this.log(`Generated if-else chain with ${numBranches} branches (mutually exclusive)`);
    }
  }

  private generateSharingOpportunities(): void {
    const available = this.registry.available();
    if (available.length < 4) return;

    const numGroups = this.rng.int(1, 3);

    for (let g = 0; g < numGroups; g++) {
      const enable = this.rng.pick(available);
      if (enable === undefined) continue;

      const opsInGroup = this.rng.int(2, 3);
      const members: number[] = [];

      for (let i = 0; i < opsInGroup; i++) {
        const a = this.rng.pick(available);
        const b = this.rng.pick(available);
        if (a === undefined || b === undefined) continue;

        const kind = this.rng.bool(SHARING_MULTIPLY_PROBABILITY) ? 'mul' : 'add';
        const op = buildOperation(this.registry, kind, [a, b]);
        if (!op) continue;
        members.push(this.netlist.operations.length);
        this.netlist.operations.push(op);
      }

      this.netlist.sharingGroups.push({ enable, operations: members });
      this.log(`Generated sharing opportunity group with ${opsInGroup} operations`);
    }
  }

  // ============================================================
  // Outputs and post-passes
  // ============================================================

  private connectOutputs(): void {
    const available = this.registry.available();

    for (const output of this.netlist.outputs) {
      const source = this.rng.pick(available);
      if (source === undefined) continue;

      // Width mismatches are recorded, not corrected
      const mismatch = this.registry.get(source).width !== this.registry.get(output).width;
      this.netlist.connections.push({
        output,
        source,
        coercion: mismatch ? 'unchecked' : 'exact',
      });
    }
  }

  private assignDepths(): void {
    if (this.config.depthStrategy === 'dependency') {
      assignDependencyDepths(this.netlist);
    } else {
      assignCyclicDepths(this.netlist.operations, this.config.maxDepth);
    }
  }

  private tagStages(): void {
    if (this.config.numPipelineStages > 0) {
      tagPipelineStages(this.netlist.operations, this.config.numPipelineStages, this.config.maxDepth);
    }
  }

  private randomSigned(): boolean {
    return this.config.useSigned && this.rng.bool(0.5);
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(message);
    }
  }
}

/**
 * Generate a netlist in one call.
 */
export function generateNetlist(config: GeneratorConfig): Netlist {
  return new NetlistGenerator(config).generate();
}
