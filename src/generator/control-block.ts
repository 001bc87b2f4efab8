// Control blocks: case statements and if/else chains whose arms write a
// shared set of registers, so at most one arm's operations are live at once

import type {
  Assignment,
  Branch,
  CaseItem,
  CaseStatement,
  ControlBlock,
  IfElseChain,
  Operation,
  Signal,
  SignalId,
} from '../types/netlist.js';

type SignalLookup = (id: SignalId) => Signal;

function checkTarget(lookup: SignalLookup, target: SignalId): void {
  const sig = lookup(target);
  if (sig.role !== 'register') {
    throw new Error(`Control block can only assign registers, '${sig.name}' is a ${sig.role}`);
  }
}

export class CaseStatementBuilder {
  private readonly cases: CaseItem[] = [];
  private defaultAssignments: Assignment[] = [];

  constructor(
    private readonly lookup: SignalLookup,
    private readonly selector: SignalId
  ) {}

  addCase(value: number): void {
    if (this.cases.some((c) => c.value === value)) {
      throw new Error(`Duplicate case value ${value}`);
    }
    this.cases.push({ value, operations: [], assignments: [] });
  }

  addCaseOperation(value: number, op: Operation): void {
    this.caseFor(value).operations.push(op);
  }

  addCaseAssignment(value: number, target: SignalId, source: SignalId): void {
    checkTarget(this.lookup, target);
    this.caseFor(value).assignments.push({ target, source });
  }

  setDefault(assignments: Assignment[]): void {
    for (const a of assignments) {
      checkTarget(this.lookup, a.target);
    }
    this.defaultAssignments = [...assignments];
  }

  build(): CaseStatement {
    return {
      type: 'case',
      selector: this.selector,
      cases: this.cases,
      defaultAssignments: this.defaultAssignments,
    };
  }

  private caseFor(value: number): CaseItem {
    const item = this.cases.find((c) => c.value === value);
    if (!item) {
      throw new Error(`No case with value ${value}`);
    }
    return item;
  }
}

export class IfElseChainBuilder {
  private readonly branches: Branch[] = [];

  constructor(private readonly lookup: SignalLookup) {}

  /**
   * Append an `if` / `else if` branch and return its index.
   */
  addBranch(condition: SignalId): number {
    this.checkOpen();
    this.branches.push({ condition, operations: [], assignments: [] });
    return this.branches.length - 1;
  }

  /**
   * Append the trailing `else`. No branch may follow it.
   */
  addElseBranch(): number {
    this.checkOpen();
    if (this.branches.length === 0) {
      throw new Error('An else branch needs a preceding if branch');
    }
    this.branches.push({ condition: null, operations: [], assignments: [] });
    return this.branches.length - 1;
  }

  addBranchOperation(index: number, op: Operation): void {
    this.branchAt(index).operations.push(op);
  }

  addBranchAssignment(index: number, target: SignalId, source: SignalId): void {
    checkTarget(this.lookup, target);
    this.branchAt(index).assignments.push({ target, source });
  }

  build(): IfElseChain {
    return { type: 'if-else', branches: this.branches };
  }

  private checkOpen(): void {
    const last = this.branches[this.branches.length - 1];
    if (last && last.condition === null) {
      throw new Error('Cannot add a branch after else');
    }
  }

  private branchAt(index: number): Branch {
    const branch = this.branches[index];
    if (!branch) {
      throw new Error(`No branch at index ${index}`);
    }
    return branch;
  }
}

/**
 * Every signal a block writes, in first-write order, without duplicates.
 */
export function writtenSignals(block: ControlBlock): SignalId[] {
  const seen = new Set<SignalId>();
  const result: SignalId[] = [];
  const visit = (assignments: readonly Assignment[]): void => {
    for (const { target } of assignments) {
      if (!seen.has(target)) {
        seen.add(target);
        result.push(target);
      }
    }
  };

  if (block.type === 'case') {
    for (const item of block.cases) {
      visit(item.assignments);
    }
    visit(block.defaultAssignments);
  } else {
    for (const branch of block.branches) {
      visit(branch.assignments);
    }
  }

  return result;
}

/**
 * Written-register set of each arm (cases then default, or branches).
 */
export function armTargets(block: ControlBlock): SignalId[][] {
  const targetsOf = (assignments: readonly Assignment[]): SignalId[] =>
    assignments.map((a) => a.target);

  if (block.type === 'case') {
    return [
      ...block.cases.map((c) => targetsOf(c.assignments)),
      targetsOf(block.defaultAssignments),
    ];
  }
  return block.branches.map((b) => targetsOf(b.assignments));
}

/**
 * All operations nested in a block, in arm order.
 */
export function blockOperations(block: ControlBlock): Operation[] {
  const arms: Array<CaseItem | Branch> = block.type === 'case' ? block.cases : block.branches;
  return arms.flatMap((arm) => arm.operations);
}
