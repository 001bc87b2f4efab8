// Operation kinds: the closed set of datapath primitives the generator emits,
// grouped by category, with their operand arity and output type rules.

export type ArithmeticKind = 'add' | 'sub' | 'mul' | 'div' | 'mod';
export type LogicalKind = 'and' | 'or' | 'xor' | 'not' | 'nand' | 'nor' | 'xnor';
export type ComparisonKind = 'eq' | 'neq' | 'lt' | 'gt' | 'lte' | 'gte';
export type ShiftKind = 'shl' | 'shr' | 'sra';
export type ReductionKind =
  | 'red_and'
  | 'red_or'
  | 'red_xor'
  | 'red_nand'
  | 'red_nor'
  | 'red_xnor';
export type MuxKind = 'mux2' | 'mux4';

export type OperationKind =
  | ArithmeticKind
  | LogicalKind
  | ComparisonKind
  | ShiftKind
  | ReductionKind
  | MuxKind
  | 'concat'
  | 'conditional';

// Categories drawn in the first level of the weighted selection, in draw order
export type OperationCategory =
  | 'arithmetic'
  | 'logical'
  | 'comparison'
  | 'shift'
  | 'mux'
  | 'concat'
  | 'reduction';

export const CATEGORY_ORDER: readonly OperationCategory[] = [
  'arithmetic',
  'logical',
  'comparison',
  'shift',
  'mux',
  'concat',
  'reduction',
];

// Order matters: these are the index spaces of the second-level draws
export const ARITHMETIC_KINDS: readonly ArithmeticKind[] = ['add', 'sub', 'mul', 'div', 'mod'];
export const LOGICAL_KINDS: readonly LogicalKind[] = ['and', 'or', 'xor', 'not', 'nand', 'nor', 'xnor'];
export const COMPARISON_KINDS: readonly ComparisonKind[] = ['eq', 'neq', 'lt', 'gt', 'lte', 'gte'];
export const SHIFT_KINDS: readonly ShiftKind[] = ['shl', 'shr', 'sra'];
export const REDUCTION_KINDS: readonly ReductionKind[] = [
  'red_and',
  'red_or',
  'red_xor',
  'red_nand',
  'red_nor',
  'red_xnor',
];

// Operand count requirement: exact, or a lower bound for variadic kinds
export interface Arity {
  min: number;
  max: number;
}

const UNARY: Arity = { min: 1, max: 1 };
const BINARY: Arity = { min: 2, max: 2 };
const TERNARY: Arity = { min: 3, max: 3 };

export const ARITY: Readonly<Record<OperationKind, Arity>> = {
  add: BINARY,
  sub: BINARY,
  mul: BINARY,
  div: BINARY,
  mod: BINARY,
  and: BINARY,
  or: BINARY,
  xor: BINARY,
  not: UNARY,
  nand: BINARY,
  nor: BINARY,
  xnor: BINARY,
  eq: BINARY,
  neq: BINARY,
  lt: BINARY,
  gt: BINARY,
  lte: BINARY,
  gte: BINARY,
  shl: BINARY,
  shr: BINARY,
  sra: BINARY,
  red_and: UNARY,
  red_or: UNARY,
  red_xor: UNARY,
  red_nand: UNARY,
  red_nor: UNARY,
  red_xnor: UNARY,
  mux2: TERNARY,
  mux4: { min: 5, max: 5 },
  concat: { min: 2, max: Infinity },
  conditional: TERNARY,
};

export function acceptsOperandCount(kind: OperationKind, count: number): boolean {
  const arity = ARITY[kind];
  return count >= arity.min && count <= arity.max;
}

export function categoryOf(kind: OperationKind): OperationCategory | null {
  switch (kind) {
    case 'add':
    case 'sub':
    case 'mul':
    case 'div':
    case 'mod':
      return 'arithmetic';
    case 'and':
    case 'or':
    case 'xor':
    case 'not':
    case 'nand':
    case 'nor':
    case 'xnor':
      return 'logical';
    case 'eq':
    case 'neq':
    case 'lt':
    case 'gt':
    case 'lte':
    case 'gte':
      return 'comparison';
    case 'shl':
    case 'shr':
    case 'sra':
      return 'shift';
    case 'red_and':
    case 'red_or':
    case 'red_xor':
    case 'red_nand':
    case 'red_nor':
    case 'red_xnor':
      return 'reduction';
    case 'mux2':
    case 'mux4':
      return 'mux';
    case 'concat':
      return 'concat';
    case 'conditional':
      // Never drawn by category; only constructible directly
      return null;
  }
}

// Width and signedness of one operand, as seen by inference
export interface OperandType {
  width: number;
  signed: boolean;
}

/**
 * Infer the output type of an operation from its operand types.
 *
 * Operands are in emission order: mux and conditional take the selector
 * first, shifts take the shifted value first. The caller is responsible for
 * the operand count (see `acceptsOperandCount`).
 */
export function inferOutputType(kind: OperationKind, operands: readonly OperandType[]): OperandType {
  const [a, b] = operands;

  switch (kind) {
    case 'add':
    case 'sub':
    case 'div':
    case 'mod':
      return { width: Math.max(a.width, b.width), signed: a.signed || b.signed };
    case 'mul':
      return { width: a.width + b.width, signed: a.signed || b.signed };
    case 'and':
    case 'or':
    case 'xor':
    case 'nand':
    case 'nor':
    case 'xnor':
      return { width: Math.max(a.width, b.width), signed: false };
    case 'not':
      return { width: a.width, signed: a.signed };
    case 'eq':
    case 'neq':
    case 'lt':
    case 'gt':
    case 'lte':
    case 'gte':
    case 'red_and':
    case 'red_or':
    case 'red_xor':
    case 'red_nand':
    case 'red_nor':
    case 'red_xnor':
      return { width: 1, signed: false };
    case 'shl':
    case 'shr':
    case 'sra':
      return { width: a.width, signed: a.signed };
    case 'mux2':
    case 'conditional': {
      const [, x, y] = operands;
      return { width: Math.max(x.width, y.width), signed: x.signed || y.signed };
    }
    case 'mux4':
      return { width: operands[1].width, signed: false };
    case 'concat': {
      let width = 0;
      for (const op of operands) {
        width += op.width;
      }
      return { width, signed: false };
    }
  }
}
