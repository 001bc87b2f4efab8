// Operation construction: arity check, type inference, fresh output wire

import type { Operation, SignalId } from '../types/netlist.js';
import { acceptsOperandCount, type OperationKind, inferOutputType } from '../types/operations.js';
import type { SignalRegistry } from './signal-registry.js';

/**
 * Build an operation of `kind` over `operands`, allocating its output wire.
 *
 * Returns null, and allocates nothing, when the operand count does not meet
 * the kind's arity.
 */
export function buildOperation(
  registry: SignalRegistry,
  kind: OperationKind,
  operands: readonly SignalId[]
): Operation | null {
  if (!acceptsOperandCount(kind, operands.length)) {
    return null;
  }

  const type = inferOutputType(
    kind,
    operands.map((id) => registry.get(id))
  );
  const output = registry.createWire(type.width, type.signed);

  return {
    kind,
    output,
    operands: [...operands],
    depth: 0,
    stage: 0,
  };
}
