// Depth and pipeline-stage labelling for generated operations

import type { Netlist, Operation, SignalId } from '../types/netlist.js';
import { blockOperations } from './control-block.js';

export type DepthStrategy = 'cyclic' | 'dependency';

/**
 * Label operation i with depth i mod maxDepth.
 *
 * This is a creation-order label, not a combinational depth: it ignores the
 * operands entirely.
 */
export function assignCyclicDepths(operations: Operation[], maxDepth: number): void {
  for (let i = 0; i < operations.length; i++) {
    operations[i].depth = i % maxDepth;
  }
}

/**
 * Label every main-list operation with its dependency depth.
 *
 * Inputs, registers and undriven wires sit at level 0; an operation's output
 * sits one level above its deepest operand. Control-block operations take
 * part in the propagation because their wires can feed later operations.
 * Returns the deepest level reached.
 */
export function assignDependencyDepths(netlist: Netlist): number {
  const nested = netlist.controlBlocks.flatMap(blockOperations);
  const all = [...netlist.operations, ...nested];

  const driven = new Set<SignalId>();
  for (const op of all) {
    driven.add(op.output);
  }

  const signalLevel = new Map<SignalId, number>();
  for (const sig of netlist.signals) {
    if (!driven.has(sig.id)) {
      signalLevel.set(sig.id, 0);
    }
  }

  // A level can only be assigned once all operand levels are known
  let changed = true;
  let iterations = 0;
  const maxIterations = all.length + 10;

  while (changed) {
    changed = false;
    iterations++;

    if (iterations > maxIterations) {
      throw new Error('Depth assignment failed: possible combinational loop detected');
    }

    for (const op of all) {
      if (signalLevel.has(op.output)) continue;

      let maxOperandLevel = -1;
      let ready = true;
      for (const operand of op.operands) {
        const level = signalLevel.get(operand);
        if (level === undefined) {
          ready = false;
          break;
        }
        if (level > maxOperandLevel) maxOperandLevel = level;
      }

      if (ready) {
        signalLevel.set(op.output, maxOperandLevel + 1);
        changed = true;
      }
    }
  }

  if (all.some((op) => !signalLevel.has(op.output))) {
    throw new Error('Depth assignment failed: possible combinational loop detected');
  }

  let deepest = 0;
  for (const op of netlist.operations) {
    op.depth = signalLevel.get(op.output) ?? 0;
    if (op.depth > deepest) deepest = op.depth;
  }
  return deepest;
}

/**
 * Tag each operation with floor(depth * stages / maxDepth), clamped to the
 * last stage.
 */
export function tagPipelineStages(operations: Operation[], stages: number, maxDepth: number): void {
  if (stages <= 0) return;

  for (const op of operations) {
    const stage = Math.floor((op.depth * stages) / maxDepth);
    op.stage = Math.min(stage, stages - 1);
  }
}
