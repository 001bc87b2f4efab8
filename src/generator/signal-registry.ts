// Signal registry: append-only arena of signals for one generation run

import type { Netlist, Signal, SignalId, SignalRole } from '../types/netlist.js';

export class SignalRegistry {
  private netlist: Netlist;

  // Shared by wires and registers so their names never collide
  private internalCounter = 0;

  constructor(netlist: Netlist) {
    this.netlist = netlist;
  }

  /**
   * Allocate a fresh signal, append it to the arena and to its role list,
   * and return its id.
   */
  create(role: SignalRole, width: number, signed: boolean = false): SignalId {
    if (!Number.isInteger(width) || width < 1) {
      throw new Error(`Signal width must be a positive integer, got ${width}`);
    }

    const id = this.netlist.signals.length;
    const sig: Signal = { id, name: this.nextName(role), width, role, signed };
    this.netlist.signals.push(sig);
    this.listFor(role).push(id);
    return id;
  }

  createWire(width: number, signed: boolean = false): SignalId {
    return this.create('wire', width, signed);
  }

  createRegister(width: number, signed: boolean = false): SignalId {
    return this.create('register', width, signed);
  }

  get(id: SignalId): Signal {
    const sig = this.netlist.signals[id];
    if (!sig) {
      throw new Error(`Unknown signal id ${id}`);
    }
    return sig;
  }

  /**
   * Signals eligible as operands: all inputs, then all wires, in
   * declaration order. Outputs and registers are never read.
   */
  available(): SignalId[] {
    return [...this.netlist.inputs, ...this.netlist.wires];
  }

  inputs(): SignalId[] {
    return [...this.netlist.inputs];
  }

  get size(): number {
    return this.netlist.signals.length;
  }

  private nextName(role: SignalRole): string {
    switch (role) {
      case 'input':
        return `in_${this.netlist.inputs.length}`;
      case 'output':
        return `out_${this.netlist.outputs.length}`;
      case 'wire':
        return `wire_${this.internalCounter++}`;
      case 'register':
        return `reg_${this.internalCounter++}`;
    }
  }

  private listFor(role: SignalRole): SignalId[] {
    switch (role) {
      case 'input':
        return this.netlist.inputs;
      case 'output':
        return this.netlist.outputs;
      case 'wire':
        return this.netlist.wires;
      case 'register':
        return this.netlist.registers;
    }
  }
}
