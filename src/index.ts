// Random datapath netlist generator
// Seeded synthesis of Verilog datapaths for stress-testing synthesis tools

// Types
export * from './types/netlist.js';
export * from './types/operations.js';

// Random stream
export { MersenneTwister, RandomStream } from './random/mt19937.js';

// Configuration
export {
  DEFAULT_CONFIG,
  ConfigError,
  createConfig,
  parseConfig,
  loadConfigFile,
  validateConfig,
  assertValidConfig,
  formatConfig,
  type GeneratorConfig,
  type ParsedConfig,
} from './config/config.js';

// Generator
export { NetlistGenerator, generateNetlist } from './generator/netlist-generator.js';
export { SignalRegistry } from './generator/signal-registry.js';
export { buildOperation } from './generator/operation.js';
export {
  CaseStatementBuilder,
  IfElseChainBuilder,
  writtenSignals,
  armTargets,
  blockOperations,
} from './generator/control-block.js';
export {
  assignCyclicDepths,
  assignDependencyDepths,
  tagPipelineStages,
  type DepthStrategy,
} from './generator/depth.js';

// Verilog output
export {
  emitVerilog,
  emitTestbench,
  emitControlBlock,
  operationAssign,
  operationExpression,
  declarationOf,
  formatTimestamp,
  type EmitOptions,
} from './emitter/verilog-emitter.js';

// CLI
export { main as runCli, isEntryPoint } from './cli.js';

import { assertValidConfig, createConfig, type GeneratorConfig } from './config/config.js';
import { generateNetlist } from './generator/netlist-generator.js';
import { emitVerilog, type EmitOptions } from './emitter/verilog-emitter.js';
import type { Netlist } from './types/netlist.js';

/**
 * Validate overrides merged onto the defaults, then generate.
 */
export function generate(overrides: Partial<GeneratorConfig> = {}): Netlist {
  const config = createConfig(overrides);
  assertValidConfig(config);
  return generateNetlist(config);
}

/**
 * Generate and render in one step.
 */
export function generateVerilog(
  overrides: Partial<GeneratorConfig> = {},
  emitOptions: Partial<EmitOptions> = {}
): string {
  return emitVerilog(generate(overrides), emitOptions);
}
