// Generator configuration: defaults, `key = value` file loading, validation

import { readFileSync } from 'fs';
import type { DepthStrategy } from '../generator/depth.js';

export interface GeneratorConfig {
  // Randomization
  seed: number;

  // Module properties
  moduleName: string;
  numInputs: number;
  numOutputs: number;
  inputWidthMin: number;
  inputWidthMax: number;
  outputWidthMin: number;
  outputWidthMax: number;

  // Datapath complexity
  numOperations: number;
  maxDepth: number;            // Modulus of the depth labels
  numPipelineStages: number;   // 0 for combinational only
  depthStrategy: DepthStrategy;

  // Category weights (unnormalized, <= 0 disables the category)
  weightArithmetic: number;
  weightLogical: number;
  weightComparison: number;
  weightShift: number;
  weightMux: number;
  weightConcat: number;
  weightReduction: number;

  // Arithmetic subkind weights
  weightAdd: number;
  weightSub: number;
  weightMul: number;
  weightDiv: number;
  weightMod: number;

  // Shift subkind weights
  weightShl: number;
  weightShr: number;
  weightSra: number;

  useSigned: boolean;

  // Control flow (mutually exclusive regions for resource-sharing tests)
  generateCaseStatements: boolean;
  generateIfElseChains: boolean;
  generateSharingOpportunities: boolean;
  numCaseStatements: number;
  numIfElseChains: number;
  casesPerStatement: number;

  // Output options
  outputFile: string;
  generateTestbench: boolean;
  verbose: boolean;
}

export const DEFAULT_CONFIG: GeneratorConfig = {
  seed: 0,
  moduleName: 'random_datapath',
  numInputs: 8,
  numOutputs: 4,
  inputWidthMin: 8,
  inputWidthMax: 32,
  outputWidthMin: 8,
  outputWidthMax: 32,
  numOperations: 50,
  maxDepth: 10,
  numPipelineStages: 0,
  depthStrategy: 'cyclic',
  weightArithmetic: 0.3,
  weightLogical: 0.2,
  weightComparison: 0.1,
  weightShift: 0.15,
  weightMux: 0.15,
  weightConcat: 0.05,
  weightReduction: 0.05,
  weightAdd: 0.3,
  weightSub: 0.3,
  weightMul: 0.25,
  weightDiv: 0.1,
  weightMod: 0.05,
  weightShl: 0.4,
  weightShr: 0.4,
  weightSra: 0.2,
  useSigned: true,
  generateCaseStatements: false,
  generateIfElseChains: false,
  generateSharingOpportunities: false,
  numCaseStatements: 0,
  numIfElseChains: 0,
  casesPerStatement: 4,
  outputFile: 'output.v',
  generateTestbench: false,
  verbose: false,
};

export class ConfigError extends Error {
  constructor(message: string, public line?: number) {
    super(line === undefined ? message : `${message} at line ${line}`);
    this.name = 'ConfigError';
  }
}

/**
 * Merge overrides onto the defaults. A missing seed is taken from the clock.
 */
export function createConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  return {
    ...DEFAULT_CONFIG,
    seed: Math.floor(Date.now() / 1000) >>> 0,
    ...overrides,
  };
}

type NumberKey = {
  [K in keyof GeneratorConfig]: GeneratorConfig[K] extends number ? K : never;
}[keyof GeneratorConfig];

type BooleanKey = {
  [K in keyof GeneratorConfig]: GeneratorConfig[K] extends boolean ? K : never;
}[keyof GeneratorConfig];

type FieldSpec =
  | { kind: 'int'; field: NumberKey }
  | { kind: 'float'; field: NumberKey }
  | { kind: 'bool'; field: BooleanKey }
  | { kind: 'string'; field: 'moduleName' | 'outputFile' }
  | { kind: 'depth-strategy'; field: 'depthStrategy' };

// File keys are snake_case
const FILE_KEYS: Record<string, FieldSpec> = {
  seed: { kind: 'int', field: 'seed' },
  module_name: { kind: 'string', field: 'moduleName' },
  num_inputs: { kind: 'int', field: 'numInputs' },
  num_outputs: { kind: 'int', field: 'numOutputs' },
  input_width_min: { kind: 'int', field: 'inputWidthMin' },
  input_width_max: { kind: 'int', field: 'inputWidthMax' },
  output_width_min: { kind: 'int', field: 'outputWidthMin' },
  output_width_max: { kind: 'int', field: 'outputWidthMax' },
  num_operations: { kind: 'int', field: 'numOperations' },
  max_depth: { kind: 'int', field: 'maxDepth' },
  num_pipeline_stages: { kind: 'int', field: 'numPipelineStages' },
  depth_strategy: { kind: 'depth-strategy', field: 'depthStrategy' },
  weight_arithmetic: { kind: 'float', field: 'weightArithmetic' },
  weight_logical: { kind: 'float', field: 'weightLogical' },
  weight_comparison: { kind: 'float', field: 'weightComparison' },
  weight_shift: { kind: 'float', field: 'weightShift' },
  weight_mux: { kind: 'float', field: 'weightMux' },
  weight_concat: { kind: 'float', field: 'weightConcat' },
  weight_reduction: { kind: 'float', field: 'weightReduction' },
  weight_add: { kind: 'float', field: 'weightAdd' },
  weight_sub: { kind: 'float', field: 'weightSub' },
  weight_mult: { kind: 'float', field: 'weightMul' },
  weight_div: { kind: 'float', field: 'weightDiv' },
  weight_mod: { kind: 'float', field: 'weightMod' },
  weight_sll: { kind: 'float', field: 'weightShl' },
  weight_srl: { kind: 'float', field: 'weightShr' },
  weight_sra: { kind: 'float', field: 'weightSra' },
  use_signed: { kind: 'bool', field: 'useSigned' },
  generate_case_statements: { kind: 'bool', field: 'generateCaseStatements' },
  generate_if_else_chains: { kind: 'bool', field: 'generateIfElseChains' },
  generate_sharing_opportunities: { kind: 'bool', field: 'generateSharingOpportunities' },
  num_case_statements: { kind: 'int', field: 'numCaseStatements' },
  num_if_else_chains: { kind: 'int', field: 'numIfElseChains' },
  cases_per_statement: { kind: 'int', field: 'casesPerStatement' },
  output_file: { kind: 'string', field: 'outputFile' },
  generate_testbench: { kind: 'bool', field: 'generateTestbench' },
  verbose: { kind: 'bool', field: 'verbose' },
};

export interface ParsedConfig {
  config: GeneratorConfig;
  warnings: string[];
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse `key = value` lines onto a base configuration.
 *
 * Blank lines and lines starting with '#' are skipped. Unknown keys are
 * reported as warnings; malformed values throw a ConfigError with the line.
 */
export function parseConfig(source: string, base: GeneratorConfig = createConfig()): ParsedConfig {
  const config: GeneratorConfig = { ...base };
  const warnings: string[] = [];

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNum = i + 1;
    const line = lines[i];

    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq < 0) {
      throw new ConfigError(`Expected 'key = value', got '${line.trim()}'`, lineNum);
    }

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    const entry = FILE_KEYS[key];

    if (!entry) {
      warnings.push(`Unknown config key '${key}' at line ${lineNum}`);
      continue;
    }

    switch (entry.kind) {
      case 'int':
        if (!INT_PATTERN.test(value)) {
          throw new ConfigError(`Invalid integer for '${key}': '${value}'`, lineNum);
        }
        config[entry.field] = parseInt(value, 10);
        break;
      case 'float':
        if (!FLOAT_PATTERN.test(value)) {
          throw new ConfigError(`Invalid number for '${key}': '${value}'`, lineNum);
        }
        config[entry.field] = parseFloat(value);
        break;
      case 'bool':
        config[entry.field] = value === 'true' || value === '1';
        break;
      case 'string':
        if (value === '') {
          throw new ConfigError(`Empty value for '${key}'`, lineNum);
        }
        config[entry.field] = value;
        break;
      case 'depth-strategy':
        if (value !== 'cyclic' && value !== 'dependency') {
          throw new ConfigError(
            `Invalid depth strategy '${value}' (expected 'cyclic' or 'dependency')`,
            lineNum
          );
        }
        config.depthStrategy = value;
        break;
    }
  }

  return { config, warnings };
}

/**
 * Read and parse a configuration file. Throws ConfigError on I/O or parse
 * failure; the result is not validated.
 */
export function loadConfigFile(path: string, base?: GeneratorConfig): ParsedConfig {
  let source: string;
  try {
    source = readFileSync(path, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    throw new ConfigError(`Cannot read config file: ${path}`);
  }
  return parseConfig(source, base);
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Check every bound the generator relies on. Returns one message per
 * problem; an empty list means the configuration is usable.
 */
export function validateConfig(config: GeneratorConfig): string[] {
  const errors: string[] = [];

  if (!inRange(config.numInputs, 1, 1000)) {
    errors.push('num_inputs must be between 1 and 1000');
  }
  if (!inRange(config.numOutputs, 1, 1000)) {
    errors.push('num_outputs must be between 1 and 1000');
  }
  if (!Number.isInteger(config.inputWidthMin) || config.inputWidthMin < 1 ||
      !Number.isInteger(config.inputWidthMax) || config.inputWidthMin > config.inputWidthMax) {
    errors.push('Invalid input width range');
  }
  if (!Number.isInteger(config.outputWidthMin) || config.outputWidthMin < 1 ||
      !Number.isInteger(config.outputWidthMax) || config.outputWidthMin > config.outputWidthMax) {
    errors.push('Invalid output width range');
  }
  if (!Number.isInteger(config.numOperations) || config.numOperations < 1) {
    errors.push('num_operations must be at least 1');
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 1) {
    errors.push('max_depth must be at least 1');
  }
  if (!Number.isInteger(config.numPipelineStages) || config.numPipelineStages < 0) {
    errors.push('num_pipeline_stages must not be negative');
  }
  if (!Number.isInteger(config.casesPerStatement) || config.casesPerStatement < 1) {
    errors.push('cases_per_statement must be at least 1');
  }
  if (!Number.isInteger(config.numCaseStatements) || config.numCaseStatements < 0) {
    errors.push('num_case_statements must not be negative');
  }
  if (!Number.isInteger(config.numIfElseChains) || config.numIfElseChains < 0) {
    errors.push('num_if_else_chains must not be negative');
  }
  if (!Number.isInteger(config.seed) || config.seed < 0 || config.seed > 0xffffffff) {
    errors.push('seed must be an unsigned 32-bit integer');
  }

  const categoryTotal = positiveTotal([
    config.weightArithmetic,
    config.weightLogical,
    config.weightComparison,
    config.weightShift,
    config.weightMux,
    config.weightConcat,
    config.weightReduction,
  ]);
  if (categoryTotal <= 0) {
    errors.push('Total operation weight must be positive');
  }

  // Case statements draw arithmetic subkinds even when the category is off
  const drawsArithmetic =
    config.weightArithmetic > 0 ||
    (config.generateSharingOpportunities &&
      (config.generateCaseStatements || config.numCaseStatements > 0));
  const arithmeticTotal = positiveTotal([
    config.weightAdd,
    config.weightSub,
    config.weightMul,
    config.weightDiv,
    config.weightMod,
  ]);
  if (drawsArithmetic && arithmeticTotal <= 0) {
    errors.push('Total arithmetic weight must be positive');
  }

  const shiftTotal = positiveTotal([config.weightShl, config.weightShr, config.weightSra]);
  if (config.weightShift > 0 && shiftTotal <= 0) {
    errors.push('Total shift weight must be positive');
  }

  const weights = [
    config.weightAdd, config.weightSub, config.weightMul, config.weightDiv, config.weightMod,
    config.weightShl, config.weightShr, config.weightSra,
  ];
  if (weights.some((w) => !Number.isFinite(w) || w < 0)) {
    errors.push('Subkind weights must be finite and non-negative');
  }

  return errors;
}

/**
 * Throw a ConfigError listing every validation problem.
 */
export function assertValidConfig(config: GeneratorConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`);
  }
}

function positiveTotal(weights: readonly number[]): number {
  let total = 0;
  for (const w of weights) {
    if (Number.isFinite(w) && w > 0) total += w;
  }
  return total;
}

/**
 * Human-readable summary, printed by the CLI in verbose mode.
 */
export function formatConfig(config: GeneratorConfig): string {
  return [
    '=== Generator Configuration ===',
    `Seed: ${config.seed}`,
    `Module: ${config.moduleName}`,
    `Inputs: ${config.numInputs} (width: ${config.inputWidthMin}-${config.inputWidthMax})`,
    `Outputs: ${config.numOutputs} (width: ${config.outputWidthMin}-${config.outputWidthMax})`,
    `Operations: ${config.numOperations}`,
    `Max depth: ${config.maxDepth} (${config.depthStrategy})`,
    `Pipeline stages: ${config.numPipelineStages}`,
    `Output file: ${config.outputFile}`,
    '================================',
  ].join('\n');
}
