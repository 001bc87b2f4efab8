#!/usr/bin/env node
/**
 * Random datapath generator CLI
 *
 * Usage: datapath-gen [options]
 */

import { realpathSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { fileURLToPath } from 'url';
import {
  ConfigError,
  type GeneratorConfig,
  createConfig,
  formatConfig,
  loadConfigFile,
  validateConfig,
} from './config/config.js';
import { NetlistGenerator } from './generator/netlist-generator.js';
import { emitTestbench, emitVerilog } from './emitter/verilog-emitter.js';

interface CliOptions {
  help: boolean;
  configFile: string | null;
  overrides: Partial<GeneratorConfig>;
}

type IntegerFlag = {
  key:
    | 'numOperations'
    | 'numInputs'
    | 'numOutputs'
    | 'seed'
    | 'maxDepth'
    | 'numPipelineStages'
    | 'numCaseStatements'
    | 'numIfElseChains';
  name: string;
};

const INTEGER_FLAGS: Record<string, IntegerFlag> = {
  '-n': { key: 'numOperations', name: '--num-ops' },
  '--num-ops': { key: 'numOperations', name: '--num-ops' },
  '-i': { key: 'numInputs', name: '--inputs' },
  '--inputs': { key: 'numInputs', name: '--inputs' },
  '-O': { key: 'numOutputs', name: '--outputs' },
  '--outputs': { key: 'numOutputs', name: '--outputs' },
  '-s': { key: 'seed', name: '--seed' },
  '--seed': { key: 'seed', name: '--seed' },
  '-d': { key: 'maxDepth', name: '--depth' },
  '--depth': { key: 'maxDepth', name: '--depth' },
  '-p': { key: 'numPipelineStages', name: '--pipeline' },
  '--pipeline': { key: 'numPipelineStages', name: '--pipeline' },
  '--case-statements': { key: 'numCaseStatements', name: '--case-statements' },
  '--if-else-chains': { key: 'numIfElseChains', name: '--if-else-chains' },
};

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path
  const options: CliOptions = { help: false, configFile: null, overrides: {} };

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];
    const intFlag = INTEGER_FLAGS[arg];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (intFlag) {
      const value = cliArgs[i + 1];
      if (value === undefined || !/^\d+$/.test(value)) {
        console.error(`Error: ${intFlag.name} requires a non-negative integer`);
        return null;
      }
      options.overrides[intFlag.key] = parseInt(value, 10);
      i++;
    } else if (arg === '-c' || arg === '--config' || arg === '-o' || arg === '--output' ||
               arg === '-m' || arg === '--module') {
      const value = cliArgs[i + 1];
      if (value === undefined) {
        console.error(`Error: ${arg} requires an argument`);
        return null;
      }
      if (arg === '-c' || arg === '--config') {
        options.configFile = value;
      } else if (arg === '-o' || arg === '--output') {
        options.overrides.outputFile = value;
      } else {
        options.overrides.moduleName = value;
      }
      i++;
    } else if (arg === '-t' || arg === '--testbench') {
      options.overrides.generateTestbench = true;
    } else if (arg === '-v' || arg === '--verbose') {
      options.overrides.verbose = true;
    } else if (arg === '--sharing') {
      options.overrides.generateSharingOpportunities = true;
    } else if (arg === '--dependency-depth') {
      options.overrides.depthStrategy = 'dependency';
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  return options;
}

function printUsage(): void {
  console.log(`Verilog Datapath Generator - random netlist generator for synthesis benchmarking

Usage: datapath-gen [options]

Options:
  -c, --config <file>        Load configuration from file
  -o, --output <file>        Output Verilog file (default: output.v)
  -m, --module <name>        Module name (default: random_datapath)
  -n, --num-ops <n>          Number of operations (default: 50)
  -i, --inputs <n>           Number of inputs (default: 8)
  -O, --outputs <n>          Number of outputs (default: 4)
  -s, --seed <n>             Random seed (default: current time)
  -d, --depth <n>            Maximum logic depth (default: 10)
  -p, --pipeline <n>         Number of pipeline stages (default: 0)
  --case-statements <n>      Number of case statements (default: 0)
  --if-else-chains <n>       Number of if/else chains (default: 0)
  --sharing                  Generate resource-sharing opportunities
  --dependency-depth         Label depths by operand dependencies
  -t, --testbench            Generate testbench
  -v, --verbose              Verbose output
  -h, --help                 Show this help message

Command line options override values from the config file.

Examples:
  datapath-gen -n 100 -i 16 -O 8 -o large_datapath.v
  datapath-gen -c my_config.txt -t
  datapath-gen -s 12345 -n 200 -v`);
}

function buildConfig(options: CliOptions): GeneratorConfig | null {
  let config = createConfig();

  if (options.configFile) {
    try {
      const parsed = loadConfigFile(options.configFile, config);
      for (const warning of parsed.warnings) {
        console.error(`Warning: ${warning}`);
      }
      config = parsed.config;
    } catch (e) {
      if (e instanceof ConfigError) {
        console.error(`Error: ${e.message}`);
        return null;
      }
      throw e;
    }
  }

  config = { ...config, ...options.overrides };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`Error: ${error}`);
    }
    console.error('Error: Invalid configuration');
    return null;
  }

  return config;
}

function writeOutput(path: string, contents: string): boolean {
  try {
    writeFileSync(path, contents);
    return true;
  } catch (e) {
    console.error(`Error: Cannot write file: ${path}`);
    return false;
  }
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return 1;
  }
  if (options.help) {
    printUsage();
    return 0;
  }

  const config = buildConfig(options);
  if (!config) {
    return 1;
  }

  if (config.verbose) {
    console.log(formatConfig(config));
  }

  const netlist = new NetlistGenerator(config).generate();

  if (!writeOutput(config.outputFile, emitVerilog(netlist))) {
    return 1;
  }
  console.log(`Successfully generated: ${config.outputFile}`);

  if (config.generateTestbench) {
    const tbFile = join(dirname(config.outputFile), `tb_${basename(config.outputFile)}`);
    if (writeOutput(tbFile, emitTestbench(netlist))) {
      console.log(`Successfully generated testbench: ${tbFile}`);
    } else {
      console.error(`Warning: Could not create testbench file: ${tbFile}`);
    }
  }

  if (config.verbose) {
    console.log('\nGeneration complete!');
    console.log('To synthesize with your favorite tool:');
    console.log(`  Yosys:    yosys -p 'synth -top ${config.moduleName}' ${config.outputFile}`);
  }

  return 0;
}

/**
 * True when `scriptPath` names the module at `moduleUrl`, following symlinks
 * (npm installs `bin` entries as links to the real file).
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return false;
    }
    throw e;
  }
}

// Run if executed directly
if (isEntryPoint(process.argv[1], import.meta.url)) {
  process.exit(main());
}
