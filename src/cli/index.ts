// CLI setup with Commander

import { Command, Option } from 'commander';
import { CANDIDATE_ORDERS, OBJECTIVES } from '../utils/config.js';
import { configCommand } from './commands/config.js';
import { CONVERT_FORMATS, convertCommand } from './commands/convert.js';
import { inspectCommand } from './commands/inspect.js';
import { refineCommand } from './commands/refine.js';
import { parseInteger, parseNumber } from './options.js';

function addSelectionOptions(command: Command): Command {
  return command
    .option('--max-subtree-depth <n>', 'Deepest root depth at which candidates are considered', parseInteger)
    .option('--min-subtree-depth <n>', 'Minimum candidate height in edges', parseInteger)
    .option('--min-node-count <n>', 'Minimum decision nodes in a candidate', parseInteger)
    .option('--include-root', 'Allow the tree root itself as a candidate')
    .addOption(new Option('--order <order>', 'Candidate order').choices([...CANDIDATE_ORDERS]));
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: ~/.tree-refiner/config.json)')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Warnings and errors only');
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('tree-refiner')
    .description('Refine decision-tree policies by re-synthesizing sub-trees under a time budget')
    .version('0.1.0');

  // Default command: full refinement run
  const refine = program
    .command('refine', { isDefault: true })
    .description('Generate an initial tree and refine its sub-trees')
    .option('-m, --model <path>', 'Model file handed to the external tools')
    .option('-s, --spec <path>', 'Specification (property) file')
    .option('-i, --initial-tree <path>', 'Start from this tree graph instead of running the generator')
    .option('-o, --output-dir <path>', 'Directory for exported artifacts')
    .option('--max-loss <fraction>', 'Tolerated value loss, in [0, 1)', parseNumber)
    .addOption(new Option('--objective <direction>', 'Whether the value is maximised or minimised').choices([...OBJECTIVES]))
    .option('-t, --timeout <seconds>', 'Global wall-clock budget', parseNumber)
    .option('--candidate-timeout <seconds>', 'Budget per re-synthesis call', parseNumber)
    .option('--max-iterations <n>', 'Attempt at most this many candidates', parseInteger)
    .option('--no-hybrid', 'Skip refinement and export the initial tree')
    .option('--no-tool-check', 'Skip the --version check of the external tools before the run')
    .option('--progress-log <path>', 'Append one CSV row per candidate to this file')
    .option('--json', 'Print the run summary as JSON');
  addCommonOptions(addSelectionOptions(refine)).action(refineCommand);

  const inspect = program
    .command('inspect <tree>')
    .description('Show statistics of a tree graph, its rendering and candidate sub-trees')
    .option('-r, --render', 'Render the tree')
    .option('--candidates', 'List the candidate sub-trees the selector would pick')
    .option('--json', 'Output as JSON');
  addCommonOptions(addSelectionOptions(inspect)).action(inspectCommand);

  const convert = program
    .command('convert <tree>')
    .description('Re-serialise a tree graph (DOT or tree JSON) as canonical DOT or JSON')
    .addOption(new Option('-f, --format <format>', 'Output format').choices([...CONVERT_FORMATS]).default('dot'))
    .option('--output <path>', 'Write to a file instead of stdout')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Warnings and errors only');
  convert.action(convertCommand);

  // Configuration management
  program
    .command('config')
    .description('Manage configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List the effective configuration')
    .option('--path', 'Print the config file path')
    .option('-c, --config <path>', 'Config file to use')
    .action(configCommand);

  return program;
}
