// Process-backed collaborators built from configuration

import type { RefinerConfig, ToolCommand } from '../utils/config.js';
import { ExternalToolError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { ExecaCommandRunner, type CommandRunner } from './command-runner.js';
import { checkAvailable } from './command-template.js';
import { ProcessValueEvaluator } from './process-evaluator.js';
import { ProcessTreeGenerator } from './process-generator.js';
import { ProcessReSynthesizer } from './process-resynthesizer.js';
import type { Collaborators } from './types.js';

export function createProcessCollaborators(
  config: RefinerConfig,
  options: { runner?: CommandRunner; workdir?: string } = {}
): Collaborators {
  return {
    generator: new ProcessTreeGenerator(config.generator, options),
    resynthesizer: new ProcessReSynthesizer(config.resynthesizer, options),
    evaluator: new ProcessValueEvaluator(config.evaluator, {
      ...options,
      model: config.model,
      specification: config.specification,
    }),
  };
}

/**
 * Run `--version` of every external command this run will start. The
 * generator is left out when the initial tree comes from a file, the
 * re-synthesizer when hybridization is off.
 */
export async function verifyTools(config: RefinerConfig, runner: CommandRunner = new ExecaCommandRunner()): Promise<string[]> {
  const tools: ToolCommand[] = [];
  if (config.initialTree === undefined) tools.push(config.generator);
  if (config.hybridizationEnabled) tools.push(config.resynthesizer);
  tools.push(config.evaluator);

  const versions: string[] = [];
  const seen = new Set<string>();
  for (const { command } of tools) {
    if (seen.has(command)) continue;
    seen.add(command);
    const version = await checkAvailable(runner, command);
    if (version === undefined) {
      throw new ExternalToolError(`${command} is not available: "${command} --version" did not succeed`, command);
    }
    log.debug(`Found ${version}`);
    versions.push(version);
  }
  return versions;
}

export type { Collaborators, ReSynthesizer, TreeGenerator, ValueEvaluator } from './types.js';
export { ExecaCommandRunner, type CommandRunner, type CommandResult } from './command-runner.js';
export { checkAvailable } from './command-template.js';
