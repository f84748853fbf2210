// Configuration management command

import chalk from 'chalk';
import { getDefaultConfigFile } from '../../utils/app-paths.js';
import { getConfigValue, loadConfig, setConfigValue } from '../../utils/config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';

export interface ConfigOptions {
  set?: string;
  get?: string;
  list?: boolean;
  path?: boolean;
  config?: string;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const configFile = options.config ?? getDefaultConfigFile();

  if (options.path) {
    process.stdout.write(configFile + '\n');
    return;
  }

  if (options.list) {
    const config = await loadConfig({ configFile: options.config });
    process.stdout.write(JSON.stringify(config, null, 2) + '\n');
    return;
  }

  if (options.get) {
    const value = await getConfigValue(options.get, { configFile: options.config });
    if (value === undefined) {
      log.warn(`Key not found: ${options.get}`);
      process.exitCode = 1;
      return;
    }
    process.stdout.write((typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value)) + '\n');
    return;
  }

  if (options.set) {
    const eqIndex = options.set.indexOf('=');
    if (eqIndex <= 0) {
      throw new ConfigurationError('Invalid format. Use: --set key=value');
    }

    const key = options.set.slice(0, eqIndex);
    const value = options.set.slice(eqIndex + 1);

    await setConfigValue(key, value, configFile);
    log.success(`✓ Set ${key} = ${value}`);
    return;
  }

  log.info(chalk.yellow('Use --set, --get, --list or --path'));
  log.info(chalk.gray('Examples:'));
  log.info(chalk.gray('  tree-refiner config --set maxLoss=0.1'));
  log.info(chalk.gray('  tree-refiner config --set generator.command=dtcontrol'));
  log.info(chalk.gray('  tree-refiner config --get candidateOrder'));
}
