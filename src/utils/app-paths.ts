import path from 'path';
import os from 'os';

/**
 * Base directory for tree-refiner state on disk.
 *
 * Override with `TREE_REFINER_HOME` (useful for sandboxes/tests/portable installs).
 * Default: `~/.tree-refiner`
 */
export function getRefinerHomeDir(): string {
  const override = process.env.TREE_REFINER_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.tree-refiner');
}

export function getDefaultConfigFile(): string {
  return path.join(getRefinerHomeDir(), 'config.json');
}
