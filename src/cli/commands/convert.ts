// Convert command: re-serialise a tree graph

import { promises as fs } from 'fs';
import path from 'path';
import { parseTreeGraph } from '../../tree/dot-parser.js';
import { toDot } from '../../tree/dot-writer.js';
import { fromJSON, toJSON } from '../../tree/tree-json.js';
import type { DecisionTree } from '../../tree/decision-tree.js';
import { ConfigurationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { applyLoggingFlags, readInputFile, type LoggingFlags } from '../options.js';

export const CONVERT_FORMATS = ['dot', 'json'] as const;
export type ConvertFormat = (typeof CONVERT_FORMATS)[number];

export interface ConvertOptions extends LoggingFlags {
  format?: string;
  output?: string;
}

function isConvertFormat(value: string): value is ConvertFormat {
  return CONVERT_FORMATS.some((format) => format === value);
}

/** `.json` input is read as the JSON tree form, anything else as DOT. */
export function readTree(file: string, text: string): DecisionTree {
  return path.extname(file).toLowerCase() === '.json' ? fromJSON(text) : parseTreeGraph(text);
}

export function convertTree(tree: DecisionTree, format: ConvertFormat): string {
  return format === 'dot' ? toDot(tree) : JSON.stringify(toJSON(tree), null, 2) + '\n';
}

export async function convertCommand(file: string, options: ConvertOptions): Promise<void> {
  applyLoggingFlags(options);
  const format = options.format ?? 'dot';
  if (!isConvertFormat(format)) {
    throw new ConfigurationError(`Unknown format "${format}"; use one of: ${CONVERT_FORMATS.join(', ')}`);
  }

  const output = convertTree(readTree(file, await readInputFile(file)), format);
  if (options.output) {
    await fs.mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
    await fs.writeFile(options.output, output, 'utf-8');
    log.success(`Wrote ${options.output}`);
    return;
  }
  process.stdout.write(output);
}
