// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { getDefaultConfigFile } from './app-paths.js';
import { ConfigurationError } from './errors.js';

// Load .env file
dotenv.config();

const ToolCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Seconds; falls back to the run's own timeouts when omitted. */
  timeout: z.number().positive().optional(),
});

export type ToolCommand = z.infer<typeof ToolCommandSchema>;

export const CANDIDATE_ORDERS = ['deepest-first', 'shallowest-first'] as const;
export const OBJECTIVES = ['maximize', 'minimize'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const RefinerConfigSchema = z.object({
  maxSubtreeDepth: z.number().int().min(1).default(4),
  minSubtreeDepth: z.number().int().min(1).default(3),
  minNodeCount: z.number().int().min(1).default(2),
  includeRoot: z.boolean().default(false),
  candidateOrder: z.enum(CANDIDATE_ORDERS).default('deepest-first'),
  maxLoss: z.number().min(0).lt(1).default(0.05),
  objective: z.enum(OBJECTIVES).default('maximize'),
  /** Seconds. 0 is a budget that is already spent. */
  timeoutTotal: z.number().min(0).default(3600),
  /** Seconds per candidate re-synthesis call. */
  candidateTimeout: z.number().positive().default(120),
  maxIterations: z.number().int().positive().optional(),
  hybridizationEnabled: z.boolean().default(true),
  model: z.string().optional(),
  specification: z.string().optional(),
  initialTree: z.string().optional(),
  outputDir: z.string().default('refinement-output'),
  progressLog: z.string().optional(),
  /** State variables the constraint translator accepts; any identifier when unset. */
  variables: z.array(z.string()).optional(),
  /** Known action set; leaves with other actions fail to parse when set. */
  actions: z.array(z.string()).optional(),
  generator: ToolCommandSchema.default({
    command: 'dtcontrol',
    args: ['--prism', '{model}', '--prop', '{spec}', '--export-dot', '-'],
  }),
  resynthesizer: ToolCommandSchema.default({
    command: 'tree-resynth',
    args: [
      '--model', '{model}',
      '--spec', '{spec}',
      '--tree', '{tree}',
      '--constraint', '{constraint}',
      '--timeout', '{timeout}',
      '--output', '{output}',
    ],
  }),
  evaluator: ToolCommandSchema.default({
    command: 'tree-eval',
    args: ['--model', '{model}', '--spec', '{spec}', '--tree', '{tree}', '--mode', '{mode}', '--constraint', '{constraint}'],
  }),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type RefinerConfig = z.infer<typeof RefinerConfigSchema>;
export type RefinerConfigInput = z.input<typeof RefinerConfigSchema>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const field = err.path.join('.') || '(root)';
    return `  - ${field}: ${err.message}`;
  });
}

/**
 * Validate a raw configuration object against the schema, filling defaults.
 */
export function parseConfig(raw: unknown): RefinerConfig {
  const result = RefinerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid configuration:\n${issues.join('\n')}`, issues);
  }
  return result.data;
}

export function getDefaultConfig(): RefinerConfig {
  return RefinerConfigSchema.parse({});
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Overrides taken from TREE_REFINER_* environment variables (and .env).
 */
export function getEnvOverrides(): PlainObject {
  const overrides: PlainObject = {
    model: process.env.TREE_REFINER_MODEL,
    specification: process.env.TREE_REFINER_SPEC,
    outputDir: process.env.TREE_REFINER_OUTPUT_DIR,
    logLevel: process.env.TREE_REFINER_LOG_LEVEL?.toLowerCase(),
    timeoutTotal: numberFromEnv('TREE_REFINER_TIMEOUT'),
    maxLoss: numberFromEnv('TREE_REFINER_MAX_LOSS'),
  };
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

async function readConfigFile(configFile: string, required: boolean): Promise<PlainObject> {
  let configData: string;
  try {
    configData = await fs.readFile(configFile, 'utf-8');
  } catch (error) {
    if (required) {
      throw new ConfigurationError(`Cannot read config file ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(configData);
  } catch (error) {
    throw new ConfigurationError(`Config file ${configFile} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${configFile} must contain a JSON object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error. */
  configFile?: string;
  /** Highest-precedence values, usually CLI flags. */
  overrides?: PlainObject;
}

/**
 * defaults < config file < environment < overrides, validated once.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RefinerConfig> {
  const configFile = options.configFile ?? getDefaultConfigFile();
  const fileConfig = await readConfigFile(configFile, options.configFile !== undefined);
  const merged = deepMerge(deepMerge(fileConfig, getEnvOverrides()), options.overrides ?? {});
  return parseConfig(merged);
}

export async function saveConfig(values: PlainObject, configFile: string = getDefaultConfigFile()): Promise<void> {
  // Reject anything that would not load back.
  parseConfig(values);
  await fs.mkdir(path.dirname(configFile), { recursive: true });
  await fs.writeFile(configFile, JSON.stringify(values, null, 2), 'utf-8');
}

export async function getConfigValue(key: string, options: LoadConfigOptions = {}): Promise<unknown> {
  const config: unknown = await loadConfig(options);
  let value: unknown = config;

  for (const k of key.split('.')) {
    value = isPlainObject(value) ? value[k] : undefined;
  }

  return value;
}

/**
 * Set a dotted key in the config file. The value is parsed as JSON when it
 * can be, and kept as a string otherwise.
 */
export async function setConfigValue(key: string, value: string, configFile: string = getDefaultConfigFile()): Promise<void> {
  const fileConfig = await readConfigFile(configFile, false);
  const keys = key.split('.');
  let obj: PlainObject = fileConfig;

  for (let i = 0; i < keys.length - 1; i++) {
    const next = obj[keys[i]];
    if (isPlainObject(next)) {
      obj = next;
    } else {
      const created: PlainObject = {};
      obj[keys[i]] = created;
      obj = created;
    }
  }

  let parsedValue: unknown;
  try {
    parsedValue = JSON.parse(value);
  } catch {
    parsedValue = value;
  }
  obj[keys[keys.length - 1]] = parsedValue;

  await saveConfig(fileConfig, configFile);
}

export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    if (isPlainObject(sourceValue)) {
      result[key] = deepMerge(isPlainObject(targetValue) ? targetValue : {}, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}
