import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { getConfigValue, getDefaultConfig, loadConfig, parseConfig, setConfigValue } from './config.js';
import { ConfigurationError } from './errors.js';

const ENV_KEYS = [
  'TREE_REFINER_HOME',
  'TREE_REFINER_MODEL',
  'TREE_REFINER_SPEC',
  'TREE_REFINER_OUTPUT_DIR',
  'TREE_REFINER_LOG_LEVEL',
  'TREE_REFINER_TIMEOUT',
  'TREE_REFINER_MAX_LOSS',
];

describe('parseConfig', () => {
  it('fills defaults', () => {
    const config = getDefaultConfig();
    expect(config.maxSubtreeDepth).toBe(4);
    expect(config.minSubtreeDepth).toBe(3);
    expect(config.minNodeCount).toBe(2);
    expect(config.includeRoot).toBe(false);
    expect(config.candidateOrder).toBe('deepest-first');
    expect(config.maxLoss).toBe(0.05);
    expect(config.objective).toBe('maximize');
    expect(config.hybridizationEnabled).toBe(true);
    expect(config.maxIterations).toBeUndefined();
    expect(config.generator.command).toBe('dtcontrol');
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      parseConfig({ maxLoss: 1, maxSubtreeDepth: 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues.some((issue) => issue.startsWith('  - maxLoss:'))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('  - maxSubtreeDepth:'))).toBe(true);
  });

  it('accepts a zero global timeout', () => {
    expect(parseConfig({ timeoutTotal: 0 }).timeoutTotal).toBe(0);
    expect(() => parseConfig({ timeoutTotal: -1 })).toThrow(ConfigurationError);
  });
});

describe('loadConfig', () => {
  let home: string;
  const saved: Record<string, string | undefined> = {};

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'tree-refiner-config-'));
    process.env.TREE_REFINER_HOME = home;
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(home, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', async () => {
    const config = await loadConfig();
    expect(config).toEqual(getDefaultConfig());
  });

  it('layers file, environment and overrides', async () => {
    await fs.writeFile(path.join(home, 'config.json'), JSON.stringify({ maxLoss: 0.2, timeoutTotal: 10, model: 'file.prism' }));

    expect((await loadConfig()).timeoutTotal).toBe(10);

    process.env.TREE_REFINER_TIMEOUT = '20';
    const fromEnv = await loadConfig();
    expect(fromEnv.timeoutTotal).toBe(20);
    expect(fromEnv.maxLoss).toBe(0.2);
    expect(fromEnv.model).toBe('file.prism');

    const overridden = await loadConfig({ overrides: { timeoutTotal: 30, model: undefined } });
    expect(overridden.timeoutTotal).toBe(30);
    expect(overridden.model).toBe('file.prism');
  });

  it('rejects a non-numeric environment value', async () => {
    process.env.TREE_REFINER_MAX_LOSS = 'lots';
    await expect(loadConfig()).rejects.toThrow('TREE_REFINER_MAX_LOSS must be a number, got "lots"');
  });

  it('requires an explicitly named file to exist and hold an object', async () => {
    await expect(loadConfig({ configFile: path.join(home, 'missing.json') })).rejects.toThrow('Cannot read config file');

    const broken = path.join(home, 'broken.json');
    await fs.writeFile(broken, '{ nope');
    await expect(loadConfig({ configFile: broken })).rejects.toThrow('is not valid JSON');

    const list = path.join(home, 'list.json');
    await fs.writeFile(list, '[1, 2]');
    await expect(loadConfig({ configFile: list })).rejects.toThrow('must contain a JSON object');
  });

  it('sets and reads dotted keys', async () => {
    const file = path.join(home, 'config.json');
    await setConfigValue('maxLoss', '0.25', file);
    await setConfigValue('generator.command', 'my-generator', file);

    expect(await getConfigValue('maxLoss')).toBe(0.25);
    expect(await getConfigValue('generator.command')).toBe('my-generator');
    expect(await getConfigValue('nothing.here')).toBeUndefined();
    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({ maxLoss: 0.25, generator: { command: 'my-generator' } });
  });

  it('refuses to store a value that would not load back', async () => {
    const file = path.join(home, 'config.json');
    await expect(setConfigValue('maxLoss', 'high', file)).rejects.toThrow(ConfigurationError);
    await expect(fs.access(file)).rejects.toThrow();
  });
});
