import { InvalidArgumentError } from 'commander';
import { SCENARIO_DOT, buildTree, decide, leaf, scenarioTree } from '../test/helpers.js';
import { getDefaultConfig, parseConfig } from '../utils/config.js';
import { convertTree, readTree } from './commands/convert.js';
import { buildInspectReport, formatInspectReport } from './commands/inspect.js';
import { refineOverrides } from './commands/refine.js';
import { createCLI } from './index.js';
import { parseInteger, parseNumber, selectionOverrides } from './options.js';

describe('option parsers', () => {
  it('accepts numbers and integers', () => {
    expect(parseInteger('4')).toBe(4);
    expect(parseNumber('0.05')).toBe(0.05);
  });

  it('rejects malformed values', () => {
    expect(() => parseInteger('4.5')).toThrow(InvalidArgumentError);
    expect(() => parseNumber('lots')).toThrow('"lots" is not a number.');
    expect(() => parseNumber(' ')).toThrow(InvalidArgumentError);
  });
});

describe('refineOverrides', () => {
  it('maps flags onto configuration keys', () => {
    expect(
      refineOverrides({
        model: 'm.prism',
        spec: 's.props',
        timeout: 60,
        maxLoss: 0.1,
        order: 'shallowest-first',
        maxSubtreeDepth: 5,
        hybrid: true,
        json: true,
      })
    ).toEqual({
      model: 'm.prism',
      specification: 's.props',
      timeoutTotal: 60,
      maxLoss: 0.1,
      candidateOrder: 'shallowest-first',
      maxSubtreeDepth: 5,
    });
  });

  it('only turns hybridization off when asked', () => {
    expect(refineOverrides({ hybrid: false })).toEqual({ hybridizationEnabled: false });
    expect(refineOverrides({})).toEqual({});
  });

  it('produces values the configuration schema accepts', () => {
    const config = parseConfig(refineOverrides({ candidateTimeout: 30, maxIterations: 2, includeRoot: true, hybrid: false }));
    expect(config.candidateTimeout).toBe(30);
    expect(config.maxIterations).toBe(2);
    expect(config.includeRoot).toBe(true);
    expect(config.hybridizationEnabled).toBe(false);
  });

  it('shares the selection flags with inspect', () => {
    expect(selectionOverrides({ minNodeCount: 1, order: undefined })).toEqual({ minNodeCount: 1 });
  });
});

describe('convert', () => {
  it('reads DOT or JSON by extension', () => {
    expect(readTree('policy.dot', SCENARIO_DOT).toSpec()).toEqual(scenarioTree());
    expect(readTree('policy.JSON', JSON.stringify(scenarioTree())).toSpec()).toEqual(scenarioTree());
  });

  it('writes either format', () => {
    const tree = buildTree(decide('x', '<=', 5, leaf('a0'), leaf('a1')));
    expect(convertTree(tree, 'json')).toBe(JSON.stringify(tree.toSpec(), null, 2) + '\n');
    expect(convertTree(tree, 'dot').startsWith('digraph tree {\n  n0 [label="x <= 5", shape=box];')).toBe(true);
  });
});

describe('inspect', () => {
  it('reports statistics and candidates', () => {
    const tree = buildTree(scenarioTree());
    const report = buildInspectReport('policy.dot', tree, { candidates: true }, { ...getDefaultConfig(), minSubtreeDepth: 2 });
    expect(report).toEqual({
      file: 'policy.dot',
      stats: { decisionNodes: 3, leaves: 4, totalNodes: 7, depth: 3 },
      candidates: [{ treePath: [6, 4], pathCondition: 'x<=5', depth: 2, nodeCount: 2, rootDepth: 1 }],
    });
    expect(formatInspectReport(report, tree)).toContain('  #0 depth 2, 2 decision nodes at [x<=5]');
  });

  it('lists no candidates under the default minimum height', () => {
    const report = buildInspectReport('policy.dot', buildTree(scenarioTree()), { candidates: true }, getDefaultConfig());
    expect(report.candidates).toEqual([]);
  });

  it('includes the tree only when rendering', () => {
    const tree = buildTree(scenarioTree());
    expect(buildInspectReport('t.dot', tree, { render: true }, getDefaultConfig()).tree).toEqual(scenarioTree());
    expect(buildInspectReport('t.dot', tree, {}, getDefaultConfig()).tree).toBeUndefined();
  });
});

describe('createCLI', () => {
  it('registers the commands', () => {
    expect(createCLI().commands.map((c) => c.name())).toEqual(['refine', 'inspect', 'convert', 'config']);
  });
});
