import chalk from 'chalk';
import { ErrorHandler, handleError } from './error-handler.js';
import { ExternalToolError } from './errors.js';
import { logger } from './logger.js';

describe('ErrorHandler', () => {
  const savedLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = savedLevel;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('formats the message with its error code', () => {
    const error = new ExternalToolError('tree-eval failed', 'tree-eval');
    expect(ErrorHandler.formatError(error, { context: 'main' })).toBe('Error in main:\ntree-eval failed (external_tool)\n');
    expect(ErrorHandler.formatError('plain')).toBe('plain\n');
  });

  it('reports an error exactly once', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logged = jest.spyOn(logger, 'error');

    handleError(new ExternalToolError('tree-eval failed', 'tree-eval'), { context: 'main', includeStack: false });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('Error in main:\ntree-eval failed (external_tool)\n');
    expect(logged).not.toHaveBeenCalled();
  });

  it('stays quiet when silent', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    handleError(new Error('hidden'), { silent: true });
    expect(write).not.toHaveBeenCalled();
  });
});
