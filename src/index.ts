#!/usr/bin/env node

// tree-refiner - Entry Point

import { createCLI } from './cli/index.js';
import { handleError, isDebugEnvironment } from './utils/error-handler.js';

async function main(): Promise<void> {
  try {
    const program = createCLI();
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, {
      context: 'main',
      includeStack: isDebugEnvironment(),
    });
    process.exit(1);
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', (reason) => {
  handleError(reason, {
    context: 'unhandledRejection',
    includeStack: isDebugEnvironment(),
    exitProcess: true,
    exitCode: 1,
  });
});

// Handle uncaught exceptions globally
process.on('uncaughtException', (error) => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true,
    exitProcess: true,
    exitCode: 1,
  });
});

void main();
