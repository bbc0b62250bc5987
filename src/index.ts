#!/usr/bin/env node

import { createCLI } from './cli/commands.js';
import type { WorkflowService } from './services/WorkflowService.js';
import { ErrorHandler } from './utils/errorHandler.js';

async function main(): Promise<void> {
  let running: WorkflowService | undefined;

  // A first Ctrl-C stops the batch between records
  ErrorHandler.setupGlobalHandlers(() => {
    if (!running) return false;
    running.stop();
    return true;
  });

  try {
    const program = createCLI({
      onWorkflow: (workflow) => {
        running = workflow;
      },
    });
    await program.parseAsync();
  } catch (error) {
    ErrorHandler.handle(error);
  }
}

void main();
