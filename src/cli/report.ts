import chalk from 'chalk';
import { jsonError, jsonSuccess, logger, outputJson } from '../core/index.js';
import type { DriverResult } from '../core/index.js';

function resultData(result: DriverResult) {
  return {
    state: result.state,
    path: result.path,
    projectRoot: result.projectRoot,
    steps: result.steps,
  };
}

/**
 * Print a driver result. A failed run is rethrown so the command wrapper
 * reports it and sets the exit code.
 */
export function reportDriverResult(result: DriverResult, json: boolean): void {
  if (json) {
    outputJson(result.error ? jsonError(result.error, resultData(result)) : jsonSuccess(resultData(result)));
    if (result.state === 'FAILED') {
      process.exitCode = 1;
    }
    return;
  }

  if (result.steps.length > 0) {
    logger.heading('Summary');
    for (const step of result.steps) {
      const mark = step.ok ? chalk.green('✓') : chalk.red('✗');
      logger.log(`${mark} ${step.step}: ${step.detail}`);
    }
  }

  if (result.error) {
    throw result.error;
  }
}
