import chalk from "chalk";
import type { WorkflowStepFailureError } from "../types/errors";
import type { OperationResult } from "../types/operations";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE;

/**
 * Print an operation result and map it to a process exit code.
 * Successes go to stdout, failures to stderr.
 */
export function report(result: OperationResult): ExitCode {
  if (result.succeeded) {
    console.log(chalk.green(result.message));
    return EXIT_OK;
  }

  console.error(chalk.red(`Error: ${result.message}`));
  return EXIT_FAILURE;
}

/**
 * Print the completed steps of a workflow, then its failure if any,
 * including the side effects that must not be repeated.
 */
export function reportWorkflow(
  result: OperationResult & { completed: string[]; error?: WorkflowStepFailureError }
): ExitCode {
  result.completed.forEach((step) => {
    console.log(chalk.green(`✔ ${step}`));
  });

  if (result.succeeded) {
    return EXIT_OK;
  }

  console.error(chalk.red(`✖ Error: ${result.message}`));

  if (result.error && result.error.durableEffects.length > 0) {
    console.error(chalk.yellow(`Already done: ${result.error.durableEffects.join(", ")}`));
  }

  return EXIT_FAILURE;
}
