/**
 * Type definitions shared by repository operations and workflows
 */

/**
 * Outcome of any externally visible operation
 */
export interface OperationResult {
  succeeded: boolean;
  /** Human-readable; includes captured stderr when the operation failed */
  message: string;
}

/**
 * Raw result of one external command
 */
export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Executes a command line in a working directory. Implementations resolve
 * with the exit code instead of rejecting on failure.
 */
export interface CommandRunner {
  run(commandLine: readonly string[], cwd: string): Promise<CommandOutput>;
}

/**
 * Everything a repository operation needs to reach git
 */
export interface GitContext {
  runner: CommandRunner;
  cwd: string;
}

/**
 * Named steps of the compound workflows
 */
export type WorkflowStep =
  | "validate"
  | "stage"
  | "commit"
  | "resolve-baseline"
  | "bump"
  | "create-tag"
  | "push";

export function succeeded(message: string): OperationResult {
  return { succeeded: true, message };
}

export function failed(message: string): OperationResult {
  return { succeeded: false, message };
}
