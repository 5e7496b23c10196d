import { spawn } from "child_process";
import chalk from "chalk";
import type { CommandOutput, CommandRunner } from "../types/operations";

export interface RunnerOptions {
  /** Echo every command line to stderr before running it */
  verbose?: boolean;
}

// Reported when the executable could not be started at all
const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Command runner backed by child processes.
 *
 * Output is captured in full; the promise resolves once the process has
 * exited and its streams are closed, and never rejects.
 */
export function createProcessRunner(options: RunnerOptions = {}): CommandRunner {
  return {
    run(commandLine: readonly string[], cwd: string): Promise<CommandOutput> {
      const [command, ...args] = commandLine;

      if (options.verbose) {
        console.error(chalk.dim(`$ ${commandLine.join(" ")}`));
      }

      if (!command) {
        return Promise.resolve({
          stdout: "",
          stderr: "No command given",
          exitCode: SPAWN_FAILURE_EXIT_CODE,
        });
      }

      return new Promise((resolve) => {
        let stdout = "";
        let stderr = "";
        let settled = false;

        const settle = (output: CommandOutput) => {
          if (settled) return;
          settled = true;
          resolve(output);
        };

        const child = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });

        child.stdout?.setEncoding("utf-8");
        child.stderr?.setEncoding("utf-8");
        child.stdout?.on("data", (chunk: string) => {
          stdout += chunk;
        });
        child.stderr?.on("data", (chunk: string) => {
          stderr += chunk;
        });

        child.on("error", (error) => {
          settle({ stdout, stderr: error.message, exitCode: SPAWN_FAILURE_EXIT_CODE });
        });

        child.on("close", (code) => {
          // null when the process was killed by a signal
          settle({ stdout, stderr, exitCode: code ?? 1 });
        });
      });
    },
  };
}

