import chalk from "chalk";
import { getConfig, type GitsemConfig } from "../lib/config";
import type { GitContext } from "../types/operations";
import { getRepoRoot, isGitRepo } from "./git";
import { createProcessRunner } from "./runner";

export interface SessionOptions {
  verbose?: boolean;
  /** Defaults to the process working directory */
  cwd?: string;
}

/**
 * Everything a command needs: git access and the resolved config
 */
export interface CommandSession {
  ctx: GitContext;
  config: GitsemConfig;
  repoRoot: string;
}

/**
 * Open a session in the current repository. Prints an error and returns
 * null when the directory is not inside a git repository.
 *
 * @throws ConfigError when a config file is invalid
 */
export async function openSession(options: SessionOptions = {}): Promise<CommandSession | null> {
  const cwd = options.cwd ?? process.cwd();
  const lookup: GitContext = { runner: createProcessRunner(), cwd };

  if (!(await isGitRepo(lookup))) {
    console.error(chalk.red("Error: Not a git repository"));
    return null;
  }

  const repoRoot = await getRepoRoot(lookup);
  const config = getConfig({ repoRoot });
  const verbose = options.verbose ?? config.general.verbose;

  return {
    ctx: { runner: createProcessRunner({ verbose }), cwd },
    config,
    repoRoot,
  };
}
