import chalk from "chalk";
import ora from "ora";
import { isCommitType, type CommitSpec } from "../lib/message";
import { isBumpKind } from "../lib/version";
import { runCommitWorkflow, type CommitWorkflowOptions } from "../lib/workflow";
import { EXIT_FAILURE, reportWorkflow, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface CommitOptions {
  type: string;
  description: string;
  scope?: string;
  body?: string;
  breaking?: boolean;
  footer?: string;
  /** `-f` alone stages everything, `-f a b` stages those paths */
  files?: true | string[];
  push?: boolean;
  /** Bump kind for a tag created after the commit */
  tag?: string;
  remote?: string;
  branch?: string;
  verbose?: boolean;
}

/**
 * Translate the files flag into a staging selection. Without the flag,
 * staging only happens when commit.autoStageAll is configured.
 */
export function resolveStaging(
  files: CommitOptions["files"],
  autoStageAll: boolean
): CommitWorkflowOptions["stage"] {
  if (files === true || (Array.isArray(files) && files.length === 0)) {
    return "all";
  }
  if (Array.isArray(files)) {
    return files;
  }
  return autoStageAll ? "all" : undefined;
}

/**
 * Main commit command
 * - Optionally stages files
 * - Commits with a conventional message built from the flags
 * - Optionally tags the commit with the next version and pushes
 */
export async function commitCommand(options: CommitOptions): Promise<ExitCode> {
  const { type, tag } = options;

  if (!isCommitType(type)) {
    console.error(chalk.red(`Error: Unknown commit type "${type}"`));
    return EXIT_FAILURE;
  }
  if (tag !== undefined && !isBumpKind(tag)) {
    console.error(chalk.red(`Error: Unknown version bump "${tag}"`));
    return EXIT_FAILURE;
  }

  const session = await openSession({ verbose: options.verbose });
  if (!session) {
    return EXIT_FAILURE;
  }
  const { ctx, config } = session;

  const spec: CommitSpec = {
    type,
    description: options.description,
    scope: options.scope,
    body: options.body,
    breaking: options.breaking ?? false,
    footer: options.footer,
  };

  const spinner = ora(tag ? "Committing, tagging and pushing..." : "Committing...").start();

  const result = await runCommitWorkflow(ctx, {
    spec,
    stage: resolveStaging(options.files, config.commit.autoStageAll),
    tag,
    prefix: config.release.tagPrefix,
    push: options.push,
    remote: options.remote ?? config.release.remote,
    branch: options.branch,
  });

  if (result.succeeded) {
    spinner.succeed(result.tag ? `Committed and released ${result.tag}` : "Committed successfully!");
  } else {
    spinner.fail("Commit workflow failed");
  }

  return reportWorkflow(result);
}
