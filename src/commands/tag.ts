import chalk from "chalk";
import ora from "ora";
import { isBumpKind } from "../lib/version";
import { resumeTagPush, runTagWorkflow, type TagWorkflowResult } from "../lib/workflow";
import { EXIT_FAILURE, report, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface TagOptions {
  bump?: string;
  message?: string;
  push?: boolean;
  remote?: string;
  branch?: string;
  prefix?: string;
  /** Push an existing tag instead of creating a new one */
  resume?: string;
  verbose?: boolean;
}

function reportTag(result: TagWorkflowResult): ExitCode {
  const code = report(result);

  if (result.state.step === "failed" && result.state.error.step === "push" && result.tag) {
    console.error(
      chalk.yellow(`The tag exists locally. Retry the push with: gitsem tag --resume ${result.tag}`)
    );
  }

  return code;
}

/**
 * Tag command
 * - Derives the next version from the latest tag
 * - Creates the tag, then pushes it when asked to
 * - With --resume, only retries the push of a tag created earlier
 */
export async function tagCommand(options: TagOptions): Promise<ExitCode> {
  const { bump, resume } = options;

  if (resume === undefined && (bump === undefined || !isBumpKind(bump))) {
    console.error(chalk.red("Error: --bump must be one of major, minor, patch"));
    return EXIT_FAILURE;
  }

  const session = await openSession({ verbose: options.verbose });
  if (!session) {
    return EXIT_FAILURE;
  }
  const { ctx, config } = session;
  const remote = options.remote ?? config.release.remote;

  if (resume !== undefined) {
    const spinner = ora(`Pushing ${resume} to ${remote}...`).start();
    const result = await resumeTagPush(ctx, resume, { remote, branch: options.branch });
    spinner.stop();
    return reportTag(result);
  }

  if (bump === undefined || !isBumpKind(bump)) {
    return EXIT_FAILURE;
  }

  const push = options.push ?? config.release.autoPush;
  const spinner = ora(push ? "Tagging and pushing..." : "Tagging...").start();
  const result = await runTagWorkflow(ctx, {
    bump,
    message: options.message,
    prefix: options.prefix ?? config.release.tagPrefix,
    push,
    remote,
    branch: options.branch,
  });
  spinner.stop();

  return reportTag(result);
}
