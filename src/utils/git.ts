import { headerLine } from "../lib/message";
import { DEFAULT_TAG_PREFIX, formatTag, type SemanticVersion } from "../lib/version";
import { ToolFailureError } from "../types/errors";
import {
  failed,
  succeeded,
  type CommandOutput,
  type GitContext,
  type OperationResult,
} from "../types/operations";

export interface StatusSummary {
  branch: string;
  /** Lines of `git status --short` */
  changes: string[];
  /** Lines of `git remote -v` */
  remotes: string[];
}

/**
 * Run a git subcommand through the context's runner
 */
export function runGit(ctx: GitContext, args: readonly string[]): Promise<CommandOutput> {
  return ctx.runner.run(["git", ...args], ctx.cwd);
}

/**
 * Run a git subcommand and return its stdout
 *
 * @throws ToolFailureError when git exits nonzero
 */
export async function gitOutput(
  ctx: GitContext,
  args: readonly string[],
  options?: { preserveWhitespace?: boolean }
): Promise<string> {
  const output = await runGit(ctx, args);
  if (output.exitCode !== 0) {
    throw new ToolFailureError(["git", ...args], output.exitCode, describeFailure(output));
  }
  return options?.preserveWhitespace ? output.stdout : output.stdout.trim();
}

/**
 * Best available explanation of a failed command. git prints some failures
 * (e.g. "nothing to commit") on stdout.
 */
export function describeFailure(output: CommandOutput): string {
  return (
    output.stderr.trim() ||
    output.stdout.trim() ||
    `git exited with code ${output.exitCode}`
  );
}

/**
 * Check if the working directory is inside a git repository
 */
export async function isGitRepo(ctx: GitContext): Promise<boolean> {
  const output = await runGit(ctx, ["rev-parse", "--is-inside-work-tree"]);
  return output.exitCode === 0 && output.stdout.trim() === "true";
}

/**
 * Get the repository root directory
 */
export async function getRepoRoot(ctx: GitContext): Promise<string> {
  return gitOutput(ctx, ["rev-parse", "--show-toplevel"]);
}

/**
 * Stage changes. Without paths everything is staged; an empty list stages
 * nothing and still succeeds.
 */
export async function stage(ctx: GitContext, paths?: readonly string[]): Promise<OperationResult> {
  if (paths !== undefined && paths.length === 0) {
    return succeeded("No files given, nothing was staged");
  }

  const args = paths === undefined ? ["add", "-A"] : ["add", "--", ...paths];
  const output = await runGit(ctx, args);

  if (output.exitCode !== 0) {
    return failed(`Failed to stage files: ${describeFailure(output)}`);
  }

  return paths === undefined
    ? succeeded("Staged all changes")
    : succeeded(`Staged ${paths.length} ${paths.length === 1 ? "path" : "paths"}: ${paths.join(", ")}`);
}

/**
 * Create a commit with the given message
 */
export async function commit(ctx: GitContext, message: string): Promise<OperationResult> {
  if (message.trim().length === 0) {
    return failed("Failed to create commit: commit message is empty");
  }

  const output = await runGit(ctx, ["commit", "-m", message]);

  if (output.exitCode !== 0) {
    return failed(`Failed to create commit: ${describeFailure(output)}`);
  }

  return succeeded(`Created commit: ${headerLine(message)}`);
}

/**
 * Create an annotated tag when a message is given, a lightweight one otherwise
 */
export async function createTag(
  ctx: GitContext,
  version: SemanticVersion,
  message?: string,
  prefix: string = DEFAULT_TAG_PREFIX
): Promise<OperationResult> {
  const tag = formatTag(version, prefix);
  const args = message ? ["tag", "-a", tag, "-m", message] : ["tag", tag];
  const output = await runGit(ctx, args);

  if (output.exitCode !== 0) {
    return failed(`Failed to create tag ${tag}: ${describeFailure(output)}`);
  }

  return succeeded(`Created tag ${tag}`);
}

/**
 * Push commits, then tags when requested. The tag push only runs after the
 * commit push succeeded.
 */
export async function push(
  ctx: GitContext,
  remote: string,
  branch: string | undefined,
  includeTags: boolean
): Promise<OperationResult> {
  const args = branch ? ["push", remote, branch] : ["push", remote];
  const output = await runGit(ctx, args);

  if (output.exitCode !== 0) {
    return failed(`Failed to push to ${remote}: ${describeFailure(output)}`);
  }

  if (!includeTags) {
    return succeeded(`Pushed to ${remote}`);
  }

  const tagsOutput = await runGit(ctx, ["push", remote, "--tags"]);

  if (tagsOutput.exitCode !== 0) {
    return failed(
      `Pushed commits to ${remote} but failed to push tags: ${describeFailure(tagsOutput)}`
    );
  }

  return succeeded(`Pushed to ${remote} (including tags)`);
}

/**
 * Get the latest tag reachable from HEAD, or null if there is none
 */
export async function getLatestTag(ctx: GitContext): Promise<string | null> {
  const output = await runGit(ctx, ["describe", "--tags", "--abbrev=0"]);
  const tag = output.stdout.trim();

  if (output.exitCode !== 0 || !tag) {
    return null;
  }

  return tag;
}

/**
 * Whether a tag of this name exists in the local repository
 */
export async function tagExists(ctx: GitContext, tag: string): Promise<boolean> {
  const output = await runGit(ctx, ["rev-parse", "-q", "--verify", `refs/tags/${tag}`]);
  return output.exitCode === 0;
}

/**
 * Get the current branch, short status and configured remotes
 *
 * @throws ToolFailureError when any of the git queries fails
 */
export async function getStatusSummary(ctx: GitContext): Promise<StatusSummary> {
  const branch = await gitOutput(ctx, ["branch", "--show-current"]);
  // Leading spaces carry the index status
  const changes = await gitOutput(ctx, ["status", "--short"], { preserveWhitespace: true });
  const remotes = await gitOutput(ctx, ["remote", "-v"]);

  return {
    branch,
    changes: changes.split("\n").filter(Boolean),
    remotes: remotes.split("\n").filter(Boolean),
  };
}
