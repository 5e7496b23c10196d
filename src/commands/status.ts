import * as p from "@clack/prompts";
import color from "picocolors";
import { parseVersion } from "../lib/version";
import { NotAVersionError, ToolFailureError } from "../types/errors";
import { getLatestTag, getStatusSummary } from "../utils/git";
import { EXIT_FAILURE, EXIT_OK, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface StatusOptions {
  verbose?: boolean;
}

/**
 * Format one `git status --short` line with a colored status code
 */
export function formatChange(line: string): string {
  const code = line.slice(0, 2);
  const file = line.slice(3);
  const colored = code.includes("?")
    ? color.dim(code)
    : code[0] !== " "
      ? color.green(code)
      : color.yellow(code);
  return `  ${colored} ${file}`;
}

/**
 * Status command: current branch, latest version tag, changes and remotes
 */
export async function statusCommand(options: StatusOptions): Promise<ExitCode> {
  const session = await openSession({ verbose: options.verbose });
  if (!session) {
    return EXIT_FAILURE;
  }
  const { ctx, config } = session;

  p.intro(color.bgBlue(color.black(" gitsem status ")));

  try {
    const summary = await getStatusSummary(ctx);
    const latestTag = await getLatestTag(ctx);

    p.log.info(`Branch: ${color.cyan(summary.branch || "(detached HEAD)")}`);

    if (latestTag === null) {
      p.log.info(`Latest tag: ${color.dim("none")}`);
    } else {
      let tagLine = color.green(latestTag);
      try {
        parseVersion(latestTag, config.release.tagPrefix);
      } catch (error) {
        if (!(error instanceof NotAVersionError)) throw error;
        tagLine += color.yellow(" (not a semantic version)");
      }
      p.log.info(`Latest tag: ${tagLine}`);
    }

    if (summary.changes.length === 0) {
      p.log.success("Working tree clean");
    } else {
      p.log.message(`Changes:\n${summary.changes.map(formatChange).join("\n")}`);
    }

    if (summary.remotes.length === 0) {
      p.log.warn("No remotes configured");
    } else {
      p.log.message(`Remotes:\n${summary.remotes.map((r) => `  ${color.dim(r)}`).join("\n")}`);
    }
  } catch (error) {
    if (error instanceof ToolFailureError) {
      p.log.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  p.outro("Done");
  return EXIT_OK;
}
