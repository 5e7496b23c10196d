import * as p from "@clack/prompts";
import color from "picocolors";
import { getGlobalConfigPath, getProjectConfigPath, initProjectConfig } from "../lib/config";
import { EXIT_FAILURE, EXIT_OK, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface ConfigOptions {
  /** Write a default project config if none exists */
  init?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<ExitCode> {
  const session = await openSession();
  if (!session) {
    return EXIT_FAILURE;
  }
  const { config, repoRoot } = session;

  p.intro(color.bgBlue(color.black(" gitsem config ")));

  if (options.init) {
    const { path, created } = initProjectConfig(repoRoot);
    if (created) {
      p.log.success(`Created ${path}`);
    } else {
      p.log.warn(`${path} already exists`);
    }
  }

  p.log.info(color.bold("Config files:"));
  p.log.message(`  Global:  ${color.dim(getGlobalConfigPath())}`);
  p.log.message(`  Project: ${color.dim(getProjectConfigPath(repoRoot))}`);

  p.log.info(color.bold("Current Configuration:"));
  p.log.message(
    [
      `  Remote:          ${color.cyan(config.release.remote)}`,
      `  Tag prefix:      ${color.cyan(config.release.tagPrefix || "(none)")}`,
      `  Auto push tags:  ${color.cyan(String(config.release.autoPush))}`,
      `  Auto stage all:  ${color.cyan(String(config.commit.autoStageAll))}`,
      `  Verbose:         ${color.cyan(String(config.general.verbose))}`,
    ].join("\n")
  );

  p.outro("Flags passed on the command line override these values");
  return EXIT_OK;
}
