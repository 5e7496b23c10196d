#!/usr/bin/env node

import chalk from "chalk";
import { Command, Option } from "commander";
import { addCommand } from "./commands/add";
import { commitCommand, type CommitOptions } from "./commands/commit";
import { configCommand, type ConfigOptions } from "./commands/config";
import { pushCommand, type PushOptions } from "./commands/push";
import { statusCommand } from "./commands/status";
import { tagCommand, type TagOptions } from "./commands/tag";
import { COMMIT_TYPES } from "./lib/message";
import { BUMP_KINDS } from "./lib/version";
import { ConfigError } from "./types/errors";
import { EXIT_FAILURE, type ExitCode } from "./utils/output";

const program = new Command();

/**
 * Run a command and turn its result into the process exit code
 */
async function run(action: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Error: Invalid config: ${error.message}`));
    } else {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
    }
    process.exitCode = EXIT_FAILURE;
  }
}

function verbose(): boolean | undefined {
  const opts = program.opts<{ verbose?: boolean }>();
  return opts.verbose;
}

program
  .name("gitsem")
  .description("Conventional commits and semantic version tags for git")
  .version("1.0.0")
  .option("--verbose", "Print every git command before running it");

program.addHelpText(
  "after",
  `
Examples:
  $ gitsem commit -t feat -d "add new feature" --push
  $ gitsem commit -t fix -d "fix bug" -f src/a.ts src/b.ts
  $ gitsem commit -t feat -d "add login" -s auth -b "Detailed description"
  $ gitsem tag -b minor -m "Release" --push
  $ gitsem commit -t feat -d "new feature" --tag minor`
);

// Add command
program
  .command("add")
  .description("Stage files (default: all changes)")
  .argument("[files...]", "Files to stage")
  .action(async (files: string[]) => {
    await run(() => addCommand(files, { verbose: verbose() }));
  });

// Commit command
program
  .command("commit")
  .alias("c")
  .description("Create a conventional commit, then optionally tag and push")
  .addOption(
    new Option("-t, --type <type>", "Commit type").choices(COMMIT_TYPES).makeOptionMandatory()
  )
  .requiredOption("-d, --description <text>", "Short description of changes")
  .option("-s, --scope <scope>", "Scope of changes")
  .option("-b, --body <text>", "Detailed description")
  .option("--breaking", "Mark as breaking change")
  .option("--footer <text>", "Footer (e.g. issue references)")
  .option("-f, --files [files...]", "Stage files before committing (no list: all files)")
  .option("--push", "Push after committing")
  .addOption(
    new Option("--tag <bump>", "Create and push a tag with this version bump").choices(BUMP_KINDS)
  )
  .option("--remote <name>", "Remote name (default from config: origin)")
  .option("--branch <name>", "Branch name (default: current branch)")
  .action(async (options: CommitOptions) => {
    await run(() => commitCommand({ ...options, verbose: verbose() }));
  });

// Tag command
program
  .command("tag")
  .description("Create the next semantic version tag")
  .addOption(new Option("-b, --bump <bump>", "Version bump").choices(BUMP_KINDS))
  .option("-m, --message <text>", "Tag message (creates an annotated tag)")
  .option("--push", "Push the branch and tags after tagging")
  .option("--remote <name>", "Remote name (default from config: origin)")
  .option("--branch <name>", "Branch name (default: current branch)")
  .option("--prefix <prefix>", "Tag prefix (default from config: v)")
  .option("--resume <tag>", "Retry pushing a tag that was created but not pushed")
  .action(async (options: TagOptions) => {
    await run(() => tagCommand({ ...options, verbose: verbose() }));
  });

// Push command
program
  .command("push")
  .description("Push to the remote")
  .option("--remote <name>", "Remote name (default from config: origin)")
  .option("--branch <name>", "Branch name (default: current branch)")
  .option("--tags", "Push tags after the branch")
  .action(async (options: PushOptions) => {
    await run(() => pushCommand({ ...options, verbose: verbose() }));
  });

// Status command
program
  .command("status")
  .alias("st")
  .description("Show branch, latest version tag, changes and remotes")
  .action(async () => {
    await run(() => statusCommand({ verbose: verbose() }));
  });

// Config command
program
  .command("config")
  .alias("conf")
  .description("Show the resolved configuration")
  .option("--init", "Write a default .gitsem/config.json to this repository")
  .action(async (options: ConfigOptions) => {
    await run(() => configCommand(options));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(String(error)));
  process.exitCode = EXIT_FAILURE;
});
