import ora from "ora";
import { push } from "../utils/git";
import { EXIT_FAILURE, report, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface PushOptions {
  remote?: string;
  branch?: string;
  tags?: boolean;
  verbose?: boolean;
}

export async function pushCommand(options: PushOptions): Promise<ExitCode> {
  const session = await openSession({ verbose: options.verbose });
  if (!session) {
    return EXIT_FAILURE;
  }

  const remote = options.remote ?? session.config.release.remote;
  const spinner = ora(`Pushing to ${remote}...`).start();
  const result = await push(session.ctx, remote, options.branch, options.tags ?? false);
  spinner.stop();

  return report(result);
}
