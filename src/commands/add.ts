import { stage } from "../utils/git";
import { EXIT_FAILURE, report, type ExitCode } from "../utils/output";
import { openSession } from "../utils/session";

export interface AddOptions {
  verbose?: boolean;
}

/**
 * Stage the given files, or everything when none are given
 */
export async function addCommand(files: string[], options: AddOptions): Promise<ExitCode> {
  const session = await openSession({ verbose: options.verbose });
  if (!session) {
    return EXIT_FAILURE;
  }

  return report(await stage(session.ctx, files.length > 0 ? files : undefined));
}
