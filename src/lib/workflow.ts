/**
 * Compound workflows built from repository operations
 *
 * Tag-and-push runs as an explicit state machine: each call to
 * advanceTagWorkflow performs one step, so a run that failed while pushing
 * can be resumed at the push without recreating the tag.
 */

import { EmptyDescriptionError, NotAVersionError, WorkflowStepFailureError } from "../types/errors";
import type { GitContext, OperationResult, WorkflowStep } from "../types/operations";
import { commit, createTag, getLatestTag, push, stage, tagExists } from "../utils/git";
import { buildMessage, headerLine, type CommitSpec } from "./message";
import {
  BASELINE_VERSION,
  DEFAULT_TAG_PREFIX,
  bump,
  formatTag,
  parseVersion,
  type BumpKind,
  type SemanticVersion,
} from "./version";

export interface PushOptions {
  remote: string;
  /** Defaults to the current branch's upstream */
  branch?: string;
}

export interface TagWorkflowOptions extends PushOptions {
  bump: BumpKind;
  /** Creates an annotated tag when set */
  message?: string;
  prefix?: string;
  /** Set to false to create the tag locally only */
  push?: boolean;
}

export type TagWorkflowState =
  | { step: "resolve-baseline" }
  | { step: "bump"; baseline: SemanticVersion }
  | { step: "create-tag"; version: SemanticVersion }
  | { step: "push"; tag: string }
  | { step: "success"; tag: string; message: string }
  | { step: "failed"; error: WorkflowStepFailureError; tag?: string };

export type TerminalTagWorkflowState = Extract<TagWorkflowState, { step: "success" | "failed" }>;

export interface TagWorkflowResult extends OperationResult {
  state: TerminalTagWorkflowState;
  /** Set once the tag exists locally */
  tag?: string;
}

export interface CommitWorkflowOptions extends PushOptions {
  spec: CommitSpec;
  /** "all" stages everything, a list stages those paths, undefined skips staging */
  stage?: "all" | readonly string[];
  /** Tag the new commit and push it with its tags */
  tag?: BumpKind;
  /** Defaults to the commit description */
  tagMessage?: string;
  prefix?: string;
  /** Push after committing; implied by tag */
  push?: boolean;
}

export interface CommitWorkflowResult extends OperationResult {
  /** Messages of the steps that completed, in order */
  completed: string[];
  error?: WorkflowStepFailureError;
  tag?: string;
}

export const INITIAL_TAG_WORKFLOW_STATE: TagWorkflowState = { step: "resolve-baseline" };

export function isTerminal(state: TagWorkflowState): state is TerminalTagWorkflowState {
  return state.step === "success" || state.step === "failed";
}

function failedAt(
  step: WorkflowStep,
  message: string,
  tag?: string
): TerminalTagWorkflowState {
  const durableEffects = tag ? [`tag ${tag} created locally`] : [];
  return { step: "failed", error: new WorkflowStepFailureError(step, message, durableEffects), tag };
}

async function resolveBaseline(ctx: GitContext, prefix: string): Promise<TagWorkflowState> {
  const latest = await getLatestTag(ctx);
  if (latest === null) {
    return { step: "bump", baseline: BASELINE_VERSION };
  }

  try {
    return { step: "bump", baseline: parseVersion(latest, prefix) };
  } catch (error) {
    if (error instanceof NotAVersionError) {
      return failedAt("resolve-baseline", `Cannot resolve baseline version: ${error.message}`);
    }
    throw error;
  }
}

async function pushTag(
  ctx: GitContext,
  tag: string,
  options: PushOptions
): Promise<TerminalTagWorkflowState> {
  const result = await push(ctx, options.remote, options.branch, true);

  if (!result.succeeded) {
    return failedAt("push", `Tag ${tag} created locally but push failed: ${result.message}`, tag);
  }

  return { step: "success", tag, message: `Tag ${tag} pushed to ${options.remote}` };
}

/**
 * Perform the single step the state names and return the next state.
 * Terminal states are returned unchanged.
 */
export async function advanceTagWorkflow(
  ctx: GitContext,
  options: TagWorkflowOptions,
  state: TagWorkflowState
): Promise<TagWorkflowState> {
  const prefix = options.prefix ?? DEFAULT_TAG_PREFIX;

  switch (state.step) {
    case "resolve-baseline":
      return resolveBaseline(ctx, prefix);

    case "bump":
      return { step: "create-tag", version: bump(state.baseline, options.bump) };

    case "create-tag": {
      const tag = formatTag(state.version, prefix);
      const result = await createTag(ctx, state.version, options.message, prefix);

      if (!result.succeeded) {
        return failedAt("create-tag", result.message);
      }
      if (options.push === false) {
        return { step: "success", tag, message: result.message };
      }
      return { step: "push", tag };
    }

    case "push":
      return pushTag(ctx, state.tag, options);

    case "success":
    case "failed":
      return state;
  }
}

function toTagResult(state: TerminalTagWorkflowState): TagWorkflowResult {
  if (state.step === "success") {
    return { succeeded: true, message: state.message, state, tag: state.tag };
  }
  return { succeeded: false, message: state.error.message, state, tag: state.tag };
}

/**
 * Resolve the latest version tag, bump it, create the new tag and push it
 * together with the current branch.
 */
export async function runTagWorkflow(
  ctx: GitContext,
  options: TagWorkflowOptions,
  initial: TagWorkflowState = INITIAL_TAG_WORKFLOW_STATE
): Promise<TagWorkflowResult> {
  let state = initial;

  for (;;) {
    if (isTerminal(state)) {
      return toTagResult(state);
    }
    state = await advanceTagWorkflow(ctx, options, state);
  }
}

/**
 * Retry only the push of a tag that already exists locally. Nothing is
 * pushed when the tag is missing.
 */
export async function resumeTagPush(
  ctx: GitContext,
  tag: string,
  options: PushOptions
): Promise<TagWorkflowResult> {
  if (!(await tagExists(ctx, tag))) {
    return toTagResult(failedAt("push", `Tag ${tag} does not exist locally`));
  }
  return toTagResult(await pushTag(ctx, tag, options));
}

/**
 * Stage, commit, then either tag and push or just push. Stops at the first
 * failing step; nothing runs when the commit spec is invalid.
 */
export async function runCommitWorkflow(
  ctx: GitContext,
  options: CommitWorkflowOptions
): Promise<CommitWorkflowResult> {
  const completed: string[] = [];
  const durableEffects: string[] = [];

  const fail = (step: WorkflowStep, message: string, tag?: string): CommitWorkflowResult => {
    const error = new WorkflowStepFailureError(step, message, [...durableEffects]);
    return { succeeded: false, message, completed, error, tag };
  };

  let message: string;
  try {
    message = buildMessage(options.spec);
  } catch (error) {
    if (error instanceof EmptyDescriptionError) {
      return fail("validate", error.message);
    }
    throw error;
  }
  const header = headerLine(message);

  if (options.stage !== undefined) {
    const staged = await stage(ctx, options.stage === "all" ? undefined : options.stage);
    if (!staged.succeeded) {
      return fail("stage", staged.message);
    }
    completed.push(staged.message);
  }

  const committed = await commit(ctx, message);
  if (!committed.succeeded) {
    return fail("commit", committed.message);
  }
  completed.push(committed.message);
  durableEffects.push(`commit "${header}" created`);

  const alreadyCommitted = `(commit "${header}" was already created)`;

  if (options.tag) {
    const tagged = await runTagWorkflow(ctx, {
      bump: options.tag,
      remote: options.remote,
      branch: options.branch,
      message: options.tagMessage ?? options.spec.description,
      prefix: options.prefix,
    });

    if (tagged.state.step === "failed") {
      durableEffects.push(...tagged.state.error.durableEffects);
      return fail(tagged.state.error.step, `${tagged.message} ${alreadyCommitted}`, tagged.tag);
    }

    completed.push(tagged.message);
    return { succeeded: true, message: completed.join("\n"), completed, tag: tagged.tag };
  }

  if (options.push) {
    const pushed = await push(ctx, options.remote, options.branch, false);
    if (!pushed.succeeded) {
      return fail("push", `${pushed.message} ${alreadyCommitted}`);
    }
    completed.push(pushed.message);
  }

  return { succeeded: true, message: completed.join("\n"), completed };
}
