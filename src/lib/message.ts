/**
 * Conventional commit message rendering
 */

import { EmptyDescriptionError } from "../types/errors";

export const COMMIT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "build",
  "ci",
  "chore",
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

export interface CommitSpec {
  type: CommitType;
  /** Short summary for the header line; must not be blank */
  description: string;
  scope?: string;
  body?: string;
  breaking: boolean;
  /** e.g. issue references, appended after the body */
  footer?: string;
}

export const BREAKING_CHANGE_NOTICE =
  "BREAKING CHANGE: This commit contains breaking changes";

export function isCommitType(value: string): value is CommitType {
  return (COMMIT_TYPES as readonly string[]).includes(value);
}

/**
 * @throws EmptyDescriptionError when the description is blank
 */
export function validateCommitSpec(spec: CommitSpec): void {
  if (spec.description.trim().length === 0) {
    throw new EmptyDescriptionError();
  }
}

/**
 * Render a commit spec as `type(scope)!: description`, followed by the
 * optional body (or breaking-change notice) and footer, each separated by
 * a blank line.
 */
export function buildMessage(spec: CommitSpec): string {
  validateCommitSpec(spec);

  const scope = spec.scope ? `(${spec.scope})` : "";
  const breaking = spec.breaking ? "!" : "";
  const blocks = [`${spec.type}${scope}${breaking}: ${spec.description}`];

  if (spec.body) {
    blocks.push(spec.body);
  } else if (spec.breaking) {
    blocks.push(BREAKING_CHANGE_NOTICE);
  }

  if (spec.footer) {
    blocks.push(spec.footer);
  }

  return blocks.join("\n\n");
}

/**
 * First line of a commit message
 */
export function headerLine(message: string): string {
  return message.split("\n")[0];
}
