/**
 * Semantic version parsing, ordering and bumping
 *
 * All functions are pure; a bump always returns a new value.
 */

import { NotAVersionError } from "../types/errors";

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export const BUMP_KINDS = ["major", "minor", "patch"] as const;

export type BumpKind = (typeof BUMP_KINDS)[number];

/**
 * Version assumed when the repository has no version tag yet
 */
export const BASELINE_VERSION: SemanticVersion = Object.freeze({
  major: 0,
  minor: 0,
  patch: 0,
});

export const DEFAULT_TAG_PREFIX = "v";

export function isBumpKind(value: string): value is BumpKind {
  return (BUMP_KINDS as readonly string[]).includes(value);
}

/**
 * Parse a version out of a tag such as "v1.2.3" or "1.2.3".
 *
 * Only the leading major.minor.patch is matched; anything after it
 * ("1.2.3-rc1", "v2.0.0+build") is ignored rather than rejected.
 *
 * @throws NotAVersionError when the tag does not start with three integers,
 * or a component is too large to be represented exactly
 */
export function parseVersion(
  tag: string,
  prefix: string = DEFAULT_TAG_PREFIX
): SemanticVersion {
  const stripped =
    prefix.length > 0 && tag.startsWith(prefix) ? tag.slice(prefix.length) : tag;
  const match = stripped.match(/^(\d+)\.(\d+)\.(\d+)/);
  // The default prefix is optional, so it is not worth naming in the error
  const reject = () =>
    new NotAVersionError(tag, prefix === DEFAULT_TAG_PREFIX ? undefined : prefix);

  if (!match) {
    throw reject();
  }

  const [major, minor, patch] = [match[1], match[2], match[3]].map((part) => parseInt(part, 10));
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    throw reject();
  }

  return { major, minor, patch };
}

export function bump(version: SemanticVersion, kind: BumpKind): SemanticVersion {
  switch (kind) {
    case "major":
      return { major: version.major + 1, minor: 0, patch: 0 };
    case "minor":
      return { major: version.major, minor: version.minor + 1, patch: 0 };
    case "patch":
      return { major: version.major, minor: version.minor, patch: version.patch + 1 };
  }
}

export function formatTag(
  version: SemanticVersion,
  prefix: string = DEFAULT_TAG_PREFIX
): string {
  return `${prefix}${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Lexicographic comparison of (major, minor, patch)
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}
