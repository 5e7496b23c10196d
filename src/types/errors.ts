import type { WorkflowStep } from "./operations";

export class NotAVersionError extends Error {
  constructor(
    public readonly tag: string,
    public readonly prefix?: string
  ) {
    super(
      `Tag "${tag}" is not a semantic version (expected major.minor.patch${
        prefix ? ` after prefix "${prefix}"` : ""
      })`
    );
    this.name = "NotAVersionError";
  }
}

export class EmptyDescriptionError extends Error {
  constructor() {
    super("Commit description must not be empty");
    this.name = "EmptyDescriptionError";
  }
}

/**
 * A git command exited with a nonzero code. Carries the captured stderr so
 * the operator can see why.
 */
export class ToolFailureError extends Error {
  constructor(
    public readonly commandLine: readonly string[],
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(`${commandLine.join(" ")} exited with code ${exitCode}: ${stderr.trim()}`);
    this.name = "ToolFailureError";
  }
}

export class WorkflowStepFailureError extends Error {
  constructor(
    public readonly step: WorkflowStep,
    message: string,
    /** Side effects that already happened and must not be repeated */
    public readonly durableEffects: readonly string[] = []
  ) {
    super(message);
    this.name = "WorkflowStepFailureError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
