// Main exports for programmatic usage
export * from "./lib/version";
export * from "./lib/message";
export * from "./lib/workflow";
export * from "./lib/config";
export * from "./utils/git";
export { createProcessRunner, type RunnerOptions } from "./utils/runner";
export { report, reportWorkflow, EXIT_OK, EXIT_FAILURE, type ExitCode } from "./utils/output";
export * from "./types/errors";
export * from "./types/operations";
