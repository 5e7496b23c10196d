import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveStaging } from "../../src/commands/commit";
import { WorkflowStepFailureError } from "../../src/types/errors";
import { EXIT_FAILURE, EXIT_OK, report, reportWorkflow } from "../../src/utils/output";

describe("output", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("report", () => {
    it("prints successes to stdout and exits 0", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(report({ succeeded: true, message: "Pushed to origin" })).toBe(EXIT_OK);
      expect(log).toHaveBeenCalledWith(expect.stringContaining("Pushed to origin"));
      expect(error).not.toHaveBeenCalled();
    });

    it("prints failures to stderr and exits 1", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(report({ succeeded: false, message: "connection refused" })).toBe(EXIT_FAILURE);
      expect(error).toHaveBeenCalledWith(expect.stringContaining("Error: connection refused"));
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe("reportWorkflow", () => {
    it("prints completed steps and the side effects already made", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});

      const code = reportWorkflow({
        succeeded: false,
        message: "Failed to push to origin: connection refused",
        completed: ["Created commit: fix: y"],
        error: new WorkflowStepFailureError("push", "Failed to push to origin: connection refused", [
          'commit "fix: y" created',
        ]),
      });

      expect(code).toBe(EXIT_FAILURE);
      expect(log).toHaveBeenCalledWith(expect.stringContaining("Created commit: fix: y"));
      expect(error).toHaveBeenNthCalledWith(
        1,
        expect.stringContaining("Error: Failed to push to origin: connection refused")
      );
      expect(error).toHaveBeenNthCalledWith(2, expect.stringContaining('Already done: commit "fix: y" created'));
    });
  });
});

describe("resolveStaging", () => {
  it("stages everything for a bare -f or an empty list", () => {
    expect(resolveStaging(true, false)).toBe("all");
    expect(resolveStaging([], false)).toBe("all");
  });

  it("stages the listed files", () => {
    expect(resolveStaging(["a.ts"], false)).toEqual(["a.ts"]);
  });

  it("skips staging unless autoStageAll is configured", () => {
    expect(resolveStaging(undefined, false)).toBeUndefined();
    expect(resolveStaging(undefined, true)).toBe("all");
  });
});
