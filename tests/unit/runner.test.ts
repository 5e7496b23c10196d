import { afterEach, describe, expect, it, vi } from "vitest";
import { createProcessRunner } from "../../src/utils/runner";

describe("createProcessRunner", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves with a failure instead of rejecting for an empty command line", async () => {
    const runner = createProcessRunner();

    await expect(runner.run([], "/")).resolves.toEqual({
      stdout: "",
      stderr: "No command given",
      exitCode: 127,
    });
  });

  it("captures stdout, stderr and a nonzero exit code", async () => {
    const runner = createProcessRunner();
    const script = "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)";

    await expect(runner.run([process.execPath, "-e", script], process.cwd())).resolves.toEqual({
      stdout: "out",
      stderr: "err",
      exitCode: 3,
    });
  });

  it("resolves with exit code 127 when the executable cannot be started", async () => {
    const runner = createProcessRunner();

    const output = await runner.run(["gitsem-missing-executable"], process.cwd());

    expect(output.exitCode).toBe(127);
    expect(output.stdout).toBe("");
    expect(output.stderr).toMatch(/ENOENT/);
  });

  it("echoes the command line when verbose", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const runner = createProcessRunner({ verbose: true });

    await runner.run([], "/");

    expect(error).toHaveBeenCalledWith(expect.stringContaining("$ "));
  });
});
