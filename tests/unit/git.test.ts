import { describe, expect, it } from "vitest";
import { ToolFailureError } from "../../src/types/errors";
import {
  commit,
  createTag,
  getLatestTag,
  getStatusSummary,
  gitOutput,
  isGitRepo,
  push,
  stage,
} from "../../src/utils/git";
import { FakeRunner, fakeContext } from "../helpers/fake-runner";

describe("git operations", () => {
  describe("stage", () => {
    it("stages everything when no paths are given", async () => {
      const runner = new FakeRunner();
      const result = await stage(fakeContext(runner));

      expect(runner.calls).toEqual([{ commandLine: ["git", "add", "-A"], cwd: "/repo" }]);
      expect(result).toEqual({ succeeded: true, message: "Staged all changes" });
    });

    it("succeeds without running git for an empty list", async () => {
      const runner = new FakeRunner();
      const result = await stage(fakeContext(runner), []);

      expect(runner.calls).toEqual([]);
      expect(result).toEqual({ succeeded: true, message: "No files given, nothing was staged" });
    });

    it("stages the given paths", async () => {
      const runner = new FakeRunner();
      const result = await stage(fakeContext(runner), ["a.ts", "b.ts"]);

      expect(runner.commands).toEqual(["git add -- a.ts b.ts"]);
      expect(result.message).toBe("Staged 2 paths: a.ts, b.ts");
    });

    it("reports the captured stderr on failure", async () => {
      const runner = new FakeRunner().fail("git add", "fatal: pathspec 'x' did not match any files", 128);
      const result = await stage(fakeContext(runner), ["x"]);

      expect(result).toEqual({
        succeeded: false,
        message: "Failed to stage files: fatal: pathspec 'x' did not match any files",
      });
    });
  });

  describe("commit", () => {
    it("passes the full message to git and echoes the header", async () => {
      const runner = new FakeRunner();
      const result = await commit(fakeContext(runner), "feat: x\n\nbody");

      expect(runner.calls[0].commandLine).toEqual(["git", "commit", "-m", "feat: x\n\nbody"]);
      expect(result).toEqual({ succeeded: true, message: "Created commit: feat: x" });
    });

    it("rejects an empty message without running git", async () => {
      const runner = new FakeRunner();
      const result = await commit(fakeContext(runner), "  ");

      expect(runner.calls).toEqual([]);
      expect(result.succeeded).toBe(false);
    });

    it("falls back to stdout when git reports the failure there", async () => {
      const runner = new FakeRunner().on("git commit", {
        exitCode: 1,
        stdout: "nothing to commit, working tree clean\n",
      });
      const result = await commit(fakeContext(runner), "fix: y");

      expect(result).toEqual({
        succeeded: false,
        message: "Failed to create commit: nothing to commit, working tree clean",
      });
    });
  });

  describe("createTag", () => {
    it("creates an annotated tag when a message is given", async () => {
      const runner = new FakeRunner();
      const result = await createTag(fakeContext(runner), { major: 1, minor: 2, patch: 0 }, "Release");

      expect(runner.calls[0].commandLine).toEqual(["git", "tag", "-a", "v1.2.0", "-m", "Release"]);
      expect(result).toEqual({ succeeded: true, message: "Created tag v1.2.0" });
    });

    it("creates a lightweight tag without a message", async () => {
      const runner = new FakeRunner();
      await createTag(fakeContext(runner), { major: 1, minor: 2, patch: 0 }, undefined, "release-");

      expect(runner.commands).toEqual(["git tag release-1.2.0"]);
    });

    it("reports the captured stderr on failure", async () => {
      const runner = new FakeRunner().fail("git tag", "fatal: tag 'v1.2.0' already exists", 128);
      const result = await createTag(fakeContext(runner), { major: 1, minor: 2, patch: 0 });

      expect(result).toEqual({
        succeeded: false,
        message: "Failed to create tag v1.2.0: fatal: tag 'v1.2.0' already exists",
      });
    });
  });

  describe("push", () => {
    it("pushes the current branch only when tags are not requested", async () => {
      const runner = new FakeRunner();
      const result = await push(fakeContext(runner), "origin", undefined, false);

      expect(runner.commands).toEqual(["git push origin"]);
      expect(result).toEqual({ succeeded: true, message: "Pushed to origin" });
    });

    it("pushes the branch and then the tags", async () => {
      const runner = new FakeRunner();
      const result = await push(fakeContext(runner), "upstream", "main", true);

      expect(runner.commands).toEqual(["git push upstream main", "git push upstream --tags"]);
      expect(result).toEqual({ succeeded: true, message: "Pushed to upstream (including tags)" });
    });

    it("never pushes tags after a failed branch push", async () => {
      const runner = new FakeRunner().fail("git push origin", "connection refused");
      const result = await push(fakeContext(runner), "origin", undefined, true);

      expect(runner.commands).toEqual(["git push origin"]);
      expect(result).toEqual({ succeeded: false, message: "Failed to push to origin: connection refused" });
    });

    it("says the commits were pushed when only the tag push fails", async () => {
      const runner = new FakeRunner().fail("git push origin --tags", "! [rejected] v1.0.0 (already exists)");
      const result = await push(fakeContext(runner), "origin", undefined, true);

      expect(result).toEqual({
        succeeded: false,
        message: "Pushed commits to origin but failed to push tags: ! [rejected] v1.0.0 (already exists)",
      });
    });
  });

  describe("getLatestTag", () => {
    it("returns the trimmed tag name", async () => {
      const runner = new FakeRunner().on("git describe --tags --abbrev=0", { stdout: "v1.4.2\n" });

      expect(await getLatestTag(fakeContext(runner))).toBe("v1.4.2");
    });

    it("returns null when there are no tags", async () => {
      const runner = new FakeRunner().fail("git describe", "fatal: No names found, cannot describe anything.", 128);

      expect(await getLatestTag(fakeContext(runner))).toBeNull();
    });
  });

  describe("isGitRepo", () => {
    it("is true inside a work tree", async () => {
      const runner = new FakeRunner().on("git rev-parse --is-inside-work-tree", { stdout: "true\n" });

      expect(await isGitRepo(fakeContext(runner))).toBe(true);
    });

    it("is false when git fails", async () => {
      const runner = new FakeRunner().fail("git rev-parse", "fatal: not a git repository", 128);

      expect(await isGitRepo(fakeContext(runner))).toBe(false);
    });
  });

  describe("gitOutput", () => {
    it("throws ToolFailureError with the command and stderr", async () => {
      const runner = new FakeRunner().fail("git remote -v", "fatal: not a git repository", 128);
      const promise = gitOutput(fakeContext(runner), ["remote", "-v"]);

      await expect(promise).rejects.toBeInstanceOf(ToolFailureError);
      await expect(promise).rejects.toThrow(
        "git remote -v exited with code 128: fatal: not a git repository"
      );
    });
  });

  describe("getStatusSummary", () => {
    it("collects branch, changes and remotes", async () => {
      const runner = new FakeRunner()
        .on("git branch --show-current", { stdout: "main\n" })
        .on("git status --short", { stdout: " M src/a.ts\n?? notes.md\n" })
        .on("git remote -v", {
          stdout: "origin\tgit@example.com:team/app.git (fetch)\norigin\tgit@example.com:team/app.git (push)\n",
        });

      expect(await getStatusSummary(fakeContext(runner))).toEqual({
        branch: "main",
        changes: [" M src/a.ts", "?? notes.md"],
        remotes: [
          "origin\tgit@example.com:team/app.git (fetch)",
          "origin\tgit@example.com:team/app.git (push)",
        ],
      });
    });
  });
});
