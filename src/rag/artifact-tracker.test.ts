import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GitArtifactTracker } from "./artifact-tracker.js";

describe("GitArtifactTracker", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "artifacts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("can be created for a directory that does not exist yet", () => {
    expect(() => new GitArtifactTracker(path.join(dir, "missing", "repo"))).not.toThrow();
  });

  it("does nothing for an empty file list", async () => {
    const repoPath = path.join(dir, "untouched");
    await new GitArtifactTracker(repoPath).track([], "nothing");
    await expect(stat(repoPath)).rejects.toThrow();
  });

  it("tries to open the repository again after a failed attempt", async () => {
    const repoPath = path.join(dir, "repo");
    await writeFile(repoPath, "in the way");
    const tracker = new GitArtifactTracker(repoPath);

    await expect(tracker.track([path.join(repoPath, "t.json")], "save")).rejects.toThrow();

    await rm(repoPath);
    // Git itself may be missing here; the directory shows a fresh attempt was made.
    await tracker.track([path.join(repoPath, "t.json")], "save").catch(() => undefined);
    expect((await stat(repoPath)).isDirectory()).toBe(true);
  });
});
