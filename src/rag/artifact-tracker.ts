import { mkdir } from "node:fs/promises";
import path from "node:path";
import { CheckRepoActions, simpleGit, type SimpleGit } from "simple-git";
import { getLogger } from "./logger.js";

const log = getLogger("artifacts");

/** Versions persisted files outside the core save path. */
export interface ArtifactTracker {
  track(files: string[], message: string): Promise<void>;
}

/**
 * Commits persisted files into a git repository rooted at `repoPath`,
 * creating and initialising it on first use. An enclosing work tree does not
 * count; the tracker always keeps its own repository.
 */
export class GitArtifactTracker implements ArtifactTracker {
  private repo: Promise<SimpleGit> | undefined;

  constructor(private readonly repoPath: string) {}

  private ensureRepo(): Promise<SimpleGit> {
    this.repo ??= this.openRepo().catch((error: unknown) => {
      this.repo = undefined;
      throw error;
    });
    return this.repo;
  }

  private async openRepo(): Promise<SimpleGit> {
    await mkdir(this.repoPath, { recursive: true });
    const git = simpleGit(this.repoPath);
    if (!(await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT))) {
      log.info({ repoPath: this.repoPath }, "initialising artifact repository");
      await git.init();
    }
    return git;
  }

  async track(files: string[], message: string): Promise<void> {
    if (files.length === 0) return;
    const git = await this.ensureRepo();
    const relative = files.map((f) => path.relative(this.repoPath, f));
    await git.add(relative);
    const status = await git.status();
    if (status.isClean()) return;
    const result = await git.commit(message, relative);
    log.debug({ commit: result.commit, files: relative.length }, "tracked artifacts");
  }
}
