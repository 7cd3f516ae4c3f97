import { simpleGit, type SimpleGit } from "simple-git";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

/** Supplies the current local version-control branch, if there is one. */
export interface IBranchOracle {
  currentBranch(): Promise<string | undefined>;
}

export type GitRepo = Pick<SimpleGit, "checkIsRepo" | "revparse">;

export class GitBranchOracle implements IBranchOracle {
  private cwd: string;
  private git?: GitRepo;

  constructor(opts?: { cwd?: string; git?: GitRepo }) {
    this.cwd = opts?.cwd ?? process.cwd();
    this.git = opts?.git;
  }

  async currentBranch(): Promise<string | undefined> {
    const log = createLogger({ service: "GitBranchOracle", cwd: this.cwd });
    try {
      const git = this.git ?? simpleGit(this.cwd);
      if (!(await git.checkIsRepo())) {
        log.warn("Not in a Git repository.");
        return undefined;
      }
      const branch = (await git.revparse(["--abbrev-ref", "HEAD"])).trim();
      // "HEAD" means detached: there is no active branch.
      if (!branch || branch === "HEAD") {
        log.warn("No active Git branch.");
        return undefined;
      }
      log.debug({ branch }, "Detected Git branch");
      return branch;
    } catch (e) {
      log.warn({ error: errorMessage(e) }, "Could not read the current Git branch.");
      return undefined;
    }
  }
}
