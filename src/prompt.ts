import * as p from "@clack/prompts";
import pc from "picocolors";
import { OperatorCancelledError } from "./errors";
import { BranchInfo } from "./models";
import { IOperatorPrompt } from "./services/branch/branch.interface";

export class ClackOperatorPrompt implements IOperatorPrompt {
  showBranches(branches: BranchInfo[]): void {
    const lines = branches.map(b => `- ${b.branch_name}`);
    p.note(lines.length ? lines.join("\n") : pc.dim("(no branches)"), "No valid branch found. Available branches");
  }

  async askBranchName(): Promise<string> {
    const name = await p.text({
      message: "Enter the name of the branch you want to deploy to:",
      validate: value => (value.trim() ? undefined : "Branch name is required"),
    });
    if (p.isCancel(name)) throw new OperatorCancelledError();
    return name.trim();
  }

  async confirmCreate(branchName: string): Promise<boolean> {
    const create = await p.confirm({
      message: `Branch '${pc.cyan(branchName)}' does not exist in Amplify. Do you want to create it?`,
      initialValue: false,
    });
    if (p.isCancel(create)) throw new OperatorCancelledError();
    return create;
  }
}
