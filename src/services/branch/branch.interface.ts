import { BranchDecision, BranchInfo } from "../../models";

/** Interactive operator input. Implementations throw OperatorCancelledError on cancel. */
export interface IOperatorPrompt {
  showBranches(branches: BranchInfo[]): void;
  askBranchName(): Promise<string>;
  confirmCreate(branchName: string): Promise<boolean>;
}

export type ReconcileState =
  | { kind: "TryConfigured" }
  | { kind: "TryVersionControl" }
  | { kind: "TryOperatorChoice" }
  | { kind: "Resolved"; decision: BranchDecision };

export interface IBranchService {
  reconcile(appId: string, configuredBranch?: string): Promise<BranchDecision>;
}
