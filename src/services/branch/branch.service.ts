import { IBranchOracle } from "../../git";
import { errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import { BranchDecision, BranchSource } from "../../models";
import { IDeploymentClient } from "../deploy/deploy.interface";
import { IBranchService, IOperatorPrompt, ReconcileState } from "./branch.interface";

/**
 * Decides which remote branch receives a deployment.
 *
 * TryConfigured -> TryVersionControl -> TryOperatorChoice -> Resolved.
 * Every path into Resolved goes through a successful existence check or a
 * successful create, so the returned branch exists remotely. The operator
 * state only leaves through Resolved; there is no timeout.
 */
export class BranchService implements IBranchService {
  /** States visited by the last reconcile call, in order. */
  history: ReconcileState["kind"][] = [];

  constructor(
    private client: IDeploymentClient,
    private oracle: IBranchOracle,
    private prompt: IOperatorPrompt,
  ) {}

  private log(ctx: Record<string, unknown>) { return createLogger({ service: "BranchService", ...ctx }); }

  async reconcile(appId: string, configuredBranch?: string): Promise<BranchDecision> {
    this.history = [];
    let state: ReconcileState = { kind: "TryConfigured" };
    while (true) {
      this.history.push(state.kind);
      this.log({ appId, state: state.kind }).debug("Branch reconciliation state");
      switch (state.kind) {
        case "TryConfigured":
          state = await this.tryConfigured(appId, configuredBranch);
          break;
        case "TryVersionControl":
          state = await this.tryVersionControl(appId);
          break;
        case "TryOperatorChoice":
          state = await this.tryOperatorChoice(appId);
          break;
        case "Resolved":
          this.log({ appId, ...state.decision }).info("Resolved deployment branch");
          return state.decision;
      }
    }
  }

  private resolved(branch_name: string, existed_before: boolean, source: BranchSource): ReconcileState {
    return { kind: "Resolved", decision: { branch_name, existed_before, source } };
  }

  private async exists(appId: string, branchName: string): Promise<boolean> {
    return (await this.client.getBranch(appId, branchName)) !== undefined;
  }

  // A failed create counts as a refusal; the caller moves on or asks again.
  private async create(appId: string, branchName: string): Promise<boolean> {
    try {
      await this.client.createBranch(appId, branchName);
      return true;
    } catch (e) {
      this.log({ appId, branchName, error: errorMessage(e) }).error("Error creating branch");
      return false;
    }
  }

  private async tryConfigured(appId: string, branch?: string): Promise<ReconcileState> {
    if (!branch) return { kind: "TryVersionControl" };
    if (await this.exists(appId, branch)) return this.resolved(branch, true, "configured");
    this.log({ appId, branch }).warn(`Configured branch '${branch}' does not exist in Amplify app.`);
    return { kind: "TryVersionControl" };
  }

  private async tryVersionControl(appId: string): Promise<ReconcileState> {
    const branch = await this.oracle.currentBranch();
    if (!branch) return { kind: "TryOperatorChoice" };
    if (await this.exists(appId, branch)) return this.resolved(branch, true, "version_control");

    this.log({ appId, branch }).warn(`Branch '${branch}' does not exist in Amplify app.`);
    if ((await this.prompt.confirmCreate(branch)) && (await this.create(appId, branch))) {
      return this.resolved(branch, false, "version_control");
    }
    return { kind: "TryOperatorChoice" };
  }

  private async tryOperatorChoice(appId: string): Promise<ReconcileState> {
    this.prompt.showBranches(await this.client.listBranches(appId));
    while (true) {
      const branch = (await this.prompt.askBranchName()).trim();
      if (!branch) continue;
      if (await this.exists(appId, branch)) return this.resolved(branch, true, "operator");
      if ((await this.prompt.confirmCreate(branch)) && (await this.create(appId, branch))) {
        return this.resolved(branch, false, "operator");
      }
    }
  }
}
