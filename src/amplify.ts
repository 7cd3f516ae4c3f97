import {
  AmplifyClient,
  CreateBranchCommand,
  CreateDeploymentCommand,
  GetBranchCommand,
  ListBranchesCommand,
  StartDeploymentCommand,
  type Branch,
} from "@aws-sdk/client-amplify";
import { fromIni } from "@aws-sdk/credential-providers";
import { AWS_REGION as CFG_REGION } from "./config";
import { ServiceError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { BranchInfo, DeploymentSlot } from "./models";
import { IDeploymentClient } from "./services/deploy/deploy.interface";

export type AmplifySender = Pick<AmplifyClient, "send">;

function isNotFound(e: unknown): boolean {
  return e instanceof Error && e.name === "NotFoundException";
}

function toBranchInfo(b: Branch): BranchInfo {
  return { branch_name: b.branchName ?? "", stage: b.stage, display_name: b.displayName };
}

export class AmplifyApi implements IDeploymentClient {
  private client: AmplifySender;

  // Credentials come from the named profile, never from a process-wide AWS_PROFILE.
  constructor(opts?: { profile?: string; region?: string; client?: AmplifySender }) {
    const region = opts?.region ?? CFG_REGION;
    if (opts?.client) {
      this.client = opts.client;
    } else {
      if (!opts?.profile) {
        createLogger({ service: "AmplifyApi" }).warn("AWS_PROFILE not found in config. Using default AWS credentials.");
      }
      this.client = new AmplifyClient({
        region,
        credentials: opts?.profile ? fromIni({ profile: opts.profile }) : undefined,
      });
    }
  }

  private log(ctx: Record<string, unknown>) { return createLogger({ service: "AmplifyApi", ...ctx }); }

  private async call<T>(operation: string, ctx: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    this.log({ operation, ...ctx }).debug("Calling Amplify");
    try {
      return await fn();
    } catch (e) {
      this.log({ operation, ...ctx, error: errorMessage(e) }).error("Amplify request failed");
      throw new ServiceError(operation, errorMessage(e), { cause: e });
    }
  }

  async createDeployment(appId: string, branchName: string): Promise<DeploymentSlot> {
    const res = await this.call("createDeployment", { appId, branchName }, () =>
      this.client.send(new CreateDeploymentCommand({ appId, branchName })),
    );
    if (!res.jobId || !res.zipUploadUrl) {
      throw new ServiceError("createDeployment", "response is missing jobId or zipUploadUrl");
    }
    return { job_id: res.jobId, upload_url: res.zipUploadUrl };
  }

  async startDeployment(appId: string, branchName: string, jobId: string): Promise<void> {
    await this.call("startDeployment", { appId, branchName, jobId }, () =>
      this.client.send(new StartDeploymentCommand({ appId, branchName, jobId })),
    );
  }

  async listBranches(appId: string): Promise<BranchInfo[]> {
    const branches: BranchInfo[] = [];
    let nextToken: string | undefined;
    do {
      const res = await this.call("listBranches", { appId, nextToken }, () =>
        this.client.send(new ListBranchesCommand({ appId, nextToken })),
      );
      branches.push(...(res.branches ?? []).map(toBranchInfo));
      nextToken = res.nextToken;
    } while (nextToken);
    return branches;
  }

  async getBranch(appId: string, branchName: string): Promise<BranchInfo | undefined> {
    try {
      const res = await this.client.send(new GetBranchCommand({ appId, branchName }));
      return res.branch ? toBranchInfo(res.branch) : { branch_name: branchName };
    } catch (e) {
      if (isNotFound(e)) return undefined;
      this.log({ operation: "getBranch", appId, branchName, error: errorMessage(e) }).error("Amplify request failed");
      throw new ServiceError("getBranch", errorMessage(e), { cause: e });
    }
  }

  async createBranch(appId: string, branchName: string): Promise<void> {
    await this.call("createBranch", { appId, branchName }, () =>
      this.client.send(new CreateBranchCommand({ appId, branchName })),
    );
    this.log({ appId, branchName }).info(`Created new branch '${branchName}' in Amplify app.`);
  }
}
