import { BranchInfo, DeploymentJob, DeploymentSlot } from "../../models";

/** The remote deployment service. Failures surface as ServiceError; nothing here retries. */
export interface IDeploymentClient {
  createDeployment(appId: string, branchName: string): Promise<DeploymentSlot>;
  startDeployment(appId: string, branchName: string, jobId: string): Promise<void>;
  listBranches(appId: string): Promise<BranchInfo[]>;
  /** undefined when the branch does not exist */
  getBranch(appId: string, branchName: string): Promise<BranchInfo | undefined>;
  createBranch(appId: string, branchName: string): Promise<void>;
}

/** Sink for the artifact at a pre-signed URL. */
export interface IObjectUploader {
  put(url: string, filePath: string): Promise<void>;
}

export type DeployStep = "validate" | "pack" | "create" | "upload" | "start" | "cleanup";

export interface IDeployService {
  deploy(appId: string, branchName: string, buildDirectory: string): Promise<DeploymentJob>;
}
