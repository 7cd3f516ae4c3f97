import { errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import { DeploymentJob } from "../../models";
import { IArtifactService } from "../artifact/artifact.interface";
import { DeployStep, IDeployService, IDeploymentClient, IObjectUploader } from "./deploy.interface";

/**
 * validate -> pack -> create -> upload -> start -> cleanup.
 *
 * The first failing step stops the run and its error is rethrown as is. The
 * artifact is only deleted once the deployment has been started; after an
 * earlier failure it stays on disk for inspection. Nothing is idempotent: a
 * second run packs again and asks for a new deployment slot.
 */
export class AmplifyDeployService implements IDeployService {
  constructor(
    private artifacts: IArtifactService,
    private client: IDeploymentClient,
    private uploader: IObjectUploader,
  ) {}

  private log(ctx: Record<string, unknown>) { return createLogger({ service: "DeployService", ...ctx }); }

  private async step<T>(step: DeployStep, ctx: Record<string, unknown>, fn: () => T | Promise<T>): Promise<T> {
    this.log({ ...ctx, step }).debug("Deploy step");
    try {
      return await fn();
    } catch (e) {
      this.log({ ...ctx, step, error: errorMessage(e) }).error(`Deployment aborted at step '${step}'`);
      throw e;
    }
  }

  async deploy(appId: string, branchName: string, buildDirectory: string): Promise<DeploymentJob> {
    const ctx = { appId, branchName };
    await this.step("validate", ctx, () => this.artifacts.validate(buildDirectory));
    const artifact = await this.step("pack", ctx, () => this.artifacts.pack(buildDirectory));

    this.log(ctx).info(`Creating deployment for app ${appId}, branch ${branchName}`);
    const slot = await this.step("create", ctx, () => this.client.createDeployment(appId, branchName));
    const job: DeploymentJob = { app_id: appId, branch_name: branchName, ...slot };
    this.log({ ...ctx, jobId: job.job_id }).info(`Created job: ${job.job_id}`);

    await this.step("upload", { ...ctx, jobId: job.job_id }, () => this.uploader.put(job.upload_url, artifact));
    await this.step("start", { ...ctx, jobId: job.job_id }, () =>
      this.client.startDeployment(appId, branchName, job.job_id),
    );
    this.log({ ...ctx, jobId: job.job_id }).info(`Started deployment: ${job.job_id}`);

    await this.step("cleanup", { ...ctx, jobId: job.job_id }, () => this.artifacts.remove(artifact));
    this.log({ ...ctx, jobId: job.job_id }).info(`Deployment process completed for job: ${job.job_id}`);
    return job;
  }
}
