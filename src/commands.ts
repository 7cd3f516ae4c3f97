import path from "path";
import { MissingBuildDirectoryError } from "./errors";
import { createLogger } from "./logger";
import { DeploymentJob, ResolvedTarget, UserSettings } from "./models";
import { IAppService } from "./services/app/app.interface";
import { IArtifactService } from "./services/artifact/artifact.interface";
import { expandHome } from "./services/app/app.service";
import { IBranchService } from "./services/branch/branch.interface";
import { IDeployService, IDeploymentClient } from "./services/deploy/deploy.interface";

const NOT_SPECIFIED = "Not specified";

export function formatAppList(apps: IAppService, settings: UserSettings): string[] {
  const lines = ["Available apps:"];
  for (const { app_name, app } of apps.list(settings)) {
    lines.push(`- ${app_name}`);
    lines.push(`  Repo root: ${app.repo_root ?? NOT_SPECIFIED}`);
    lines.push(`  Build directory: ${app.build_directory ?? NOT_SPECIFIED}`);
  }
  return lines;
}

export async function formatBranchList(client: IDeploymentClient, target: ResolvedTarget): Promise<string[]> {
  const branches = await client.listBranches(target.app.app_id);
  return [`Available branches for ${target.app_name}:`, ...branches.map(b => `- ${b.branch_name}`)];
}

/**
 * Reconciles the branch and runs the deployment for an already selected app.
 * `--branch` beats the app's default_branch as the configured preference.
 * The build directory is validated before any remote call.
 */
export async function deployTarget(
  deps: { artifacts: IArtifactService; branches: IBranchService; deployer: IDeployService },
  target: ResolvedTarget,
  explicitBranch?: string,
  cwd = process.cwd(),
): Promise<DeploymentJob> {
  const { app_name, app } = target;
  if (!app.build_directory) throw new MissingBuildDirectoryError(app_name);
  const buildDirectory = path.resolve(cwd, expandHome(app.build_directory));
  deps.artifacts.validate(buildDirectory);

  const decision = await deps.branches.reconcile(app.app_id, explicitBranch ?? app.default_branch);
  createLogger({ app_name, app_id: app.app_id, branch: decision.branch_name, buildDirectory }).info(
    `Deploying ${app_name} (ID: ${app.app_id}) branch '${decision.branch_name}' from ${buildDirectory}`,
  );
  return deps.deployer.deploy(app.app_id, decision.branch_name, buildDirectory);
}
