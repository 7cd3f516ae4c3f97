#!/usr/bin/env node
import { Command } from "commander";
import { AmplifyApi } from "./amplify";
import { deployTarget, formatAppList, formatBranchList } from "./commands";
import { DEPLOY_CONFIG } from "./config";
import { DeployError, errorMessage } from "./errors";
import { GitBranchOracle } from "./git";
import { createLogger, logger } from "./logger";
import { ResolvedTarget, UserSettings } from "./models";
import { ClackOperatorPrompt } from "./prompt";
import { AppService } from "./services/app/app.service";
import { ZipArtifactService } from "./services/artifact/artifact.service";
import { BranchService } from "./services/branch/branch.service";
import { ConfigService } from "./services/config/config.service";
import { AmplifyDeployService } from "./services/deploy/deploy.service";
import { HttpObjectUploader } from "./upload";

interface ActionOptions {
  app?: string;
  branch?: string;
  config: string;
}

const log = createLogger({ service: "cli" });

function loadSettings(configFile: string): UserSettings {
  const resolved = new ConfigService().loadForCurrentUser(configFile);
  log.debug({ cwd: process.cwd(), source: resolved.source }, "Configuration resolved");
  return resolved.settings;
}

function selectApp(settings: UserSettings, appName?: string): ResolvedTarget {
  const target = new AppService().select(settings, appName);
  log.info(
    { repo_root: target.app.repo_root, build_directory: target.app.build_directory },
    `Selected app: ${target.app_name} (ID: ${target.app.app_id})`,
  );
  return target;
}

function amplifyFor(settings: UserSettings): AmplifyApi {
  return new AmplifyApi({ profile: settings.aws_profile, region: settings.aws_region });
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("amplify-deploy")
    .description("Package a static build directory and deploy it to an AWS Amplify branch")
    .version("0.1.0")
    .showHelpAfterError();

  program
    .command("deploy")
    .description("Deploy the app's build directory")
    .option("-a, --app <name>", "app name from the config (detected from the working directory if omitted)")
    .option("-b, --branch <name>", "branch to deploy to (overrides default_branch)")
    .option("-c, --config <path>", "path to the config file", DEPLOY_CONFIG)
    .action(async (opts: ActionOptions) => {
      const settings = loadSettings(opts.config);
      const target = selectApp(settings, opts.app);
      const client = amplifyFor(settings);
      const branches = new BranchService(client, new GitBranchOracle(), new ClackOperatorPrompt());
      const artifacts = new ZipArtifactService();
      const deployer = new AmplifyDeployService(artifacts, client, new HttpObjectUploader());
      const job = await deployTarget({ artifacts, branches, deployer }, target, opts.branch);
      console.log(job.job_id);
    });

  program
    .command("list-branches")
    .description("List the Amplify branches of an app")
    .option("-a, --app <name>", "app name from the config (detected from the working directory if omitted)")
    .option("-c, --config <path>", "path to the config file", DEPLOY_CONFIG)
    .action(async (opts: ActionOptions) => {
      const settings = loadSettings(opts.config);
      const target = selectApp(settings, opts.app);
      const lines = await formatBranchList(amplifyFor(settings), target);
      console.log(lines.join("\n"));
    });

  program
    .command("list-apps")
    .description("List the apps configured for the current user")
    .option("-c, --config <path>", "path to the config file", DEPLOY_CONFIG)
    .action((opts: ActionOptions) => {
      console.log(formatAppList(new AppService(), loadSettings(opts.config)).join("\n"));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (e) {
    if (e instanceof DeployError) {
      logger.error({ code: e.code }, e.message);
    } else {
      logger.error({ err: e }, `Unexpected error: ${errorMessage(e)}`);
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
