// Field names follow the keys of the per-user YAML configuration.
export interface AppEntry {
  app_id: string;
  repo_root?: string;
  build_directory?: string;
  default_branch?: string;
}

export interface UserSettings {
  aws_profile?: string;
  aws_region?: string;
  apps: Record<string, AppEntry>;
}

/** Username -> settings, in declaration order. */
export type UserConfig = Record<string, UserSettings>;

export interface ResolvedUserConfig {
  username: string;
  settings: UserSettings;
  /** false when the user had no entry and another entry was used instead */
  matched: boolean;
  /** the key of the entry actually used, if any */
  entry?: string;
  source?: string;
}

export interface ResolvedTarget {
  app_name: string;
  app: AppEntry;
}

export interface BranchInfo {
  branch_name: string;
  stage?: string;
  display_name?: string;
}

export type BranchSource = "configured" | "version_control" | "operator";

export interface BranchDecision {
  branch_name: string;
  existed_before: boolean;
  source: BranchSource;
}

export interface DeploymentSlot {
  job_id: string;
  upload_url: string;
}

export interface DeploymentJob extends DeploymentSlot {
  app_id: string;
  branch_name: string;
}
