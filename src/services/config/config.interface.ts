import { ResolvedUserConfig, UserConfig } from "../../models";

/** Returns a candidate username, or nothing. May throw; a throwing probe is skipped. */
export type UsernameProbe = () => string | undefined;

export interface LoadedConfig {
  config: UserConfig;
  source?: string;
}

export interface IConfigService {
  detectUsername(): string;
  candidates(configFile: string): string[];
  load(configFile: string): LoadedConfig;
  resolve(config: UserConfig, username: string): ResolvedUserConfig;
  loadForCurrentUser(configFile: string): ResolvedUserConfig;
}
