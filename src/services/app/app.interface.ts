import { ResolvedTarget, UserSettings } from "../../models";

export interface IAppService {
  select(settings: UserSettings, explicitAppName?: string, cwd?: string): ResolvedTarget;
  list(settings: UserSettings): ResolvedTarget[];
}
