import os from "os";
import path from "path";
import { AppNotResolvedError } from "../../errors";
import { createLogger } from "../../logger";
import { ResolvedTarget, UserSettings } from "../../models";
import { IAppService } from "./app.interface";

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Relative paths are taken from `base`. */
export function isWithin(root: string, dir: string, base = process.cwd()): boolean {
  const rel = path.relative(path.resolve(base, expandHome(root)), path.resolve(base, dir));
  return rel === "" || (rel.split(path.sep)[0] !== ".." && !path.isAbsolute(rel));
}

/**
 * Picks the app an invocation works on.
 *
 * Without an explicit name the first app (in declaration order) whose
 * `repo_root` contains the working directory wins. Overlapping roots are not
 * detected; keeping them disjoint is up to whoever writes the configuration.
 */
export class AppService implements IAppService {
  private log(ctx: Record<string, unknown>) { return createLogger({ service: "AppService", ...ctx }); }

  select(settings: UserSettings, explicitAppName?: string, cwd = process.cwd()): ResolvedTarget {
    if (explicitAppName) {
      if (!Object.hasOwn(settings.apps, explicitAppName)) {
        throw new AppNotResolvedError(`App '${explicitAppName}' not found in config.`);
      }
      return { app_name: explicitAppName, app: settings.apps[explicitAppName] };
    }

    for (const [app_name, app] of Object.entries(settings.apps)) {
      if (app.repo_root && isWithin(app.repo_root, cwd, cwd)) {
        this.log({ app_name, repo_root: app.repo_root, cwd }).info("Detected app from working directory");
        return { app_name, app };
      }
    }
    throw new AppNotResolvedError(
      `No app specified and couldn't determine app from current directory (${cwd}).`,
    );
  }

  list(settings: UserSettings): ResolvedTarget[] {
    return Object.entries(settings.apps).map(([app_name, app]) => ({ app_name, app }));
  }
}
