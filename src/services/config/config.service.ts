import fs from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { INSTALL_DIR } from "../../config";
import { ConfigMalformedError, errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import { ResolvedUserConfig, UserConfig } from "../../models";
import { IConfigService, LoadedConfig, UsernameProbe } from "./config.interface";
import { formatIssues, userConfigSchema } from "./config.schema";

export const FALLBACK_USERNAME = "default_user";
const SUPERUSER = "root";

/** Name owning `uid` in a passwd(5) file. Last probe before the fixed fallback name. */
export function passwdName(uid: number | undefined, file = "/etc/passwd"): string | undefined {
  if (uid === undefined) return undefined;
  const passwd = fs.readFileSync(file, "utf-8");
  for (const line of passwd.split("\n")) {
    const [name, , id] = line.split(":");
    if (id !== undefined && Number(id) === uid) return name;
  }
  return undefined;
}

// Environment overrides first, then the system identity. "root" never wins.
export const defaultUsernameProbes: UsernameProbe[] = [
  () => process.env.USER,
  () => process.env.USERNAME,
  () => os.userInfo().username,
  () => passwdName(process.getuid?.()),
];

export class ConfigService implements IConfigService {
  private cwd: string;
  private installDir: string;
  private probes: UsernameProbe[];

  constructor(opts?: { cwd?: string; installDir?: string; probes?: UsernameProbe[] }) {
    this.cwd = opts?.cwd ?? process.cwd();
    this.installDir = opts?.installDir ?? INSTALL_DIR;
    this.probes = opts?.probes ?? defaultUsernameProbes;
  }

  private log(ctx: Record<string, unknown>) { return createLogger({ service: "ConfigService", ...ctx }); }

  detectUsername(): string {
    for (const [index, probe] of this.probes.entries()) {
      try {
        const name = probe()?.trim();
        if (name && name !== SUPERUSER) return name;
      } catch (e) {
        this.log({ probe: index, error: errorMessage(e) }).debug("Username probe failed");
      }
    }
    return FALLBACK_USERNAME;
  }

  candidates(configFile: string): string[] {
    const paths = [path.resolve(this.cwd, configFile), path.resolve(this.installDir, configFile)];
    return [...new Set(paths)];
  }

  load(configFile: string): LoadedConfig {
    const candidates = this.candidates(configFile);
    const source = candidates.find(p => fs.existsSync(p) && fs.statSync(p).isFile());
    if (!source) {
      this.log({ looked: candidates }).warn("Config file not found in current directory or install directory");
      return { config: {} };
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(source, "utf-8"));
    } catch (e) {
      if (e instanceof yaml.YAMLException) throw new ConfigMalformedError(source, e.message, { cause: e });
      throw e;
    }
    const parsed = userConfigSchema.safeParse(raw);
    if (!parsed.success) throw new ConfigMalformedError(source, formatIssues(parsed.error), { cause: parsed.error });
    return { config: parsed.data, source };
  }

  resolve(config: UserConfig, username: string): ResolvedUserConfig {
    const users = Object.keys(config);
    this.log({ username, users }).debug("Resolving user configuration");
    if (Object.hasOwn(config, username)) {
      return { username, settings: config[username], matched: true, entry: username };
    }
    const first = users[0];
    if (first === undefined) {
      this.log({ username }).warn("No configuration found for user and no entries to fall back to");
      return { username, settings: { apps: {} }, matched: false };
    }
    // Any unrecognised user gets the first entry's apps and credential profile.
    this.log({ username, fallback: first, users }).warn(
      `No configuration found for user '${username}'. Using the entry for '${first}'.`,
    );
    return { username, settings: config[first], matched: false, entry: first };
  }

  loadForCurrentUser(configFile: string): ResolvedUserConfig {
    const { config, source } = this.load(configFile);
    const username = this.detectUsername();
    this.log({ username, source }).info("Loaded configuration");
    return { ...this.resolve(config, username), source };
  }
}
