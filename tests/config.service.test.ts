import fs from "fs";
import os from "os";
import path from "path";
import { ConfigMalformedError } from "../src/errors";
import { ConfigService, FALLBACK_USERNAME, passwdName } from "../src/services/config/config.service";
import { UserConfig } from "../src/models";

const CONFIG = `
alice:
  AWS_PROFILE: alice-dev
  apps:
    site:
      app_id: app123
      repo_root: /home/alice/site
      build_directory: ./dist
      default_branch: main
bob:
  apps:
    docs:
      app_id: app456
`;

let cwd: string;
let installDir: string;

beforeEach(() => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
  cwd = path.join(root, "cwd");
  installDir = path.join(root, "install");
  fs.mkdirSync(cwd);
  fs.mkdirSync(installDir);
});

afterEach(() => {
  fs.rmSync(path.dirname(cwd), { recursive: true, force: true });
});

describe("ConfigService.detectUsername", () => {
  test("takes the first non-empty probe that is not root", () => {
    const service = new ConfigService({ probes: [() => undefined, () => "", () => "root", () => "alice", () => "bob"] });
    expect(service.detectUsername()).toBe("alice");
  });

  test("skips probes that throw", () => {
    const service = new ConfigService({
      probes: [
        () => {
          throw new Error("no passwd entry");
        },
        () => "bob",
      ],
    });
    expect(service.detectUsername()).toBe("bob");
  });

  test("falls back to a fixed name", () => {
    const service = new ConfigService({ probes: [() => "root", () => undefined] });
    expect(service.detectUsername()).toBe(FALLBACK_USERNAME);
    expect(FALLBACK_USERNAME).toBe("default_user");
  });
});

describe("passwdName", () => {
  test("finds the name owning a uid", () => {
    const file = path.join(cwd, "passwd");
    fs.writeFileSync(file, "root:x:0:0:root:/root:/bin/sh\nalice:x:1000:1000::/home/alice:/bin/sh\n");

    expect(passwdName(1000, file)).toBe("alice");
    expect(passwdName(0, file)).toBe("root");
    expect(passwdName(4242, file)).toBeUndefined();
    expect(passwdName(undefined, file)).toBeUndefined();
  });
});

describe("ConfigService.load", () => {
  test("prefers the working directory", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), CONFIG);
    fs.writeFileSync(path.join(installDir, "config.yaml"), "carol:\n  apps: {}\n");
    const { config, source } = new ConfigService({ cwd, installDir }).load("config.yaml");

    expect(source).toBe(path.join(cwd, "config.yaml"));
    expect(Object.keys(config)).toEqual(["alice", "bob"]);
    expect(config.alice).toEqual({
      aws_profile: "alice-dev",
      aws_region: undefined,
      apps: {
        site: { app_id: "app123", repo_root: "/home/alice/site", build_directory: "./dist", default_branch: "main" },
      },
    });
  });

  test("integer-like keys come before other keys", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), "alice:\n  apps: {}\n\"2024\":\n  apps: {}\n");
    const { config } = new ConfigService({ cwd, installDir }).load("config.yaml");

    expect(Object.keys(config)).toEqual(["2024", "alice"]);
  });

  test("falls back to the install directory", () => {
    fs.writeFileSync(path.join(installDir, "config.yaml"), CONFIG);
    const { config, source } = new ConfigService({ cwd, installDir }).load("config.yaml");

    expect(source).toBe(path.join(installDir, "config.yaml"));
    expect(config.bob.apps.docs.app_id).toBe("app456");
  });

  test("a missing file gives an empty configuration", () => {
    const service = new ConfigService({ cwd, installDir });
    expect(service.load("config.yaml")).toEqual({ config: {} });
    expect(service.candidates("config.yaml")).toEqual([
      path.join(cwd, "config.yaml"),
      path.join(installDir, "config.yaml"),
    ]);
  });

  test("an empty file is an empty configuration", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), "");
    expect(new ConfigService({ cwd, installDir }).load("config.yaml").config).toEqual({});
  });

  test("a user without settings gets no apps", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), "alice:\n");
    expect(new ConfigService({ cwd, installDir }).load("config.yaml").config).toEqual({
      alice: { aws_profile: undefined, aws_region: undefined, apps: {} },
    });
  });

  test("invalid YAML is fatal", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), "alice: [unclosed\n");
    expect(() => new ConfigService({ cwd, installDir }).load("config.yaml")).toThrow(ConfigMalformedError);
  });

  test("an app without app_id is fatal", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), "alice:\n  apps:\n    site:\n      repo_root: /srv/site\n");
    expect(() => new ConfigService({ cwd, installDir }).load("config.yaml")).toThrow(
      "alice.apps.site.app_id: Required",
    );
  });
});

describe("ConfigService.resolve", () => {
  const config: UserConfig = {
    alice: { apps: { site: { app_id: "app123" } } },
    bob: { apps: { docs: { app_id: "app456" } } },
  };
  const service = new ConfigService();

  test.each(["alice", "bob"])("returns the entry of %s", username => {
    expect(service.resolve(config, username)).toEqual({
      username,
      settings: config[username],
      matched: true,
      entry: username,
    });
  });

  test("an unknown user falls back to the first entry and says so", () => {
    expect(service.resolve(config, "mallory")).toEqual({
      username: "mallory",
      settings: config.alice,
      matched: false,
      entry: "alice",
    });
  });

  test("inherited object keys are not users", () => {
    expect(service.resolve(config, "constructor").matched).toBe(false);
  });

  test("an empty configuration resolves to no apps", () => {
    expect(service.resolve({}, "alice")).toEqual({ username: "alice", settings: { apps: {} }, matched: false });
  });

  test("loadForCurrentUser combines file, username and lookup", () => {
    fs.writeFileSync(path.join(cwd, "config.yaml"), CONFIG);
    const resolved = new ConfigService({ cwd, installDir, probes: [() => "bob"] }).loadForCurrentUser("config.yaml");

    expect(resolved.matched).toBe(true);
    expect(resolved.entry).toBe("bob");
    expect(resolved.source).toBe(path.join(cwd, "config.yaml"));
    expect(Object.keys(resolved.settings.apps)).toEqual(["docs"]);
  });
});
