import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { readConfig, resolveSettings } from "../../config/hcpstat-config";
import { configPath, ensureHttps } from "../../config/paths";

describe("readConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "hcpstat-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("a missing file is an empty config", async () => {
    const result = await readConfig(path.join(dir, "absent"));
    expect(result._unsafeUnwrap()).toEqual({});
  });

  test("an empty file is an empty config", async () => {
    const file = path.join(dir, "config");
    writeFileSync(file, "");
    expect((await readConfig(file))._unsafeUnwrap()).toEqual({});
  });

  test("reads url, token and session retention", async () => {
    const file = path.join(dir, "config");
    writeFileSync(file, "url: https://api.example.test\ntoken: test-secret\nkeepSessions: 3\n");

    expect((await readConfig(file))._unsafeUnwrap()).toEqual({
      url: "https://api.example.test",
      token: "test-secret",
      keepSessions: 3,
    });
  });

  test("rejects values of the wrong type", async () => {
    const file = path.join(dir, "config");
    writeFileSync(file, "keepSessions: many\n");

    const error = (await readConfig(file))._unsafeUnwrapErr();
    expect(error.path).toBe(file);
    expect(error.message).toMatch(/^keepSessions: /);
  });

  test("rejects malformed YAML", async () => {
    const file = path.join(dir, "config");
    writeFileSync(file, "url: [unclosed\n");

    expect((await readConfig(file))._unsafeUnwrapErr().message).toMatch(/^invalid YAML: /);
  });
});

describe("resolveSettings", () => {
  const config = { url: "config.example.test", token: "config-token", keepSessions: 2 };

  test("flags win over the environment and the config file", () => {
    expect(
      resolveSettings(
        { url: "https://flag.example.test/", token: "flag-token" },
        config,
        { OCM_URL: "https://env.example.test", OCM_TOKEN: "env-token" },
      ),
    ).toEqual({ baseUrl: "https://flag.example.test", token: "flag-token", keepSessions: 2 });
  });

  test("the environment wins over the config file", () => {
    expect(resolveSettings({}, config, { OCM_URL: "https://env.example.test", OCM_TOKEN: "env-token" })).toEqual({
      baseUrl: "https://env.example.test",
      token: "env-token",
      keepSessions: 2,
    });
  });

  test("falls back to the config file and then the default URL", () => {
    expect(resolveSettings({}, config, {})).toEqual({
      baseUrl: "https://config.example.test",
      token: "config-token",
      keepSessions: 2,
    });
    expect(resolveSettings({}, {}, {})).toEqual({
      baseUrl: "https://api.openshift.com",
      token: undefined,
      keepSessions: undefined,
    });
  });
});

describe("paths", () => {
  test("configPath honours HCPSTAT_CONFIG, then XDG_CONFIG_HOME", () => {
    expect(configPath({ HCPSTAT_CONFIG: "/tmp/custom" })).toBe("/tmp/custom");
    expect(configPath({ XDG_CONFIG_HOME: "/xdg" })).toBe(path.join("/xdg", "hcpstat", "config"));
  });

  test("ensureHttps adds a scheme and drops trailing slashes", () => {
    expect(ensureHttps("api.example.test//")).toBe("https://api.example.test");
    expect(ensureHttps("http://localhost:8000")).toBe("http://localhost:8000");
  });
});
