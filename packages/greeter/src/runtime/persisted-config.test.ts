import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  DEFAULT_CONFIG_PATH,
  loadPersistedConfig,
  resolveConfigPath,
} from "./persisted-config.js";

describe("loadPersistedConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "porch-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("returns an empty config when the file is missing", () => {
    expect(loadPersistedConfig(path.join(dir, "config.json"))).toEqual({});
  });

  test("parses a valid file", async () => {
    const configPath = path.join(dir, "config.json");
    await writeFile(
      configPath,
      JSON.stringify({
        version: 1,
        daemon: { socket: "/run/greetd.sock" },
        sessions: { env: ["LANG=C.UTF-8"] },
        log: { format: "json" },
      })
    );

    expect(loadPersistedConfig(configPath)).toEqual({
      version: 1,
      daemon: { socket: "/run/greetd.sock" },
      sessions: { env: ["LANG=C.UTF-8"] },
      log: { format: "json" },
    });
  });

  test("rejects invalid JSON", async () => {
    const configPath = path.join(dir, "config.json");
    await writeFile(configPath, "{ nope");

    expect(() => loadPersistedConfig(configPath)).toThrow(`[Config] Invalid JSON in ${configPath}`);
  });

  test("lists every schema issue", async () => {
    const configPath = path.join(dir, "config.json");
    await writeFile(
      configPath,
      JSON.stringify({ daemon: { debug: "yes" }, sessions: { env: ["NOVALUE"] } })
    );

    expect(() => loadPersistedConfig(configPath)).toThrow(
      `[Config] Invalid config in ${configPath}:\n` +
        "  - daemon.debug: Expected boolean, received string\n" +
        "  - sessions.env.0: expected KEY=VALUE"
    );
  });

  test("rejects unknown keys", async () => {
    const configPath = path.join(dir, "config.json");
    await writeFile(configPath, JSON.stringify({ theme: "dark" }));

    expect(() => loadPersistedConfig(configPath)).toThrow("Unrecognized key(s) in object: 'theme'");
  });
});

describe("resolveConfigPath", () => {
  test("prefers the explicit path, then PORCH_CONFIG, then the default", () => {
    expect(resolveConfigPath("/tmp/a.json", { PORCH_CONFIG: "/tmp/b.json" })).toBe("/tmp/a.json");
    expect(resolveConfigPath(undefined, { PORCH_CONFIG: "/tmp/b.json" })).toBe("/tmp/b.json");
    expect(resolveConfigPath(undefined, {})).toBe(DEFAULT_CONFIG_PATH);
  });
});
