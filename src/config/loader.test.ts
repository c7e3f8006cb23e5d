import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("node:fs", () => ({
  default: {
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
    writeFileSync: vi.fn(),
    mkdirSync: vi.fn(),
  },
}));

vi.mock("./paths.js", () => ({
  resolveConfigFilePath: () => "/mock/.config/cdp-fleet/config.json5",
  resolveDataDir: () => "/mock/.config/cdp-fleet/data",
  resolveLogsDir: () => "/mock/.config/cdp-fleet/logs",
  resolveStateDir: () => "/mock/.config/cdp-fleet/state",
  ensureDir: vi.fn(),
}));

vi.mock("../util/logger.js", () => ({
  log: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), trace: vi.fn() },
}));

import fs from "node:fs";
import { buildConfig, loadConfig, parsePortRange, resolveFleetPaths } from "./loader.js";

describe("loadConfig", () => {
  beforeEach(() => {
    vi.stubEnv("CDP_FLEET_PORT_RANGE", "");
    vi.stubEnv("CDP_FLEET_BROWSER", "");
    vi.stubEnv("CDP_FLEET_PROXY_CONF_DIR", "");
    vi.mocked(fs.writeFileSync).mockClear();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("returns defaults and writes a default file when none exists", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    const config = loadConfig();
    expect(config.ports.start).toBe(48000);
    expect(config.ports.end).toBe(48999);
    expect(config.readiness.attempts).toBe(30);
    expect(config.termination.graceMs).toBe(10_000);
    expect(fs.writeFileSync).toHaveBeenCalledWith(
      "/mock/.config/cdp-fleet/config.json5",
      expect.any(String),
      "utf-8",
    );
  });

  it("does not write a default file for a missing override path", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    const config = loadConfig("/elsewhere/config.json5");
    expect(config.ports.start).toBe(48000);
    expect(fs.writeFileSync).not.toHaveBeenCalled();
  });

  it("loads a valid config file", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ ports: { start: 50000, end: 50010 }, proxy: { enabled: false } }");
    const config = loadConfig("/test/config.json5");
    expect(config.ports).toMatchObject({ start: 50000, end: 50010 });
    expect(config.proxy.enabled).toBe(false);
    expect(config.readiness.intervalMs).toBe(1000);
  });

  it("drops an invalid section and keeps the valid ones", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ ports: { start: "nope" }, readiness: { attempts: 5 } }));
    const config = loadConfig("/test/config.json5");
    expect(config.ports.start).toBe(48000);
    expect(config.readiness.attempts).toBe(5);
  });

  it("rejects a range whose start exceeds its end", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ ports: { start: 49000, end: 48000 } }));
    const config = loadConfig("/test/config.json5");
    expect(config.ports).toMatchObject({ start: 48000, end: 48999 });
  });

  it("falls back to defaults on unparseable files", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ not json5");
    const config = loadConfig("/test/config.json5");
    expect(config.ports.start).toBe(48000);
  });

  it("applies environment overrides", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.stubEnv("CDP_FLEET_PORT_RANGE", "47000-47010");
    vi.stubEnv("CDP_FLEET_BROWSER", "/opt/test/chromium");
    vi.stubEnv("CDP_FLEET_PROXY_CONF_DIR", "/tmp/test-conf.d");
    const config = loadConfig("/test/config.json5");
    expect(config.ports).toMatchObject({ start: 47000, end: 47010 });
    expect(config.browser.executablePath).toBe("/opt/test/chromium");
    expect(config.proxy.confDir).toBe("/tmp/test-conf.d");
  });

  it("ignores a malformed port range in the environment", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.stubEnv("CDP_FLEET_PORT_RANGE", "49000-48000");
    const config = loadConfig("/test/config.json5");
    expect(config.ports).toMatchObject({ start: 48000, end: 48999 });
  });

  it("ignores an environment range that would contain the proxy listen ports", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.stubEnv("CDP_FLEET_PORT_RANGE", "48000-49500");
    const config = loadConfig("/test/config.json5");
    expect(config.ports).toMatchObject({ start: 48000, end: 48999 });
  });
});

describe("parsePortRange", () => {
  it("parses start-end", () => {
    expect(parsePortRange("48000-49000")).toEqual({ start: 48000, end: 49000 });
    expect(parsePortRange(" 1 - 2 ")).toEqual({ start: 1, end: 2 });
  });

  it("rejects malformed or out-of-order ranges", () => {
    expect(parsePortRange("48000")).toBeUndefined();
    expect(parsePortRange("a-b")).toBeUndefined();
    expect(parsePortRange("0-10")).toBeUndefined();
    expect(parsePortRange("10-70000")).toBeUndefined();
    expect(parsePortRange("20-10")).toBeUndefined();
  });
});

describe("resolveFleetPaths", () => {
  it("uses configured paths when present", () => {
    const config = buildConfig({ paths: { dataDir: "/d", logDir: "/l", stateDir: "/s" } });
    expect(resolveFleetPaths(config)).toEqual({ dataDir: "/d", logDir: "/l", stateDir: "/s" });
  });

  it("falls back to the config directory layout", () => {
    expect(resolveFleetPaths(buildConfig())).toEqual({
      dataDir: "/mock/.config/cdp-fleet/data",
      logDir: "/mock/.config/cdp-fleet/logs",
      stateDir: "/mock/.config/cdp-fleet/state",
    });
  });
});
