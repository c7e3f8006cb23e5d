import { describe, it, expect, vi } from "vitest";

vi.mock("../util/logger.js", () => ({
  log: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), trace: vi.fn() },
}));

import {
  buildBrowserArgs,
  isInstanceProcess,
  matchesInstanceSignature,
  parseProcessTable,
  portFromArgs,
  readCommandLine,
  resolveBrowserBinary,
} from "./launcher.js";
import { BrowserNotFoundError } from "../util/errors.js";
import { DEFAULT_CONFIG } from "../config/schema.js";

describe("buildBrowserArgs", () => {
  it("binds the port, address and data dir first", () => {
    const args = buildBrowserArgs({ port: 48010, bindAddress: "0.0.0.0", dataDir: "/data/chrome-48010", headless: true });
    expect(args.slice(0, 4)).toEqual([
      "--remote-debugging-port=48010",
      "--remote-debugging-address=0.0.0.0",
      "--user-data-dir=/data/chrome-48010",
      "--headless=new",
    ]);
    expect(args).toContain("--no-sandbox");
    expect(args).toContain("--disable-background-timer-throttling");
    expect(args).toContain("--disable-renderer-backgrounding");
  });

  it("omits headless when disabled and appends extra args last", () => {
    const args = buildBrowserArgs({
      port: 48011, bindAddress: "127.0.0.1", dataDir: "/d", headless: false, extraArgs: ["--window-size=800,600"],
    });
    expect(args).not.toContain("--headless=new");
    expect(args[args.length - 1]).toBe("--window-size=800,600");
  });
});

describe("resolveBrowserBinary", () => {
  it("returns the first executable candidate", () => {
    const browser = { ...DEFAULT_CONFIG.browser, candidates: ["/a/chrome", "/b/chromium", "/c/chrome"] };
    expect(resolveBrowserBinary(browser, (f) => f !== "/a/chrome")).toBe("/b/chromium");
  });

  it("only checks the explicit path when one is configured", () => {
    const browser = { ...DEFAULT_CONFIG.browser, executablePath: "/opt/test/chrome" };
    const canExecute = vi.fn(() => false);
    expect(() => resolveBrowserBinary(browser, canExecute)).toThrow(BrowserNotFoundError);
    expect(canExecute).toHaveBeenCalledTimes(1);
    expect(canExecute).toHaveBeenCalledWith("/opt/test/chrome");
  });
});

describe("process table", () => {
  const table = [
    "    1 /sbin/init",
    "  200 /usr/bin/chromium --remote-debugging-port=48001 --user-data-dir=/fleet/data/chrome-48001 --headless=new",
    "  201 /usr/bin/chromium --type=renderer",
    "  300 /usr/bin/chromium --remote-debugging-port=9222 --user-data-dir=/home/someone/profile",
    "",
  ].join("\n");

  it("parses pid and args", () => {
    const entries = parseProcessTable(table);
    expect(entries).toHaveLength(4);
    expect(entries[0]).toEqual({ pid: 1, args: "/sbin/init" });
    expect(entries[2]).toEqual({ pid: 201, args: "/usr/bin/chromium --type=renderer" });
  });

  it("matches only browsers under this fleet's data root", () => {
    const [, fleet, renderer, foreign] = parseProcessTable(table);
    expect(matchesInstanceSignature(fleet.args, "/fleet/data")).toBe(true);
    expect(matchesInstanceSignature(renderer.args, "/fleet/data")).toBe(false);
    expect(matchesInstanceSignature(foreign.args, "/fleet/data")).toBe(false);
    expect(matchesInstanceSignature(fleet.args, "/fleet/dat")).toBe(false);
  });

  it("extracts the debugging port", () => {
    expect(portFromArgs("chrome --remote-debugging-port=48001 --x")).toBe(48001);
    expect(portFromArgs("chrome --x")).toBeUndefined();
  });
});

describe("isInstanceProcess", () => {
  const args = "/usr/bin/chromium --remote-debugging-port=48010 --remote-debugging-address=0.0.0.0 --user-data-dir=/data/chrome-48010 --headless=new";

  it("matches the browser started for that port and profile", () => {
    expect(isInstanceProcess(args, 48010, "/data/chrome-48010")).toBe(true);
  });

  it("rejects another port, a port prefix or another profile", () => {
    expect(isInstanceProcess(args, 4801, "/data/chrome-48010")).toBe(false);
    expect(isInstanceProcess(args, 48011, "/data/chrome-48010")).toBe(false);
    expect(isInstanceProcess(args, 48010, "/data/chrome-4801")).toBe(false);
    expect(isInstanceProcess("/bin/sleep 30", 48010, "/data/chrome-48010")).toBe(false);
  });
});

describe("readCommandLine", () => {
  it("reads a live process and nothing for a missing pid", () => {
    expect(readCommandLine(process.pid)).toEqual(expect.any(String));
    expect(readCommandLine(2_147_483_646)).toBeUndefined();
  });
});
