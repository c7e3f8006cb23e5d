import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { log, setJsonMode, setLogFile, setVerbose } from "./logger.js";

describe("logger", () => {
  let tmpDir: string;
  const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cdp-fleet-logger-"));
    stderr.mockClear();
  });

  afterEach(() => {
    setLogFile(undefined);
    setVerbose(false);
    setJsonMode(false);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("appends timestamped lines to the log file", () => {
    const file = path.join(tmpDir, "logs", "launcher.log");
    setLogFile(file);
    log.info("Browser started with PID 1000 on port 48010");
    log.error("boom");
    const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO Browser started with PID 1000 on port 48010$/);
    expect(lines[1]).toMatch(/\] ERROR boom$/);
  });

  it("hides debug and trace unless verbose", () => {
    log.debug("hidden");
    log.trace("hidden");
    expect(stderr).not.toHaveBeenCalled();
    setVerbose(true);
    log.debug("shown");
    expect(stderr).toHaveBeenCalledTimes(1);
  });

  it("emits JSON lines in json mode", () => {
    setJsonMode(true);
    log.warn("careful");
    const [line] = stderr.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({ level: "warn", msg: "careful" });
  });
});
