// Browser launch — binary discovery, the fixed debugging argument set, and
// the detached spawn that writes stdout/stderr to the instance log.

import fs from "node:fs";
import path from "node:path";
import { spawn, spawnSync } from "node:child_process";
import type { FleetConfig } from "../config/schema.js";
import { BrowserNotFoundError, SpawnFailedError, isMissingFileError } from "../util/errors.js";
import { runCommand } from "../util/exec.js";
import { log } from "../util/logger.js";
import { ChildHandle, type ExitInfo, type ProcessHandle } from "./handle.js";

// ══════════════════════════════════════════════
// ── Types ──
// ══════════════════════════════════════════════

export interface LaunchSpec {
  port: number;
  executable: string;
  args: string[];
  logPath: string;
}

export interface LaunchedProcess extends ProcessHandle {
  /** Set once the process has exited; undefined while it runs. */
  readonly exit: ExitInfo | undefined;
}

export interface Launcher {
  resolveExecutable(): string;
  launch(spec: LaunchSpec): LaunchedProcess;
}

export interface BrowserArgsOptions {
  port: number;
  bindAddress: string;
  dataDir: string;
  headless: boolean;
  extraArgs?: readonly string[];
}

// ══════════════════════════════════════════════
// ── Arguments ──
// ══════════════════════════════════════════════

export const DEBUG_PORT_FLAG = "--remote-debugging-port=";
export const USER_DATA_DIR_FLAG = "--user-data-dir=";

// Background throttling stays off so readiness probing sees a steady process
const BASE_ARGS = [
  "--no-sandbox",
  "--disable-gpu",
  "--disable-dev-shm-usage",
  "--disable-extensions",
  "--disable-background-timer-throttling",
  "--disable-renderer-backgrounding",
  "--disable-backgrounding-occluded-windows",
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-default-apps",
  "--enable-logging",
  "--log-level=0",
];

export function buildBrowserArgs(opts: BrowserArgsOptions): string[] {
  const args = [
    `${DEBUG_PORT_FLAG}${opts.port}`,
    `--remote-debugging-address=${opts.bindAddress}`,
    `${USER_DATA_DIR_FLAG}${opts.dataDir}`,
  ];
  if (opts.headless) args.push("--headless=new");
  args.push(...BASE_ARGS);
  if (opts.extraArgs) args.push(...opts.extraArgs);
  return args;
}

// ══════════════════════════════════════════════
// ── Binary Discovery ──
// ══════════════════════════════════════════════

function isExecutable(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function resolveBrowserBinary(
  browser: FleetConfig["browser"],
  canExecute: (file: string) => boolean = isExecutable,
): string {
  const searched = browser.executablePath ? [browser.executablePath] : browser.candidates;
  for (const candidate of searched) {
    if (canExecute(candidate)) {
      log.debug(`Found browser binary at: ${candidate}`);
      return candidate;
    }
  }
  throw new BrowserNotFoundError(searched);
}

// ══════════════════════════════════════════════
// ── Spawn ──
// ══════════════════════════════════════════════

export function createBrowserLauncher(config: FleetConfig): Launcher {
  return {
    resolveExecutable: () => resolveBrowserBinary(config.browser),
    launch(spec) {
      fs.mkdirSync(path.dirname(spec.logPath), { recursive: true });
      const fd = fs.openSync(spec.logPath, "a");
      try {
        log.debug(`Browser command: ${spec.executable} ${spec.args.join(" ")}`);
        const child = spawn(spec.executable, spec.args, {
          detached: true,
          stdio: ["ignore", fd, fd],
        });
        child.once("error", (err) => log.error(`Browser process on port ${spec.port} failed: ${err.message}`));
        if (child.pid === undefined) {
          throw new SpawnFailedError(spec.port, `Failed to launch ${spec.executable} on port ${spec.port}`);
        }
        const handle = new ChildHandle(child);
        child.unref();
        return handle;
      } finally {
        fs.closeSync(fd);
      }
    },
  };
}

// ══════════════════════════════════════════════
// ── Orphan Sweep ──
// ══════════════════════════════════════════════

export interface ProcessEntry {
  pid: number;
  args: string;
}

/** Parses `ps -eo pid=,args=` output. */
export function parseProcessTable(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of output.split("\n")) {
    const match = /^\s*(\d+)\s+(.+)$/.exec(line);
    if (match) entries.push({ pid: Number(match[1]), args: match[2].trim() });
  }
  return entries;
}

/**
 * An instance process carries a debugging port flag and a user-data-dir under
 * this fleet's data root. Browsers started by anything else are left alone.
 */
export function matchesInstanceSignature(args: string, dataRoot: string): boolean {
  if (!args.includes(DEBUG_PORT_FLAG)) return false;
  const root = dataRoot.endsWith(path.sep) ? dataRoot : dataRoot + path.sep;
  return args.includes(`${USER_DATA_DIR_FLAG}${root}`);
}

/** Whether a command line is the browser started for `port` with `dataDir` as its profile. */
export function isInstanceProcess(args: string, port: number, dataDir: string): boolean {
  const padded = ` ${args} `;
  return padded.includes(` ${DEBUG_PORT_FLAG}${port} `) && padded.includes(` ${USER_DATA_DIR_FLAG}${dataDir} `);
}

/**
 * Command line of a running process, arguments joined by spaces. Undefined
 * when the process is gone or its command line cannot be read.
 */
export function readCommandLine(pid: number): string | undefined {
  try {
    const args = fs.readFileSync(`/proc/${pid}/cmdline`, "utf-8").split("\0").filter(Boolean);
    if (args.length > 0) return args.join(" ");
  } catch (err) {
    if (!isMissingFileError(err)) log.debug(`Cannot read /proc/${pid}/cmdline: ${err}`);
  }
  const result = spawnSync("ps", ["-o", "args=", "-p", String(pid)], { encoding: "utf-8", timeout: 5000 });
  if (result.status !== 0) return undefined;
  const args = result.stdout.trim();
  return args || undefined;
}

export function portFromArgs(args: string): number | undefined {
  const match = /--remote-debugging-port=(\d+)/.exec(args);
  return match ? Number(match[1]) : undefined;
}

export async function listProcesses(): Promise<ProcessEntry[]> {
  const result = await runCommand(["ps", "-eo", "pid=,args="], 10_000);
  if (result.exitCode !== 0) {
    log.warn(`Process listing failed: ${result.stderr.trim()}`);
    return [];
  }
  return parseProcessTable(result.stdout);
}
