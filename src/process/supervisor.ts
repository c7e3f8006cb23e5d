// Process Supervisor — spawns browser instances bound to one port each, waits
// for the debugging endpoint, and tears them down (gracefully, then by force).

import fs from "node:fs";
import path from "node:path";
import type { FleetConfig } from "../config/schema.js";
import type { FleetPaths } from "../config/loader.js";
import {
  PortInUseError,
  ReadinessTimeoutError,
  SpawnFailedError,
  describeError,
  isMissingFileError,
} from "../util/errors.js";
import { log } from "../util/logger.js";
import { waitFor, type WaitOutcome } from "../util/timing.js";
import { defaultProbes, debuggerUrl, type NetworkProbes } from "../net/probes.js";
import { PidHandle, describeExit, type ProcessHandle } from "./handle.js";
import { InstanceRegistry, type InstanceRecord } from "./registry.js";
import {
  buildBrowserArgs,
  createBrowserLauncher,
  isInstanceProcess,
  listProcesses,
  matchesInstanceSignature,
  portFromArgs,
  readCommandLine,
  type LaunchedProcess,
  type Launcher,
  type ProcessEntry,
} from "./launcher.js";

// ══════════════════════════════════════════════
// ── Types ──
// ══════════════════════════════════════════════

export type InstanceState = "starting" | "ready" | "dead";

export interface Instance {
  port: number;
  pid: number;
  dataDir: string;
  logPath: string;
  startedAt: string;
  state: InstanceState;
}

export type TerminationOutcome = "not-found" | "not-running" | "graceful" | "escalated";

export interface TerminationResult {
  port: number;
  pid?: number;
  outcome: TerminationOutcome;
}

export interface TerminateAllResult {
  terminated: TerminationResult[];
  orphans: number[];
}

export interface TrackedInstance {
  record: InstanceRecord;
  alive: boolean;
}

export interface SupervisorDeps {
  registry: InstanceRegistry;
  launcher: Launcher;
  probes: Pick<NetworkProbes, "httpGet" | "isPortBindable">;
  attach: (pid: number) => ProcessHandle;
  listProcesses: () => Promise<ProcessEntry[]>;
  /** Command line of a live pid; undefined when it cannot be read. */
  commandLine: (pid: number) => string | undefined;
}

export const READINESS_ENDPOINT = "/json/version";
const LOG_TAIL_LINES = 20;
const INSTANCE_DIR_PATTERN = /^chrome-(\d+)$/;

// ══════════════════════════════════════════════
// ── Helpers ──
// ══════════════════════════════════════════════

/** Last `lines` lines of a log file; empty when the file is missing. */
export function readLogTail(file: string, lines = LOG_TAIL_LINES): string[] {
  let content: string;
  try {
    const stat = fs.statSync(file);
    const maxBytes = 64 * 1024;
    if (stat.size > maxBytes) {
      const fd = fs.openSync(file, "r");
      try {
        const buf = Buffer.alloc(maxBytes);
        fs.readSync(fd, buf, 0, maxBytes, stat.size - maxBytes);
        content = buf.toString("utf-8");
      } finally {
        fs.closeSync(fd);
      }
    } else {
      content = fs.readFileSync(file, "utf-8");
    }
  } catch (err) {
    if (!isMissingFileError(err)) log.warn(`Failed to read log ${file}: ${err}`);
    return [];
  }
  const all = content.split("\n");
  if (all.length > 0 && all[all.length - 1] === "") all.pop();
  return all.slice(-lines);
}

function isWithin(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function bestEffort(step: string, port: number, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn(`Cleanup step "${step}" failed for port ${port}: ${describeError(err)}`);
  }
}

// ══════════════════════════════════════════════
// ── Supervisor ──
// ══════════════════════════════════════════════

export class ProcessSupervisor {
  readonly registry: InstanceRegistry;
  private readonly launcher: Launcher;
  private readonly probes: SupervisorDeps["probes"];
  private readonly attach: SupervisorDeps["attach"];
  private readonly listProcesses: SupervisorDeps["listProcesses"];
  private readonly commandLine: SupervisorDeps["commandLine"];

  constructor(
    private readonly config: FleetConfig,
    private readonly paths: FleetPaths,
    deps: Partial<SupervisorDeps> = {},
  ) {
    this.registry = deps.registry ?? new InstanceRegistry(path.join(paths.stateDir, "instances"));
    this.launcher = deps.launcher ?? createBrowserLauncher(config);
    this.probes = deps.probes ?? defaultProbes;
    this.attach = deps.attach ?? ((pid) => new PidHandle(pid, config.termination.pollMs));
    this.listProcesses = deps.listProcesses ?? listProcesses;
    this.commandLine = deps.commandLine ?? readCommandLine;
  }

  instanceDataDir(port: number): string {
    return path.join(this.paths.dataDir, `chrome-${port}`);
  }

  instanceLogPath(port: number): string {
    return path.join(this.paths.logDir, `chrome-${port}.log`);
  }

  private readinessUrl(port: number): string {
    return debuggerUrl(this.config.ports.host, port, READINESS_ENDPOINT);
  }

  /**
   * A registry entry counts as running only while its pid is alive and still
   * runs this instance's browser. A pid reused by another program does not.
   */
  private isRunning(record: InstanceRecord): boolean {
    if (!this.attach(record.pid).isAlive()) return false;
    const args = this.commandLine(record.pid);
    if (args === undefined || isInstanceProcess(args, record.port, record.dataDir)) return true;
    log.warn(`PID ${record.pid} no longer runs the browser for port ${record.port}; treating the entry as stale`);
    return false;
  }

  async isReady(port: number): Promise<boolean> {
    const res = await this.probes.httpGet(this.readinessUrl(port), this.config.readiness.requestTimeoutMs);
    return res.ok;
  }

  // ── Spawn ──

  async spawn(port: number, extraArgs: readonly string[] = [], signal?: AbortSignal): Promise<Instance> {
    const existing = this.registry.get(port);
    if (existing) {
      if (this.isRunning(existing)) {
        throw new PortInUseError(port, `tracked instance PID ${existing.pid}`);
      }
      log.warn(`Dropping stale registry entry for port ${port} (PID ${existing.pid} is gone)`);
      this.cleanupInstance(port, existing);
    }
    if (!(await this.probes.isPortBindable(port, this.config.browser.bindAddress))) {
      throw new PortInUseError(port, "bound by another listener");
    }

    const executable = this.launcher.resolveExecutable();
    const dataDir = this.instanceDataDir(port);
    const logPath = this.instanceLogPath(port);
    fs.mkdirSync(dataDir, { recursive: true });

    const args = buildBrowserArgs({
      port,
      bindAddress: this.config.browser.bindAddress,
      dataDir,
      headless: this.config.browser.headless,
      extraArgs: [...this.config.browser.extraArgs, ...extraArgs],
    });

    log.info(`Starting browser with remote debugging on port ${port}`);
    let proc: LaunchedProcess;
    try {
      proc = this.launcher.launch({ port, executable, args, logPath });
    } catch (err) {
      this.cleanupInstance(port, { dataDir, logPath });
      throw err;
    }

    const record: InstanceRecord = { port, pid: proc.pid, dataDir, logPath, startedAt: new Date().toISOString(), args };
    try {
      this.registry.put(record);
    } catch (err) {
      proc.signal("kill");
      this.cleanupInstance(port, record);
      throw new SpawnFailedError(port, `Failed to record instance on port ${port}: ${describeError(err)}`);
    }
    log.info(`Browser started with PID ${proc.pid} on port ${port}`);

    const { attempts, intervalMs } = this.config.readiness;
    let outcome: WaitOutcome;
    try {
      outcome = await waitFor(async () => {
        if (!proc.isAlive()) return "abort";
        if (await this.isReady(port)) return "done";
        return proc.isAlive() ? "continue" : "abort";
      }, { attempts, intervalMs, signal });
    } catch (err) {
      await this.kill(proc);
      this.cleanupInstance(port, record);
      throw err;
    }

    if (outcome.status === "done") {
      log.info(`Browser debugger is ready on port ${port}`);
      return { port, pid: proc.pid, dataDir, logPath, startedAt: record.startedAt, state: "ready" };
    }

    if (outcome.status === "aborted") {
      const tail = readLogTail(logPath);
      this.cleanupInstance(port, record);
      const message = `Browser process on port ${port} (PID ${proc.pid}) ${describeExit(proc.exit)} before becoming ready`;
      log.error(message);
      throw new SpawnFailedError(port, message, tail);
    }

    log.error(`Browser failed to start properly on port ${port} after ${attempts} attempts`);
    await this.kill(proc);
    this.cleanupInstance(port, record);
    throw new ReadinessTimeoutError(port, attempts);
  }

  private async kill(proc: ProcessHandle): Promise<void> {
    if (!proc.isAlive()) return;
    proc.signal("kill");
    if (!(await proc.wait(this.config.termination.killWaitMs))) {
      log.warn(`PID ${proc.pid} still alive after SIGKILL`);
    }
  }

  // ── Terminate ──

  async terminate(port: number): Promise<TerminationResult> {
    const record = this.registry.get(port);
    if (!record) {
      log.info(`No registry entry for port ${port}`);
      this.cleanupInstance(port, {});
      return { port, outcome: "not-found" };
    }

    const handle = this.attach(record.pid);
    let outcome: TerminationOutcome = "not-running";
    if (this.isRunning(record)) {
      log.info(`Stopping browser on port ${port} (PID: ${record.pid})`);
      handle.signal("term");
      if (await handle.wait(this.config.termination.graceMs)) {
        outcome = "graceful";
      } else {
        log.warn(`Graceful stop timed out, force killing browser on port ${port} (PID: ${record.pid})`);
        handle.signal("kill");
        if (!(await handle.wait(this.config.termination.killWaitMs))) {
          log.warn(`PID ${record.pid} still alive after SIGKILL`);
        }
        outcome = "escalated";
      }
    }

    this.cleanupInstance(port, record);
    log.info(`Browser on port ${port} stopped`);
    return { port, pid: record.pid, outcome };
  }

  async terminateAll(): Promise<TerminateAllResult> {
    log.info("Stopping all browser debug instances");
    const terminated: TerminationResult[] = [];
    for (const port of this.registry.load().ports()) {
      terminated.push(await this.terminate(port));
    }

    const orphans: number[] = [];
    const entries = await this.listProcesses();
    for (const entry of entries) {
      if (entry.pid === process.pid || !matchesInstanceSignature(entry.args, this.paths.dataDir)) continue;
      const handle = this.attach(entry.pid);
      if (!handle.isAlive()) continue;
      log.warn(`Killing untracked browser PID ${entry.pid} (port ${portFromArgs(entry.args) ?? "unknown"})`);
      handle.signal("term");
      if (!(await handle.wait(this.config.termination.killWaitMs))) handle.signal("kill");
      orphans.push(entry.pid);
    }

    this.sweepDataDirs();
    log.info("All browser instances stopped");
    return { terminated, orphans };
  }

  private sweepDataDirs(): void {
    let names: string[];
    try {
      names = fs.readdirSync(this.paths.dataDir);
    } catch (err) {
      if (!isMissingFileError(err)) log.warn(`Failed to scan ${this.paths.dataDir}: ${err}`);
      return;
    }
    for (const name of names) {
      const match = INSTANCE_DIR_PATTERN.exec(name);
      if (!match) continue;
      const port = Number(match[1]);
      if (this.registry.get(port)) continue;
      bestEffort("remove data directory", port, () =>
        fs.rmSync(path.join(this.paths.dataDir, name), { recursive: true, force: true }));
    }
  }

  // Each step runs regardless of earlier failures. Paths outside the fleet's
  // data and log roots are never removed, whatever the registry entry says.
  private cleanupInstance(port: number, record: { dataDir?: string; logPath?: string }): void {
    bestEffort("remove registry entry", port, () => { this.registry.remove(port); });
    const dataDir = record.dataDir ?? this.instanceDataDir(port);
    if (isWithin(this.paths.dataDir, dataDir)) {
      bestEffort("remove data directory", port, () => fs.rmSync(dataDir, { recursive: true, force: true }));
    } else {
      log.warn(`Not removing ${dataDir} for port ${port}: outside ${this.paths.dataDir}`);
    }
    const logPath = record.logPath ?? this.instanceLogPath(port);
    if (isWithin(this.paths.logDir, logPath)) {
      bestEffort("remove log file", port, () => fs.rmSync(logPath, { force: true }));
    } else {
      log.warn(`Not removing ${logPath} for port ${port}: outside ${this.paths.logDir}`);
    }
  }

  // ── Listing & Recovery ──

  /** Current instances with their state; dead entries are reported once and removed. */
  async list(): Promise<Instance[]> {
    const instances: Instance[] = [];
    for (const record of this.registry.load().list()) {
      const alive = this.isRunning(record);
      let state: InstanceState = "dead";
      if (alive) state = (await this.isReady(record.port)) ? "ready" : "starting";
      else this.cleanupInstance(record.port, record);
      instances.push({
        port: record.port,
        pid: record.pid,
        dataDir: record.dataDir,
        logPath: record.logPath,
        startedAt: record.startedAt,
        state,
      });
    }
    return instances;
  }

  trackedPorts(): number[] {
    return this.registry.load().ports();
  }

  /** Registry entry for `port` together with its liveness; undefined when untracked. */
  inspect(port: number): TrackedInstance | undefined {
    const record = this.registry.get(port);
    if (!record) return undefined;
    return { record, alive: this.isRunning(record) };
  }

  /** Removes a dead instance's entry, data directory and log. */
  forget(port: number): void {
    this.cleanupInstance(port, this.registry.get(port) ?? {});
  }

  reconcile(): InstanceRecord[] {
    const stale = this.registry.reconcile((record) => this.isRunning(record));
    for (const record of stale) {
      log.warn(`Reconciled stale instance on port ${record.port} (PID ${record.pid})`);
      this.cleanupInstance(record.port, record);
    }
    return stale;
  }

  logTail(port: number, lines = LOG_TAIL_LINES): string[] {
    const record = this.registry.get(port);
    return readLogTail(record?.logPath ?? this.instanceLogPath(port), lines);
  }
}
