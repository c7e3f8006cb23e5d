// In-process stand-ins for browser processes, network probes and the proxy engine

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { FleetPaths } from "../../src/config/loader.js";
import type { HttpResult, NetworkProbes } from "../../src/net/probes.js";
import type { ExitInfo, SignalKind } from "../../src/process/handle.js";
import type { LaunchedProcess, LaunchSpec, Launcher } from "../../src/process/launcher.js";
import type { EngineResult, ProxyEngine } from "../../src/proxy/engine.js";

export class FakeProcess implements LaunchedProcess {
  alive = true;
  exit: ExitInfo | undefined;
  /** Command line as the process table reports it; unset means unreadable. */
  args: string[] | undefined;
  readonly signals: SignalKind[] = [];

  constructor(readonly pid: number, private readonly ignoreTerm = false) {}

  isAlive(): boolean {
    return this.alive;
  }

  signal(kind: SignalKind): boolean {
    if (!this.alive) return false;
    this.signals.push(kind);
    if (kind === "kill" || !this.ignoreTerm) this.die(null, kind === "kill" ? "SIGKILL" : "SIGTERM");
    return true;
  }

  die(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    this.alive = false;
    this.exit = { code, signal };
  }

  async wait(): Promise<boolean> {
    return !this.alive;
  }
}

/** Process table shared by the fake launcher and the supervisor's attach(). */
export class FakeProcessTable {
  readonly byPid = new Map<number, FakeProcess>();
  private nextPid = 1000;

  create(ignoreTerm = false): FakeProcess {
    const proc = new FakeProcess(this.nextPid++, ignoreTerm);
    this.byPid.set(proc.pid, proc);
    return proc;
  }

  add(proc: FakeProcess): FakeProcess {
    this.byPid.set(proc.pid, proc);
    return proc;
  }

  attach = (pid: number): FakeProcess => {
    const known = this.byPid.get(pid);
    if (known) return known;
    const gone = new FakeProcess(pid);
    gone.die();
    return gone;
  };

  commandLine = (pid: number): string | undefined => {
    const known = this.byPid.get(pid);
    return known?.alive ? known.args?.join(" ") : undefined;
  };
}

export interface FakeLauncherBehaviour {
  /** Called after the fake process exists; may kill it or write to its log. */
  onLaunch?: (proc: FakeProcess, spec: LaunchSpec) => void;
  ignoreTerm?: boolean;
}

export function fakeLauncher(table: FakeProcessTable, behaviour: FakeLauncherBehaviour = {}) {
  const launched: LaunchSpec[] = [];
  const launcher: Launcher = {
    resolveExecutable: () => "/opt/test/chromium",
    launch(spec) {
      launched.push(spec);
      const proc = table.create(behaviour.ignoreTerm);
      proc.args = [spec.executable, ...spec.args];
      behaviour.onLaunch?.(proc, spec);
      return proc;
    },
  };
  return { launcher, launched };
}

/**
 * Network stand-in: `bound` ports are not bindable, `ready` ports answer the
 * debugger endpoints (directly and through `routed` proxy listen ports).
 */
export class FakeNetwork {
  readonly bound = new Set<number>();
  readonly ready = new Set<number>();
  readonly routed = new Set<number>();
  proxyHealth = true;
  browser = "HeadlessChrome/130.0.0.0";

  private answer(port: number, pathname: string): HttpResult {
    if (this.routed.has(port)) {
      if (pathname === "/health") return this.proxyHealth ? { ok: true, status: 200, body: "healthy\n" } : { ok: false, status: 404, error: "HTTP 404" };
      return { ok: true, status: 200, body: "[]" };
    }
    if (!this.ready.has(port)) return { ok: false, status: null, error: "connect ECONNREFUSED" };
    if (pathname === "/json/version") {
      return {
        ok: true,
        status: 200,
        body: JSON.stringify({ Browser: this.browser, webSocketDebuggerUrl: `ws://127.0.0.1:${port}/devtools/browser/test` }),
      };
    }
    return { ok: true, status: 200, body: "[]" };
  }

  readonly httpGet = vi.fn(async (url: string, _timeoutMs: number): Promise<HttpResult> => {
    const parsed = new URL(url);
    return this.answer(Number(parsed.port), parsed.pathname);
  });

  readonly tcpReachable = vi.fn(async (_host: string, port: number, _timeoutMs: number) =>
    this.ready.has(port) || this.bound.has(port) || this.routed.has(port));

  readonly isPortBindable = vi.fn(async (port: number, _host: string) =>
    !this.bound.has(port) && !this.ready.has(port) && !this.routed.has(port));

  readonly websocketHandshake = vi.fn(
    async (_url: string, _timeoutMs: number): Promise<{ ok: boolean; error?: string }> => ({ ok: true }),
  );

  probes(): NetworkProbes {
    return {
      httpGet: this.httpGet,
      tcpReachable: this.tcpReachable,
      isPortBindable: this.isPortBindable,
      websocketHandshake: this.websocketHandshake,
    };
  }
}

export class FakeEngine implements ProxyEngine {
  validateResults: EngineResult[] = [];
  reloadResults: EngineResult[] = [];
  validations = 0;
  reloads = 0;

  async validate(): Promise<EngineResult> {
    this.validations++;
    return this.validateResults.shift() ?? { ok: true, output: "syntax is ok" };
  }

  async reload(): Promise<EngineResult> {
    this.reloads++;
    return this.reloadResults.shift() ?? { ok: true, output: "" };
  }
}

export function makeTempPaths(prefix: string): FleetPaths & { root: string; confDir: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    root,
    dataDir: path.join(root, "data"),
    logDir: path.join(root, "logs"),
    stateDir: path.join(root, "state"),
    confDir: path.join(root, "conf.d"),
  };
}
