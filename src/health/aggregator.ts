// Health Aggregator — discovers running instances, probes each one at several
// tiers (process, port, protocol endpoints, proxy route) and folds every check
// into one of three overall states.

import type { FleetConfig } from "../config/schema.js";
import type { FleetPaths } from "../config/loader.js";
import { describeError } from "../util/errors.js";
import { log } from "../util/logger.js";
import { DeadlineExceededError, mapWithConcurrency, withDeadline } from "../util/timing.js";
import { defaultProbes, debuggerUrl, parseBrowserVersion, type NetworkProbes } from "../net/probes.js";
import { routeBaseUrl } from "../proxy/template.js";
import { READINESS_ENDPOINT, readLogTail, type TrackedInstance } from "../process/supervisor.js";
import {
  buildSnapshot,
  fail,
  pass,
  portHealth,
  warn,
  type CheckResult,
  type HealthSnapshot,
  type PortHealth,
} from "./checks.js";
import { planDiscoveryPorts } from "./discovery.js";
import { runHostChecks, systemHostStats, type HostStats } from "./host.js";

// ══════════════════════════════════════════════
// ── Types ──
// ══════════════════════════════════════════════

/** The slice of the supervisor the aggregator reads (and self-heals) through. */
export interface InstanceView {
  trackedPorts(): number[];
  inspect(port: number): TrackedInstance | undefined;
  forget(port: number): void;
}

export interface RouteView {
  isActive(port: number): boolean;
}

export interface AggregatorDeps {
  instances: InstanceView;
  routes: RouteView;
  probes?: NetworkProbes;
  hostStats?: HostStats;
  readLogTail?: (file: string, lines: number) => string[];
}

export interface HealthOptions {
  /** Probe only this port instead of discovering. */
  port?: number;
  /** Include host resource checks. Defaults to health.hostChecks. */
  host?: boolean;
}

export const TARGET_LIST_ENDPOINT = "/json/list";
export const PROXY_HEALTH_ENDPOINT = "/health";
const LOG_SCAN_LINES = 20;
const LOG_ERROR_PATTERN = /error|failed|crash/i;

// ══════════════════════════════════════════════
// ── Aggregator ──
// ══════════════════════════════════════════════

export class HealthAggregator {
  private readonly instances: InstanceView;
  private readonly routes: RouteView;
  private readonly probes: NetworkProbes;
  private readonly hostStats: HostStats;
  private readonly readLogTail: (file: string, lines: number) => string[];

  constructor(
    private readonly config: FleetConfig,
    private readonly paths: FleetPaths,
    deps: AggregatorDeps,
  ) {
    this.instances = deps.instances;
    this.routes = deps.routes;
    this.probes = deps.probes ?? defaultProbes;
    this.hostStats = deps.hostStats ?? systemHostStats;
    this.readLogTail = deps.readLogTail ?? readLogTail;
  }

  // ── Discovery ──

  /** Ports in the range that accept connections and answer the readiness endpoint. */
  async discover(rangeStart: number, rangeEnd: number): Promise<number[]> {
    const { host } = this.config.ports;
    const { connectTimeoutMs, httpTimeoutMs, concurrency, discovery } = this.config.health;
    const tracked = this.instances.trackedPorts();
    const plan = planDiscoveryPorts(rangeStart, rangeEnd, discovery, tracked)
      .filter((port) => tracked.includes(port) || !this.isRouteListener(port));
    log.debug(`Discovering instances in ${rangeStart}-${rangeEnd} (${plan.length} port(s) sampled)`);

    const hits = await mapWithConcurrency(plan, concurrency, async (port) => {
      if (!(await this.probes.tcpReachable(host, port, connectTimeoutMs))) return undefined;
      const res = await this.probes.httpGet(debuggerUrl(host, port, READINESS_ENDPOINT), httpTimeoutMs);
      return res.ok ? port : undefined;
    });
    const found = hits.filter((port): port is number => port !== undefined);
    log.debug(`Discovered ${found.length} instance(s)`);
    return found;
  }

  // An active route's proxy listener also answers the debugger endpoints
  private isRouteListener(port: number): boolean {
    const { enabled, listenOffset } = this.config.proxy;
    return enabled && listenOffset !== 0 && this.routes.isActive(port - listenOffset);
  }

  // ── Probing ──

  async probe(port: number): Promise<PortHealth> {
    try {
      return portHealth(port, await this.runChecks(port));
    } catch (err) {
      return portHealth(port, [fail("process-alive", `Probe errored: ${describeError(err)}`)]);
    }
  }

  private async runChecks(port: number): Promise<CheckResult[]> {
    const { host } = this.config.ports;
    const { connectTimeoutMs, httpTimeoutMs } = this.config.health;
    const checks: CheckResult[] = [];

    // 1. process
    const tracked = this.instances.inspect(port);
    if (tracked && !tracked.alive) {
      this.instances.forget(port);
      checks.push(fail("process-alive", `PID ${tracked.record.pid} is not running; stale entry removed`));
      return checks;
    }
    checks.push(tracked
      ? pass("process-alive", `PID ${tracked.record.pid} running`)
      : warn("process-alive", "Not tracked by this fleet"));

    // 2. port
    if (!(await this.probes.tcpReachable(host, port, connectTimeoutMs))) {
      checks.push(fail("port-reachable", `Port ${port} is not accepting connections`));
      return checks;
    }
    checks.push(pass("port-reachable", `Port ${port} is accepting connections`));

    // 3. protocol endpoints
    const version = await this.probes.httpGet(debuggerUrl(host, port, READINESS_ENDPOINT), httpTimeoutMs);
    const targets = await this.probes.httpGet(debuggerUrl(host, port, TARGET_LIST_ENDPOINT), httpTimeoutMs);
    const broken = [
      version.ok ? undefined : `${READINESS_ENDPOINT}: ${version.error ?? "failed"}`,
      targets.ok ? undefined : `${TARGET_LIST_ENDPOINT}: ${targets.error ?? "failed"}`,
    ].filter((s): s is string => s !== undefined);
    if (broken.length > 0) {
      checks.push(fail("protocol-endpoints", `Debugger endpoints failing (${broken.join("; ")})`));
      return checks;
    }
    const info = parseBrowserVersion(version.body);
    checks.push(pass("protocol-endpoints", `Browser: ${info.browser ?? "unknown"}`));

    // 4. proxy route
    if (this.config.proxy.enabled) checks.push(...(await this.checkProxyRoute(port)));

    // 5. websocket
    if (this.config.health.websocket) {
      if (!info.webSocketDebuggerUrl) {
        checks.push(warn("websocket", "No webSocketDebuggerUrl advertised"));
      } else {
        const ws = await this.probes.websocketHandshake(info.webSocketDebuggerUrl, httpTimeoutMs);
        checks.push(ws.ok
          ? pass("websocket", "WebSocket handshake succeeded")
          : warn("websocket", `WebSocket handshake failed: ${ws.error ?? "unknown error"}`));
      }
    }

    // 6. instance log
    if (tracked) checks.push(this.checkLog(tracked.record.logPath));

    return checks;
  }

  private async checkProxyRoute(port: number): Promise<CheckResult[]> {
    if (!this.routes.isActive(port)) {
      return [warn("proxy-route", `No proxy config for port ${port}`)];
    }
    const base = routeBaseUrl(port, this.config.proxy);
    const timeout = this.config.health.httpTimeoutMs;
    for (const endpoint of [READINESS_ENDPOINT, TARGET_LIST_ENDPOINT]) {
      const res = await this.probes.httpGet(`${base}${endpoint}`, timeout);
      if (!res.ok) {
        return [fail("proxy-route", `${endpoint} through ${base} failed: ${res.error ?? "unknown error"}`)];
      }
    }
    const aux = await this.probes.httpGet(`${base}${PROXY_HEALTH_ENDPOINT}`, timeout);
    if (!aux.ok) return [warn("proxy-route", `Proxy routing works but ${PROXY_HEALTH_ENDPOINT} is not available`)];
    return [pass("proxy-route", `Proxy route ${base} is working`)];
  }

  private checkLog(logPath: string): CheckResult {
    const lines = this.readLogTail(logPath, LOG_SCAN_LINES);
    const errors = lines.filter((line) => LOG_ERROR_PATTERN.test(line)).length;
    const detail = `${errors} error line(s) in the last ${LOG_SCAN_LINES} log lines`;
    return errors > this.config.health.logErrorThreshold ? warn("log-errors", detail) : pass("log-errors", detail);
  }

  /**
   * Probes ports with bounded concurrency under one overall deadline. Ports
   * whose probe had not finished when the deadline passed are reported failed.
   */
  async probeAll(ports: readonly number[]): Promise<PortHealth[]> {
    const { concurrency, deadlineMs } = this.config.health;
    const done = new Map<number, PortHealth>();
    try {
      await withDeadline("health probe", deadlineMs, (signal) =>
        mapWithConcurrency(ports, concurrency, async (port) => {
          if (signal.aborted) return;
          done.set(port, await this.probe(port));
        }));
    } catch (err) {
      if (!(err instanceof DeadlineExceededError)) throw err;
      log.warn(`${err.message}; ${ports.length - done.size} port(s) not probed in time`);
    }
    return ports.map((port) =>
      done.get(port) ?? portHealth(port, [fail("probe-deadline", `Probe did not finish within ${deadlineMs}ms`)]));
  }

  // ── Snapshot ──

  async check(opts: HealthOptions = {}): Promise<HealthSnapshot> {
    const { start, end } = this.config.ports;
    const fleet: CheckResult[] = [];
    let ports: number[];

    if (opts.port !== undefined) {
      ports = [opts.port];
    } else {
      // Tracked ports are probed even when they no longer answer, so a crashed instance fails
      const found = new Set([...(await this.discover(start, end)), ...this.instances.trackedPorts()]);
      ports = [...found].sort((a, b) => a - b);
      fleet.push(ports.length === 0
        ? warn("instances-discovered", `No browser instances found in range ${start}-${end}`)
        : pass("instances-discovered", `${ports.length} instance(s) found`));
    }

    const results = await this.probeAll(ports);
    if (opts.host ?? this.config.health.hostChecks) {
      fleet.push(...(await runHostChecks(this.hostStats, this.paths.dataDir)));
    }
    return buildSnapshot(results, fleet);
  }
}
