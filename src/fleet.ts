// Fleet — composes the allocator, supervisor, route generator and health
// aggregator into the operations the CLI exposes.

import path from "node:path";
import type { FleetConfig } from "./config/schema.js";
import type { FleetPaths } from "./config/loader.js";
import { describeError } from "./util/errors.js";
import { log } from "./util/logger.js";
import { defaultProbes, debuggerUrl, type NetworkProbes } from "./net/probes.js";
import { PortAllocator } from "./ports/allocator.js";
import {
  ProcessSupervisor,
  readLogTail,
  type Instance,
  type SupervisorDeps,
  type TerminateAllResult,
  type TerminationResult,
} from "./process/supervisor.js";
import type { InstanceRecord } from "./process/registry.js";
import { RouteGenerator, type RouteRecord } from "./proxy/routes.js";
import type { ProxyEngine } from "./proxy/engine.js";
import { routeBaseUrl } from "./proxy/template.js";
import { HealthAggregator, type HealthOptions } from "./health/aggregator.js";
import type { HealthSnapshot } from "./health/checks.js";
import type { HostStats } from "./health/host.js";

export interface FleetDeps extends Partial<Omit<SupervisorDeps, "probes">> {
  probes?: NetworkProbes;
  engine?: ProxyEngine;
  hostStats?: HostStats;
}

export interface StartOptions {
  /** Explicit port; allocated from the configured range when omitted. */
  port?: number;
  extraArgs?: string[];
  signal?: AbortSignal;
}

export interface StartResult {
  instance: Instance;
  debuggerUrl: string;
  route?: RouteRecord;
  routeUrl?: string;
}

export interface StopResult {
  termination: TerminationResult;
  routeRemoved: boolean;
}

export interface StopAllResult extends TerminateAllResult {
  routesRemoved: number[];
}

export function launcherLogPath(paths: FleetPaths): string {
  return path.join(paths.logDir, "launcher.log");
}

export class Fleet {
  readonly allocator: PortAllocator;
  readonly supervisor: ProcessSupervisor;
  readonly routes: RouteGenerator;
  readonly aggregator: HealthAggregator;

  constructor(
    readonly config: FleetConfig,
    readonly paths: FleetPaths,
    deps: FleetDeps = {},
  ) {
    const probes = deps.probes ?? defaultProbes;
    this.allocator = new PortAllocator({
      bindAddress: config.browser.bindAddress,
      claimsDir: path.join(paths.stateDir, "claims"),
      claimTtlMs: config.ports.claimTtlMs,
    }, probes);
    this.supervisor = new ProcessSupervisor(config, paths, {
      registry: deps.registry,
      launcher: deps.launcher,
      attach: deps.attach,
      listProcesses: deps.listProcesses,
      commandLine: deps.commandLine,
      probes,
    });
    this.routes = new RouteGenerator(config.proxy, path.join(paths.stateDir, "proxy.lock"), deps.engine);
    this.aggregator = new HealthAggregator(config, paths, {
      instances: this.supervisor,
      routes: this.routes,
      probes,
      hostStats: deps.hostStats,
    });
  }

  // ── Lifecycle ──

  async start(opts: StartOptions = {}): Promise<StartResult> {
    let port: number;
    if (opts.port !== undefined) {
      await this.allocator.claimExplicit(opts.port);
      port = opts.port;
    } else {
      port = await this.allocator.allocate(this.config.ports.start, this.config.ports.end);
    }

    try {
      const instance = await this.supervisor.spawn(port, opts.extraArgs ?? [], opts.signal);
      const result: StartResult = {
        instance,
        debuggerUrl: debuggerUrl(this.config.ports.host, port, ""),
      };
      if (!this.config.proxy.enabled) return result;

      try {
        result.route = await this.routes.activate(port);
        result.routeUrl = routeBaseUrl(port, this.config.proxy);
      } catch (err) {
        log.error(`Route activation failed for port ${port}; stopping the instance`);
        await this.rollbackStart(port);
        throw err;
      }
      return result;
    } finally {
      this.allocator.release(port);
    }
  }

  private async rollbackStart(port: number): Promise<void> {
    try {
      await this.supervisor.terminate(port);
    } catch (err) {
      log.warn(`Rollback could not stop port ${port}: ${describeError(err)}`);
    }
    if (!this.routes.isActive(port)) return;
    try {
      await this.routes.deactivate(port);
    } catch (err) {
      log.warn(`Rollback could not remove the route for port ${port}: ${describeError(err)}`);
    }
  }

  async stop(port: number): Promise<StopResult> {
    const termination = await this.supervisor.terminate(port);
    const routeRemoved = this.config.proxy.enabled ? await this.routes.deactivate(port) : false;
    return { termination, routeRemoved };
  }

  async stopAll(): Promise<StopAllResult> {
    const result = await this.supervisor.terminateAll();
    const routesRemoved = this.config.proxy.enabled ? await this.routes.deactivateAll() : [];
    return { ...result, routesRemoved };
  }

  // ── Queries ──

  list(): Promise<Instance[]> {
    return this.supervisor.list();
  }

  health(opts: HealthOptions = {}): Promise<HealthSnapshot> {
    return this.aggregator.check(opts);
  }

  generateConfig(port: number): Promise<RouteRecord> {
    return this.routes.activate(port);
  }

  reconcile(): InstanceRecord[] {
    return this.supervisor.reconcile();
  }

  /** Instance log tail, or the launcher log when no port is given. */
  logs(port: number | undefined, lines: number): string[] {
    if (port !== undefined) return this.supervisor.logTail(port, lines);
    return readLogTail(launcherLogPath(this.paths), lines);
  }
}
