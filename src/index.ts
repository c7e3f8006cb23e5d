// cdp-fleet — browser debugging instances behind generated proxy routes
// Public API exports

// Config
export { type FleetConfig, type FleetConfigInput, FleetConfigSchema, DEFAULT_CONFIG } from "./config/schema.js";
export { loadConfig, buildConfig, resolveConfig, resolveFleetPaths, parsePortRange, type FleetPaths, type PortRange } from "./config/loader.js";
export { resolveConfigDir, resolveConfigFilePath } from "./config/paths.js";

// Fleet
export { Fleet, launcherLogPath, type FleetDeps, type StartOptions, type StartResult, type StopResult, type StopAllResult } from "./fleet.js";

// Ports
export { PortAllocator, type PortAllocatorOptions } from "./ports/allocator.js";

// Processes
export { ProcessSupervisor, readLogTail, type Instance, type InstanceState, type TerminationResult, type TerminateAllResult, type SupervisorDeps } from "./process/supervisor.js";
export { InstanceRegistry, InstanceRecordSchema, type InstanceRecord } from "./process/registry.js";
export { PidHandle, ChildHandle, type ProcessHandle, type SignalKind } from "./process/handle.js";
export { buildBrowserArgs, resolveBrowserBinary, createBrowserLauncher, type Launcher, type LaunchSpec, type LaunchedProcess } from "./process/launcher.js";

// Proxy
export { RouteGenerator, type RouteRecord } from "./proxy/routes.js";
export { createCommandEngine, type ProxyEngine, type EngineResult } from "./proxy/engine.js";
export { renderTemplate, routeVars, routeBaseUrl, defaultTemplatePath } from "./proxy/template.js";

// Health
export { HealthAggregator, type HealthOptions, type InstanceView, type RouteView } from "./health/aggregator.js";
export { aggregate, exitCodeFor, worstStatus, type CheckResult, type CheckStatus, type HealthSnapshot, type OverallHealth, type PortHealth } from "./health/checks.js";
export { planDiscoveryPorts } from "./health/discovery.js";
export { renderSnapshot } from "./health/report.js";

// Errors
export {
  FleetError,
  PortsExhaustedError,
  PortInUseError,
  SpawnFailedError,
  ReadinessTimeoutError,
  TemplateMissingError,
  ValidationFailedError,
  ReloadFailedError,
  BrowserNotFoundError,
  LockTimeoutError,
  isFleetError,
  describeError,
  type FleetErrorCode,
} from "./util/errors.js";
