import fs from "node:fs";
import path from "node:path";
import JSON5 from "json5";
import { FleetConfigSchema, DEFAULT_CONFIG, listenPortsOverlapRange, type FleetConfig, type FleetConfigInput } from "./schema.js";
import { resolveConfigFilePath, resolveDataDir, resolveLogsDir, resolveStateDir, ensureDir } from "./paths.js";
import { log } from "../util/logger.js";

export interface PortRange {
  start: number;
  end: number;
}

export interface FleetPaths {
  dataDir: string;
  logDir: string;
  stateDir: string;
}

/** Parses "48000-48999". Returns undefined for anything malformed or out of order. */
export function parsePortRange(value: string): PortRange | undefined {
  const match = /^\s*(\d{1,5})\s*-\s*(\d{1,5})\s*$/.exec(value);
  if (!match) return undefined;
  const start = Number(match[1]);
  const end = Number(match[2]);
  if (start < 1 || end > 65535 || start > end) return undefined;
  return { start, end };
}

function mergeEnvVars(config: FleetConfig): FleetConfig {
  const envRange = process.env.CDP_FLEET_PORT_RANGE?.trim();
  if (envRange) {
    const range = parsePortRange(envRange);
    if (!range) log.warn(`Ignoring malformed CDP_FLEET_PORT_RANGE: ${envRange}`);
    else if (listenPortsOverlapRange(range, config.proxy)) {
      log.warn(`Ignoring CDP_FLEET_PORT_RANGE ${envRange}: it overlaps the proxy listen ports (offset ${config.proxy.listenOffset})`);
    } else config = { ...config, ports: { ...config.ports, ...range } };
  }
  const envBrowser = process.env.CDP_FLEET_BROWSER?.trim();
  if (envBrowser) config = { ...config, browser: { ...config.browser, executablePath: envBrowser } };
  const envConfDir = process.env.CDP_FLEET_PROXY_CONF_DIR?.trim();
  if (envConfDir) config = { ...config, proxy: { ...config.proxy, confDir: envConfDir } };
  return config;
}

function writeDefaultConfig(configPath: string): void {
  const content = JSON5.stringify({
    ports: { start: DEFAULT_CONFIG.ports.start, end: DEFAULT_CONFIG.ports.end },
    proxy: { confDir: DEFAULT_CONFIG.proxy.confDir },
  }, null, 2);
  try {
    ensureDir(path.dirname(configPath));
    fs.writeFileSync(configPath, content, "utf-8");
    log.info(`Created default config at ${configPath}`);
  } catch (err) {
    log.warn(`Could not write default config to ${configPath}: ${err}`);
  }
}

export function resolveConfig(raw: unknown): FleetConfig {
  const result = FleetConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  log.warn(`Config validation issues: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  if (!raw || typeof raw !== "object") return DEFAULT_CONFIG;

  // Drop the offending top-level sections and keep the rest
  const bad = new Set(result.error.issues.map((i) => String(i.path[0])));
  const kept = Object.fromEntries(Object.entries(raw).filter(([key]) => !bad.has(key)));
  const retry = FleetConfigSchema.safeParse(kept);
  return retry.success ? retry.data : DEFAULT_CONFIG;
}

export function loadConfig(overridePath?: string): FleetConfig {
  const configPath = overridePath || resolveConfigFilePath();

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
      log.warn(`Failed to parse config at ${configPath}: ${err}`);
    }
  } else if (!overridePath) {
    writeDefaultConfig(configPath);
  } else {
    log.warn(`Config file not found: ${configPath}, using defaults`);
  }

  return mergeEnvVars(resolveConfig(raw));
}

export function buildConfig(input: FleetConfigInput = {}): FleetConfig {
  return FleetConfigSchema.parse(input);
}

export function resolveFleetPaths(config: FleetConfig): FleetPaths {
  return {
    dataDir: config.paths.dataDir ?? resolveDataDir(),
    logDir: config.paths.logDir ?? resolveLogsDir(),
    stateDir: config.paths.stateDir ?? resolveStateDir(),
  };
}
