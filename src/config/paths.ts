import path from "node:path";
import os from "node:os";
import fs from "node:fs";

const CONFIG_DIR_NAME = "cdp-fleet";

export function resolveConfigDir(): string {
  const override = process.env.CDP_FLEET_HOME?.trim();
  if (override) return override;
  const xdgConfig = process.env.XDG_CONFIG_HOME?.trim();
  const base = xdgConfig || path.join(os.homedir(), ".config");
  return path.join(base, CONFIG_DIR_NAME);
}

export function resolveConfigFilePath(): string {
  const override = process.env.CDP_FLEET_CONFIG?.trim();
  if (override) return override;
  return path.join(resolveConfigDir(), "config.json5");
}

// Defaults for the `paths` config section
export function resolveDataDir(): string { return path.join(resolveConfigDir(), "data"); }
export function resolveLogsDir(): string { return path.join(resolveConfigDir(), "logs"); }
export function resolveStateDir(): string { return path.join(resolveConfigDir(), "state"); }

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}
