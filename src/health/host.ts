// Host resource checks: memory, disk of the data root, and load average

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describeError } from "../util/errors.js";
import { fail, pass, warn, type CheckResult } from "./checks.js";

export interface HostStats {
  memory(): { total: number; free: number };
  /** Bytes of the filesystem holding `dir`. */
  disk(dir: string): Promise<{ total: number; free: number }>;
  loadAverage(): number;
  cpuCount(): number;
}

export const systemHostStats: HostStats = {
  memory: () => ({ total: os.totalmem(), free: os.freemem() }),
  async disk(dir) {
    let target = path.resolve(dir);
    while (!fs.existsSync(target) && path.dirname(target) !== target) target = path.dirname(target);
    const stats = await fs.promises.statfs(target);
    return { total: stats.blocks * stats.bsize, free: stats.bavail * stats.bsize };
  },
  loadAverage: () => os.loadavg()[0],
  cpuCount: () => Math.max(1, os.cpus().length),
};

const MEMORY_WARN_PCT = 80;
const DISK_WARN_PCT = 80;
const DISK_FAIL_PCT = 90;

function usedPercent(total: number, free: number): number {
  if (total <= 0) return 0;
  return Math.round(((total - free) / total) * 100);
}

export function checkMemory(stats: HostStats): CheckResult {
  const { total, free } = stats.memory();
  const pct = usedPercent(total, free);
  if (pct > MEMORY_WARN_PCT) return warn("host-memory", `Memory usage ${pct}%`);
  return pass("host-memory", `Memory usage ${pct}%`);
}

export async function checkDisk(stats: HostStats, dir: string): Promise<CheckResult> {
  let usage: { total: number; free: number };
  try {
    usage = await stats.disk(dir);
  } catch (err) {
    return warn("host-disk", `Disk usage unavailable for ${dir}: ${describeError(err)}`);
  }
  const pct = usedPercent(usage.total, usage.free);
  if (pct > DISK_FAIL_PCT) return fail("host-disk", `Disk usage ${pct}% on ${dir}`);
  if (pct > DISK_WARN_PCT) return warn("host-disk", `Disk usage ${pct}% on ${dir}`);
  return pass("host-disk", `Disk usage ${pct}% on ${dir}`);
}

export function checkLoad(stats: HostStats): CheckResult {
  const load = stats.loadAverage();
  const cores = stats.cpuCount();
  const detail = `Load average ${load.toFixed(2)} on ${cores} core(s)`;
  return load > cores * 2 ? warn("host-load", detail) : pass("host-load", detail);
}

export async function runHostChecks(stats: HostStats, dataDir: string): Promise<CheckResult[]> {
  return [checkMemory(stats), await checkDisk(stats, dataDir), checkLoad(stats)];
}
