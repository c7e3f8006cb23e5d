// Instance registry — one JSON5 record per live instance under the state dir.
// Survives manager restarts; load() is the explicit read point and reconcile()
// the deliberate crash-recovery step.

import fs from "node:fs";
import path from "node:path";
import JSON5 from "json5";
import { z } from "zod";
import { ensureDir } from "../config/paths.js";
import { isMissingFileError } from "../util/errors.js";
import { log } from "../util/logger.js";

export const InstanceRecordSchema = z.object({
  port: z.number().int().min(1).max(65535),
  pid: z.number().int().positive(),
  dataDir: z.string(),
  logPath: z.string(),
  startedAt: z.string(),
  args: z.array(z.string()).default([]),
});

export type InstanceRecord = z.infer<typeof InstanceRecordSchema>;

const FILE_PATTERN = /^instance-(\d+)\.json5$/;

export class InstanceRegistry {
  private records = new Map<number, InstanceRecord>();

  constructor(readonly dir: string) {}

  fileFor(port: number): string {
    return path.join(this.dir, `instance-${port}.json5`);
  }

  // ── Persistence ──

  load(): this {
    this.records.clear();
    let entries: string[];
    try {
      entries = fs.readdirSync(this.dir);
    } catch (err) {
      if (!isMissingFileError(err)) log.warn(`Failed to read registry ${this.dir}: ${err}`);
      return this;
    }
    for (const name of entries) {
      const match = FILE_PATTERN.exec(name);
      if (!match) continue;
      const record = this.read(Number(match[1]));
      if (record) this.records.set(record.port, record);
    }
    return this;
  }

  private read(port: number): InstanceRecord | undefined {
    const file = this.fileFor(port);
    let raw: string;
    try {
      raw = fs.readFileSync(file, "utf-8");
    } catch (err) {
      if (!isMissingFileError(err)) log.warn(`Failed to read registry entry ${file}: ${err}`);
      return undefined;
    }
    try {
      const parsed = InstanceRecordSchema.safeParse(JSON5.parse(raw));
      if (parsed.success && parsed.data.port === port) return parsed.data;
      log.warn(`Ignoring malformed registry entry ${file}`);
    } catch (err) {
      log.warn(`Ignoring unparseable registry entry ${file}: ${err}`);
    }
    return undefined;
  }

  put(record: InstanceRecord): void {
    ensureDir(this.dir);
    const file = this.fileFor(record.port);
    const tmp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON5.stringify(record, null, 2), "utf-8");
    fs.renameSync(tmp, file);
    this.records.set(record.port, record);
  }

  /** Returns false when there was no entry to remove. */
  remove(port: number): boolean {
    this.records.delete(port);
    try {
      fs.unlinkSync(this.fileFor(port));
      return true;
    } catch (err) {
      if (isMissingFileError(err)) return false;
      throw err;
    }
  }

  // ── Queries ──

  /** Reads the entry from disk, so writes made by other invocations are seen. */
  get(port: number): InstanceRecord | undefined {
    const record = this.read(port);
    if (record) this.records.set(port, record);
    else this.records.delete(port);
    return record;
  }

  list(): InstanceRecord[] {
    return [...this.records.values()].sort((a, b) => a.port - b.port);
  }

  ports(): number[] {
    return this.list().map((r) => r.port);
  }

  // ── Reconciliation ──

  /** Drops every entry whose process is gone and returns the dropped records. */
  reconcile(isAlive: (record: InstanceRecord) => boolean): InstanceRecord[] {
    this.load();
    const stale: InstanceRecord[] = [];
    for (const record of this.list()) {
      if (isAlive(record)) continue;
      stale.push(record);
      try {
        this.remove(record.port);
      } catch (err) {
        log.warn(`Failed to remove stale registry entry for port ${record.port}: ${err}`);
      }
    }
    return stale;
  }
}
