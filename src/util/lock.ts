// Advisory lock via exclusive file creation. Serializes writers that live in
// different CLI invocations (two `start` calls racing on the proxy config set).

import fs from "node:fs";
import path from "node:path";
import { LockTimeoutError, isMissingFileError } from "./errors.js";
import { sleep } from "./timing.js";
import { log } from "./logger.js";

const STALE_LOCK_MS = 10 * 60 * 1000;

export interface LockInfo {
  pid: number;
  createdAt: number;
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

function parseLockInfo(raw: string): LockInfo | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      parsed && typeof parsed === "object" &&
      "pid" in parsed && typeof parsed.pid === "number" &&
      "createdAt" in parsed && typeof parsed.createdAt === "number"
    ) {
      return { pid: parsed.pid, createdAt: parsed.createdAt };
    }
  } catch {
    // half-written: the owner died between creating the file and writing to it
  }
  return undefined;
}

/** What a lock file held when it was looked at; `ino` and `raw` identify that exact file. */
export interface LockSnapshot {
  info: LockInfo | undefined;
  ino: number;
  mtimeMs: number;
  raw: string;
}

export function readLockSnapshot(lockPath: string): LockSnapshot | undefined {
  try {
    const stat = fs.statSync(lockPath);
    const raw = fs.readFileSync(lockPath, "utf-8");
    return { info: parseLockInfo(raw), ino: stat.ino, mtimeMs: stat.mtimeMs, raw };
  } catch (err) {
    if (isMissingFileError(err)) return undefined;
    throw err;
  }
}

function isStale(snapshot: LockSnapshot, staleMs: number): boolean {
  const { info } = snapshot;
  if (!info) return Date.now() - snapshot.mtimeMs > staleMs;
  return Date.now() - info.createdAt > staleMs || !isPidAlive(info.pid);
}

/**
 * Removes the lock file only if it is still the one in `snapshot`. Another
 * taker may already have replaced it with a live lock of its own.
 */
export function removeStaleLock(lockPath: string, snapshot: LockSnapshot): boolean {
  const current = readLockSnapshot(lockPath);
  if (!current || current.ino !== snapshot.ino || current.raw !== snapshot.raw) return false;
  try {
    fs.unlinkSync(lockPath);
  } catch (err) {
    if (!isMissingFileError(err)) throw err;
  }
  return true;
}

/** Attempts to create `lockPath` exclusively. Stale files (dead owner or too old) are taken over. */
export function tryCreateLockFile(lockPath: string, staleMs = STALE_LOCK_MS): boolean {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  for (let round = 0; round < 2; round++) {
    try {
      const fd = fs.openSync(lockPath, fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL);
      fs.writeSync(fd, JSON.stringify({ pid: process.pid, createdAt: Date.now() }));
      fs.closeSync(fd);
      return true;
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) throw err;
      const snapshot = readLockSnapshot(lockPath);
      if (!snapshot) continue;
      if (!isStale(snapshot, staleMs)) return false;
      log.debug(`Removing stale lock ${lockPath} (${snapshot.info ? `pid ${snapshot.info.pid}` : "no owner info"})`);
      if (!removeStaleLock(lockPath, snapshot)) return false;
    }
  }
  return false;
}

export function removeLockFile(lockPath: string): void {
  try {
    fs.unlinkSync(lockPath);
  } catch (err) {
    if (!isMissingFileError(err)) log.warn(`Failed to remove lock ${lockPath}: ${err}`);
  }
}

export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  timeoutMs = 30_000,
): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  let delay = 25;
  while (!tryCreateLockFile(lockPath)) {
    if (Date.now() >= deadline) throw new LockTimeoutError(lockPath, timeoutMs);
    await sleep(delay);
    delay = Math.min(delay * 2, 500);
  }
  try {
    return await fn();
  } finally {
    removeLockFile(lockPath);
  }
}
