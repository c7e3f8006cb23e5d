// ProcessHandle — liveness, signalling and bounded waiting for one OS process,
// without shelling out. Browsers are spawned detached, so the pid is also the
// process-group id and signals go to the whole group (renderers included).

import type { ChildProcess } from "node:child_process";
import { isPidAlive } from "../util/lock.js";
import { sleep } from "../util/timing.js";

export type SignalKind = "term" | "kill";

export interface ProcessHandle {
  readonly pid: number;
  isAlive(): boolean;
  /** Returns false when the process was already gone. */
  signal(kind: SignalKind): boolean;
  /** Resolves true once the process has exited, false if still alive at the deadline. */
  wait(timeoutMs: number): Promise<boolean>;
}

const SIGNALS: Record<SignalKind, NodeJS.Signals> = { term: "SIGTERM", kill: "SIGKILL" };

function sendSignal(pid: number, kind: SignalKind): boolean {
  const sig = SIGNALS[kind];
  if (process.platform !== "win32") {
    try {
      process.kill(-pid, sig);
      return true;
    } catch {
      // not a group leader; fall through to the single pid
    }
  }
  try {
    process.kill(pid, sig);
    return true;
  } catch {
    return false;
  }
}

export class PidHandle implements ProcessHandle {
  constructor(readonly pid: number, private readonly pollMs = 100) {}

  isAlive(): boolean {
    return isPidAlive(this.pid);
  }

  signal(kind: SignalKind): boolean {
    return sendSignal(this.pid, kind);
  }

  async wait(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.isAlive()) {
      if (Date.now() >= deadline) return false;
      await sleep(Math.min(this.pollMs, Math.max(1, deadline - Date.now())));
    }
    return true;
  }
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** Handle for a process this invocation spawned; exit is observed from the child's events. */
export class ChildHandle implements ProcessHandle {
  readonly pid: number;
  private exitInfo: ExitInfo | undefined;
  private readonly exited: Promise<ExitInfo>;

  constructor(child: ChildProcess) {
    if (child.pid === undefined) throw new Error("child process has no pid");
    this.pid = child.pid;
    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.exitInfo = { code, signal };
        resolve(this.exitInfo);
      });
    });
  }

  get exit(): ExitInfo | undefined {
    return this.exitInfo;
  }

  isAlive(): boolean {
    return this.exitInfo === undefined && isPidAlive(this.pid);
  }

  signal(kind: SignalKind): boolean {
    if (this.exitInfo) return false;
    return sendSignal(this.pid, kind);
  }

  async wait(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => { timer = setTimeout(() => resolve(false), timeoutMs); });
    try {
      return await Promise.race([this.exited.then(() => true), timedOut]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}

export function describeExit(exit: ExitInfo | undefined): string {
  if (!exit) return "exited";
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit.code ?? "unknown"}`;
}
