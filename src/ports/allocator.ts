// Port Allocator — first free TCP port in a range, with an explicit claim step.
//
// A port is claimed (in-memory table plus an O_EXCL claim file, so separate CLI
// invocations see each other) *before* the OS-level bind test. The claim is
// held until the caller releases it, which closes the window between "port
// looked free" and "browser bound it".

import path from "node:path";
import { PortInUseError, PortsExhaustedError } from "../util/errors.js";
import { removeLockFile, tryCreateLockFile } from "../util/lock.js";
import { log } from "../util/logger.js";
import { defaultProbes, type NetworkProbes } from "../net/probes.js";

export interface PortAllocatorOptions {
  /** Address the bind test uses; the same one the browser binds. */
  bindAddress: string;
  claimsDir: string;
  claimTtlMs: number;
}

export class PortAllocator {
  private readonly claims = new Set<number>();
  private readonly probes: Pick<NetworkProbes, "isPortBindable">;

  constructor(
    private readonly opts: PortAllocatorOptions,
    probes: Pick<NetworkProbes, "isPortBindable"> = defaultProbes,
  ) {
    this.probes = probes;
  }

  claimFileFor(port: number): string {
    return path.join(this.opts.claimsDir, `port-${port}.claim`);
  }

  /** Claims a port for this process. False when another caller already holds it. */
  claim(port: number): boolean {
    if (this.claims.has(port)) return false;
    if (!tryCreateLockFile(this.claimFileFor(port), this.opts.claimTtlMs)) return false;
    this.claims.add(port);
    log.trace(`Claimed port ${port}`);
    return true;
  }

  release(port: number): void {
    if (!this.claims.delete(port)) return;
    removeLockFile(this.claimFileFor(port));
    log.trace(`Released port ${port}`);
  }

  releaseAll(): void {
    for (const port of [...this.claims]) this.release(port);
  }

  isClaimed(port: number): boolean {
    return this.claims.has(port);
  }

  isFree(port: number): Promise<boolean> {
    return this.probes.isPortBindable(port, this.opts.bindAddress);
  }

  /**
   * Scans ascending and returns the first port that is neither claimed nor
   * bound. The returned port stays claimed until release().
   */
  async allocate(rangeStart: number, rangeEnd: number): Promise<number> {
    for (let port = rangeStart; port <= rangeEnd; port++) {
      if (!this.claim(port)) continue;
      if (await this.isFree(port)) {
        log.debug(`Allocated port ${port}`);
        return port;
      }
      this.release(port);
    }
    log.error(`No available ports in range ${rangeStart}-${rangeEnd}`);
    throw new PortsExhaustedError(rangeStart, rangeEnd);
  }

  /** Claims a caller-chosen port, failing if it is claimed elsewhere or bound. */
  async claimExplicit(port: number): Promise<void> {
    if (!this.claim(port)) throw new PortInUseError(port, "claimed by another start");
    if (!(await this.isFree(port))) {
      this.release(port);
      throw new PortInUseError(port, "bound by another listener");
    }
  }
}
