// Check results and the three-tier aggregation rule

export type CheckStatus = "pass" | "warn" | "fail";
export type OverallHealth = "healthy" | "degraded" | "unhealthy";

export type CheckName =
  | "process-alive"
  | "port-reachable"
  | "protocol-endpoints"
  | "proxy-route"
  | "websocket"
  | "log-errors"
  | "probe-deadline"
  | "instances-discovered"
  | "host-memory"
  | "host-disk"
  | "host-load";

export interface CheckResult {
  name: CheckName;
  status: CheckStatus;
  detail: string;
}

export interface PortHealth {
  port: number;
  status: CheckStatus;
  checks: CheckResult[];
}

export interface HealthSnapshot {
  overall: OverallHealth;
  checkedAt: string;
  ports: PortHealth[];
  /** Checks that belong to the fleet or host rather than one port. */
  fleet: CheckResult[];
}

const SEVERITY: Record<CheckStatus, number> = { pass: 0, warn: 1, fail: 2 };

export function pass(name: CheckName, detail: string): CheckResult {
  return { name, status: "pass", detail };
}

export function warn(name: CheckName, detail: string): CheckResult {
  return { name, status: "warn", detail };
}

export function fail(name: CheckName, detail: string): CheckResult {
  return { name, status: "fail", detail };
}

export function worstStatus(statuses: Iterable<CheckStatus>): CheckStatus {
  let worst: CheckStatus = "pass";
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) worst = status;
  }
  return worst;
}

/** unhealthy if anything failed, degraded if anything warned, healthy otherwise. */
export function aggregate(statuses: Iterable<CheckStatus>): OverallHealth {
  switch (worstStatus(statuses)) {
    case "fail": return "unhealthy";
    case "warn": return "degraded";
    case "pass": return "healthy";
  }
}

export function portHealth(port: number, checks: CheckResult[]): PortHealth {
  return { port, status: worstStatus(checks.map((c) => c.status)), checks };
}

export function buildSnapshot(ports: PortHealth[], fleet: CheckResult[]): HealthSnapshot {
  const statuses = [
    ...ports.flatMap((p) => p.checks.map((c) => c.status)),
    ...fleet.map((c) => c.status),
  ];
  return { overall: aggregate(statuses), checkedAt: new Date().toISOString(), ports, fleet };
}

export function exitCodeFor(overall: OverallHealth): 0 | 1 | 2 {
  switch (overall) {
    case "healthy": return 0;
    case "degraded": return 1;
    case "unhealthy": return 2;
  }
}
