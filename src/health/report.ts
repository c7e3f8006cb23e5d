import chalk from "chalk";
import type { CheckResult, CheckStatus, HealthSnapshot, OverallHealth } from "./checks.js";

function statusMark(status: CheckStatus): string {
  switch (status) {
    case "pass": return chalk.green("✓");
    case "warn": return chalk.yellow("!");
    case "fail": return chalk.red("✗");
  }
}

const OVERALL_COLOR: Record<OverallHealth, (s: string) => string> = {
  healthy: chalk.green,
  degraded: chalk.yellow,
  unhealthy: chalk.red,
};

function renderCheck(check: CheckResult): string {
  return `  ${statusMark(check.status)} ${check.name.padEnd(20)} ${check.detail}`;
}

export function renderSnapshot(snapshot: HealthSnapshot): string {
  const lines: string[] = [];
  for (const port of snapshot.ports) {
    lines.push(chalk.cyan(`Port ${port.port}`));
    lines.push(...port.checks.map(renderCheck));
  }
  if (snapshot.fleet.length > 0) {
    lines.push(chalk.cyan("Fleet"));
    lines.push(...snapshot.fleet.map(renderCheck));
  }
  const counts = { pass: 0, warn: 0, fail: 0 };
  for (const check of [...snapshot.ports.flatMap((p) => p.checks), ...snapshot.fleet]) counts[check.status]++;
  lines.push("");
  lines.push(
    `Overall: ${OVERALL_COLOR[snapshot.overall](snapshot.overall.toUpperCase())}  ` +
    chalk.dim(`(${counts.pass} passed, ${counts.warn} warnings, ${counts.fail} failed)`),
  );
  return lines.join("\n");
}
