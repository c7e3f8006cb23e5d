#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { loadConfig, resolveFleetPaths } from "./config/loader.js";
import { listenPortsOverlapRange, type FleetConfig } from "./config/schema.js";
import { Fleet, launcherLogPath } from "./fleet.js";
import { exitCodeFor, type HealthSnapshot } from "./health/checks.js";
import { renderSnapshot } from "./health/report.js";
import { ReloadFailedError, SpawnFailedError, ValidationFailedError, describeError } from "./util/errors.js";
import { setVerbose, setJsonMode, setLogFile, log } from "./util/logger.js";
import { sleep } from "./util/timing.js";
import {
  GlobalOptionsSchema,
  HealthOptionsSchema,
  LogsOptionsSchema,
  parsePortArgument,
  parsePositiveInt,
  parseRangeArgument,
  splitStartOperands,
} from "./cli/args.js";

const program = new Command()
  .name("cdp-fleet")
  .description("Run and supervise browser debugging instances behind generated proxy routes")
  .version("0.1.0")
  .option("--config <path>", "Config file path override")
  .option("--range <start-end>", "Port range override (e.g. 48000-48999)", parseRangeArgument)
  .option("--verbose", "Verbose output")
  .option("--json", "JSON output mode");

// ══════════════════════════════════════════════
// ── Helpers ──
// ══════════════════════════════════════════════

interface Context {
  fleet: Fleet;
  config: FleetConfig;
  json: boolean;
}

function context(cmd: Command): Context {
  const opts = GlobalOptionsSchema.parse(cmd.optsWithGlobals());
  if (opts.verbose) setVerbose(true);
  if (opts.json) setJsonMode(true);

  let config = loadConfig(opts.config);
  if (opts.range) {
    if (listenPortsOverlapRange(opts.range, config.proxy)) {
      throw new InvalidArgumentError(
        `Range ${opts.range.start}-${opts.range.end} overlaps the proxy listen ports (offset ${config.proxy.listenOffset}).`,
      );
    }
    config = { ...config, ports: { ...config.ports, ...opts.range } };
  }
  const paths = resolveFleetPaths(config);
  if (config.logging.file) setLogFile(launcherLogPath(paths));
  return { fleet: new Fleet(config, paths), config, json: opts.json ?? false };
}

function reportFailure(err: unknown): void {
  log.error(describeError(err));
  if (err instanceof SpawnFailedError && err.logTail.length > 0) {
    console.error(chalk.dim("Last log lines:"));
    for (const line of err.logTail) console.error(chalk.dim(`  ${line}`));
  }
  if ((err instanceof ValidationFailedError || err instanceof ReloadFailedError) && err.output) {
    console.error(chalk.dim(err.output));
  }
}

// Runs a command body; its return value (default 0) becomes the exit code
async function run(body: () => Promise<number | void>): Promise<void> {
  try {
    process.exitCode = (await body()) ?? 0;
  } catch (err) {
    reportFailure(err);
    process.exitCode = 1;
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ══════════════════════════════════════════════
// ── Lifecycle Commands ──
// ══════════════════════════════════════════════

program
  .command("start")
  .description("Start an instance on the given port, or the first free one in range")
  .argument("[port]", "Port to bind (allocated when omitted)")
  .argument("[browserArgs...]", "Extra browser arguments, after --")
  .action((port: string | undefined, browserArgs: string[], _opts: unknown, cmd: Command) => run(async () => {
    const operands = port === undefined ? browserArgs : [port, ...browserArgs];
    const { port: explicit, browserArgs: extraArgs } = splitStartOperands(operands);
    const { fleet, json } = context(cmd);
    const result = await fleet.start({ port: explicit, extraArgs });
    if (json) {
      printJson({
        port: result.instance.port,
        pid: result.instance.pid,
        debuggerUrl: result.debuggerUrl,
        routeUrl: result.routeUrl ?? null,
      });
      return;
    }
    console.log(result.instance.port);
    console.error(chalk.green(`✓ Browser ready on port ${result.instance.port} (PID ${result.instance.pid})`));
    console.error(`  Debugger: ${result.debuggerUrl}/json/version`);
    if (result.routeUrl) console.error(`  Proxy:    ${result.routeUrl}`);
  }));

program
  .command("stop")
  .description("Stop the instance on a port and remove its route")
  .argument("<port>", "Instance port", parsePortArgument)
  .action((port: number, _opts: unknown, cmd: Command) => run(async () => {
    const { fleet, json } = context(cmd);
    const result = await fleet.stop(port);
    if (json) {
      printJson(result);
      return;
    }
    if (result.termination.outcome === "not-found") console.error(chalk.dim(`No instance tracked on port ${port}`));
    else console.error(chalk.green(`✓ Stopped port ${port} (${result.termination.outcome})`));
    if (result.routeRemoved) console.error(chalk.green(`✓ Removed proxy route for port ${port}`));
  }));

program
  .command("stop-all")
  .description("Stop every instance and remove all routes")
  .action((_opts: unknown, cmd: Command) => run(async () => {
    const { fleet, json } = context(cmd);
    const result = await fleet.stopAll();
    if (json) {
      printJson(result);
      return;
    }
    for (const t of result.terminated) console.error(`  port ${t.port}: ${t.outcome}`);
    if (result.orphans.length > 0) console.error(chalk.yellow(`Killed ${result.orphans.length} untracked process(es)`));
    console.error(chalk.green(`✓ Stopped ${result.terminated.length} instance(s), removed ${result.routesRemoved.length} route(s)`));
  }));

program
  .command("generate-config")
  .description("Generate, validate and activate the proxy route for a port")
  .argument("<port>", "Instance port", parsePortArgument)
  .action((port: number, _opts: unknown, cmd: Command) => run(async () => {
    const { fleet, json } = context(cmd);
    const route = await fleet.generateConfig(port);
    if (json) printJson(route);
    else console.error(chalk.green(`✓ Route for port ${port} active: ${route.configPath}`));
  }));

program
  .command("reconcile")
  .description("Drop registry entries whose process is gone")
  .action((_opts: unknown, cmd: Command) => run(async () => {
    const { fleet, json } = context(cmd);
    const stale = fleet.reconcile();
    if (json) printJson(stale);
    else if (stale.length === 0) console.error(chalk.dim("Registry is consistent."));
    else for (const r of stale) console.error(chalk.yellow(`Removed stale entry: port ${r.port} (PID ${r.pid})`));
  }));

// ══════════════════════════════════════════════
// ── Query Commands ──
// ══════════════════════════════════════════════

program
  .command("list")
  .description("List tracked instances")
  .action((_opts: unknown, cmd: Command) => run(async () => {
    const { fleet, json } = context(cmd);
    const instances = await fleet.list();
    if (json) {
      printJson(instances.map(({ port, pid, state }) => ({ port, pid, state })));
      return;
    }
    if (instances.length === 0) {
      console.log(chalk.dim("(no instances)"));
      return;
    }
    console.log(chalk.cyan(`${"PORT".padEnd(8)}${"PID".padEnd(10)}${"STATE".padEnd(10)}STARTED`));
    for (const i of instances) {
      const state = i.state === "ready" ? chalk.green(i.state) : i.state === "dead" ? chalk.red(i.state) : chalk.yellow(i.state);
      console.log(`${String(i.port).padEnd(8)}${String(i.pid).padEnd(10)}${state.padEnd(10 + state.length - i.state.length)}${i.startedAt}`);
    }
  }));

program
  .command("health")
  .description("Probe one port, or discover and probe the whole range (exit 0 healthy, 1 degraded, 2 unhealthy)")
  .argument("[port]", "Probe only this port", parsePortArgument)
  .option("--host", "Include host resource checks")
  .option("--watch <seconds>", "Repeat every N seconds until interrupted", parsePositiveInt)
  .action((port: number | undefined, rawOpts: unknown, cmd: Command) => run(async () => {
    const opts = HealthOptionsSchema.parse(rawOpts);
    const { fleet, json } = context(cmd);
    const show = (snapshot: HealthSnapshot) => {
      if (json) printJson(snapshot);
      else console.log(renderSnapshot(snapshot));
    };

    if (opts.watch === undefined) {
      const snapshot = await fleet.health({ port, host: opts.host });
      show(snapshot);
      return exitCodeFor(snapshot.overall);
    }

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    let code: number = 0;
    while (!controller.signal.aborted) {
      const snapshot = await fleet.health({ port, host: opts.host });
      if (!json) console.clear();
      show(snapshot);
      code = exitCodeFor(snapshot.overall);
      try {
        await sleep(opts.watch * 1000, controller.signal);
      } catch {
        break;
      }
    }
    return code;
  }));

program
  .command("logs")
  .description("Show an instance log, or the launcher log when no port is given")
  .argument("[port]", "Instance port", parsePortArgument)
  .option("-n, --lines <count>", "Number of lines", parsePositiveInt)
  .action((port: number | undefined, rawOpts: unknown, cmd: Command) => run(async () => {
    const opts = LogsOptionsSchema.parse(rawOpts);
    const { fleet } = context(cmd);
    const lines = fleet.logs(port, opts.lines);
    if (lines.length === 0) console.error(chalk.dim("(log is empty or missing)"));
    for (const line of lines) console.log(line);
  }));

program.parseAsync().catch((err: unknown) => {
  log.error(describeError(err));
  process.exit(1);
});
