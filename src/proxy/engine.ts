// Proxy engine contract: validate the whole configuration set without
// activating it, then activate it with a hot reload. The default engine
// shells out to the configured commands (nginx -t / nginx -s reload).

import type { FleetConfig } from "../config/schema.js";
import { commandOutput, runCommand } from "../util/exec.js";
import { log } from "../util/logger.js";

export interface EngineResult {
  ok: boolean;
  output: string;
}

export interface ProxyEngine {
  validate(): Promise<EngineResult>;
  reload(): Promise<EngineResult>;
}

export function createCommandEngine(proxy: FleetConfig["proxy"]): ProxyEngine {
  async function run(label: string, argv: readonly string[]): Promise<EngineResult> {
    log.debug(`${label}: ${argv.join(" ")}`);
    const result = await runCommand(argv, proxy.commandTimeoutMs);
    return { ok: result.exitCode === 0, output: commandOutput(result) };
  }

  return {
    validate: () => run("Validating proxy configuration", proxy.validateCommand),
    reload: () => run("Reloading proxy", proxy.reloadCommand),
  };
}
