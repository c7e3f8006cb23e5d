// Route Generator — per-port reverse-proxy routes under a validate-before-activate
// discipline. A candidate file is only kept when the engine accepts the full
// configuration set with it included; otherwise the previous state is put back
// and no reload happens.

import fs from "node:fs";
import path from "node:path";
import type { FleetConfig } from "../config/schema.js";
import { ReloadFailedError, ValidationFailedError, isMissingFileError } from "../util/errors.js";
import { withFileLock } from "../util/lock.js";
import { log } from "../util/logger.js";
import { createCommandEngine, type ProxyEngine } from "./engine.js";
import { defaultTemplatePath, loadTemplate, renderTemplate, routeVars } from "./template.js";

export interface RouteRecord {
  port: number;
  configPath: string;
  active: boolean;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function readIfExists(file: string): string | undefined {
  try {
    return fs.readFileSync(file, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) return undefined;
    throw err;
  }
}

// Temp name does not end in .conf, so the proxy never includes a half-written file
function writeAtomic(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp-${process.pid}`;
  fs.writeFileSync(tmp, content, "utf-8");
  fs.renameSync(tmp, file);
}

function removeIfExists(file: string): void {
  fs.rmSync(file, { force: true });
}

export class RouteGenerator {
  private readonly engine: ProxyEngine;
  private readonly filePattern: RegExp;

  constructor(
    private readonly proxy: FleetConfig["proxy"],
    private readonly lockPath: string,
    engine?: ProxyEngine,
  ) {
    this.engine = engine ?? createCommandEngine(proxy);
    this.filePattern = new RegExp(`^${escapeRegExp(proxy.filePrefix)}(\\d+)\\.conf$`);
  }

  configPathFor(port: number): string {
    return path.join(this.proxy.confDir, `${this.proxy.filePrefix}${port}.conf`);
  }

  templatePath(): string {
    return this.proxy.templatePath ?? defaultTemplatePath();
  }

  render(port: number): string {
    const template = loadTemplate(this.templatePath(), port);
    const { text, unresolved } = renderTemplate(template, routeVars(port, this.proxy));
    if (unresolved.length > 0) {
      throw new ValidationFailedError(
        "render",
        `Route template ${this.templatePath()} leaves ${unresolved.map((n) => `{{${n}}}`).join(", ")} unresolved for port ${port}`,
        "",
        port,
      );
    }
    return text;
  }

  // ── Activation ──

  async activate(port: number): Promise<RouteRecord> {
    const text = this.render(port);
    return withFileLock(this.lockPath, async () => {
      const target = this.configPathFor(port);
      const previous = readIfExists(target);
      writeAtomic(target, text);
      log.info(`Generated proxy config for port ${port}: ${target}`);

      const validation = await this.engine.validate();
      if (!validation.ok) {
        if (previous === undefined) removeIfExists(target);
        else writeAtomic(target, previous);
        log.error(`Proxy configuration test failed for port ${port}; candidate discarded`);
        throw new ValidationFailedError("validate", `Proxy rejected the route for port ${port}`, validation.output, port);
      }

      await this.reload(port);
      return { port, configPath: target, active: true };
    }, this.proxy.lockTimeoutMs);
  }

  /** Returns false when the route was not active. */
  async deactivate(port: number): Promise<boolean> {
    return withFileLock(this.lockPath, async () => {
      const target = this.configPathFor(port);
      const previous = readIfExists(target);
      if (previous === undefined) {
        log.debug(`No proxy config for port ${port}`);
        return false;
      }

      removeIfExists(target);
      const validation = await this.engine.validate();
      if (!validation.ok) {
        writeAtomic(target, previous);
        log.error(`Proxy configuration invalid after removing port ${port}; route restored`);
        throw new ValidationFailedError(
          "deactivate",
          `Proxy configuration invalid after removing the route for port ${port}; route restored`,
          validation.output,
          port,
        );
      }

      await this.reload(port);
      log.info(`Removed proxy config for port ${port}`);
      return true;
    }, this.proxy.lockTimeoutMs);
  }

  /** Removes every route in one validate/reload cycle; all are restored if validation fails. */
  async deactivateAll(): Promise<number[]> {
    return withFileLock(this.lockPath, async () => {
      const removed = new Map<number, string>();
      for (const route of this.list()) {
        const content = readIfExists(route.configPath);
        if (content === undefined) continue;
        removeIfExists(route.configPath);
        removed.set(route.port, content);
      }
      if (removed.size === 0) return [];

      const validation = await this.engine.validate();
      if (!validation.ok) {
        for (const [port, content] of removed) writeAtomic(this.configPathFor(port), content);
        throw new ValidationFailedError(
          "deactivate",
          `Proxy configuration invalid after removing ${removed.size} route(s); routes restored`,
          validation.output,
        );
      }

      await this.reload();
      log.info(`Removed all ${removed.size} proxy config(s)`);
      return [...removed.keys()].sort((a, b) => a - b);
    }, this.proxy.lockTimeoutMs);
  }

  private async reload(port?: number): Promise<void> {
    const result = await this.engine.reload();
    if (!result.ok) {
      const where = port !== undefined ? ` after updating the route for port ${port}` : "";
      throw new ReloadFailedError(`Proxy reload failed${where}`, result.output, port);
    }
    log.info("Reloaded proxy configuration");
  }

  // ── Queries ──

  list(): RouteRecord[] {
    let names: string[];
    try {
      names = fs.readdirSync(this.proxy.confDir);
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw err;
    }
    const routes: RouteRecord[] = [];
    for (const name of names) {
      const match = this.filePattern.exec(name);
      if (match) routes.push({ port: Number(match[1]), configPath: path.join(this.proxy.confDir, name), active: true });
    }
    return routes.sort((a, b) => a.port - b.port);
  }

  isActive(port: number): boolean {
    return fs.existsSync(this.configPathFor(port));
  }
}
