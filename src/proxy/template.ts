import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { FleetConfig } from "../config/schema.js";
import { TemplateMissingError, isMissingFileError } from "../util/errors.js";

export type RouteVars = Record<string, string | number>;

export interface RenderResult {
  text: string;
  /** Placeholders present in the template with no value supplied. */
  unresolved: string[];
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function defaultTemplatePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "..", "templates", "route.conf");
}

export function routeVars(port: number, proxy: FleetConfig["proxy"]): RouteVars {
  return {
    PORT: port,
    UPSTREAM_HOST: proxy.upstreamHost,
    LISTEN_PORT: port + proxy.listenOffset,
  };
}

export function renderTemplate(template: string, vars: RouteVars): RenderResult {
  const unresolved = new Set<string>();
  const text = template.replace(PLACEHOLDER, (whole, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      unresolved.add(name);
      return whole;
    }
    return String(value);
  });
  return { text, unresolved: [...unresolved] };
}

export function loadTemplate(templatePath: string, port: number): string {
  try {
    return fs.readFileSync(templatePath, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) throw new TemplateMissingError(port, templatePath);
    throw err;
  }
}

/** Base URL through which an instance is reachable via its generated route. */
export function routeBaseUrl(port: number, proxy: FleetConfig["proxy"]): string {
  return renderTemplate(proxy.routeBaseUrl, routeVars(port, proxy)).text.replace(/\/+$/, "");
}
