// Network probes shared by the allocator, the supervisor's readiness check
// and the health aggregator.

import net from "node:net";
import WebSocket from "ws";
import { describeError } from "../util/errors.js";

export interface HttpResult {
  ok: boolean;
  status: number | null;
  body?: string;
  error?: string;
}

/** True when something accepts a TCP connection on host:port within the timeout. */
export function tcpReachable(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const settle = (reachable: boolean) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(reachable);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => settle(true));
    socket.once("timeout", () => settle(false));
    socket.once("error", () => settle(false));
    socket.connect(port, host);
  });
}

/**
 * OS-level bind test: a port is free when a listener can bind it. EADDRINUSE
 * and EACCES both mean the port is unusable.
 */
export function isPortBindable(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.unref();
    server.once("error", () => resolve(false));
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

export async function httpGet(url: string, timeoutMs: number): Promise<HttpResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { method: "GET", signal: controller.signal });
    const body = await res.text();
    if (!res.ok) return { ok: false, status: res.status, body, error: `HTTP ${res.status}` };
    return { ok: true, status: res.status, body };
  } catch (err) {
    return { ok: false, status: null, error: controller.signal.aborted ? `timed out after ${timeoutMs}ms` : describeError(err) };
  } finally {
    clearTimeout(timer);
  }
}

/** Opens a WebSocket and closes it as soon as the handshake succeeds. */
export function websocketHandshake(url: string, timeoutMs: number): Promise<{ ok: boolean; error?: string }> {
  return new Promise((resolve) => {
    let settled = false;
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
    } catch (err) {
      resolve({ ok: false, error: describeError(err) });
      return;
    }

    const settle = (result: { ok: boolean; error?: string }) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.terminate();
      resolve(result);
    };

    const timer = setTimeout(() => settle({ ok: false, error: `timed out after ${timeoutMs}ms` }), timeoutMs);
    ws.once("open", () => settle({ ok: true }));
    ws.on("error", (err) => settle({ ok: false, error: err.message }));
  });
}

export interface NetworkProbes {
  tcpReachable: typeof tcpReachable;
  isPortBindable: typeof isPortBindable;
  httpGet: typeof httpGet;
  websocketHandshake: typeof websocketHandshake;
}

export const defaultProbes: NetworkProbes = { tcpReachable, isPortBindable, httpGet, websocketHandshake };

export function debuggerUrl(host: string, port: number, endpoint: string): string {
  return `http://${host}:${port}${endpoint}`;
}

export interface BrowserVersion {
  browser?: string;
  webSocketDebuggerUrl?: string;
}

export function parseBrowserVersion(body: string | undefined): BrowserVersion {
  if (!body) return {};
  try {
    const parsed: unknown = JSON.parse(body);
    if (!parsed || typeof parsed !== "object") return {};
    const version: BrowserVersion = {};
    if ("Browser" in parsed && typeof parsed.Browser === "string") version.browser = parsed.Browser;
    if ("webSocketDebuggerUrl" in parsed && typeof parsed.webSocketDebuggerUrl === "string") {
      version.webSocketDebuggerUrl = parsed.webSocketDebuggerUrl;
    }
    return version;
  } catch {
    return {};
  }
}
