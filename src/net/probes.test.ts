import { describe, it, expect, afterEach } from "vitest";
import http from "node:http";
import net from "node:net";
import { WebSocketServer } from "ws";
import { debuggerUrl, httpGet, isPortBindable, parseBrowserVersion, tcpReachable, websocketHandshake } from "./probes.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanups.length > 0) await cleanups.pop()?.();
});

function portOf(server: net.Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
  return address.port;
}

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      cleanups.push(() => new Promise((done) => {
        if (server instanceof http.Server) server.closeAllConnections();
        server.close(() => done());
      }));
      resolve(portOf(server));
    });
  });
}

async function closedPort(): Promise<number> {
  const server = net.createServer();
  const port = await new Promise<number>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve(portOf(server)));
  });
  await new Promise<void>((done) => server.close(() => done()));
  return port;
}

describe("tcpReachable", () => {
  it("is true for a listening port and false for a closed one", async () => {
    const port = await listen(net.createServer((socket) => socket.end()));
    await expect(tcpReachable("127.0.0.1", port, 1000)).resolves.toBe(true);
    await expect(tcpReachable("127.0.0.1", await closedPort(), 1000)).resolves.toBe(false);
  });
});

describe("isPortBindable", () => {
  it("is false while another listener holds the port", async () => {
    const port = await listen(net.createServer());
    await expect(isPortBindable(port, "127.0.0.1")).resolves.toBe(false);
  });

  it("is true for a free port", async () => {
    await expect(isPortBindable(await closedPort(), "127.0.0.1")).resolves.toBe(true);
  });
});

describe("httpGet", () => {
  it("returns the body of a 2xx answer and flags other statuses", async () => {
    const server = http.createServer((req, res) => {
      if (req.url === "/json/version") {
        res.writeHead(200, { "content-type": "application/json" });
        res.end('{"Browser":"HeadlessChrome/130.0.0.0"}');
      } else {
        res.writeHead(404);
        res.end("missing");
      }
    });
    const port = await listen(server);

    await expect(httpGet(debuggerUrl("127.0.0.1", port, "/json/version"), 1000)).resolves.toEqual({
      ok: true, status: 200, body: '{"Browser":"HeadlessChrome/130.0.0.0"}',
    });
    await expect(httpGet(debuggerUrl("127.0.0.1", port, "/nope"), 1000)).resolves.toEqual({
      ok: false, status: 404, body: "missing", error: "HTTP 404",
    });
  });

  it("reports a refused connection without throwing", async () => {
    const result = await httpGet(debuggerUrl("127.0.0.1", await closedPort(), "/json/version"), 1000);
    expect(result.ok).toBe(false);
    expect(result.status).toBeNull();
  });

  it("reports a timeout", async () => {
    const port = await listen(http.createServer(() => { /* never answers */ }));
    await expect(httpGet(debuggerUrl("127.0.0.1", port, "/slow"), 50)).resolves.toEqual({
      ok: false, status: null, error: "timed out after 50ms",
    });
  });
});

describe("websocketHandshake", () => {
  it("succeeds against a live endpoint", async () => {
    const server = http.createServer();
    const wss = new WebSocketServer({ server });
    cleanups.push(() => new Promise((done) => wss.close(() => done())));
    const port = await listen(server);
    await expect(websocketHandshake(`ws://127.0.0.1:${port}/devtools/browser/test`, 1000)).resolves.toEqual({ ok: true });
  });

  it("fails for a closed port and a malformed URL", async () => {
    const closed = await websocketHandshake(`ws://127.0.0.1:${await closedPort()}/x`, 1000);
    expect(closed.ok).toBe(false);
    const malformed = await websocketHandshake("not a url", 1000);
    expect(malformed.ok).toBe(false);
  });
});

describe("parseBrowserVersion", () => {
  it("extracts the browser and websocket URL", () => {
    expect(parseBrowserVersion('{"Browser":"Chrome/1","webSocketDebuggerUrl":"ws://h/x","Protocol-Version":"1.3"}')).toEqual({
      browser: "Chrome/1",
      webSocketDebuggerUrl: "ws://h/x",
    });
  });

  it("tolerates missing or malformed bodies", () => {
    expect(parseBrowserVersion(undefined)).toEqual({});
    expect(parseBrowserVersion("not json")).toEqual({});
    expect(parseBrowserVersion("[1,2]")).toEqual({});
    expect(parseBrowserVersion('{"Browser":5}')).toEqual({});
  });
});
