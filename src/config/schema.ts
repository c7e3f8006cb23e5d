import { z } from "zod";

// ── Ports ──
const PortsSchema = z.object({
  start: z.number().int().min(1).max(65535).default(48000),
  end: z.number().int().min(1).max(65535).default(48999),
  host: z.string().default("127.0.0.1"),
  claimTtlMs: z.number().positive().default(5 * 60 * 1000),
});

// ── Browser ──
const BrowserSchema = z.object({
  executablePath: z.string().optional(),
  candidates: z.array(z.string()).default([
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser",
    "/opt/google/chrome/google-chrome",
  ]),
  headless: z.boolean().default(true),
  bindAddress: z.string().default("0.0.0.0"),
  extraArgs: z.array(z.string()).default([]),
});

// ── Paths ──
const PathsSchema = z.object({
  dataDir: z.string().optional(),
  logDir: z.string().optional(),
  stateDir: z.string().optional(),
});

// ── Readiness & Termination ──
const ReadinessSchema = z.object({
  attempts: z.number().int().positive().default(30),
  intervalMs: z.number().positive().default(1000),
  requestTimeoutMs: z.number().positive().default(2000),
});
const TerminationSchema = z.object({
  graceMs: z.number().nonnegative().default(10_000),
  pollMs: z.number().positive().default(250),
  killWaitMs: z.number().nonnegative().default(2000),
});

// ── Proxy ──
const ProxySchema = z.object({
  enabled: z.boolean().default(true),
  confDir: z.string().default("/etc/nginx/conf.d"),
  filePrefix: z.string().regex(/^[A-Za-z0-9._-]+$/).default("chrome-proxy-"),
  templatePath: z.string().optional(),
  upstreamHost: z.string().default("127.0.0.1"),
  listenOffset: z.number().int().default(1000),
  routeBaseUrl: z.string().default("http://127.0.0.1:{{LISTEN_PORT}}"),
  validateCommand: z.array(z.string()).min(1).default(["nginx", "-t"]),
  reloadCommand: z.array(z.string()).min(1).default(["nginx", "-s", "reload"]),
  commandTimeoutMs: z.number().positive().default(30_000),
  lockTimeoutMs: z.number().positive().default(60_000),
});

// ── Health ──
const DiscoverySchema = z.object({
  hotSpan: z.number().int().nonnegative().default(100),
  stride: z.number().int().positive().default(10),
  exhaustive: z.boolean().default(false),
});
const HealthSchema = z.object({
  connectTimeoutMs: z.number().positive().default(2000),
  httpTimeoutMs: z.number().positive().default(5000),
  concurrency: z.number().int().positive().default(8),
  deadlineMs: z.number().positive().default(60_000),
  websocket: z.boolean().default(false),
  hostChecks: z.boolean().default(false),
  logErrorThreshold: z.number().int().nonnegative().default(5),
  discovery: DiscoverySchema.default({}),
});

// ── Logging ──
const LoggingSchema = z.object({
  file: z.boolean().default(true),
});

// ══════════════════════════════════════════════
// ── Root Config ──
// ══════════════════════════════════════════════
const FleetConfigObject = z.object({
  ports: PortsSchema.default({}),
  browser: BrowserSchema.default({}),
  paths: PathsSchema.default({}),
  readiness: ReadinessSchema.default({}),
  termination: TerminationSchema.default({}),
  proxy: ProxySchema.default({}),
  health: HealthSchema.default({}),
  logging: LoggingSchema.default({}),
});

/** True when some route listen port (instance port + listenOffset) falls inside the instance range. */
export function listenPortsOverlapRange(
  ports: { start: number; end: number },
  proxy: { enabled: boolean; listenOffset: number },
): boolean {
  if (!proxy.enabled) return false;
  return ports.start + proxy.listenOffset <= ports.end && ports.end + proxy.listenOffset >= ports.start;
}

export const FleetConfigSchema = FleetConfigObject
  .refine((c) => c.ports.start <= c.ports.end, {
    message: "ports.start must not exceed ports.end",
    path: ["ports"],
  })
  .refine((c) => !listenPortsOverlapRange(c.ports, c.proxy), {
    message: "proxy listen ports (port + proxy.listenOffset) must lie outside ports.start-ports.end",
    path: ["ports"],
  });

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;

export const DEFAULT_CONFIG: FleetConfig = FleetConfigSchema.parse({});
