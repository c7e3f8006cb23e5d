// Fleet error taxonomy. Every failure the CLI reports carries the step that
// failed and, where one is involved, the concrete port.

export type FleetErrorCode =
  | "EXHAUSTED"
  | "PORT_IN_USE"
  | "SPAWN_FAILED"
  | "READINESS_TIMEOUT"
  | "TEMPLATE_MISSING"
  | "VALIDATION_FAILED"
  | "RELOAD_FAILED"
  | "BROWSER_NOT_FOUND"
  | "LOCK_TIMEOUT";

export class FleetError extends Error {
  readonly code: FleetErrorCode;
  readonly port?: number;
  readonly step: string;

  constructor(code: FleetErrorCode, step: string, message: string, port?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.step = step;
    this.port = port;
  }
}

export class PortsExhaustedError extends FleetError {
  constructor(readonly rangeStart: number, readonly rangeEnd: number) {
    super("EXHAUSTED", "allocate", `No available ports in range ${rangeStart}-${rangeEnd}`);
  }
}

export class PortInUseError extends FleetError {
  constructor(port: number, reason: string) {
    super("PORT_IN_USE", "claim", `Port ${port} is already in use (${reason})`, port);
  }
}

export class SpawnFailedError extends FleetError {
  constructor(port: number, message: string, readonly logTail: string[] = []) {
    super("SPAWN_FAILED", "spawn", message, port);
  }
}

export class ReadinessTimeoutError extends FleetError {
  constructor(port: number, readonly attempts: number) {
    super(
      "READINESS_TIMEOUT",
      "readiness",
      `Browser on port ${port} did not become ready after ${attempts} attempts`,
      port,
    );
  }
}

export class TemplateMissingError extends FleetError {
  constructor(port: number, readonly templatePath: string) {
    super("TEMPLATE_MISSING", "render", `Route template not found: ${templatePath}`, port);
  }
}

export class ValidationFailedError extends FleetError {
  constructor(step: string, message: string, readonly output = "", port?: number) {
    super("VALIDATION_FAILED", step, message, port);
  }
}

export class ReloadFailedError extends FleetError {
  constructor(message: string, readonly output = "", port?: number) {
    super("RELOAD_FAILED", "reload", message, port);
  }
}

export class BrowserNotFoundError extends FleetError {
  constructor(readonly searched: string[]) {
    super(
      "BROWSER_NOT_FOUND",
      "launch",
      `Browser binary not found (searched: ${searched.join(", ") || "none"}). Install Chrome or Chromium, or set browser.executablePath`,
    );
  }
}

export class LockTimeoutError extends FleetError {
  constructor(readonly lockPath: string, timeoutMs: number) {
    super("LOCK_TIMEOUT", "lock", `Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
  }
}

export function isFleetError(error: unknown): error is FleetError {
  return error instanceof FleetError;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const code = error.code;
    if (typeof code === "string") return code;
  }
  return undefined;
}

export function isConnectionRefusedError(error: unknown): boolean {
  if (getErrorCode(error) === "ECONNREFUSED") return true;
  const cause = error instanceof Error ? error.cause : undefined;
  if (cause !== undefined && getErrorCode(cause) === "ECONNREFUSED") return true;
  const msg = getErrorMessage(error).toLowerCase();
  return msg.includes("econnrefused") || msg.includes("connection refused");
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) return true;
  const msg = getErrorMessage(error).toLowerCase();
  return (
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("etimedout") ||
    msg.includes("aborted")
  );
}

export function isMissingFileError(error: unknown): boolean {
  return getErrorCode(error) === "ENOENT";
}

export function describeError(error: unknown): string {
  if (error instanceof FleetError) {
    const where = error.port !== undefined ? ` [port ${error.port}]` : "";
    return `${error.step}${where}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
