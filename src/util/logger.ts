import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";

let verbose = false;
let jsonMode = false;
let logFile: string | undefined;

export function setVerbose(v: boolean): void { verbose = v; }
export function setJsonMode(v: boolean): void { jsonMode = v; }
export function setLogFile(file: string | undefined): void {
  logFile = file;
  if (file) {
    try { fs.mkdirSync(path.dirname(file), { recursive: true }); } catch { logFile = undefined; }
  }
}

function timestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function appendToFile(line: string): void {
  if (!logFile) return;
  try {
    fs.appendFileSync(logFile, line + "\n");
  } catch {
    // launcher log is best-effort
  }
}

function write(level: string, color: (s: string) => string, msg: string): void {
  if (jsonMode) {
    const line = JSON.stringify({ level, ts: Date.now(), msg });
    console.error(line);
    appendToFile(line);
  } else {
    console.error(color(level), msg);
    appendToFile(`[${timestamp()}] ${level.toUpperCase()} ${msg}`);
  }
}

export const log = {
  trace(msg: string): void { if (verbose) write("trace", chalk.dim, msg); },
  debug(msg: string): void { if (verbose) write("debug", chalk.gray, msg); },
  info(msg: string): void { write("info", chalk.blue, msg); },
  warn(msg: string): void { write("warn", chalk.yellow, msg); },
  error(msg: string): void { write("error", chalk.red, msg); },
};
