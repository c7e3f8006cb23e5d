// Argument parsers shared by the CLI commands

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { parsePortRange, type PortRange } from "../config/loader.js";

export function parsePortArgument(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError(`Invalid port "${value}": not a number.`);
  const port = Number(value);
  if (port < 1 || port > 65535) throw new InvalidArgumentError(`Invalid port "${value}": must be 1-65535.`);
  return port;
}

export function parseRangeArgument(value: string): PortRange {
  const range = parsePortRange(value);
  if (!range) throw new InvalidArgumentError(`Invalid range "${value}": expected <start>-<end>.`);
  return range;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError(`Invalid number "${value}": must be a positive integer.`);
  return n;
}

/**
 * `start [port] [-- args...]`: after `--` every word is an operand, so a
 * leading browser flag lands where the port would. Flags are never ports.
 */
export function splitStartOperands(operands: readonly string[]): { port?: number; browserArgs: string[] } {
  const [first, ...rest] = operands;
  if (first === undefined) return { browserArgs: [] };
  if (first.startsWith("-")) return { browserArgs: [...operands] };
  return { port: parsePortArgument(first), browserArgs: rest };
}

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  range: z.object({ start: z.number(), end: z.number() }).optional(),
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const HealthOptionsSchema = z.object({
  host: z.boolean().optional(),
  watch: z.number().optional(),
});

export const LogsOptionsSchema = z.object({
  lines: z.number().default(50),
});
