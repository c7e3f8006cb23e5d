// Which ports a discovery pass looks at. Every port in the hot span at the start
// of the range is scanned; beyond it only every `stride`-th port, unless the
// scan is exhaustive. Tracked ports are always included.

import type { FleetConfig } from "../config/schema.js";

export type DiscoveryOptions = FleetConfig["health"]["discovery"];

export function planDiscoveryPorts(
  rangeStart: number,
  rangeEnd: number,
  opts: DiscoveryOptions,
  tracked: readonly number[] = [],
): number[] {
  const ports = new Set<number>(tracked);
  for (let port = rangeStart; port <= rangeEnd; port++) {
    const offset = port - rangeStart;
    if (opts.exhaustive || offset < opts.hotSpan || (offset - opts.hotSpan) % opts.stride === 0) {
      ports.add(port);
    }
  }
  return [...ports].sort((a, b) => a - b);
}
