import { describe, it, expect, vi } from "vitest";

vi.mock("../util/exec.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../util/exec.js")>();
  return { ...actual, runCommand: vi.fn() };
});

vi.mock("../util/logger.js", () => ({
  log: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), trace: vi.fn() },
}));

import { runCommand } from "../util/exec.js";
import { createCommandEngine } from "./engine.js";
import { DEFAULT_CONFIG } from "../config/schema.js";

describe("createCommandEngine", () => {
  it("runs the configured validate and reload commands", async () => {
    vi.mocked(runCommand).mockResolvedValue({ stdout: "", stderr: "syntax is ok\ntest is successful\n", exitCode: 0 });
    const engine = createCommandEngine(DEFAULT_CONFIG.proxy);

    await expect(engine.validate()).resolves.toEqual({ ok: true, output: "syntax is ok\ntest is successful" });
    await engine.reload();
    expect(vi.mocked(runCommand).mock.calls).toEqual([
      [["nginx", "-t"], 30_000],
      [["nginx", "-s", "reload"], 30_000],
    ]);
  });

  it("maps a non-zero exit to a failed result with the command output", async () => {
    vi.mocked(runCommand).mockResolvedValue({ stdout: "", stderr: "emerg: unknown directive", exitCode: 1 });
    const engine = createCommandEngine({ ...DEFAULT_CONFIG.proxy, validateCommand: ["/usr/sbin/nginx", "-t", "-q"] });
    await expect(engine.validate()).resolves.toEqual({ ok: false, output: "emerg: unknown directive" });
  });
});
