import { describe, it, expect } from "vitest";
import { commandOutput, runCommand } from "../../src/util/exec.js";

describe("runCommand", () => {
  it("reports an empty command as 127", async () => {
    await expect(runCommand([])).resolves.toEqual({ stdout: "", stderr: "empty command", exitCode: 127 });
  });

  it("reports a missing binary as 127 instead of rejecting", async () => {
    const result = await runCommand(["/nonexistent/cdp-fleet-test-binary"]);
    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain("ENOENT");
  });
});

describe("commandOutput", () => {
  it("joins trimmed stdout and stderr", () => {
    expect(commandOutput({ stdout: "ok\n", stderr: "  warn \n", exitCode: 0 })).toBe("ok\nwarn");
    expect(commandOutput({ stdout: "", stderr: "only err", exitCode: 1 })).toBe("only err");
  });
});
