import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { RUN_KEY, WindowsAutostartRegistrar } from "./registrar.js";

const logger = pino({ level: "silent" });

describe("WindowsAutostartRegistrar", () => {
  it("writes the Run key entry on Windows", async () => {
    const runCommand = vi.fn(async () => ({ stdout: "", stderr: "" }));
    const registrar = new WindowsAutostartRegistrar({ logger, platform: "win32", runCommand });

    await expect(registrar.register('"C:\\node.exe" "C:\\agent\\index.js"')).resolves.toBe(true);
    expect(runCommand).toHaveBeenCalledWith("reg", [
      "add",
      RUN_KEY,
      "/v",
      "netprobe-agent",
      "/t",
      "REG_SZ",
      "/d",
      '"C:\\node.exe" "C:\\agent\\index.js"',
      "/f",
    ]);
  });

  it("skips registration on other platforms", async () => {
    const runCommand = vi.fn(async () => ({ stdout: "", stderr: "" }));
    const registrar = new WindowsAutostartRegistrar({ logger, platform: "linux", runCommand });

    await expect(registrar.register("/usr/bin/netprobe-agent")).resolves.toBe(false);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it("reports failure without throwing when reg fails", async () => {
    const runCommand = vi.fn(async () => {
      throw new Error("Access is denied.");
    });
    const registrar = new WindowsAutostartRegistrar({ logger, platform: "win32", runCommand });

    await expect(registrar.register("agent.exe")).resolves.toBe(false);
  });
});
