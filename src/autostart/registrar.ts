import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "../logger.js";

const execFileAsync = promisify(execFile);

export const RUN_KEY = "HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Run";
export const RUN_VALUE_NAME = "netprobe-agent";

export type CommandRunner = (file: string, args: readonly string[]) => Promise<unknown>;

export interface AutostartRegistrarDeps {
  readonly logger: Logger;
  readonly platform?: NodeJS.Platform;
  readonly runCommand?: CommandRunner;
}

/** Registers the agent to start at user logon through the registry Run key. */
export class WindowsAutostartRegistrar {
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly runCommand: CommandRunner;

  constructor(deps: AutostartRegistrarDeps) {
    this.logger = deps.logger.child({ component: "autostart" });
    this.platform = deps.platform ?? process.platform;
    this.runCommand = deps.runCommand ?? ((file, args) => execFileAsync(file, [...args], { windowsHide: true }));
  }

  buildCommand(launchCommand: string): { file: string; args: string[] } {
    return {
      file: "reg",
      args: ["add", RUN_KEY, "/v", RUN_VALUE_NAME, "/t", "REG_SZ", "/d", launchCommand, "/f"],
    };
  }

  async register(launchCommand: string): Promise<boolean> {
    if (this.platform !== "win32") {
      this.logger.debug({ platform: this.platform }, "Autostart is only supported on Windows, skipping");
      return false;
    }

    const { file, args } = this.buildCommand(launchCommand);
    try {
      await this.runCommand(file, args);
      this.logger.info({ launchCommand }, "Registered autostart entry");
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ error: message }, "Failed to register autostart entry");
      return false;
    }
  }
}
